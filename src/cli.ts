#!/usr/bin/env node
// src/cli.ts
import 'reflect-metadata';
import dotenv from 'dotenv';
import { Command, InvalidArgumentError } from 'commander';
import { isCancel, text } from '@clack/prompts';
import { container, DependencyContainer } from 'tsyringe';
import { Logger } from 'pino';

import { registerServices } from './container';
import { ConfigService } from './config/config.service';
import { LoggingService } from './services/logging.service';
import { BatchRunService } from './services/batchRun.service';
import { AutoCheckService } from './services/autoCheck.service';
import { ConfigurationError } from './types/errors';
import { generateBatchId } from './utils/batchId';
import { getErrorMessageAndStack } from './utils/errorUtils';

type CommandAction = (services: DependencyContainer, signal: AbortSignal, logger: Logger) => Promise<void>;

function parsePositiveInteger(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 1) {
        throw new InvalidArgumentError('Must be a positive integer.');
    }
    return parsed;
}

/** `null` when the user cancelled the prompt. */
async function promptForBatchId(): Promise<string | null | undefined> {
    if (!process.stdin.isTTY) return undefined;
    const defaultBatchId = generateBatchId();
    const answer = await text({
        message: `Enter a Batch ID (press Enter for default: ${defaultBatchId})`,
        placeholder: defaultBatchId,
        defaultValue: defaultBatchId,
    });
    return isCancel(answer) ? null : answer;
}

/**
 * Builds the container, checks configuration, wires SIGINT/SIGTERM to one shared
 * abort signal, runs `action`, and always flushes logs. Resolves to the exit code.
 */
async function runCommand(action: CommandAction): Promise<number> {
    const services = registerServices(container, process.env);
    const configService = services.resolve(ConfigService);
    const loggingService = services.resolve(LoggingService);
    loggingService.initialize();
    const logger = loggingService.getLogger({ service: 'cli' });

    if (!configService.isValid) {
        logger.error({ event: 'config_invalid' }, 'Invalid configuration. Please check environment variables.');
        configService.printValidationErrors(logger);
        await loggingService.flushLogsAndClose();
        return 1;
    }

    const controller = new AbortController();
    const onSignal = (signalName: NodeJS.Signals) => {
        logger.warn({ event: 'shutdown_signal', signal: signalName }, `Received ${signalName}. Cancelling...`);
        controller.abort();
    };
    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);

    try {
        await action(services, controller.signal, logger);
        return 0;
    } catch (error: unknown) {
        if (error instanceof ConfigurationError) {
            configService.printValidationErrors(logger);
            return 1;
        }
        const { message, stack } = getErrorMessageAndStack(error);
        logger.fatal({ event: 'command_failed', err: { message, stack } }, `Unexpected error: ${message}`);
        return 1;
    } finally {
        process.removeListener('SIGINT', onSignal);
        process.removeListener('SIGTERM', onSignal);
        await loggingService.flushLogsAndClose();
    }
}

const program = new Command();

program
    .name('content-check')
    .description('Submit content files to the content checking platform, in batches or as they change.');

program
    .command('batch')
    .description('Check every supported file in the content directory as one batch.')
    .option('-b, --batch-id <id>', 'batch id (defaults to batch-YYYYMMDD-HHMMSS in UTC)')
    .option('-d, --dir <path>', 'directory to check (defaults to CONTENT_CHECK_CONTENT_DIR)')
    .option('-c, --concurrency <n>', 'maximum checks in flight', parsePositiveInteger)
    .action(async (options: { batchId?: string; dir?: string; concurrency?: number }) => {
        process.exitCode = await runCommand(async (services, signal, logger) => {
            let batchId = options.batchId;
            if (batchId === undefined) {
                const answer = await promptForBatchId();
                if (answer === null) {
                    logger.info({ event: 'batch_prompt_cancelled' }, 'Batch cancelled.');
                    return;
                }
                batchId = answer;
            }

            const summary = await services.resolve(BatchRunService).run({
                batchId,
                directory: options.dir,
                concurrency: options.concurrency,
                signal,
            });
            logger.info({ event: 'batch_done', ...summary }, `Batch ${summary.batchId} done.`);
        });
    });

program
    .command('watch')
    .description('Watch the content directory and check files as they are created or changed.')
    .option('-d, --dir <path>', 'directory to watch (defaults to CONTENT_CHECK_CONTENT_DIR)')
    .action(async (options: { dir?: string }) => {
        process.exitCode = await runCommand(async (services, signal) => {
            await services.resolve(AutoCheckService).start(signal, { directory: options.dir });
        });
    });

dotenv.config();
program.parseAsync(process.argv).catch((error: unknown) => {
    const { message } = getErrorMessageAndStack(error);
    console.error(`content-check: ${message}`);
    process.exitCode = 1;
});
