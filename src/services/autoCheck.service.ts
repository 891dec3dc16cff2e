// src/services/autoCheck.service.ts
import 'reflect-metadata';
import { injectable, inject } from 'tsyringe';
import chokidar, { FSWatcher } from 'chokidar';
import path from 'path';
import { Logger } from 'pino';
import { ConfigService } from '../config/config.service';
import { LoggingService } from './logging.service';
import { FileSystemService } from './fileSystem.service';
import { TaskQueueService } from './taskQueue.service';
import { IBrowserLauncher, IContentChecker } from '../types/check.types';
import { getErrorMessageAndStack, isCancellation } from '../utils/errorUtils';

export type FileChangeType = 'add' | 'change';

export interface AutoCheckOptions {
    /** Overrides CONTENT_CHECK_CONTENT_DIR. */
    directory?: string;
}

const WRITE_STABILITY_THRESHOLD_MS = 500;
const WRITE_POLL_INTERVAL_MS = 100;

/**
 * Watch mode: every created or modified supported file is checked on its own and its
 * scorecard opened. Events become independent tasks on a bounded queue.
 */
@injectable()
export class AutoCheckService {
    private readonly serviceBaseLogger: Logger;

    constructor(
        @inject(ConfigService) private configService: ConfigService,
        @inject(LoggingService) private loggingService: LoggingService,
        @inject(FileSystemService) private fileSystemService: FileSystemService,
        @inject(TaskQueueService) private taskQueue: TaskQueueService,
        @inject('IContentChecker') private checker: IContentChecker,
        @inject('IBrowserLauncher') private browserLauncher: IBrowserLauncher,
    ) {
        this.serviceBaseLogger = this.loggingService.getLogger({ service: 'AutoCheckService' });
    }

    /**
     * Watches until `signal` aborts, then stops the watcher, drops queued events and
     * waits for in-flight checks to unwind.
     *
     * @param signal - Ends the watch session.
     * @param options - Optional override of the watched directory.
     * @throws {ConfigurationError} Up front, when the configuration is invalid.
     */
    async start(signal: AbortSignal, options: AutoCheckOptions = {}): Promise<void> {
        const settings = this.configService.validateOrThrow();
        const watchPath = options.directory ? path.resolve(options.directory) : settings.contentDirectory;
        const includeSubdirectories = this.configService.checkConfiguration.watchIncludeSubdirectories;
        const logger = this.serviceBaseLogger.child({ serviceMethod: 'AutoCheckService.start', watchPath });

        if (signal.aborted) return;

        const watcher: FSWatcher = chokidar.watch(watchPath, {
            ignoreInitial: true,
            depth: includeSubdirectories ? undefined : 0,
            awaitWriteFinish: { stabilityThreshold: WRITE_STABILITY_THRESHOLD_MS, pollInterval: WRITE_POLL_INTERVAL_MS },
        });

        const enqueue = (change: FileChangeType) => (filePath: string) => {
            if (signal.aborted) return;
            void this.taskQueue.add(async () => {
                await this.handleFileEvent(filePath, change, signal);
            }, `${change} ${filePath}`);
        };

        watcher.on('add', enqueue('add'));
        watcher.on('change', enqueue('change'));
        watcher.on('error', (error: unknown) => {
            const { message } = getErrorMessageAndStack(error);
            logger.warn({ event: 'watcher_error', err: { message } }, `File watcher error: ${message}`);
        });
        watcher.on('ready', () => {
            logger.info({ event: 'watch_started', includeSubdirectories }, `Watching '${watchPath}' for file changes. Press Ctrl+C to quit.`);
        });

        await new Promise<void>((resolve) => {
            if (signal.aborted) {
                resolve();
                return;
            }
            signal.addEventListener('abort', () => resolve(), { once: true });
        });

        logger.info({ event: 'watch_stopping', queued: this.taskQueue.size, running: this.taskQueue.pending }, 'Stopping file watcher.');
        await watcher.close();
        this.taskQueue.clear();
        await this.taskQueue.onIdle();
        logger.info({ event: 'watch_stopped' }, 'File watcher stopped.');
    }

    /**
     * Runs one watcher event through the checking pipeline. Resolves to the opened
     * scorecard link, or `undefined` when the file was skipped or the check failed.
     *
     * @param filePath - Path reported by the watcher.
     * @param change - Whether the file was created or modified; only used in logs.
     * @param signal - Cancels the check; a cancelled check resolves to `undefined`.
     */
    async handleFileEvent(filePath: string, change: FileChangeType, signal?: AbortSignal): Promise<string | undefined> {
        const logger = this.serviceBaseLogger.child({ serviceMethod: 'AutoCheckService.handleFileEvent', filePath, change });

        if (!this.fileSystemService.isFileSupported(filePath, logger)) {
            logger.debug({ event: 'watch_file_unsupported' }, `File type not supported, skipping: ${filePath}`);
            return undefined;
        }
        if (!(await this.fileSystemService.isFileValid(filePath, logger))) {
            logger.debug({ event: 'watch_file_invalid' }, `File is not valid, skipping: ${filePath}`);
            return undefined;
        }

        logger.info({ event: 'watch_file_changed' }, `File ${change === 'add' ? 'created' : 'changed'}: ${filePath}`);

        let scorecardUrl: string | undefined;
        try {
            scorecardUrl = await this.checker.check(filePath, undefined, 'automated', signal, logger);
        } catch (error: unknown) {
            if (isCancellation(error)) {
                logger.info({ event: 'watch_check_cancelled' }, `Check cancelled for ${filePath}.`);
                return undefined;
            }
            throw error;
        }

        if (!scorecardUrl) {
            logger.warn({ event: 'watch_check_no_result' }, `No scorecard for ${filePath}.`);
            return undefined;
        }

        logger.info({ event: 'watch_check_completed', scorecardUrl }, `Check completed successfully for ${filePath}.`);
        this.browserLauncher.openUrl(scorecardUrl);
        return scorecardUrl;
    }
}
