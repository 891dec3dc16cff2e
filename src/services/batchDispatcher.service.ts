// src/services/batchDispatcher.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import { Semaphore, SemaphoreInterface } from 'async-mutex';
import { Logger } from 'pino';
import { ConfigService } from '../config/config.service';
import { LoggingService } from './logging.service';
import { CheckMode, CheckOutcome, IContentChecker } from '../types/check.types';
import { CancellationError } from '../types/errors';
import { classifyError, getErrorMessageAndStack, isCancellation } from '../utils/errorUtils';
import { abortableDelay } from '../utils/promiseUtils';

export interface DispatchOptions {
    /** Overrides CHECK_CONCURRENCY for this call. */
    concurrency?: number;
    /** Overrides CHECK_PACING_MS for this call. */
    pacingMs?: number;
    logger?: Logger;
}

/** Resolves to the slot's releaser, or `undefined` when the wait was cancelled. */
async function acquireSlot(gate: Semaphore): Promise<SemaphoreInterface.Releaser | undefined> {
    try {
        const [, release] = await gate.acquire();
        return release;
    } catch (error: unknown) {
        if (isCancellation(error)) return undefined;
        throw error;
    }
}

/**
 * Runs one check per file with at most `concurrency` checks in flight. Each task keeps
 * its slot for the pacing delay after its check returns, which spaces out calls to the
 * remote service.
 */
@singleton()
export class BatchDispatcherService {
    private readonly serviceBaseLogger: Logger;

    constructor(
        @inject(ConfigService) private configService: ConfigService,
        @inject(LoggingService) private loggingService: LoggingService,
        @inject('IContentChecker') private checker: IContentChecker,
    ) {
        this.serviceBaseLogger = this.loggingService.getLogger({ service: 'BatchDispatcherService' });
    }

    /**
     * Resolves once every task has finished. Slot `i` of the result describes
     * `filePaths[i]`. After `signal` aborts, files that never got a result are left out,
     * and the remaining outcomes keep their input order.
     *
     * @param filePaths - Files to check, in the order outcomes are reported.
     * @param batchId - Passed through to every check.
     * @param checkMode - Passed through to every check.
     * @param signal - Stops admission of new checks and cuts pacing waits short.
     * @param options - Per-call overrides of concurrency, pacing and the logger.
     * @returns One outcome per file that got a result.
     * @throws {RangeError} When the concurrency is not a positive integer.
     */
    async dispatchBatch(
        filePaths: readonly string[],
        batchId: string,
        checkMode: CheckMode,
        signal?: AbortSignal,
        options: DispatchOptions = {},
    ): Promise<CheckOutcome[]> {
        const concurrency = options.concurrency ?? this.configService.checkConfiguration.concurrency;
        const pacingMs = options.pacingMs ?? this.configService.checkConfiguration.pacingMs;
        const logger = (options.logger || this.serviceBaseLogger).child({ serviceMethod: 'BatchDispatcherService.dispatchBatch', batchId });

        if (!Number.isInteger(concurrency) || concurrency < 1) {
            throw new RangeError(`Concurrency must be a positive integer, got ${concurrency}.`);
        }

        if (filePaths.length === 0) return [];
        const outcomes: Array<CheckOutcome | undefined> = new Array(filePaths.length).fill(undefined);

        const gate = new Semaphore(concurrency, new CancellationError('Waiting for a dispatch slot was cancelled.'));
        const onAbort = () => {
            logger.warn({ event: 'dispatch_cancel_requested' }, 'Cancellation requested. No further checks will start.');
            gate.cancel();
        };
        if (signal?.aborted) {
            logger.warn({ event: 'dispatch_cancelled_before_start', fileCount: filePaths.length }, 'Batch cancelled before dispatch.');
            return [];
        }
        signal?.addEventListener('abort', onAbort, { once: true });

        logger.info({ event: 'dispatch_start', fileCount: filePaths.length, concurrency, pacingMs, checkMode },
            `Dispatching ${filePaths.length} files with concurrency ${concurrency}.`);

        const runTask = async (filePath: string, index: number): Promise<void> => {
            const release = await acquireSlot(gate);
            if (!release) return;

            try {
                if (signal?.aborted) return;

                let resultLink: string | undefined;
                try {
                    resultLink = await this.checker.check(filePath, batchId, checkMode, signal, logger);
                } catch (error: unknown) {
                    // Only a cancelled batch leaves the slot empty
                    if (signal?.aborted && isCancellation(error)) return;
                    const { message } = getErrorMessageAndStack(error);
                    logger.error({ event: 'dispatch_check_threw', filePath, errorKind: classifyError(error), err: { message } },
                        `Check threw for ${filePath}: ${message}`);
                    resultLink = undefined;
                }

                const succeeded = resultLink !== undefined && resultLink.trim() !== '';
                outcomes[index] = succeeded ? { filePath, resultLink, succeeded } : { filePath, succeeded };
                logger.debug({ event: 'dispatch_check_done', filePath, index, succeeded }, `Check finished for ${filePath}.`);

                try {
                    await abortableDelay(pacingMs, signal);
                } catch (error: unknown) {
                    if (!isCancellation(error)) throw error;
                }
            } finally {
                release();
            }
        };

        try {
            await Promise.all(filePaths.map((filePath, index) => runTask(filePath, index)));
        } finally {
            signal?.removeEventListener('abort', onAbort);
        }

        const completed = outcomes.filter((outcome): outcome is CheckOutcome => outcome !== undefined);
        logger.info({ event: 'dispatch_end', fileCount: filePaths.length, completedCount: completed.length, cancelled: signal?.aborted ?? false },
            `Dispatch finished: ${completed.length}/${filePaths.length} files have an outcome.`);
        return completed;
    }
}
