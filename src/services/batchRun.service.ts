// src/services/batchRun.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import path from 'path';
import { ConfigService } from '../config/config.service';
import { LoggingService } from './logging.service';
import { FileSystemService } from './fileSystem.service';
import { BatchDispatcherService } from './batchDispatcher.service';
import { reportSummary, summarize } from './resultAggregator.service';
import { BatchSummary, IBrowserLauncher } from '../types/check.types';
import { resolveBatchId } from '../utils/batchId';

export interface BatchRunOptions {
    batchId?: string;
    /** Overrides CONTENT_CHECK_CONTENT_DIR. */
    directory?: string;
    /** Overrides CHECK_CONCURRENCY. */
    concurrency?: number;
    signal?: AbortSignal;
}

/**
 * One batch run: discover supported files, check them all under one batch id, then
 * summarise and open the batch report.
 */
@singleton()
export class BatchRunService {
    constructor(
        @inject(ConfigService) private configService: ConfigService,
        @inject(LoggingService) private loggingService: LoggingService,
        @inject(FileSystemService) private fileSystemService: FileSystemService,
        @inject(BatchDispatcherService) private dispatcher: BatchDispatcherService,
        @inject('IBrowserLauncher') private browserLauncher: IBrowserLauncher,
    ) { }

    /**
     * Runs one batch from discovery to report.
     *
     * @param options - Batch id, directory and concurrency overrides, and the cancel signal.
     * @returns The batch summary. Cancelled or unstarted files are not counted.
     * @throws {ConfigurationError} Before anything is dispatched, when the configuration is invalid.
     */
    async run(options: BatchRunOptions = {}): Promise<BatchSummary> {
        const settings = this.configService.validateOrThrow();
        const batchId = resolveBatchId(options.batchId);
        const directory = options.directory ? path.resolve(options.directory) : settings.contentDirectory;
        const logger = this.loggingService.getBatchLogger(batchId, { service: 'BatchRunService' });

        try {
            logger.info({ event: 'batch_run_start', directory }, `Starting batch ${batchId} for ${directory}.`);

            const filePaths = await this.fileSystemService.getSupportedFiles(directory, true, logger);
            if (filePaths.length === 0) {
                logger.warn({ event: 'batch_run_no_files', directory }, `No supported files found in ${directory}.`);
                return summarize(batchId, []);
            }

            const outcomes = await this.dispatcher.dispatchBatch(filePaths, batchId, 'batch', options.signal, {
                concurrency: options.concurrency,
                logger,
            });

            const summary = summarize(batchId, outcomes);
            reportSummary(summary, outcomes, logger);
            if (options.signal?.aborted) {
                logger.warn({ event: 'batch_run_cancelled', dispatchedCount: outcomes.length, fileCount: filePaths.length },
                    `Batch ${batchId} was cancelled after ${outcomes.length} of ${filePaths.length} files.`);
            } else if (summary.representativeLink) {
                this.browserLauncher.openUrl(summary.representativeLink);
            }
            return summary;
        } finally {
            await this.loggingService.closeBatchLogger(batchId);
        }
    }
}
