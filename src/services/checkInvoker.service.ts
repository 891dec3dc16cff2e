// src/services/checkInvoker.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import { Logger } from 'pino';
import { LoggingService } from './logging.service';
import { FileSystemService } from './fileSystem.service';
import {
    CheckMode,
    ICheckApiClient,
    IContentChecker,
    REPORT_CONTENT_ANALYSIS_DASHBOARD,
    REPORT_SCORECARD,
    ReportLinks,
} from '../types/check.types';
import { classifyError, getErrorMessageAndStack, isCancellation } from '../utils/errorUtils';
import { executeWithRetry, REMOTE_CALL_RETRY_POLICY, RetryPolicy } from '../utils/retry.utils';
import { throwIfAborted } from '../utils/promiseUtils';

/**
 * Batch checks link to the batch-wide dashboard when the platform produced one;
 * otherwise the per-document scorecard is used.
 */
export function selectResultLink(reports: ReportLinks, checkMode: CheckMode): string | undefined {
    const dashboard = reports[REPORT_CONTENT_ANALYSIS_DASHBOARD];
    if (checkMode === 'batch' && dashboard?.trim()) {
        return dashboard;
    }
    const scorecard = reports[REPORT_SCORECARD];
    return scorecard?.trim() ? scorecard : undefined;
}

@singleton()
export class CheckInvokerService implements IContentChecker {
    private readonly serviceBaseLogger: Logger;
    private readonly remotePolicy: Readonly<RetryPolicy> = REMOTE_CALL_RETRY_POLICY;

    constructor(
        @inject(LoggingService) private loggingService: LoggingService,
        @inject(FileSystemService) private fileSystemService: FileSystemService,
        @inject('ICheckApiClient') private apiClient: ICheckApiClient,
    ) {
        this.serviceBaseLogger = this.loggingService.getLogger({ service: 'CheckInvokerService' });
    }

    /**
     * Checks one file end to end. Only cancellation is rethrown.
     *
     * @param filePath - File to read and submit.
     * @param batchId - Batch the check belongs to; ignored in automated mode.
     * @param checkMode - Decides which report link is selected.
     * @param signal - Aborts the read, the remote calls and any backoff wait.
     * @param parentLogger - Logger the per-file records go to; defaults to the service logger.
     * @returns The selected report link, or `undefined` when the file is unusable or
     *          the remote call ultimately fails.
     */
    async check(
        filePath: string,
        batchId: string | undefined,
        checkMode: CheckMode,
        signal?: AbortSignal,
        parentLogger?: Logger,
    ): Promise<string | undefined> {
        const logger = (parentLogger || this.serviceBaseLogger).child({ serviceMethod: 'CheckInvokerService.check', filePath });
        throwIfAborted(signal);

        if (!(await this.fileSystemService.isFileValid(filePath, logger))) {
            logger.warn({ event: 'check_skipped_invalid_file' }, `File is missing or unreadable, skipping: ${filePath}`);
            return undefined;
        }

        try {
            const content = await this.fileSystemService.readFileContent(filePath, logger, signal);

            const accessToken = await executeWithRetry(() => this.apiClient.signIn(signal), {
                operationName: 'signIn',
                context: filePath,
                policy: this.remotePolicy,
                logger,
                signal,
            });

            const result = await executeWithRetry(
                () => this.apiClient.submitCheck(accessToken, { filePath, batchId, checkMode, content }, signal),
                {
                    operationName: 'submitCheck',
                    context: filePath,
                    policy: this.remotePolicy,
                    logger,
                    signal,
                });

            const link = selectResultLink(result.reports, checkMode);
            logger.info({ event: 'check_result', checkId: result.id, qualityScore: result.qualityScore, qualityStatus: result.qualityStatus, resultLink: link },
                `Checked ${filePath}: score ${result.qualityScore} (${result.qualityStatus}).`);
            if (!link) {
                logger.warn({ event: 'check_result_without_link', reportNames: Object.keys(result.reports) }, 'No usable report link in check result.');
            }
            return link;
        } catch (error: unknown) {
            if (isCancellation(error)) {
                throw error;
            }
            const { message, stack } = getErrorMessageAndStack(error);
            logger.error({ event: 'check_failed', errorKind: classifyError(error), err: { message, stack } },
                `Check failed for ${filePath}: ${message}`);
            return undefined;
        }
    }
}
