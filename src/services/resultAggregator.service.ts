// src/services/resultAggregator.service.ts
import { Logger } from 'pino';
import { BatchSummary, CheckOutcome } from '../types/check.types';

/**
 * Folds the outcomes of one batch into its summary. The representative link is the
 * first non-blank link of a successful outcome, in input order.
 *
 * @param batchId - Id every outcome was checked under.
 * @param outcomes - Dispatcher outcomes, in input order. Not modified.
 * @returns Success and failure counts, plus the representative link when there is one.
 */
export function summarize(batchId: string, outcomes: readonly CheckOutcome[]): BatchSummary {
    let successCount = 0;
    let failureCount = 0;
    let representativeLink: string | undefined;

    for (const outcome of outcomes) {
        if (outcome.succeeded) {
            successCount++;
        } else {
            failureCount++;
        }
        if (representativeLink === undefined && outcome.succeeded && outcome.resultLink?.trim()) {
            representativeLink = outcome.resultLink;
        }
    }

    return representativeLink === undefined
        ? { batchId, successCount, failureCount }
        : { batchId, successCount, failureCount, representativeLink };
}

/**
 * Logs one SUCCESS or FAILED line per file, then the batch totals and the report link.
 * @param logger - Usually the batch logger, so the report also lands in the batch log file.
 */
export function reportSummary(summary: BatchSummary, outcomes: readonly CheckOutcome[], logger: Logger): void {
    for (const outcome of outcomes) {
        if (outcome.succeeded) {
            logger.info({ event: 'file_check_succeeded', filePath: outcome.filePath, resultLink: outcome.resultLink },
                `SUCCESS: ${outcome.filePath}`);
        } else {
            logger.warn({ event: 'file_check_failed', filePath: outcome.filePath }, `FAILED: ${outcome.filePath}`);
        }
    }

    logger.info({
        event: 'batch_summary',
        batchId: summary.batchId,
        successCount: summary.successCount,
        failureCount: summary.failureCount,
        representativeLink: summary.representativeLink,
    }, `Batch ${summary.batchId}: ${summary.successCount} succeeded, ${summary.failureCount} failed.`);

    if (summary.representativeLink) {
        logger.info({ event: 'batch_report_link', link: summary.representativeLink },
            `Content Analysis Dashboard (Batch Report): ${summary.representativeLink}`);
    } else {
        logger.warn({ event: 'batch_report_link_missing' }, 'No Content Analysis Dashboard report was generated.');
    }
}
