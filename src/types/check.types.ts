// src/types/check.types.ts
import type { Logger } from 'pino';
import type { ErrorKind } from './errors';

/**
 * How the remote service should treat a submitted document.
 * `batch` checks are grouped under a batch id and produce a content analysis dashboard;
 * `automated` checks stand alone and produce a scorecard.
 */
export type CheckMode = 'automated' | 'batch';

/** Built once per file at invocation time; never persisted. */
export interface CheckRequest {
    filePath: string;
    batchId?: string;
    checkMode: CheckMode;
    content: string;
}

/** One per submitted file. A missing `resultLink` means the file failed. */
export interface CheckOutcome {
    filePath: string;
    resultLink?: string;
    succeeded: boolean;
}

/** Ephemeral record of a failed attempt inside one retry run. */
export interface RetryAttempt {
    /** 0-based index of the attempt that just failed. */
    attemptNumber: number;
    lastError?: ErrorKind;
    /** Milliseconds to wait before the next attempt. */
    nextDelay: number;
}

export interface BatchSummary {
    batchId: string;
    successCount: number;
    failureCount: number;
    representativeLink?: string;
}

/** Report name -> link, as returned by the remote service. */
export type ReportLinks = Record<string, string>;

export interface RemoteCheckResult {
    id: string;
    qualityScore: number;
    qualityStatus: string;
    reports: ReportLinks;
}

export const REPORT_SCORECARD = 'scorecard';
export const REPORT_CONTENT_ANALYSIS_DASHBOARD = 'contentAnalysisDashboard';

// --- Collaborator interfaces (registered under string tokens in the container) ---

/** Single-file check used by the dispatcher and the watch handler. */
export interface IContentChecker {
    /**
     * Checks one file and resolves to its report link, or `undefined` when the file failed.
     * @param parentLogger - Logger the per-file records go to, e.g. a batch logger.
     */
    check(
        filePath: string,
        batchId: string | undefined,
        checkMode: CheckMode,
        signal?: AbortSignal,
        parentLogger?: Logger,
    ): Promise<string | undefined>;
}

export interface ICheckApiClient {
    signIn(signal?: AbortSignal): Promise<string>;
    submitCheck(accessToken: string, request: CheckRequest, signal?: AbortSignal): Promise<RemoteCheckResult>;
}

export interface IBrowserLauncher {
    openUrl(url: string | undefined): boolean;
}
