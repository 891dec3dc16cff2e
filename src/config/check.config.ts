// src/config/check.config.ts
import path from 'path';
import { AppConfig } from './types';

/**
 * Settings read by the checking pipeline: the remote service credentials and the
 * dispatch tuning. Credential fields are empty strings when unset; callers must
 * consult `ConfigService.isValid` before using them.
 */
export class CheckConfiguration {
    public readonly remoteUrl: string;
    public readonly apiToken: string;
    public readonly username: string;
    public readonly clientSignature: string;
    public readonly contentDirectory: string;

    public readonly concurrency: number;
    public readonly pacingMs: number;
    public readonly maxFileSizeBytes: number;

    public readonly requestTimeoutMs: number;
    public readonly pollIntervalMs: number;
    public readonly pollTimeoutMs: number;

    public readonly watchIncludeSubdirectories: boolean;

    constructor(appConfig: AppConfig) {
        this.remoteUrl = (appConfig.CONTENT_CHECK_URL ?? '').replace(/\/+$/, '');
        this.apiToken = appConfig.CONTENT_CHECK_SSO_TOKEN ?? '';
        this.username = appConfig.CONTENT_CHECK_USERNAME ?? '';
        this.clientSignature = appConfig.CONTENT_CHECK_CLIENT_SIGNATURE ?? '';
        this.contentDirectory = appConfig.CONTENT_CHECK_CONTENT_DIR
            ? path.resolve(appConfig.CONTENT_CHECK_CONTENT_DIR)
            : '';

        this.concurrency = appConfig.CHECK_CONCURRENCY;
        this.pacingMs = appConfig.CHECK_PACING_MS;
        this.maxFileSizeBytes = appConfig.MAX_FILE_SIZE_BYTES;

        this.requestTimeoutMs = appConfig.REQUEST_TIMEOUT_MS;
        this.pollIntervalMs = appConfig.CHECK_POLL_INTERVAL_MS;
        this.pollTimeoutMs = appConfig.CHECK_POLL_TIMEOUT_MS;

        this.watchIncludeSubdirectories = appConfig.WATCH_INCLUDE_SUBDIRECTORIES;
    }
}
