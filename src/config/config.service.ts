// src/config/config.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import fs from 'fs';
import { Logger } from 'pino';

import { envSchema } from './schemas';
import { AppConfig, CheckServiceSettings, EnvironmentRecord } from './types';
import {
    PROCESS_ENV,
    REQUIRED_ENV_VARIABLES,
    SECRET_PLACEHOLDER_MARKERS,
    USERNAME_PLACEHOLDER,
} from './constants';
import { AppConfiguration } from './app.config';
import { CheckConfiguration } from './check.config';
import { ConfigurationError } from '../types/errors';

/**
 * Parses the environment once and keeps the result immutable.
 * Unlike a fail-fast loader, a bad environment never exits the process: problems are
 * collected into `validationErrors` and surfaced by the caller before any work starts.
 */
@singleton()
export class ConfigService {
    public readonly rawConfig: AppConfig;
    public readonly appConfiguration: AppConfiguration;
    public readonly checkConfiguration: CheckConfiguration;

    private readonly errors: string[] = [];

    constructor(@inject(PROCESS_ENV) env: EnvironmentRecord) {
        this.rawConfig = this.parseEnvironment(env);
        this.appConfiguration = new AppConfiguration(this.rawConfig);
        this.checkConfiguration = new CheckConfiguration(this.rawConfig);
        this.validateRequiredSettings();
    }

    private parseEnvironment(env: EnvironmentRecord): AppConfig {
        const result = envSchema.safeParse(env);
        if (result.success) {
            return result.data;
        }

        // Report each bad variable, then fall back to its default so the rest still loads
        const failingKeys = new Set<string>();
        for (const issue of result.error.issues) {
            const key = String(issue.path[0] ?? 'environment');
            failingKeys.add(key);
            this.errors.push(`Invalid value for environment variable ${key}: ${issue.message}`);
        }
        const fallbackEnv: EnvironmentRecord = {};
        for (const [key, value] of Object.entries(env)) {
            if (!failingKeys.has(key)) fallbackEnv[key] = value;
        }
        return envSchema.parse(fallbackEnv);
    }

    private validateRequiredSettings(): void {
        for (const { name, description } of REQUIRED_ENV_VARIABLES) {
            if (!this.rawConfig[name]) {
                this.errors.push(`Missing required environment variable: ${name} (${description})`);
            }
        }

        const url = this.rawConfig.CONTENT_CHECK_URL;
        if (url) {
            if (url.includes('{') && url.includes('}')) {
                this.errors.push(`Content check URL contains template placeholder: ${url}. Please replace with actual URL.`);
            } else if (!isAbsoluteHttpUrl(url)) {
                this.errors.push(`Invalid URL format: ${url}`);
            }
        }

        const token = this.rawConfig.CONTENT_CHECK_SSO_TOKEN;
        if (token && containsSecretPlaceholder(token)) {
            this.errors.push(`SSO Token contains placeholder value: ${token}. Please replace with actual token.`);
        }

        const signature = this.rawConfig.CONTENT_CHECK_CLIENT_SIGNATURE;
        if (signature && containsSecretPlaceholder(signature)) {
            this.errors.push(`Client Signature contains placeholder value: ${signature}. Please replace with actual signature.`);
        }

        const username = this.rawConfig.CONTENT_CHECK_USERNAME;
        if (username && username.includes(USERNAME_PLACEHOLDER)) {
            this.errors.push(`Username contains placeholder value: ${username}. Please replace with actual username.`);
        }

        const contentDirectory = this.rawConfig.CONTENT_CHECK_CONTENT_DIR;
        if (contentDirectory && !isExistingDirectory(this.checkConfiguration.contentDirectory)) {
            this.errors.push(`Content directory does not exist: ${contentDirectory}`);
        }
    }

    // --- Validation Surface ---
    public get isValid(): boolean {
        return this.errors.length === 0;
    }

    public get validationErrors(): readonly string[] {
        return this.errors;
    }

    /**
     * The validated remote-service settings. Throws {@link ConfigurationError} when the
     * configuration is not valid, so nothing reaches the remote service with placeholders.
     */
    public validateOrThrow(): CheckServiceSettings {
        if (!this.isValid) {
            throw new ConfigurationError([...this.errors]);
        }
        const { remoteUrl, apiToken, username, clientSignature, contentDirectory } = this.checkConfiguration;
        return { remoteUrl, apiToken, username, clientSignature, contentDirectory };
    }

    /**
     * Logs every validation error, one record per error, under a 'Configuration Errors:' heading.
     * @param logger - Destination of the error records.
     */
    public printValidationErrors(logger: Logger): void {
        if (this.errors.length === 0) return;
        logger.error({ event: 'config_validation_failed', errorCount: this.errors.length }, 'Configuration Errors:');
        for (const error of this.errors) {
            logger.error({ event: 'config_validation_error' }, `  - ${error}`);
        }
    }

    // --- Delegated Getters ---
    get nodeEnv() { return this.appConfiguration.nodeEnv; }
    get isProduction(): boolean { return this.appConfiguration.nodeEnv === 'production'; }
    get logLevel() { return this.appConfiguration.logLevel; }
    get logToConsole() { return this.appConfiguration.logToConsole; }
    get logsDirectory() { return this.appConfiguration.logsDirectoryPath; }
    get appLogFilePathForWriting() { return this.appConfiguration.appLogFilePath; }
    get openBrowser() { return this.appConfiguration.openBrowser; }
}

function isAbsoluteHttpUrl(value: string): boolean {
    try {
        const parsed = new URL(value);
        return parsed.protocol === 'https:' || parsed.protocol === 'http:';
    } catch {
        return false;
    }
}

function containsSecretPlaceholder(value: string): boolean {
    return SECRET_PLACEHOLDER_MARKERS.some(marker => value.includes(marker));
}

function isExistingDirectory(dirPath: string): boolean {
    try {
        return fs.statSync(dirPath).isDirectory();
    } catch {
        return false;
    }
}
