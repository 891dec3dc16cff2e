// src/config/app.config.ts
import path from 'path';
import { LevelWithSilent } from 'pino';
import { AppConfig } from './types';

export class AppConfiguration {
    public readonly nodeEnv: 'development' | 'production' | 'test';
    public readonly logLevel: LevelWithSilent;
    public readonly logsDirectoryPath: string;
    public readonly appLogFileName: string;
    public readonly logToConsole: boolean;
    public readonly openBrowser: boolean;

    // Logs for one batch run go to their own file under this subdirectory
    public readonly batchLogSubdir: string = 'batches';

    constructor(appConfig: AppConfig) {
        this.nodeEnv = appConfig.NODE_ENV;
        this.logLevel = appConfig.LOG_LEVEL;
        this.logsDirectoryPath = path.resolve(appConfig.LOGS_DIRECTORY);
        this.appLogFileName = appConfig.APP_LOG_FILE_NAME || 'app.log';
        this.logToConsole = appConfig.LOG_TO_CONSOLE;
        this.openBrowser = appConfig.OPEN_BROWSER;
    }

    get appLogDirectory(): string {
        return path.join(this.logsDirectoryPath, 'app');
    }

    get appLogFilePath(): string {
        return path.join(this.appLogDirectory, this.appLogFileName);
    }

    get batchLogDirectory(): string {
        return path.join(this.logsDirectoryPath, this.batchLogSubdir);
    }

    /** Batch ids are caller-supplied, so anything outside a safe file-name alphabet is replaced. */
    getBatchLogFilePath(batchId: string): string {
        const safeBatchId = batchId.replace(/[^A-Za-z0-9._-]/g, '_');
        return path.join(this.batchLogDirectory, `${safeBatchId}.log`);
    }
}
