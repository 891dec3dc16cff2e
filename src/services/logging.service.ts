// src/services/logging.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import pino, { Logger, LoggerOptions, LevelWithSilent, Level, stdTimeFunctions, StreamEntry } from 'pino';
import pretty from 'pino-pretty';
import fs from 'fs';
import path from 'path';
import { ConfigService } from '../config/config.service';
import { getErrorMessageAndStack } from '../utils/errorUtils';

export type LoggerContext = { service?: string; batchId?: string; [key: string]: unknown };

type FileStream = ReturnType<typeof pino.destination>;

interface FileLoggerEntry {
    logger: Logger;
    stream: FileStream;
    filePath: string;
}

const STREAM_CLOSE_TIMEOUT_MS = 3000;

function toStreamLevel(level: LevelWithSilent): Level | undefined {
    return level === 'silent' ? undefined : level;
}

@singleton()
export class LoggingService {
    private appEntry?: FileLoggerEntry;
    private batchLoggers: Map<string, FileLoggerEntry> = new Map();

    private readonly logLevel: LevelWithSilent;
    // Used before initialize() and after shutdown; never writes to files
    private readonly fallbackLogger: Logger;

    private isShuttingDown = false;
    private isInitialized = false;

    constructor(@inject(ConfigService) private configService: ConfigService) {
        this.logLevel = this.configService.logLevel;
        this.fallbackLogger = pino({ ...this.baseOptions(), name: 'content-check' });
    }

    public initialize(): void {
        if (this.isInitialized) return;

        this.ensureDirectory(this.configService.logsDirectory, 'Main Logs Directory');
        this.ensureDirectory(this.configService.appConfiguration.appLogDirectory, 'App Log Directory');
        this.ensureDirectory(this.configService.appConfiguration.batchLogDirectory, 'Batch Log Directory');

        this.appEntry = this.createFileLogger(this.configService.appLogFilePathForWriting, this.baseOptions());
        this.isInitialized = true;
        this.isShuttingDown = false;
        this.appEntry.logger.info({ service: 'LoggingService', event: 'logging_initialized', logFilePath: this.appEntry.filePath }, 'Shared loggers initialized.');
    }

    private baseOptions(base?: Record<string, unknown>): LoggerOptions {
        return {
            level: this.logLevel,
            timestamp: stdTimeFunctions.isoTime,
            formatters: { level: (label) => ({ level: label }) },
            base: base ?? null, // no pid/hostname
        };
    }

    private ensureDirectory(dirPath: string, logTypeDesc: string): void {
        try {
            fs.mkdirSync(dirPath, { recursive: true });
            fs.accessSync(dirPath, fs.constants.W_OK);
        } catch (err: unknown) {
            const { message: errorMessage } = getErrorMessageAndStack(err);
            throw new Error(`Error ensuring ${logTypeDesc} directory "${dirPath}" exists or is writable: "${errorMessage}".`);
        }
    }

    private consoleStreams(streamLevel: Level): StreamEntry[] {
        if (!this.configService.logToConsole) return [];
        if (this.configService.isProduction) {
            return [{ level: streamLevel, stream: process.stdout }];
        }
        return [{
            level: streamLevel,
            stream: pretty({
                colorize: true,
                levelFirst: true,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname,service,event',
            }),
        }];
    }

    private createFileLogger(logFilePath: string, options: LoggerOptions): FileLoggerEntry {
        const stream = pino.destination({ dest: logFilePath, mkdir: true, sync: false });
        const streamLevel = toStreamLevel(this.logLevel);
        if (!streamLevel) {
            return { logger: pino({ ...options, level: 'silent' }), stream, filePath: logFilePath };
        }
        const streams: StreamEntry[] = [
            ...this.consoleStreams(streamLevel),
            { level: streamLevel, stream },
        ];
        return { logger: pino(options, pino.multistream(streams)), stream, filePath: logFilePath };
    }

    /**
     * Gets the shared application logger, optionally as a child carrying `context`.
     * Before {@link initialize} this is a console-only fallback logger.
     */
    public getLogger(context?: LoggerContext): Logger {
        const target = this.isInitialized && !this.isShuttingDown && this.appEntry
            ? this.appEntry.logger
            : this.fallbackLogger;
        return context ? target.child(context) : target;
    }

    /**
     * Logger writing to a file dedicated to one batch run, as well as the console.
     * Falls back to the shared logger when the service is not initialized.
     */
    public getBatchLogger(batchId: string, context?: LoggerContext): Logger {
        if (!this.isInitialized || this.isShuttingDown) {
            return this.getLogger({ ...context, batchId });
        }

        const existing = this.batchLoggers.get(batchId);
        if (existing) {
            return context ? existing.logger.child(context) : existing.logger;
        }

        const logFilePath = this.configService.appConfiguration.getBatchLogFilePath(batchId);
        let entry: FileLoggerEntry;
        try {
            entry = this.createFileLogger(logFilePath, this.baseOptions({ batchId }));
        } catch (fileStreamError: unknown) {
            this.getLogger().error({ event: 'batch_logger_create_failed', batchId, logFilePath, err: getErrorMessageAndStack(fileStreamError) },
                `Failed to create batch log file for ${batchId}. Using the shared logger.`);
            return this.getLogger({ ...context, batchId });
        }

        this.batchLoggers.set(batchId, entry);
        entry.logger.info({ event: 'batch_logger_created', logFilePath }, 'Logger initialized for this batch.');
        return context ? entry.logger.child(context) : entry.logger;
    }

    /**
     * Ends the batch's file stream. A no-op for batches without an open file logger.
     * @param batchId - Id passed to {@link getBatchLogger}.
     */
    public async closeBatchLogger(batchId: string): Promise<void> {
        const entry = this.batchLoggers.get(batchId);
        if (!entry) return;
        this.batchLoggers.delete(batchId);
        entry.logger.info({ event: 'batch_logger_closing', logFilePath: entry.filePath }, `Closing logger for batch ${batchId}.`);
        await this.closeStream(entry, `batch-${batchId}`);
    }

    private closeStream(entry: FileLoggerEntry, loggerKey: string): Promise<void> {
        const { stream, filePath } = entry;
        return new Promise<void>((resolve) => {
            let settled = false;
            const finish = (err?: Error) => {
                if (settled) return;
                settled = true;
                clearTimeout(timer);
                if (err) {
                    this.fallbackLogger.error({ event: 'log_stream_close_error', loggerKey, filePath, err: getErrorMessageAndStack(err) },
                        `Error closing stream for ${loggerKey}.`);
                }
                resolve();
            };
            const timer = setTimeout(() => {
                this.fallbackLogger.warn({ event: 'log_stream_close_timeout', loggerKey, filePath },
                    `Timeout waiting for stream of ${loggerKey} to close. Assuming closed.`);
                finish();
            }, STREAM_CLOSE_TIMEOUT_MS);

            stream.once('close', () => finish());
            stream.once('error', (err: Error) => finish(err));
            stream.end();
        });
    }

    public async flushLogsAndClose(): Promise<void> {
        if (!this.isInitialized || this.isShuttingDown) return;
        this.isShuttingDown = true;

        const appEntry = this.appEntry;
        appEntry?.logger.info({ service: 'LoggingService', event: 'log_stream_close_start_all' }, 'Closing all log streams before exit.');

        const batchIds = Array.from(this.batchLoggers.keys());
        await Promise.all(batchIds.map(batchId => this.closeBatchLogger(batchId)));
        if (appEntry) {
            await this.closeStream(appEntry, 'app');
        }

        this.appEntry = undefined;
        this.isInitialized = false;
    }
}
