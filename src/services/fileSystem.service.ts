// src/services/fileSystem.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import fs from 'fs';
import path from 'path';
import { Logger } from 'pino';
import { ConfigService } from '../config/config.service';
import { LoggingService } from './logging.service';
import { CheckServiceError } from '../types/errors';
import { getErrorMessageAndStack } from '../utils/errorUtils';
import { executeWithRetry, FILE_OPERATION_RETRY_POLICY } from '../utils/retry.utils';

/** Extensions the checking platform accepts, lower case and without the dot. */
export const SUPPORTED_EXTENSIONS: ReadonlySet<string> = new Set([
    // XML-based formats
    'xml', 'xhtm', 'xhtml', 'svg', 'resx', 'xlf', 'xliff', 'dita', 'ditamap', 'ditaval',
    // HTML
    'html', 'htm',
    // Markdown
    'markdown', 'mdown', 'mkdn', 'mkd', 'md',
    'txt',
    // Source code
    'java',
    'c', 'h', 'cc', 'cpp', 'cxx', 'c++', 'hh', 'hpp', 'hxx', 'h++', 'dic',
    // Configuration
    'yaml', 'yml',
    'properties',
    'json',
]);

@singleton()
export class FileSystemService {
    private readonly serviceBaseLogger: Logger;
    private readonly maxFileSizeBytes: number;

    constructor(
        @inject(ConfigService) private configService: ConfigService,
        @inject(LoggingService) private loggingService: LoggingService,
    ) {
        this.serviceBaseLogger = this.loggingService.getLogger({ service: 'FileSystemService' });
        this.maxFileSizeBytes = this.configService.checkConfiguration.maxFileSizeBytes;
    }

    private getMethodLogger(parentLogger: Logger | undefined, methodName: string): Logger {
        const base = parentLogger || this.serviceBaseLogger;
        return base.child({ serviceMethod: `FileSystemService.${methodName}` });
    }

    /**
     * Whether the file's extension is on the allow-list, case-insensitively.
     * @param filePath - Path or bare file name.
     * @param parentLogger - Optional logger to use as the parent for this operation.
     */
    isFileSupported(filePath: string, parentLogger?: Logger): boolean {
        if (!filePath.trim()) return false;
        const extension = path.extname(filePath).replace(/^\./, '').toLowerCase();
        const isSupported = SUPPORTED_EXTENSIONS.has(extension);
        if (!isSupported) {
            this.getMethodLogger(parentLogger, 'isFileSupported')
                .debug({ filePath, extension, event: 'file_extension_unsupported' }, `File extension '${extension}' is not supported.`);
        }
        return isSupported;
    }

    filterSupportedFiles(filePaths: readonly string[], parentLogger?: Logger): string[] {
        const supported = filePaths.filter(filePath => this.isFileSupported(filePath, parentLogger));
        this.getMethodLogger(parentLogger, 'filterSupportedFiles')
            .debug({ supportedCount: supported.length, totalCount: filePaths.length, event: 'files_filtered' },
                `Filtered ${supported.length} supported files from ${filePaths.length} total files.`);
        return supported;
    }

    /**
     * Checks that `filePath` names an existing regular file that can currently be read.
     * Never throws; every problem is logged as a warning and yields `false`.
     */
    async isFileValid(filePath: string, parentLogger?: Logger): Promise<boolean> {
        const logger = this.getMethodLogger(parentLogger, 'isFileValid');
        if (!filePath.trim()) {
            logger.warn({ event: 'file_path_empty' }, 'File path is empty.');
            return false;
        }

        try {
            const stats = await fs.promises.stat(filePath);
            if (!stats.isFile()) {
                logger.warn({ filePath, event: 'file_not_regular' }, `Path is not a regular file: ${filePath}`);
                return false;
            }
            const handle = await fs.promises.open(filePath, 'r');
            try {
                await handle.read(Buffer.alloc(1), 0, 1, 0);
            } finally {
                await handle.close();
            }
            return true;
        } catch (error: unknown) {
            const { message } = getErrorMessageAndStack(error);
            logger.warn({ filePath, event: 'file_not_accessible', err: { message } }, `File is not accessible: ${filePath}`);
            return false;
        }
    }

    /**
     * Lists every file under `directoryPath`, sorted by path. A missing directory yields an empty list.
     * @param directoryPath - Directory to scan.
     * @param includeSubdirectories - Whether nested directories are walked too.
     * @param parentLogger - Optional logger to use as the parent for this operation.
     * @returns Absolute or relative paths, following the form of `directoryPath`.
     */
    async getAllFiles(directoryPath: string, includeSubdirectories: boolean = true, parentLogger?: Logger): Promise<string[]> {
        const logger = this.getMethodLogger(parentLogger, 'getAllFiles');
        if (!directoryPath.trim()) {
            logger.warn({ event: 'directory_path_empty' }, 'Directory path is empty.');
            return [];
        }

        const files: string[] = [];
        const walk = async (dir: string): Promise<void> => {
            const entries = await fs.promises.readdir(dir, { withFileTypes: true });
            for (const entry of entries) {
                const fullPath = path.join(dir, entry.name);
                if (entry.isFile()) {
                    files.push(fullPath);
                } else if (entry.isDirectory() && includeSubdirectories) {
                    await walk(fullPath);
                }
            }
        };

        try {
            await walk(directoryPath);
        } catch (error: unknown) {
            const { message } = getErrorMessageAndStack(error);
            logger.warn({ directoryPath, event: 'directory_read_failed', err: { message } }, `Could not read directory: ${directoryPath}`);
            return [];
        }

        files.sort();
        logger.debug({ directoryPath, fileCount: files.length, includeSubdirectories, event: 'directory_scanned' },
            `Found ${files.length} files in directory.`);
        return files;
    }

    async getSupportedFiles(directoryPath: string, includeSubdirectories: boolean = true, parentLogger?: Logger): Promise<string[]> {
        const allFiles = await this.getAllFiles(directoryPath, includeSubdirectories, parentLogger);
        const supported = this.filterSupportedFiles(allFiles, parentLogger);
        this.getMethodLogger(parentLogger, 'getSupportedFiles')
            .info({ directoryPath, supportedFileCount: supported.length, event: 'supported_files_found' },
                `Found ${supported.length} supported files in directory: ${directoryPath}`);
        return supported;
    }

    /**
     * Reads a whole file as UTF-8 under the file retry policy. Files over the configured
     * size cap fail with a `file_too_large` error and are not retried.
     *
     * @param filePath - File to read.
     * @param parentLogger - Optional logger to use as the parent for this operation.
     * @param signal - Aborts the read and any retry wait.
     * @returns The file content.
     */
    async readFileContent(filePath: string, parentLogger?: Logger, signal?: AbortSignal): Promise<string> {
        const logger = this.getMethodLogger(parentLogger, 'readFileContent');
        logger.trace({ filePath, event: 'readFileContent_start' });

        const content = await executeWithRetry(async () => {
            const stats = await fs.promises.stat(filePath);
            if (stats.size > this.maxFileSizeBytes) {
                throw new CheckServiceError('file_too_large',
                    `File is ${stats.size} bytes, above the limit of ${this.maxFileSizeBytes} bytes: ${filePath}`,
                    { operation: 'readFileContent', filePath });
            }
            return fs.promises.readFile(filePath, { encoding: 'utf8', signal });
        }, {
            operationName: 'readFileContent',
            context: filePath,
            policy: FILE_OPERATION_RETRY_POLICY,
            logger,
            signal,
        });

        logger.trace({ filePath, length: content.length, event: 'readFileContent_success' });
        return content;
    }
}
