// src/__tests__/helpers/testServices.ts
import fs from 'fs';
import os from 'os';
import path from 'path';
import pino, { Logger } from 'pino';
import { ConfigService } from '../../config/config.service';
import { EnvironmentRecord } from '../../config/types';
import { LoggingService } from '../../services/logging.service';

export function makeEnv(overrides: EnvironmentRecord = {}): EnvironmentRecord {
    return {
        NODE_ENV: 'test',
        LOG_LEVEL: 'silent',
        LOG_TO_CONSOLE: 'false',
        OPEN_BROWSER: 'false',
        CONTENT_CHECK_URL: 'https://checks.example.test',
        CONTENT_CHECK_SSO_TOKEN: 'test-secret',
        CONTENT_CHECK_USERNAME: 'test-user',
        CONTENT_CHECK_CLIENT_SIGNATURE: 'test-signature',
        CONTENT_CHECK_CONTENT_DIR: os.tmpdir(),
        ...overrides,
    };
}

export function makeServices(overrides: EnvironmentRecord = {}): { config: ConfigService; logging: LoggingService } {
    const config = new ConfigService(makeEnv(overrides));
    const logging = new LoggingService(config);
    return { config, logging };
}

export async function makeTempDir(): Promise<string> {
    return fs.promises.mkdtemp(path.join(os.tmpdir(), 'content-check-'));
}

export async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
    for (const [relativePath, content] of Object.entries(files)) {
        const fullPath = path.join(root, relativePath);
        await fs.promises.mkdir(path.dirname(fullPath), { recursive: true });
        await fs.promises.writeFile(fullPath, content, 'utf8');
    }
}

export interface CapturedRecord {
    level: string;
    msg: string;
    event?: string;
}

/** A logger whose records are kept in memory, one parsed object per line. */
export function captureLogger(): { logger: Logger; records: CapturedRecord[] } {
    const records: CapturedRecord[] = [];
    const logger = pino({
        level: 'trace',
        formatters: { level: (label) => ({ level: label }) },
    }, {
        write(line: string) {
            const parsed: unknown = JSON.parse(line);
            if (typeof parsed === 'object' && parsed !== null && 'msg' in parsed && 'level' in parsed) {
                const { msg, level } = parsed;
                const event = 'event' in parsed && typeof parsed.event === 'string' ? parsed.event : undefined;
                records.push({ level: String(level), msg: String(msg), event });
            }
        },
    });
    return { logger, records };
}
