// src/services/browserLauncher.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import { spawn } from 'child_process';
import { Logger } from 'pino';
import { ConfigService } from '../config/config.service';
import { LoggingService } from './logging.service';
import { IBrowserLauncher } from '../types/check.types';
import { getErrorMessageAndStack } from '../utils/errorUtils';

export function openerCommand(url: string, platform: NodeJS.Platform = process.platform): [string, string[]] {
    if (platform === 'darwin') return ['open', [url]];
    if (platform === 'win32') return ['cmd', ['/c', 'start', '', url]];
    return ['xdg-open', [url]];
}

/**
 * Opens report links in the default browser. Only `https://` links are opened.
 */
@singleton()
export class BrowserLauncherService implements IBrowserLauncher {
    private readonly logger: Logger;

    constructor(
        @inject(ConfigService) private configService: ConfigService,
        @inject(LoggingService) private loggingService: LoggingService,
    ) {
        this.logger = this.loggingService.getLogger({ service: 'BrowserLauncherService' });
    }

    /**
     * Opens `url` in the default browser, unless disabled by `OPEN_BROWSER`.
     * @param url - Report link; anything but an `https://` URL is refused.
     * @returns Whether a browser launch was attempted.
     */
    openUrl(url: string | undefined): boolean {
        if (!url || !url.startsWith('https://')) {
            this.logger.warn({ event: 'browser_open_invalid_url', url }, 'Invalid URL. Cannot open in browser.');
            return false;
        }
        if (!this.configService.openBrowser) {
            this.logger.info({ event: 'browser_open_disabled', url }, `Browser opening is disabled. Report: ${url}`);
            return false;
        }

        const [command, args] = openerCommand(url);
        try {
            const child = spawn(command, args, { detached: true, stdio: 'ignore' });
            child.on('error', (error: Error) => {
                this.logger.warn({ event: 'browser_open_failed', url, command, err: { message: error.message } },
                    `Could not open browser. Open the link manually: ${url}`);
            });
            child.unref();
        } catch (error: unknown) {
            const { message } = getErrorMessageAndStack(error);
            this.logger.warn({ event: 'browser_open_failed', url, command, err: { message } },
                `Could not open browser. Open the link manually: ${url}`);
            return false;
        }

        this.logger.info({ event: 'browser_opened', url }, `Opened in browser: ${url}`);
        return true;
    }
}
