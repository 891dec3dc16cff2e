// src/__tests__/autoCheck.test.ts
import fs from 'fs';
import { Logger } from 'pino';
import path from 'path';
import { AutoCheckService } from '../services/autoCheck.service';
import { FileSystemService } from '../services/fileSystem.service';
import { TaskQueueService } from '../services/taskQueue.service';
import { CheckMode, IBrowserLauncher, IContentChecker } from '../types/check.types';
import { CancellationError, ConfigurationError } from '../types/errors';
import { makeServices, makeTempDir, writeFiles } from './helpers/testServices';

const SCORECARD = 'https://reports.example.test/scorecard/9';

function makeFakes() {
    const check = jest.fn<Promise<string | undefined>, [string, string | undefined, CheckMode, AbortSignal?, Logger?]>(async () => SCORECARD);
    const openUrl = jest.fn<boolean, [string | undefined]>(() => true);
    const checker: IContentChecker = { check };
    const launcher: IBrowserLauncher = { openUrl };
    return { checker, launcher, check, openUrl };
}

function makeAutoCheck(checker: IContentChecker, launcher: IBrowserLauncher, overrides: Record<string, string> = {}): AutoCheckService {
    const { config, logging } = makeServices(overrides);
    return new AutoCheckService(
        config,
        logging,
        new FileSystemService(config, logging),
        new TaskQueueService(config, logging),
        checker,
        launcher,
    );
}

async function waitFor(condition: () => boolean, timeoutMs: number): Promise<void> {
    const deadline = Date.now() + timeoutMs;
    while (!condition()) {
        if (Date.now() > deadline) throw new Error(`Condition not met within ${timeoutMs}ms.`);
        await new Promise(resolve => setTimeout(resolve, 25));
    }
}

describe('AutoCheckService', () => {
    let root: string;

    beforeEach(async () => {
        root = await makeTempDir();
        await writeFiles(root, { 'topic.dita': '<topic id="t"/>', 'photo.png': 'binary' });
    });

    afterEach(async () => {
        await fs.promises.rm(root, { recursive: true, force: true });
    });

    describe('handleFileEvent', () => {
        it('checks a supported file in automated mode and opens its scorecard', async () => {
            const { checker, launcher, check, openUrl } = makeFakes();
            const filePath = path.join(root, 'topic.dita');

            await expect(makeAutoCheck(checker, launcher).handleFileEvent(filePath, 'change')).resolves.toBe(SCORECARD);
            expect(check).toHaveBeenCalledWith(filePath, undefined, 'automated', undefined, expect.anything());
            expect(openUrl).toHaveBeenCalledWith(SCORECARD);
        });

        it('ignores unsupported files', async () => {
            const { checker, launcher, check } = makeFakes();

            await expect(makeAutoCheck(checker, launcher).handleFileEvent(path.join(root, 'photo.png'), 'add')).resolves.toBeUndefined();
            expect(check).not.toHaveBeenCalled();
        });

        it('ignores files that vanished before the event was handled', async () => {
            const { checker, launcher, check } = makeFakes();

            await expect(makeAutoCheck(checker, launcher).handleFileEvent(path.join(root, 'gone.md'), 'add')).resolves.toBeUndefined();
            expect(check).not.toHaveBeenCalled();
        });

        it('opens nothing when the check produced no link', async () => {
            const { checker, launcher, check, openUrl } = makeFakes();
            check.mockResolvedValueOnce(undefined);

            await expect(makeAutoCheck(checker, launcher).handleFileEvent(path.join(root, 'topic.dita'), 'add')).resolves.toBeUndefined();
            expect(openUrl).not.toHaveBeenCalled();
        });

        it('swallows cancellation of an in-flight check', async () => {
            const { checker, launcher, check, openUrl } = makeFakes();
            check.mockRejectedValueOnce(new CancellationError());

            await expect(makeAutoCheck(checker, launcher).handleFileEvent(path.join(root, 'topic.dita'), 'add')).resolves.toBeUndefined();
            expect(openUrl).not.toHaveBeenCalled();
        });
    });

    describe('start', () => {
        it('refuses to watch with an invalid configuration', async () => {
            const { checker, launcher } = makeFakes();
            const service = makeAutoCheck(checker, launcher, { CONTENT_CHECK_SSO_TOKEN: 'SECURELY-PROVISIONED' });

            await expect(service.start(new AbortController().signal)).rejects.toBeInstanceOf(ConfigurationError);
        });

        it('returns at once when already cancelled', async () => {
            const { checker, launcher } = makeFakes();
            const controller = new AbortController();
            controller.abort();

            await expect(makeAutoCheck(checker, launcher).start(controller.signal, { directory: root })).resolves.toBeUndefined();
        });

        it('checks a file written while watching and stops on abort', async () => {
            const { checker, launcher, check, openUrl } = makeFakes();
            const controller = new AbortController();
            const watching = makeAutoCheck(checker, launcher).start(controller.signal, { directory: root });

            await new Promise(resolve => setTimeout(resolve, 500));
            const created = path.join(root, 'new-topic.md');
            await fs.promises.writeFile(created, '# New topic', 'utf8');

            await waitFor(() => openUrl.mock.calls.length > 0, 5000);
            controller.abort();
            await watching;

            expect(check).toHaveBeenCalledWith(created, undefined, 'automated', controller.signal, expect.anything());
            expect(openUrl).toHaveBeenCalledWith(SCORECARD);
        }, 10000);
    });
});
