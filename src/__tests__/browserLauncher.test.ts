// src/__tests__/browserLauncher.test.ts
import { spawn } from 'child_process';
import { BrowserLauncherService, openerCommand } from '../services/browserLauncher.service';
import { makeServices } from './helpers/testServices';

jest.mock('child_process', () => ({
    ...jest.requireActual<typeof import('child_process')>('child_process'),
    spawn: jest.fn(),
}));

const { ChildProcess } = jest.requireActual<typeof import('child_process')>('child_process');
const spawnMock = jest.mocked(spawn);

const REPORT = 'https://reports.example.test/scorecard/1';

function makeLauncher(openBrowser: 'true' | 'false'): BrowserLauncherService {
    const { config, logging } = makeServices({ OPEN_BROWSER: openBrowser });
    return new BrowserLauncherService(config, logging);
}

describe('openerCommand', () => {
    it('uses the platform opener', () => {
        expect(openerCommand(REPORT, 'darwin')).toEqual(['open', [REPORT]]);
        expect(openerCommand(REPORT, 'win32')).toEqual(['cmd', ['/c', 'start', '', REPORT]]);
        expect(openerCommand(REPORT, 'linux')).toEqual(['xdg-open', [REPORT]]);
    });
});

describe('BrowserLauncherService.openUrl', () => {
    beforeEach(() => {
        spawnMock.mockImplementation(() => new ChildProcess());
    });

    it('spawns a detached opener for an https link', () => {
        expect(makeLauncher('true').openUrl(REPORT)).toBe(true);

        expect(spawnMock).toHaveBeenCalledTimes(1);
        const [command, args] = openerCommand(REPORT);
        expect(spawnMock).toHaveBeenCalledWith(command, args, { detached: true, stdio: 'ignore' });
    });

    it.each([undefined, '', 'http://reports.example.test/1', 'javascript:alert(1)'])('refuses %p', (url) => {
        expect(makeLauncher('true').openUrl(url)).toBe(false);
        expect(spawnMock).not.toHaveBeenCalled();
    });

    it('only logs the link when opening is disabled', () => {
        expect(makeLauncher('false').openUrl(REPORT)).toBe(false);
        expect(spawnMock).not.toHaveBeenCalled();
    });

    it('reports failure when the opener cannot be spawned', () => {
        spawnMock.mockImplementation(() => {
            throw new Error('spawn EACCES');
        });

        expect(makeLauncher('true').openUrl(REPORT)).toBe(false);
    });

    it('survives an asynchronous spawn error', () => {
        const child = new ChildProcess();
        spawnMock.mockImplementation(() => child);

        expect(makeLauncher('true').openUrl(REPORT)).toBe(true);
        expect(() => child.emit('error', new Error('spawn xdg-open ENOENT'))).not.toThrow();
    });
});
