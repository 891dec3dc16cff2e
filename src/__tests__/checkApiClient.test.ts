// src/__tests__/checkApiClient.test.ts
import http from 'http';
import { AddressInfo } from 'net';
import { CheckApiClient } from '../services/checkApiClient.service';
import { CheckRequest } from '../types/check.types';
import { CancellationError, ErrorKind } from '../types/errors';
import { makeServices } from './helpers/testServices';

interface RecordedRequest {
    method: string;
    url: string;
    headers: http.IncomingHttpHeaders;
    body: unknown;
}

interface Reply {
    status: number;
    body?: unknown;
}

type Route = (request: RecordedRequest, baseUrl: string) => Reply | undefined;

/** In-process stand-in for the checking platform. */
class FakeCheckServer {
    public readonly requests: RecordedRequest[] = [];
    private readonly server: http.Server;
    private route: Route = () => ({ status: 404 });

    constructor() {
        this.server = http.createServer((req, res) => {
            const chunks: Buffer[] = [];
            req.on('data', (chunk: Buffer) => chunks.push(chunk));
            req.on('end', () => {
                const raw = Buffer.concat(chunks).toString('utf8');
                const recorded: RecordedRequest = {
                    method: req.method ?? '',
                    url: req.url ?? '',
                    headers: req.headers,
                    body: raw ? JSON.parse(raw) : undefined,
                };
                this.requests.push(recorded);
                const reply = this.route(recorded, this.baseUrl);
                // No reply leaves the request hanging, for timeout tests
                if (!reply) return;
                res.writeHead(reply.status, { 'Content-Type': 'application/json' });
                res.end(reply.body === undefined ? '' : JSON.stringify(reply.body));
            });
        });
    }

    get baseUrl(): string {
        const address = this.server.address();
        if (address === null || typeof address === 'string') {
            throw new Error('Server is not listening on a TCP port.');
        }
        const { port }: AddressInfo = address;
        return `http://127.0.0.1:${port}`;
    }

    respondWith(route: Route): void {
        this.route = route;
    }

    listen(): Promise<void> {
        return new Promise(resolve => this.server.listen(0, '127.0.0.1', () => resolve()));
    }

    close(): Promise<void> {
        this.server.closeAllConnections();
        return new Promise((resolve, reject) => this.server.close(error => (error ? reject(error) : resolve())));
    }
}

const signedIn: Reply = { status: 201, body: { data: { accessToken: 'access-token' } } };

function submitted(baseUrl: string): Reply {
    return {
        status: 202,
        body: { data: { id: 'check-7' }, links: { result: `${baseUrl}/api/v1/checking/checks/check-7/result` } },
    };
}

const finishedResult: Reply = {
    status: 200,
    body: {
        data: {
            id: 'check-7',
            quality: { score: 91, status: 'green' },
            reports: {
                scorecard: { link: 'https://reports.example.test/scorecard/7' },
                contentAnalysisDashboard: { link: 'https://reports.example.test/dashboard/b1' },
            },
        },
    },
};

const batchRequest: CheckRequest = { filePath: 'docs/guide.md', batchId: 'batch-1', checkMode: 'batch', content: '# Guide' };

describe('CheckApiClient', () => {
    let server: FakeCheckServer;

    beforeEach(async () => {
        server = new FakeCheckServer();
        await server.listen();
    });

    afterEach(async () => {
        await server.close();
    });

    function makeClient(overrides: Record<string, string> = {}): CheckApiClient {
        const { config, logging } = makeServices({
            CONTENT_CHECK_URL: server.baseUrl,
            CHECK_POLL_INTERVAL_MS: '10',
            ...overrides,
        });
        return new CheckApiClient(config, logging);
    }

    describe('signIn', () => {
        it('sends the SSO credentials and returns the access token', async () => {
            server.respondWith(() => signedIn);

            await expect(makeClient().signIn()).resolves.toBe('access-token');

            expect(server.requests).toHaveLength(1);
            const [request] = server.requests;
            expect(request.method).toBe('POST');
            expect(request.url).toBe('/api/v1/auth/sign-ins');
            expect(request.headers['x-content-check-username']).toBe('test-user');
            expect(request.headers['x-content-check-sso-token']).toBe('test-secret');
            expect(request.headers['x-content-check-client']).toBe('test-signature');
        });

        const statusKinds: Array<[number, ErrorKind]> = [
            [429, 'rate_limited'],
            [503, 'server_error'],
            [408, 'timeout'],
            [401, 'auth'],
            [403, 'auth'],
            [400, 'client_error'],
        ];

        it.each(statusKinds)('maps HTTP %i to %s', async (status, kind) => {
            server.respondWith(() => ({ status, body: { message: 'no' } }));

            await expect(makeClient().signIn()).rejects.toMatchObject({ kind, httpStatus: status, operation: 'signIn' });
        });

        it('rejects a response without an access token', async () => {
            server.respondWith(() => ({ status: 201, body: { data: {} } }));

            await expect(makeClient().signIn()).rejects.toMatchObject({ kind: 'invalid_response' });
        });

        it('reports a refused connection as a network failure', async () => {
            const client = makeClient();
            await server.close();
            // Reopen on a fresh port for afterEach; the client still targets the closed one
            server = new FakeCheckServer();
            await server.listen();

            await expect(client.signIn()).rejects.toMatchObject({ kind: 'network' });
        });

        it('reports a slow response as a timeout', async () => {
            server.respondWith(() => undefined);

            await expect(makeClient({ REQUEST_TIMEOUT_MS: '50' }).signIn()).rejects.toMatchObject({ kind: 'timeout' });
        });

        it('turns an aborted request into a CancellationError', async () => {
            server.respondWith(() => signedIn);
            const controller = new AbortController();
            controller.abort();

            await expect(makeClient().signIn(controller.signal)).rejects.toBeInstanceOf(CancellationError);
        });
    });

    describe('submitCheck', () => {
        it('submits the content and polls until the result is ready', async () => {
            let polls = 0;
            server.respondWith((request, baseUrl) => {
                if (request.method === 'POST') return submitted(baseUrl);
                polls++;
                return polls === 1 ? { status: 200, body: { progress: { percent: 50, retryAfter: 0 } } } : finishedResult;
            });

            const result = await makeClient().submitCheck('access-token', batchRequest);

            expect(result).toEqual({
                id: 'check-7',
                qualityScore: 91,
                qualityStatus: 'green',
                reports: {
                    scorecard: 'https://reports.example.test/scorecard/7',
                    contentAnalysisDashboard: 'https://reports.example.test/dashboard/b1',
                },
            });
            expect(server.requests.map(request => `${request.method} ${request.url}`)).toEqual([
                'POST /api/v1/checking/checks',
                'GET /api/v1/checking/checks/check-7/result',
                'GET /api/v1/checking/checks/check-7/result',
            ]);
            expect(server.requests.every(request => request.headers['x-content-check-auth'] === 'access-token')).toBe(true);
        });

        it('sends the batch id only for batch checks', async () => {
            server.respondWith((request, baseUrl) => (request.method === 'POST' ? submitted(baseUrl) : finishedResult));
            const client = makeClient();

            await client.submitCheck('access-token', batchRequest);
            await client.submitCheck('access-token', { filePath: 'docs/guide.md', batchId: 'batch-1', checkMode: 'automated', content: '# Guide' });

            const bodies = server.requests.filter(request => request.method === 'POST').map(request => request.body);
            expect(bodies).toEqual([
                {
                    content: '# Guide',
                    checkOptions: { checkType: 'batch', contentFormat: 'AUTO', batchId: 'batch-1' },
                    document: { reference: 'docs/guide.md' },
                },
                {
                    content: '# Guide',
                    checkOptions: { checkType: 'automated', contentFormat: 'AUTO' },
                    document: { reference: 'docs/guide.md' },
                },
            ]);
        });

        it('gives up polling with a timeout once the deadline would pass', async () => {
            server.respondWith((request, baseUrl) => (request.method === 'POST'
                ? submitted(baseUrl)
                : { status: 200, body: { progress: { percent: 10, retryAfter: 1 } } }));

            await expect(makeClient({ CHECK_POLL_TIMEOUT_MS: '50' }).submitCheck('access-token', batchRequest)).rejects.toMatchObject({
                kind: 'timeout',
                message: 'Check check-7 did not complete within 50ms.',
            });
        });

        it('refuses to poll a result link on another host', async () => {
            server.respondWith(() => ({
                status: 202,
                body: { data: { id: 'check-7' }, links: { result: 'https://elsewhere.example.test/api/v1/checking/checks/check-7/result' } },
            }));

            await expect(makeClient().submitCheck('access-token', batchRequest)).rejects.toMatchObject({
                kind: 'invalid_response',
                operation: 'submitCheck',
                message: 'submitCheck returned a result link outside the configured service: https://elsewhere.example.test/api/v1/checking/checks/check-7/result',
            });
            expect(server.requests.map(request => request.method)).toEqual(['POST']);
        });

        it('maps a failed submission by status', async () => {
            server.respondWith(() => ({ status: 502 }));

            await expect(makeClient().submitCheck('access-token', batchRequest)).rejects.toMatchObject({
                kind: 'server_error',
                operation: 'submitCheck',
            });
        });

        it('rejects a poll response that is neither progress nor result', async () => {
            server.respondWith((request, baseUrl) => (request.method === 'POST' ? submitted(baseUrl) : { status: 200, body: { status: 'odd' } }));

            await expect(makeClient().submitCheck('access-token', batchRequest)).rejects.toMatchObject({ kind: 'invalid_response' });
        });
    });
});
