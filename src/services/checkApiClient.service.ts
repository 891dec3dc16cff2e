// src/services/checkApiClient.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { Logger } from 'pino';
import { ConfigService } from '../config/config.service';
import { LoggingService } from './logging.service';
import {
    DEFAULT_CONTENT_FORMAT,
    HEADER_ACCESS_TOKEN,
    HEADER_CLIENT_SIGNATURE,
    HEADER_SSO_TOKEN,
    HEADER_USERNAME,
    SIGN_IN_PATH,
    SUBMIT_CHECK_PATH,
} from '../config/constants';
import { CheckRequest, ICheckApiClient, RemoteCheckResult } from '../types/check.types';
import { CancellationError, CheckServiceError, ErrorKind } from '../types/errors';
import { abortableDelay } from '../utils/promiseUtils';

// --- Response Schemas ---
const signInResponseSchema = z.object({
    data: z.object({ accessToken: z.string().min(1) }),
});

const submitCheckResponseSchema = z.object({
    data: z.object({ id: z.string().min(1) }),
    links: z.object({ result: z.string().url() }),
});

const checkProgressSchema = z.object({
    progress: z.object({
        percent: z.number().optional(),
        // seconds
        retryAfter: z.number().nonnegative(),
    }),
});

const checkResultSchema = z.object({
    data: z.object({
        id: z.string(),
        quality: z.object({ score: z.number(), status: z.string() }),
        reports: z.record(z.object({ link: z.string() })).default({}),
    }),
});

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

function kindForStatus(status: number): ErrorKind {
    if (status === 408) return 'timeout';
    if (status === 429) return 'rate_limited';
    if (status >= 500) return 'server_error';
    if (status === 401 || status === 403) return 'auth';
    return 'client_error';
}

/**
 * Translates an axios failure into the error taxonomy used by the retry policy.
 * Values that are not axios errors are returned unchanged.
 */
export function toCheckServiceError(error: unknown, operation: string): unknown {
    if (axios.isCancel(error)) {
        return new CancellationError(`${operation} was cancelled.`);
    }
    if (!axios.isAxiosError(error)) {
        return error;
    }

    const status = error.response?.status;
    if (status !== undefined) {
        return new CheckServiceError(kindForStatus(status), `${operation} failed with HTTP ${status}.`,
            { operation, httpStatus: status, cause: error });
    }

    const kind: ErrorKind = error.code && TIMEOUT_CODES.has(error.code) ? 'timeout' : 'network';
    return new CheckServiceError(kind, `${operation} failed: ${error.message}`, { operation, cause: error });
}

function hasSameOrigin(link: string, baseUrl: string): boolean {
    try {
        return new URL(link).origin === new URL(baseUrl).origin;
    } catch {
        return false;
    }
}

function parseResponse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, payload: unknown, operation: string): T {
    const result = schema.safeParse(payload);
    if (!result.success) {
        throw new CheckServiceError('invalid_response',
            `${operation} returned an unexpected response: ${result.error.issues.map(issue => issue.message).join('; ')}`,
            { operation });
    }
    return result.data;
}

/**
 * HTTP client for the content checking platform. Stateless apart from the axios
 * instance, so one instance is safely shared by every concurrent check.
 */
@singleton()
export class CheckApiClient implements ICheckApiClient {
    private readonly http: AxiosInstance;
    private readonly serviceLogger: Logger;

    constructor(
        @inject(ConfigService) private configService: ConfigService,
        @inject(LoggingService) private loggingService: LoggingService,
    ) {
        const { remoteUrl, requestTimeoutMs, clientSignature } = this.configService.checkConfiguration;
        this.serviceLogger = this.loggingService.getLogger({ service: 'CheckApiClient' });
        this.http = axios.create({
            baseURL: remoteUrl,
            timeout: requestTimeoutMs,
            headers: {
                'Accept': 'application/json',
                [HEADER_CLIENT_SIGNATURE]: clientSignature,
            },
        });
    }

    /**
     * Exchanges the configured SSO token for an access token.
     * @param signal - Aborts the request with a {@link CancellationError}.
     * @returns The access token for subsequent calls.
     */
    async signIn(signal?: AbortSignal): Promise<string> {
        const { username, apiToken } = this.configService.checkConfiguration;
        const logger = this.serviceLogger.child({ serviceMethod: 'CheckApiClient.signIn' });
        logger.debug({ event: 'sign_in_start', username }, 'Signing in with SSO.');

        try {
            const response = await this.http.post<unknown>(SIGN_IN_PATH, undefined, {
                headers: {
                    [HEADER_USERNAME]: username,
                    [HEADER_SSO_TOKEN]: apiToken,
                },
                signal,
            });
            const { data } = parseResponse(signInResponseSchema, response.data, 'signIn');
            logger.debug({ event: 'sign_in_success' }, 'Signed in.');
            return data.accessToken;
        } catch (error: unknown) {
            throw toCheckServiceError(error, 'signIn');
        }
    }

    /**
     * Submits the content and polls the result link until the platform reports a result,
     * honouring its `retryAfter` hint. Gives up with a `timeout` error after the
     * configured poll timeout.
     *
     * @param accessToken - Token returned by {@link signIn}.
     * @param request - File content and check options.
     * @param signal - Aborts the submission, the polls and the waits between them.
     * @returns The quality score and report links of the finished check.
     */
    async submitCheck(accessToken: string, request: CheckRequest, signal?: AbortSignal): Promise<RemoteCheckResult> {
        const logger = this.serviceLogger.child({ serviceMethod: 'CheckApiClient.submitCheck', filePath: request.filePath });
        const authHeaders = { [HEADER_ACCESS_TOKEN]: accessToken };

        let resultLink: string;
        let checkId: string;
        try {
            const response = await this.http.post<unknown>(SUBMIT_CHECK_PATH, {
                content: request.content,
                checkOptions: {
                    checkType: request.checkMode,
                    contentFormat: DEFAULT_CONTENT_FORMAT,
                    batchId: request.checkMode === 'batch' ? request.batchId : undefined,
                },
                document: { reference: request.filePath },
            }, { headers: authHeaders, signal });
            const submitted = parseResponse(submitCheckResponseSchema, response.data, 'submitCheck');
            checkId = submitted.data.id;
            resultLink = submitted.links.result;
            // The access token is only ever sent back to the configured service
            if (!hasSameOrigin(resultLink, this.configService.checkConfiguration.remoteUrl)) {
                throw new CheckServiceError('invalid_response',
                    `submitCheck returned a result link outside the configured service: ${resultLink}`,
                    { operation: 'submitCheck', filePath: request.filePath });
            }
        } catch (error: unknown) {
            throw toCheckServiceError(error, 'submitCheck');
        }
        logger.info({ event: 'check_submitted', checkId }, `Check ${checkId} submitted.`);

        const { pollIntervalMs, pollTimeoutMs } = this.configService.checkConfiguration;
        const deadline = Date.now() + pollTimeoutMs;

        for (;;) {
            let payload: unknown;
            try {
                const response = await this.http.get<unknown>(resultLink, { headers: authHeaders, signal });
                payload = response.data;
            } catch (error: unknown) {
                throw toCheckServiceError(error, 'pollCheckResult');
            }

            const finished = checkResultSchema.safeParse(payload);
            if (finished.success) {
                const { id, quality, reports } = finished.data.data;
                const links: Record<string, string> = {};
                for (const [name, report] of Object.entries(reports)) {
                    links[name] = report.link;
                }
                logger.info({ event: 'check_completed', checkId: id, qualityScore: quality.score, qualityStatus: quality.status },
                    `Check ${id} completed with score ${quality.score}.`);
                return { id, qualityScore: quality.score, qualityStatus: quality.status, reports: links };
            }

            const { progress } = parseResponse(checkProgressSchema, payload, 'pollCheckResult');
            const waitMs = progress.retryAfter > 0 ? progress.retryAfter * 1000 : pollIntervalMs;
            if (Date.now() + waitMs > deadline) {
                throw new CheckServiceError('timeout', `Check ${checkId} did not complete within ${pollTimeoutMs}ms.`,
                    { operation: 'pollCheckResult', filePath: request.filePath });
            }
            logger.debug({ event: 'check_in_progress', checkId, percent: progress.percent, waitMs }, 'Check still running.');
            await abortableDelay(waitMs, signal);
        }
    }
}
