// src/utils/retry.utils.ts
import { Logger } from 'pino';
import { RetryAttempt } from '../types/check.types';
import { CancellationError, ErrorKind, isTransientKind } from '../types/errors';
import { classifyError, getErrorMessageAndStack } from './errorUtils';
import { abortableDelay } from './promiseUtils';

export interface RetryPolicy {
    maxRetries: number;
    baseDelayMs: number;
    maxDelayMs: number;
    backoffMultiplier: number;
}

/** Defaults for calls to the remote checking service. */
export const REMOTE_CALL_RETRY_POLICY: Readonly<RetryPolicy> = {
    maxRetries: 3,
    baseDelayMs: 1000,
    maxDelayMs: 30000,
    backoffMultiplier: 2.0,
};

/** Defaults for local file reads. */
export const FILE_OPERATION_RETRY_POLICY: Readonly<RetryPolicy> = {
    maxRetries: 2,
    baseDelayMs: 500,
    maxDelayMs: 5000,
    backoffMultiplier: 1.5,
};

const JITTER_RATIO = 0.1;

export interface RetryOptions {
    operationName: string;
    /** Free-form context for log lines, usually the file path. */
    context?: string;
    policy: Readonly<RetryPolicy>;
    logger: Logger;
    signal?: AbortSignal;
    /** Uniform source in [0, 1); defaults to Math.random. */
    random?: () => number;
    /** Called once per scheduled retry, before the wait. */
    onRetry?: (attempt: RetryAttempt) => void;
    classify?: (error: unknown) => ErrorKind;
}

/**
 * Backoff for the retry that follows a failed `attempt` (0-based).
 * The exponential delay is capped first, jitter of up to 10% of the capped value is
 * added on top, and the total never exceeds `maxDelayMs`.
 */
export function computeBackoffDelay(
    attempt: number,
    policy: Readonly<RetryPolicy>,
    random: () => number = Math.random,
): number {
    const exponential = policy.baseDelayMs * Math.pow(policy.backoffMultiplier, attempt);
    const capped = Math.min(policy.maxDelayMs, exponential);
    const jitter = Math.floor(random() * capped * JITTER_RATIO);
    return Math.min(policy.maxDelayMs, Math.round(capped) + jitter);
}

/**
 * Runs `operation` up to `maxRetries + 1` times. Only transient failures are retried;
 * anything else, or the last transient failure, is rethrown unchanged.
 */
export async function executeWithRetry<T>(
    operation: (attempt: number) => Promise<T>,
    options: RetryOptions,
): Promise<T> {
    const { operationName, context, policy, signal } = options;
    const classify = options.classify ?? classifyError;
    const random = options.random ?? Math.random;
    const logger = options.logger.child({ retryOperation: operationName });

    for (let attempt = 0; ; attempt++) {
        if (signal?.aborted) {
            throw new CancellationError(`${operationName} was cancelled before attempt ${attempt}.`);
        }

        if (attempt > 0) {
            logger.info({ event: 'retry_attempt_start', attempt, maxRetries: policy.maxRetries, context },
                `Retrying ${operationName} (attempt ${attempt}/${policy.maxRetries}).`);
        }

        try {
            const result = await operation(attempt);
            if (attempt > 0) {
                logger.info({ event: 'retry_recovered', attempt, context },
                    `${operationName} succeeded after ${attempt} ${attempt === 1 ? 'retry' : 'retries'}.`);
            }
            return result;
        } catch (error: unknown) {
            const kind = classify(error);
            const { message: errorMessage } = getErrorMessageAndStack(error);

            if (kind === 'cancelled') {
                throw error;
            }

            if (!isTransientKind(kind)) {
                logger.error({ event: 'retry_non_transient_error', attempt, errorKind: kind, context, err: { message: errorMessage } },
                    `Non-transient error in ${operationName}: ${errorMessage}`);
                throw error;
            }

            if (attempt >= policy.maxRetries) {
                logger.error({ event: 'retry_max_attempts_reached', attempt, maxRetries: policy.maxRetries, errorKind: kind, context, err: { message: errorMessage } },
                    `Maximum retries (${policy.maxRetries}) exceeded for ${operationName}.`);
                throw error;
            }

            const nextDelay = computeBackoffDelay(attempt, policy, random);
            options.onRetry?.({ attemptNumber: attempt, lastError: kind, nextDelay });
            logger.warn({ event: 'retry_attempt_failed', attempt, maxRetries: policy.maxRetries, errorKind: kind, delayMs: nextDelay, context, err: { message: errorMessage } },
                `Transient error in ${operationName} (attempt ${attempt}/${policy.maxRetries}). Retrying in ${nextDelay}ms.`);

            await abortableDelay(nextDelay, signal);
        }
    }
}
