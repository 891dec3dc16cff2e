// src/utils/promiseUtils.ts
import { setTimeout as delay } from 'node:timers/promises';
import { CancellationError } from '../types/errors';
import { isCancellation } from './errorUtils';

/**
 * Suspends the calling task for `ms` without blocking other tasks.
 * Rejects with {@link CancellationError} as soon as `signal` aborts.
 */
export async function abortableDelay(ms: number, signal?: AbortSignal): Promise<void> {
    throwIfAborted(signal);
    if (ms <= 0) return;
    try {
        await delay(ms, undefined, { signal });
    } catch (error: unknown) {
        if (isCancellation(error)) {
            throw new CancellationError(`Wait of ${ms}ms was cancelled.`);
        }
        throw error;
    }
}

export function throwIfAborted(signal?: AbortSignal): void {
    if (signal?.aborted) {
        throw new CancellationError();
    }
}
