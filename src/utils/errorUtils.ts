// src/utils/errorUtils.ts
import { CancellationError, CheckServiceError, ErrorKind } from '../types/errors';

/**
 * Normalises any thrown value into a message and an optional stack for logging.
 */
export function getErrorMessageAndStack(error: unknown): { message: string; stack?: string } {
    if (error instanceof Error) {
        return { message: error.message, stack: error.stack };
    }
    if (typeof error === 'string') {
        return { message: error };
    }
    try {
        return { message: JSON.stringify(error) ?? String(error) };
    } catch {
        return { message: String(error) };
    }
}

const NETWORK_TIMEOUT_CODES = new Set(['ETIMEDOUT', 'ESOCKETTIMEDOUT', 'ECONNABORTED']);
const NETWORK_FAILURE_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'EPIPE', 'EAI_AGAIN', 'ENETUNREACH', 'EHOSTUNREACH']);
const FILE_UNAVAILABLE_CODES = new Set(['ENOENT', 'EACCES', 'EPERM', 'EISDIR', 'ENOTDIR']);
const FILE_BUSY_CODES = new Set(['EBUSY', 'EMFILE', 'ENFILE', 'EAGAIN']);

function readErrorCode(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'code' in error) {
        const { code } = error;
        return typeof code === 'string' ? code : undefined;
    }
    return undefined;
}

/**
 * Maps a thrown value to its {@link ErrorKind}.
 */
export function classifyError(error: unknown): ErrorKind {
    if (error instanceof CheckServiceError || error instanceof CancellationError) {
        return error.kind;
    }
    if (error instanceof Error && (error.name === 'AbortError' || error.name === 'CanceledError')) {
        return 'cancelled';
    }

    const code = readErrorCode(error);
    if (!code) return 'unknown';
    if (code === 'ABORT_ERR' || code === 'ERR_CANCELED') return 'cancelled';
    if (NETWORK_TIMEOUT_CODES.has(code)) return 'timeout';
    if (NETWORK_FAILURE_CODES.has(code)) return 'network';
    if (FILE_UNAVAILABLE_CODES.has(code)) return 'file_unavailable';
    if (FILE_BUSY_CODES.has(code)) return 'file_busy';
    return 'unknown';
}

export function isCancellation(error: unknown): boolean {
    return classifyError(error) === 'cancelled';
}
