// src/types/errors.ts

/**
 * Tagged classification of everything that can go wrong while checking a file.
 * Retry decisions are made on the kind, never on the error's class.
 */
export type ErrorKind =
    | 'timeout'
    | 'rate_limited'
    | 'server_error'
    | 'network'
    | 'auth'
    | 'client_error'
    | 'invalid_response'
    | 'file_unavailable'
    | 'file_busy'
    | 'file_too_large'
    | 'cancelled'
    | 'unknown';

const TRANSIENT_KINDS: ReadonlySet<ErrorKind> = new Set<ErrorKind>([
    'timeout',
    'rate_limited',
    'server_error',
    'network',
    'file_busy',
]);

export function isTransientKind(kind: ErrorKind): boolean {
    return TRANSIENT_KINDS.has(kind);
}

export interface CheckServiceErrorDetails {
    operation?: string;
    filePath?: string;
    httpStatus?: number;
    cause?: unknown;
}

/**
 * Raised by the remote API client and the file layer.
 */
export class CheckServiceError extends Error {
    public readonly kind: ErrorKind;
    public readonly operation?: string;
    public readonly filePath?: string;
    public readonly httpStatus?: number;

    constructor(kind: ErrorKind, message: string, details: CheckServiceErrorDetails = {}) {
        super(message, details.cause !== undefined ? { cause: details.cause } : undefined);
        this.name = 'CheckServiceError';
        this.kind = kind;
        this.operation = details.operation;
        this.filePath = details.filePath;
        this.httpStatus = details.httpStatus;
    }

    get isTransient(): boolean {
        return isTransientKind(this.kind);
    }
}

/**
 * Raised by every cancellable wait once the shared abort signal fires.
 */
export class CancellationError extends Error {
    public readonly kind: ErrorKind = 'cancelled';

    constructor(message: string = 'Operation was cancelled.') {
        super(message);
        this.name = 'CancellationError';
    }
}

/**
 * Fatal for the whole run: raised before any file is dispatched.
 */
export class ConfigurationError extends Error {
    public readonly validationErrors: string[];

    constructor(validationErrors: string[]) {
        super(`Configuration validation failed:\n${validationErrors.join('\n')}`);
        this.name = 'ConfigurationError';
        this.validationErrors = validationErrors;
    }
}
