export type PunchErrorCode =
    | 'VALIDATION_ERROR'
    | 'NETWORK_ERROR'
    | 'TIMEOUT'
    | 'SERVICE_FAULT'
    | 'STORAGE_ERROR';

/**
 * Base class for every failure the punch pipeline distinguishes.
 */
export class PunchError extends Error {
    readonly code: PunchErrorCode;

    constructor(code: PunchErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

/** Empty or malformed identifier. Rejected before any remote call. */
export class ValidationError extends PunchError {
    constructor(message: string) {
        super('VALIDATION_ERROR', message);
    }
}

/** Connection, DNS or transport failure. Transient. */
export class NetworkError extends PunchError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('NETWORK_ERROR', message, options);
    }
}

/** Remote call exceeded the configured timeout. Transient. */
export class TimeoutError extends PunchError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('TIMEOUT', message, options);
    }
}

/**
 * Well-formed remote rejection based on business rules. Terminal, never retried.
 */
export class ServiceFault extends PunchError {
    readonly exceptionCode?: number;
    readonly systemErrorCode?: string;

    constructor(message: string, details: { exceptionCode?: number; systemErrorCode?: string } = {}) {
        super('SERVICE_FAULT', message);
        this.exceptionCode = details.exceptionCode;
        this.systemErrorCode = details.systemErrorCode;
    }
}

/** The durable queue could not be written or read. */
export class StorageError extends PunchError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('STORAGE_ERROR', message, options);
    }
}

export function isTransientError(error: unknown): error is NetworkError | TimeoutError {
    return error instanceof NetworkError || error instanceof TimeoutError;
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
