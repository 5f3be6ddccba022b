export type ExceptionSeverity = 'ERROR' | 'WARNING';

interface ExceptionMessage {
    message: string;
    severity: ExceptionSeverity;
}

const DEFAULT_EXCEPTION: ExceptionMessage = {
    message: 'Not Authorized. No punch recorded.',
    severity: 'ERROR',
};

// Business-rule identifiers returned as PunchException
const PUNCH_EXCEPTIONS: Record<number, ExceptionMessage> = {
    1: { message: 'Shift not yet started. No punch recorded.', severity: 'WARNING' },
    2: { message: 'Not Authorized. No punch recorded.', severity: 'ERROR' },
    3: { message: 'Shift has finished. No punch recorded.', severity: 'WARNING' },
};

// SystemErrorCode values reported by the service itself
const SYSTEM_ERRORS: Record<string, string> = {
    '-1': 'Connection not secure',
    '-2': 'Input parameters not found',
    '-3': 'Client not authorized',
    '-4': 'Invalid input parameter format',
    '-5': 'Too few input parameters',
    '-6': 'Invalid date',
};

export function describePunchException(exceptionCode: number | null | undefined): ExceptionMessage {
    if (exceptionCode === null || exceptionCode === undefined) {
        return DEFAULT_EXCEPTION;
    }
    return PUNCH_EXCEPTIONS[exceptionCode] ?? DEFAULT_EXCEPTION;
}

export function describeSystemError(systemErrorCode: string): string | undefined {
    return SYSTEM_ERRORS[systemErrorCode];
}
