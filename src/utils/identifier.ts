import { ValidationError } from './errors';

const PRINTABLE_ASCII = /^[\x20-\x7E]+$/;
const LETTER = /^[A-Za-z]$/;

/**
 * Strip the two-letter device/location prefix that barcode input carries.
 * Only the image correlation id is stripped; the swipe keeps the full string.
 */
export function normalizeEmployeeId(rawId: string): string {
    if (rawId.length >= 2 && LETTER.test(rawId[0]) && LETTER.test(rawId[1])) {
        return rawId.slice(2);
    }
    return rawId;
}

/**
 * Trim scanned/typed input and reject anything that cannot be sent.
 */
export function validateEmployeeId(raw: string): string {
    const trimmed = raw.trim();
    if (trimmed.length === 0) {
        throw new ValidationError('Employee ID is required');
    }
    if (!PRINTABLE_ASCII.test(trimmed)) {
        throw new ValidationError('Employee ID contains unsupported characters');
    }
    return trimmed;
}

function pad(value: number): string {
    return value.toString().padStart(2, '0');
}

/**
 * YYYYMMDD_HHMMSS in UTC
 */
export function formatPhotoTimestamp(date: Date): string {
    const day = `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
    const time = `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
    return `${day}_${time}`;
}

export function buildPhotoFileName(imageEmployeeId: string, punchTimestamp: Date): string {
    return `${imageEmployeeId}_${formatPhotoTimestamp(punchTimestamp)}.jpg`;
}

export function buildSwipeInput(rawEmployeeId: string, punchTimestamp: Date, departmentOverride?: number): string {
    let swipeInput = `${rawEmployeeId}|*|${punchTimestamp.toISOString()}`;
    if (departmentOverride !== undefined) {
        swipeInput += `|*|${departmentOverride}`;
    }
    return swipeInput;
}
