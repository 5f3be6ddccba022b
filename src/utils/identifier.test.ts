import { describe, expect, it } from 'vitest';
import {
    buildPhotoFileName,
    buildSwipeInput,
    formatPhotoTimestamp,
    normalizeEmployeeId,
    validateEmployeeId,
} from './identifier';
import { ValidationError } from './errors';

describe('normalizeEmployeeId', () => {
    it('strips a two-letter barcode prefix', () => {
        expect(normalizeEmployeeId('TE00700')).toBe('00700');
        expect(normalizeEmployeeId('ab123')).toBe('123');
    });

    it('leaves numeric ids unchanged', () => {
        expect(normalizeEmployeeId('12345')).toBe('12345');
    });

    it('leaves ids shorter than two characters unchanged', () => {
        expect(normalizeEmployeeId('A')).toBe('A');
        expect(normalizeEmployeeId('')).toBe('');
    });

    it('only strips when both leading characters are letters', () => {
        expect(normalizeEmployeeId('A1234')).toBe('A1234');
        expect(normalizeEmployeeId('1AB23')).toBe('1AB23');
        expect(normalizeEmployeeId('-X123')).toBe('-X123');
    });

    it('returns an empty id for a bare two-letter input', () => {
        expect(normalizeEmployeeId('TE')).toBe('');
    });
});

describe('validateEmployeeId', () => {
    it('trims surrounding whitespace', () => {
        expect(validateEmployeeId('  TE00700\n')).toBe('TE00700');
    });

    it('rejects empty input', () => {
        expect(() => validateEmployeeId('   ')).toThrow(ValidationError);
        expect(() => validateEmployeeId('')).toThrow('Employee ID is required');
    });

    it('rejects characters outside printable ASCII', () => {
        expect(() => validateEmployeeId('12é45')).toThrow('Employee ID contains unsupported characters');
    });
});

describe('photo and swipe formatting', () => {
    const punchTime = new Date('2024-03-05T07:08:09.123Z');

    it('formats the photo timestamp in UTC', () => {
        expect(formatPhotoTimestamp(punchTime)).toBe('20240305_070809');
    });

    it('builds the photo file name from the image id', () => {
        expect(buildPhotoFileName('00700', punchTime)).toBe('00700_20240305_070809.jpg');
    });

    it('packs the swipe input with the full scanned id', () => {
        expect(buildSwipeInput('TE00700', punchTime)).toBe('TE00700|*|2024-03-05T07:08:09.123Z');
    });

    it('appends a department override', () => {
        expect(buildSwipeInput('12345', punchTime, 12)).toBe('12345|*|2024-03-05T07:08:09.123Z|*|12');
    });
});
