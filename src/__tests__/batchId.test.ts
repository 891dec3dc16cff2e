// src/__tests__/batchId.test.ts
import { generateBatchId, resolveBatchId } from '../utils/batchId';

describe('generateBatchId', () => {
    it('formats the UTC timestamp', () => {
        expect(generateBatchId(new Date(Date.UTC(2024, 0, 5, 7, 8, 9)))).toBe('batch-20240105-070809');
        expect(generateBatchId(new Date(Date.UTC(2025, 11, 31, 23, 59, 58)))).toBe('batch-20251231-235958');
    });

    it('matches batch-YYYYMMDD-HHMMSS for the current time', () => {
        expect(generateBatchId()).toMatch(/^batch-\d{8}-\d{6}$/);
    });
});

describe('resolveBatchId', () => {
    const now = new Date(Date.UTC(2024, 5, 1, 12, 0, 0));

    it('keeps caller input, trimmed', () => {
        expect(resolveBatchId('  release-42 ', now)).toBe('release-42');
    });

    it('falls back to a timestamp id when input is missing or blank', () => {
        expect(resolveBatchId(undefined, now)).toBe('batch-20240601-120000');
        expect(resolveBatchId('   ', now)).toBe('batch-20240601-120000');
        expect(resolveBatchId('')).toMatch(/^batch-\d{8}-\d{6}$/);
    });
});
