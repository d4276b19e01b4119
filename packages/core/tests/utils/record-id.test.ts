import { describe, it, expect } from 'vitest';
import { Decimal } from 'decimal.js';
import { generateRecordId, resolveCollisions, buildCollisionMap } from '../../src/utils/record-id.js';

describe('generateRecordId', () => {
    it('generates 16-character hex string', () => {
        const id = generateRecordId('ledger', '2025-01-10', 'INVOICE 1042', new Decimal('500.00'));
        expect(id).toHaveLength(16);
        expect(id).toMatch(/^[0-9a-f]{16}$/);
    });

    it('is deterministic - same input produces same output', () => {
        const id1 = generateRecordId('bank', '2025-01-12', 'ACH DEPOSIT', new Decimal('500.00'));
        const id2 = generateRecordId('bank', '2025-01-12', 'ACH DEPOSIT', new Decimal('500.00'));
        expect(id1).toBe(id2);
    });

    it('produces different IDs for different origins', () => {
        const id1 = generateRecordId('ledger', '2025-01-10', 'SAME', new Decimal('500.00'));
        const id2 = generateRecordId('bank', '2025-01-10', 'SAME', new Decimal('500.00'));
        expect(id1).not.toBe(id2);
    });

    it('produces different IDs for different dates', () => {
        const id1 = generateRecordId('bank', '2025-01-12', 'ACH DEPOSIT', new Decimal('500.00'));
        const id2 = generateRecordId('bank', '2025-01-13', 'ACH DEPOSIT', new Decimal('500.00'));
        expect(id1).not.toBe(id2);
    });

    it('produces different IDs for different signs', () => {
        const id1 = generateRecordId('bank', '2025-01-12', 'ACH', new Decimal('500.00'));
        const id2 = generateRecordId('bank', '2025-01-12', 'ACH', new Decimal('-500.00'));
        expect(id1).not.toBe(id2);
    });

    it('normalizes trailing zeros in amount', () => {
        const id1 = generateRecordId('ledger', '2025-01-10', 'TEST', new Decimal('23.45'));
        const id2 = generateRecordId('ledger', '2025-01-10', 'TEST', new Decimal('23.450'));
        expect(id1).toBe(id2);
    });
});

describe('resolveCollisions', () => {
    const make = (id: string) => ({ record_id: id, description: 'TEST' });

    it('returns new array (does not mutate input)', () => {
        const original = [make('aaaa111111111111')];
        const result = resolveCollisions(original);
        expect(result).not.toBe(original);
        expect(result[0]).not.toBe(original[0]);
    });

    it('leaves unique IDs unchanged', () => {
        const result = resolveCollisions([make('aaaa111111111111'), make('bbbb222222222222')]);
        expect(result.map(r => r.record_id)).toEqual(['aaaa111111111111', 'bbbb222222222222']);
    });

    it('handles mixed unique and duplicate IDs', () => {
        const result = resolveCollisions([
            make('aaaa111111111111'),
            make('bbbb222222222222'),
            make('aaaa111111111111'),
            make('aaaa111111111111'),
        ]);

        expect(result.map(r => r.record_id)).toEqual([
            'aaaa111111111111',
            'bbbb222222222222',
            'aaaa111111111111-02',
            'aaaa111111111111-03',
        ]);
    });

    it('widens the suffix past 99 copies', () => {
        const result = resolveCollisions(Array.from({ length: 101 }, () => make('aaaa111111111111')));

        expect(result[98].record_id).toBe('aaaa111111111111-99');
        expect(result[99].record_id).toBe('aaaa111111111111-100');
        expect(result[100].record_id).toBe('aaaa111111111111-101');
    });

    it('preserves the other fields', () => {
        const result = resolveCollisions([make('aaaa111111111111'), { record_id: 'aaaa111111111111', description: 'SECOND' }]);
        expect(result[1]).toEqual({ record_id: 'aaaa111111111111-02', description: 'SECOND' });
    });
});

describe('buildCollisionMap', () => {
    it('returns empty map for no collisions', () => {
        const map = buildCollisionMap([{ record_id: 'aaaa111111111111' }, { record_id: 'bbbb222222222222' }]);
        expect(map).toEqual({});
    });

    it('includes collision counts for duplicates', () => {
        const map = buildCollisionMap([
            { record_id: 'aaaa111111111111' },
            { record_id: 'aaaa111111111111-02' },
            { record_id: 'aaaa111111111111-03' },
            { record_id: 'bbbb222222222222' },
        ]);
        expect(map).toEqual({ aaaa111111111111: 3 });
    });
});
