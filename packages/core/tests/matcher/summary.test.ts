import { describe, it, expect } from 'vitest';
import type { MatchOutcome } from '@ledger-recon/shared';
import { createRecords } from '../../src/matcher/record.js';
import { summarizeOutcomes, verifyPartition } from '../../src/matcher/summary.js';

const ledger = createRecords([
    { date: '2025-01-10', description: 'L1', signed_amount: '100.00' },
    { date: '2025-01-10', description: 'L2', signed_amount: '-200.00' },
], 'ledger');
const bank = createRecords([
    { date: '2025-01-10', description: 'B1', signed_amount: '100.00' },
    { date: '2025-01-11', description: 'B2', signed_amount: '195.00' },
], 'bank');

const sound: MatchOutcome[] = [
    { quality: 'exact_match', ledger_record: ledger[0], bank_record: bank[0], difference: '0.00' },
    { quality: 'partial_match_fee', ledger_record: ledger[1], bank_record: bank[1], difference: '-5.00' },
];

describe('summarizeOutcomes', () => {
    it('counts outcomes and totals matched amounts', () => {
        expect(summarizeOutcomes(sound, 2, 2)).toEqual({
            ledger_records: 2,
            bank_records: 2,
            exact_matches: 1,
            fee_matches: 1,
            unmatched_bank: 0,
            unmatched_ledger: 0,
            matched_ledger_total: '300.00',
            matched_bank_total: '295.00',
            total_fees: '5.00',
        });
    });

    it('leaves residuals out of the totals', () => {
        const stats = summarizeOutcomes([
            { quality: 'unmatched_bank', bank_record: bank[0] },
            { quality: 'unmatched_ledger', ledger_record: ledger[0] },
        ], 1, 1);

        expect(stats.unmatched_bank).toBe(1);
        expect(stats.unmatched_ledger).toBe(1);
        expect(stats.matched_ledger_total).toBe('0.00');
        expect(stats.total_fees).toBe('0.00');
    });
});

describe('verifyPartition', () => {
    it('finds nothing wrong with a sound partition', () => {
        expect(verifyPartition(sound, 2, 2)).toEqual([]);
    });

    it('flags a record bound twice', () => {
        const twice: MatchOutcome[] = [...sound, { quality: 'unmatched_bank', bank_record: bank[0] }];

        expect(verifyPartition(twice, 2, 2)).toEqual([
            `Record bank:${bank[0].record_id} appears in more than one outcome`,
            'Expected 2 bank records in the outcomes, found 3',
        ]);
    });

    it('flags an outcome with the wrong participants', () => {
        const wrong: MatchOutcome[] = [
            sound[0],
            { quality: 'unmatched_ledger', ledger_record: ledger[1], bank_record: bank[1] },
        ];

        expect(verifyPartition(wrong, 2, 2)).toEqual([
            'Outcome 2 (unmatched_ledger) has the wrong participants',
            'Outcome 2 (unmatched_ledger) pairs two records without a difference',
        ]);
    });

    it('flags a difference on a residual', () => {
        const residual: MatchOutcome[] = [{ quality: 'unmatched_bank', bank_record: bank[0], difference: '0.00' }];

        expect(verifyPartition(residual, 0, 1)).toEqual([
            'Outcome 1 (unmatched_bank) has a difference without two participants',
        ]);
    });

    it('flags a missing record', () => {
        expect(verifyPartition([sound[0]], 2, 2)).toEqual([
            'Expected 2 ledger records in the outcomes, found 1',
            'Expected 2 bank records in the outcomes, found 1',
        ]);
    });
});
