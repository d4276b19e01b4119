import { Decimal } from 'decimal.js';
import type { MatchOutcome, ReconciliationStats } from '../types/index.js';
import { RECONCILIATION_CONFIG } from '../types/index.js';

const places = RECONCILIATION_CONFIG.DIFFERENCE_DECIMALS;

/**
 * Counts per quality plus matched totals.
 * `total_fees` is the sum of the amounts deducted on fee matches (>= 0).
 */
export function summarizeOutcomes(
    outcomes: readonly MatchOutcome[],
    ledgerCount: number,
    bankCount: number
): ReconciliationStats {
    let exact = 0;
    let fee = 0;
    let unmatchedBank = 0;
    let unmatchedLedger = 0;
    let ledgerTotal = new Decimal(0);
    let bankTotal = new Decimal(0);
    let fees = new Decimal(0);

    for (const outcome of outcomes) {
        switch (outcome.quality) {
            case 'exact_match':
                exact++;
                break;
            case 'partial_match_fee':
                fee++;
                fees = fees.plus(new Decimal(outcome.difference ?? 0).abs());
                break;
            case 'unmatched_bank':
                unmatchedBank++;
                break;
            case 'unmatched_ledger':
                unmatchedLedger++;
                break;
        }

        if (outcome.ledger_record && outcome.bank_record) {
            ledgerTotal = ledgerTotal.plus(outcome.ledger_record.unsigned_amount);
            bankTotal = bankTotal.plus(outcome.bank_record.unsigned_amount);
        }
    }

    return {
        ledger_records: ledgerCount,
        bank_records: bankCount,
        exact_matches: exact,
        fee_matches: fee,
        unmatched_bank: unmatchedBank,
        unmatched_ledger: unmatchedLedger,
        matched_ledger_total: ledgerTotal.toFixed(places),
        matched_bank_total: bankTotal.toFixed(places),
        total_fees: fees.toFixed(places),
    };
}

/**
 * Check that outcomes partition both inputs and that no record is bound
 * twice. Returns one message per violation; an empty list means sound.
 */
export function verifyPartition(
    outcomes: readonly MatchOutcome[],
    ledgerCount: number,
    bankCount: number
): string[] {
    const violations: string[] = [];
    const seen = new Set<string>();
    let ledgerSeen = 0;
    let bankSeen = 0;

    outcomes.forEach((outcome, i) => {
        const hasLedger = outcome.ledger_record !== undefined;
        const hasBank = outcome.bank_record !== undefined;
        const expectsLedger = outcome.quality !== 'unmatched_bank';
        const expectsBank = outcome.quality !== 'unmatched_ledger';

        if (hasLedger !== expectsLedger || hasBank !== expectsBank) {
            violations.push(`Outcome ${i + 1} (${outcome.quality}) has the wrong participants`);
        }
        const isPair = hasLedger && hasBank;
        if (outcome.difference !== undefined && !isPair) {
            violations.push(`Outcome ${i + 1} (${outcome.quality}) has a difference without two participants`);
        }
        if (outcome.difference === undefined && isPair) {
            violations.push(`Outcome ${i + 1} (${outcome.quality}) pairs two records without a difference`);
        }

        for (const record of [outcome.ledger_record, outcome.bank_record]) {
            if (!record) continue;
            const key = `${record.origin}:${record.record_id}`;
            if (seen.has(key)) {
                violations.push(`Record ${key} appears in more than one outcome`);
            }
            seen.add(key);
            if (record.origin === 'ledger') ledgerSeen++;
            else bankSeen++;
        }
    });

    if (ledgerSeen !== ledgerCount) {
        violations.push(`Expected ${ledgerCount} ledger records in the outcomes, found ${ledgerSeen}`);
    }
    if (bankSeen !== bankCount) {
        violations.push(`Expected ${bankCount} bank records in the outcomes, found ${bankSeen}`);
    }

    return violations;
}
