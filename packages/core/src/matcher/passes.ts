import { Decimal } from 'decimal.js';
import type { MatchOutcome, MatchQuality, TransactionRecord } from '../types/index.js';
import { RECONCILIATION_CONFIG } from '../types/index.js';
import type { MatchPass, PairPredicate } from './types.js';
import { claimRecord, isClaimed } from './record.js';
import { isWithinDateTolerance } from './date-diff.js';
import { isWithinAmountTolerance, isFeeAdjustedAmount, amountDifference } from './amount.js';

const EXACT_DIFFERENCE = (0).toFixed(RECONCILIATION_CONFIG.DIFFERENCE_DECIMALS);

/**
 * Exact-match candidate: amounts within 0.01, dates within 5 days.
 */
export const isExactCandidate: PairPredicate = (ledger, bank) =>
    isWithinAmountTolerance(ledger.unsigned_amount, bank.unsigned_amount) &&
    isWithinDateTolerance(ledger.date, bank.date);

/**
 * Fee-adjusted candidate: bank amount strictly between 96% and 100% of a
 * positive ledger amount, dates within 5 days.
 */
export const isFeeCandidate: PairPredicate = (ledger, bank) =>
    isFeeAdjustedAmount(ledger.unsigned_amount, bank.unsigned_amount) &&
    isWithinDateTolerance(ledger.date, bank.date);

/**
 * First unclaimed bank record, in bank input order, that satisfies the
 * predicate. First-fit is the contract: it is neither the closest amount
 * nor the closest date.
 */
export function findFirstCandidate(
    ledgerRecord: TransactionRecord,
    bank: readonly TransactionRecord[],
    predicate: PairPredicate
): TransactionRecord | undefined {
    return bank.find(bankRecord => !isClaimed(bankRecord) && predicate(ledgerRecord, bankRecord));
}

function bindPair(
    quality: MatchQuality,
    ledgerRecord: TransactionRecord,
    bankRecord: TransactionRecord,
    difference: string
): MatchOutcome {
    claimRecord(ledgerRecord);
    claimRecord(bankRecord);
    return { quality, bank_record: bankRecord, ledger_record: ledgerRecord, difference };
}

/**
 * Pass 1: exact matches.
 */
export const runExactPass: MatchPass = (ledger, bank) => {
    const outcomes: MatchOutcome[] = [];

    for (const ledgerRecord of ledger) {
        if (isClaimed(ledgerRecord)) continue;

        const bankRecord = findFirstCandidate(ledgerRecord, bank, isExactCandidate);
        if (bankRecord) {
            outcomes.push(bindPair('exact_match', ledgerRecord, bankRecord, EXACT_DIFFERENCE));
        }
    }

    return outcomes;
};

/**
 * Pass 2: fee-adjusted matches among what pass 1 left unclaimed.
 * Zero-amount ledger records are never fee candidates.
 */
export const runFeePass: MatchPass = (ledger, bank) => {
    const outcomes: MatchOutcome[] = [];

    for (const ledgerRecord of ledger) {
        if (isClaimed(ledgerRecord)) continue;
        if (new Decimal(ledgerRecord.unsigned_amount).isZero()) continue;

        const bankRecord = findFirstCandidate(ledgerRecord, bank, isFeeCandidate);
        if (bankRecord) {
            const difference = amountDifference(ledgerRecord.unsigned_amount, bankRecord.unsigned_amount);
            outcomes.push(bindPair('partial_match_fee', ledgerRecord, bankRecord, difference));
        }
    }

    return outcomes;
};

/**
 * Residuals: unclaimed bank records first, then unclaimed ledger records,
 * each in input order.
 */
export const collectResiduals: MatchPass = (ledger, bank) => [
    ...bank
        .filter(record => !isClaimed(record))
        .map((record): MatchOutcome => ({ quality: 'unmatched_bank', bank_record: record })),
    ...ledger
        .filter(record => !isClaimed(record))
        .map((record): MatchOutcome => ({ quality: 'unmatched_ledger', ledger_record: record })),
];
