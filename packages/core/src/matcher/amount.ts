/**
 * Amount predicates for the two matching passes.
 * Inputs are unsigned decimal strings; comparisons are exact Decimal math.
 */

import { Decimal } from 'decimal.js';
import { RECONCILIATION_CONFIG } from '../types/index.js';

const AMOUNT_TOLERANCE = new Decimal(RECONCILIATION_CONFIG.AMOUNT_TOLERANCE);
const FEE_FLOOR_RATIO = new Decimal(RECONCILIATION_CONFIG.FEE_FLOOR_RATIO);

/**
 * |ledger - bank| <= 0.01
 */
export function isWithinAmountTolerance(ledgerAmount: string, bankAmount: string): boolean {
    const diff = new Decimal(ledgerAmount).minus(bankAmount).abs();
    return diff.lessThanOrEqualTo(AMOUNT_TOLERANCE);
}

/**
 * Bank amount is a fee-reduced share of the ledger amount:
 * ledger x 0.96 < bank < ledger, both bounds strict.
 */
export function isFeeAdjustedAmount(ledgerAmount: string, bankAmount: string): boolean {
    const ledger = new Decimal(ledgerAmount);
    const bank = new Decimal(bankAmount);
    return bank.lessThan(ledger) && bank.greaterThan(ledger.times(FEE_FLOOR_RATIO));
}

/**
 * round(bank - ledger, 2) as a fixed two-decimal string.
 * Exact decimal arithmetic; a half cent rounds away from zero.
 */
export function amountDifference(ledgerAmount: string, bankAmount: string): string {
    return new Decimal(bankAmount)
        .minus(ledgerAmount)
        .toDecimalPlaces(RECONCILIATION_CONFIG.DIFFERENCE_DECIMALS, Decimal.ROUND_HALF_UP)
        .toFixed(RECONCILIATION_CONFIG.DIFFERENCE_DECIMALS);
}
