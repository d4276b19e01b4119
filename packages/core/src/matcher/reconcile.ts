import type {
    MatchOutcome,
    Origin,
    ReconciliationResult,
    TransactionInput,
    TransactionRecord,
} from '../types/index.js';
import { isReconciliationError } from '../errors.js';
import { buildCollisionMap } from '../utils/record-id.js';
import type { MatchPass, SafeReconcileResult } from './types.js';
import { validateInputs } from './validate.js';
import { createRecords } from './record.js';
import { runExactPass, runFeePass, collectResiduals } from './passes.js';
import { summarizeOutcomes } from './summary.js';

/**
 * Passes run strictly in this order; each sees the claims of the previous.
 */
const PASSES: readonly MatchPass[] = [runExactPass, runFeePass, collectResiduals];

/**
 * Reconcile a ledger against a bank statement.
 *
 * PURE FUNCTION with respect to its inputs: rows are copied into fresh
 * records, so the same inputs always give the same outcomes in the same
 * order. Greedy first-fit by input order, not an optimal assignment.
 *
 * Outcome order: exact matches (ledger order), fee matches (ledger order),
 * unmatched bank (bank order), unmatched ledger (ledger order).
 *
 * @throws EmptyInputError, SchemaError before any outcome is produced
 */
export function reconcile(
    ledger: readonly TransactionInput[],
    bank: readonly TransactionInput[]
): ReconciliationResult {
    const inputs = validateInputs(ledger, bank);

    const ledgerRecords = createRecords(inputs.ledger, 'ledger');
    const bankRecords = createRecords(inputs.bank, 'bank');

    const outcomes: MatchOutcome[] = [];
    for (const pass of PASSES) {
        outcomes.push(...pass(ledgerRecords, bankRecords));
    }

    return {
        outcomes,
        stats: summarizeOutcomes(outcomes, ledgerRecords.length, bankRecords.length),
        warnings: [
            ...collectWarnings(ledgerRecords, 'ledger'),
            ...collectWarnings(bankRecords, 'bank'),
        ],
    };
}

/**
 * Same run as `reconcile`, with reconciliation failures returned as values.
 * Anything that is not a ReconciliationError still propagates.
 */
export function safeReconcile(
    ledger: readonly TransactionInput[],
    bank: readonly TransactionInput[]
): SafeReconcileResult {
    try {
        return { success: true, result: reconcile(ledger, bank) };
    } catch (err) {
        if (isReconciliationError(err)) {
            return { success: false, error: err };
        }
        throw err;
    }
}

function collectWarnings(records: readonly TransactionRecord[], origin: Origin): string[] {
    const warnings: string[] = [];

    for (const [id, count] of Object.entries(buildCollisionMap(records))) {
        warnings.push(`${origin}: ${count} identical rows share record id ${id}; suffixes -02.. were added`);
    }

    const zeroRows = records.filter(r => r.unsigned_amount === '0').map(r => r.index + 1);
    if (zeroRows.length > 0) {
        warnings.push(`${origin}: zero-amount rows ${zeroRows.join(', ')} can only match exactly`);
    }

    return warnings;
}
