import type { Origin, TransactionInput } from '../types/index.js';
import { TransactionInputSchema } from '../types/index.js';
import { EmptyInputError, SchemaError } from '../errors.js';

export interface ValidatedInputs {
    ledger: TransactionInput[];
    bank: TransactionInput[];
}

/**
 * Check both collections before any record is created.
 *
 * Emptiness is checked for both sides first (ledger, then bank), then each
 * row against the canonical contract. The first defect aborts the run.
 *
 * @throws EmptyInputError when a collection has no rows
 * @throws SchemaError naming the side, 1-based row and field of the first bad row
 */
export function validateInputs(ledger: readonly unknown[], bank: readonly unknown[]): ValidatedInputs {
    if (ledger.length === 0) throw new EmptyInputError('ledger');
    if (bank.length === 0) throw new EmptyInputError('bank');

    return {
        ledger: validateRows(ledger, 'ledger'),
        bank: validateRows(bank, 'bank'),
    };
}

function validateRows(rows: readonly unknown[], origin: Origin): TransactionInput[] {
    return rows.map((row, i) => {
        const result = TransactionInputSchema.safeParse(row);
        if (!result.success) {
            const issue = result.error.issues[0];
            const field = issue?.path.length ? String(issue.path[0]) : 'record';
            const detail = issue?.code === 'invalid_type' && issue.received === 'undefined'
                ? 'is missing'
                : `is invalid: ${issue?.message ?? 'unknown error'}`;
            throw new SchemaError(origin, i + 1, field, detail);
        }
        return result.data;
    });
}
