import { Decimal } from 'decimal.js';
import type { Origin, TransactionInput, TransactionRecord } from '../types/index.js';
import { generateRecordId, resolveCollisions } from '../utils/record-id.js';

/**
 * Build the run's records for one source, in input order.
 *
 * `unsigned_amount` is derived here and nowhere else. Every record starts
 * unclaimed.
 */
export function createRecords(inputs: readonly TransactionInput[], origin: Origin): TransactionRecord[] {
    const records = inputs.map((input, index): TransactionRecord => {
        const signed = new Decimal(input.signed_amount);
        return {
            record_id: generateRecordId(origin, input.date, input.description, signed),
            origin,
            index,
            date: input.date,
            description: input.description,
            signed_amount: input.signed_amount,
            unsigned_amount: signed.abs().toFixed(),
            match_state: 'unclaimed',
        };
    });

    return resolveCollisions(records);
}

export function isClaimed(record: TransactionRecord): boolean {
    return record.match_state === 'claimed';
}

/**
 * Mark a record as bound into an outcome.
 * Claiming is one-way; a second claim means two outcomes would share the
 * record, so it throws.
 */
export function claimRecord(record: TransactionRecord): void {
    if (isClaimed(record)) {
        throw new Error(`Record ${record.origin}:${record.record_id} is already claimed`);
    }
    record.match_state = 'claimed';
}
