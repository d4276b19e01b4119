import type { MatchOutcome, ReconciliationResult, TransactionRecord } from '../types/index.js';
import type { ReconciliationError } from '../errors.js';

/**
 * Candidate test for a (ledger, bank) pair within one pass.
 */
export type PairPredicate = (ledger: TransactionRecord, bank: TransactionRecord) => boolean;

/**
 * A matching pass: walks ledger records in order, claims pairs and returns
 * the outcomes it produced.
 */
export type MatchPass = (ledger: TransactionRecord[], bank: TransactionRecord[]) => MatchOutcome[];

/**
 * Result of safeReconcile.
 */
export type SafeReconcileResult =
    | { success: true; result: ReconciliationResult }
    | { success: false; error: ReconciliationError };
