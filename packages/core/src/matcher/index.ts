/**
 * Matcher module: two-pass ledger/bank reconciliation.
 */

export { reconcile, safeReconcile } from './reconcile.js';
export { validateInputs } from './validate.js';
export type { ValidatedInputs } from './validate.js';
export { createRecords, claimRecord, isClaimed } from './record.js';
export {
    runExactPass,
    runFeePass,
    collectResiduals,
    findFirstCandidate,
    isExactCandidate,
    isFeeCandidate,
} from './passes.js';
export { isWithinAmountTolerance, isFeeAdjustedAmount, amountDifference } from './amount.js';
export { summarizeOutcomes, verifyPartition } from './summary.js';
export { daysBetween, isWithinDateTolerance } from './date-diff.js';
export type { PairPredicate, MatchPass, SafeReconcileResult } from './types.js';
