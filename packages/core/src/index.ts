// Types (re-exported from shared)
export type {
    Origin,
    TransactionInput,
    MatchState,
    TransactionRecord,
    MatchQuality,
    MatchOutcome,
    ReconciliationStats,
    ReconciliationResult,
    ReportRow,
    ParseResult,
} from './types/index.js';

export {
    TransactionInputSchema,
    TransactionRecordSchema,
    MatchOutcomeSchema,
    RECONCILIATION_CONFIG,
    INPUT_COLUMNS,
    MATCH_QUALITY_LABELS,
    REPORT_COLUMNS,
    RECORD_ID,
    INSPECT_PREVIEW_ROWS,
} from './types/index.js';

// Errors
export {
    ReconciliationError,
    ReadError,
    EmptyInputError,
    SchemaError,
    isReconciliationError,
} from './errors.js';
export type { ReconciliationErrorCode } from './errors.js';

// Utils
export { generateRecordId, resolveCollisions, buildCollisionMap } from './utils/record-id.js';
export { parseDateValue, formatIsoDate } from './utils/date-parse.js';

// Parsers
export { parseTransactionFile, parseAmount, findMissingColumns, inspectFile } from './parser/index.js';
export type { FileInspection } from './parser/index.js';

// Matcher
export {
    reconcile,
    safeReconcile,
    validateInputs,
    createRecords,
    claimRecord,
    isClaimed,
    runExactPass,
    runFeePass,
    collectResiduals,
    summarizeOutcomes,
    verifyPartition,
    daysBetween,
    isWithinDateTolerance,
} from './matcher/index.js';
export type { SafeReconcileResult, PairPredicate, MatchPass } from './matcher/index.js';

// Report
export { buildReportRows } from './report/index.js';
