/**
 * Re-export all types from shared package.
 * Core package uses these types but doesn't define them.
 */
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
} from '@ledger-recon/shared';

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
} from '@ledger-recon/shared';
