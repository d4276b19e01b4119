// Schemas
export {
    OriginSchema,
    TransactionInputSchema,
    MatchStateSchema,
    TransactionRecordSchema,
    MatchQualitySchema,
    MatchOutcomeSchema,
    ReconciliationStatsSchema,
    ReconciliationResultSchema,
    ReportRowSchema,
    ParseResultSchema,
    SettingsSchema,
    RunManifestSchema,
} from './schemas.js';

// Types
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
    Settings,
    RunManifest,
} from './schemas.js';

// Constants
export {
    RECONCILIATION_CONFIG,
    INPUT_COLUMNS,
    MATCH_QUALITY_LABELS,
    REPORT_COLUMNS,
    RECORD_ID,
    DEFAULT_SETTINGS,
    INSPECT_PREVIEW_ROWS,
} from './constants.js';
