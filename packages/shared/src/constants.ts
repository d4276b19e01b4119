/**
 * Constants for the reconciliation engine.
 *
 * Matching thresholds are fixed. They are not part of the workspace
 * settings and cannot be overridden per run.
 */

/**
 * Matching thresholds.
 *
 * Amounts are decimal strings; convert with Decimal at the comparison.
 */
export const RECONCILIATION_CONFIG = {
    /** Maximum absolute amount difference for an exact match (inclusive). */
    AMOUNT_TOLERANCE: '0.01',
    /** Maximum calendar-day distance between paired records (inclusive). */
    DATE_TOLERANCE_DAYS: 5,
    /** Bank amount must be strictly above ledger amount x this ratio for a fee match. */
    FEE_FLOOR_RATIO: '0.96',
    /** Decimal places kept on a fee-match difference. */
    DIFFERENCE_DECIMALS: 2,
} as const;

/**
 * Fixed column names of the canonical input file.
 * Any other header layout is rejected.
 */
export const INPUT_COLUMNS = {
    DATE: 'std_date',
    DESCRIPTION: 'std_desc',
    AMOUNT: 'std_amt',
} as const;

/**
 * Report labels per match quality.
 */
export const MATCH_QUALITY_LABELS = {
    exact_match: 'Exact Match',
    partial_match_fee: 'Partial Match (Fee)',
    unmatched_bank: 'Unmatched Bank',
    unmatched_ledger: 'Unmatched Ledger',
} as const;

/**
 * Report column order.
 */
export const REPORT_COLUMNS = [
    'Match_Quality',
    'Bank_Date',
    'Bank_Desc',
    'Bank_Amt',
    'Ledger_Date',
    'Ledger_Desc',
    'Ledger_Amt',
    'Difference',
] as const;

/**
 * Record ID configuration.
 */
export const RECORD_ID = {
    LENGTH: 16,
} as const;

/**
 * Defaults for config/recon.yaml.
 */
export const DEFAULT_SETTINGS = {
    OUTPUT_DIR: 'outputs',
    REPORT_NAME: 'Reconciliation_Report.xlsx',
    MANIFEST_NAME: 'run_manifest.json',
    WRITE_MANIFEST: true,
} as const;

/**
 * Number of rows shown by `recon inspect`.
 */
export const INSPECT_PREVIEW_ROWS = 5;
