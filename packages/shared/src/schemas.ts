/**
 * Zod schemas for reconciliation data structures.
 *
 * IMPORTANT: Decimal values are stored as strings in schemas.
 * Convert to Decimal at computation boundaries, back to string at output.
 */

import { z } from 'zod';
import { RECORD_ID, DEFAULT_SETTINGS } from './constants.js';

// ============================================================================
// Primitive Validators
// ============================================================================

/**
 * ISO date string format: YYYY-MM-DD
 */
const isoDateString = z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, 'Must be YYYY-MM-DD format')
    .refine(isCalendarDate, 'Must be a real calendar date');

function isCalendarDate(value: string): boolean {
    const parsed = new Date(value + 'T00:00:00Z');
    return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

/**
 * Decimal amount as string (never native number for money).
 */
const decimalString = z.string().regex(/^-?\d+(\.\d+)?$/, 'Must be valid decimal string');

/**
 * Record ID: 16-char hex, optionally with collision suffix (e.g. "-02", "-100").
 */
const recordId = z.string().regex(
    new RegExp(`^[0-9a-f]{${RECORD_ID.LENGTH}}(-\\d{2,})?$`),
    `Must be ${RECORD_ID.LENGTH}-char hex, optionally with a -NN suffix`
);

// ============================================================================
// Input Contract
// ============================================================================

/**
 * Which source a record came from. Fixed at creation.
 */
export const OriginSchema = z.enum(['ledger', 'bank']);

export type Origin = z.infer<typeof OriginSchema>;

/**
 * Canonical transaction row produced by the normalization step.
 * The engine accepts nothing else.
 */
export const TransactionInputSchema = z.object({
    date: isoDateString,
    description: z.string(),
    signed_amount: decimalString,
});

export type TransactionInput = z.infer<typeof TransactionInputSchema>;

// ============================================================================
// Records & Outcomes
// ============================================================================

/**
 * Claim state. `unclaimed` -> `claimed` is the only transition.
 */
export const MatchStateSchema = z.enum(['unclaimed', 'claimed']);

export type MatchState = z.infer<typeof MatchStateSchema>;

/**
 * A transaction record inside a reconciliation run.
 * `unsigned_amount` is derived from `signed_amount` by the record factory.
 */
export const TransactionRecordSchema = z.object({
    record_id: recordId,
    origin: OriginSchema,
    index: z.number().int().min(0),
    date: isoDateString,
    description: z.string(),
    signed_amount: decimalString,
    unsigned_amount: decimalString,
    match_state: MatchStateSchema,
});

export type TransactionRecord = z.infer<typeof TransactionRecordSchema>;

export const MatchQualitySchema = z.enum([
    'exact_match',
    'partial_match_fee',
    'unmatched_bank',
    'unmatched_ledger',
]);

export type MatchQuality = z.infer<typeof MatchQualitySchema>;

/**
 * One row of the reconciliation result.
 * `difference` is present only when both records are.
 */
export const MatchOutcomeSchema = z.object({
    quality: MatchQualitySchema,
    bank_record: TransactionRecordSchema.optional(),
    ledger_record: TransactionRecordSchema.optional(),
    difference: decimalString.optional(),
});

export type MatchOutcome = z.infer<typeof MatchOutcomeSchema>;

/**
 * Reconciliation statistics for transparency.
 */
export const ReconciliationStatsSchema = z.object({
    ledger_records: z.number().int().min(0),
    bank_records: z.number().int().min(0),
    exact_matches: z.number().int().min(0),
    fee_matches: z.number().int().min(0),
    unmatched_bank: z.number().int().min(0),
    unmatched_ledger: z.number().int().min(0),
    matched_ledger_total: decimalString,
    matched_bank_total: decimalString,
    total_fees: decimalString,
});

export type ReconciliationStats = z.infer<typeof ReconciliationStatsSchema>;

/**
 * Result of a reconciliation run.
 * Pure function pattern: returns data, warnings as data.
 */
export const ReconciliationResultSchema = z.object({
    outcomes: z.array(MatchOutcomeSchema),
    stats: ReconciliationStatsSchema,
    warnings: z.array(z.string()),
});

export type ReconciliationResult = z.infer<typeof ReconciliationResultSchema>;

// ============================================================================
// Report
// ============================================================================

/**
 * Flat report row, one per outcome. Absent sides are null.
 */
export const ReportRowSchema = z.object({
    Match_Quality: z.string(),
    Bank_Date: isoDateString.nullable(),
    Bank_Desc: z.string().nullable(),
    Bank_Amt: decimalString.nullable(),
    Ledger_Date: isoDateString.nullable(),
    Ledger_Desc: z.string().nullable(),
    Ledger_Amt: decimalString.nullable(),
    Difference: decimalString.nullable(),
});

export type ReportRow = z.infer<typeof ReportRowSchema>;

// ============================================================================
// Parser Result Schema
// ============================================================================

/**
 * Result returned by the transaction file parser.
 * Parsers return data, not side effects. Warnings are returned as data.
 */
export const ParseResultSchema = z.object({
    rows: z.array(TransactionInputSchema),
    warnings: z.array(z.string()),
});

export type ParseResult = z.infer<typeof ParseResultSchema>;

// ============================================================================
// Workspace Settings & Run Manifest
// ============================================================================

/**
 * config/recon.yaml
 */
export const SettingsSchema = z.object({
    output_dir: z.string().min(1).default(DEFAULT_SETTINGS.OUTPUT_DIR),
    report_name: z.string().regex(/\.xlsx$/i, 'Must end in .xlsx').default(DEFAULT_SETTINGS.REPORT_NAME),
    write_manifest: z.boolean().default(DEFAULT_SETTINGS.WRITE_MANIFEST),
});

export type Settings = z.infer<typeof SettingsSchema>;

/**
 * Run manifest written next to the report.
 */
export const RunManifestSchema = z.object({
    run_timestamp: z.string(),
    input_files: z.object({
        ledger: z.object({ path: z.string(), hash: z.string() }),
        bank: z.object({ path: z.string(), hash: z.string() }),
    }),
    report_file: z.string(),
    report_rows: z.number().int().min(0),
    stats: ReconciliationStatsSchema,
    version: z.string(),
});

export type RunManifest = z.infer<typeof RunManifestSchema>;
