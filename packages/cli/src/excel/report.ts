import type { Workbook, Worksheet } from 'exceljs';
import {
    MATCH_QUALITY_LABELS,
    REPORT_COLUMNS,
    type ReconciliationStats,
    type ReportRow,
} from '@ledger-recon/shared';
import {
    createWorkbook,
    formatHeaderRow,
    autoFitColumns,
    formatCurrencyCell,
    toCellAmount,
    CURRENCY_FORMAT,
} from './utils.js';

const AMOUNT_COLUMNS = ['Bank_Amt', 'Ledger_Amt', 'Difference'] as const;

/**
 * Generates the reconciliation workbook: one row per outcome on
 * "Reconciliation", counts and totals on "Summary".
 */
export async function generateReconciliationExcel(
    rows: readonly ReportRow[],
    stats: ReconciliationStats
): Promise<Workbook> {
    const workbook = createWorkbook();

    addReconciliationSheet(workbook, rows);
    addSummarySheet(workbook, stats);

    return workbook;
}

/**
 * Sheet: Reconciliation
 * Columns in report order; amounts as numbers, absent sides left empty.
 */
function addReconciliationSheet(workbook: Workbook, rows: readonly ReportRow[]): void {
    const sheet = workbook.addWorksheet('Reconciliation');
    sheet.columns = REPORT_COLUMNS.map(key => ({ header: key, key }));

    for (const row of rows) {
        sheet.addRow({
            ...row,
            Bank_Amt: toCellAmount(row.Bank_Amt),
            Ledger_Amt: toCellAmount(row.Ledger_Amt),
            Difference: toCellAmount(row.Difference),
        });
    }

    formatHeaderRow(sheet);
    for (const key of AMOUNT_COLUMNS) {
        formatCurrencyCell(sheet, key);
    }
    autoFitColumns(sheet);
}

/**
 * Sheet: Summary
 * Rows: record counts, one count per match quality, matched totals, fees.
 */
function addSummarySheet(workbook: Workbook, stats: ReconciliationStats): void {
    const sheet = workbook.addWorksheet('Summary');
    sheet.columns = [
        { header: 'Metric', key: 'metric' },
        { header: 'Value', key: 'value' },
    ];

    sheet.addRow({ metric: 'Ledger records', value: stats.ledger_records });
    sheet.addRow({ metric: 'Bank records', value: stats.bank_records });
    sheet.addRow({ metric: MATCH_QUALITY_LABELS.exact_match, value: stats.exact_matches });
    sheet.addRow({ metric: MATCH_QUALITY_LABELS.partial_match_fee, value: stats.fee_matches });
    sheet.addRow({ metric: MATCH_QUALITY_LABELS.unmatched_bank, value: stats.unmatched_bank });
    sheet.addRow({ metric: MATCH_QUALITY_LABELS.unmatched_ledger, value: stats.unmatched_ledger });
    addAmountRow(sheet, 'Matched ledger total', stats.matched_ledger_total);
    addAmountRow(sheet, 'Matched bank total', stats.matched_bank_total);
    addAmountRow(sheet, 'Total fees', stats.total_fees);

    formatHeaderRow(sheet);
    autoFitColumns(sheet);
}

function addAmountRow(sheet: Worksheet, metric: string, amount: string): void {
    const row = sheet.addRow({ metric, value: toCellAmount(amount) });
    const cell = row.getCell('value');
    cell.numFmt = CURRENCY_FORMAT;
    cell.alignment = { horizontal: 'right' };
}
