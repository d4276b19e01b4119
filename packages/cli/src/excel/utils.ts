import exceljs from 'exceljs';
import type { Worksheet, Workbook } from 'exceljs';
import { Decimal } from 'decimal.js';

export const CURRENCY_FORMAT = '#,##0.00;[Red]-#,##0.00';

/**
 * Creates a new workbook with standard metadata.
 */
export function createWorkbook(now: Date = new Date()): Workbook {
    const workbook = new exceljs.Workbook();
    workbook.creator = 'Ledger Recon';
    workbook.created = now;
    return workbook;
}

/**
 * Bold white-on-blue header row, frozen.
 */
export function formatHeaderRow(worksheet: Worksheet): void {
    const headerRow = worksheet.getRow(1);

    headerRow.font = {
        bold: true,
        color: { argb: 'FFFFFFFF' },
        size: 11
    };

    headerRow.fill = {
        type: 'pattern',
        pattern: 'solid',
        fgColor: { argb: 'FF4472C4' }
    };

    headerRow.alignment = {
        vertical: 'middle',
        horizontal: 'center'
    };

    worksheet.views = [
        { state: 'frozen', xSplit: 0, ySplit: 1 }
    ];
}

/**
 * Sets column widths from the longest cell text, between 10 and 100.
 */
export function autoFitColumns(worksheet: Worksheet): void {
    worksheet.columns.forEach(column => {
        let maxLen = 10;
        column.eachCell?.({ includeEmpty: false }, cell => {
            if (cell.value !== null && cell.value !== undefined) {
                const len = cell.value.toString().length;
                if (len > maxLen) maxLen = len;
            }
        });
        column.width = Math.min(maxLen + 2, 100);
    });
}

/**
 * Applies currency formatting to a whole column.
 */
export function formatCurrencyCell(worksheet: Worksheet, col: string | number): void {
    const column = worksheet.getColumn(col);
    column.numFmt = CURRENCY_FORMAT;
    column.alignment = { horizontal: 'right' };
}

/**
 * Decimal string to a cell number; null stays an empty cell.
 */
export function toCellAmount(value: string | null): number | null {
    return value === null ? null : new Decimal(value).toNumber();
}
