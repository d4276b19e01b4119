/**
 * Tabular file utilities (CSV, XLS, XLSX).
 */

import * as XLSX from 'xlsx';

/**
 * Strip UTF-8 Byte Order Mark (BOM) from a string if present.
 * BOM (\uFEFF) can interfere with column header matching in CSVs.
 */
export function stripBom(value: string): string {
    if (value.startsWith('\uFEFF')) {
        return value.slice(1);
    }
    return value;
}

/**
 * First sheet of a file: trimmed header names and one object per data row.
 * Blank cells come back as ''.
 */
export interface Table {
    headers: string[];
    rows: Record<string, unknown>[];
}

/**
 * Read the first sheet of a CSV or spreadsheet.
 * Plain-text cells are kept as strings (`raw: true`) so amounts and dates
 * reach the parser exactly as written.
 *
 * Throws when the bytes cannot be read as a workbook.
 */
export function readTable(data: ArrayBuffer): Table {
    const workbook = XLSX.read(data, { type: 'array', raw: true });
    const sheetName = workbook.SheetNames[0];
    const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
    if (!sheet) {
        return { headers: [], rows: [] };
    }

    const [headerRow = []] = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
        header: 1,
        raw: true,
        blankrows: false,
    });
    const headers = Array.from(headerRow, h => stripBom(String(h ?? '')).trim());

    const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(sheet, { raw: true, defval: '' }).map(row => {
        const clean: Record<string, unknown> = {};
        for (const [k, v] of Object.entries(row)) {
            clean[stripBom(k).trim()] = v;
        }
        return clean;
    });

    return { headers, rows };
}

/**
 * True for cells that carry no value.
 */
export function isBlankCell(value: unknown): boolean {
    return value === undefined || value === null || String(value).trim() === '';
}
