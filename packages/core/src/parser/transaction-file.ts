/**
 * Canonical transaction file parser.
 *
 * Format:
 * - CSV, XLS or XLSX; first sheet only
 * - Header row with the fixed columns std_date, std_desc, std_amt
 * - Amount sign is kept as written; ledger and bank may use opposite conventions
 *
 * Malformed rows are never skipped: a single bad row aborts the file,
 * otherwise the unmatched residuals would silently lose records.
 */

import { Decimal } from 'decimal.js';
import type { Origin, ParseResult, TransactionInput } from '../types/index.js';
import { INPUT_COLUMNS } from '../types/index.js';
import { ReadError, SchemaError } from '../errors.js';
import { readTable, isBlankCell, type Table } from '../utils/csv.js';
import { parseDateValue, formatIsoDate } from '../utils/date-parse.js';

const REQUIRED_COLUMNS: readonly string[] = [INPUT_COLUMNS.DATE, INPUT_COLUMNS.DESCRIPTION, INPUT_COLUMNS.AMOUNT];

/**
 * Parse a normalized transaction export.
 *
 * @param data - File contents as ArrayBuffer
 * @param origin - Which side of the reconciliation the file feeds
 * @param sourceFile - Original filename for error messages
 * @throws ReadError when the file is unreadable or lacks a canonical column
 * @throws SchemaError when a row has a blank or malformed date or amount
 */
export function parseTransactionFile(data: ArrayBuffer, origin: Origin, sourceFile: string): ParseResult {
    let table: Table;
    try {
        table = readTable(data);
    } catch (err) {
        throw new ReadError(
            `Could not read ${sourceFile}: ${(err as Error).message}`,
            origin,
            { cause: err }
        );
    }

    if (table.headers.length === 0) {
        throw new ReadError(`Could not read ${sourceFile}: no header row found`, origin);
    }

    const missingColumns = findMissingColumns(table.headers);
    if (missingColumns.length > 0) {
        throw new ReadError(
            `Could not read ${sourceFile}: missing required columns: ${missingColumns.join(', ')}. ` +
            `Found: ${table.headers.join(', ')}`,
            origin
        );
    }

    const warnings: string[] = [];
    const extraColumns = table.headers.filter(h => h !== '' && !REQUIRED_COLUMNS.includes(h));
    if (extraColumns.length > 0) {
        warnings.push(`${sourceFile}: ignored extra columns: ${extraColumns.join(', ')}`);
    }

    const rows: TransactionInput[] = table.rows.map((row, i) => parseRow(row, i + 1, origin));

    return { rows, warnings };
}

/**
 * Canonical columns absent from a header row.
 */
export function findMissingColumns(headers: readonly string[]): string[] {
    return REQUIRED_COLUMNS.filter(col => !headers.includes(col));
}

function parseRow(row: Record<string, unknown>, rowNumber: number, origin: Origin): TransactionInput {
    const dateValue = row[INPUT_COLUMNS.DATE];
    if (isBlankCell(dateValue)) {
        throw new SchemaError(origin, rowNumber, INPUT_COLUMNS.DATE, 'is missing');
    }
    const date = parseDateValue(dateValue);
    if (!date) {
        throw new SchemaError(origin, rowNumber, INPUT_COLUMNS.DATE, `is not a valid date: "${String(dateValue)}"`);
    }

    const amountValue = row[INPUT_COLUMNS.AMOUNT];
    if (isBlankCell(amountValue)) {
        throw new SchemaError(origin, rowNumber, INPUT_COLUMNS.AMOUNT, 'is missing');
    }
    const amount = parseAmount(amountValue);
    if (!amount) {
        throw new SchemaError(origin, rowNumber, INPUT_COLUMNS.AMOUNT, `is not a valid amount: "${String(amountValue)}"`);
    }

    const descValue = row[INPUT_COLUMNS.DESCRIPTION];

    return {
        date: formatIsoDate(date),
        description: isBlankCell(descValue) ? '' : String(descValue).trim(),
        signed_amount: amount.toFixed(),
    };
}

// Plain decimal notation only; Decimal would also read 0x10, 0b1 and Infinity.
const AMOUNT_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parse an amount cell. Thousands separators and surrounding spaces are
 * stripped. Returns null for anything that is not a plain decimal number.
 */
export function parseAmount(value: unknown): Decimal | null {
    const clean = String(value).replace(/,/g, '').trim();
    return AMOUNT_PATTERN.test(clean) ? new Decimal(clean) : null;
}
