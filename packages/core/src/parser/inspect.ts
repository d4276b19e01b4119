import type { Origin } from '../types/index.js';
import { INSPECT_PREVIEW_ROWS } from '../types/index.js';
import { ReadError } from '../errors.js';
import { readTable, type Table } from '../utils/csv.js';
import { findMissingColumns } from './transaction-file.js';

/**
 * Column listing and first rows of a file, for checking an export
 * against the canonical layout before a run.
 */
export interface FileInspection {
    columns: string[];
    preview: Record<string, unknown>[];
    rowCount: number;
    missingColumns: string[];
}

export function inspectFile(
    data: ArrayBuffer,
    sourceFile: string,
    previewRows: number = INSPECT_PREVIEW_ROWS,
    origin?: Origin
): FileInspection {
    let table: Table;
    try {
        table = readTable(data);
    } catch (err) {
        throw new ReadError(`Could not read ${sourceFile}: ${(err as Error).message}`, origin, { cause: err });
    }

    return {
        columns: table.headers,
        preview: table.rows.slice(0, previewRows),
        rowCount: table.rows.length,
        missingColumns: findMissingColumns(table.headers),
    };
}
