import { basename, resolve } from 'node:path';
import { inspectFile, INSPECT_PREVIEW_ROWS, type FileInspection } from '@ledger-recon/core';
import { readArrayBuffer } from '../utils/file.js';
import { log, success, warn, arrow, error } from '../utils/console.js';
import type { InspectOptions } from '../types.js';

/**
 * `recon inspect <file>`
 * Prints the columns and first rows of a file so it can be checked against
 * the canonical layout before a run.
 */
export async function inspectCommand(file: string, options: InspectOptions = {}): Promise<FileInspection> {
    const filePath = resolve(file);
    const filename = basename(filePath);

    let inspection: FileInspection;
    try {
        const data = await readArrayBuffer(filePath);
        inspection = inspectFile(data, filename, options.rows ?? INSPECT_PREVIEW_ROWS);
    } catch (err) {
        error(`Error: ${(err as Error).message}`);
        process.exit(1);
    }

    log(`\n${filename}: ${inspection.rowCount} data rows`);
    arrow(`Columns: ${inspection.columns.join(', ')}`);

    log(`\nFirst ${inspection.preview.length} rows:`);
    for (const row of inspection.preview) {
        log('  ' + inspection.columns.map(c => formatCell(row[c])).join(' | '));
    }

    if (inspection.missingColumns.length > 0) {
        warn(`Missing canonical columns: ${inspection.missingColumns.join(', ')}`);
    } else {
        success('All canonical columns present.');
    }

    return inspection;
}

function formatCell(value: unknown): string {
    if (value === undefined || value === null) return '';
    return String(value);
}
