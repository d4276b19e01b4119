import { parseTransactionFile } from '@ledger-recon/core';
import type { PipelineStep } from '../types.js';
import { readArrayBuffer } from '../../utils/file.js';

/**
 * Step 3: Parsing
 * Reads each input into memory and parses it into canonical rows.
 * Any parse failure is fatal; a report built from part of a file would
 * misstate the residuals.
 */
export const parseFiles: PipelineStep = async (state) => {
    for (const file of state.files) {
        try {
            const data = await readArrayBuffer(file.path);
            const result = parseTransactionFile(data, file.origin, file.filename);

            state.rows[file.origin] = result.rows;

            // Forward parser warnings to pipeline state
            state.warnings.push(...result.warnings);
        } catch (err) {
            state.errors.push({
                step: 'parse',
                message: `Failed to parse ${file.filename}: ${(err as Error).message}`,
                fatal: true,
                error: err,
            });
        }
    }

    return state;
};
