import { basename, resolve } from 'node:path';
import type { Origin } from '@ledger-recon/shared';
import type { PipelineStep } from '../types.js';
import { hashFile } from '../../utils/hash.js';

const ORIGINS: readonly Origin[] = ['ledger', 'bank'];

/**
 * Step 2: Input Detection
 * Resolves both input paths and hashes them for the run manifest.
 * A file that cannot be read is fatal: a one-sided run would report every
 * record as unmatched.
 */
export const detectFiles: PipelineStep = async (state) => {
    for (const origin of ORIGINS) {
        const filePath = resolve(state.inputs[origin]);

        try {
            const hash = await hashFile(filePath);
            state.files.push({
                origin,
                path: filePath,
                filename: basename(filePath),
                hash,
            });
        } catch (err) {
            state.errors.push({
                step: 'detect',
                message: `Cannot read ${origin} file ${filePath}: ${(err as Error).message}`,
                fatal: true,
                error: err,
            });
        }
    }

    return state;
};
