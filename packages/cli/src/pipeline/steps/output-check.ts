import { existsSync } from 'node:fs';
import type { PipelineStep } from '../types.js';
import { promptContinue } from '../../utils/prompt.js';

/**
 * Step 1: Output Check
 * Prevents accidental overwrite of an earlier report unless --force is used
 * or the user confirms. Checks the manifest too, not just the report.
 */
export const checkOutput: PipelineStep = async (state) => {
    // A dry run writes nothing, so there is nothing to overwrite.
    if (state.options.dryRun || state.options.force) {
        return state;
    }

    const existingFiles = [state.output.report, state.output.manifest].filter(f => existsSync(f));
    if (existingFiles.length === 0) {
        return state;
    }

    const shouldOverwrite = await promptContinue(
        `\n⚠️  Output already exists (found: ${existingFiles.join(', ')}). Overwrite?`,
        state.options
    );

    if (!shouldOverwrite) {
        state.errors.push({
            step: 'output-check',
            message: `Output already exists in ${state.output.dir} (found: ${existingFiles.join(', ')}). Use --force to overwrite.`,
            fatal: true,
        });
    }

    return state;
};
