import type { Settings } from '@ledger-recon/shared';
import type { PipelineState, PipelineStep } from './types.js';
import { checkOutput } from './steps/output-check.js';
import { detectFiles } from './steps/detect.js';
import { parseFiles } from './steps/parse.js';
import { matchRecords } from './steps/match.js';
import { validateFinal } from './steps/validate.js';
import { exportResults } from './steps/export.js';
import { getOutputsPath, getReportPath, getManifestPath } from '../workspace/paths.js';
import type { Workspace, ReconcileInputs, ReconcileOptions } from '../types.js';

/**
 * Orchestrates the execution of the reconciliation pipeline.
 * Runs each step sequentially, stopping if a fatal error occurs.
 */
export async function runPipeline(
    inputs: ReconcileInputs,
    workspace: Workspace,
    settings: Settings,
    options: ReconcileOptions
): Promise<PipelineState> {
    const outputDir = getOutputsPath(workspace, settings, options.out);

    let state: PipelineState = {
        inputs,
        workspace,
        settings,
        options,
        output: {
            dir: outputDir,
            report: getReportPath(outputDir, settings),
            manifest: getManifestPath(outputDir),
        },
        files: [],
        rows: { ledger: [], bank: [] },
        reportRows: [],
        warnings: [],
        errors: [],
    };

    const steps: { name: string; fn: PipelineStep }[] = [
        { name: 'Output Check', fn: checkOutput },
        { name: 'Input Detection', fn: detectFiles },
        { name: 'Parsing', fn: parseFiles },
        { name: 'Matching', fn: matchRecords },
        { name: 'Final Validation', fn: validateFinal },
        { name: 'Export Results', fn: exportResults },
    ];

    for (let i = 0; i < steps.length; i++) {
        const step = steps[i];
        console.log(`\n→ Step ${i + 1}/${steps.length}: ${step.name}...`);

        state = await step.fn(state);

        if (state.errors.some(e => e.fatal)) {
            console.error(`\n✖ Fatal error in step "${step.name}". Stopping.`);
            break;
        }
    }

    return state;
}
