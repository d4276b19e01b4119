import type { Settings } from '@ledger-recon/shared';
import { detectWorkspaceRoot } from '../workspace/detect.js';
import { resolveWorkspace } from '../workspace/paths.js';
import { loadSettings } from '../workspace/config.js';
import { runPipeline } from '../pipeline/runner.js';
import { log, success, warn, arrow, error } from '../utils/console.js';
import type { PipelineState } from '../pipeline/types.js';
import type { ReconcileInputs, ReconcileOptions } from '../types.js';

/**
 * `recon reconcile <ledger> <bank>`
 * Exits with code 1 when settings cannot be loaded or a step fails fatally.
 */
export async function reconcileFiles(inputs: ReconcileInputs, options: ReconcileOptions): Promise<PipelineState> {
    log(`\nLedger Recon - Reconciling ${inputs.ledger} against ${inputs.bank}`);

    // 1. Workspace detection. Without a config/recon.yaml the working
    // directory is the workspace and defaults apply.
    arrow('Detecting workspace...');
    const workspace = resolveWorkspace(options.workspace ?? detectWorkspaceRoot() ?? process.cwd());
    success(`Workspace: ${workspace.root}`);

    // 2. Settings
    let settings: Settings;
    try {
        settings = loadSettings(workspace);
    } catch (err) {
        error(`Error: Failed to load settings. ${(err as Error).message}`);
        process.exit(1);
    }

    // 3. Run Pipeline
    const state = await runPipeline(inputs, workspace, settings, options);

    // 4. Report Final Status
    log('\n--- Reconciliation Result ---');

    for (const w of state.warnings) {
        warn(w);
    }

    if (state.errors.length > 0) {
        for (const e of state.errors) {
            error(`ERROR [${e.step}]: ${e.message}`);
        }
        if (state.errors.some(e => e.fatal)) {
            log('\n✖ Reconciliation failed with fatal errors.');
            process.exit(1);
        }
    }

    if (state.options.dryRun) {
        log(`\n[DRY RUN] ${state.reportRows.length} rows reconciled. No files were written.`);
    } else {
        success(`Report generated at ${state.output.report} with ${state.reportRows.length} rows.`);
        if (state.settings.write_manifest) {
            arrow(`Manifest: ${state.output.manifest}`);
        }
    }

    return state;
}
