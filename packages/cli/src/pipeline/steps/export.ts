import { mkdir, writeFile } from 'node:fs/promises';
import type { Origin, ReconciliationStats, RunManifest } from '@ledger-recon/shared';
import type { PipelineStep, PipelineState } from '../types.js';
import { generateReconciliationExcel } from '../../excel/report.js';
import { VERSION } from '../../version.js';

/**
 * Step 6: Export
 * Writes the Excel report and, unless disabled, the run manifest.
 */
export const exportResults: PipelineStep = async (state) => {
    if (state.options.dryRun) {
        state.warnings.push('Dry run: Skipping file export.');
        return state;
    }

    if (!state.result) {
        state.errors.push({ step: 'export', message: 'Nothing to export.', fatal: true });
        return state;
    }
    const { stats } = state.result;

    try {
        await mkdir(state.output.dir, { recursive: true });

        // 1. Excel report
        const workbook = await generateReconciliationExcel(state.reportRows, stats);
        const content = await workbook.xlsx.writeBuffer();
        await writeFile(state.output.report, Buffer.from(content));

        // 2. Run manifest
        if (state.settings.write_manifest) {
            await writeFile(state.output.manifest, JSON.stringify(buildManifest(state, stats), null, 2));
        }
    } catch (err) {
        state.errors.push({
            step: 'export',
            message: `Failed to export results to ${state.output.dir}: ${(err as Error).message}`,
            fatal: true,
            error: err,
        });
    }

    return state;
};

/**
 * Matches RunManifestSchema in @ledger-recon/shared.
 */
export function buildManifest(
    state: PipelineState,
    stats: ReconciliationStats,
    now: Date = new Date()
): RunManifest {
    const fileEntry = (origin: Origin) => {
        const file = state.files.find(f => f.origin === origin);
        return { path: file?.path ?? state.inputs[origin], hash: file?.hash ?? '' };
    };

    return {
        run_timestamp: now.toISOString(),
        input_files: {
            ledger: fileEntry('ledger'),
            bank: fileEntry('bank'),
        },
        report_file: state.output.report,
        report_rows: state.reportRows.length,
        stats,
        version: VERSION,
    };
}
