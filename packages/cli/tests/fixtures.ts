import type { PipelineState } from '../src/pipeline/types.js';
import { resolveWorkspace } from '../src/workspace/paths.js';

export const LEDGER_PATH = '/data/ledger.csv';
export const BANK_PATH = '/data/bank.csv';

export const LEDGER_CSV = [
    'std_date,std_desc,std_amt',
    '2025-01-10,INVOICE 1001,1000.00',
    '2025-01-15,RENT,-2500.00',
    '2025-01-20,SUPPLIES,-45.00',
].join('\n');

export const BANK_CSV = [
    'std_date,std_desc,std_amt',
    '2025-01-12,STRIPE PAYOUT,970.50',
    '2025-01-21,OFFICE DEPOT,45.00',
    '2025-01-31,INTEREST,1.25',
].join('\n');

/**
 * readFile stand-in serving fixture files by path; anything else is ENOENT.
 * The return type is left to inference: Buffer.from gives the
 * ArrayBuffer-backed buffer that readFile is declared to return.
 */
export function serveFiles(files: Record<string, string>) {
    return async (path: unknown) => {
        const content = files[String(path)];
        if (content === undefined) {
            throw new Error(`ENOENT: no such file or directory, open '${String(path)}'`);
        }
        return Buffer.from(content);
    };
}

export function createState(overrides: Partial<PipelineState> = {}): PipelineState {
    return {
        inputs: { ledger: LEDGER_PATH, bank: BANK_PATH },
        workspace: resolveWorkspace('/work'),
        settings: { output_dir: 'outputs', report_name: 'Reconciliation_Report.xlsx', write_manifest: true },
        options: { dryRun: false, force: false, yes: false, out: '/out' },
        output: {
            dir: '/out',
            report: '/out/Reconciliation_Report.xlsx',
            manifest: '/out/run_manifest.json',
        },
        files: [],
        rows: { ledger: [], bank: [] },
        reportRows: [],
        warnings: [],
        errors: [],
        ...overrides,
    };
}
