import type {
    Origin,
    ReconciliationResult,
    ReportRow,
    Settings,
    TransactionInput,
} from '@ledger-recon/shared';
import type { Workspace, ReconcileInputs, ReconcileOptions } from '../types.js';

/**
 * An input file located and hashed by the detection step.
 */
export interface InputFile {
    origin: Origin;
    path: string;
    filename: string;
    hash: string;
}

/**
 * Representation of an error occurring within a pipeline step.
 */
export interface PipelineError {
    step: string;
    message: string;
    fatal: boolean;
    error?: unknown;
}

/**
 * Where a run writes. Resolved once, before the first step.
 */
export interface OutputPaths {
    dir: string;
    report: string;
    manifest: string;
}

/**
 * Central state object passed through the reconciliation pipeline.
 */
export interface PipelineState {
    inputs: ReconcileInputs;
    workspace: Workspace;
    settings: Settings;
    options: ReconcileOptions;
    output: OutputPaths;

    // Accumulated during pipeline execution
    files: InputFile[];
    rows: Record<Origin, TransactionInput[]>;
    result?: ReconciliationResult;
    reportRows: ReportRow[];

    warnings: string[];
    errors: PipelineError[];
}

/**
 * Function signature for a discrete pipeline step.
 */
export type PipelineStep = (state: PipelineState) => Promise<PipelineState>;
