/**
 * Ledger Recon CLI - Core Types
 */

export interface ReconcileOptions {
    dryRun: boolean;
    force: boolean;
    yes: boolean;
    out?: string;
    workspace?: string;
}

export interface InspectOptions {
    rows?: number;
}

export interface WorkspaceConfig {
    settingsPath: string;
}

export interface Workspace {
    root: string;
    config: WorkspaceConfig;
}

/**
 * The two files a run reconciles, as given on the command line.
 */
export interface ReconcileInputs {
    ledger: string;
    bank: string;
}
