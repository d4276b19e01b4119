import { join, resolve } from 'node:path';
import { DEFAULT_SETTINGS, type Settings } from '@ledger-recon/shared';
import type { Workspace } from '../types.js';

/**
 * Constructs a Workspace object from a root path.
 */
export function resolveWorkspace(root: string): Workspace {
    return {
        root: resolve(root),
        config: {
            settingsPath: join(resolve(root), 'config', 'recon.yaml'),
        },
    };
}

/**
 * Output directory for a run. `--out` wins over `output_dir`; a relative
 * `--out` is taken from the working directory, a relative `output_dir`
 * from the workspace root.
 */
export function getOutputsPath(workspace: Workspace, settings: Settings, out?: string): string {
    return out ? resolve(out) : resolve(workspace.root, settings.output_dir);
}

export function getReportPath(outputsPath: string, settings: Settings): string {
    return join(outputsPath, settings.report_name);
}

export function getManifestPath(outputsPath: string): string {
    return join(outputsPath, DEFAULT_SETTINGS.MANIFEST_NAME);
}
