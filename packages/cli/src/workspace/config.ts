import { readFileSync, existsSync } from 'node:fs';
import { parse } from 'yaml';
import { SettingsSchema, type Settings } from '@ledger-recon/shared';
import type { Workspace } from '../types.js';

/**
 * Loads workspace settings (config/recon.yaml).
 * A missing or empty file yields the defaults.
 *
 * @throws when the file is not valid YAML or fails SettingsSchema
 */
export function loadSettings(workspace: Workspace): Settings {
    const path = workspace.config.settingsPath;
    if (!existsSync(path)) {
        return SettingsSchema.parse({});
    }

    const content = readFileSync(path, 'utf-8');
    const data: unknown = parse(content);
    const result = SettingsSchema.safeParse(data ?? {});
    if (!result.success) {
        const issues = result.error.issues.map(i => `${i.path.join('.') || 'settings'}: ${i.message}`);
        throw new Error(`Invalid settings in ${path}: ${issues.join('; ')}`);
    }
    return result.data;
}
