import type { ReconcileOptions, InspectOptions } from './types.js';

export type ParsedCommand =
    | { command: 'reconcile'; ledger: string; bank: string; options: ReconcileOptions }
    | { command: 'inspect'; file: string; options: InspectOptions }
    | { command: 'help' }
    | { command: 'version' };

export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UsageError';
    }
}

const VALUE_FLAGS = new Set(['--out', '--workspace', '--rows']);
const BOOLEAN_FLAGS = new Set(['--force', '--dry-run', '--yes']);

/**
 * Parse `process.argv.slice(2)`.
 * Flags may appear anywhere; `--flag=value` and `--flag value` are both accepted.
 *
 * @throws UsageError for unknown commands, unknown flags or wrong arity
 */
export function parseArgs(argv: readonly string[]): ParsedCommand {
    const positionals: string[] = [];
    const values = new Map<string, string>();
    const switches = new Set<string>();

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];

        if (arg === '--help' || arg === '-h') return { command: 'help' };
        if (arg === '--version' || arg === '-v') return { command: 'version' };

        if (!arg.startsWith('--')) {
            positionals.push(arg);
            continue;
        }

        const eq = arg.indexOf('=');
        const flag = eq === -1 ? arg : arg.slice(0, eq);

        if (BOOLEAN_FLAGS.has(flag)) {
            if (eq !== -1) throw new UsageError(`${flag} does not take a value`);
            switches.add(flag);
        } else if (VALUE_FLAGS.has(flag)) {
            const value = eq === -1 ? argv[++i] : arg.slice(eq + 1);
            if (value === undefined || value === '') {
                throw new UsageError(`${flag} requires a value`);
            }
            values.set(flag, value);
        } else {
            throw new UsageError(`Unknown option: ${flag}`);
        }
    }

    const [command, ...rest] = positionals;

    switch (command) {
        case undefined:
            return { command: 'help' };

        case 'reconcile': {
            if (rest.length !== 2) {
                throw new UsageError('reconcile takes exactly two files: <ledger> <bank>');
            }
            if (values.has('--rows')) {
                throw new UsageError('--rows applies to inspect only');
            }
            const [ledger, bank] = rest;
            return {
                command: 'reconcile',
                ledger,
                bank,
                options: {
                    dryRun: switches.has('--dry-run'),
                    force: switches.has('--force'),
                    yes: switches.has('--yes'),
                    out: values.get('--out'),
                    workspace: values.get('--workspace'),
                },
            };
        }

        case 'inspect': {
            if (rest.length !== 1) {
                throw new UsageError('inspect takes exactly one file');
            }
            const rowsValue = values.get('--rows');
            let rows: number | undefined;
            if (rowsValue !== undefined) {
                rows = Number(rowsValue);
                if (!Number.isInteger(rows) || rows < 1) {
                    throw new UsageError(`--rows must be a positive integer, got "${rowsValue}"`);
                }
            }
            return { command: 'inspect', file: rest[0], options: { rows } };
        }

        default:
            throw new UsageError(`Unknown command: ${command}`);
    }
}
