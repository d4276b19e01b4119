#!/usr/bin/env node
/**
 * Ledger Recon CLI
 *
 * The CLI owns all file I/O and console output. Core receives ArrayBuffers
 * and returns data, warnings included.
 */

import { parseArgs, UsageError, type ParsedCommand } from './args.js';
import { reconcileFiles } from './commands/reconcile.js';
import { inspectCommand } from './commands/inspect.js';
import { VERSION } from './version.js';

const USAGE = `Ledger Recon v${VERSION}

Usage:
  recon reconcile <ledger-file> <bank-file> [options]
  recon inspect <file> [--rows <n>]

Reconcile options:
  --out <dir>        Write the report to <dir> instead of output_dir
  --workspace <dir>  Use <dir> as the workspace root (config/recon.yaml)
  --force            Overwrite an existing report
  --yes              Answer yes to prompts
  --dry-run          Reconcile without writing files

Input files are CSV, XLS or XLSX with the columns std_date, std_desc, std_amt.

Example:
  recon reconcile ledger.csv bank.csv --out reports/2025-01`;

async function main(): Promise<void> {
    let parsed: ParsedCommand;
    try {
        parsed = parseArgs(process.argv.slice(2));
    } catch (err) {
        if (err instanceof UsageError) {
            console.error(`Error: ${err.message}\n`);
            console.error(USAGE);
            process.exit(2);
        }
        throw err;
    }

    switch (parsed.command) {
        case 'help':
            console.log(USAGE);
            return;
        case 'version':
            console.log(VERSION);
            return;
        case 'reconcile':
            await reconcileFiles({ ledger: parsed.ledger, bank: parsed.bank }, parsed.options);
            return;
        case 'inspect':
            await inspectCommand(parsed.file, parsed.options);
            return;
    }
}

main().catch((err: unknown) => {
    console.error('Unexpected error:', err instanceof Error ? err.message : String(err));
    process.exit(1);
});
