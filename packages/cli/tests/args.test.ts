import { describe, it, expect } from 'vitest';
import { parseArgs, UsageError } from '../src/args.js';

describe('parseArgs', () => {
    it('should parse a reconcile command with defaults', () => {
        expect(parseArgs(['reconcile', 'ledger.csv', 'bank.csv'])).toEqual({
            command: 'reconcile',
            ledger: 'ledger.csv',
            bank: 'bank.csv',
            options: { dryRun: false, force: false, yes: false, out: undefined, workspace: undefined },
        });
    });

    it('should accept flags in any position and both value forms', () => {
        const parsed = parseArgs(['--force', 'reconcile', 'l.xlsx', '--out', 'reports', 'b.xlsx', '--workspace=/books', '--yes']);

        expect(parsed).toEqual({
            command: 'reconcile',
            ledger: 'l.xlsx',
            bank: 'b.xlsx',
            options: { dryRun: false, force: true, yes: true, out: 'reports', workspace: '/books' },
        });
    });

    it('should parse --dry-run', () => {
        const parsed = parseArgs(['reconcile', 'l.csv', 'b.csv', '--dry-run']);
        expect(parsed.command === 'reconcile' && parsed.options.dryRun).toBe(true);
    });

    it('should parse an inspect command', () => {
        expect(parseArgs(['inspect', 'bank.csv', '--rows', '10'])).toEqual({
            command: 'inspect',
            file: 'bank.csv',
            options: { rows: 10 },
        });
    });

    it('should show help with no arguments or --help', () => {
        expect(parseArgs([])).toEqual({ command: 'help' });
        expect(parseArgs(['reconcile', '--help'])).toEqual({ command: 'help' });
    });

    it('should report the version', () => {
        expect(parseArgs(['--version'])).toEqual({ command: 'version' });
    });

    it('should require exactly two files for reconcile', () => {
        expect(() => parseArgs(['reconcile', 'ledger.csv'])).toThrow(UsageError);
        expect(() => parseArgs(['reconcile', 'ledger.csv'])).toThrow('reconcile takes exactly two files: <ledger> <bank>');
    });

    it('should reject unknown commands and options', () => {
        expect(() => parseArgs(['merge', 'a', 'b'])).toThrow('Unknown command: merge');
        expect(() => parseArgs(['reconcile', 'a', 'b', '--tolerance', '0.02'])).toThrow('Unknown option: --tolerance');
    });

    it('should reject a value flag without a value', () => {
        expect(() => parseArgs(['reconcile', 'a', 'b', '--out'])).toThrow('--out requires a value');
    });

    it('should reject a value on a switch', () => {
        expect(() => parseArgs(['reconcile', 'a', 'b', '--force=no'])).toThrow('--force does not take a value');
    });

    it('should reject a bad preview size', () => {
        expect(() => parseArgs(['inspect', 'a.csv', '--rows', '0'])).toThrow('--rows must be a positive integer, got "0"');
    });
});
