import { describe, it, expect } from 'vitest';
import * as XLSX from 'xlsx';
import { parseTransactionFile, parseAmount, findMissingColumns } from '../../src/parser/transaction-file.js';
import { ReadError, SchemaError } from '../../src/errors.js';

describe('parseTransactionFile', () => {
    function createFile(rows: unknown[][], bookType: XLSX.BookType = 'csv'): ArrayBuffer {
        const ws = XLSX.utils.aoa_to_sheet(rows);
        const wb = XLSX.utils.book_new();
        XLSX.utils.book_append_sheet(wb, ws, 'Sheet1');
        return XLSX.write(wb, { type: 'array', bookType });
    }

    const HEADER = ['std_date', 'std_desc', 'std_amt'];

    it('parses canonical rows', () => {
        const data = createFile([
            HEADER,
            ['2025-01-10', 'STRIPE PAYOUT', '500.00'],
            ['01/12/2025', '  WIRE FEE  ', '-1,250.00'],
        ]);

        const result = parseTransactionFile(data, 'bank', 'bank.csv');

        expect(result.rows).toEqual([
            { date: '2025-01-10', description: 'STRIPE PAYOUT', signed_amount: '500' },
            { date: '2025-01-12', description: 'WIRE FEE', signed_amount: '-1250' },
        ]);
        expect(result.warnings).toEqual([]);
    });

    it('keeps a blank description as an empty string', () => {
        const data = createFile([HEADER, ['2025-01-10', '', '10.50']]);

        const result = parseTransactionFile(data, 'ledger', 'ledger.csv');

        expect(result.rows).toEqual([{ date: '2025-01-10', description: '', signed_amount: '10.5' }]);
    });

    it('returns no rows for a header-only file', () => {
        const data = createFile([HEADER]);

        expect(parseTransactionFile(data, 'ledger', 'ledger.csv').rows).toEqual([]);
    });

    it('warns about extra columns', () => {
        const data = createFile([
            ['std_date', 'std_desc', 'std_amt', 'memo'],
            ['2025-01-10', 'DEPOSIT', '1', 'x'],
        ]);

        const result = parseTransactionFile(data, 'bank', 'bank.csv');

        expect(result.rows).toHaveLength(1);
        expect(result.warnings).toEqual(['bank.csv: ignored extra columns: memo']);
    });

    it('reads the first sheet of an xlsx workbook', () => {
        const data = createFile([HEADER, ['2025-01-10', 'DEPOSIT', '42.00']], 'xlsx');

        const result = parseTransactionFile(data, 'bank', 'bank.xlsx');

        expect(result.rows).toEqual([{ date: '2025-01-10', description: 'DEPOSIT', signed_amount: '42' }]);
    });

    it('converts numeric cells from a workbook', () => {
        const data = createFile([HEADER, [45667, 'DEPOSIT', -19.99]], 'xlsx');

        const result = parseTransactionFile(data, 'ledger', 'ledger.xlsx');

        expect(result.rows).toEqual([{ date: '2025-01-10', description: 'DEPOSIT', signed_amount: '-19.99' }]);
    });

    it('rejects a file without a header row', () => {
        const data = createFile([], 'xlsx');

        expect(() => parseTransactionFile(data, 'ledger', 'ledger.xlsx'))
            .toThrow('Could not read ledger.xlsx: no header row found');
    });

    it('rejects a file missing a canonical column', () => {
        const data = createFile([['std_date', 'std_amt'], ['2025-01-10', '1']]);

        try {
            parseTransactionFile(data, 'bank', 'bank.csv');
            expect.unreachable();
        } catch (err) {
            expect(err).toBeInstanceOf(ReadError);
            if (err instanceof ReadError) {
                expect(err.message).toBe(
                    'Could not read bank.csv: missing required columns: std_desc. Found: std_date, std_amt'
                );
                expect(err.source).toBe('bank');
            }
        }
    });

    it('rejects a blank amount', () => {
        const data = createFile([HEADER, ['2025-01-10', 'DEPOSIT', '1'], ['2025-01-11', 'DEPOSIT', ' ']]);

        expect(() => parseTransactionFile(data, 'ledger', 'ledger.csv'))
            .toThrow('The ledger input, row 2: field "std_amt" is missing');
    });

    it('rejects an unreadable date', () => {
        const data = createFile([HEADER, ['next tuesday', 'DEPOSIT', '1']]);

        expect(() => parseTransactionFile(data, 'bank', 'bank.csv')).toThrow(SchemaError);
        expect(() => parseTransactionFile(data, 'bank', 'bank.csv'))
            .toThrow('The bank input, row 1: field "std_date" is not a valid date: "next tuesday"');
    });

    it('rejects an amount that is not a number', () => {
        const data = createFile([HEADER, ['2025-01-10', 'DEPOSIT', 'n/a']]);

        expect(() => parseTransactionFile(data, 'bank', 'bank.csv'))
            .toThrow('The bank input, row 1: field "std_amt" is not a valid amount: "n/a"');
    });

    it('rejects a hex amount', () => {
        const data = createFile([HEADER, ['2025-01-10', 'A', '0x10']]);

        expect(() => parseTransactionFile(data, 'bank', 'bank.csv')).toThrow(SchemaError);
        expect(() => parseTransactionFile(data, 'bank', 'bank.csv'))
            .toThrow('The bank input, row 1: field "std_amt" is not a valid amount: "0x10"');
    });
});

describe('parseAmount', () => {
    it('strips thousands separators and spaces', () => {
        expect(parseAmount(' 12,345.60 ')?.toFixed()).toBe('12345.6');
    });

    it('accepts numbers', () => {
        expect(parseAmount(-3.5)?.toFixed()).toBe('-3.5');
    });

    it('returns null for text', () => {
        expect(parseAmount('abc')).toBeNull();
    });

    it('returns null for infinity', () => {
        expect(parseAmount('Infinity')).toBeNull();
    });

    it('returns null for hex, binary and octal literals', () => {
        expect(parseAmount('0x10')).toBeNull();
        expect(parseAmount('0b101')).toBeNull();
        expect(parseAmount('0o17')).toBeNull();
    });

    it('accepts exponent notation', () => {
        expect(parseAmount('1.5e3')?.toFixed()).toBe('1500');
    });
});

describe('findMissingColumns', () => {
    it('lists absent columns in canonical order', () => {
        expect(findMissingColumns(['std_desc'])).toEqual(['std_date', 'std_amt']);
    });

    it('is empty for a complete header', () => {
        expect(findMissingColumns(['std_amt', 'std_date', 'std_desc', 'extra'])).toEqual([]);
    });
});
