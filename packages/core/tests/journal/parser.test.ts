import { describe, it, expect } from 'vitest';
import { parseJournal, parseMetaValue } from '../../src/journal/parser.js';

const JOURNAL = [
    'option "title" "Household"',
    'include "prices.beancount"',
    '',
    '2016-01-01 open Liabilities:Credit-Card USD',
    '',
    '2016-08-10 * "STARBUCKS" "Coffee" #food ^trip',
    '  note: "morning"',
    '  Liabilities:Credit-Card  -2.45 USD ; card',
    '    date: 2016-08-10',
    '  Expenses:Coffee',
    '',
    '2016-08-12 note Liabilities:Credit-Card "called the bank"',
    '',
].join('\n');

describe('parseJournal', () => {
    const parsed = parseJournal('journal.beancount', JOURNAL);

    it('reads open directives and transactions', () => {
        expect(parsed.errors).toEqual([]);
        expect(parsed.entries).toHaveLength(2);
        expect(parsed.entries[0]).toEqual({
            type: 'open',
            date: '2016-01-01',
            account: 'Liabilities:Credit-Card',
            currencies: ['USD'],
            meta: {},
            location: { filename: 'journal.beancount', line: 4 },
        });
    });

    it('reads the transaction header, metadata and postings', () => {
        expect(parsed.entries[1]).toEqual({
            type: 'transaction',
            date: '2016-08-10',
            flag: '*',
            payee: 'STARBUCKS',
            narration: 'Coffee',
            tags: ['food'],
            links: ['trip'],
            meta: { note: 'morning' },
            postings: [
                {
                    account: 'Liabilities:Credit-Card',
                    units: { number: '-2.45', currency: 'USD' },
                    meta: { date: { kind: 'date', value: '2016-08-10' } },
                },
                { account: 'Expenses:Coffee', units: null, meta: {} },
            ],
            location: { filename: 'journal.beancount', line: 6 },
        });
    });

    it('records dated directive spans, including ones it does not model', () => {
        expect(parsed.directives).toEqual([
            { date: '2016-01-01', startLine: 3, endLine: 4 },
            { date: '2016-08-10', startLine: 5, endLine: 10 },
            { date: '2016-08-12', startLine: 11, endLine: 12 },
        ]);
    });

    it('collects includes', () => {
        expect(parsed.includes).toEqual(['prices.beancount']);
    });

    it('reads costs and prices', () => {
        const result = parseJournal('j', [
            '2020-01-02 * "Buy"',
            '  Assets:Brokerage  10 VTI {150.25 USD, 2020-01-02, "first"}',
            '  Assets:Cash  1,000.50 EUR @ 1.10 USD',
        ].join('\n'));
        const entry = result.entries[0];
        expect(entry.type === 'transaction' && entry.postings).toEqual([
            {
                account: 'Assets:Brokerage',
                units: { number: '10', currency: 'VTI' },
                cost: { number: '150.25', currency: 'USD', date: '2020-01-02', label: 'first' },
                meta: {},
            },
            {
                account: 'Assets:Cash',
                units: { number: '1000.50', currency: 'EUR' },
                price: { number: '1.10', currency: 'USD' },
                meta: {},
            },
        ]);
    });

    it('reports a malformed entry and keeps parsing', () => {
        const result = parseJournal('j', [
            '2016-08-11 * "Bad"',
            '  Expenses:Coffee  abc USD',
            '',
            '2016-08-12 balance Liabilities:Credit-Card  -2.45 USD',
        ].join('\n'));
        expect(result.errors).toEqual([
            { severity: 'error', message: 'Invalid posting amount: abc USD', filename: 'j', line: 1 },
        ]);
        expect(result.entries.map(entry => entry.type)).toEqual(['balance']);
        expect(result.directives).toHaveLength(2);
    });

    it('reports an invalid calendar date', () => {
        const result = parseJournal('j', '2016-02-30 open Assets:Checking\n');
        expect(result.errors).toEqual([
            { severity: 'error', message: 'Invalid date: 2016-02-30', filename: 'j', line: 1 },
        ]);
    });
});

describe('parseMetaValue', () => {
    it('distinguishes the value kinds', () => {
        expect(parseMetaValue('"12"')).toBe('12');
        expect(parseMetaValue('TRUE')).toBe(true);
        expect(parseMetaValue('2016-08-10')).toEqual({ kind: 'date', value: '2016-08-10' });
        expect(parseMetaValue('12.5')).toEqual({ kind: 'number', value: '12.5' });
        expect(parseMetaValue('USD')).toBe('USD');
    });
});
