import { describe, it, expect } from 'vitest';
import { DescriptionSource } from '../../src/sources/description-source.js';
import { createSourceResults } from '../../src/sources/types.js';
import { Ledger } from '../../src/journal/ledger.js';
import { posting, record, transaction } from '../helpers.js';

const JOURNAL = [
    '2016-08-12 * "Shop"',
    '  Assets:Checking  -5.00 USD',
    '    source_desc: "SHOP"',
    '  Expenses:Misc  5 USD',
    '',
    '2016-08-20 * "Twice"',
    '  Assets:Checking  -9 USD',
    '    source_desc: "DUP"',
    '  Expenses:Misc  9 USD',
    '',
    '2016-08-20 * "Twice"',
    '  Assets:Checking  -9 USD',
    '    source_desc: "DUP"',
    '  Expenses:Misc  9 USD',
    '',
].join('\n');

function prepare(source: DescriptionSource) {
    const results = createSourceResults();
    const ledger = Ledger.fromTexts({ 'journal.beancount': JOURNAL });
    source.prepare({ ledger, hasIdentity: () => false }, results);
    return results;
}

describe('DescriptionSource', () => {
    const source = new DescriptionSource({
        name: 'checking',
        account: 'Assets:Checking',
        records: {
            transactions: [
                record('2016-08-12', '-5', 'SHOP'),
                record('2016-08-12', '-5', 'SHOP'),
                record('2016-08-14', '-7.50', 'CAFE', { payee: 'Cafe' }),
                record('2016-08-20', '-9', 'DUP'),
            ],
            balances: [{ date: '2016-08-31', amount: '100', currency: 'USD' }],
            prices: [],
        },
    });

    it('imports only records the ledger has not claimed', () => {
        const results = prepare(source);
        const transactions = results.pending.filter(p => p.result.entries[0].type === 'transaction');
        expect(transactions.map(p => p.result.info?.description)).toEqual(['SHOP', 'CAFE']);
        expect(results.accounts).toEqual(new Set(['Assets:Checking']));
    });

    it('builds a two-posting import against the unknown account', () => {
        const cafe = prepare(source).pending[1].result;
        expect(cafe.entries).toEqual([{
            type: 'transaction',
            date: '2016-08-14',
            flag: '*',
            payee: 'Cafe',
            narration: 'CAFE',
            tags: [],
            links: [],
            postings: [
                {
                    account: 'Assets:Checking',
                    units: { number: '-7.50', currency: 'USD' },
                    meta: { date: { kind: 'date', value: '2016-08-14' }, source_desc: 'CAFE' },
                },
                { account: 'Expenses:FIXME', units: { number: '7.50', currency: 'USD' }, meta: {} },
            ],
            meta: {},
        }]);
    });

    it('groups new balance assertions into one result', () => {
        const last = prepare(source).pending.at(-1);
        expect(last?.result).toEqual({
            date: '2016-08-31',
            entries: [{ type: 'balance', date: '2016-08-31', account: 'Assets:Checking', amount: { number: '100', currency: 'USD' }, meta: {} }],
        });
    });

    it('reports ledger claims beyond the records', () => {
        expect(prepare(source).invalidReferences).toEqual([{
            source: 'checking',
            account: 'Assets:Checking',
            description: '2016-08-20 -9 USD DUP',
            extras: 1,
            locations: [
                { filename: 'journal.beancount', line: 6 },
                { filename: 'journal.beancount', line: 11 },
            ],
        }]);
    });

    it('treats source_desc as clearing and as a training feature', () => {
        const cleared = posting('Assets:Checking', '-5 USD', { source_desc: 'SHOP' });
        expect(source.isPostingCleared(cleared)).toBe(true);
        expect(source.isPostingCleared(posting('Assets:Checking', '-5 USD'))).toBe(false);
        const txn = transaction('2016-08-12', 'Shop', [cleared]);
        expect(source.exampleKeyValuePairs(txn, cleared)).toEqual({ desc: 'SHOP' });
        expect(source.exampleKeyValuePairs(txn, posting('Assets:Other', '-5 USD', { source_desc: 'SHOP' }))).toEqual({});
    });
});
