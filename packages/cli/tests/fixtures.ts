import { mkdirSync, mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';

export const CARD_RECORDS = [
    { date: '2016-08-01', amount: '-2.45', currency: 'USD', description: 'STARBUCKS' },
    { date: '2016-08-10', amount: '-3.10', currency: 'USD', description: 'STARBUCKS' },
    { date: '2016-08-12', amount: '-7.00', currency: 'USD', description: 'CORNER STORE' },
];

export const JOURNAL = [
    'include "accounts.beancount"',
    '',
    '2016-08-01 * "Coffee"',
    '  Liabilities:Credit-Card  -2.45 USD',
    '    source_desc: "STARBUCKS"',
    '  Expenses:Coffee  2.45 USD',
    '',
].join('\n');

export const ACCOUNTS = [
    '2016-01-01 open Liabilities:Credit-Card USD',
    '2016-01-01 open Expenses:Coffee USD',
    '',
].join('\n');

export const CONFIG = [
    'journal: journal.beancount',
    'ignored: ignored.beancount',
    'classifier_cache: cache/classifier.json',
    'sources:',
    '  - kind: description',
    '    name: card',
    '    account: Liabilities:Credit-Card',
    '    records: imports/card.json',
    '',
].join('\n');

/**
 * Writes `files` into a fresh temporary directory and returns its path.
 */
export function createWorkspace(files: Record<string, string>): string {
    const root = mkdtempSync(join(tmpdir(), 'ledger-reconcile-'));
    for (const [name, content] of Object.entries(files)) {
        const path = join(root, name);
        mkdirSync(dirname(path), { recursive: true });
        writeFileSync(path, content, 'utf-8');
    }
    return root;
}

export function standardWorkspace(): string {
    return createWorkspace({
        'reconcile.yaml': CONFIG,
        'journal.beancount': JOURNAL,
        'accounts.beancount': ACCOUNTS,
        'imports/card.json': JSON.stringify(CARD_RECORDS),
    });
}
