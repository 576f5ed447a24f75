import type { Meta, Posting, TransactionEntry } from '../src/types/index.js';
import { DescriptionSource } from '../src/sources/description-source.js';
import type { ImportedRecord } from '../src/types/index.js';

export function posting(account: string, amount: string | null, meta: Meta = {}): Posting {
    if (amount === null) return { account, units: null, meta };
    const [number, currency] = amount.split(' ');
    return { account, units: { number, currency }, meta };
}

export function transaction(date: string, narration: string, postings: Posting[], overrides: Partial<TransactionEntry> = {}): TransactionEntry {
    return {
        type: 'transaction',
        date,
        flag: '*',
        payee: null,
        narration,
        tags: [],
        links: [],
        postings,
        meta: {},
        ...overrides,
    };
}

export function record(date: string, amount: string, description: string, overrides: Partial<ImportedRecord> = {}): ImportedRecord {
    return { date, amount, currency: 'USD', description, ...overrides };
}

export function descriptionSource(name: string, account: string, records: ImportedRecord[] = []): DescriptionSource {
    return new DescriptionSource({ name, account, records: { transactions: records, balances: [], prices: [] } });
}

export const ENGINE_CONFIG = {
    output: { defaultOutput: 'journal.beancount' },
};
