import type { Entry, TransactionEntry } from '../types/index.js';
import { FIXME_ACCOUNT } from '../types/index.js';
import { isUnknownAccount } from './posting.js';

export function stripLocation(entry: TransactionEntry): TransactionEntry;
export function stripLocation(entry: Entry): Entry;
export function stripLocation(entry: Entry): Entry {
    switch (entry.type) {
        case 'transaction': {
            const { location: _location, ...rest } = entry;
            return rest;
        }
        case 'open': {
            const { location: _location, ...rest } = entry;
            return rest;
        }
        case 'balance': {
            const { location: _location, ...rest } = entry;
            return rest;
        }
        case 'price': {
            const { location: _location, ...rest } = entry;
            return rest;
        }
    }
}

/**
 * Entry with every unknown account reset to the sentinel and no location.
 * Two imports of the same record normalize to the same text.
 */
export function resetUnknownAccounts(entry: Entry): Entry {
    if (entry.type !== 'transaction') return stripLocation(entry);
    const transaction: TransactionEntry = {
        ...stripLocation(entry),
        postings: entry.postings.map(posting =>
            isUnknownAccount(posting.account) ? { ...posting, account: FIXME_ACCOUNT } : posting
        ),
    };
    return transaction;
}

export function hasUnknownAccount(transaction: TransactionEntry): boolean {
    return transaction.postings.some(posting => isUnknownAccount(posting.account));
}
