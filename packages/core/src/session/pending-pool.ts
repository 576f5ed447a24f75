import type { Entry, PendingEntry, TransactionEntry } from '../types/index.js';
import { FLAGS } from '../types/index.js';
import type { Ledger } from '../journal/ledger.js';
import { formatEntries, printEntry } from '../journal/printer.js';
import { hasUnknownAccount, resetUnknownAccounts, stripLocation } from '../model/entry.js';
import { PostingIndex, type MatchableTransaction } from '../clearing/posting-index.js';
import { generatePendingId } from '../utils/hash.js';
import type { ImportResult, SourceResults } from '../sources/types.js';

/**
 * Build a pending entry from an import result.
 * Entries read from the ledger keep their location and fold it into the id.
 */
export function makePendingEntry(result: ImportResult, source: string | null, ledgerEntry?: TransactionEntry): PendingEntry {
    const entries: Entry[] = ledgerEntry ? [ledgerEntry] : result.entries.map(entry => stripLocation(entry));
    const formatted = formatEntries(entries.map(entry => stripLocation(entry)));
    const id = generatePendingId(formatted, ledgerEntry?.location);
    return {
        id,
        date: result.date,
        source,
        entries,
        formatted,
        ...(result.info ? { info: result.info } : {}),
    };
}

/**
 * Text an entry is compared by when deciding whether it was ignored.
 */
export function ignoreKey(entry: Entry): string {
    return printEntry(resetUnknownAccounts(entry)).join('\n');
}

export interface PendingBuildResult {
    pending: PendingEntry[];
    suppressed: number;
}

/**
 * Assemble the pending pool.
 *
 * Order: source transactions by date, then balance/price groups, then ledger
 * transactions that still reference an unknown account. Imports whose
 * normalized text matches an ignored entry are dropped.
 */
export function buildPendingEntries(ledger: Ledger, ignored: Ledger, results: SourceResults): PendingBuildResult {
    const ignoredKeys = new Map<string, number>();
    for (const entry of ignored.entries) {
        const key = ignoreKey(entry);
        ignoredKeys.set(key, (ignoredKeys.get(key) ?? 0) + 1);
    }

    const isIgnored = (entries: readonly Entry[]): boolean => {
        const keys = entries.map(ignoreKey);
        const needed = new Map<string, number>();
        for (const key of keys) needed.set(key, (needed.get(key) ?? 0) + 1);
        for (const [key, count] of needed) {
            if ((ignoredKeys.get(key) ?? 0) < count) return false;
        }
        for (const [key, count] of needed) {
            ignoredKeys.set(key, (ignoredKeys.get(key) ?? 0) - count);
        }
        return true;
    };

    const transactions: PendingEntry[] = [];
    const directives: PendingEntry[] = [];
    let suppressed = 0;

    for (const { source, result } of results.pending) {
        if (isIgnored(result.entries)) {
            suppressed++;
            continue;
        }
        const pending = makePendingEntry(result, source);
        if (result.entries.every(entry => entry.type === 'transaction')) {
            transactions.push(pending);
        } else {
            directives.push(pending);
        }
    }
    transactions.sort((a, b) => a.date.localeCompare(b.date));

    const unresolved = ledger.transactions()
        .filter(transaction => transaction.flag !== FLAGS.PADDING && hasUnknownAccount(transaction))
        .map(transaction => makePendingEntry({ date: transaction.date, entries: [transaction] }, null, transaction));

    return { pending: [...transactions, ...directives, ...unresolved], suppressed };
}

/**
 * The single transaction of a pending entry, or null for any other shape.
 */
export function singleTransaction(pending: PendingEntry): TransactionEntry | null {
    if (pending.entries.length !== 1) return null;
    const entry = pending.entries[0];
    return entry.type === 'transaction' ? entry : null;
}

export function pendingTransactionKey(pending: PendingEntry): string {
    return `pending:${pending.id}`;
}

/**
 * Pending entries from sources, indexed for matching. Entries derived from
 * the ledger are already in the clearing index and are left out.
 */
export class PendingPool {
    readonly entries: readonly PendingEntry[];
    readonly index: PostingIndex;

    constructor(entries: readonly PendingEntry[], identityKeys: readonly string[]) {
        this.entries = entries;
        this.index = new PostingIndex(identityKeys);
        entries.forEach((pending, pendingIndex) => {
            const owner = this.matchable(pendingIndex);
            if (owner && pending.source !== null) {
                this.index.add(owner);
            }
        });
    }

    /**
     * Matchable form of a pending entry with a single transaction.
     */
    matchable(pendingIndex: number): MatchableTransaction | null {
        const pending = this.entries[pendingIndex];
        if (!pending) return null;
        const transaction = singleTransaction(pending);
        if (!transaction) return null;
        return {
            key: pendingTransactionKey(pending),
            transaction,
            origin: 'pending',
            pendingIndex,
            order: pendingIndex,
        };
    }
}
