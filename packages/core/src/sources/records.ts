/**
 * Entries built from already-parsed imported records.
 */

import type {
    BalanceEntry,
    ImportedBalance,
    ImportedPrice,
    ImportedRecord,
    Meta,
    PriceEntry,
    TransactionEntry,
} from '../types/index.js';
import { FIXME_ACCOUNT, FLAGS, META_KEYS } from '../types/index.js';
import type { Ledger } from '../journal/ledger.js';
import { dateMeta } from '../model/meta.js';
import { negateAmount } from '../model/amount.js';
import type { ImportResult } from './types.js';

/**
 * Two-posting transaction: the source account, cleared with `extraMeta`,
 * against the unknown account.
 */
export function makeImportTransaction(account: string, record: ImportedRecord, extraMeta: Meta): TransactionEntry {
    const units = { number: record.amount, currency: record.currency };
    const meta: Meta = { [META_KEYS.DATE]: dateMeta(record.date), ...extraMeta };
    for (const [key, value] of Object.entries(record.meta ?? {})) {
        if (meta[key] === undefined) meta[key] = value;
    }
    return {
        type: 'transaction',
        date: record.date,
        flag: FLAGS.OKAY,
        payee: record.payee ?? null,
        narration: record.description,
        tags: [],
        links: [],
        postings: [
            { account, units, meta },
            { account: FIXME_ACCOUNT, units: negateAmount(units), meta: {} },
        ],
        meta: {},
    };
}

/**
 * Balance assertions and prices not already in the ledger, grouped into a
 * single import result. Balances dedupe on (date, account, currency), prices
 * on (date, currency, quote currency).
 *
 * @returns null when nothing is new
 */
export function makeDirectivesResult(
    ledger: Ledger,
    account: string,
    balances: readonly ImportedBalance[],
    prices: readonly ImportedPrice[]
): ImportResult | null {
    const seen = new Set<string>();
    for (const entry of ledger.entries) {
        if (entry.type === 'balance') seen.add(`balance|${entry.date}|${entry.account}|${entry.amount.currency}`);
        if (entry.type === 'price') seen.add(`price|${entry.date}|${entry.currency}|${entry.amount.currency}`);
    }

    const entries: Array<BalanceEntry | PriceEntry> = [];
    for (const balance of balances) {
        const key = `balance|${balance.date}|${account}|${balance.currency}`;
        if (seen.has(key)) continue;
        seen.add(key);
        entries.push({
            type: 'balance',
            date: balance.date,
            account,
            amount: { number: balance.amount, currency: balance.currency },
            meta: {},
        });
    }
    for (const price of prices) {
        const key = `price|${price.date}|${price.currency}|${price.amount.currency}`;
        if (seen.has(key)) continue;
        seen.add(key);
        entries.push({ type: 'price', date: price.date, currency: price.currency, amount: price.amount, meta: {} });
    }

    if (entries.length === 0) return null;
    entries.sort((a, b) => a.date.localeCompare(b.date));
    return { date: entries[0].date, entries };
}
