import type { Posting, TransactionEntry } from '../types/index.js';
import { FIXME_ACCOUNT, FIXME_ACCOUNT_PREFIX, META_KEYS } from '../types/index.js';
import { metaDate } from './meta.js';

/**
 * True for the sentinel account and its grouped `Expenses:FIXME:<suffix>` form.
 */
export function isUnknownAccount(account: string): boolean {
    return account === FIXME_ACCOUNT || account.startsWith(FIXME_ACCOUNT_PREFIX);
}

/**
 * Group number of each unknown posting, in posting order. Every
 * `Expenses:FIXME` posting is its own group; postings to the same
 * `Expenses:FIXME:<suffix>` account share one.
 */
export function unknownGroupNumbers(postings: readonly Posting[]): number[] {
    const named = new Map<string, number>();
    const numbers: number[] = [];
    let next = 0;
    for (const posting of postings) {
        if (!isUnknownAccount(posting.account)) continue;
        if (posting.account === FIXME_ACCOUNT) {
            numbers.push(next++);
            continue;
        }
        let group = named.get(posting.account);
        if (group === undefined) {
            group = next++;
            named.set(posting.account, group);
        }
        numbers.push(group);
    }
    return numbers;
}

/**
 * Accounts are mergeable if equal or if either is unknown.
 */
export function accountsMergeable(a: string, b: string): boolean {
    return a === b || isUnknownAccount(a) || isUnknownAccount(b);
}

/**
 * Effective date of a posting: its `date` metadata, else
 * `transaction_date`, else the transaction date.
 */
export function postingDate(transaction: TransactionEntry, posting: Posting): string {
    return metaDate(posting.meta, META_KEYS.DATE)
        ?? metaDate(posting.meta, META_KEYS.TRANSACTION_DATE)
        ?? transaction.date;
}

/**
 * Explicit `date` metadata, if any. Two postings with explicit dates only
 * match when the dates are equal.
 */
export function explicitPostingDate(posting: Posting): string | null {
    return metaDate(posting.meta, META_KEYS.DATE);
}

/**
 * `cleared: TRUE` marks a posting cleared regardless of source.
 */
export function isMarkedCleared(posting: Posting): boolean {
    return posting.meta[META_KEYS.CLEARED] === true;
}

/**
 * Sets of cost/price are equal, ignoring units.
 */
export function sameCostAndPrice(a: Posting, b: Posting): boolean {
    const costA = a.cost ? `${a.cost.number} ${a.cost.currency} ${a.cost.date ?? ''} ${a.cost.label ?? ''}` : '';
    const costB = b.cost ? `${b.cost.number} ${b.cost.currency} ${b.cost.date ?? ''} ${b.cost.label ?? ''}` : '';
    const priceA = a.price ? `${a.price.number} ${a.price.currency}` : '';
    const priceB = b.price ? `${b.price.number} ${b.price.currency}` : '';
    return costA === costB && priceA === priceB;
}

/**
 * Lots are compatible when cost currencies agree and date/label agree where
 * both sides specify them.
 */
export function lotsCompatible(a: Posting, b: Posting): boolean {
    if (!a.cost || !b.cost) return true;
    if (a.cost.currency !== b.cost.currency) return false;
    if (a.cost.date && b.cost.date && a.cost.date !== b.cost.date) return false;
    if (a.cost.label && b.cost.label && a.cost.label !== b.cost.label) return false;
    return true;
}
