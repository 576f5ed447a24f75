import Decimal from 'decimal.js';
import type { Posting, TransactionEntry } from '../types/index.js';
import { MATCHING_CONFIG } from '../types/index.js';
import { formatDecimal, toDecimal } from './amount.js';

/**
 * Postings of one transaction that match as a unit. A single posting has
 * one index; an aggregate has several, and `posting` then carries their
 * common account and summed units.
 */
export interface PostingSubset {
    indices: number[];
    posting: Posting;
}

function combinations(items: readonly number[], size: number): number[][] {
    if (size === 0) return [[]];
    const result: number[][] = [];
    items.forEach((item, i) => {
        for (const rest of combinations(items.slice(i + 1), size - 1)) {
            result.push([item, ...rest]);
        }
    });
    return result;
}

/**
 * Subsets of two or more postings that may stand for one posting of
 * another transaction.
 *
 * Postings in a subset share account, currency and sign, carry units with
 * no cost or price, and are not cleared. Subsets hold at most
 * `MAX_AGGREGATE_POSTINGS` postings; a larger group is also offered whole.
 */
export function aggregatePostings(
    transaction: TransactionEntry,
    isCleared: (posting: Posting) => boolean = () => false
): PostingSubset[] {
    const groups = new Map<string, { account: string; currency: string; indices: number[] }>();
    transaction.postings.forEach((posting, i) => {
        if (!posting.units || posting.cost || posting.price || isCleared(posting)) return;
        const number = toDecimal(posting.units);
        if (number.isZero()) return;
        const key = `${posting.account}|${posting.units.currency}|${number.isNegative() ? '-' : '+'}`;
        const group = groups.get(key);
        if (group) {
            group.indices.push(i);
        } else {
            groups.set(key, { account: posting.account, currency: posting.units.currency, indices: [i] });
        }
    });

    const maxSize = MATCHING_CONFIG.MAX_AGGREGATE_POSTINGS;
    const subsets: PostingSubset[] = [];
    for (const { account, currency, indices } of groups.values()) {
        if (indices.length < 2) continue;
        const chosen = indices.length > maxSize ? [indices] : [];
        for (let size = 2; size <= Math.min(indices.length, maxSize); size++) {
            chosen.push(...combinations(indices, size));
        }
        for (const subset of chosen) {
            const total = subset.reduce((sum, i) => {
                const units = transaction.postings[i].units;
                return units ? sum.plus(toDecimal(units)) : sum;
            }, new Decimal(0));
            subsets.push({
                indices: subset,
                posting: { account, units: { number: formatDecimal(total), currency }, meta: {} },
            });
        }
    }
    return subsets;
}

/**
 * Every single posting, in order, followed by the aggregates.
 */
export function matchableSubsets(
    transaction: TransactionEntry,
    isCleared: (posting: Posting) => boolean = () => false
): PostingSubset[] {
    return [
        ...transaction.postings.map((posting, i): PostingSubset => ({ indices: [i], posting })),
        ...aggregatePostings(transaction, isCleared),
    ];
}
