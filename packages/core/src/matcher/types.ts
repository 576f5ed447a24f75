import type Decimal from 'decimal.js';
import type { Posting, TransactionEntry } from '../types/index.js';
import type { MatchableTransaction } from '../clearing/posting-index.js';

/**
 * Options for the merge search.
 */
export interface MatchOptions {
    matchWindowDays: number;
    costTolerance: Decimal;
    balanceEpsilon: Decimal;
    /** True when the posting is already confirmed by its source or marked `cleared`. */
    isCleared: (posting: Posting) => boolean;
    maxHypotheses?: number;
}

/**
 * One way of merging two transactions.
 * `pairs` counts matched posting pairs; `dateDistance` sums their date gaps.
 */
export interface MergeResult {
    transaction: TransactionEntry;
    pairs: number;
    dateDistance: number;
}

/**
 * A merge of the current transaction with zero or more others.
 *
 * `used` always starts with the current transaction. `key` is canonical:
 * equal keys mean the same transactions merged into the same postings.
 */
export interface Hypothesis {
    key: string;
    transaction: TransactionEntry;
    used: MatchableTransaction[];
    matchedPostings: number;
    dateDistance: number;
}
