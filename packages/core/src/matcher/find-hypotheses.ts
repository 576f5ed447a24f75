import type { TransactionEntry } from '../types/index.js';
import { FLAGS, MATCHING_CONFIG } from '../types/index.js';
import type { MatchableTransaction, PostingIndex } from '../clearing/posting-index.js';
import { postingWeight } from '../model/amount.js';
import { isUnknownAccount, postingDate } from '../model/posting.js';
import { matchableSubsets } from '../model/aggregate.js';
import { formatPosting } from '../journal/printer.js';
import { mergeTransactions } from './merge.js';
import type { Hypothesis, MatchOptions } from './types.js';

/**
 * Where the search looks for transactions to merge with: the clearing
 * index's ledger postings and the pending pool.
 */
export interface MatchContext {
    indexes: readonly PostingIndex[];
    options: MatchOptions;
}

type SearchState = Omit<Hypothesis, 'key'>;

function compareText(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

function stateKey(state: SearchState): string {
    const used = state.used.map(owner => owner.key).sort(compareText).join(' ');
    const postings = state.transaction.postings.map(posting => formatPosting(posting).join('\n')).sort(compareText);
    return [used, ...postings].join('\n');
}

function isLedgerState(state: SearchState): boolean {
    return state.used.some(owner => owner.origin === 'ledger');
}

/**
 * Transactions holding a posting that could pair with one of `transaction`'s
 * postings or aggregates. Unknown postings also look for the opposite
 * weight, which a transfer through an unknown account cancels against.
 */
function findCandidates(transaction: TransactionEntry, usedKeys: ReadonlySet<string>, context: MatchContext): MatchableTransaction[] {
    const { matchWindowDays, costTolerance, isCleared } = context.options;
    const found = new Map<string, MatchableTransaction>();

    for (const subset of matchableSubsets(transaction, isCleared)) {
        const weight = postingWeight(subset.posting);
        if (!weight || weight.number.isZero()) continue;
        const weights = subset.indices.length === 1 && isUnknownAccount(subset.posting.account)
            ? [weight, { ...weight, number: weight.number.negated() }]
            : [weight];
        const dates = new Set(subset.indices.map(i => postingDate(transaction, transaction.postings[i])));

        for (const date of dates) {
            for (const index of context.indexes) {
                for (const query of weights) {
                    for (const indexed of index.query(query, date, matchWindowDays, costTolerance)) {
                        const owner = indexed.owner;
                        if (usedKeys.has(owner.key) || found.has(owner.key)) continue;
                        if (owner.transaction.flag === FLAGS.PADDING) continue;
                        found.set(owner.key, owner);
                    }
                }
            }
        }
    }
    return [...found.values()];
}

function pendingOrders(hypothesis: Hypothesis): number[] {
    return hypothesis.used
        .slice(1)
        .filter(owner => owner.origin === 'pending')
        .map(owner => owner.order)
        .sort((a, b) => a - b);
}

function compareOrders(a: number[], b: number[]): number {
    const length = Math.min(a.length, b.length);
    for (let i = 0; i < length; i++) {
        if (a[i] !== b[i]) return a[i] - b[i];
    }
    return a.length - b.length;
}

/**
 * Ranking: more matched postings first, then smaller total date distance,
 * then earlier-observed pending entries, then the canonical key.
 */
export function compareHypotheses(a: Hypothesis, b: Hypothesis): number {
    return b.matchedPostings - a.matchedPostings
        || a.dateDistance - b.dateDistance
        || compareOrders(pendingOrders(a), pendingOrders(b))
        || compareText(a.key, b.key);
}

/**
 * Ranked merge hypotheses for `current`.
 *
 * Merges one more transaction at a time, depth-first, skipping states that
 * were already reached through a different order. The standalone
 * hypothesis is always present and always last.
 */
export function findHypotheses(current: MatchableTransaction, context: MatchContext): Hypothesis[] {
    const limit = context.options.maxHypotheses ?? MATCHING_CONFIG.MAX_HYPOTHESES;
    const initial: SearchState = {
        transaction: current.transaction,
        used: [current],
        matchedPostings: 0,
        dateDistance: 0,
    };
    const initialKey = stateKey(initial);
    const seen = new Set<string>([initialKey]);
    const found: Hypothesis[] = [];

    const explore = (state: SearchState): void => {
        const usedKeys = new Set(state.used.map(owner => owner.key));
        for (const other of findCandidates(state.transaction, usedKeys, context)) {
            const merges = mergeTransactions(
                state.transaction,
                isLedgerState(state),
                other.transaction,
                other.origin === 'ledger',
                context.options
            );
            for (const merge of merges) {
                if (found.length >= limit) return;
                const next: SearchState = {
                    transaction: merge.transaction,
                    used: [...state.used, other],
                    matchedPostings: state.matchedPostings + merge.pairs,
                    dateDistance: state.dateDistance + merge.dateDistance,
                };
                const key = stateKey(next);
                if (seen.has(key)) continue;
                seen.add(key);
                found.push({ key, ...next });
                explore(next);
            }
        }
    };

    explore(initial);
    found.sort(compareHypotheses);
    found.push({ key: initialKey, ...initial });
    return found;
}
