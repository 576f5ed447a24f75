import Decimal from 'decimal.js';
import type { Posting, TransactionEntry } from '../types/index.js';
import { postingWeight, weightKey, weightsEqual, type Weight } from '../model/amount.js';
import { metaValueText } from '../model/meta.js';
import { postingDate } from '../model/posting.js';
import { aggregatePostings } from '../model/aggregate.js';
import { dateWindow, daysBetween } from '../utils/date.js';

/**
 * A transaction that takes part in matching.
 * `order` is the observation order used to break ranking ties.
 */
export interface MatchableTransaction {
    key: string;
    transaction: TransactionEntry;
    origin: 'ledger' | 'pending';
    pendingIndex: number | null;
    order: number;
}

export interface IndexedPosting {
    owner: MatchableTransaction;
    postingIndex: number;
    posting: Posting;
    weight: Weight;
    date: string;
}

/**
 * Postings indexed by (date, weight) and by identity metadata. Aggregate
 * subsets are indexed by weight too.
 */
export class PostingIndex {
    private readonly byDateWeight = new Map<string, IndexedPosting[]>();
    private readonly byIdentity = new Map<string, IndexedPosting[]>();
    private readonly costPostings: IndexedPosting[] = [];
    private readonly identityKeys: readonly string[];
    private readonly owners = new Map<string, MatchableTransaction>();

    constructor(identityKeys: readonly string[]) {
        this.identityKeys = identityKeys;
    }

    get size(): number {
        return this.owners.size;
    }

    get(key: string): MatchableTransaction | undefined {
        return this.owners.get(key);
    }

    add(owner: MatchableTransaction): void {
        this.owners.set(owner.key, owner);
        owner.transaction.postings.forEach((posting, postingIndex) => {
            const weight = postingWeight(posting);
            if (!weight || weight.number.isZero()) return;
            const indexed: IndexedPosting = {
                owner,
                postingIndex,
                posting,
                weight,
                date: postingDate(owner.transaction, posting),
            };
            if (weight.fromCost) {
                this.costPostings.push(indexed);
            } else {
                push(this.byDateWeight, `${indexed.date}|${weightKey(weight)}`, indexed);
            }
            for (const key of this.identityKeys) {
                const value = posting.meta[key];
                if (value !== undefined) {
                    push(this.byIdentity, `${key}|${metaValueText(value)}`, indexed);
                }
            }
        });

        // Aggregates are found under the date of each of their postings.
        const { transaction } = owner;
        for (const aggregate of aggregatePostings(transaction)) {
            const weight = postingWeight(aggregate.posting);
            if (!weight) continue;
            const dates = new Set(aggregate.indices.map(i => postingDate(transaction, transaction.postings[i])));
            for (const date of dates) {
                push(this.byDateWeight, `${date}|${weightKey(weight)}`, {
                    owner,
                    postingIndex: aggregate.indices[0],
                    posting: aggregate.posting,
                    weight,
                    date,
                });
            }
        }
    }

    /**
     * Postings with an equal weight dated within `windowDays` of `date`,
     * nearest date first, then in insertion order.
     */
    query(weight: Weight, date: string, windowDays: number, costTolerance: Decimal): IndexedPosting[] {
        const found: IndexedPosting[] = [];
        if (!weight.fromCost) {
            const key = weightKey(weight);
            for (const day of dateWindow(date, windowDays)) {
                found.push(...(this.byDateWeight.get(`${day}|${key}`) ?? []));
            }
        }
        for (const indexed of this.costPostings) {
            if (daysBetween(indexed.date, date) <= windowDays && weightsEqual(indexed.weight, weight, costTolerance)) {
                found.push(indexed);
            }
        }
        if (weight.fromCost) {
            // exact-weight postings can still match a cost-derived weight within tolerance
            for (const list of this.byDateWeight.values()) {
                for (const indexed of list) {
                    if (daysBetween(indexed.date, date) <= windowDays && weightsEqual(indexed.weight, weight, costTolerance)) {
                        found.push(indexed);
                    }
                }
            }
        }
        return found
            .map((indexed, position) => ({ indexed, position, distance: daysBetween(indexed.date, date) }))
            .sort((a, b) => a.distance - b.distance || a.position - b.position)
            .map(({ indexed }) => indexed);
    }

    hasIdentity(key: string, value: string): boolean {
        return this.byIdentity.has(`${key}|${value}`);
    }

    identityGroups(): Array<{ key: string; value: string; postings: IndexedPosting[] }> {
        return [...this.byIdentity.entries()].map(([composite, postings]) => {
            const separator = composite.indexOf('|');
            return { key: composite.slice(0, separator), value: composite.slice(separator + 1), postings };
        });
    }
}

function push<T>(map: Map<string, T[]>, key: string, value: T): void {
    const list = map.get(key);
    if (list) {
        list.push(value);
    } else {
        map.set(key, [value]);
    }
}
