import type { Posting, TransactionEntry } from '../types/index.js';
import { postingWeight, toDecimal, weightsEqual } from '../model/amount.js';
import { checkTransactionBalance } from '../model/balance.js';
import { stripLocation } from '../model/entry.js';
import { hasMeta, mergeMeta, metasMergeable } from '../model/meta.js';
import { matchableSubsets, type PostingSubset } from '../model/aggregate.js';
import {
    accountsMergeable,
    explicitPostingDate,
    isUnknownAccount,
    lotsCompatible,
    postingDate,
    sameCostAndPrice,
} from '../model/posting.js';
import { daysBetween } from '../utils/date.js';
import type { MatchOptions, MergeResult } from './types.js';

/** Indices into the primary and secondary posting subsets. */
type Pair = [primary: number, secondary: number];

/** Upper bound on posting matchings tried for one pair of transactions. */
const MAX_MATCHINGS = 256;

/**
 * Transactions can merge when their metadata agrees and no known-account
 * posting of one exactly reverses a posting of the other.
 */
export function isTransactionMergeable(a: TransactionEntry, b: TransactionEntry): boolean {
    if (!metasMergeable(a.meta, b.meta)) return false;
    for (const pa of a.postings) {
        if (!pa.units || isUnknownAccount(pa.account)) continue;
        for (const pb of b.postings) {
            if (!pb.units || pb.account !== pa.account || pb.units.currency !== pa.units.currency) continue;
            if (toDecimal(pa.units).negated().equals(toDecimal(pb.units)) && sameCostAndPrice(pa, pb)) {
                return false;
            }
        }
    }
    return true;
}

/**
 * Date distance between two postings that may stand for the same leg, or
 * null when they cannot be paired.
 */
export function pairDistance(
    a: TransactionEntry,
    pa: Posting,
    b: TransactionEntry,
    pb: Posting,
    options: MatchOptions
): number | null {
    if (!pa.units || !pb.units || pa.units.currency !== pb.units.currency) return null;
    const wa = postingWeight(pa);
    const wb = postingWeight(pb);
    if (!wa || !wb || wa.number.isZero() || !weightsEqual(wa, wb, options.costTolerance)) return null;
    if (!lotsCompatible(pa, pb)) return null;
    if (!accountsMergeable(pa.account, pb.account)) return null;
    if (options.isCleared(pa) && options.isCleared(pb)) return null;
    if (!metasMergeable(pa.meta, pb.meta)) return null;

    const explicitA = explicitPostingDate(pa);
    const explicitB = explicitPostingDate(pb);
    if (explicitA && explicitB && explicitA !== explicitB) return null;

    const distance = daysBetween(postingDate(a, pa), postingDate(b, pb));
    return distance <= options.matchWindowDays ? distance : null;
}

/**
 * Combine a paired posting. The primary side wins except where it is
 * unknown or missing a field.
 */
export function mergePostings(primary: Posting, other: Posting): Posting {
    const merged: Posting = {
        account: isUnknownAccount(primary.account) && !isUnknownAccount(other.account) ? other.account : primary.account,
        units: primary.units,
        meta: mergeMeta(primary.meta, other.meta),
    };
    const flag = primary.flag ?? other.flag;
    if (flag) merged.flag = flag;
    const cost = primary.cost ?? other.cost;
    if (cost) merged.cost = cost;
    const price = primary.price ?? other.price;
    if (price) merged.price = price;
    return merged;
}

function withoutAmounts(posting: Posting): Posting {
    const stripped: Posting = { account: posting.account, units: null, meta: posting.meta };
    if (posting.flag) stripped.flag = posting.flag;
    return stripped;
}

function withAmountsOf(target: Posting, source: Posting): Posting {
    const result: Posting = { account: target.account, units: source.units, meta: target.meta };
    if (target.flag) result.flag = target.flag;
    if (source.cost) result.cost = source.cost;
    if (source.price) result.price = source.price;
    return result;
}

/**
 * Date distance between an aggregate and a single posting: the largest
 * gap to any posting of the aggregate.
 */
function aggregateDistance(
    singleTransaction: TransactionEntry,
    single: Posting,
    aggregateTransaction: TransactionEntry,
    aggregate: PostingSubset,
    options: MatchOptions
): number | null {
    const ws = postingWeight(single);
    const wa = postingWeight(aggregate.posting);
    if (!ws || !wa || !weightsEqual(ws, wa, options.costTolerance)) return null;
    if (!accountsMergeable(single.account, aggregate.posting.account)) return null;

    const parts = aggregate.indices.map(i => aggregateTransaction.postings[i]);
    if (parts.some(part => !metasMergeable(single.meta, part.meta))) return null;
    // A cleared posting absorbs every part, so the parts must agree with each other too.
    if (options.isCleared(single)
        && parts.some((a, x) => parts.some((b, y) => x < y && !metasMergeable(a.meta, b.meta)))) {
        return null;
    }

    const explicit = explicitPostingDate(single);
    let distance = 0;
    for (const part of parts) {
        const partExplicit = explicitPostingDate(part);
        if (explicit && partExplicit && explicit !== partExplicit) return null;
        distance = Math.max(distance, daysBetween(postingDate(singleTransaction, single), postingDate(aggregateTransaction, part)));
    }
    return distance <= options.matchWindowDays ? distance : null;
}

/**
 * Distance between two posting subsets, or null when they cannot be
 * paired. Two aggregates never pair.
 */
function subsetDistance(
    primary: TransactionEntry,
    pu: PostingSubset,
    secondary: TransactionEntry,
    su: PostingSubset,
    options: MatchOptions
): number | null {
    if (pu.indices.length > 1 && su.indices.length > 1) return null;
    if (pu.indices.length > 1) {
        return aggregateDistance(secondary, secondary.postings[su.indices[0]], primary, pu, options);
    }
    if (su.indices.length > 1) {
        return aggregateDistance(primary, primary.postings[pu.indices[0]], secondary, su, options);
    }
    return pairDistance(primary, primary.postings[pu.indices[0]], secondary, secondary.postings[su.indices[0]], options);
}

/**
 * Postings that replace primary posting `i` of a pair.
 *
 * A cleared single posting absorbs an aggregate into one posting; an
 * uncleared one is split across the aggregate's postings.
 */
function combinePair(
    primary: TransactionEntry,
    pu: PostingSubset,
    secondary: TransactionEntry,
    su: PostingSubset,
    i: number,
    options: MatchOptions
): Posting[] {
    const posting = primary.postings[i];
    if (pu.indices.length > 1) {
        const single = secondary.postings[su.indices[0]];
        if (!options.isCleared(single)) return [mergePostings(posting, withoutAmounts(single))];
        if (i !== pu.indices[0]) return [];
        return [pu.indices.reduce(
            (result, k) => mergePostings(result, withoutAmounts(primary.postings[k])),
            mergePostings(withAmountsOf(pu.posting, single), single)
        )];
    }
    if (su.indices.length > 1) {
        const parts = su.indices.map(k => secondary.postings[k]);
        if (options.isCleared(posting)) {
            return [parts.reduce((result, part) => mergePostings(result, withoutAmounts(part)), posting)];
        }
        return parts.map(part => mergePostings(withAmountsOf(posting, part), part));
    }
    return [mergePostings(posting, secondary.postings[su.indices[0]])];
}

function union(first: readonly string[], second: readonly string[]): string[] {
    return [...new Set([...first, ...second])];
}

function mergeHeader(primary: TransactionEntry, other: TransactionEntry, postings: Posting[]): TransactionEntry {
    return {
        ...stripLocation(primary),
        payee: primary.payee ?? other.payee,
        narration: primary.narration.length > 0 ? primary.narration : other.narration,
        tags: union(primary.tags, other.tags),
        links: union(primary.links, other.links),
        meta: mergeMeta(primary.meta, other.meta),
        postings,
    };
}

function overlaps(subset: PostingSubset, taken: ReadonlySet<number>): boolean {
    return subset.indices.some(i => taken.has(i));
}

/**
 * Every non-empty set of pairs whose subsets are disjoint on both sides,
 * pairing-first so larger sets come out early.
 */
function enumerateMatchings(
    distances: Array<Array<number | null>>,
    primaryUnits: readonly PostingSubset[],
    secondaryUnits: readonly PostingSubset[]
): Pair[][] {
    const results: Pair[][] = [];
    const takenPrimary = new Set<number>();
    const takenSecondary = new Set<number>();
    const current: Pair[] = [];

    const take = (taken: Set<number>, subset: PostingSubset): void => subset.indices.forEach(i => taken.add(i));
    const release = (taken: Set<number>, subset: PostingSubset): void => subset.indices.forEach(i => taken.delete(i));

    const visit = (u: number): void => {
        if (results.length >= MAX_MATCHINGS) return;
        if (u === primaryUnits.length) {
            if (current.length > 0) results.push([...current]);
            return;
        }
        const unit = primaryUnits[u];
        if (!overlaps(unit, takenPrimary)) {
            distances[u].forEach((distance, v) => {
                const other = secondaryUnits[v];
                if (distance === null || overlaps(other, takenSecondary)) return;
                take(takenPrimary, unit);
                take(takenSecondary, other);
                current.push([u, v]);
                visit(u + 1);
                current.pop();
                release(takenSecondary, other);
                release(takenPrimary, unit);
            });
        }
        visit(u + 1);
    };

    visit(0);
    return results;
}

interface ScoredMerge extends MergeResult {
    pairKeys: Set<string>;
}

interface Sides {
    primary: TransactionEntry;
    secondary: TransactionEntry;
    primaryUnits: PostingSubset[];
    secondaryUnits: PostingSubset[];
    distances: Array<Array<number | null>>;
}

function buildMerge(sides: Sides, matching: Pair[], options: MatchOptions): ScoredMerge | null {
    const { primary, secondary, primaryUnits, secondaryUnits, distances } = sides;
    const pairOf = new Map<number, Pair>();
    for (const pair of matching) {
        for (const i of primaryUnits[pair[0]].indices) pairOf.set(i, pair);
    }
    const pairedSecondary = new Set(matching.flatMap(([, v]) => secondaryUnits[v].indices));

    // Single postings come first among the units, so unit i is posting i.
    // An unknown, metadata-free posting may be dropped if nothing left over could pair with it.
    const droppable = (posting: Posting): boolean => isUnknownAccount(posting.account) && !hasMeta(posting.meta);
    const primaryDroppable = primary.postings
        .map((posting, i) => ({ posting, i }))
        .filter(({ posting, i }) =>
            !pairOf.has(i)
            && droppable(posting)
            && secondaryUnits.every((unit, v) => overlaps(unit, pairedSecondary) || distances[i][v] === null)
        )
        .map(({ i }) => i);
    const secondaryDroppable = secondary.postings
        .map((posting, j) => ({ posting, j }))
        .filter(({ posting, j }) =>
            !pairedSecondary.has(j)
            && droppable(posting)
            && primaryUnits.every((unit, u) => unit.indices.some(i => pairOf.has(i)) || distances[u][j] === null)
        )
        .map(({ j }) => j);

    const removals: Array<[number | null, number | null]> = [
        [null, null],
        ...primaryDroppable.map((i): [number, null] => [i, null]),
        ...secondaryDroppable.map((j): [null, number] => [null, j]),
        ...primaryDroppable.flatMap(i => secondaryDroppable.map((j): [number, number] => [i, j])),
    ];

    const dateDistance = matching.reduce((sum, [u, v]) => sum + (distances[u][v] ?? 0), 0);

    for (const [dropPrimary, dropSecondary] of removals) {
        const postings: Posting[] = [];
        primary.postings.forEach((posting, i) => {
            if (i === dropPrimary) return;
            const pair = pairOf.get(i);
            if (!pair) {
                postings.push(posting);
                return;
            }
            postings.push(...combinePair(primary, primaryUnits[pair[0]], secondary, secondaryUnits[pair[1]], i, options));
        });
        secondary.postings.forEach((posting, j) => {
            if (!pairedSecondary.has(j) && j !== dropSecondary) postings.push(posting);
        });

        const transaction = mergeHeader(primary, secondary, postings);
        if (checkTransactionBalance(transaction, options.balanceEpsilon).valid) {
            return {
                transaction,
                pairs: matching.length,
                dateDistance,
                pairKeys: new Set(matching.map(([u, v]) => `${u}:${v}`)),
            };
        }
    }
    return null;
}

/**
 * Transfer through an unknown intermediary: an unknown posting cancels an
 * unknown posting of opposite weight on the other side.
 */
function mergeThroughUnknown(primary: TransactionEntry, secondary: TransactionEntry, options: MatchOptions): MergeResult | null {
    for (const [i, pp] of primary.postings.entries()) {
        const wp = postingWeight(pp);
        if (!wp || wp.number.isZero() || !isUnknownAccount(pp.account) || hasMeta(pp.meta)) continue;
        const opposite = { ...wp, number: wp.number.negated() };

        for (const [j, sp] of secondary.postings.entries()) {
            const ws = postingWeight(sp);
            if (!ws || !isUnknownAccount(sp.account) || hasMeta(sp.meta)) continue;
            if (!weightsEqual(opposite, ws, options.costTolerance)) continue;
            const distance = daysBetween(postingDate(primary, pp), postingDate(secondary, sp));
            if (distance > options.matchWindowDays) continue;

            const postings = [
                ...primary.postings.filter((_, index) => index !== i),
                ...secondary.postings.filter((_, index) => index !== j),
            ];
            const transaction = mergeHeader(primary, secondary, postings);
            if (checkTransactionBalance(transaction, options.balanceEpsilon).valid) {
                return { transaction, pairs: 1, dateDistance: distance };
            }
        }
    }
    return null;
}

/**
 * All ways of merging transaction `b` into `a`.
 *
 * The ledger side is primary when exactly one side comes from the ledger,
 * otherwise `a` is. A single posting may pair with an aggregate of the
 * other side. Results are balanced, and none is a sub-matching of another.
 *
 * PURE FUNCTION: does not mutate either transaction.
 */
export function mergeTransactions(
    a: TransactionEntry,
    aIsLedger: boolean,
    b: TransactionEntry,
    bIsLedger: boolean,
    options: MatchOptions
): MergeResult[] {
    if (!isTransactionMergeable(a, b)) return [];

    const swap = bIsLedger && !aIsLedger;
    const primary = swap ? b : a;
    const secondary = swap ? a : b;

    const primaryUnits = matchableSubsets(primary, options.isCleared);
    const secondaryUnits = matchableSubsets(secondary, options.isCleared);
    const distances = primaryUnits.map(pu =>
        secondaryUnits.map(su => subsetDistance(primary, pu, secondary, su, options))
    );
    const sides: Sides = { primary, secondary, primaryUnits, secondaryUnits, distances };

    const valid: ScoredMerge[] = [];
    for (const matching of enumerateMatchings(distances, primaryUnits, secondaryUnits)) {
        const merged = buildMerge(sides, matching, options);
        if (merged) valid.push(merged);
    }

    if (valid.length === 0) {
        const fallback = mergeThroughUnknown(primary, secondary, options);
        return fallback ? [fallback] : [];
    }

    valid.sort((x, y) => y.pairs - x.pairs);
    const kept: ScoredMerge[] = [];
    for (const merge of valid) {
        const dominated = kept.some(other => [...merge.pairKeys].every(key => other.pairKeys.has(key)));
        if (!dominated) kept.push(merge);
    }
    return kept.map(({ transaction, pairs, dateDistance }) => ({ transaction, pairs, dateDistance }));
}
