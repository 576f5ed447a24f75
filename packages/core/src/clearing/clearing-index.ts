import type {
    InvalidReference,
    JournalError,
    Location,
    TransactionEntry,
    UnclearedPosting,
} from '../types/index.js';
import { FLAGS, META_KEYS } from '../types/index.js';
import type { Ledger } from '../journal/ledger.js';
import type { SourceCapabilities } from '../sources/types.js';
import { metaDate } from '../model/meta.js';
import { isMarkedCleared, postingDate } from '../model/posting.js';
import { toDecimal } from '../model/amount.js';
import { daysBetween } from '../utils/date.js';
import { PostingIndex, type MatchableTransaction } from './posting-index.js';

interface ClearedBounds {
    before: string | null;
    after: string | null;
}

interface LocatedUncleared extends UnclearedPosting {
    position: number;
}

/**
 * Key of a ledger transaction in the posting indexes.
 */
export function ledgerTransactionKey(transaction: TransactionEntry): string {
    const location = transaction.location;
    if (!location) {
        throw new Error(`Ledger transaction dated ${transaction.date} has no location`);
    }
    return `ledger:${location.filename}:${location.line}`;
}

function compareLocations(a: Location | undefined, b: Location | undefined): number {
    if (!a || !b) return 0;
    return a.filename.localeCompare(b.filename) || a.line - b.line;
}

/**
 * Index over the ledger's postings.
 *
 * Answers which postings to source-owned accounts are uncleared, whether an
 * external identity has already been recorded, and which postings carry a
 * given weight near a given date.
 */
export class ClearingIndex {
    readonly postings: PostingIndex;
    readonly identityKeys: readonly string[];
    readonly errors: JournalError[] = [];

    private readonly sources: readonly SourceCapabilities[];
    private readonly unclearedPostings: LocatedUncleared[] = [];
    private readonly transactionsByKey = new Map<string, MatchableTransaction>();

    private constructor(sources: readonly SourceCapabilities[], identityKeys: readonly string[]) {
        this.sources = sources;
        this.identityKeys = identityKeys;
        this.postings = new PostingIndex(identityKeys);
    }

    /**
     * Build the index from a ledger snapshot. Identity keys are collected from
     * the sources, plus `check`.
     */
    static build(ledger: Ledger, sources: readonly SourceCapabilities[]): ClearingIndex {
        const identityKeys = [...new Set([META_KEYS.CHECK, ...sources.flatMap(source => source.identityKeys)])].sort();
        const index = new ClearingIndex(sources, identityKeys);
        const bounds = index.collectClearedBounds(ledger);

        ledger.transactions().forEach((transaction, order) => {
            const owner: MatchableTransaction = {
                key: ledgerTransactionKey(transaction),
                transaction,
                origin: 'ledger',
                pendingIndex: null,
                order,
            };
            index.transactionsByKey.set(owner.key, owner);
            index.postings.add(owner);
            index.collectUncleared(transaction, order, bounds);
        });

        index.unclearedPostings.sort((a, b) => a.date.localeCompare(b.date) || a.position - b.position);
        return index;
    }

    /**
     * The matchable form of a ledger transaction.
     */
    transaction(key: string): MatchableTransaction | undefined {
        return this.transactionsByKey.get(key);
    }

    sourceFor(account: string): SourceCapabilities | undefined {
        return this.sources.find(source => source.isMine(account));
    }

    /**
     * Uncleared postings to `account` dated within `windowDays` of `date`,
     * ordered by date then ledger position.
     */
    lookupUncleared(account: string, date: string, windowDays: number): UnclearedPosting[] {
        return this.unclearedPostings
            .filter(p => p.account === account && daysBetween(p.date, date) <= windowDays)
            .map(stripPosition);
    }

    hasIdentity(key: string, value: string): boolean {
        return this.postings.hasIdentity(key, value);
    }

    /**
     * Every uncleared posting to a source-owned account.
     */
    uncleared(): UnclearedPosting[] {
        return this.unclearedPostings.map(stripPosition);
    }

    /**
     * Identity values recorded on more than one posting of the same account.
     */
    invalidReferences(): InvalidReference[] {
        const result: InvalidReference[] = [];
        for (const group of this.postings.identityGroups()) {
            const byAccount = new Map<string, Location[]>();
            for (const indexed of group.postings) {
                const location = indexed.owner.transaction.location;
                if (!location) continue;
                const list = byAccount.get(indexed.posting.account) ?? [];
                list.push(location);
                byAccount.set(indexed.posting.account, list);
            }
            for (const [account, locations] of byAccount) {
                if (locations.length < 2) continue;
                result.push({
                    source: this.sourceFor(account)?.name ?? '',
                    account,
                    description: `${group.key}: ${group.value}`,
                    extras: locations.length - 1,
                    locations: [...locations].sort(compareLocations),
                });
            }
        }
        return result.sort((a, b) => a.account.localeCompare(b.account) || a.description.localeCompare(b.description));
    }

    /**
     * `cleared_before` / `cleared_after` per opened account, inherited from
     * ancestors. The latest `before` and the earliest `after` win.
     */
    private collectClearedBounds(ledger: Ledger): Map<string, ClearedBounds> {
        const own = new Map<string, ClearedBounds>();
        for (const [account, open] of ledger.openAccounts) {
            const bound: ClearedBounds = { before: null, after: null };
            for (const [key, field] of [[META_KEYS.CLEARED_BEFORE, 'before'], [META_KEYS.CLEARED_AFTER, 'after']] as const) {
                if (open.meta[key] === undefined) continue;
                const date = metaDate(open.meta, key);
                if (date === null) {
                    this.errors.push({
                        severity: 'error',
                        message: `${key} on ${account} must be a date`,
                        filename: open.location?.filename,
                        line: open.location?.line,
                    });
                    continue;
                }
                bound[field] = date;
            }
            own.set(account, bound);
        }
        return own;
    }

    private boundsFor(account: string, own: Map<string, ClearedBounds>): ClearedBounds {
        const components = account.split(':');
        const result: ClearedBounds = { before: null, after: null };
        for (let length = 1; length <= components.length; length++) {
            const bound = own.get(components.slice(0, length).join(':'));
            if (!bound) continue;
            if (bound.before && (!result.before || bound.before > result.before)) result.before = bound.before;
            if (bound.after && (!result.after || bound.after < result.after)) result.after = bound.after;
        }
        return result;
    }

    private collectUncleared(transaction: TransactionEntry, position: number, own: Map<string, ClearedBounds>): void {
        if (transaction.flag === FLAGS.PADDING) return;
        for (const posting of transaction.postings) {
            if (!posting.units || toDecimal(posting.units).isZero()) continue;
            if (isMarkedCleared(posting)) continue;
            const source = this.sourceFor(posting.account);
            if (!source || source.isPostingCleared(posting)) continue;

            const date = postingDate(transaction, posting);
            const bounds = this.boundsFor(posting.account, own);
            if (bounds.before && date < bounds.before) continue;
            if (bounds.after && date > bounds.after) continue;

            this.unclearedPostings.push({
                source: source.name,
                account: posting.account,
                date,
                units: posting.units,
                narration: transaction.narration,
                location: transaction.location,
                position,
            });
        }
    }
}

function stripPosition({ position: _position, ...posting }: LocatedUncleared): UnclearedPosting {
    return posting;
}
