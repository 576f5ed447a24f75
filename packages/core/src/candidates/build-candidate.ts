import type Decimal from 'decimal.js';
import type {
    AccountSubstitution,
    Candidate,
    CandidateChanges,
    CandidateProperties,
    ChangeSet,
    Entry,
    OpenEntry,
    OutputConfig,
    PendingEntry,
    TransactionEntry,
} from '../types/index.js';
import type { Ledger } from '../journal/ledger.js';
import { StagedChanges } from '../journal/staged-changes.js';
import { selectOutputFile } from '../journal/file-selector.js';
import { checkTransactionBalance } from '../model/balance.js';
import { stripLocation } from '../model/entry.js';
import type { Predictor } from '../predictor/predictor.js';
import type { Hypothesis } from '../matcher/types.js';
import { ReconcileError } from '../errors.js';
import { resolveUnknownAccounts } from './substitute.js';
import { UsedTransactionRegistry } from './used-transactions.js';

export interface BuildContext {
    ledger: Ledger;
    output: OutputConfig;
    predictor: Predictor;
    balanceEpsilon: Decimal;
    /** The whole pending pool, for mapping used pending transactions to ids. */
    pending: readonly PendingEntry[];
}

function propertiesOf(transaction: TransactionEntry): CandidateProperties {
    return {
        narration: transaction.narration,
        payee: transaction.payee,
        tags: [...transaction.tags],
        links: [...transaction.links],
    };
}

function applyProperties(transaction: TransactionEntry, changes: CandidateChanges): TransactionEntry {
    return {
        ...transaction,
        narration: changes.narration ?? transaction.narration,
        payee: changes.payee !== undefined ? changes.payee : transaction.payee,
        tags: changes.tags ?? transaction.tags,
        links: changes.links ?? transaction.links,
    };
}

function checkAccountCount(changes: CandidateChanges, expected: number): void {
    if (changes.accounts && changes.accounts.length !== expected) {
        throw new ReconcileError(
            `Expected ${expected} accounts, got ${changes.accounts.length}`,
            'INVALID_CANDIDATE_CHANGES'
        );
    }
}

function referencedAccounts(entry: Entry): Array<{ account: string; currency: string | null }> {
    switch (entry.type) {
        case 'transaction':
            return entry.postings.map(posting => ({ account: posting.account, currency: posting.units?.currency ?? null }));
        case 'balance':
            return [{ account: entry.account, currency: entry.amount.currency }];
        default:
            return [];
    }
}

/**
 * `open` directives for every account the entries use that the ledger has
 * not opened, dated at the earliest referencing entry and sorted by account.
 */
export function missingOpens(ledger: Ledger, entries: readonly Entry[]): OpenEntry[] {
    const missing = new Map<string, { date: string; currencies: Set<string> }>();
    for (const entry of entries) {
        for (const { account, currency } of referencedAccounts(entry)) {
            if (ledger.openAccounts.has(account)) continue;
            const found = missing.get(account) ?? { date: entry.date, currencies: new Set<string>() };
            if (entry.date < found.date) found.date = entry.date;
            if (currency) found.currencies.add(currency);
            missing.set(account, found);
        }
    }
    return [...missing.entries()]
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([account, { date, currencies }]): OpenEntry => ({
            type: 'open',
            date,
            account,
            currencies: [...currencies].sort(),
            meta: {},
        }));
}

interface Staging {
    changeSet: ChangeSet;
    newEntries: Entry[];
}

function stage(
    context: BuildContext,
    entries: readonly Entry[],
    replaced: readonly TransactionEntry[],
    opens: readonly OpenEntry[]
): Staging {
    const staged = new StagedChanges(context.ledger);
    entries.forEach((entry, i) => {
        if (i === 0 && replaced.length > 0) {
            staged.changeEntry(replaced[0], entry);
        } else {
            staged.addEntry(entry, selectOutputFile(entry, context.output));
        }
    });
    for (const old of replaced.slice(1)) {
        staged.removeEntry(old);
    }
    for (const open of opens) {
        staged.addEntry(open, selectOutputFile(open, context.output));
    }
    return { changeSet: staged.getChangeSet(), newEntries: staged.newEntries };
}

/**
 * Turn one merge hypothesis into a candidate.
 *
 * When the hypothesis uses ledger transactions the first one is rewritten
 * in place and the rest removed; otherwise the transaction is inserted in
 * date order. Accounts without an `open` directive get one.
 *
 * @returns null when the resolved transaction does not balance and
 *          `requireBalance` is set
 */
export function buildCandidate(
    current: PendingEntry,
    hypothesis: Hypothesis,
    registry: UsedTransactionRegistry,
    context: BuildContext,
    changes: CandidateChanges = {},
    requireBalance = true
): Candidate | null {
    const merged = stripLocation(hypothesis.transaction);
    const resolution = resolveUnknownAccounts(merged, {
        seed: `${current.id}|${hypothesis.key}`,
        predictions: context.predictor.predictGroups(merged),
        accounts: changes.accounts,
    });
    checkAccountCount(changes, resolution.substitutions.length);

    const real = applyProperties(resolution.real, changes);
    const placeholder = applyProperties(resolution.placeholder, changes);
    if (requireBalance && !checkTransactionBalance(real, context.balanceEpsilon).valid) {
        return null;
    }

    const replaced = hypothesis.used
        .filter(owner => owner.origin === 'ledger')
        .map(owner => owner.transaction);
    const opens = missingOpens(context.ledger, [real]);
    const staging = stage(context, [real], replaced, opens);
    const placeholderStaging = stage(context, [placeholder], replaced, opens);

    const usedPendingIds = [current.id];
    for (const owner of hypothesis.used) {
        if (owner.origin !== 'pending' || owner.pendingIndex === null) continue;
        const id = context.pending[owner.pendingIndex]?.id;
        if (id !== undefined && !usedPendingIds.includes(id)) usedPendingIds.push(id);
    }

    return {
        usedTransactionIds: hypothesis.used.map(owner => registry.idFor(owner)),
        usedPendingIds,
        substitutedAccounts: resolution.substitutions,
        changeSet: staging.changeSet,
        placeholderChangeSet: placeholderStaging.changeSet,
        newEntries: staging.newEntries,
        properties: propertiesOf(real),
        originalProperties: propertiesOf(merged),
        matchedPostings: hypothesis.matchedPostings,
        dateDistance: hypothesis.dateDistance,
    };
}

/**
 * Single candidate that inserts every entry of a pending entry that is not
 * one transaction (a transfer pair, or a group of balances and prices).
 */
export function buildInsertionCandidate(
    current: PendingEntry,
    context: BuildContext,
    changes: CandidateChanges = {}
): Candidate {
    const substitutions: AccountSubstitution[] = [];
    const realEntries: Entry[] = [];
    const placeholderEntries: Entry[] = [];
    let nextGroup = 0;

    current.entries.forEach((entry, entryIndex) => {
        if (entry.type !== 'transaction') {
            realEntries.push(entry);
            placeholderEntries.push(entry);
            return;
        }
        const resolution = resolveUnknownAccounts(entry, {
            seed: `${current.id}|${entryIndex}`,
            predictions: context.predictor.predictGroups(entry),
            accounts: changes.accounts?.slice(substitutions.length),
            firstGroup: nextGroup,
        });
        nextGroup = resolution.nextGroup;
        substitutions.push(...resolution.substitutions);
        realEntries.push(resolution.real);
        placeholderEntries.push(resolution.placeholder);
    });
    checkAccountCount(changes, substitutions.length);

    const opens = missingOpens(context.ledger, realEntries);
    const staging = stage(context, realEntries, [], opens);
    const placeholderStaging = stage(context, placeholderEntries, [], opens);

    return {
        usedTransactionIds: [],
        usedPendingIds: [current.id],
        substitutedAccounts: substitutions,
        changeSet: staging.changeSet,
        placeholderChangeSet: placeholderStaging.changeSet,
        newEntries: staging.newEntries,
        properties: null,
        originalProperties: null,
        matchedPostings: 0,
        dateDistance: 0,
    };
}
