import Decimal from 'decimal.js';
import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import type {
    Candidate,
    CandidateChanges,
    CandidateSet,
    ChangeSet,
    EngineConfig,
    Entry,
    InvalidReference,
    JournalError,
    PendingEntry,
    Posting,
    UnclearedPosting,
} from '../types/index.js';
import { CandidateChangesSchema, EngineConfigSchema } from '../types/index.js';
import type { Ledger } from '../journal/ledger.js';
import { StagedChanges } from '../journal/staged-changes.js';
import { ClearingIndex, ledgerTransactionKey } from '../clearing/clearing-index.js';
import type { MatchableTransaction } from '../clearing/posting-index.js';
import { findHypotheses } from '../matcher/find-hypotheses.js';
import type { Hypothesis, MatchOptions } from '../matcher/types.js';
import { buildCandidate, buildInsertionCandidate, type BuildContext } from '../candidates/build-candidate.js';
import { UsedTransactionRegistry } from '../candidates/used-transactions.js';
import { Predictor, type TrainResult } from '../predictor/predictor.js';
import type { AccountClassifier } from '../predictor/decision-tree.js';
import { createSourceResults, type Source, type SourceResults } from '../sources/types.js';
import { isMarkedCleared } from '../model/posting.js';
import { resetUnknownAccounts } from '../model/entry.js';
import { CandidateNotFoundError, NoPendingEntryError, ReconcileError, StaleGenerationError } from '../errors.js';
import { buildPendingEntries, PendingPool, singleTransaction } from './pending-pool.js';

export type SessionState = 'awaiting_candidates' | 'candidates_ready' | 'finished';

export type Decision = 'accepted' | 'ignored' | 'skipped';

export interface SessionOptions {
    journal: Ledger;
    ignored: Ledger;
    /** File that ignored entries are written to. */
    ignoredFile: string;
    sources: readonly Source[];
    /** Validated with EngineConfigSchema. */
    config: unknown;
    /** Replaces the default decision tree, e.g. one restored from a cache. */
    model?: AccountClassifier;
    /** Status messages such as training progress. */
    log?: (message: string) => void;
}

/**
 * Read-only view of the session at one generation.
 */
export interface SessionSnapshot {
    readonly generation: number;
    readonly state: SessionState;
    readonly ledger: Ledger;
    readonly ignored: Ledger;
    readonly pending: readonly PendingEntry[];
    readonly pendingIndex: number | null;
}

export interface ApplyOutcome {
    changeSet: ChangeSet;
    newEntries: Entry[];
    modifiedFiles: string[];
}

export interface ComputeOptions {
    signal?: AbortSignal;
}

interface ReadyCandidates {
    set: CandidateSet;
    /** Parallel to `set.candidates`; null for an insertion candidate. */
    hypotheses: Array<Hypothesis | null>;
    registry: UsedTransactionRegistry;
}

/**
 * Owns the ledger, the pending pool and the predictor for one review
 * session.
 *
 * Every mutation is synchronous and bumps `generation`. Candidate
 * computation is asynchronous and read-only; it starts over whenever the
 * generation moves while it is running.
 */
export class Session {
    private readonly sources: readonly Source[];
    private readonly config: EngineConfig;
    private readonly ignoredFile: string;
    private readonly predictor: Predictor;
    private readonly log: (message: string) => void;
    private readonly matchOptions: MatchOptions;

    private generationValue = 0;
    private ledgerValue: Ledger;
    private ignoredValue: Ledger;
    private clearing: ClearingIndex;
    private pool: PendingPool;
    private results: SourceResults;
    private suppressedCount = 0;
    private readonly retired = new Set<string>();
    private skipped: string[] = [];
    private ready: ReadyCandidates | null = null;
    private decision: Decision | null = null;

    constructor(options: SessionOptions) {
        this.sources = options.sources;
        this.config = EngineConfigSchema.parse(options.config);
        this.ignoredFile = options.ignoredFile;
        this.log = options.log ?? (() => undefined);
        this.ledgerValue = options.journal;
        this.ignoredValue = options.ignored;
        this.predictor = new Predictor({
            sources: options.sources,
            ignoreAccountPattern: this.config.ignoreAccountPattern,
            classifier: this.config.classifier,
            model: options.model,
        });
        this.matchOptions = {
            matchWindowDays: this.config.matchWindowDays,
            costTolerance: new Decimal(this.config.costTolerance),
            balanceEpsilon: new Decimal(this.config.balanceEpsilon),
            isCleared: posting => this.isCleared(posting),
        };

        const built = this.prepare();
        this.clearing = built.clearing;
        this.pool = built.pool;
        this.results = built.results;
        this.train(false);
    }

    get generation(): number {
        return this.generationValue;
    }

    get state(): SessionState {
        if (this.currentIndex() === null) return 'finished';
        return this.ready ? 'candidates_ready' : 'awaiting_candidates';
    }

    get ledger(): Ledger {
        return this.ledgerValue;
    }

    get ignored(): Ledger {
        return this.ignoredValue;
    }

    get pending(): readonly PendingEntry[] {
        return this.pool.entries;
    }

    /** Imports dropped because they match an ignored entry. */
    get suppressed(): number {
        return this.suppressedCount;
    }

    /** Outcome of the most recent accept, ignore or skip. */
    get lastDecision(): Decision | null {
        return this.decision;
    }

    get model(): AccountClassifier {
        return this.predictor.model;
    }

    snapshot(): SessionSnapshot {
        return {
            generation: this.generationValue,
            state: this.state,
            ledger: this.ledgerValue,
            ignored: this.ignoredValue,
            pending: this.pool.entries,
            pendingIndex: this.currentIndex(),
        };
    }

    /**
     * Index of the first pending entry that has not been skipped.
     */
    currentIndex(): number | null {
        const skipped = new Set(this.skipped);
        const index = this.pool.entries.findIndex(entry => !skipped.has(entry.id));
        return index === -1 ? null : index;
    }

    current(): PendingEntry | null {
        const index = this.currentIndex();
        return index === null ? null : this.pool.entries[index];
    }

    /**
     * Ranked candidates for the current pending entry.
     *
     * Yields to the event loop between hypotheses. A generation change while
     * running discards the partial result and starts over.
     *
     * @returns null when no pending entry remains
     * @throws the signal's reason when aborted
     */
    async computeCandidates(options: ComputeOptions = {}): Promise<CandidateSet | null> {
        for (;;) {
            options.signal?.throwIfAborted();
            const generation = this.generationValue;
            const ready = await this.tryCompute(generation, options.signal);
            if (ready === 'stale') continue;
            if (ready === null) return null;
            this.ready = ready;
            return ready.set;
        }
    }

    /**
     * The current candidate set, if computed at this generation.
     */
    candidates(): CandidateSet | null {
        return this.ready?.set ?? null;
    }

    /**
     * Apply a candidate to the ledger and retire the pending entries it uses.
     *
     * @throws StaleGenerationError if `generation` is not current
     */
    accept(generation: number, index: number): ApplyOutcome {
        const candidate = this.requireCandidate(generation, index);
        const applied = this.ledgerValue.applyChangeSet(candidate.changeSet);
        this.ledgerValue = applied.ledger;
        for (const id of candidate.usedPendingIds) this.retired.add(id);
        this.afterMutation('accepted');
        this.train(false);
        return { changeSet: candidate.changeSet, newEntries: candidate.newEntries, modifiedFiles: applied.modifiedFiles };
    }

    /**
     * Record the pending entries a candidate uses in the ignore ledger, with
     * unknown accounts reset, so later runs suppress them.
     *
     * @throws StaleGenerationError if `generation` is not current
     */
    ignore(generation: number, index: number): ApplyOutcome {
        const candidate = this.requireCandidate(generation, index);
        const staged = new StagedChanges(this.ignoredValue);
        for (const id of candidate.usedPendingIds) {
            const pending = this.pool.entries.find(entry => entry.id === id);
            if (!pending || pending.source === null) continue;
            for (const entry of pending.entries) {
                staged.addEntry(resetUnknownAccounts(entry), this.ignoredFile);
            }
        }
        const changeSet = staged.getChangeSet();
        const applied = this.ignoredValue.applyChangeSet(changeSet);
        this.ignoredValue = applied.ledger;
        for (const id of candidate.usedPendingIds) this.retired.add(id);
        this.afterMutation('ignored');
        return { changeSet, newEntries: staged.newEntries, modifiedFiles: applied.modifiedFiles };
    }

    /**
     * Move past the current pending entry without changing anything.
     *
     * @throws NoPendingEntryError when none remains
     */
    skip(): void {
        const current = this.current();
        if (!current) throw new NoPendingEntryError();
        this.skipped.push(current.id);
        this.afterMutation('skipped');
    }

    /**
     * Undo the most recent skip.
     *
     * @returns false when nothing was skipped
     */
    unskip(): boolean {
        if (this.skipped.length === 0) return false;
        this.skipped.pop();
        this.afterMutation(null);
        return true;
    }

    /**
     * Rebuild one candidate with edited accounts or descriptive fields.
     * The generation does not change.
     *
     * @throws StaleGenerationError if `generation` is not current
     * @throws ReconcileError when the edited transaction does not balance
     */
    changeCandidate(generation: number, index: number, changes: CandidateChanges): Candidate {
        this.requireCandidate(generation, index);
        const parsed = CandidateChangesSchema.parse(changes);
        const ready = this.requireReady();
        const current = this.pool.entries[ready.set.pendingIndex];
        const hypothesis = ready.hypotheses[index];
        const context = this.buildContext();

        const rebuilt = hypothesis
            ? buildCandidate(current, hypothesis, ready.registry, context, parsed)
            : buildInsertionCandidate(current, context, parsed);
        if (!rebuilt) {
            throw new ReconcileError('Edited candidate does not balance', 'UNBALANCED_CANDIDATE');
        }
        ready.set.candidates[index] = rebuilt;
        return rebuilt;
    }

    /**
     * Retrain the predictor from the whole ledger.
     */
    retrain(): TrainResult {
        const result = this.train(true);
        this.afterMutation(null);
        return result;
    }

    /**
     * Replace both ledgers after an external edit and recompute everything.
     */
    reload(journal: Ledger, ignored: Ledger): void {
        this.ledgerValue = journal;
        this.ignoredValue = ignored;
        this.afterMutation(null);
        this.train(false);
    }

    uncleared(): UnclearedPosting[] {
        return this.clearing.uncleared();
    }

    lookupUncleared(account: string, date: string, windowDays = this.config.matchWindowDays): UnclearedPosting[] {
        return this.clearing.lookupUncleared(account, date, windowDays);
    }

    invalidReferences(): InvalidReference[] {
        return [...this.results.invalidReferences, ...this.clearing.invalidReferences()];
    }

    errors(): JournalError[] {
        return [
            ...this.ledgerValue.errors,
            ...this.ignoredValue.errors,
            ...this.clearing.errors,
            ...this.results.messages,
            ...this.predictor.warnings.map((message): JournalError => ({ severity: 'warning', message })),
        ];
    }

    explainPrediction(pendingIndex: number): string[] {
        const pending = this.pool.entries[pendingIndex];
        const transaction = pending ? singleTransaction(pending) : null;
        return transaction ? this.predictor.explain(transaction) : [];
    }

    private isCleared(posting: Posting): boolean {
        if (isMarkedCleared(posting)) return true;
        return this.clearing.sourceFor(posting.account)?.isPostingCleared(posting) ?? false;
    }

    private prepare(): { clearing: ClearingIndex; pool: PendingPool; results: SourceResults } {
        const clearing = ClearingIndex.build(this.ledgerValue, this.sources);
        const results = createSourceResults();
        const context = {
            ledger: this.ledgerValue,
            hasIdentity: (key: string, value: string) => clearing.hasIdentity(key, value),
        };
        for (const source of this.sources) {
            source.prepare(context, results);
        }
        const built = buildPendingEntries(this.ledgerValue, this.ignoredValue, results);
        this.suppressedCount = built.suppressed;
        const pending = built.pending.filter(entry => !this.retired.has(entry.id));
        return { clearing, pool: new PendingPool(pending, clearing.identityKeys), results };
    }

    private afterMutation(decision: Decision | null): void {
        const built = this.prepare();
        this.clearing = built.clearing;
        this.pool = built.pool;
        this.results = built.results;
        const present = new Set(this.pool.entries.map(entry => entry.id));
        this.skipped = this.skipped.filter(id => present.has(id));
        this.ready = null;
        if (decision) this.decision = decision;
        this.generationValue++;
    }

    private train(force: boolean): TrainResult {
        const result = this.predictor.train(this.ledgerValue, force);
        if (result.retrained) {
            this.log(`Training classifier with ${result.examples} examples`);
        }
        return result;
    }

    private buildContext(): BuildContext {
        return {
            ledger: this.ledgerValue,
            output: this.config.output,
            predictor: this.predictor,
            balanceEpsilon: this.matchOptions.balanceEpsilon,
            pending: this.pool.entries,
        };
    }

    private requireReady(): ReadyCandidates {
        if (!this.ready) throw new NoPendingEntryError();
        return this.ready;
    }

    private requireCandidate(generation: number, index: number): Candidate {
        if (generation !== this.generationValue) {
            throw new StaleGenerationError(generation, this.generationValue);
        }
        const ready = this.requireReady();
        const candidate = ready.set.candidates[index];
        if (!candidate) throw new CandidateNotFoundError(index, ready.set.candidates.length);
        return candidate;
    }

    private matchableFor(pendingIndex: number): MatchableTransaction | null {
        const pending = this.pool.entries[pendingIndex];
        const transaction = singleTransaction(pending);
        if (pending.source === null && transaction?.location) {
            const owner = this.clearing.transaction(ledgerTransactionKey(transaction));
            if (owner) return { ...owner, pendingIndex };
        }
        return this.pool.matchable(pendingIndex);
    }

    private async tryCompute(generation: number, signal?: AbortSignal): Promise<ReadyCandidates | 'stale' | null> {
        const pendingIndex = this.currentIndex();
        if (pendingIndex === null) return null;
        const current = this.pool.entries[pendingIndex];
        const context = this.buildContext();
        const registry = new UsedTransactionRegistry();
        const set: CandidateSet = {
            generation,
            pendingIndex,
            pendingId: current.id,
            date: current.date,
            candidates: [],
            usedTransactions: registry.list,
        };
        const hypotheses: Array<Hypothesis | null> = [];

        const owner = this.matchableFor(pendingIndex);
        if (!owner) {
            set.candidates.push(buildInsertionCandidate(current, context));
            hypotheses.push(null);
            return { set, hypotheses, registry };
        }

        const found = findHypotheses(owner, {
            indexes: [this.clearing.postings, this.pool.index],
            options: this.matchOptions,
        });
        for (const [i, hypothesis] of found.entries()) {
            await yieldToEventLoop();
            signal?.throwIfAborted();
            if (this.generationValue !== generation) return 'stale';
            const candidate = buildCandidate(current, hypothesis, registry, context, {}, i < found.length - 1);
            if (candidate) {
                set.candidates.push(candidate);
                hypotheses.push(hypothesis);
            }
        }
        return { set, hypotheses, registry };
    }
}
