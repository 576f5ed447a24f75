// Types (re-exported from shared)
export type {
    Amount,
    Cost,
    MetaValue,
    Meta,
    Location,
    Posting,
    TransactionEntry,
    OpenEntry,
    BalanceEntry,
    PriceEntry,
    Entry,
    JournalError,
    PendingEntry,
    LineChange,
    ChangeRegion,
    ChangeSet,
    AccountSubstitution,
    CandidateProperties,
    Candidate,
    UsedTransaction,
    CandidateSet,
    CandidateChanges,
    UnclearedPosting,
    InvalidReference,
    ImportedRecord,
    SourceRecords,
    OutputConfig,
    EngineConfig,
    ClassifierCache,
} from './types/index.js';

export {
    CandidateChangesSchema,
    ClassifierCacheSchema,
    EngineConfigSchema,
    FIXME_ACCOUNT,
    META_KEYS,
    FLAGS,
    MATCHING_CONFIG,
    PREDICTOR_CONFIG,
} from './types/index.js';

// Errors
export {
    ReconcileError,
    StaleGenerationError,
    ChangeSetConflictError,
    NoPendingEntryError,
    CandidateNotFoundError,
} from './errors.js';

// Utils
export { daysBetween, generatePendingId, generatePlaceholder, wordNgrams } from './utils/index.js';

// Entry model
export {
    postingWeight,
    postingDate,
    isUnknownAccount,
    checkTransactionBalance,
    resetUnknownAccounts,
    stripLocation,
} from './model/index.js';
export type { Weight, BalanceCheck } from './model/index.js';

// Journal text
export {
    Ledger,
    StagedChanges,
    parseJournal,
    printEntry,
    formatEntries,
    diffLines,
    applyRegions,
    formatChangeSet,
    isNoOpChangeSet,
    selectOutputFile,
} from './journal/index.js';
export type { ParsedJournal, LedgerOptions, ApplyResult } from './journal/index.js';

// Sources
export { DescriptionSource, IdentitySource, createSourceResults } from './sources/index.js';
export type { Source, SourceCapabilities, SourceContext, SourceResults, ImportResult } from './sources/index.js';

// Clearing
export { ClearingIndex, PostingIndex } from './clearing/index.js';
export type { MatchableTransaction } from './clearing/index.js';

// Matcher
export { findHypotheses, mergeTransactions } from './matcher/index.js';
export type { Hypothesis, MatchOptions, MatchContext } from './matcher/index.js';

// Candidates
export { buildCandidate, buildInsertionCandidate, missingOpens } from './candidates/index.js';
export type { BuildContext } from './candidates/index.js';

// Predictor
export { Predictor, DecisionTreeClassifier, extractTrainingExamples, trainingFingerprint } from './predictor/index.js';
export type { AccountClassifier, TrainingExample, TrainResult } from './predictor/index.js';

// Session
export { Session, buildPendingEntries, PendingPool } from './session/index.js';
export type { SessionOptions, SessionSnapshot, SessionState, Decision, ApplyOutcome, ComputeOptions } from './session/index.js';
