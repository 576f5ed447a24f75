/**
 * Re-export all types from shared package.
 * Core package uses these types but doesn't define them.
 */
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
    ImportedBalance,
    ImportedPrice,
    SourceRecords,
    OutputConfig,
    ClassifierConfig,
    EngineConfig,
    DecisionNode,
    ClassifierCache,
} from '@ledger-reconcile/shared';

export {
    CandidateChangesSchema,
    ClassifierCacheSchema,
    EngineConfigSchema,
    FIXME_ACCOUNT,
    FIXME_ACCOUNT_PREFIX,
    META_KEYS,
    LOCATION_META_KEYS,
    FLAGS,
    MATCHING_CONFIG,
    PREDICTOR_CONFIG,
    PLACEHOLDER,
} from '@ledger-reconcile/shared';
