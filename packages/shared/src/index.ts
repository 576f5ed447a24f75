// Schemas
export {
    AmountSchema,
    CostSchema,
    MetaValueSchema,
    MetaSchema,
    LocationSchema,
    PostingSchema,
    TransactionEntrySchema,
    OpenEntrySchema,
    BalanceEntrySchema,
    PriceEntrySchema,
    EntrySchema,
    JournalErrorSchema,
    PendingEntrySchema,
    LineChangeSchema,
    ChangeRegionSchema,
    ChangeSetSchema,
    AccountSubstitutionSchema,
    CandidatePropertiesSchema,
    CandidateSchema,
    UsedTransactionSchema,
    CandidateSetSchema,
    CandidateChangesSchema,
    UnclearedPostingSchema,
    InvalidReferenceSchema,
    ImportedRecordSchema,
    ImportedBalanceSchema,
    ImportedPriceSchema,
    SourceRecordsSchema,
    OutputConfigSchema,
    ClassifierConfigSchema,
    EngineConfigSchema,
    DecisionNodeSchema,
    ClassifierCacheSchema,
    SourceConfigSchema,
    ReconcileConfigSchema,
} from './schemas.js';

// Types
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
    SourceConfig,
    ReconcileConfig,
} from './schemas.js';

// Constants
export {
    FIXME_ACCOUNT,
    FIXME_ACCOUNT_PREFIX,
    META_KEYS,
    LOCATION_META_KEYS,
    FLAGS,
    MATCHING_CONFIG,
    PREDICTOR_CONFIG,
    PLACEHOLDER,
} from './constants.js';
