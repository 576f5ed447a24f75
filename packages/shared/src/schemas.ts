/**
 * Zod schemas for ledger entries, candidates and configuration.
 *
 * IMPORTANT: Decimal values are stored as strings in schemas.
 * Convert to Decimal at computation boundaries, back to string at output.
 */

import { z } from 'zod';
import { MATCHING_CONFIG, PREDICTOR_CONFIG } from './constants.js';

// ============================================================================
// Primitive Validators
// ============================================================================

/**
 * ISO date string format: YYYY-MM-DD
 */
const isoDateString = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Must be YYYY-MM-DD format');

/**
 * Decimal amount as string (never native number for money).
 */
const decimalString = z.string().regex(/^-?\d+(\.\d+)?$/, 'Must be valid decimal string');

const currencyCode = z.string().regex(/^[A-Z][A-Z0-9'._-]*$/, 'Must be an upper-case commodity name');

/**
 * Colon-separated account name, e.g. "Liabilities:Credit-Card".
 */
const accountName = z.string().regex(/^[A-Z][^\s:]*(:[^\s:]+)+$/, 'Must be a colon-separated account name');

function compiles(pattern: string): boolean {
    try {
        new RegExp(pattern);
        return true;
    } catch {
        return false;
    }
}

const regexPattern = z.string().refine(compiles, 'Must be a valid regular expression');

// ============================================================================
// Entry Model
// ============================================================================

export const AmountSchema = z.object({
    number: decimalString,
    currency: currencyCode,
});

export type Amount = z.infer<typeof AmountSchema>;

/**
 * Per-unit cost of a lot held at cost.
 */
export const CostSchema = z.object({
    number: decimalString,
    currency: currencyCode,
    date: isoDateString.optional(),
    label: z.string().optional(),
});

export type Cost = z.infer<typeof CostSchema>;

/**
 * Metadata value. Dates and numbers are tagged so they print unquoted.
 */
export const MetaValueSchema = z.union([
    z.string(),
    z.boolean(),
    z.object({ kind: z.literal('date'), value: isoDateString }),
    z.object({ kind: z.literal('number'), value: decimalString }),
]);

export type MetaValue = z.infer<typeof MetaValueSchema>;

/**
 * Insertion-ordered key/value metadata.
 */
export const MetaSchema = z.record(z.string(), MetaValueSchema);

export type Meta = z.infer<typeof MetaSchema>;

/**
 * Source position of an entry read from a ledger file (1-based line).
 */
export const LocationSchema = z.object({
    filename: z.string(),
    line: z.number().int().min(1),
});

export type Location = z.infer<typeof LocationSchema>;

/**
 * A single leg of a transaction. `units: null` marks an elided plug posting
 * whose amount is implied by the others.
 */
export const PostingSchema = z.object({
    account: accountName,
    units: AmountSchema.nullable(),
    cost: CostSchema.optional(),
    price: AmountSchema.optional(),
    flag: z.string().optional(),
    meta: MetaSchema,
});

export type Posting = z.infer<typeof PostingSchema>;

export const TransactionEntrySchema = z.object({
    type: z.literal('transaction'),
    date: isoDateString,
    flag: z.string(),
    payee: z.string().nullable(),
    narration: z.string(),
    tags: z.array(z.string()),
    links: z.array(z.string()),
    postings: z.array(PostingSchema),
    meta: MetaSchema,
    location: LocationSchema.optional(),
});

export type TransactionEntry = z.infer<typeof TransactionEntrySchema>;

export const OpenEntrySchema = z.object({
    type: z.literal('open'),
    date: isoDateString,
    account: accountName,
    currencies: z.array(currencyCode),
    meta: MetaSchema,
    location: LocationSchema.optional(),
});

export type OpenEntry = z.infer<typeof OpenEntrySchema>;

export const BalanceEntrySchema = z.object({
    type: z.literal('balance'),
    date: isoDateString,
    account: accountName,
    amount: AmountSchema,
    meta: MetaSchema,
    location: LocationSchema.optional(),
});

export type BalanceEntry = z.infer<typeof BalanceEntrySchema>;

export const PriceEntrySchema = z.object({
    type: z.literal('price'),
    date: isoDateString,
    currency: currencyCode,
    amount: AmountSchema,
    meta: MetaSchema,
    location: LocationSchema.optional(),
});

export type PriceEntry = z.infer<typeof PriceEntrySchema>;

export const EntrySchema = z.discriminatedUnion('type', [
    TransactionEntrySchema,
    OpenEntrySchema,
    BalanceEntrySchema,
    PriceEntrySchema,
]);

export type Entry = z.infer<typeof EntrySchema>;

/**
 * Diagnostic produced while reading or checking the ledger.
 * Diagnostics are data; they never abort processing of unaffected entries.
 */
export const JournalErrorSchema = z.object({
    severity: z.enum(['error', 'warning']),
    message: z.string(),
    filename: z.string().optional(),
    line: z.number().int().min(1).optional(),
});

export type JournalError = z.infer<typeof JournalErrorSchema>;

// ============================================================================
// Pending Entries
// ============================================================================

/**
 * Imported data awaiting reconciliation.
 * `id` is stable across runs: the SHA-256 of `formatted`.
 */
export const PendingEntrySchema = z.object({
    id: z.string().min(1),
    date: isoDateString,
    source: z.string().nullable(),
    entries: z.array(EntrySchema).min(1),
    formatted: z.string(),
    info: z.object({
        description: z.string().optional(),
        filename: z.string().optional(),
        line: z.number().int().min(1).optional(),
    }).optional(),
});

export type PendingEntry = z.infer<typeof PendingEntrySchema>;

// ============================================================================
// Change Sets
// ============================================================================

export const LineChangeSchema = z.object({
    op: z.enum(['insert', 'delete', 'context']),
    text: z.string(),
});

export type LineChange = z.infer<typeof LineChangeSchema>;

/**
 * Contiguous edit of one file. Line indices are 0-based; endLine is exclusive.
 * An insertion-only region has startLine === endLine.
 */
export const ChangeRegionSchema = z.object({
    filename: z.string(),
    startLine: z.number().int().min(0),
    endLine: z.number().int().min(0),
    changes: z.array(LineChangeSchema),
});

export type ChangeRegion = z.infer<typeof ChangeRegionSchema>;

/**
 * Regions are ordered by file, then startLine, and never overlap.
 */
export const ChangeSetSchema = z.object({
    regions: z.array(ChangeRegionSchema),
});

export type ChangeSet = z.infer<typeof ChangeSetSchema>;

// ============================================================================
// Candidates
// ============================================================================

/**
 * Binding between an unknown posting's placeholder and its current account.
 */
export const AccountSubstitutionSchema = z.object({
    uniqueName: z.string(),
    accountName: z.string(),
    groupNumber: z.number().int().min(0),
    originalName: z.string(),
    predictedName: z.string().nullable(),
});

export type AccountSubstitution = z.infer<typeof AccountSubstitutionSchema>;

/**
 * Descriptive fields of a candidate transaction the user may edit.
 */
export const CandidatePropertiesSchema = z.object({
    narration: z.string(),
    payee: z.string().nullable(),
    tags: z.array(z.string()),
    links: z.array(z.string()),
});

export type CandidateProperties = z.infer<typeof CandidatePropertiesSchema>;

export const CandidateSchema = z.object({
    usedTransactionIds: z.array(z.number().int().min(0)),
    usedPendingIds: z.array(z.string()),
    substitutedAccounts: z.array(AccountSubstitutionSchema),
    changeSet: ChangeSetSchema,
    placeholderChangeSet: ChangeSetSchema,
    newEntries: z.array(EntrySchema),
    properties: CandidatePropertiesSchema.nullable(),
    originalProperties: CandidatePropertiesSchema.nullable(),
    matchedPostings: z.number().int().min(0),
    dateDistance: z.number().int().min(0),
});

export type Candidate = z.infer<typeof CandidateSchema>;

/**
 * Transaction referenced by some candidate. `pendingIndex` is null for a
 * transaction already in the ledger.
 */
export const UsedTransactionSchema = z.object({
    transaction: TransactionEntrySchema,
    pendingIndex: z.number().int().min(0).nullable(),
});

export type UsedTransaction = z.infer<typeof UsedTransactionSchema>;

export const CandidateSetSchema = z.object({
    generation: z.number().int().min(0),
    pendingIndex: z.number().int().min(0),
    pendingId: z.string(),
    date: isoDateString,
    candidates: z.array(CandidateSchema),
    usedTransactions: z.array(UsedTransactionSchema),
});

export type CandidateSet = z.infer<typeof CandidateSetSchema>;

/**
 * Edits applied to a candidate. `accounts` has one entry per substitution.
 */
export const CandidateChangesSchema = z.object({
    accounts: z.array(accountName).optional(),
    narration: z.string().optional(),
    payee: z.string().nullable().optional(),
    tags: z.array(z.string()).optional(),
    links: z.array(z.string()).optional(),
});

export type CandidateChanges = z.infer<typeof CandidateChangesSchema>;

// ============================================================================
// Reports
// ============================================================================

/**
 * Posting to a source-owned account with no external record backing it.
 */
export const UnclearedPostingSchema = z.object({
    source: z.string(),
    account: z.string(),
    date: isoDateString,
    units: AmountSchema,
    narration: z.string(),
    location: LocationSchema.optional(),
});

export type UnclearedPosting = z.infer<typeof UnclearedPostingSchema>;

/**
 * Ledger postings claiming the same external record more often than the
 * source contains it.
 */
export const InvalidReferenceSchema = z.object({
    source: z.string(),
    account: z.string(),
    description: z.string(),
    extras: z.number().int().min(1),
    locations: z.array(LocationSchema),
});

export type InvalidReference = z.infer<typeof InvalidReferenceSchema>;

// ============================================================================
// Imported Records
// ============================================================================

/**
 * One already-parsed record handed over by a format adapter.
 */
export const ImportedRecordSchema = z.object({
    date: isoDateString,
    amount: decimalString,
    currency: currencyCode,
    description: z.string(),
    id: z.string().min(1).optional(),
    payee: z.string().optional(),
    meta: z.record(z.string(), z.string()).optional(),
});

export type ImportedRecord = z.infer<typeof ImportedRecordSchema>;

export const ImportedBalanceSchema = z.object({
    date: isoDateString,
    amount: decimalString,
    currency: currencyCode,
});

export type ImportedBalance = z.infer<typeof ImportedBalanceSchema>;

export const ImportedPriceSchema = z.object({
    date: isoDateString,
    currency: currencyCode,
    amount: AmountSchema,
});

export type ImportedPrice = z.infer<typeof ImportedPriceSchema>;

export const SourceRecordsSchema = z.object({
    transactions: z.array(ImportedRecordSchema),
    balances: z.array(ImportedBalanceSchema).default([]),
    prices: z.array(ImportedPriceSchema).default([]),
});

export type SourceRecords = z.infer<typeof SourceRecordsSchema>;

// ============================================================================
// Engine Configuration
// ============================================================================

/**
 * Where newly staged entries are written.
 * `transactionOutputMap` pairs an account regex with a file; the first
 * pattern matching any posting account wins.
 */
export const OutputConfigSchema = z.object({
    defaultOutput: z.string().min(1),
    openOutput: z.string().min(1).optional(),
    balanceOutput: z.string().min(1).optional(),
    priceOutput: z.string().min(1).optional(),
    transactionOutputMap: z.array(z.tuple([z.string(), z.string()])).default([]),
});

export type OutputConfig = z.infer<typeof OutputConfigSchema>;

export const ClassifierConfigSchema = z.object({
    maxDepth: z.number().int().min(1).default(PREDICTOR_CONFIG.MAX_DEPTH),
    minSamplesSplit: z.number().int().min(2).default(PREDICTOR_CONFIG.MIN_SAMPLES_SPLIT),
});

export type ClassifierConfig = z.infer<typeof ClassifierConfigSchema>;

export const EngineConfigSchema = z.object({
    matchWindowDays: z.number().int().min(0).default(MATCHING_CONFIG.MATCH_WINDOW_DAYS),
    costTolerance: decimalString.default(MATCHING_CONFIG.COST_TOLERANCE),
    balanceEpsilon: decimalString.default(MATCHING_CONFIG.BALANCE_EPSILON),
    ignoreAccountPattern: regexPattern.default(PREDICTOR_CONFIG.IGNORE_ACCOUNT_PATTERN),
    classifier: ClassifierConfigSchema.default({}),
    output: OutputConfigSchema,
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

// ============================================================================
// Classifier Cache
// ============================================================================

export type DecisionNode =
    | { kind: 'leaf'; label: string; samples: number }
    | { kind: 'split'; feature: string; samples: number; absent: DecisionNode; present: DecisionNode };

export const DecisionNodeSchema: z.ZodType<DecisionNode> = z.lazy(() =>
    z.union([
        z.object({
            kind: z.literal('leaf'),
            label: z.string(),
            samples: z.number().int().min(0),
        }),
        z.object({
            kind: z.literal('split'),
            feature: z.string(),
            samples: z.number().int().min(0),
            absent: DecisionNodeSchema,
            present: DecisionNodeSchema,
        }),
    ])
);

/**
 * Serialized decision tree. `fingerprint` identifies the training data;
 * `vocabulary` lists every feature seen in training.
 */
export const ClassifierCacheSchema = z.object({
    version: z.literal(PREDICTOR_CONFIG.CACHE_VERSION),
    fingerprint: z.string(),
    vocabulary: z.array(z.string()).default([]),
    root: DecisionNodeSchema.nullable(),
});

export type ClassifierCache = z.infer<typeof ClassifierCacheSchema>;

// ============================================================================
// Workspace Configuration (reconcile.yaml)
// ============================================================================

export const SourceConfigSchema = z.discriminatedUnion('kind', [
    z.object({
        kind: z.literal('description'),
        name: z.string().min(1),
        account: accountName,
        records: z.string().min(1),
    }),
    z.object({
        kind: z.literal('identity'),
        name: z.string().min(1),
        account: accountName,
        records: z.string().min(1),
        identity_key: z.string().regex(/^[a-z][a-zA-Z0-9_-]*$/).default('ref'),
    }),
]);

export type SourceConfig = z.infer<typeof SourceConfigSchema>;

/**
 * On-disk workspace configuration. Paths are relative to the workspace root.
 */
export const ReconcileConfigSchema = z.object({
    journal: z.string().min(1),
    ignored: z.string().min(1),
    default_output: z.string().min(1).optional(),
    open_output: z.string().min(1).optional(),
    balance_output: z.string().min(1).optional(),
    price_output: z.string().min(1).optional(),
    transaction_output_map: z.array(z.tuple([z.string(), z.string()])).default([]),
    fuzzy_match_days: z.number().int().min(0).default(MATCHING_CONFIG.MATCH_WINDOW_DAYS),
    cost_tolerance: decimalString.default(MATCHING_CONFIG.COST_TOLERANCE),
    balance_epsilon: decimalString.default(MATCHING_CONFIG.BALANCE_EPSILON),
    ignore_account_for_classification_pattern: regexPattern.default(PREDICTOR_CONFIG.IGNORE_ACCOUNT_PATTERN),
    classifier: z.object({
        max_depth: z.number().int().min(1).default(PREDICTOR_CONFIG.MAX_DEPTH),
        min_samples_split: z.number().int().min(2).default(PREDICTOR_CONFIG.MIN_SAMPLES_SPLIT),
    }).default({}),
    classifier_cache: z.string().min(1).optional(),
    sources: z.array(SourceConfigSchema).default([]),
});

export type ReconcileConfig = z.infer<typeof ReconcileConfigSchema>;
