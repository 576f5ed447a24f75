/**
 * Constants for the reconciliation engine.
 */

/**
 * Account used for postings whose account is not yet known.
 * Postings to `Expenses:FIXME:<suffix>` are grouped by suffix.
 */
export const FIXME_ACCOUNT = 'Expenses:FIXME';

export const FIXME_ACCOUNT_PREFIX = `${FIXME_ACCOUNT}:`;

/**
 * Well-known metadata keys.
 */
export const META_KEYS = {
    DATE: 'date',
    TRANSACTION_DATE: 'transaction_date',
    CLEARED: 'cleared',
    CLEARED_BEFORE: 'cleared_before',
    CLEARED_AFTER: 'cleared_after',
    CHECK: 'check',
    SOURCE_DESC: 'source_desc',
} as const;

/**
 * Metadata keys that describe where an entry came from rather than what it says.
 * Ignored when comparing metadata for merging.
 */
export const LOCATION_META_KEYS = ['filename', 'lineno'] as const;

/**
 * Transaction flags.
 */
export const FLAGS = {
    OKAY: '*',
    WARNING: '!',
    PADDING: 'P',
} as const;

/**
 * Matching configuration defaults.
 * COST_TOLERANCE applies to weights computed from a per-unit cost.
 * BALANCE_EPSILON is the residual a candidate may carry per currency.
 * MAX_HYPOTHESES bounds the merge search for one pending entry.
 * MAX_AGGREGATE_POSTINGS is the largest subset of postings matched against
 * a single posting.
 */
export const MATCHING_CONFIG = {
    MATCH_WINDOW_DAYS: 5,
    COST_TOLERANCE: '0.005',
    BALANCE_EPSILON: '0.005',
    MAX_HYPOTHESES: 100,
    MAX_AGGREGATE_POSTINGS: 4,
} as const;

/**
 * Decision tree defaults for the account predictor.
 */
export const PREDICTOR_CONFIG = {
    MAX_DEPTH: 32,
    MIN_SAMPLES_SPLIT: 2,
    IGNORE_ACCOUNT_PATTERN: '^Income.*:Capital-Gains(?::|$)',
    CACHE_VERSION: 1,
} as const;

/**
 * Placeholder tokens stand in for unknown accounts in a candidate's
 * placeholder change set.
 */
export const PLACEHOLDER = {
    LENGTH: 24,
} as const;
