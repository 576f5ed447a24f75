/**
 * Matcher module: ranked merge hypotheses for one pending transaction.
 */

export { findHypotheses, compareHypotheses } from './find-hypotheses.js';
export type { MatchContext } from './find-hypotheses.js';
export { mergeTransactions, mergePostings, pairDistance, isTransactionMergeable } from './merge.js';
export type { Hypothesis, MatchOptions, MergeResult } from './types.js';
