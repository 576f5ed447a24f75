/**
 * Candidate module: concrete, diffable resolutions of a pending entry.
 */

export { buildCandidate, buildInsertionCandidate, missingOpens } from './build-candidate.js';
export type { BuildContext } from './build-candidate.js';
export { resolveUnknownAccounts } from './substitute.js';
export type { Resolution, ResolveOptions } from './substitute.js';
export { UsedTransactionRegistry } from './used-transactions.js';
