export { Session } from './session.js';
export type { SessionOptions, SessionSnapshot, SessionState, Decision, ApplyOutcome, ComputeOptions } from './session.js';
export { buildPendingEntries, makePendingEntry, ignoreKey, singleTransaction, pendingTransactionKey, PendingPool } from './pending-pool.js';
export type { PendingBuildResult } from './pending-pool.js';
