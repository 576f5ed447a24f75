export { ClearingIndex, ledgerTransactionKey } from './clearing-index.js';
export { PostingIndex } from './posting-index.js';
export type { MatchableTransaction, IndexedPosting } from './posting-index.js';
