export { metaValueText, metaValuesEqual, metaDate, dateMeta, metasMergeable, mergeMeta, withoutLocationKeys, hasMeta } from './meta.js';
export { toDecimal, formatDecimal, negateAmount, postingWeight, weightKey, weightsEqual } from './amount.js';
export type { Weight } from './amount.js';
export {
    isUnknownAccount,
    unknownGroupNumbers,
    accountsMergeable,
    postingDate,
    explicitPostingDate,
    isMarkedCleared,
    sameCostAndPrice,
    lotsCompatible,
} from './posting.js';
export { aggregatePostings, matchableSubsets } from './aggregate.js';
export type { PostingSubset } from './aggregate.js';
export { checkTransactionBalance } from './balance.js';
export type { BalanceCheck } from './balance.js';
export { stripLocation, resetUnknownAccounts, hasUnknownAccount } from './entry.js';
