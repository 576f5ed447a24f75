import type { Posting, TransactionEntry } from '../types/index.js';
import type { SourceCapabilities } from '../sources/types.js';
import { toDecimal } from '../model/amount.js';
import { wordNgrams } from '../utils/normalize.js';

/**
 * One labeled training example: the features of a source posting and the
 * account on the other side of its transaction.
 */
export interface TrainingExample {
    features: string[];
    label: string;
}

/**
 * Features of a posting to a source account:
 * `account:<account>`, `sign:<+|->`, `currency:<code>` and `<key>:<ngram>`
 * for every word n-gram of the source's example key/value pairs.
 *
 * @returns Sorted, de-duplicated feature names
 */
export function sourcePostingFeatures(
    transaction: TransactionEntry,
    posting: Posting,
    source: SourceCapabilities
): string[] {
    const features = new Set<string>([`account:${posting.account}`]);
    if (posting.units) {
        features.add(`sign:${toDecimal(posting.units).isNegative() ? '-' : '+'}`);
        features.add(`currency:${posting.units.currency}`);
    }
    for (const [key, value] of Object.entries(source.exampleKeyValuePairs(transaction, posting))) {
        for (const ngram of wordNgrams(value)) {
            features.add(`${key}:${ngram}`);
        }
    }
    return [...features].sort();
}
