import type { Ledger } from '../journal/ledger.js';
import { FLAGS } from '../types/index.js';
import type { SourceCapabilities } from '../sources/types.js';
import { isUnknownAccount } from '../model/posting.js';
import { sourcePostingFeatures, type TrainingExample } from './features.js';

export interface TrainingOptions {
    sources: readonly SourceCapabilities[];
    /** Postings to matching accounts are left out before the two-posting rule. */
    ignoreAccountPattern: RegExp;
}

/**
 * Extract training examples from the ledger.
 *
 * Postings to accounts matching the ignore pattern are left out first. Each
 * transaction with two postings left and one of them to a source account
 * yields an example labeled with the other posting's account, in both
 * directions when both accounts belong to sources. Unknown accounts are
 * never labels.
 *
 * PURE FUNCTION: output depends only on ledger content and options.
 */
export function extractTrainingExamples(ledger: Ledger, options: TrainingOptions): TrainingExample[] {
    const examples: TrainingExample[] = [];

    for (const transaction of ledger.transactions()) {
        if (transaction.flag === FLAGS.PADDING) continue;
        const postings = transaction.postings.filter(posting => !options.ignoreAccountPattern.test(posting.account));
        if (postings.length !== 2) continue;
        const [first, second] = postings;

        for (const [posting, other] of [[first, second], [second, first]] as const) {
            const source = options.sources.find(candidate => candidate.isMine(posting.account));
            if (!source) continue;
            const label = other.account;
            if (isUnknownAccount(label)) continue;
            examples.push({ features: sourcePostingFeatures(transaction, posting, source), label });
        }
    }
    return examples;
}
