import type { AccountSubstitution, Posting, TransactionEntry } from '../types/index.js';
import { isUnknownAccount, unknownGroupNumbers } from '../model/posting.js';
import { generatePlaceholder } from '../utils/hash.js';

/**
 * A transaction with its unknown accounts resolved two ways: to real
 * account names, and to placeholder tokens.
 */
export interface Resolution {
    real: TransactionEntry;
    placeholder: TransactionEntry;
    substitutions: AccountSubstitution[];
    /** Group numbers used so far, for numbering the next transaction. */
    nextGroup: number;
}

export interface ResolveOptions {
    /** Seed prefix; placeholders depend on nothing else but the posting index. */
    seed: string;
    /** Predicted account per unknown-account group of this transaction. */
    predictions: ReadonlyArray<string | null>;
    /** Explicit accounts, consumed one per unknown posting. */
    accounts?: readonly string[];
    firstGroup?: number;
}

/**
 * Assign groups and placeholders to the unknown postings of `transaction`.
 *
 * A group defaults to its predicted account, else to its own unknown
 * account name.
 */
export function resolveUnknownAccounts(transaction: TransactionEntry, options: ResolveOptions): Resolution {
    const groups = unknownGroupNumbers(transaction.postings);
    const firstGroup = options.firstGroup ?? 0;
    const substitutions: AccountSubstitution[] = [];
    const realPostings: Posting[] = [];
    const placeholderPostings: Posting[] = [];

    transaction.postings.forEach((posting, postingIndex) => {
        if (!isUnknownAccount(posting.account)) {
            realPostings.push(posting);
            placeholderPostings.push(posting);
            return;
        }

        const group = groups[substitutions.length];
        const predictedName = options.predictions[group] ?? null;
        const uniqueName = generatePlaceholder(`${options.seed}|${postingIndex}`);
        const accountName = options.accounts?.[substitutions.length] ?? predictedName ?? posting.account;
        substitutions.push({
            uniqueName,
            accountName,
            groupNumber: firstGroup + group,
            originalName: posting.account,
            predictedName,
        });
        realPostings.push({ ...posting, account: accountName });
        placeholderPostings.push({ ...posting, account: uniqueName });
    });

    return {
        real: { ...transaction, postings: realPostings },
        placeholder: { ...transaction, postings: placeholderPostings },
        substitutions,
        nextGroup: firstGroup + new Set(groups).size,
    };
}
