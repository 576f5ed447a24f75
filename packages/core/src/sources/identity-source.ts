import type { Posting, SourceRecords, TransactionEntry } from '../types/index.js';
import { META_KEYS } from '../types/index.js';
import { makeDirectivesResult, makeImportTransaction } from './records.js';
import type { Source, SourceContext, SourceResults } from './types.js';

export interface IdentitySourceOptions {
    name: string;
    account: string;
    identityKey: string;
    records: SourceRecords;
}

/**
 * Source whose records carry a unique external id, stored on the cleared
 * posting under `identityKey`. A record is new unless its id is already in
 * the ledger.
 */
export class IdentitySource implements Source {
    readonly name: string;
    readonly account: string;
    readonly identityKey: string;
    readonly identityKeys: readonly string[];
    private readonly records: SourceRecords;

    constructor(options: IdentitySourceOptions) {
        this.name = options.name;
        this.account = options.account;
        this.identityKey = options.identityKey;
        this.identityKeys = [options.identityKey];
        this.records = options.records;
    }

    isMine(account: string): boolean {
        return account === this.account;
    }

    isPostingCleared(posting: Posting): boolean {
        return posting.meta[this.identityKey] !== undefined;
    }

    exampleKeyValuePairs(_transaction: TransactionEntry, posting: Posting): Record<string, string> {
        const description = posting.meta[META_KEYS.SOURCE_DESC];
        if (!this.isMine(posting.account) || typeof description !== 'string') return {};
        return { desc: description };
    }

    prepare(context: SourceContext, results: SourceResults): void {
        results.accounts.add(this.account);

        const seen = new Set<string>();
        for (const record of this.records.transactions) {
            if (!record.id) {
                results.messages.push({
                    severity: 'warning',
                    message: `${this.name}: record dated ${record.date} (${record.description}) has no id; skipped`,
                });
                continue;
            }
            if (seen.has(record.id)) {
                results.messages.push({
                    severity: 'warning',
                    message: `${this.name}: duplicate record id ${record.id}; skipped`,
                });
                continue;
            }
            seen.add(record.id);
            if (context.hasIdentity(this.identityKey, record.id)) continue;

            results.pending.push({
                source: this.name,
                result: {
                    date: record.date,
                    entries: [
                        makeImportTransaction(this.account, record, {
                            [this.identityKey]: record.id,
                            [META_KEYS.SOURCE_DESC]: record.description,
                        }),
                    ],
                    info: { description: record.description },
                },
            });
        }

        const directives = makeDirectivesResult(context.ledger, this.account, this.records.balances, this.records.prices);
        if (directives) {
            results.pending.push({ source: this.name, result: directives });
        }
    }
}
