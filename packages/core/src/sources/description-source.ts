import Decimal from 'decimal.js';
import type { ImportedRecord, Location, Posting, SourceRecords, TransactionEntry } from '../types/index.js';
import { META_KEYS } from '../types/index.js';
import { postingDate } from '../model/posting.js';
import { makeDirectivesResult, makeImportTransaction } from './records.js';
import type { Source, SourceContext, SourceResults } from './types.js';

const DESCRIPTION_KEYS = [META_KEYS.SOURCE_DESC, `${META_KEYS.SOURCE_DESC}1`, `${META_KEYS.SOURCE_DESC}2`];

export interface DescriptionSourceOptions {
    name: string;
    account: string;
    records: SourceRecords;
}

function recordKey(date: string, amount: string, currency: string, description: string): string {
    return [date, new Decimal(amount).toFixed(), currency, description].join('\u0000');
}

/**
 * Source whose records have no external id. A record is identified by
 * (date, amount, description); ledger postings that carry `source_desc`
 * claim one record each.
 */
export class DescriptionSource implements Source {
    readonly name: string;
    readonly account: string;
    readonly identityKeys: readonly string[] = [];
    private readonly records: SourceRecords;

    constructor(options: DescriptionSourceOptions) {
        this.name = options.name;
        this.account = options.account;
        this.records = options.records;
    }

    isMine(account: string): boolean {
        return account === this.account;
    }

    isPostingCleared(posting: Posting): boolean {
        return DESCRIPTION_KEYS.some(key => typeof posting.meta[key] === 'string');
    }

    exampleKeyValuePairs(_transaction: TransactionEntry, posting: Posting): Record<string, string> {
        const description = posting.meta[META_KEYS.SOURCE_DESC];
        if (!this.isMine(posting.account) || typeof description !== 'string') return {};
        return { desc: description };
    }

    prepare(context: SourceContext, results: SourceResults): void {
        results.accounts.add(this.account);

        const claimed = new Map<string, { count: number; locations: Location[] }>();
        for (const transaction of context.ledger.transactions()) {
            for (const posting of transaction.postings) {
                if (!this.isMine(posting.account) || !posting.units) continue;
                const description = posting.meta[META_KEYS.SOURCE_DESC];
                if (typeof description !== 'string') continue;
                const key = recordKey(postingDate(transaction, posting), posting.units.number, posting.units.currency, description);
                const claim = claimed.get(key) ?? { count: 0, locations: [] };
                claim.count++;
                if (transaction.location) claim.locations.push(transaction.location);
                claimed.set(key, claim);
            }
        }

        const available = new Map<string, ImportedRecord[]>();
        for (const record of this.records.transactions) {
            const key = recordKey(record.date, record.amount, record.currency, record.description);
            const list = available.get(key) ?? [];
            list.push(record);
            available.set(key, list);
        }

        for (const [key, records] of available) {
            const alreadyClaimed = claimed.get(key)?.count ?? 0;
            for (const record of records.slice(alreadyClaimed)) {
                results.pending.push({
                    source: this.name,
                    result: {
                        date: record.date,
                        entries: [makeImportTransaction(this.account, record, { [META_KEYS.SOURCE_DESC]: record.description })],
                        info: { description: record.description },
                    },
                });
            }
        }

        for (const [key, { count, locations }] of claimed) {
            const extras = count - (available.get(key)?.length ?? 0);
            if (extras <= 0) continue;
            const [date, amount, currency, description] = key.split('\u0000');
            results.invalidReferences.push({
                source: this.name,
                account: this.account,
                description: `${date} ${amount} ${currency} ${description}`,
                extras,
                locations,
            });
        }

        const directives = makeDirectivesResult(context.ledger, this.account, this.records.balances, this.records.prices);
        if (directives) {
            results.pending.push({ source: this.name, result: directives });
        }
    }
}
