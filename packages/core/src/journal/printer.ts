/**
 * Canonical text form of ledger entries.
 */

import type { Amount, Cost, Entry, Meta, MetaValue, Posting, TransactionEntry } from '../types/index.js';
import { withoutLocationKeys } from '../model/meta.js';

const ENTRY_INDENT = '  ';
const POSTING_META_INDENT = '    ';

export function quoteString(value: string): string {
    return JSON.stringify(value);
}

export function formatMetaValue(value: MetaValue): string {
    if (typeof value === 'string') return quoteString(value);
    if (typeof value === 'boolean') return value ? 'TRUE' : 'FALSE';
    return value.value;
}

export function formatAmount(amount: Amount): string {
    return `${amount.number} ${amount.currency}`;
}

function formatCost(cost: Cost): string {
    const parts = [`${cost.number} ${cost.currency}`];
    if (cost.date) parts.push(cost.date);
    if (cost.label !== undefined) parts.push(quoteString(cost.label));
    return `{${parts.join(', ')}}`;
}

function formatMeta(meta: Meta, indent: string): string[] {
    return Object.entries(withoutLocationKeys(meta)).map(([key, value]) => `${indent}${key}: ${formatMetaValue(value)}`);
}

export function formatPosting(posting: Posting): string[] {
    let line = ENTRY_INDENT;
    if (posting.flag) line += `${posting.flag} `;
    line += posting.account;
    if (posting.units) {
        line += `  ${formatAmount(posting.units)}`;
        if (posting.cost) line += ` ${formatCost(posting.cost)}`;
        if (posting.price) line += ` @ ${formatAmount(posting.price)}`;
    }
    return [line, ...formatMeta(posting.meta, POSTING_META_INDENT)];
}

function formatTransactionHeader(transaction: TransactionEntry): string {
    let header = `${transaction.date} ${transaction.flag}`;
    if (transaction.payee !== null) header += ` ${quoteString(transaction.payee)}`;
    header += ` ${quoteString(transaction.narration)}`;
    for (const tag of transaction.tags) header += ` #${tag}`;
    for (const link of transaction.links) header += ` ^${link}`;
    return header;
}

/**
 * Lines of one entry, without a trailing blank line.
 */
export function printEntry(entry: Entry): string[] {
    switch (entry.type) {
        case 'transaction':
            return [
                formatTransactionHeader(entry),
                ...formatMeta(entry.meta, ENTRY_INDENT),
                ...entry.postings.flatMap(formatPosting),
            ];
        case 'open': {
            const currencies = entry.currencies.length > 0 ? ` ${entry.currencies.join(',')}` : '';
            return [`${entry.date} open ${entry.account}${currencies}`, ...formatMeta(entry.meta, ENTRY_INDENT)];
        }
        case 'balance':
            return [`${entry.date} balance ${entry.account}  ${formatAmount(entry.amount)}`, ...formatMeta(entry.meta, ENTRY_INDENT)];
        case 'price':
            return [`${entry.date} price ${entry.currency}  ${formatAmount(entry.amount)}`, ...formatMeta(entry.meta, ENTRY_INDENT)];
    }
}

/**
 * Entries separated by blank lines, with a trailing newline.
 */
export function formatEntries(entries: readonly Entry[]): string {
    return entries.map(entry => printEntry(entry).join('\n') + '\n').join('\n');
}
