import type {
    Entry,
    InvalidReference,
    JournalError,
    Posting,
    TransactionEntry,
} from '../types/index.js';
import type { Ledger } from '../journal/ledger.js';

/**
 * One unit of imported data produced by a source.
 */
export interface ImportResult {
    date: string;
    entries: Entry[];
    info?: {
        description?: string;
        filename?: string;
        line?: number;
    };
}

/**
 * Everything sources report while preparing.
 * `accounts` lists the accounts the sources are authoritative for.
 */
export interface SourceResults {
    pending: Array<{ source: string; result: ImportResult }>;
    accounts: Set<string>;
    invalidReferences: InvalidReference[];
    messages: JournalError[];
}

/**
 * Read-only view of the ledger handed to sources.
 */
export interface SourceContext {
    ledger: Ledger;
    hasIdentity(key: string, value: string): boolean;
}

/**
 * The account-ownership side of a source, used by the clearing index, the
 * matcher and the predictor.
 */
export interface SourceCapabilities {
    readonly name: string;
    /** Metadata keys that carry a unique external id. */
    readonly identityKeys: readonly string[];
    isMine(account: string): boolean;
    isPostingCleared(posting: Posting): boolean;
    /** Key/value pairs describing a posting for the classifier; empty if none. */
    exampleKeyValuePairs(transaction: TransactionEntry, posting: Posting): Record<string, string>;
}

/**
 * An external source of imported records.
 */
export interface Source extends SourceCapabilities {
    prepare(context: SourceContext, results: SourceResults): void;
}

export function createSourceResults(): SourceResults {
    return {
        pending: [],
        accounts: new Set(),
        invalidReferences: [],
        messages: [],
    };
}
