import Decimal from 'decimal.js';
import type { ChangeSet, Entry, JournalError, OpenEntry, TransactionEntry } from '../types/index.js';
import { MATCHING_CONFIG } from '../types/index.js';
import { checkTransactionBalance } from '../model/balance.js';
import { parseJournal, splitLines, type DirectiveSpan } from './parser.js';
import { applyRegions, regionsByFile } from './diff.js';

interface LedgerFile {
    lines: string[];
    directives: DirectiveSpan[];
    includes: string[];
}

export interface EntrySpan {
    filename: string;
    startLine: number;
    endLine: number;
}

export interface LedgerOptions {
    balanceEpsilon?: string;
}

export interface ApplyResult {
    ledger: Ledger;
    modifiedFiles: string[];
}

/**
 * Immutable snapshot of a set of ledger files.
 *
 * Every change produces a new snapshot by re-parsing the edited text, so
 * entries, locations and diagnostics always describe the text exactly.
 */
export class Ledger {
    readonly entries: readonly Entry[];
    readonly errors: readonly JournalError[];
    readonly openAccounts: ReadonlyMap<string, OpenEntry>;

    private readonly files: ReadonlyMap<string, LedgerFile>;
    private readonly options: LedgerOptions;

    private constructor(files: Map<string, LedgerFile>, entries: Entry[], errors: JournalError[], options: LedgerOptions) {
        this.files = files;
        this.options = options;

        const sorted = [...entries].sort((a, b) => a.date.localeCompare(b.date));
        const allErrors = [...errors];
        const openAccounts = new Map<string, OpenEntry>();
        const epsilon = new Decimal(options.balanceEpsilon ?? MATCHING_CONFIG.BALANCE_EPSILON);

        for (const entry of sorted) {
            if (entry.type === 'open') {
                if (openAccounts.has(entry.account)) {
                    allErrors.push({
                        severity: 'error',
                        message: `Duplicate open directive for ${entry.account}`,
                        filename: entry.location?.filename,
                        line: entry.location?.line,
                    });
                } else {
                    openAccounts.set(entry.account, entry);
                }
            } else if (entry.type === 'transaction') {
                const check = checkTransactionBalance(entry, epsilon);
                if (!check.valid && check.error) {
                    allErrors.push({
                        severity: 'error',
                        message: check.error,
                        filename: entry.location?.filename,
                        line: entry.location?.line,
                    });
                }
            }
        }

        this.entries = sorted;
        this.errors = allErrors;
        this.openAccounts = openAccounts;
    }

    /**
     * Parse a set of files. File order is kept for ties between same-date entries.
     */
    static fromTexts(texts: Map<string, string> | Record<string, string>, options: LedgerOptions = {}): Ledger {
        const pairs = texts instanceof Map ? [...texts.entries()] : Object.entries(texts);
        const files = new Map<string, LedgerFile>();
        const entries: Entry[] = [];
        const errors: JournalError[] = [];

        for (const [filename, text] of pairs) {
            const parsed = parseJournal(filename, text);
            files.set(filename, { lines: splitLines(text), directives: parsed.directives, includes: parsed.includes });
            entries.push(...parsed.entries);
            errors.push(...parsed.errors);
        }
        return new Ledger(files, entries, errors, options);
    }

    static empty(options: LedgerOptions = {}): Ledger {
        return Ledger.fromTexts({}, options);
    }

    get filenames(): string[] {
        return [...this.files.keys()];
    }

    hasFile(filename: string): boolean {
        return this.files.has(filename);
    }

    /**
     * Lines of a file. A file not in the snapshot reads as empty.
     */
    lines(filename: string): readonly string[] {
        return this.files.get(filename)?.lines ?? [''];
    }

    text(filename: string): string {
        return this.lines(filename).join('\n');
    }

    texts(): Map<string, string> {
        return new Map([...this.files.keys()].map(filename => [filename, this.text(filename)]));
    }

    directives(filename: string): readonly DirectiveSpan[] {
        return this.files.get(filename)?.directives ?? [];
    }

    includes(filename: string): readonly string[] {
        return this.files.get(filename)?.includes ?? [];
    }

    transactions(): TransactionEntry[] {
        return this.entries.filter((entry): entry is TransactionEntry => entry.type === 'transaction');
    }

    /**
     * Line span of an entry read from this snapshot.
     *
     * @throws Error if the entry has no location in this snapshot
     */
    entrySpan(entry: Entry): EntrySpan {
        const location = entry.location;
        if (!location) {
            throw new Error(`Entry dated ${entry.date} has no ledger location`);
        }
        const span = this.directives(location.filename).find(d => d.startLine === location.line - 1);
        if (!span) {
            throw new Error(`No directive at ${location.filename}:${location.line}`);
        }
        return { filename: location.filename, startLine: span.startLine, endLine: span.endLine };
    }

    /**
     * Apply a change set and re-parse.
     *
     * @throws ChangeSetConflictError when the text no longer matches
     */
    applyChangeSet(changeSet: ChangeSet): ApplyResult {
        const texts = new Map<string, string>(this.texts());
        const modifiedFiles: string[] = [];
        for (const [filename, regions] of regionsByFile(changeSet)) {
            const lines = applyRegions(filename, this.lines(filename), regions);
            texts.set(filename, lines.join('\n'));
            modifiedFiles.push(filename);
        }
        return { ledger: Ledger.fromTexts(texts, this.options), modifiedFiles };
    }

    withText(filename: string, text: string): Ledger {
        const texts = new Map<string, string>(this.texts());
        texts.set(filename, text);
        return Ledger.fromTexts(texts, this.options);
    }
}
