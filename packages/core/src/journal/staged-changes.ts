import type { ChangeRegion, ChangeSet, Entry } from '../types/index.js';
import type { Ledger } from './ledger.js';
import { diffLines } from './diff.js';
import { printEntry } from './printer.js';

type StagedOperation =
    | { kind: 'add'; entry: Entry; filename: string }
    | { kind: 'change'; oldEntry: Entry; newEntry: Entry }
    | { kind: 'remove'; oldEntry: Entry };

interface Edit {
    startLine: number;
    endLine: number;
    order: number;
    changes: ChangeRegion['changes'];
}

function isBlank(line: string | undefined): boolean {
    return line !== undefined && line.trim().length === 0;
}

/**
 * Collects entry additions, changes and removals against one ledger
 * snapshot and turns them into a change set.
 */
export class StagedChanges {
    private readonly ledger: Ledger;
    private readonly operations: StagedOperation[] = [];

    constructor(ledger: Ledger) {
        this.ledger = ledger;
    }

    addEntry(entry: Entry, filename: string): void {
        this.operations.push({ kind: 'add', entry, filename });
    }

    changeEntry(oldEntry: Entry, newEntry: Entry): void {
        this.operations.push({ kind: 'change', oldEntry, newEntry });
    }

    removeEntry(oldEntry: Entry): void {
        this.operations.push({ kind: 'remove', oldEntry });
    }

    /**
     * Entries the change set writes, in staging order.
     */
    get newEntries(): Entry[] {
        const result: Entry[] = [];
        for (const op of this.operations) {
            if (op.kind === 'add') result.push(op.entry);
            else if (op.kind === 'change') result.push(op.newEntry);
        }
        return result;
    }

    /**
     * Index at which a new entry dated `date` is inserted: after the last
     * top-level directive dated on or before it, by binary search.
     */
    insertionLine(filename: string, date: string): number {
        const directives = this.ledger.directives(filename);
        const lines = this.ledger.lines(filename);
        if (directives.length === 0) {
            return lines[lines.length - 1] === '' ? lines.length - 1 : lines.length;
        }
        let lo = 0;
        let hi = directives.length;
        while (lo < hi) {
            const mid = (lo + hi) >> 1;
            if (directives[mid].date <= date) {
                lo = mid + 1;
            } else {
                hi = mid;
            }
        }
        return lo === 0 ? directives[0].startLine : directives[lo - 1].endLine;
    }

    getChangeSet(): ChangeSet {
        const editsByFile = new Map<string, Edit[]>();
        const insertions = new Map<string, Map<number, Entry[]>>();
        const pushEdit = (filename: string, edit: Edit) => {
            const list = editsByFile.get(filename) ?? [];
            list.push(edit);
            editsByFile.set(filename, list);
        };

        this.operations.forEach((op, order) => {
            if (op.kind === 'add') {
                const line = this.insertionLine(op.filename, op.entry.date);
                const fileInsertions = insertions.get(op.filename) ?? new Map<number, Entry[]>();
                const atLine = fileInsertions.get(line) ?? [];
                atLine.push(op.entry);
                fileInsertions.set(line, atLine);
                insertions.set(op.filename, fileInsertions);
            } else if (op.kind === 'change') {
                const span = this.ledger.entrySpan(op.oldEntry);
                const oldLines = this.ledger.lines(span.filename).slice(span.startLine, span.endLine);
                pushEdit(span.filename, {
                    startLine: span.startLine,
                    endLine: span.endLine,
                    order,
                    changes: diffLines(oldLines, printEntry(op.newEntry)),
                });
            } else {
                const span = this.ledger.entrySpan(op.oldEntry);
                const lines = this.ledger.lines(span.filename);
                let start = span.startLine;
                while (start > 0 && isBlank(lines[start - 1])) {
                    start--;
                }
                pushEdit(span.filename, {
                    startLine: start,
                    endLine: span.endLine,
                    order,
                    changes: lines.slice(start, span.endLine).map(text => ({ op: 'delete' as const, text })),
                });
            }
        });

        for (const [filename, fileInsertions] of insertions) {
            const lines = this.ledger.lines(filename);
            for (const [line, entries] of fileInsertions) {
                const inserted: string[] = [];
                for (const entry of entries) {
                    if (inserted.length > 0 || (line > 0 && !isBlank(lines[line - 1]))) {
                        inserted.push('');
                    }
                    inserted.push(...printEntry(entry));
                }
                if (line < lines.length && !isBlank(lines[line])) {
                    inserted.push('');
                }
                pushEdit(filename, {
                    startLine: line,
                    endLine: line,
                    order: -1,
                    changes: inserted.map(text => ({ op: 'insert' as const, text })),
                });
            }
        }

        const regions: ChangeRegion[] = [];
        const filenames = [...editsByFile.keys()].sort();
        for (const filename of filenames) {
            const edits = (editsByFile.get(filename) ?? []).sort((a, b) =>
                a.startLine - b.startLine || a.endLine - b.endLine || a.order - b.order
            );
            let cursor = 0;
            for (const edit of edits) {
                if (edit.startLine < cursor) {
                    throw new Error(`Staged changes overlap in ${filename} at line ${edit.startLine + 1}`);
                }
                regions.push({ filename, startLine: edit.startLine, endLine: edit.endLine, changes: edit.changes });
                cursor = edit.endLine;
            }
        }
        return { regions };
    }
}
