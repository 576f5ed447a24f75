import { existsSync, readFileSync } from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, isAbsolute, join, posix, relative, sep } from 'node:path';
import { Ledger, parseJournal, type LedgerOptions } from '@ledger-reconcile/core';

/**
 * Ledger files on disk, named by their path relative to the workspace root.
 */
export class LedgerStore {
    readonly root: string;

    constructor(root: string) {
        this.root = root;
    }

    /**
     * Ledger file name for an absolute path under the root.
     */
    nameFor(path: string): string {
        return relative(this.root, path).split(sep).join(posix.sep);
    }

    pathFor(filename: string): string {
        return join(this.root, ...filename.split(posix.sep));
    }

    /**
     * Reads `entryFile` and every file it includes, transitively. A missing
     * entry file reads as empty; a missing include is an error.
     */
    load(entryFile: string, options: LedgerOptions = {}): Ledger {
        const texts = new Map<string, string>();
        const queue = [entryFile];
        while (queue.length > 0) {
            const filename = queue.shift();
            if (filename === undefined || texts.has(filename)) continue;
            const path = this.pathFor(filename);
            if (!existsSync(path)) {
                if (filename !== entryFile) {
                    throw new Error(`Included file not found: ${filename}`);
                }
                texts.set(filename, '');
                continue;
            }
            const text = readFileSync(path, 'utf-8');
            texts.set(filename, text);
            for (const include of parseJournal(filename, text).includes) {
                queue.push(isAbsolute(include) ? this.nameFor(include) : posix.normalize(posix.join(posix.dirname(filename), include)));
            }
        }
        return Ledger.fromTexts(texts, options);
    }

    /**
     * Writes the given files of `ledger` back to disk.
     */
    async write(ledger: Ledger, filenames: readonly string[]): Promise<void> {
        for (const filename of filenames) {
            const path = this.pathFor(filename);
            await mkdir(dirname(path), { recursive: true });
            await writeFile(path, ledger.text(filename), 'utf-8');
        }
    }
}
