import { describe, it, expect, vi, afterEach } from 'vitest';
import { existsSync, readFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { parseCommand, reviewPending } from '../src/commands/review.js';
import { loadWorkspace } from '../src/workspace/config.js';
import { openSession, type WorkspaceSession } from '../src/workspace/session.js';
import { loadClassifier, saveClassifier } from '../src/workspace/cache.js';
import { JOURNAL, standardWorkspace } from './fixtures.js';

const roots: string[] = [];

afterEach(() => {
    for (const root of roots.splice(0)) {
        rmSync(root, { recursive: true, force: true });
    }
});

function open(log?: (message: string) => void): WorkspaceSession {
    const root = standardWorkspace();
    roots.push(root);
    return openSession(loadWorkspace(root), log);
}

function answers(...replies: string[]): () => Promise<string> {
    const queue = [...replies];
    return () => Promise.resolve(queue.shift() ?? 'q');
}

describe('parseCommand', () => {
    it('reads candidate numbers as 1-based', () => {
        expect(parseCommand('a')).toEqual({ kind: 'accept', index: 0 });
        expect(parseCommand(' A2 ')).toEqual({ kind: 'accept', index: 1 });
        expect(parseCommand('i')).toEqual({ kind: 'ignore', index: 0 });
        expect(parseCommand('s')).toEqual({ kind: 'skip' });
        expect(parseCommand('b')).toEqual({ kind: 'back' });
        expect(parseCommand('q')).toEqual({ kind: 'quit' });
    });

    it('rejects anything else', () => {
        expect(parseCommand('a0')).toBeNull();
        expect(parseCommand('s1')).toBeNull();
        expect(parseCommand('x')).toBeNull();
        expect(parseCommand('')).toBeNull();
    });
});

describe('reviewPending', () => {
    it('accepts the top candidates and writes the journal', async () => {
        const ws = open();
        const printed: string[] = [];
        const summary = await reviewPending(ws, { acceptTop: true, limit: null }, null, line => printed.push(line));

        expect(summary).toEqual({ accepted: 2, ignored: 0, skipped: 0, writtenFiles: ['journal.beancount'] });
        expect(printed).toContain('[1/2] 2016-08-10 card STARBUCKS');
        expect(printed).toContain('  Expenses:FIXME -> Expenses:Coffee');
        expect(ws.session.pending).toEqual([]);
        expect(readFileSync(join(ws.workspace.root, 'journal.beancount'), 'utf-8')).toBe([
            JOURNAL,
            '2016-08-10 * "STARBUCKS"',
            '  Liabilities:Credit-Card  -3.10 USD',
            '    date: 2016-08-10',
            '    source_desc: "STARBUCKS"',
            '  Expenses:Coffee  3.10 USD',
            '',
            '2016-08-12 * "CORNER STORE"',
            '  Liabilities:Credit-Card  -7.00 USD',
            '    date: 2016-08-12',
            '    source_desc: "CORNER STORE"',
            '  Expenses:Coffee  7.00 USD',
            '',
        ].join('\n'));
    });

    it('stops at the limit', async () => {
        const ws = open();
        const summary = await reviewPending(ws, { acceptTop: true, limit: 1 }, null, () => undefined);
        expect(summary.accepted).toBe(1);
        expect(ws.session.pending.map(p => p.info?.description)).toEqual(['CORNER STORE']);
    });

    it('skips and ignores on request', async () => {
        const ws = open();
        const summary = await reviewPending(ws, { acceptTop: false, limit: null }, answers('s', 'i'), () => undefined);

        expect(summary).toEqual({ accepted: 0, ignored: 1, skipped: 1, writtenFiles: ['ignored.beancount'] });
        expect(readFileSync(join(ws.workspace.root, 'ignored.beancount'), 'utf-8')).toBe([
            '2016-08-12 * "CORNER STORE"',
            '  Liabilities:Credit-Card  -7.00 USD',
            '    date: 2016-08-12',
            '    source_desc: "CORNER STORE"',
            '  Expenses:FIXME  7.00 USD',
            '',
        ].join('\n'));
        expect(readFileSync(join(ws.workspace.root, 'journal.beancount'), 'utf-8')).toBe(JOURNAL);
    });

    it('reports unknown commands and missing candidates', async () => {
        const ws = open();
        const printed: string[] = [];
        const summary = await reviewPending(ws, { acceptTop: false, limit: null }, answers('x', 'a3', 'q'), line => printed.push(line));

        expect(printed).toContain('Unknown command');
        expect(printed).toContain('No candidate #3');
        expect(summary).toEqual({ accepted: 0, ignored: 0, skipped: 0, writtenFiles: [] });
        expect(existsSync(join(ws.workspace.root, 'ignored.beancount'))).toBe(false);
    });

    it('refuses to run without a prompt unless accepting the top candidate', async () => {
        const ws = open();
        await expect(reviewPending(ws, { acceptTop: false, limit: null }, null, () => undefined)).rejects.toThrow('Non-interactive mode');
    });
});

describe('classifier cache', () => {
    it('round-trips the trained model and skips retraining on load', async () => {
        const first = open();
        first.session.retrain();
        expect(await saveClassifier(first.workspace, first.session.model)).toBe(true);

        const cached = loadClassifier(first.workspace);
        expect(cached?.fingerprint).toBe(first.session.model.toJSON().fingerprint);

        const log = vi.fn();
        const second = openSession(first.workspace, log);
        expect(log).not.toHaveBeenCalled();
        expect(second.session.explainPrediction(0)).toEqual(['=> Expenses:Coffee (1 samples)']);
    });

    it('has nothing to load before the first save', () => {
        expect(loadClassifier(open().workspace)).toBeUndefined();
    });
});
