import { formatChangeSet, ReconcileError, type Candidate, type CandidateSet } from '@ledger-reconcile/core';
import { openWorkspace } from '../workspace/open.js';
import { openSession, persistOutcome, type WorkspaceSession } from '../workspace/session.js';
import { saveClassifier } from '../workspace/cache.js';
import { createPrompter, type Ask } from '../utils/prompt.js';
import { arrow, info, log, success } from '../utils/console.js';
import type { ReviewOptions } from '../types.js';

export interface ReviewSummary {
    accepted: number;
    ignored: number;
    skipped: number;
    writtenFiles: string[];
}

export interface ReviewSettings {
    acceptTop: boolean;
    /** Stop after this many decisions; null for no limit. */
    limit: number | null;
}

type Command =
    | { kind: 'accept' | 'ignore'; index: number }
    | { kind: 'skip' }
    | { kind: 'back' }
    | { kind: 'quit' };

const PROMPT = 'a[N]ccept, i[N]gnore, s)kip, b)ack, q)uit > ';

/**
 * Parses a review answer such as `a`, `a2`, `i1`, `s`, `b` or `q`.
 * Candidate numbers are 1-based; a bare `a` or `i` means the first.
 */
export function parseCommand(answer: string): Command | null {
    const match = /^([aisbq])(\d*)$/.exec(answer.trim().toLowerCase());
    if (!match) return null;
    const [, letter, digits] = match;
    if (letter === 'a' || letter === 'i') {
        const number = digits ? parseInt(digits, 10) : 1;
        if (number < 1) return null;
        return { kind: letter === 'a' ? 'accept' : 'ignore', index: number - 1 };
    }
    if (digits) return null;
    return { kind: letter === 's' ? 'skip' : letter === 'b' ? 'back' : 'quit' };
}

export function describeCandidate(candidate: Candidate, number: number): string[] {
    const lines = [`#${number}`];
    for (const substitution of candidate.substitutedAccounts) {
        lines.push(`  ${substitution.originalName} -> ${substitution.accountName}`);
    }
    lines.push(formatChangeSet(candidate.changeSet));
    return lines;
}

function describeSet(ws: WorkspaceSession, set: CandidateSet): string[] {
    const pending = ws.session.pending[set.pendingIndex];
    const title = [pending.date, pending.source ?? 'ledger', pending.info?.description ?? ''].filter(Boolean).join(' ');
    return [
        '',
        `[${set.pendingIndex + 1}/${ws.session.pending.length}] ${title}`,
        ...set.candidates.flatMap((candidate, i) => describeCandidate(candidate, i + 1)),
    ];
}

/**
 * Walks the pending entries, asking what to do with each, and writes the
 * files every accept or ignore changes.
 */
export async function reviewPending(
    ws: WorkspaceSession,
    settings: ReviewSettings,
    ask: Ask | null,
    print: (line: string) => void = log
): Promise<ReviewSummary> {
    const { session } = ws;
    const summary: ReviewSummary = { accepted: 0, ignored: 0, skipped: 0, writtenFiles: [] };
    const record = (files: string[]) => {
        for (const file of files) {
            if (!summary.writtenFiles.includes(file)) summary.writtenFiles.push(file);
        }
    };

    while (settings.limit === null || summary.accepted + summary.ignored + summary.skipped < settings.limit) {
        const set = await session.computeCandidates();
        if (!set) break;
        describeSet(ws, set).forEach(line => print(line));

        let command: Command | null;
        if (settings.acceptTop) {
            command = { kind: 'accept', index: 0 };
        } else if (ask) {
            command = parseCommand(await ask(PROMPT));
        } else {
            throw new ReconcileError('Non-interactive mode. Use --accept-top to accept the top candidates.', 'NON_INTERACTIVE');
        }

        if (!command) {
            print('Unknown command');
            continue;
        }
        if (command.kind === 'quit') break;
        if (command.kind === 'back') {
            if (!session.unskip()) print('Nothing to go back to');
            continue;
        }
        if (command.kind === 'skip') {
            session.skip();
            summary.skipped++;
            continue;
        }
        if (command.index >= set.candidates.length) {
            print(`No candidate #${command.index + 1}`);
            continue;
        }
        if (command.kind === 'accept') {
            const outcome = session.accept(set.generation, command.index);
            record(await persistOutcome(ws, outcome, 'journal'));
            summary.accepted++;
        } else {
            const outcome = session.ignore(set.generation, command.index);
            record(await persistOutcome(ws, outcome, 'ignored'));
            summary.ignored++;
        }
    }
    return summary;
}

export async function review(options: ReviewOptions): Promise<void> {
    const workspace = openWorkspace(options);
    const ws = openSession(workspace, info);
    const limit = options.limit === undefined ? null : parseInt(options.limit, 10);
    if (limit !== null && (isNaN(limit) || limit < 0)) {
        throw new ReconcileError(`Invalid --limit "${options.limit}". Must be a non-negative integer.`, 'INVALID_OPTION');
    }

    const prompter = options.acceptTop ? null : createPrompter();
    let summary: ReviewSummary;
    try {
        summary = await reviewPending(ws, { acceptTop: options.acceptTop, limit }, prompter?.ask ?? null);
    } finally {
        prompter?.close();
    }

    log('\n--- Review Summary ---');
    success(`Accepted ${summary.accepted}, ignored ${summary.ignored}, skipped ${summary.skipped}`);
    for (const file of summary.writtenFiles) {
        arrow(`Updated: ${file}`);
    }
    arrow(`Remaining: ${ws.session.pending.length}`);
    if (summary.accepted > 0) {
        await saveClassifier(workspace, ws.session.model);
    }
}
