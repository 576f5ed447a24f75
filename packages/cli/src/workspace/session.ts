import { Session, type ApplyOutcome } from '@ledger-reconcile/core';
import type { Workspace } from '../types.js';
import { createSources, toEngineConfig } from './config.js';
import { loadClassifier } from './cache.js';
import { LedgerStore } from './store.js';

export interface WorkspaceSession {
    workspace: Workspace;
    store: LedgerStore;
    session: Session;
}

/**
 * Loads the journal, the ignore ledger, the sources and the cached
 * classifier of a workspace into a review session.
 */
export function openSession(workspace: Workspace, log?: (message: string) => void): WorkspaceSession {
    const store = new LedgerStore(workspace.root);
    const ledgerOptions = { balanceEpsilon: workspace.config.balance_epsilon };
    const journal = store.load(store.nameFor(workspace.paths.journalPath), ledgerOptions);
    const ignoredFile = store.nameFor(workspace.paths.ignoredPath);
    const ignored = store.load(ignoredFile, ledgerOptions);

    const session = new Session({
        journal,
        ignored,
        ignoredFile,
        sources: createSources(workspace),
        config: toEngineConfig(workspace.config),
        model: loadClassifier(workspace),
        log,
    });
    return { workspace, store, session };
}

/**
 * Writes the files an accept (to the journal) or an ignore (to the ignore
 * ledger) changed.
 */
export async function persistOutcome(
    { store, session }: WorkspaceSession,
    outcome: ApplyOutcome,
    target: 'journal' | 'ignored'
): Promise<string[]> {
    await store.write(target === 'journal' ? session.ledger : session.ignored, outcome.modifiedFiles);
    return outcome.modifiedFiles;
}
