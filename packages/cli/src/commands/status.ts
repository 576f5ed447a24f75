import { openWorkspace } from '../workspace/open.js';
import { openSession } from '../workspace/session.js';
import { arrow, diagnostic, info, log, success } from '../utils/console.js';
import type { GlobalOptions } from '../types.js';

export function status(options: GlobalOptions): void {
    const workspace = openWorkspace(options);
    success(`Workspace: ${workspace.root}`);
    const { session } = openSession(workspace, info);

    log('\n--- Reconciliation Status ---');
    arrow(`Pending entries:    ${session.pending.length}`);
    arrow(`Suppressed:         ${session.suppressed}`);
    arrow(`Uncleared postings: ${session.uncleared().length}`);
    arrow(`Invalid references: ${session.invalidReferences().length}`);

    const errors = session.errors();
    if (errors.length > 0) {
        log('');
        for (const error of errors) {
            diagnostic(error);
        }
    }
}
