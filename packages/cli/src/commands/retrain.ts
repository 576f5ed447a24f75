import { openWorkspace } from '../workspace/open.js';
import { openSession } from '../workspace/session.js';
import { saveClassifier } from '../workspace/cache.js';
import { arrow, info, success, warn } from '../utils/console.js';
import type { GlobalOptions } from '../types.js';

export async function retrain(options: GlobalOptions): Promise<void> {
    const workspace = openWorkspace(options);
    const { session } = openSession(workspace, info);
    const result = session.retrain();
    success(`Trained classifier on ${result.examples} examples`);
    arrow(`Fingerprint: ${result.fingerprint}`);

    if (await saveClassifier(workspace, session.model)) {
        arrow(`Cache written to: ${workspace.paths.classifierCachePath}`);
    } else {
        warn('No classifier_cache configured; the model was not saved.');
    }
}
