import { detectWorkspaceRoot, CONFIG_FILENAME } from './detect.js';
import { ConfigError, loadWorkspace } from './config.js';
import type { GlobalOptions, Workspace } from '../types.js';

/**
 * Workspace from `--workspace`, or the nearest directory above the cwd
 * holding reconcile.yaml.
 *
 * @throws ConfigError when no workspace is found or its config is invalid
 */
export function openWorkspace(options: GlobalOptions): Workspace {
    const root = options.workspace ?? detectWorkspaceRoot();
    if (!root) {
        throw new ConfigError(process.cwd(), `workspace not found (no ${CONFIG_FILENAME} here or in a parent directory)`);
    }
    return loadWorkspace(root);
}
