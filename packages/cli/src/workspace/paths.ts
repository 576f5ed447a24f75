import { join, resolve } from 'node:path';
import type { ReconcileConfig } from '@ledger-reconcile/shared';
import type { WorkspacePaths } from '../types.js';
import { CONFIG_FILENAME } from './detect.js';

export const DEFAULT_REPORT_FILENAME = 'reconcile-report.xlsx';

/**
 * Absolute path of a workspace-relative path from the config.
 */
export function resolveWorkspacePath(root: string, relative: string): string {
    return resolve(root, relative);
}

export function resolvePaths(root: string, config: ReconcileConfig): WorkspacePaths {
    return {
        configPath: join(root, CONFIG_FILENAME),
        journalPath: resolveWorkspacePath(root, config.journal),
        ignoredPath: resolveWorkspacePath(root, config.ignored),
        classifierCachePath: config.classifier_cache ? resolveWorkspacePath(root, config.classifier_cache) : null,
        defaultReportPath: join(root, DEFAULT_REPORT_FILENAME),
    };
}
