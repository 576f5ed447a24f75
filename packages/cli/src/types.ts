/**
 * ledger-reconcile CLI - Core Types
 */

import type { ReconcileConfig } from '@ledger-reconcile/shared';

export interface GlobalOptions {
    workspace?: string;
}

export interface ReviewOptions extends GlobalOptions {
    acceptTop: boolean;
    limit?: string;
}

export interface ReportOptions extends GlobalOptions {
    out?: string;
}

export interface WorkspacePaths {
    configPath: string;
    journalPath: string;
    ignoredPath: string;
    classifierCachePath: string | null;
    defaultReportPath: string;
}

export interface Workspace {
    root: string;
    config: ReconcileConfig;
    paths: WorkspacePaths;
}
