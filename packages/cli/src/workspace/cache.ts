import { existsSync, readFileSync } from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { ZodError } from 'zod';
import { DecisionTreeClassifier, type AccountClassifier } from '@ledger-reconcile/core';
import type { Workspace } from '../types.js';
import { ConfigError } from './config.js';

/**
 * Restores the classifier from the workspace cache, if one is configured
 * and present. The session retrains it when the ledger has changed since.
 */
export function loadClassifier(workspace: Workspace): DecisionTreeClassifier | undefined {
    const path = workspace.paths.classifierCachePath;
    if (!path || !existsSync(path)) return undefined;
    const classifierConfig = {
        maxDepth: workspace.config.classifier.max_depth,
        minSamplesSplit: workspace.config.classifier.min_samples_split,
    };
    try {
        return DecisionTreeClassifier.fromJSON(JSON.parse(readFileSync(path, 'utf-8')), classifierConfig);
    } catch (err) {
        if (err instanceof ZodError || err instanceof SyntaxError) {
            throw new ConfigError(path, `invalid classifier cache (${err.message}); delete it to retrain`);
        }
        throw err;
    }
}

/**
 * Writes the classifier cache.
 *
 * @returns false when no cache path is configured
 */
export async function saveClassifier(workspace: Workspace, model: AccountClassifier): Promise<boolean> {
    const path = workspace.paths.classifierCachePath;
    if (!path) return false;
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, JSON.stringify(model.toJSON(), null, 2), 'utf-8');
    return true;
}
