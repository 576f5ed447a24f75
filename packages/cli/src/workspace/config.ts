import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse } from 'yaml';
import { ZodError } from 'zod';
import {
    ReconcileConfigSchema,
    SourceRecordsSchema,
    type EngineConfig,
    type ReconcileConfig,
    type SourceRecords,
} from '@ledger-reconcile/shared';
import { DescriptionSource, IdentitySource, ReconcileError, type Source } from '@ledger-reconcile/core';
import type { Workspace } from '../types.js';
import { CONFIG_FILENAME } from './detect.js';
import { resolvePaths, resolveWorkspacePath } from './paths.js';

/**
 * A configuration or records file is missing or does not match its schema.
 */
export class ConfigError extends ReconcileError {
    readonly path: string;

    constructor(path: string, message: string) {
        super(`${path}: ${message}`, 'CONFIG_ERROR');
        this.path = path;
    }
}

function describeZodError(err: ZodError): string {
    return err.issues
        .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
}

function readDocument(path: string, parseText: (text: string) => unknown): unknown {
    if (!existsSync(path)) {
        throw new ConfigError(path, 'file not found');
    }
    const content = readFileSync(path, 'utf-8');
    try {
        return parseText(content);
    } catch (err) {
        throw new ConfigError(path, err instanceof Error ? err.message : String(err));
    }
}

function validate<T>(path: string, data: unknown, schemaParse: (data: unknown) => T): T {
    try {
        return schemaParse(data);
    } catch (err) {
        if (err instanceof ZodError) {
            throw new ConfigError(path, describeZodError(err));
        }
        throw err;
    }
}

/**
 * Loads and validates reconcile.yaml.
 */
export function loadConfig(path: string): ReconcileConfig {
    const data = readDocument(path, parse);
    return validate(path, data ?? {}, value => ReconcileConfigSchema.parse(value));
}

/**
 * Loads a workspace from its root directory.
 */
export function loadWorkspace(root: string): Workspace {
    const config = loadConfig(join(root, CONFIG_FILENAME));
    return { root, config, paths: resolvePaths(root, config) };
}

/**
 * Engine settings derived from the workspace config. Output files stay
 * relative to the workspace root, matching the ledger's file names.
 */
export function toEngineConfig(config: ReconcileConfig): EngineConfig {
    return {
        matchWindowDays: config.fuzzy_match_days,
        costTolerance: config.cost_tolerance,
        balanceEpsilon: config.balance_epsilon,
        ignoreAccountPattern: config.ignore_account_for_classification_pattern,
        classifier: {
            maxDepth: config.classifier.max_depth,
            minSamplesSplit: config.classifier.min_samples_split,
        },
        output: {
            defaultOutput: config.default_output ?? config.journal,
            openOutput: config.open_output,
            balanceOutput: config.balance_output,
            priceOutput: config.price_output,
            transactionOutputMap: config.transaction_output_map,
        },
    };
}

/**
 * Loads a records file: either a JSON array of transactions or an object
 * with `transactions`, `balances` and `prices`.
 */
export function loadSourceRecords(path: string): SourceRecords {
    const data = readDocument(path, text => JSON.parse(text));
    const wrapped = Array.isArray(data) ? { transactions: data } : data;
    return validate(path, wrapped, value => SourceRecordsSchema.parse(value));
}

export function createSources(workspace: Workspace): Source[] {
    return workspace.config.sources.map((source): Source => {
        const records = loadSourceRecords(resolveWorkspacePath(workspace.root, source.records));
        switch (source.kind) {
            case 'description':
                return new DescriptionSource({ name: source.name, account: source.account, records });
            case 'identity':
                return new IdentitySource({
                    name: source.name,
                    account: source.account,
                    identityKey: source.identity_key,
                    records,
                });
        }
    });
}
