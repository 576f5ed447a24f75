/**
 * Line diffs and change-set application.
 */

import type { ChangeRegion, ChangeSet, LineChange } from '../types/index.js';
import { ChangeSetConflictError } from '../errors.js';

/**
 * Minimal line diff via longest common subsequence.
 * Deletions are emitted before insertions at the same position.
 */
export function diffLines(oldLines: readonly string[], newLines: readonly string[]): LineChange[] {
    const n = oldLines.length;
    const m = newLines.length;
    // lcs[i][j] = LCS length of oldLines[i..] and newLines[j..]
    const lcs: number[][] = Array.from({ length: n + 1 }, () => new Array<number>(m + 1).fill(0));
    for (let i = n - 1; i >= 0; i--) {
        for (let j = m - 1; j >= 0; j--) {
            lcs[i][j] = oldLines[i] === newLines[j]
                ? lcs[i + 1][j + 1] + 1
                : Math.max(lcs[i + 1][j], lcs[i][j + 1]);
        }
    }

    const changes: LineChange[] = [];
    let i = 0;
    let j = 0;
    while (i < n && j < m) {
        if (oldLines[i] === newLines[j]) {
            changes.push({ op: 'context', text: oldLines[i] });
            i++;
            j++;
        } else if (lcs[i + 1][j] >= lcs[i][j + 1]) {
            changes.push({ op: 'delete', text: oldLines[i] });
            i++;
        } else {
            changes.push({ op: 'insert', text: newLines[j] });
            j++;
        }
    }
    for (; i < n; i++) changes.push({ op: 'delete', text: oldLines[i] });
    for (; j < m; j++) changes.push({ op: 'insert', text: newLines[j] });
    return changes;
}

/**
 * True when a change set only restates existing lines.
 */
export function isNoOpChangeSet(changeSet: ChangeSet): boolean {
    return changeSet.regions.every(region => region.changes.every(change => change.op === 'context'));
}

/**
 * Apply the regions of one file to its lines.
 *
 * Every context and delete line is checked against the current text.
 *
 * @throws ChangeSetConflictError when the text has drifted
 */
export function applyRegions(filename: string, lines: readonly string[], regions: readonly ChangeRegion[]): string[] {
    const result: string[] = [];
    let cursor = 0;

    for (const region of regions) {
        if (region.startLine < cursor || region.endLine < region.startLine) {
            throw new Error(`Overlapping or inverted change region in ${filename} at line ${region.startLine + 1}`);
        }
        result.push(...lines.slice(cursor, region.startLine));
        let position = region.startLine;
        for (const change of region.changes) {
            if (change.op === 'insert') {
                result.push(change.text);
                continue;
            }
            if (position >= region.endLine || lines[position] !== change.text) {
                throw new ChangeSetConflictError(filename, position, change.text, lines[position]);
            }
            if (change.op === 'context') {
                result.push(change.text);
            }
            position++;
        }
        if (position !== region.endLine) {
            throw new ChangeSetConflictError(filename, position, '', lines[position]);
        }
        cursor = region.endLine;
    }
    result.push(...lines.slice(cursor));
    return result;
}

/**
 * Group a change set's regions by file, preserving order.
 */
export function regionsByFile(changeSet: ChangeSet): Map<string, ChangeRegion[]> {
    const byFile = new Map<string, ChangeRegion[]>();
    for (const region of changeSet.regions) {
        const list = byFile.get(region.filename) ?? [];
        list.push(region);
        byFile.set(region.filename, list);
    }
    return byFile;
}

/**
 * Unified-diff style rendering for display.
 */
export function formatChangeSet(changeSet: ChangeSet): string {
    const out: string[] = [];
    for (const region of changeSet.regions) {
        out.push(`--- ${region.filename}:${region.startLine + 1}`);
        for (const change of region.changes) {
            const prefix = change.op === 'insert' ? '+' : change.op === 'delete' ? '-' : ' ';
            out.push(`${prefix}${change.text}`);
        }
    }
    return out.join('\n');
}
