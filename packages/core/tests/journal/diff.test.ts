import { describe, it, expect } from 'vitest';
import { applyRegions, diffLines, formatChangeSet, isNoOpChangeSet } from '../../src/journal/diff.js';
import { ChangeSetConflictError } from '../../src/errors.js';

describe('diffLines', () => {
    it('deletes before inserting a replaced line', () => {
        expect(diffLines(['a', 'b', 'c'], ['a', 'x', 'c'])).toEqual([
            { op: 'context', text: 'a' },
            { op: 'delete', text: 'b' },
            { op: 'insert', text: 'x' },
            { op: 'context', text: 'c' },
        ]);
    });

    it('handles pure insertion and deletion', () => {
        expect(diffLines([], ['a'])).toEqual([{ op: 'insert', text: 'a' }]);
        expect(diffLines(['a'], [])).toEqual([{ op: 'delete', text: 'a' }]);
    });
});

describe('applyRegions', () => {
    it('applies a checked region', () => {
        const result = applyRegions('j', ['a', 'b', 'c'], [{
            filename: 'j',
            startLine: 1,
            endLine: 2,
            changes: [{ op: 'delete', text: 'b' }, { op: 'insert', text: 'x' }],
        }]);
        expect(result).toEqual(['a', 'x', 'c']);
    });

    it('throws when the text has drifted', () => {
        const apply = () => applyRegions('j', ['a', 'z', 'c'], [{
            filename: 'j',
            startLine: 1,
            endLine: 2,
            changes: [{ op: 'delete', text: 'b' }],
        }]);
        expect(apply).toThrow(ChangeSetConflictError);
        expect(apply).toThrow('Change set conflict in j at line 2: expected "b", found "z"');
    });
});

describe('change set helpers', () => {
    const changeSet = {
        regions: [{
            filename: 'j',
            startLine: 1,
            endLine: 2,
            changes: [{ op: 'delete' as const, text: 'b' }, { op: 'insert' as const, text: 'x' }],
        }],
    };

    it('renders a unified-style view', () => {
        expect(formatChangeSet(changeSet)).toBe('--- j:2\n-b\n+x');
    });

    it('detects context-only change sets', () => {
        expect(isNoOpChangeSet(changeSet)).toBe(false);
        expect(isNoOpChangeSet({ regions: [{ filename: 'j', startLine: 0, endLine: 1, changes: [{ op: 'context', text: 'a' }] }] })).toBe(true);
    });
});
