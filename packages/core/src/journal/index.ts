export { parseJournal, parseMetaValue, splitLines } from './parser.js';
export type { DirectiveSpan, ParsedJournal } from './parser.js';
export { printEntry, formatEntries, formatPosting, formatAmount, formatMetaValue, quoteString } from './printer.js';
export { diffLines, applyRegions, regionsByFile, isNoOpChangeSet, formatChangeSet } from './diff.js';
export { Ledger } from './ledger.js';
export type { EntrySpan, LedgerOptions, ApplyResult } from './ledger.js';
export { StagedChanges } from './staged-changes.js';
export { selectOutputFile } from './file-selector.js';
