/**
 * Reader for the subset of plain-text ledger syntax the engine writes.
 *
 * Transactions, `open`, `balance` and `price` become entries. Other dated
 * directives are kept as opaque spans so insertions stay chronological.
 * Malformed lines become diagnostics; parsing continues with the next entry.
 */

import type {
    Amount,
    Cost,
    Entry,
    JournalError,
    Meta,
    MetaValue,
    Posting,
    TransactionEntry,
} from '../types/index.js';
import { isValidIsoDate } from '../utils/date.js';

/**
 * Line span of a dated top-level directive. 0-based, endLine exclusive.
 */
export interface DirectiveSpan {
    date: string;
    startLine: number;
    endLine: number;
}

export interface ParsedJournal {
    entries: Entry[];
    directives: DirectiveSpan[];
    includes: string[];
    errors: JournalError[];
}

const DIRECTIVE_RE = /^(\d{4}-\d{2}-\d{2})\s+(\S+)(.*)$/;
const TRANSACTION_FLAG_RE = /^([*!&#?%PSTCURM]|txn)$/;
const META_RE = /^(\s+)([a-z][A-Za-z0-9_-]*):\s*(.*)$/;
const POSTING_RE = /^(\s+)(?:([*!&#?%PSTCURM])\s+)?([A-Z][^\s]*)\s*(.*)$/;
const ACCOUNT_RE = /^[A-Z][^\s:]*(:[^\s:]+)+$/;
const NUMBER_SOURCE = '-?\\d[\\d,]*(?:\\.\\d+)?';
const CURRENCY_SOURCE = "[A-Z][A-Z0-9'._-]*";
const AMOUNT_RE = new RegExp(`^(${NUMBER_SOURCE})\\s+(${CURRENCY_SOURCE})(.*)$`);
const PRICE_RE = new RegExp(`^@\\s+(${NUMBER_SOURCE})\\s+(${CURRENCY_SOURCE})\\s*$`);
const COST_AMOUNT_RE = new RegExp(`^(${NUMBER_SOURCE})\\s+(${CURRENCY_SOURCE})$`);
const HEADER_TOKEN_RE = /\s*("(?:[^"\\]|\\.)*"|#[^\s#^]+|\^[^\s#^]+)/y;
const UNDATED_KEYWORDS = new Set(['option', 'plugin', 'pushtag', 'poptag', 'pushmeta', 'popmeta']);

function normalizeNumber(raw: string): string {
    return raw.replace(/,/g, '');
}

/**
 * Remove a trailing `;` comment that is not inside a string.
 */
function stripComment(line: string): string {
    let inString = false;
    for (let i = 0; i < line.length; i++) {
        const ch = line[i];
        if (ch === '\\' && inString) {
            i++;
        } else if (ch === '"') {
            inString = !inString;
        } else if (ch === ';' && !inString) {
            return line.slice(0, i).trimEnd();
        }
    }
    return line.trimEnd();
}

function parseQuoted(token: string): string {
    const parsed: unknown = JSON.parse(token);
    if (typeof parsed !== 'string') {
        throw new Error(`Not a string literal: ${token}`);
    }
    return parsed;
}

/**
 * Parse a metadata value: quoted string, TRUE/FALSE, date, number, or a bare
 * token kept as text.
 */
export function parseMetaValue(raw: string): MetaValue {
    const value = raw.trim();
    if (value.startsWith('"')) return parseQuoted(value);
    if (value === 'TRUE') return true;
    if (value === 'FALSE') return false;
    if (isValidIsoDate(value)) return { kind: 'date', value };
    if (/^-?\d+(\.\d+)?$/.test(value)) return { kind: 'number', value };
    return value;
}

function parseCost(raw: string): Cost {
    const parts = raw.split(',').map(part => part.trim()).filter(part => part.length > 0);
    let amount: { number: string; currency: string } | null = null;
    let date: string | undefined;
    let label: string | undefined;
    for (const part of parts) {
        const amountMatch = COST_AMOUNT_RE.exec(part);
        if (amountMatch) {
            amount = { number: normalizeNumber(amountMatch[1]), currency: amountMatch[2] };
        } else if (isValidIsoDate(part)) {
            date = part;
        } else if (part.startsWith('"')) {
            label = parseQuoted(part);
        } else {
            throw new Error(`Unsupported cost component: ${part}`);
        }
    }
    if (!amount) {
        throw new Error(`Cost without a per-unit amount: {${raw}}`);
    }
    return { ...amount, ...(date ? { date } : {}), ...(label !== undefined ? { label } : {}) };
}

/**
 * Parse the text after a posting's account.
 */
function parsePostingAmount(raw: string): Pick<Posting, 'units' | 'cost' | 'price'> {
    const text = raw.trim();
    if (text.length === 0) return { units: null };

    const match = AMOUNT_RE.exec(text);
    if (!match) {
        throw new Error(`Invalid posting amount: ${text}`);
    }
    const units: Amount = { number: normalizeNumber(match[1]), currency: match[2] };
    let rest = match[3].trim();
    let cost: Cost | undefined;
    let price: Amount | undefined;

    if (rest.startsWith('{')) {
        const close = rest.indexOf('}');
        if (close < 0) {
            throw new Error(`Unterminated cost: ${rest}`);
        }
        cost = parseCost(rest.slice(1, close));
        rest = rest.slice(close + 1).trim();
    }
    if (rest.startsWith('@@')) {
        throw new Error('Total prices (@@) are not supported');
    }
    if (rest.startsWith('@')) {
        const priceMatch = PRICE_RE.exec(rest);
        if (!priceMatch) {
            throw new Error(`Invalid price: ${rest}`);
        }
        price = { number: normalizeNumber(priceMatch[1]), currency: priceMatch[2] };
        rest = '';
    }
    if (rest.length > 0) {
        throw new Error(`Unexpected text after amount: ${rest}`);
    }
    return { units, ...(cost ? { cost } : {}), ...(price ? { price } : {}) };
}

function parseTransactionHeader(rest: string): Pick<TransactionEntry, 'payee' | 'narration' | 'tags' | 'links'> {
    const strings: string[] = [];
    const tags: string[] = [];
    const links: string[] = [];
    let position = 0;
    for (;;) {
        HEADER_TOKEN_RE.lastIndex = position;
        const match = HEADER_TOKEN_RE.exec(rest);
        if (!match) break;
        const token = match[1];
        if (token.startsWith('"')) {
            if (tags.length > 0 || links.length > 0) {
                throw new Error('Strings must precede tags and links');
            }
            strings.push(parseQuoted(token));
        } else if (token.startsWith('#')) {
            tags.push(token.slice(1));
        } else {
            links.push(token.slice(1));
        }
        position = HEADER_TOKEN_RE.lastIndex;
    }
    if (rest.slice(position).trim().length > 0) {
        throw new Error(`Unexpected text in transaction header: ${rest.slice(position).trim()}`);
    }
    if (strings.length > 2) {
        throw new Error('Too many strings in transaction header');
    }
    if (strings.length === 2) {
        return { payee: strings[0], narration: strings[1], tags, links };
    }
    return { payee: null, narration: strings[0] ?? '', tags, links };
}

function parseTransaction(
    date: string,
    flag: string,
    rest: string,
    body: Array<{ line: number; text: string }>,
    location: { filename: string; line: number }
): TransactionEntry {
    const header = parseTransactionHeader(rest);
    const meta: Meta = {};
    const postings: Posting[] = [];
    let postingIndent = -1;

    for (const { line, text } of body) {
        const metaMatch = META_RE.exec(text);
        if (metaMatch) {
            const indent = metaMatch[1].length;
            const value = parseMetaValue(metaMatch[3]);
            const current = postings[postings.length - 1];
            if (current === undefined) {
                meta[metaMatch[2]] = value;
            } else if (indent > postingIndent) {
                current.meta[metaMatch[2]] = value;
            } else {
                throw new Error(`Line ${line + 1}: transaction metadata must precede postings`);
            }
            continue;
        }
        const postingMatch = POSTING_RE.exec(text);
        if (!postingMatch) {
            throw new Error(`Line ${line + 1}: unrecognized posting line: ${text.trim()}`);
        }
        const account = postingMatch[3];
        if (!ACCOUNT_RE.test(account)) {
            throw new Error(`Line ${line + 1}: invalid account name: ${account}`);
        }
        postingIndent = postingMatch[1].length;
        postings.push({
            account,
            ...parsePostingAmount(postingMatch[4]),
            ...(postingMatch[2] ? { flag: postingMatch[2] } : {}),
            meta: {},
        });
    }

    return {
        type: 'transaction',
        date,
        flag: flag === 'txn' ? '*' : flag,
        ...header,
        postings,
        meta,
        location,
    };
}

function parseEntryMeta(body: Array<{ line: number; text: string }>): Meta {
    const meta: Meta = {};
    for (const { line, text } of body) {
        const match = META_RE.exec(text);
        if (!match) {
            throw new Error(`Line ${line + 1}: expected metadata: ${text.trim()}`);
        }
        meta[match[2]] = parseMetaValue(match[3]);
    }
    return meta;
}

function parseDirective(
    date: string,
    keyword: string,
    rest: string,
    body: Array<{ line: number; text: string }>,
    location: { filename: string; line: number }
): Entry | null {
    if (TRANSACTION_FLAG_RE.test(keyword)) {
        return parseTransaction(date, keyword, rest, body, location);
    }
    switch (keyword) {
        case 'open': {
            const match = new RegExp(`^\\s+(\\S+)(?:\\s+(${CURRENCY_SOURCE}(?:,${CURRENCY_SOURCE})*))?(?:\\s+"[^"]*")?\\s*$`).exec(rest);
            if (!match || !ACCOUNT_RE.test(match[1])) {
                throw new Error(`Invalid open directive: ${rest.trim()}`);
            }
            return {
                type: 'open',
                date,
                account: match[1],
                currencies: match[2] ? match[2].split(',') : [],
                meta: parseEntryMeta(body),
                location,
            };
        }
        case 'balance': {
            const match = new RegExp(`^\\s+(\\S+)\\s+(${NUMBER_SOURCE})\\s+(${CURRENCY_SOURCE})\\s*$`).exec(rest);
            if (!match || !ACCOUNT_RE.test(match[1])) {
                throw new Error(`Invalid balance directive: ${rest.trim()}`);
            }
            return {
                type: 'balance',
                date,
                account: match[1],
                amount: { number: normalizeNumber(match[2]), currency: match[3] },
                meta: parseEntryMeta(body),
                location,
            };
        }
        case 'price': {
            const match = new RegExp(`^\\s+(${CURRENCY_SOURCE})\\s+(${NUMBER_SOURCE})\\s+(${CURRENCY_SOURCE})\\s*$`).exec(rest);
            if (!match) {
                throw new Error(`Invalid price directive: ${rest.trim()}`);
            }
            return {
                type: 'price',
                date,
                currency: match[1],
                amount: { number: normalizeNumber(match[2]), currency: match[3] },
                meta: parseEntryMeta(body),
                location,
            };
        }
        default:
            return null;
    }
}

export function splitLines(text: string): string[] {
    return text.split('\n');
}

/**
 * Parse one ledger file.
 *
 * @param filename - Name recorded in entry locations and diagnostics
 * @param text - File contents
 */
export function parseJournal(filename: string, text: string): ParsedJournal {
    const lines = splitLines(text);
    const entries: Entry[] = [];
    const directives: DirectiveSpan[] = [];
    const includes: string[] = [];
    const errors: JournalError[] = [];

    let i = 0;
    while (i < lines.length) {
        const raw = lines[i];
        const line = stripComment(raw);

        if (line.trim().length === 0 || /^[*#]/.test(raw)) {
            i++;
            continue;
        }

        if (/^\s/.test(line)) {
            errors.push({ severity: 'error', message: `Indented line outside of an entry: ${line.trim()}`, filename, line: i + 1 });
            i++;
            continue;
        }

        const directive = DIRECTIVE_RE.exec(line);
        if (!directive) {
            const keyword = line.split(/\s+/)[0];
            if (keyword === 'include') {
                const target = /^include\s+("(?:[^"\\]|\\.)*")\s*$/.exec(line);
                if (target) {
                    includes.push(parseQuoted(target[1]));
                } else {
                    errors.push({ severity: 'error', message: `Invalid include: ${line}`, filename, line: i + 1 });
                }
            } else if (!UNDATED_KEYWORDS.has(keyword)) {
                errors.push({ severity: 'error', message: `Unrecognized line: ${line}`, filename, line: i + 1 });
            }
            i++;
            continue;
        }

        const start = i;
        const body: Array<{ line: number; text: string }> = [];
        i++;
        while (i < lines.length && /^\s/.test(lines[i]) && lines[i].trim().length > 0) {
            const text = stripComment(lines[i]);
            if (text.trim().length > 0) {
                body.push({ line: i, text });
            }
            i++;
        }

        const [, date, keyword, rest] = directive;
        if (!isValidIsoDate(date)) {
            errors.push({ severity: 'error', message: `Invalid date: ${date}`, filename, line: start + 1 });
            continue;
        }
        directives.push({ date, startLine: start, endLine: i });

        try {
            const entry = parseDirective(date, keyword, rest, body, { filename, line: start + 1 });
            if (entry) {
                entries.push(entry);
            }
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            errors.push({ severity: 'error', message, filename, line: start + 1 });
        }
    }

    return { entries, directives, includes, errors };
}
