import type { Meta, MetaValue } from '../types/index.js';
import { LOCATION_META_KEYS } from '../types/index.js';
import { isValidIsoDate } from '../utils/date.js';

const LOCATION_KEYS: ReadonlySet<string> = new Set(LOCATION_META_KEYS);

/**
 * Canonical text of a metadata value, used for identity lookups and
 * equality. Booleans print as TRUE/FALSE.
 */
export function metaValueText(value: MetaValue): string {
    if (typeof value === 'string') return value;
    if (typeof value === 'boolean') return value ? 'TRUE' : 'FALSE';
    return value.value;
}

export function metaValuesEqual(a: MetaValue, b: MetaValue): boolean {
    if (typeof a !== typeof b) return false;
    if (typeof a === 'object' && typeof b === 'object') {
        return a.kind === b.kind && a.value === b.value;
    }
    return a === b;
}

/**
 * Read a date-valued key. Quoted ISO strings are accepted as dates.
 *
 * @returns the ISO date, or null when the key is absent or not a date
 */
export function metaDate(meta: Meta, key: string): string | null {
    const value = meta[key];
    if (value === undefined) return null;
    if (typeof value === 'object' && value.kind === 'date') return value.value;
    if (typeof value === 'string' && isValidIsoDate(value)) return value;
    return null;
}

export function dateMeta(date: string): MetaValue {
    return { kind: 'date', value: date };
}

/**
 * Two metadata maps are mergeable when no shared key has different values.
 * Location keys are ignored.
 */
export function metasMergeable(a: Meta, b: Meta): boolean {
    for (const [key, value] of Object.entries(a)) {
        if (LOCATION_KEYS.has(key)) continue;
        const other = b[key];
        if (other !== undefined && !metaValuesEqual(value, other)) {
            return false;
        }
    }
    return true;
}

/**
 * Primary keys first, then keys only the secondary carries.
 */
export function mergeMeta(primary: Meta, secondary: Meta): Meta {
    const result: Meta = { ...primary };
    for (const [key, value] of Object.entries(secondary)) {
        if (LOCATION_KEYS.has(key)) continue;
        if (result[key] === undefined) {
            result[key] = value;
        }
    }
    return result;
}

export function withoutLocationKeys(meta: Meta): Meta {
    const result: Meta = {};
    for (const [key, value] of Object.entries(meta)) {
        if (!LOCATION_KEYS.has(key)) {
            result[key] = value;
        }
    }
    return result;
}

export function hasMeta(meta: Meta): boolean {
    return Object.keys(withoutLocationKeys(meta)).length > 0;
}
