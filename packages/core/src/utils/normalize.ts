/**
 * Text normalization for classifier features.
 */

/**
 * Split a value into classifier words.
 *
 * Transformations:
 * - Convert to lowercase
 * - Split on whitespace
 * - Strip leading/trailing '-' and '.'
 * - Drop words that become empty
 *
 * @param raw - Raw metadata value, e.g. a bank description
 * @returns Normalized words in original order
 */
export function splitWords(raw: string): string[] {
    return raw
        .toLowerCase()
        .split(/\s+/)
        .map(word => word.replace(/^[-.]+|[-.]+$/g, ''))
        .filter(word => word.length > 0);
}

/**
 * Every contiguous word n-gram of the value, joined with single spaces.
 *
 * "Whole Foods Market" yields "whole", "whole foods", "whole foods market",
 * "foods", "foods market" and "market".
 */
export function wordNgrams(raw: string): string[] {
    const words = splitWords(raw);
    const result: string[] = [];
    for (let start = 0; start < words.length; start++) {
        for (let end = start + 1; end <= words.length; end++) {
            result.push(words.slice(start, end).join(' '));
        }
    }
    return result;
}
