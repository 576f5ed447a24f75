/**
 * Deterministic identifiers derived with SHA-256.
 *
 * Uses js-sha256 so core stays free of Node's crypto module.
 */

import { sha256 } from 'js-sha256';
import { PLACEHOLDER } from '../types/index.js';

/**
 * Generate the stable id of a pending entry from its formatted text.
 *
 * Payload format: "{formatted}" or "{formatted}|{filename}:{line}" when the
 * entry was read from the ledger, so identical ledger transactions at
 * different positions stay distinct.
 *
 * @returns 64-character hex digest
 */
export function generatePendingId(formatted: string, location?: { filename: string; line: number }): string {
    const payload = location ? `${formatted}|${location.filename}:${location.line}` : formatted;
    return sha256(payload);
}

/**
 * Generate an opaque placeholder token for an unknown account.
 *
 * The token is letters only, starts with an upper-case letter and depends on
 * nothing but the seed, so resolving one group never changes another
 * group's token.
 */
export function generatePlaceholder(seed: string): string {
    const digest = sha256(seed);
    let token = '';
    for (let i = 0; i < PLACEHOLDER.LENGTH; i++) {
        const nibble = parseInt(digest[i], 16);
        const letter = String.fromCharCode('a'.charCodeAt(0) + nibble);
        token += i === 0 ? letter.toUpperCase() : letter;
    }
    return token;
}

/**
 * Fingerprint a list of strings (order-sensitive).
 */
export function fingerprint(parts: readonly string[]): string {
    return sha256(parts.join('\n'));
}
