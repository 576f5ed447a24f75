/**
 * Formatted console output helpers
 */

import type { JournalError } from '@ledger-reconcile/core';

export function log(message: string): void {
    console.log(message);
}

export function success(message: string): void {
    console.log(`✓ ${message}`);
}

export function warn(message: string): void {
    console.warn(`⚠️  ${message}`);
}

export function info(message: string): void {
    console.info(`ℹ ${message}`);
}

export function arrow(message: string): void {
    console.log(`→ ${message}`);
}

export function fail(message: string): void {
    console.error(`\n✖ Error: ${message}`);
}

/**
 * One line per diagnostic: `file:line: message`.
 */
export function formatDiagnostic(error: JournalError): string {
    const where = error.filename ? `${error.filename}${error.line ? `:${error.line}` : ''}: ` : '';
    return `${where}${error.message}`;
}

export function diagnostic(error: JournalError): void {
    if (error.severity === 'error') {
        console.error(`✖ ${formatDiagnostic(error)}`);
    } else {
        warn(formatDiagnostic(error));
    }
}
