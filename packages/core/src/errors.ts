/**
 * Error types raised by core.
 *
 * Invariant violations throw plain Error. These classes cover conditions a
 * caller is expected to handle.
 */

export class ReconcileError extends Error {
    readonly code: string;
    readonly retriable: boolean;

    constructor(message: string, code: string, retriable = false) {
        super(message);
        this.name = new.target.name;
        this.code = code;
        this.retriable = retriable;
    }
}

/**
 * A command referenced a generation the session has moved past.
 * Recompute candidates and retry.
 */
export class StaleGenerationError extends ReconcileError {
    readonly expected: number;
    readonly actual: number;

    constructor(expected: number, actual: number) {
        super(`Stale generation ${expected}: session is at generation ${actual}`, 'STALE_GENERATION', true);
        this.expected = expected;
        this.actual = actual;
    }
}

/**
 * The ledger text no longer matches the lines a change set expects.
 */
export class ChangeSetConflictError extends ReconcileError {
    readonly filename: string;
    readonly line: number;

    constructor(filename: string, line: number, expected: string, actual: string | undefined) {
        super(
            `Change set conflict in ${filename} at line ${line + 1}: expected ${JSON.stringify(expected)}, found ${actual === undefined ? 'end of file' : JSON.stringify(actual)}`,
            'CHANGE_SET_CONFLICT'
        );
        this.filename = filename;
        this.line = line;
    }
}

export class NoPendingEntryError extends ReconcileError {
    constructor() {
        super('No pending entry is selected', 'NO_PENDING_ENTRY');
    }
}

export class CandidateNotFoundError extends ReconcileError {
    constructor(index: number, count: number) {
        super(`Candidate ${index} does not exist (${count} candidates)`, 'CANDIDATE_NOT_FOUND');
    }
}
