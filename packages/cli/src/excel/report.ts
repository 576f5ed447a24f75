import type { Workbook } from 'exceljs';
import type { InvalidReference, JournalError, Location, PendingEntry, UnclearedPosting } from '@ledger-reconcile/core';
import { addTableSheet, createWorkbook, formatAmountColumn } from './utils.js';

/**
 * What the report shows; `Session` provides each part.
 */
export interface ReportData {
    uncleared: readonly UnclearedPosting[];
    invalidReferences: readonly InvalidReference[];
    pending: readonly PendingEntry[];
    errors: readonly JournalError[];
}

function formatLocation(location: Location | undefined): string {
    return location ? `${location.filename}:${location.line}` : '';
}

/**
 * Workbook with the Uncleared, Invalid References, Pending and Errors sheets.
 */
export function generateReconcileReport(data: ReportData): Workbook {
    const workbook = createWorkbook();

    const uncleared = addTableSheet(
        workbook,
        'Uncleared',
        ['date', 'account', 'source', 'amount', 'currency', 'narration', 'location'],
        data.uncleared.map(posting => ({
            date: posting.date,
            account: posting.account,
            source: posting.source,
            amount: Number(posting.units.number),
            currency: posting.units.currency,
            narration: posting.narration,
            location: formatLocation(posting.location),
        }))
    );
    formatAmountColumn(uncleared, 'amount');

    addTableSheet(
        workbook,
        'Invalid References',
        ['source', 'account', 'record', 'extras', 'locations'],
        data.invalidReferences.map(reference => ({
            source: reference.source,
            account: reference.account,
            record: reference.description,
            extras: reference.extras,
            locations: reference.locations.map(formatLocation).join(', '),
        }))
    );

    addTableSheet(
        workbook,
        'Pending',
        ['pending_id', 'date', 'source', 'description', 'entries'],
        data.pending.map(entry => ({
            pending_id: entry.id,
            date: entry.date,
            source: entry.source ?? 'ledger',
            description: entry.info?.description ?? '',
            entries: entry.entries.length,
        }))
    );

    addTableSheet(
        workbook,
        'Errors',
        ['severity', 'message', 'location'],
        data.errors.map(error => ({
            severity: error.severity,
            message: error.message,
            location: error.filename ? `${error.filename}${error.line ? `:${error.line}` : ''}` : '',
        }))
    );

    return workbook;
}
