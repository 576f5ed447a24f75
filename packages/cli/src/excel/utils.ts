import exceljs from 'exceljs';
import type { Worksheet, Workbook } from 'exceljs';

/**
 * Creates a new workbook with standard metadata.
 */
export function createWorkbook(): Workbook {
    const workbook = new exceljs.Workbook();
    workbook.creator = 'ledger-reconcile';
    workbook.created = new Date();
    return workbook;
}

/**
 * Bold white-on-blue header row, frozen.
 */
export function formatHeaderRow(worksheet: Worksheet): void {
    const headerRow = worksheet.getRow(1);

    headerRow.font = {
        bold: true,
        color: { argb: 'FFFFFFFF' },
        size: 11
    };

    headerRow.fill = {
        type: 'pattern',
        pattern: 'solid',
        fgColor: { argb: 'FF4472C4' }
    };

    headerRow.alignment = {
        vertical: 'middle',
        horizontal: 'center'
    };

    worksheet.views = [
        { state: 'frozen', xSplit: 0, ySplit: 1 }
    ];
}

/**
 * Sets column widths from the longest cell, capped at 100.
 */
export function autoFitColumns(worksheet: Worksheet): void {
    worksheet.columns.forEach(column => {
        let maxLen = 10;
        column.eachCell?.({ includeEmpty: false }, cell => {
            const len = cell.text.length;
            if (len > maxLen) maxLen = len;
        });
        column.width = Math.min(maxLen + 2, 100);
    });
}

export function formatAmountColumn(worksheet: Worksheet, key: string): void {
    const column = worksheet.getColumn(key);
    column.numFmt = '#,##0.00;[Red]-#,##0.00';
    column.alignment = { horizontal: 'right' };
}

/**
 * Adds a styled sheet with one column per header; keys equal headers.
 */
export function addTableSheet(
    workbook: Workbook,
    name: string,
    headers: readonly string[],
    rows: ReadonlyArray<Record<string, string | number>>
): Worksheet {
    const sheet = workbook.addWorksheet(name);
    sheet.columns = headers.map(header => ({ header, key: header }));
    for (const row of rows) {
        sheet.addRow(row);
    }
    formatHeaderRow(sheet);
    autoFitColumns(sheet);
    return sheet;
}
