import { resolve } from 'node:path';
import { openWorkspace } from '../workspace/open.js';
import { openSession } from '../workspace/session.js';
import { generateReconcileReport } from '../excel/report.js';
import { arrow, info, success } from '../utils/console.js';
import type { ReportOptions } from '../types.js';

export async function report(options: ReportOptions): Promise<void> {
    const workspace = openWorkspace(options);
    const { session } = openSession(workspace, info);

    const workbook = generateReconcileReport({
        uncleared: session.uncleared(),
        invalidReferences: session.invalidReferences(),
        pending: session.pending,
        errors: session.errors(),
    });
    const out = options.out ? resolve(options.out) : workspace.paths.defaultReportPath;
    await workbook.xlsx.writeFile(out);

    success(`Report written to: ${out}`);
    arrow(`Uncleared: ${session.uncleared().length}, pending: ${session.pending.length}, errors: ${session.errors().length}`);
}
