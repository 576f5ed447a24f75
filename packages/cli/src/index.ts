#!/usr/bin/env node
/**
 * ledger-reconcile CLI
 *
 * The CLI owns all file I/O and console output; core receives ledger texts
 * and parsed records and returns data.
 */

import { Command } from 'commander';
import { ReconcileError } from '@ledger-reconcile/core';
import { status } from './commands/status.js';
import { review } from './commands/review.js';
import { report } from './commands/report.js';
import { retrain } from './commands/retrain.js';
import { fail } from './utils/console.js';
import type { GlobalOptions, ReportOptions, ReviewOptions } from './types.js';

const program = new Command();

program
    .name('ledger-reconcile')
    .description('Reconcile imported transactions against a plain-text double-entry ledger')
    .version('0.1.0')
    .option('-w, --workspace <dir>', 'Workspace root (default: nearest directory with reconcile.yaml)');

function globalOptions(): GlobalOptions {
    return program.opts<GlobalOptions>();
}

program
    .command('status')
    .description('Show pending, uncleared and invalid entries and ledger diagnostics')
    .action(() => status(globalOptions()));

program
    .command('review')
    .description('Review pending entries and accept, ignore or skip candidates')
    .option('--accept-top', 'Accept the top-ranked candidate for every entry', false)
    .option('--limit <n>', 'Stop after this many decisions')
    .action(async (options: Omit<ReviewOptions, keyof GlobalOptions>) => {
        await review({ ...globalOptions(), ...options });
    });

program
    .command('report')
    .description('Write an Excel report of uncleared postings, invalid references, pending entries and errors')
    .option('-o, --out <file>', 'Output file (default: reconcile-report.xlsx in the workspace)')
    .action(async (options: Omit<ReportOptions, keyof GlobalOptions>) => {
        await report({ ...globalOptions(), ...options });
    });

program
    .command('retrain')
    .description('Retrain the account classifier from the ledger and write its cache')
    .action(async () => {
        await retrain(globalOptions());
    });

program.parseAsync(process.argv).catch((err: unknown) => {
    if (err instanceof ReconcileError) {
        fail(err.message);
    } else {
        fail(`Unexpected error: ${err instanceof Error ? err.message : String(err)}`);
    }
    process.exit(1);
});
