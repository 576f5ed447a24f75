import { describe, it, expect } from 'vitest';
import { Session } from '../../src/session/session.js';
import { Ledger } from '../../src/journal/ledger.js';
import type { Source } from '../../src/sources/types.js';
import { descriptionSource, ENGINE_CONFIG, record } from '../helpers.js';

function session(journal: string, sources: Source[], ignored = ''): Session {
    return new Session({
        journal: Ledger.fromTexts({ 'journal.beancount': journal }),
        ignored: Ledger.fromTexts({ 'ignored.beancount': ignored }),
        ignoredFile: 'ignored.beancount',
        sources,
        config: ENGINE_CONFIG,
    });
}

function texts(candidateChanges: ReadonlyArray<{ text: string }>): string[] {
    return candidateChanges.map(change => change.text);
}

describe('reconciliation end to end', () => {
    it('inserts a new import with the sentinel account when nothing has been learned', async () => {
        const card = descriptionSource('card', 'Liabilities:Credit-Card', [record('2016-08-10', '-2.45', 'STARBUCKS')]);
        const reconcile = session('2016-01-01 open Liabilities:Credit-Card USD\n', [card]);

        const set = await reconcile.computeCandidates();
        expect(set?.candidates).toHaveLength(1);
        const [candidate] = set?.candidates ?? [];
        expect(candidate.substitutedAccounts.map(s => [s.accountName, s.predictedName])).toEqual([['Expenses:FIXME', null]]);
        expect(candidate.changeSet.regions).toHaveLength(1);
        expect(candidate.changeSet.regions[0].startLine).toBe(1);
        expect(texts(candidate.changeSet.regions[0].changes)).toEqual([
            '',
            '2016-08-10 * "STARBUCKS"',
            '  Liabilities:Credit-Card  -2.45 USD',
            '    date: 2016-08-10',
            '    source_desc: "STARBUCKS"',
            '  Expenses:FIXME  2.45 USD',
            '',
            '2016-08-10 open Expenses:FIXME USD',
        ]);

        reconcile.accept(reconcile.generation, 0);
        expect(reconcile.state).toBe('finished');
        expect(reconcile.ledger.errors).toEqual([]);
        expect(reconcile.ledger.text('journal.beancount')).toBe([
            '2016-01-01 open Liabilities:Credit-Card USD',
            '',
            '2016-08-10 * "STARBUCKS"',
            '  Liabilities:Credit-Card  -2.45 USD',
            '    date: 2016-08-10',
            '    source_desc: "STARBUCKS"',
            '  Expenses:FIXME  2.45 USD',
            '',
            '2016-08-10 open Expenses:FIXME USD',
            '',
        ].join('\n'));
    });

    it('merges an import into a manual entry dated a day earlier', async () => {
        const journal = [
            '2016-01-01 open Liabilities:Credit-Card USD',
            '2016-01-01 open Expenses:Coffee USD',
            '',
            '2016-08-09 * "Coffee with a friend"',
            '  Liabilities:Credit-Card  -2.45 USD',
            '  Expenses:Coffee  2.45 USD',
            '',
        ].join('\n');
        const card = descriptionSource('card', 'Liabilities:Credit-Card', [record('2016-08-10', '-2.45', 'STARBUCKS')]);
        const reconcile = session(journal, [card]);

        const set = await reconcile.computeCandidates();
        const [top] = set?.candidates ?? [];
        expect(top.usedTransactionIds).toEqual([0, 1]);
        expect(set?.usedTransactions.map(used => used.pendingIndex)).toEqual([0, null]);

        reconcile.accept(reconcile.generation, 0);
        expect(reconcile.ledger.text('journal.beancount')).toBe([
            '2016-01-01 open Liabilities:Credit-Card USD',
            '2016-01-01 open Expenses:Coffee USD',
            '',
            '2016-08-09 * "Coffee with a friend"',
            '  Liabilities:Credit-Card  -2.45 USD',
            '    date: 2016-08-10',
            '    source_desc: "STARBUCKS"',
            '  Expenses:Coffee  2.45 USD',
            '',
        ].join('\n'));
        expect(reconcile.pending).toEqual([]);
        expect(reconcile.uncleared()).toEqual([]);
    });

    it('merges the two sides of a transfer at the edge of the date window', async () => {
        const journal = [
            '2016-01-01 open Assets:Checking USD',
            '2016-01-01 open Liabilities:Credit-Card USD',
            '',
        ].join('\n');
        const checking = descriptionSource('checking', 'Assets:Checking', [record('2016-08-01', '-66.88', 'PAYMENT TO CARD')]);
        const card = descriptionSource('card', 'Liabilities:Credit-Card', [record('2016-08-06', '66.88', 'PAYMENT RECEIVED')]);
        const reconcile = session(journal, [checking, card]);
        expect(reconcile.pending.map(p => p.source)).toEqual(['checking', 'card']);

        const set = await reconcile.computeCandidates();
        expect(set?.candidates).toHaveLength(2);
        const [transfer] = set?.candidates ?? [];
        expect(transfer.usedPendingIds).toEqual(reconcile.pending.map(p => p.id));
        expect(transfer.substitutedAccounts).toEqual([]);
        expect(texts(transfer.changeSet.regions[0].changes)).toEqual([
            '',
            '2016-08-01 * "PAYMENT TO CARD"',
            '  Assets:Checking  -66.88 USD',
            '    date: 2016-08-01',
            '    source_desc: "PAYMENT TO CARD"',
            '  Liabilities:Credit-Card  66.88 USD',
            '    date: 2016-08-06',
            '    source_desc: "PAYMENT RECEIVED"',
        ]);

        reconcile.accept(reconcile.generation, 0);
        expect(reconcile.pending).toEqual([]);
        expect(reconcile.state).toBe('finished');
    });

    it('keeps the two sides apart one day past the window', async () => {
        const journal = '2016-01-01 open Assets:Checking USD\n2016-01-01 open Liabilities:Credit-Card USD\n';
        const checking = descriptionSource('checking', 'Assets:Checking', [record('2016-08-01', '-66.88', 'PAYMENT TO CARD')]);
        const card = descriptionSource('card', 'Liabilities:Credit-Card', [record('2016-08-07', '66.88', 'PAYMENT RECEIVED')]);
        const reconcile = session(journal, [checking, card]);

        const set = await reconcile.computeCandidates();
        expect(set?.candidates).toHaveLength(1);
        expect(set?.candidates[0].usedPendingIds).toEqual([reconcile.pending[0].id]);
    });

    it('suppresses an ignored import on the next run', async () => {
        const journal = [
            '2016-01-01 open Liabilities:Credit-Card USD',
            '2016-01-01 open Expenses:Coffee USD',
            '',
            '2016-08-01 * "Coffee"',
            '  Liabilities:Credit-Card  -2.45 USD',
            '    source_desc: "STARBUCKS"',
            '  Expenses:Coffee  2.45 USD',
            '',
        ].join('\n');
        const records = [record('2016-08-01', '-2.45', 'STARBUCKS'), record('2016-08-20', '-4.10', 'STARBUCKS')];
        const first = session(journal, [descriptionSource('card', 'Liabilities:Credit-Card', records)]);

        const set = await first.computeCandidates();
        expect(set?.candidates[0].substitutedAccounts[0].accountName).toBe('Expenses:Coffee');
        first.ignore(first.generation, 0);
        const ignoredText = first.ignored.text('ignored.beancount');
        expect(ignoredText).toBe([
            '2016-08-20 * "STARBUCKS"',
            '  Liabilities:Credit-Card  -4.10 USD',
            '    date: 2016-08-20',
            '    source_desc: "STARBUCKS"',
            '  Expenses:FIXME  4.10 USD',
            '',
        ].join('\n'));
        expect(first.ledger.text('journal.beancount')).toBe(journal);

        const second = session(journal, [descriptionSource('card', 'Liabilities:Credit-Card', records)], ignoredText);
        expect(second.pending).toEqual([]);
        expect(second.suppressed).toBe(1);
        expect(second.state).toBe('finished');
    });
});
