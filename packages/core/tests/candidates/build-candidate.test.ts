import { describe, it, expect } from 'vitest';
import Decimal from 'decimal.js';
import { buildCandidate, buildInsertionCandidate, missingOpens, type BuildContext } from '../../src/candidates/build-candidate.js';
import { UsedTransactionRegistry } from '../../src/candidates/used-transactions.js';
import { ClearingIndex } from '../../src/clearing/clearing-index.js';
import { Ledger } from '../../src/journal/ledger.js';
import { findHypotheses } from '../../src/matcher/find-hypotheses.js';
import type { Hypothesis } from '../../src/matcher/types.js';
import { Predictor } from '../../src/predictor/predictor.js';
import type { AccountClassifier } from '../../src/predictor/decision-tree.js';
import { makePendingEntry, PendingPool } from '../../src/session/pending-pool.js';
import type { MatchableTransaction } from '../../src/clearing/posting-index.js';
import type { PendingEntry } from '../../src/types/index.js';
import { ReconcileError } from '../../src/errors.js';
import { generatePlaceholder } from '../../src/utils/hash.js';
import { descriptionSource, posting, transaction } from '../helpers.js';

const card = descriptionSource('card', 'Liabilities:Credit-Card');

const starbucks = transaction('2016-08-10', 'STARBUCKS', [
    posting('Liabilities:Credit-Card', '-2.45 USD', { date: { kind: 'date', value: '2016-08-10' }, source_desc: 'STARBUCKS' }),
    posting('Expenses:FIXME', '2.45 USD'),
]);

const pending: PendingEntry = makePendingEntry({ date: '2016-08-10', entries: [starbucks] }, 'card');

const owner: MatchableTransaction = {
    key: `pending:${pending.id}`,
    transaction: starbucks,
    origin: 'pending',
    pendingIndex: 0,
    order: 0,
};

function standalone(transactionOverride = starbucks): Hypothesis {
    return { key: 'standalone', transaction: transactionOverride, used: [owner], matchedPostings: 0, dateDistance: 0 };
}

function fixedModel(account: string | null): AccountClassifier {
    return {
        train: () => undefined,
        predict: () => account,
        explain: () => [],
        toJSON: () => ({ version: 1, fingerprint: '', vocabulary: [], root: null }),
    };
}

function buildContext(text: string, predicted: string | null = null): BuildContext {
    return {
        ledger: Ledger.fromTexts({ 'journal.beancount': text }),
        output: { defaultOutput: 'journal.beancount', transactionOutputMap: [] },
        predictor: new Predictor({ sources: [card], model: fixedModel(predicted) }),
        balanceEpsilon: new Decimal('0.005'),
        pending: [pending],
    };
}

const CARD_ONLY = '2016-01-01 open Liabilities:Credit-Card USD\n';

describe('buildCandidate', () => {
    it('inserts a new transaction and opens the accounts it needs', () => {
        const candidate = buildCandidate(pending, standalone(), new UsedTransactionRegistry(), buildContext(CARD_ONLY));
        const placeholder = generatePlaceholder(`${pending.id}|standalone|1`);

        expect(candidate?.substitutedAccounts).toEqual([{
            uniqueName: placeholder,
            accountName: 'Expenses:FIXME',
            groupNumber: 0,
            originalName: 'Expenses:FIXME',
            predictedName: null,
        }]);
        expect(candidate?.changeSet.regions).toEqual([{
            filename: 'journal.beancount',
            startLine: 1,
            endLine: 1,
            changes: [
                '',
                '2016-08-10 * "STARBUCKS"',
                '  Liabilities:Credit-Card  -2.45 USD',
                '    date: 2016-08-10',
                '    source_desc: "STARBUCKS"',
                '  Expenses:FIXME  2.45 USD',
                '',
                '2016-08-10 open Expenses:FIXME USD',
            ].map(text => ({ op: 'insert', text })),
        }]);
        expect(candidate?.placeholderChangeSet.regions[0].changes[5]).toEqual({ op: 'insert', text: `  ${placeholder}  2.45 USD` });
        expect(candidate?.usedPendingIds).toEqual([pending.id]);
        expect(candidate?.usedTransactionIds).toEqual([0]);
        expect(candidate?.properties).toEqual({ narration: 'STARBUCKS', payee: null, tags: [], links: [] });
    });

    it('fills unknown accounts from the predictor', () => {
        const ledger = CARD_ONLY + '2016-01-01 open Expenses:Coffee USD\n';
        const candidate = buildCandidate(pending, standalone(), new UsedTransactionRegistry(), buildContext(ledger, 'Expenses:Coffee'));
        expect(candidate?.substitutedAccounts[0].accountName).toBe('Expenses:Coffee');
        expect(candidate?.substitutedAccounts[0].predictedName).toBe('Expenses:Coffee');
        expect(candidate?.newEntries).toHaveLength(1);
        expect(candidate?.changeSet.regions[0].changes.map(change => change.text)).toContain('  Expenses:Coffee  2.45 USD');
    });

    it('leaves split unknown postings without a prediction', () => {
        const split = transaction('2016-08-10', 'STARBUCKS', [
            posting('Liabilities:Credit-Card', '-10 USD', { date: { kind: 'date', value: '2016-08-10' }, source_desc: 'STARBUCKS' }),
            posting('Expenses:FIXME', '4 USD'),
            posting('Expenses:FIXME:tax', '6 USD'),
        ]);
        const ledger = CARD_ONLY + '2016-01-01 open Expenses:Coffee USD\n';
        const candidate = buildCandidate(pending, standalone(split), new UsedTransactionRegistry(), buildContext(ledger, 'Expenses:Coffee'));
        expect(candidate?.substitutedAccounts.map(s => [s.accountName, s.groupNumber, s.predictedName])).toEqual([
            ['Expenses:FIXME', 0, null],
            ['Expenses:FIXME:tax', 1, null],
        ]);
    });

    it('rewrites the ledger transaction a hypothesis merges with', () => {
        const text = [
            '2016-01-01 open Liabilities:Credit-Card USD',
            '2016-01-01 open Expenses:Coffee USD',
            '',
            '2016-08-09 * "Coffee"',
            '  Liabilities:Credit-Card  -2.45 USD',
            '  Expenses:Coffee  2.45 USD',
            '',
        ].join('\n');
        const context = buildContext(text);
        const clearing = ClearingIndex.build(context.ledger, [card]);
        const pool = new PendingPool([pending], clearing.identityKeys);
        const current = pool.matchable(0);
        if (!current) throw new Error('expected a matchable pending entry');

        const [merged] = findHypotheses(current, {
            indexes: [clearing.postings, pool.index],
            options: {
                matchWindowDays: 5,
                costTolerance: new Decimal('0.005'),
                balanceEpsilon: new Decimal('0.005'),
                isCleared: p => card.isMine(p.account) && card.isPostingCleared(p),
            },
        });
        const registry = new UsedTransactionRegistry();
        const candidate = buildCandidate(pending, merged, registry, context);

        expect(candidate?.substitutedAccounts).toEqual([]);
        expect(candidate?.usedTransactionIds).toEqual([0, 1]);
        expect(registry.list.map(used => used.pendingIndex)).toEqual([0, null]);
        expect(candidate?.changeSet.regions).toEqual([{
            filename: 'journal.beancount',
            startLine: 3,
            endLine: 6,
            changes: [
                { op: 'context', text: '2016-08-09 * "Coffee"' },
                { op: 'context', text: '  Liabilities:Credit-Card  -2.45 USD' },
                { op: 'insert', text: '    date: 2016-08-10' },
                { op: 'insert', text: '    source_desc: "STARBUCKS"' },
                { op: 'context', text: '  Expenses:Coffee  2.45 USD' },
            ],
        }]);
        expect(candidate?.matchedPostings).toBe(2);
        expect(candidate?.dateDistance).toBe(2);
    });

    it('rejects an unbalanced resolution unless told otherwise', () => {
        const unbalanced = transaction('2016-08-10', 'STARBUCKS', [
            posting('Liabilities:Credit-Card', '-2.45 USD'),
            posting('Expenses:FIXME', '3.00 USD'),
        ]);
        const context = buildContext(CARD_ONLY);
        expect(buildCandidate(pending, standalone(unbalanced), new UsedTransactionRegistry(), context)).toBeNull();
        expect(buildCandidate(pending, standalone(unbalanced), new UsedTransactionRegistry(), context, {}, false)).not.toBeNull();
    });

    it('applies edits to accounts and descriptive fields', () => {
        const candidate = buildCandidate(pending, standalone(), new UsedTransactionRegistry(), buildContext(CARD_ONLY), {
            accounts: ['Expenses:Coffee'],
            narration: 'Morning coffee',
            tags: ['work'],
        });
        expect(candidate?.properties).toEqual({ narration: 'Morning coffee', payee: null, tags: ['work'], links: [] });
        expect(candidate?.originalProperties).toEqual({ narration: 'STARBUCKS', payee: null, tags: [], links: [] });
        expect(candidate?.changeSet.regions[0].changes.map(change => change.text)).toEqual([
            '',
            '2016-08-10 * "Morning coffee" #work',
            '  Liabilities:Credit-Card  -2.45 USD',
            '    date: 2016-08-10',
            '    source_desc: "STARBUCKS"',
            '  Expenses:Coffee  2.45 USD',
            '',
            '2016-08-10 open Expenses:Coffee USD',
        ]);
    });

    it('rejects an account list of the wrong length', () => {
        const build = () => buildCandidate(pending, standalone(), new UsedTransactionRegistry(), buildContext(CARD_ONLY), {
            accounts: ['Expenses:Coffee', 'Expenses:Tea'],
        });
        expect(build).toThrow(ReconcileError);
        expect(build).toThrow('Expected 1 accounts, got 2');
    });
});

describe('buildInsertionCandidate', () => {
    it('inserts every entry of a directive group', () => {
        const balances = makePendingEntry({
            date: '2016-08-31',
            entries: [{ type: 'balance', date: '2016-08-31', account: 'Liabilities:Credit-Card', amount: { number: '-2.45', currency: 'USD' }, meta: {} }],
        }, 'card');
        const candidate = buildInsertionCandidate(balances, buildContext(CARD_ONLY));
        expect(candidate.substitutedAccounts).toEqual([]);
        expect(candidate.properties).toBeNull();
        expect(candidate.usedPendingIds).toEqual([balances.id]);
        expect(candidate.changeSet.regions[0].changes).toEqual([
            { op: 'insert', text: '' },
            { op: 'insert', text: '2016-08-31 balance Liabilities:Credit-Card  -2.45 USD' },
        ]);
    });
});

describe('missingOpens', () => {
    it('opens each unopened account once at its earliest date', () => {
        const ledger = Ledger.fromTexts({ 'journal.beancount': CARD_ONLY });
        const opens = missingOpens(ledger, [
            transaction('2016-08-12', 'B', [posting('Expenses:Tea', '1 USD'), posting('Liabilities:Credit-Card', '-1 USD')]),
            transaction('2016-08-10', 'A', [posting('Expenses:Tea', '1 EUR'), posting('Expenses:Coffee', null)]),
        ]);
        expect(opens).toEqual([
            { type: 'open', date: '2016-08-10', account: 'Expenses:Coffee', currencies: [], meta: {} },
            { type: 'open', date: '2016-08-10', account: 'Expenses:Tea', currencies: ['EUR', 'USD'], meta: {} },
        ]);
    });
});
