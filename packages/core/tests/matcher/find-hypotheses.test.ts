import { describe, it, expect } from 'vitest';
import Decimal from 'decimal.js';
import { compareHypotheses, findHypotheses } from '../../src/matcher/find-hypotheses.js';
import type { Hypothesis, MatchOptions } from '../../src/matcher/types.js';
import type { MatchableTransaction } from '../../src/clearing/posting-index.js';
import { ClearingIndex } from '../../src/clearing/clearing-index.js';
import { Ledger } from '../../src/journal/ledger.js';
import { descriptionSource, posting, transaction } from '../helpers.js';

const options: MatchOptions = {
    matchWindowDays: 5,
    costTolerance: new Decimal('0.005'),
    balanceEpsilon: new Decimal('0.005'),
    isCleared: p => p.meta.source_desc !== undefined,
};

const JOURNAL = [
    '2016-08-09 * "Coffee"',
    '  Liabilities:Credit-Card  -2.45 USD',
    '  Expenses:Coffee  2.45 USD',
    '',
].join('\n');

const starbucks = transaction('2016-08-10', 'STARBUCKS', [
    posting('Liabilities:Credit-Card', '-2.45 USD', { date: { kind: 'date', value: '2016-08-10' }, source_desc: 'STARBUCKS' }),
    posting('Expenses:FIXME', '2.45 USD'),
]);

const current: MatchableTransaction = {
    key: 'pending:starbucks',
    transaction: starbucks,
    origin: 'pending',
    pendingIndex: 0,
    order: 0,
};

function context(maxHypotheses?: number) {
    const clearing = ClearingIndex.build(
        Ledger.fromTexts({ 'journal.beancount': JOURNAL }),
        [descriptionSource('card', 'Liabilities:Credit-Card')]
    );
    return { indexes: [clearing.postings], options: { ...options, maxHypotheses } };
}

describe('findHypotheses', () => {
    it('ranks the ledger merge first and keeps the standalone hypothesis last', () => {
        const hypotheses = findHypotheses(current, context());
        expect(hypotheses).toHaveLength(2);

        const [merged, standalone] = hypotheses;
        expect(merged.matchedPostings).toBe(2);
        expect(merged.dateDistance).toBe(2);
        expect(merged.used.map(owner => owner.key)).toEqual(['pending:starbucks', 'ledger:journal.beancount:1']);
        expect(merged.transaction.narration).toBe('Coffee');
        expect(merged.transaction.location).toBeUndefined();
        expect(merged.transaction.postings.map(p => p.account)).toEqual(['Liabilities:Credit-Card', 'Expenses:Coffee']);

        expect(standalone.matchedPostings).toBe(0);
        expect(standalone.used).toEqual([current]);
        expect(standalone.transaction).toBe(starbucks);
    });

    it('gives the same keys on every run', () => {
        const first = findHypotheses(current, context()).map(h => h.key);
        const second = findHypotheses(current, context()).map(h => h.key);
        expect(second).toEqual(first);
    });

    it('stops at the hypothesis limit', () => {
        const hypotheses = findHypotheses(current, context(0));
        expect(hypotheses).toHaveLength(1);
        expect(hypotheses[0].matchedPostings).toBe(0);
    });

    it('has nothing to merge outside the window', () => {
        const late = { ...current, transaction: { ...starbucks, date: '2016-08-20', postings: [
            posting('Liabilities:Credit-Card', '-2.45 USD', { date: { kind: 'date', value: '2016-08-20' }, source_desc: 'STARBUCKS' }),
            posting('Expenses:FIXME', '2.45 USD'),
        ] } };
        expect(findHypotheses(late, context())).toHaveLength(1);
    });

    it('merges an import into ledger postings that add up to it', () => {
        const clearing = ClearingIndex.build(
            Ledger.fromTexts({
                'journal.beancount': [
                    '2016-08-09 * "Dinner"',
                    '  Liabilities:Credit-Card  -30 USD',
                    '  Liabilities:Credit-Card  -20 USD',
                    '  Expenses:Food  50 USD',
                    '',
                ].join('\n'),
            }),
            [descriptionSource('card', 'Liabilities:Credit-Card')]
        );
        const dinner: MatchableTransaction = {
            ...current,
            key: 'pending:dinner',
            transaction: transaction('2016-08-10', 'DINNER', [
                posting('Liabilities:Credit-Card', '-50 USD', { date: { kind: 'date', value: '2016-08-10' }, source_desc: 'DINNER' }),
                posting('Expenses:FIXME', '50 USD'),
            ]),
        };
        const hypotheses = findHypotheses(dinner, { indexes: [clearing.postings], options });
        expect(hypotheses).toHaveLength(2);
        expect(hypotheses[0].matchedPostings).toBe(2);
        expect(hypotheses[0].dateDistance).toBe(2);
        expect(hypotheses[0].transaction.postings.map(p => [p.account, p.units?.number])).toEqual([
            ['Liabilities:Credit-Card', '-50'],
            ['Expenses:Food', '50'],
        ]);
    });
});

describe('compareHypotheses', () => {
    function hypothesis(key: string, matchedPostings: number, dateDistance: number, pendingOrders: number[] = []): Hypothesis {
        const used: MatchableTransaction[] = [current, ...pendingOrders.map((order): MatchableTransaction => ({
            key: `pending:${order}`,
            transaction: starbucks,
            origin: 'pending',
            pendingIndex: order,
            order,
        }))];
        return { key, transaction: starbucks, used, matchedPostings, dateDistance };
    }

    it('orders by matched postings, date distance, observation order, then key', () => {
        const sorted = [
            hypothesis('e', 1, 0),
            hypothesis('d', 2, 3, [4]),
            hypothesis('c', 2, 3, [2]),
            hypothesis('b', 2, 1),
            hypothesis('a', 2, 1),
        ].sort(compareHypotheses);
        expect(sorted.map(h => h.key)).toEqual(['a', 'b', 'c', 'd', 'e']);
    });
});
