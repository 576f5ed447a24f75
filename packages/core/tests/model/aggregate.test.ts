import { describe, it, expect } from 'vitest';
import { aggregatePostings, matchableSubsets } from '../../src/model/aggregate.js';
import { isMarkedCleared } from '../../src/model/posting.js';
import { posting, transaction } from '../helpers.js';

describe('aggregatePostings', () => {
    it('sums uncleared postings that share account, currency and sign', () => {
        const deposit = transaction('2016-08-09', 'Deposit', [
            posting('Assets:Checking', '10 USD'),
            posting('Assets:Checking', '20 USD'),
            posting('Assets:Checking', '30 USD', { cleared: true }),
            posting('Assets:Checking', '-5 USD'),
            { ...posting('Assets:Checking', '2 VTI'), cost: { number: '100', currency: 'USD' } },
            posting('Income:Gift', '-255 USD'),
        ]);
        expect(aggregatePostings(deposit, isMarkedCleared)).toEqual([{
            indices: [0, 1],
            posting: { account: 'Assets:Checking', units: { number: '30', currency: 'USD' }, meta: {} },
        }]);
    });

    it('offers a large group whole besides its subsets of up to four', () => {
        const split = transaction('2016-08-09', 'Split', [1, 2, 3, 4, 5, 6].map(n => posting('Expenses:Food', `${n} USD`)));
        const subsets = aggregatePostings(split);
        expect(subsets).toHaveLength(1 + 15 + 20 + 15);
        expect(subsets[0]).toEqual({
            indices: [0, 1, 2, 3, 4, 5],
            posting: { account: 'Expenses:Food', units: { number: '21', currency: 'USD' }, meta: {} },
        });
        expect(subsets.filter(subset => subset.indices.length === 5)).toEqual([]);
    });
});

describe('matchableSubsets', () => {
    it('lists single postings before aggregates', () => {
        const deposit = transaction('2016-08-09', 'Deposit', [
            posting('Assets:Checking', '60 USD'),
            posting('Assets:Checking', '40 USD'),
            posting('Income:Gift', '-100 USD'),
        ]);
        expect(matchableSubsets(deposit).map(subset => subset.indices)).toEqual([[0], [1], [2], [0, 1]]);
    });
});
