import { describe, it, expect } from 'vitest';
import Decimal from 'decimal.js';
import { checkTransactionBalance } from '../../src/model/balance.js';
import { posting, transaction } from '../helpers.js';

const epsilon = new Decimal('0.005');

describe('checkTransactionBalance', () => {
    it('accepts a balanced transaction', () => {
        const result = checkTransactionBalance(transaction('2016-08-10', 'Coffee', [
            posting('Liabilities:Credit-Card', '-2.45 USD'),
            posting('Expenses:Coffee', '2.45 USD'),
        ]), epsilon);
        expect(result).toEqual({ valid: true, residuals: { USD: '0' } });
    });

    it('accepts a residual within epsilon', () => {
        const result = checkTransactionBalance(transaction('2016-08-10', 'Coffee', [
            posting('Liabilities:Credit-Card', '-2.45 USD'),
            posting('Expenses:Coffee', '2.454 USD'),
        ]), epsilon);
        expect(result.valid).toBe(true);
        expect(result.residuals).toEqual({ USD: '0.004' });
    });

    it('reports the residual of an unbalanced transaction', () => {
        const result = checkTransactionBalance(transaction('2016-08-10', 'Coffee', [
            posting('Liabilities:Credit-Card', '-2.45 USD'),
            posting('Expenses:Coffee', '3.00 USD'),
        ]), epsilon);
        expect(result.valid).toBe(false);
        expect(result.error).toBe('Transaction on 2016-08-10 does not balance: 0.55 USD');
    });

    it('lets a single plug posting absorb the residual', () => {
        const result = checkTransactionBalance(transaction('2016-08-10', 'Coffee', [
            posting('Liabilities:Credit-Card', '-2.45 USD'),
            posting('Expenses:FIXME', null),
        ]), epsilon);
        expect(result.valid).toBe(true);
    });

    it('rejects two plug postings', () => {
        const result = checkTransactionBalance(transaction('2016-08-10', 'Coffee', [
            posting('Liabilities:Credit-Card', '-2.45 USD'),
            posting('Expenses:Coffee', null),
            posting('Expenses:FIXME', null),
        ]), epsilon);
        expect(result.valid).toBe(false);
        expect(result.error).toBe('Transaction on 2016-08-10 has 2 postings without amounts');
    });
});
