import Decimal from 'decimal.js';
import type { TransactionEntry } from '../types/index.js';
import { postingWeight, formatDecimal } from './amount.js';

export interface BalanceCheck {
    valid: boolean;
    residuals: Record<string, string>;
    error?: string;
}

/**
 * Check that a transaction balances per currency.
 *
 * A single plug posting absorbs any residual. Otherwise every currency's
 * residual must be within epsilon. Uses Decimal for precise comparison.
 */
export function checkTransactionBalance(transaction: TransactionEntry, epsilon: Decimal): BalanceCheck {
    const totals = new Map<string, Decimal>();
    let plugs = 0;

    for (const posting of transaction.postings) {
        const weight = postingWeight(posting);
        if (!weight) {
            plugs++;
            continue;
        }
        totals.set(weight.currency, (totals.get(weight.currency) ?? new Decimal(0)).plus(weight.number));
    }

    const residuals: Record<string, string> = {};
    for (const [currency, total] of [...totals.entries()].sort(([a], [b]) => a.localeCompare(b))) {
        residuals[currency] = formatDecimal(total);
    }

    if (plugs > 1) {
        return { valid: false, residuals, error: `Transaction on ${transaction.date} has ${plugs} postings without amounts` };
    }
    if (plugs === 1) {
        return { valid: true, residuals };
    }

    const unbalanced = Object.entries(residuals).filter(([, residual]) => new Decimal(residual).abs().greaterThan(epsilon));
    if (unbalanced.length === 0) {
        return { valid: true, residuals };
    }
    const detail = unbalanced.map(([currency, residual]) => `${residual} ${currency}`).join(', ');
    return { valid: false, residuals, error: `Transaction on ${transaction.date} does not balance: ${detail}` };
}
