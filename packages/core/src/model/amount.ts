import Decimal from 'decimal.js';
import type { Amount, Posting } from '../types/index.js';

/**
 * Weight of a posting: the amount it contributes to the transaction balance.
 * `fromCost` marks weights computed from a per-unit cost, which compare
 * within a tolerance instead of exactly.
 */
export interface Weight {
    number: Decimal;
    currency: string;
    fromCost: boolean;
}

export function toDecimal(amount: Amount): Decimal {
    return new Decimal(amount.number);
}

/**
 * Plain decimal string: no exponent, no trailing zeros.
 */
export function formatDecimal(value: Decimal): string {
    return value.toFixed();
}

/**
 * Digits after the decimal point as written, e.g. 2 for "-4.10".
 */
function decimalScale(number: string): number {
    const point = number.indexOf('.');
    return point < 0 ? 0 : number.length - point - 1;
}

/**
 * Opposite amount, written with the same number of decimal places.
 */
export function negateAmount(amount: Amount): Amount {
    const negated = toDecimal(amount).negated();
    const number = negated.isZero() ? negated.abs() : negated;
    return { number: number.toFixed(decimalScale(amount.number)), currency: amount.currency };
}

/**
 * Compute a posting's weight.
 *
 * - units × cost when held at cost
 * - units × price when priced
 * - units otherwise
 *
 * @returns null for a plug posting (units elided)
 */
export function postingWeight(posting: Posting): Weight | null {
    if (!posting.units) return null;
    const units = toDecimal(posting.units);
    if (posting.cost) {
        return {
            number: units.times(new Decimal(posting.cost.number)),
            currency: posting.cost.currency,
            fromCost: true,
        };
    }
    if (posting.price) {
        return {
            number: units.times(new Decimal(posting.price.number)),
            currency: posting.price.currency,
            fromCost: false,
        };
    }
    return { number: units, currency: posting.units.currency, fromCost: false };
}

/**
 * Index key for exact weight lookups, e.g. "-2.45 USD".
 */
export function weightKey(weight: Weight): string {
    return `${formatDecimal(weight.number)} ${weight.currency}`;
}

/**
 * Weights are equal when currencies agree and numbers are equal, or within
 * `costTolerance` when either side was computed from a cost.
 */
export function weightsEqual(a: Weight, b: Weight, costTolerance: Decimal): boolean {
    if (a.currency !== b.currency) return false;
    if (a.fromCost || b.fromCost) {
        return a.number.minus(b.number).abs().lessThanOrEqualTo(costTolerance);
    }
    return a.number.equals(b.number);
}
