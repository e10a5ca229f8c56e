/**
 * Decimal formatting helpers.
 */

import Decimal from 'decimal.js';

/**
 * Decimal constructor for ledger arithmetic.
 * 80 significant digits hold the sum of 2^32 amounts of up to 28 digits each
 * with their full scale, so balances are never rounded.
 */
export const LedgerDecimal = Decimal.clone({ precision: 80, rounding: Decimal.ROUND_HALF_EVEN });

/**
 * Round to `places` decimal places, ties to even.
 */
export function roundAmount(value: Decimal, places: number): Decimal {
    return value.toDecimalPlaces(places, Decimal.ROUND_HALF_EVEN);
}

/**
 * Plain decimal string: no exponent, no trailing zeros, no negative zero.
 * Decimal.toFixed() without args never switches to exponential notation.
 */
export function formatAmount(value: Decimal): string {
    if (value.isZero()) {
        return '0';
    }
    return value.toFixed();
}
