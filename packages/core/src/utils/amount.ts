/**
 * Signed amount parsing.
 * Amounts are handled as Decimal, never native float arithmetic.
 */

import Decimal from 'decimal.js';

export type Direction = 'inflow' | 'outflow' | 'zero';

/**
 * Parse a signed amount cell.
 *
 * Accepts numbers, Decimal, and strings with thousands separators, a shekel
 * sign, or accounting-style parentheses for negatives ("(1,234.50)").
 *
 * @returns Decimal, or null when the value is blank or not numeric
 */
export function parseAmount(value: unknown): Decimal | null {
    if (value instanceof Decimal) return value;
    if (typeof value === 'number') {
        return Number.isFinite(value) ? new Decimal(value) : null;
    }
    if (typeof value !== 'string') return null;

    let text = value.trim().replace(/[,₪\s]/g, '');
    const parenthesized = text.match(/^\((.*)\)$/);
    if (parenthesized) {
        text = `-${parenthesized[1]}`;
    }
    if (!/^[-+]?(\d+\.?\d*|\.\d+)$/.test(text)) return null;

    return new Decimal(text);
}

/**
 * Direction of money movement from a signed amount.
 */
export function directionFromAmount(amount: Decimal): Direction {
    if (amount.isZero()) return 'zero';
    return amount.isPositive() ? 'inflow' : 'outflow';
}

/**
 * Round to cents and render as a plain decimal string (no trailing zeros).
 * Used as the amount component of reconciliation join keys.
 */
export function toAmountKey(amount: Decimal): string {
    return amount.toDecimalPlaces(2, Decimal.ROUND_HALF_EVEN).toFixed();
}
