/**
 * Value-count summaries for candidate and fingerprint-group reports.
 */

import { cellText } from '../utils/cell.js';

/**
 * Count non-empty values (trimmed).
 * Sorted by count DESC; ties keep first-occurrence order.
 */
export function valueCounts(values: readonly unknown[]): Array<[string, number]> {
    const counts = new Map<string, number>();
    for (const value of values) {
        const text = cellText(value);
        if (text === '') continue;
        counts.set(text, (counts.get(text) ?? 0) + 1);
    }
    return [...counts.entries()].sort((a, b) => b[1] - a[1]);
}

/**
 * Top `limit` values as "value (count)" joined by "; ".
 * Empty string when there are no values.
 *
 * @example topCounts(['Cafe', 'Cafe', 'Bakery']) // 'Cafe (2); Bakery (1)'
 */
export function topCounts(values: readonly unknown[], limit: number): string {
    return valueCounts(values)
        .slice(0, limit)
        .map(([value, count]) => `${value} (${count})`)
        .join('; ');
}

/**
 * Most frequent non-empty value, or "".
 */
export function mostCommon(values: readonly unknown[]): string {
    const [first] = valueCounts(values);
    return first ? first[0] : '';
}
