/**
 * Table cell helpers.
 * Records arrive from CSV/XLSX readers, so any column may hold a string,
 * number, boolean, Date, or nothing at all.
 */

import type { RawRecord } from '../types/index.js';

/**
 * Cell value as trimmed text. null/undefined become "".
 */
export function cellText(value: unknown): string {
    if (value === null || value === undefined) return '';
    if (typeof value === 'number' && Number.isNaN(value)) return '';
    return String(value).trim();
}

/**
 * First non-empty value among `columns`, scanning in priority order.
 * Resolved per row.
 */
export function pickField(record: RawRecord, columns: readonly string[], fallback = ''): string {
    for (const column of columns) {
        const text = cellText(record[column]);
        if (text !== '') return text;
    }
    return fallback;
}

/**
 * First column among `columns` holding any non-empty value across the batch.
 * The chosen column is then used for every row, even rows where it is blank.
 *
 * @returns Column name, or null when no candidate column has any value
 */
export function pickBatchColumn(records: readonly RawRecord[], columns: readonly string[]): string | null {
    for (const column of columns) {
        if (records.some((record) => cellText(record[column]) !== '')) {
            return column;
        }
    }
    return null;
}
