/**
 * Date parsing utilities for reconciliation keys.
 * All dates returned as UTC (00:00:00Z).
 */

/**
 * Parse date value (Excel serial, Date object, or string).
 * Strings are tried as ISO (YYYY-MM-DD) first, then day-first (DD/MM/YYYY),
 * which is how Israeli bank and register exports write them.
 * Returns date in UTC (00:00:00Z).
 */
export function parseDateValue(value: unknown): Date | null {
    if (value instanceof Date) {
        return isValidDate(value) ? toUtcMidnight(value) : null;
    }
    if (typeof value === 'number') {
        // Excel serial date
        return Number.isFinite(value) ? excelSerialToDate(value) : null;
    }

    if (typeof value === 'string') {
        const text = value.trim();
        return parseIsoDate(text) ?? parseDmyDate(text);
    }

    return null;
}

/**
 * Parse DD/MM/YYYY date string to Date (UTC).
 * Accepts "/", "." or "-" separators and two-digit years (20xx).
 */
export function parseDmyDate(value: string): Date | null {
    const match = value.match(/^(\d{1,2})[/.-](\d{1,2})[/.-](\d{2}|\d{4})$/);
    if (!match) return null;

    const day = parseInt(match[1], 10);
    const month = parseInt(match[2], 10);
    const year = match[3].length === 2 ? 2000 + parseInt(match[3], 10) : parseInt(match[3], 10);

    return buildUtcDate(year, month, day);
}

/**
 * Parse YYYY-MM-DD date string to Date (UTC).
 * A trailing time component ("2026-01-15 00:00:00" or "T00:00:00") is ignored.
 */
export function parseIsoDate(value: string): Date | null {
    const match = value.match(/^(\d{4})-(\d{2})-(\d{2})(?:[ T].*)?$/);
    if (!match) return null;

    const year = parseInt(match[1], 10);
    const month = parseInt(match[2], 10);
    const day = parseInt(match[3], 10);

    return buildUtcDate(year, month, day);
}

/**
 * Convert Excel serial date to JavaScript Date (UTC).
 */
export function excelSerialToDate(serial: number): Date {
    // Excel serial: days since 1899-12-30
    // Round to the nearest day to absorb fractional timezone offsets.
    const days = Math.round(serial);
    const utcDays = days - 25569; // Adjust to Unix epoch
    const utcMs = utcDays * 86400 * 1000;
    return new Date(utcMs);
}

/**
 * Format Date as ISO YYYY-MM-DD string (UTC).
 */
export function formatIsoDate(date: Date): string {
    const year = date.getUTCFullYear();
    const month = String(date.getUTCMonth() + 1).padStart(2, '0');
    const day = String(date.getUTCDate()).padStart(2, '0');
    return `${year}-${month}-${day}`;
}

/**
 * Check if date is valid.
 */
export function isValidDate(date: Date): boolean {
    return !isNaN(date.getTime());
}

function buildUtcDate(year: number, month: number, day: number): Date | null {
    const date = new Date(Date.UTC(year, month - 1, day));
    if (!isValidDate(date)) return null;

    // Reject rollovers such as 31/02
    if (date.getUTCFullYear() !== year ||
        date.getUTCMonth() !== month - 1 ||
        date.getUTCDate() !== day) {
        return null;
    }

    return date;
}

function toUtcMidnight(date: Date): Date {
    return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}
