/**
 * Date parsing utilities for transaction files.
 * All dates returned as UTC (00:00:00Z).
 */

/**
 * Parse a date cell (Date object, Excel serial or string).
 * Strings are tried as ISO first, then MM/DD/YYYY.
 * Returns date in UTC (00:00:00Z), or null when the value is not a date.
 */
export function parseDateValue(value: unknown): Date | null {
    if (value instanceof Date) {
        return isValidDate(value) ? value : null;
    }
    if (typeof value === 'number') {
        // Excel serial date
        if (!Number.isFinite(value)) return null;
        const date = excelSerialToDate(value);
        return isValidDate(date) ? date : null;
    }
    if (typeof value === 'string') {
        const trimmed = value.trim();
        return parseIsoDate(trimmed) ?? parseMdyDate(trimmed);
    }

    return null;
}

/**
 * Parse MM/DD/YYYY date string to Date (UTC).
 */
export function parseMdyDate(value: string): Date | null {
    const match = value.match(/^(\d{1,2})\/(\d{1,2})\/(\d{4})$/);
    if (!match) return null;

    return buildUtcDate(parseInt(match[3]), parseInt(match[1]), parseInt(match[2]));
}

/**
 * Parse YYYY-MM-DD date string to Date (UTC).
 * A trailing midnight time part ("2025-01-10 00:00:00") is tolerated;
 * the time itself is discarded.
 */
export function parseIsoDate(value: string): Date | null {
    const match = value.match(/^(\d{4})-(\d{2})-(\d{2})(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?Z?)?$/);
    if (!match) return null;

    return buildUtcDate(parseInt(match[1]), parseInt(match[2]), parseInt(match[3]));
}

function buildUtcDate(year: number, month: number, day: number): Date | null {
    const date = new Date(Date.UTC(year, month - 1, day));
    if (!isValidDate(date)) return null;

    // Reject rollovers such as 2025-02-30
    if (date.getUTCFullYear() !== year ||
        date.getUTCMonth() !== month - 1 ||
        date.getUTCDate() !== day) {
        return null;
    }

    return date;
}

/**
 * Convert Excel serial date to JavaScript Date (UTC).
 */
export function excelSerialToDate(serial: number): Date {
    // Excel serial: days since 1899-12-30.
    // Round to the nearest day to drop fractional time-of-day offsets.
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
