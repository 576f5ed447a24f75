/**
 * Date arithmetic utilities using native Date.
 * Dates are ISO strings (YYYY-MM-DD) interpreted in UTC.
 */

const MS_PER_DAY = 24 * 60 * 60 * 1000;

function toTime(date: string): number {
    return new Date(date + 'T00:00:00Z').getTime();
}

/**
 * Calculate absolute days between two ISO date strings.
 *
 * @param date1 - ISO date string (YYYY-MM-DD)
 * @param date2 - ISO date string (YYYY-MM-DD)
 * @returns Absolute difference in days
 */
export function daysBetween(date1: string, date2: string): number {
    const diff = Math.abs(toTime(date1) - toTime(date2));
    return Math.round(diff / MS_PER_DAY);
}

/**
 * Check if two dates are within tolerance.
 *
 * @returns true if within tolerance (inclusive)
 */
export function isWithinDateTolerance(
    date1: string,
    date2: string,
    toleranceDays: number
): boolean {
    return daysBetween(date1, date2) <= toleranceDays;
}

/**
 * Shift an ISO date by a number of days (negative moves backwards).
 */
export function addDays(date: string, days: number): string {
    return new Date(toTime(date) + days * MS_PER_DAY).toISOString().slice(0, 10);
}

/**
 * Every ISO date in [date - days, date + days], ascending.
 */
export function dateWindow(date: string, days: number): string[] {
    const result: string[] = [];
    for (let offset = -days; offset <= days; offset++) {
        result.push(addDays(date, offset));
    }
    return result;
}

/**
 * True if the string is a real calendar date in YYYY-MM-DD form.
 */
export function isValidIsoDate(value: string): boolean {
    if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) {
        return false;
    }
    const parsed = new Date(value + 'T00:00:00Z');
    return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}
