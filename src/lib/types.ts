import type { GregorianDate } from "./date";
import type { GregorianMonth, NanakshahiMonth } from "./tables";

export interface NanakshahiDate {
    year: number;
    month: NanakshahiMonth;
    day: number; // 1-based
}

// Result of toGregorian: the month is reported by name.
export interface GregorianDay {
    year: number;
    month: GregorianMonth;
    day: number; // 1-based
}

/**
 * Proleptic Gregorian arithmetic the converters are built on. Months and days
 * are 1-based. Implementations must agree on leap years and on which dates
 * exist; they differ only in how they get there.
 */
export interface Calendar {
    isValid(year: number, month: number, day: number): boolean;
    /** Whole days from `earlier` to `later`. */
    differenceInDays(later: GregorianDate, earlier: GregorianDate): number;
    addDays(date: GregorianDate, days: number): GregorianDate;
    isLeapYear(year: number): boolean;
}
