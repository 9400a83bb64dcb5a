import { dateFnsCalendar } from "./calendar";
import { GregorianDate } from "./date";
import {
    InvalidDateError,
    InvalidDayError,
    InvalidMonthError,
    OffsetOverflowError,
} from "./errors";
import { dayOffset, selectEpoch } from "./offset";
import {
    EPOCH_BEFORE_MID_MARCH,
    EPOCH_ON_OR_AFTER_MID_MARCH,
    GREGORIAN_MONTHS,
    NANAKSHAHI_MONTH_TABLE,
    NANAKSHAHI_MONTHS,
    NEW_YEAR_DAY,
    NEW_YEAR_MONTH,
    type GregorianMonth,
    type NanakshahiMonth,
} from "./tables";
import type { Calendar, GregorianDay, NanakshahiDate } from "./types";

interface MonthLength {
    name: NanakshahiMonth;
    days: number;
}

/**
 * Whether Phaggan of the given Nanakshahi year contains February 29. Phaggan
 * ends in the following Gregorian year, hence the larger epoch.
 */
export function isNanakshahiLeapYear(year: number, calendar: Calendar = dateFnsCalendar): boolean {
    return calendar.isLeapYear(year + EPOCH_BEFORE_MID_MARCH);
}

function monthLengths(year: number, calendar: Calendar): MonthLength[] {
    const leap = isNanakshahiLeapYear(year, calendar);
    const last = NANAKSHAHI_MONTH_TABLE.length - 1;
    return NANAKSHAHI_MONTH_TABLE.map((m, i) => ({
        name: m.name,
        days: leap && i === last ? m.days + 1 : m.days,
    }));
}

export function daysInNanakshahiMonth(year: number, month: number, calendar: Calendar = dateFnsCalendar): number {
    const entry = Number.isInteger(month) ? monthLengths(year, calendar)[month - 1] : undefined;
    if (entry === undefined) {
        throw new InvalidMonthError(month);
    }
    return entry.days;
}

export function daysInNanakshahiYear(year: number, calendar: Calendar = dateFnsCalendar): number {
    return isNanakshahiLeapYear(year, calendar) ? 366 : 365;
}

export function nanakshahiMonthNumber(name: string): number {
    const index = NANAKSHAHI_MONTHS.findIndex(m => m === name);
    if (index < 0) {
        throw new InvalidMonthError(name);
    }
    return index + 1;
}

export function gregorianMonthNumber(name: string): number {
    const index = GREGORIAN_MONTHS.findIndex(m => m === name);
    if (index < 0) {
        throw new InvalidMonthError(name);
    }
    return index + 1;
}

export function gregorianMonthName(month: number): GregorianMonth {
    const name = Number.isInteger(month) ? GREGORIAN_MONTHS[month - 1] : undefined;
    if (name === undefined) {
        throw new InvalidMonthError(month);
    }
    return name;
}

/**
 * Convert a Gregorian date to a Nanakshahi date.
 *
 * @example
 * toNanakshahi(2025, 3, 14); // { year: 557, month: "Chet", day: 1 }
 *
 * @throws {InvalidDateError} if the date does not exist or precedes the Nanakshahi era
 * @throws {OffsetOverflowError} if the day offset does not fit the year's months
 */
export function toNanakshahi(year: number, month: number, day: number, calendar: Calendar = dateFnsCalendar): NanakshahiDate {
    if (!calendar.isValid(year, month, day)) {
        throw InvalidDateError.of(year, month, day);
    }
    const nanakshahiYear = year - selectEpoch(month, day);
    if (nanakshahiYear < 0) {
        throw InvalidDateError.of(year, month, day, "before the nanakshahi era");
    }

    let offset = dayOffset(year, month, day, calendar);

    for (const { name, days } of monthLengths(nanakshahiYear, calendar)) {
        if (offset < days) {
            return { year: nanakshahiYear, month: name, day: offset + 1 };
        }
        offset -= days;
    }

    throw new OffsetOverflowError(offset);
}

/**
 * Convert a Nanakshahi date, with its month given as 1 (Chet) to 12
 * (Phaggan), to a Gregorian date.
 *
 * @example
 * toGregorian(557, 1, 1); // { year: 2025, month: "March", day: 14 }
 *
 * @throws {InvalidMonthError} if `month` is outside 1..12
 * @throws {InvalidDayError} if `day` is outside the month
 * @throws {InvalidDateError} if the year is negative or the result is outside the supported range
 */
export function toGregorian(year: number, month: number, day: number, calendar: Calendar = dateFnsCalendar): GregorianDay {
    if (!Number.isInteger(year) || year < 0) {
        throw InvalidDateError.of(year, month, day, "nanakshahi year out of range");
    }
    const lengths = monthLengths(year, calendar);
    const current = Number.isInteger(month) ? lengths[month - 1] : undefined;
    if (current === undefined) {
        throw new InvalidMonthError(month);
    }
    if (!Number.isInteger(day) || day < 1 || day > current.days) {
        throw new InvalidDayError(year, month, day);
    }

    let offset = day - 1;
    for (const m of lengths.slice(0, month - 1)) {
        offset += m.days;
    }

    const newYear = new GregorianDate(year + EPOCH_ON_OR_AFTER_MID_MARCH, NEW_YEAR_MONTH, NEW_YEAR_DAY);
    const result = calendar.addDays(newYear, offset);
    return { year: result.year, month: gregorianMonthName(result.month), day: result.day };
}
