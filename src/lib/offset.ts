import { dateFnsCalendar } from "./calendar";
import { GregorianDate } from "./date";
import { InvalidDateError } from "./errors";
import {
    EPOCH_BEFORE_MID_MARCH,
    EPOCH_ON_OR_AFTER_MID_MARCH,
    MIN_GREGORIAN_YEAR,
    NEW_YEAR_DAY,
    NEW_YEAR_MONTH,
} from "./tables";
import type { Calendar } from "./types";

function isOnOrAfterNewYear(month: number, day: number): boolean {
    return month > NEW_YEAR_MONTH || (month === NEW_YEAR_MONTH && day >= NEW_YEAR_DAY);
}

export function selectEpoch(month: number, day: number): number {
    return isOnOrAfterNewYear(month, day) ? EPOCH_ON_OR_AFTER_MID_MARCH : EPOCH_BEFORE_MID_MARCH;
}

/** The March 14 that opens the Nanakshahi year `date` falls in. */
export function newYearOf(date: GregorianDate): GregorianDate {
    const year = isOnOrAfterNewYear(date.month, date.day) ? date.year : date.year - 1;
    return new GregorianDate(year, NEW_YEAR_MONTH, NEW_YEAR_DAY);
}

/**
 * Days elapsed since the most recent Nanakshahi new year. March 14 itself is
 * offset 0.
 *
 * @throws {InvalidDateError} if the date does not exist in the Gregorian calendar,
 * or its new year falls before the supported range
 */
export function dayOffset(year: number, month: number, day: number, calendar: Calendar = dateFnsCalendar): number {
    if (!calendar.isValid(year, month, day)) {
        throw InvalidDateError.of(year, month, day);
    }
    if (!isOnOrAfterNewYear(month, day) && year - 1 < MIN_GREGORIAN_YEAR) {
        throw InvalidDateError.of(year, month, day, "before the supported range");
    }
    const date = new GregorianDate(year, month, day);
    return calendar.differenceInDays(date, newYearOf(date));
}
