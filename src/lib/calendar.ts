import { UTCDate } from '@date-fns/utc';
import { addDays, differenceInCalendarDays, getDate, getMonth, getYear, isLeapYear } from 'date-fns';
import { GregorianDate } from "./date";
import { MAX_GREGORIAN_YEAR, MIN_GREGORIAN_YEAR } from "./tables";
import type { Calendar } from "./types";

const MS_PER_DAY = 24 * 60 * 60 * 1000;

// setUTCFullYear keeps years 0-99 literal; the Date constructor maps them to 19xx.
function utcDateOf(year: number, month: number, day: number): UTCDate {
    const d = new UTCDate(0);
    d.setUTCFullYear(year, month - 1, day);
    return d;
}

function toUTCDate(date: GregorianDate): UTCDate {
    return utcDateOf(date.year, date.month, date.day);
}

function fromUTCDate(d: Date): GregorianDate {
    return new GregorianDate(getYear(d), getMonth(d) + 1, getDate(d));
}

function isSupportedYear(year: number): boolean {
    return Number.isInteger(year) && year >= MIN_GREGORIAN_YEAR && year <= MAX_GREGORIAN_YEAR;
}

// UTCDate reads and writes its fields in UTC, so date-fns works on whole
// calendar days whatever the process time zone.
export const dateFnsCalendar: Calendar = {
    isValid(year, month, day) {
        if (!isSupportedYear(year) || !Number.isInteger(month) || !Number.isInteger(day)) {
            return false;
        }
        const d = utcDateOf(year, month, day);
        return getYear(d) === year && getMonth(d) + 1 === month && getDate(d) === day;
    },
    differenceInDays(later, earlier) {
        return differenceInCalendarDays(toUTCDate(later), toUTCDate(earlier));
    },
    addDays(date, days) {
        return fromUTCDate(addDays(toUTCDate(date), days));
    },
    isLeapYear(year) {
        return isLeapYear(utcDateOf(year, 1, 1));
    },
};

function utcTime(date: GregorianDate): number {
    return Date.UTC(date.year, date.month - 1, date.day);
}

export const utcCalendar: Calendar = {
    isValid(year, month, day) {
        return GregorianDate.isValid(year, month, day);
    },
    differenceInDays(later, earlier) {
        return Math.round((utcTime(later) - utcTime(earlier)) / MS_PER_DAY);
    },
    addDays(date, days) {
        const d = new Date(Date.UTC(date.year, date.month - 1, date.day + days));
        return new GregorianDate(d.getUTCFullYear(), d.getUTCMonth() + 1, d.getUTCDate());
    },
    isLeapYear(year) {
        return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
    },
};
