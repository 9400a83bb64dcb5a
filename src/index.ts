export type { Calendar, GregorianDay, NanakshahiDate } from "./lib/types";
export {
    EPOCH_BEFORE_MID_MARCH,
    EPOCH_ON_OR_AFTER_MID_MARCH,
    DAYS_IN_MONTHS,
    NANAKSHAHI_MONTHS,
    GREGORIAN_MONTHS,
    type NanakshahiMonth,
    type GregorianMonth,
} from "./lib/tables";
export { GregorianDate } from "./lib/date";
export { dateFnsCalendar, utcCalendar } from "./lib/calendar";
export { dayOffset, newYearOf, selectEpoch } from "./lib/offset";
export {
    toNanakshahi,
    toGregorian,
    isNanakshahiLeapYear,
    daysInNanakshahiMonth,
    daysInNanakshahiYear,
    nanakshahiMonthNumber,
    gregorianMonthNumber,
    gregorianMonthName,
} from "./lib/convert";
export {
    NanakshahiError,
    InvalidDateError,
    InvalidMonthError,
    InvalidDayError,
    OffsetOverflowError,
} from "./lib/errors";
