export const EPOCH_BEFORE_MID_MARCH = 1469;
export const EPOCH_ON_OR_AFTER_MID_MARCH = 1468;

// Chet 1 falls on this Gregorian month/day every year.
export const NEW_YEAR_MONTH = 3;
export const NEW_YEAR_DAY = 14;

// Two-digit years are rejected, as in GregorianDate.parse.
export const MIN_GREGORIAN_YEAR = 100;
export const MAX_GREGORIAN_YEAR = 9999;

export const NANAKSHAHI_MONTH_TABLE = Object.freeze([
    { name: "Chet", days: 31 },
    { name: "Vaisakh", days: 31 },
    { name: "Jeth", days: 31 },
    { name: "Harh", days: 31 },
    { name: "Sawan", days: 31 },
    { name: "Bhadon", days: 30 },
    { name: "Assu", days: 30 },
    { name: "Kattak", days: 30 },
    { name: "Maghar", days: 30 },
    { name: "Poh", days: 30 },
    { name: "Magh", days: 30 },
    { name: "Phaggan", days: 30 },
] as const);

export type NanakshahiMonth = (typeof NANAKSHAHI_MONTH_TABLE)[number]["name"];

export const NANAKSHAHI_MONTHS: readonly NanakshahiMonth[] = Object.freeze(NANAKSHAHI_MONTH_TABLE.map(m => m.name));
export const DAYS_IN_MONTHS: readonly number[] = Object.freeze(NANAKSHAHI_MONTH_TABLE.map(m => m.days));

export const GREGORIAN_MONTHS = Object.freeze([
    "January", "February", "March", "April", "May", "June",
    "July", "August", "September", "October", "November", "December",
] as const);

export type GregorianMonth = (typeof GREGORIAN_MONTHS)[number];
