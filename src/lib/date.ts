import { InvalidDateError } from "./errors";
import { MAX_GREGORIAN_YEAR, MIN_GREGORIAN_YEAR } from "./tables";

export class GregorianDate {
    public readonly year: number;
    public readonly month: number; // 1-based
    public readonly day: number; // 1-based

    constructor(year: number, month: number, day: number) {
        if (!GregorianDate.isValid(year, month, day)) {
            throw InvalidDateError.of(year, month, day);
        }
        this.year = year;
        this.month = month;
        this.day = day;
    }

    // Proleptic Gregorian check: Date.UTC rolls impossible days into the next
    // month, so a valid date is one that comes back unchanged.
    static isValid(year: number, month: number, day: number): boolean {
        if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) {
            return false;
        }
        if (year < MIN_GREGORIAN_YEAR || year > MAX_GREGORIAN_YEAR) {
            return false;
        }
        const d = new Date(Date.UTC(year, month - 1, day));
        return d.getUTCFullYear() === year && d.getUTCMonth() + 1 === month && d.getUTCDate() === day;
    }

    static parse(s: string): GregorianDate {
        const parts = s.split(/[\/-]/);
        if (parts.length !== 3) {
            throw new InvalidDateError(`"${s}"`, "unknown format");
        }
        const [year, month, day] = parts.map(p => (/^\d+$/.test(p) ? parseInt(p, 10) : NaN));

        if (year === undefined || month === undefined || day === undefined
            || isNaN(year) || isNaN(month) || isNaN(day)) {
            throw new InvalidDateError(`"${s}"`, "invalid date component");
        }
        if (year < MIN_GREGORIAN_YEAR) {
            throw new InvalidDateError(`"${s}"`, "short years not allowed");
        }

        return new GregorianDate(year, month, day);
    }

    equals(other: GregorianDate): boolean {
        return this.year === other.year && this.month === other.month && this.day === other.day;
    }

    toString(): string {
        const y = this.year.toString().padStart(4, '0');
        const m = this.month.toString().padStart(2, '0');
        const d = this.day.toString().padStart(2, '0');
        return `${y}/${m}/${d}`;
    }
}
