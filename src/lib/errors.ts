function ymd(year: number, month: number | string, day: number): string {
    return `${year}/${month}/${day}`;
}

export class NanakshahiError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'NanakshahiError';
    }
}

export class InvalidDateError extends NanakshahiError {
    // Unset when the input never split into numeric parts.
    public readonly year?: number;
    public readonly month?: number;
    public readonly day?: number;

    constructor(
        public readonly input: string,
        reason?: string,
        parts?: { year: number; month: number; day: number },
    ) {
        super(reason ? `invalid date ${input}: ${reason}` : `invalid date ${input}`);
        this.name = 'InvalidDateError';
        this.year = parts?.year;
        this.month = parts?.month;
        this.day = parts?.day;
    }

    static of(year: number, month: number, day: number, reason?: string): InvalidDateError {
        return new InvalidDateError(ymd(year, month, day), reason, { year, month, day });
    }
}

export class InvalidMonthError extends NanakshahiError {
    constructor(public readonly month: number | string) {
        super(`invalid month ${typeof month === 'string' ? `"${month}"` : month}`);
        this.name = 'InvalidMonthError';
    }
}

export class InvalidDayError extends NanakshahiError {
    constructor(
        public readonly year: number,
        public readonly month: number,
        public readonly day: number,
    ) {
        super(`invalid day ${day} in nanakshahi month ${month} of year ${year}`);
        this.name = 'InvalidDayError';
    }
}

// Raised when a day offset does not fit in the year's months. Bad input never
// reaches this; it means the offset arithmetic is wrong.
export class OffsetOverflowError extends NanakshahiError {
    constructor(public readonly offset: number) {
        super(`day offset exceeds the nanakshahi year by ${offset} days`);
        this.name = 'OffsetOverflowError';
    }
}
