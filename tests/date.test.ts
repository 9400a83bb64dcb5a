import { test, expect } from "@jest/globals";
import { GregorianDate, InvalidDateError, dateFnsCalendar, utcCalendar } from "../src/";

test("parse slash and dash dates", () => {
    expect(GregorianDate.parse("2019/10/23").equals(new GregorianDate(2019, 10, 23))).toBe(true);
    expect(GregorianDate.parse("2019-10-23").equals(new GregorianDate(2019, 10, 23))).toBe(true);
    expect(GregorianDate.parse("2024/2/9").toString()).toBe("2024/02/09");
});

test("parse errors", () => {
    expect(() => GregorianDate.parse("2019/10")).toThrow('invalid date "2019/10": unknown format');
    expect(() => GregorianDate.parse("2019/ab/01")).toThrow('invalid date "2019/ab/01": invalid date component');
    expect(() => GregorianDate.parse("19/10/23")).toThrow('invalid date "19/10/23": short years not allowed');
    expect(() => GregorianDate.parse("2019/02/30")).toThrow("invalid date 2019/2/30");

    let err: unknown;
    try {
        GregorianDate.parse("2019/10");
    } catch (e) {
        err = e;
    }
    expect(err).toBeInstanceOf(InvalidDateError);
    expect(err).toHaveProperty("input", '"2019/10"');
    expect(err).toHaveProperty("year", undefined);
});

test("constructor rejects impossible dates", () => {
    expect(() => new GregorianDate(2023, 2, 29)).toThrow(InvalidDateError);
    expect(() => new GregorianDate(2024, 4, 31)).toThrow(InvalidDateError);
    expect(() => new GregorianDate(2024, 13, 1)).toThrow(InvalidDateError);
    expect(() => new GregorianDate(10000, 1, 1)).toThrow(InvalidDateError);
    expect(new GregorianDate(2024, 2, 29).toString()).toBe("2024/02/29");
    expect(new GregorianDate(1468, 3, 14).toString()).toBe("1468/03/14");
});

for (const [name, calendar] of [["date-fns", dateFnsCalendar], ["utc", utcCalendar]] as const) {
    test(`calendar arithmetic (${name})`, () => {
        expect(calendar.isValid(2024, 2, 29)).toBe(true);
        expect(calendar.isValid(2023, 2, 29)).toBe(false);
        expect(calendar.isValid(2024, 0, 1)).toBe(false);
        expect(calendar.isValid(2024, 1, 1.5)).toBe(false);
        expect(calendar.isValid(99, 1, 1)).toBe(false);

        expect(calendar.isLeapYear(1900)).toBe(false);
        expect(calendar.isLeapYear(2000)).toBe(true);
        expect(calendar.isLeapYear(2023)).toBe(false);
        expect(calendar.isLeapYear(2024)).toBe(true);
        expect(calendar.isLeapYear(0)).toBe(true);
        expect(calendar.isLeapYear(4)).toBe(true);
        expect(calendar.isLeapYear(99)).toBe(false);

        expect(calendar.differenceInDays(new GregorianDate(2024, 3, 14), new GregorianDate(2023, 3, 14))).toBe(366);
        expect(calendar.differenceInDays(new GregorianDate(2025, 3, 14), new GregorianDate(2024, 3, 14))).toBe(365);
        expect(calendar.differenceInDays(new GregorianDate(2024, 3, 14), new GregorianDate(2024, 3, 14))).toBe(0);

        expect(calendar.addDays(new GregorianDate(2024, 2, 28), 1).toString()).toBe("2024/02/29");
        expect(calendar.addDays(new GregorianDate(2023, 2, 28), 1).toString()).toBe("2023/03/01");
        expect(calendar.addDays(new GregorianDate(2024, 12, 31), 1).toString()).toBe("2025/01/01");
        expect(calendar.addDays(new GregorianDate(2024, 3, 14), 364).toString()).toBe("2025/03/13");
        expect(() => calendar.addDays(new GregorianDate(9999, 12, 31), 1)).toThrow(InvalidDateError);
    });
}
