import { describe, it, expect } from "vitest";
import {
  isValidTimezone,
  standardLiteralHandlers,
  toBool,
  toFloat,
  toInt,
  toLiteralDate,
  toZonedDateTime,
} from "../../../src/core/reader/literals";
import { VFloat, VInstant, VInt, VPlainDate, VZoned, VFalse, VTrue } from "../../../src/core/eval/values";

describe("literal handlers", () => {
  it("reads booleans", () => {
    expect(toBool("TRUE")).toBe(VTrue);
    expect(toBool("FALSE")).toBe(VFalse);
    expect(toBool("true")).toBeUndefined();
  });

  it("reads canonical integers as bigints", () => {
    expect(toInt("42")).toEqual(VInt(42n));
    expect(toInt("-12")).toEqual(VInt(-12n));
    expect(toInt("0")).toEqual(VInt(0n));
    expect(toInt("123456789012345678901234567890")).toEqual(VInt(123456789012345678901234567890n));
  });

  it("declines non-canonical integers", () => {
    expect(toInt("007")).toBeUndefined();
    expect(toInt("-0")).toBeUndefined();
    expect(toInt("+5")).toBeUndefined();
    expect(toInt("1.0")).toBeUndefined();
  });

  it("reads floats that carry a decimal point", () => {
    expect(toFloat("3.14")).toEqual(VFloat(3.14));
    expect(toFloat("1.")).toEqual(VFloat(1));
    expect(toFloat(".5")).toEqual(VFloat(0.5));
    expect(toFloat("-2.5e3")).toEqual(VFloat(-2500));
    expect(toFloat("1e5")).toBeUndefined();
    expect(toFloat("42")).toBeUndefined();
  });

  it("reads instants and zoneless datetimes", () => {
    const handler = toZonedDateTime("America/New_York");
    expect(handler("2020-06-05T10:15:00Z")).toEqual(VInstant("2020-06-05T10:15:00Z"));
    expect(handler("2020-06-05T10:15:00+02:00")).toEqual(VInstant("2020-06-05T10:15:00+02:00"));
    expect(handler("2020-06-05T10:15")).toEqual(VZoned("2020-06-05T10:15", "America/New_York"));
    expect(handler("2020-13-05T10:15:00Z")).toBeUndefined();
    expect(handler("2020-06-05")).toBeUndefined();
  });

  it("reads calendar dates", () => {
    const handler = toLiteralDate("UTC");
    expect(handler("2024-02-29")).toEqual(VPlainDate("2024-02-29"));
    expect(handler("2023-02-29")).toBeUndefined();
    expect(handler("2023-2-01")).toBeUndefined();
  });

  it("fills YYYY, MM and DD from today in the given zone", () => {
    const now = () => new Date("2024-03-09T12:00:00Z");
    expect(toLiteralDate("UTC", now)("YYYY-MM-DD")).toEqual(VPlainDate("2024-03-09"));
    expect(toLiteralDate("UTC", now)("YYYY-02-14")).toEqual(VPlainDate("2024-02-14"));
    expect(toLiteralDate("Pacific/Auckland", now)("YYYY-MM-DD")).toEqual(VPlainDate("2024-03-10"));
  });

  it("tries handlers in a fixed order", () => {
    const handlers = standardLiteralHandlers("UTC");
    const first = (text: string) => {
      for (const handler of handlers) {
        const value = handler(text);
        if (value !== undefined) return value;
      }
      return undefined;
    };
    expect(first("7")).toEqual(VInt(7n));
    expect(first("7.0")).toEqual(VFloat(7));
    expect(first("2021-01-01")).toEqual(VPlainDate("2021-01-01"));
    expect(first("DUP")).toBeUndefined();
  });

  it("checks timezone names", () => {
    expect(isValidTimezone("Europe/Paris")).toBe(true);
    expect(isValidTimezone("Not/AZone")).toBe(false);
  });
});
