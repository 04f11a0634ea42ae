// src/core/reader/literals.ts
// Literal handlers: turn a bare word token into a value, or decline

import { VBool, VFloat, VInstant, VInt, VPlainDate, VZoned, type Val } from "../eval/values";

/** Returns the literal's value, or undefined when the text is not this kind of literal. */
export type LiteralHandler = (text: string) => Val | undefined;

export const toBool: LiteralHandler = text => {
  if (text === "TRUE") return VBool(true);
  if (text === "FALSE") return VBool(false);
  return undefined;
};

const INT_PATTERN = /^-?(0|[1-9]\d*)$/;

/** Canonical decimal integers only: no leading zeros, no `+`, no `-0`. */
export const toInt: LiteralHandler = text => {
  if (!INT_PATTERN.test(text) || text === "-0") return undefined;
  return VInt(BigInt(text));
};

const FLOAT_PATTERN = /^[-+]?(\d+\.\d*|\.\d+)([eE][-+]?\d+)?$/;

export const toFloat: LiteralHandler = text => {
  if (!FLOAT_PATTERN.test(text)) return undefined;
  return VFloat(Number(text));
};

const DATETIME_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:\d{2})?$/;
const ZONE_SUFFIX = /(Z|[+-]\d{2}:\d{2})$/;

/**
 * `2020-06-05T10:15:00Z` or with an offset is an Instant; without a zone it
 * is a ZonedDateTime in `timezone`.
 */
export function toZonedDateTime(timezone: string): LiteralHandler {
  return text => {
    if (!DATETIME_PATTERN.test(text)) return undefined;
    if (ZONE_SUFFIX.test(text)) {
      return Number.isNaN(Date.parse(text)) ? undefined : VInstant(text);
    }
    if (Number.isNaN(Date.parse(`${text}Z`))) return undefined;
    return VZoned(text, timezone);
  };
}

const DATE_PATTERN = /^(\d{4}|YYYY)-(\d{2}|MM)-(\d{2}|DD)$/;

/**
 * `2020-06-05` is a PlainDate. `YYYY`, `MM` and `DD` stand for the current
 * year, month and day in `timezone`.
 */
export function toLiteralDate(timezone: string, now: () => Date = () => new Date()): LiteralHandler {
  return text => {
    const match = DATE_PATTERN.exec(text);
    if (!match) return undefined;
    const needsToday = match[1] === "YYYY" || match[2] === "MM" || match[3] === "DD";
    const today = needsToday ? dateParts(now(), timezone) : undefined;

    const year = match[1] === "YYYY" ? today?.year : match[1];
    const month = match[2] === "MM" ? today?.month : match[2];
    const day = match[3] === "DD" ? today?.day : match[3];
    if (year === undefined || month === undefined || day === undefined) return undefined;
    if (!isCalendarDate(Number(year), Number(month), Number(day))) return undefined;
    return VPlainDate(`${year}-${month}-${day}`);
  };
}

type DateParts = { year: string; month: string; day: string };

function dateParts(date: Date, timezone: string): DateParts {
  const parts = new Intl.DateTimeFormat("en-CA", {
    timeZone: timezone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
  }).formatToParts(date);
  const get = (type: Intl.DateTimeFormatPartTypes): string => parts.find(p => p.type === type)?.value ?? "";
  return { year: get("year"), month: get("month"), day: get("day") };
}

function isCalendarDate(year: number, month: number, day: number): boolean {
  const d = new Date(Date.UTC(year, month - 1, day));
  return d.getUTCFullYear() === year && d.getUTCMonth() === month - 1 && d.getUTCDate() === day;
}

/** Built-in handlers in resolution order. */
export function standardLiteralHandlers(timezone: string): LiteralHandler[] {
  return [toBool, toInt, toFloat, toZonedDateTime(timezone), toLiteralDate(timezone)];
}

export function isValidTimezone(timezone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: timezone });
    return true;
  } catch (e) {
    if (e instanceof RangeError) return false;
    throw e;
  }
}
