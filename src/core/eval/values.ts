// src/core/eval/values.ts
// Runtime value model: every operand on the stack is a Val.

import type { Word } from "../modules/word";
import type { Module, Variable } from "../modules/module";
import type { WordOptions } from "./options";

// ─────────────────────────────────────────────────────────────────
// Serializable variants
// ─────────────────────────────────────────────────────────────────

/** Arbitrary-precision integer. Never widened into Float. */
export type IntVal = { tag: "Int"; value: bigint };
export type FloatVal = { tag: "Float"; value: number };
export type BoolVal = { tag: "Bool"; b: boolean };
export type StrVal = { tag: "Str"; s: string };
export type NullVal = { tag: "Null" };
export type ArrayVal = { tag: "Array"; items: Val[] };

/**
 * RecordVal: string-keyed, insertion-ordered. Setting an existing key keeps
 * its position and replaces the value.
 */
export type RecordVal = { tag: "Record"; fields: Map<string, Val> };

/** A point on the UTC timeline, carried as ISO-8601 text (e.g. 2025-01-01T12:00:00Z). */
export type InstantVal = { tag: "Instant"; iso: string };

/** A calendar date without time or zone, carried as YYYY-MM-DD. */
export type PlainDateVal = { tag: "PlainDate"; iso: string };

/** Wall-clock datetime plus IANA zone id. */
export type ZonedDateTimeVal = { tag: "ZonedDateTime"; iso: string; timezone: string };

// ─────────────────────────────────────────────────────────────────
// In-process variants (never cross the wire)
// ─────────────────────────────────────────────────────────────────

export type WordRefVal = { tag: "WordRef"; word: Word };
export type ModuleRefVal = { tag: "ModuleRef"; module: Module };
export type VariableRefVal = { tag: "VariableRef"; variable: Variable };
export type OptionsVal = { tag: "Options"; options: WordOptions };

export type SerializableVal =
  | IntVal
  | FloatVal
  | BoolVal
  | StrVal
  | NullVal
  | ArrayVal
  | RecordVal
  | InstantVal
  | PlainDateVal
  | ZonedDateTimeVal;

export type Val = SerializableVal | WordRefVal | ModuleRefVal | VariableRefVal | OptionsVal;

export type ValTag = Val["tag"];

// ─────────────────────────────────────────────────────────────────
// Constructors
// ─────────────────────────────────────────────────────────────────

export const VNull: NullVal = { tag: "Null" };
export const VTrue: BoolVal = { tag: "Bool", b: true };
export const VFalse: BoolVal = { tag: "Bool", b: false };

export function VInt(n: bigint | number): IntVal {
  return { tag: "Int", value: typeof n === "bigint" ? n : BigInt(n) };
}

export function VFloat(n: number): FloatVal {
  return { tag: "Float", value: n };
}

export function VBool(b: boolean): BoolVal {
  return b ? VTrue : VFalse;
}

export function VStr(s: string): StrVal {
  return { tag: "Str", s };
}

export function VArray(items: Val[]): ArrayVal {
  return { tag: "Array", items };
}

export function VRecord(entries: Iterable<[string, Val]> = []): RecordVal {
  return { tag: "Record", fields: new Map(entries) };
}

export function VInstant(iso: string): InstantVal {
  return { tag: "Instant", iso };
}

export function VPlainDate(iso: string): PlainDateVal {
  return { tag: "PlainDate", iso };
}

export function VZoned(iso: string, timezone: string): ZonedDateTimeVal {
  return { tag: "ZonedDateTime", iso, timezone };
}

// ─────────────────────────────────────────────────────────────────
// Predicates
// ─────────────────────────────────────────────────────────────────

const IN_PROCESS_TAGS: ReadonlySet<ValTag> = new Set<ValTag>(["WordRef", "ModuleRef", "VariableRef", "Options"]);

export function isInProcess(v: Val): v is WordRefVal | ModuleRefVal | VariableRefVal | OptionsVal {
  return IN_PROCESS_TAGS.has(v.tag);
}

export function isSerializable(v: Val): v is SerializableVal {
  if (isInProcess(v)) return false;
  if (v.tag === "Array") return v.items.every(isSerializable);
  if (v.tag === "Record") {
    for (const item of v.fields.values()) {
      if (!isSerializable(item)) return false;
    }
  }
  return true;
}

/** Forthic truthiness: NULL, FALSE, 0, 0.0, "" and [] are false. */
export function isTruthy(v: Val): boolean {
  switch (v.tag) {
    case "Null":
      return false;
    case "Bool":
      return v.b;
    case "Int":
      return v.value !== 0n;
    case "Float":
      return v.value !== 0;
    case "Str":
      return v.s.length > 0;
    case "Array":
      return v.items.length > 0;
    default:
      return true;
  }
}

// ─────────────────────────────────────────────────────────────────
// Structural operations
// ─────────────────────────────────────────────────────────────────

/**
 * Structural equality. Int and Float with the same magnitude are NOT equal.
 * NaN equals NaN so decoded payloads compare equal to their source.
 */
export function valuesEqual(a: Val, b: Val): boolean {
  switch (a.tag) {
    case "Int":
      return b.tag === "Int" && a.value === b.value;
    case "Float":
      return b.tag === "Float" && (a.value === b.value || (Number.isNaN(a.value) && Number.isNaN(b.value)));
    case "Bool":
      return b.tag === "Bool" && a.b === b.b;
    case "Str":
      return b.tag === "Str" && a.s === b.s;
    case "Null":
      return b.tag === "Null";
    case "Array":
      return (
        b.tag === "Array" &&
        a.items.length === b.items.length &&
        a.items.every((item, i) => valuesEqual(item, b.items[i]))
      );
    case "Record": {
      if (b.tag !== "Record" || a.fields.size !== b.fields.size) return false;
      const bKeys = Array.from(b.fields.keys());
      let i = 0;
      for (const [key, value] of a.fields) {
        if (bKeys[i] !== key) return false;
        const other = b.fields.get(key);
        if (other === undefined || !valuesEqual(value, other)) return false;
        i++;
      }
      return true;
    }
    case "Instant":
      return b.tag === "Instant" && a.iso === b.iso;
    case "PlainDate":
      return b.tag === "PlainDate" && a.iso === b.iso;
    case "ZonedDateTime":
      return b.tag === "ZonedDateTime" && a.iso === b.iso && a.timezone === b.timezone;
    case "WordRef":
      return b.tag === "WordRef" && a.word === b.word;
    case "ModuleRef":
      return b.tag === "ModuleRef" && a.module === b.module;
    case "VariableRef":
      return b.tag === "VariableRef" && a.variable === b.variable;
    case "Options":
      return b.tag === "Options" && a.options === b.options;
  }
}

/** Deep copy of containers; leaves and in-process references are shared. */
export function cloneVal(v: Val): Val {
  switch (v.tag) {
    case "Array":
      return VArray(v.items.map(cloneVal));
    case "Record":
      return VRecord(Array.from(v.fields, ([k, item]): [string, Val] => [k, cloneVal(item)]));
    default:
      return v;
  }
}

/**
 * Single-line display form, used by STACK! and the CLI.
 */
export function formatValue(v: Val): string {
  switch (v.tag) {
    case "Int":
      return v.value.toString();
    case "Float":
      return Number.isInteger(v.value) ? v.value.toFixed(1) : String(v.value);
    case "Bool":
      return v.b ? "TRUE" : "FALSE";
    case "Str":
      return JSON.stringify(v.s);
    case "Null":
      return "NULL";
    case "Array":
      return `[${v.items.map(formatValue).join(" ")}]`;
    case "Record": {
      const parts = Array.from(v.fields, ([k, item]) => `${JSON.stringify(k)}: ${formatValue(item)}`);
      return `{${parts.join(", ")}}`;
    }
    case "Instant":
    case "PlainDate":
      return v.iso;
    case "ZonedDateTime":
      return `${v.iso}[${v.timezone}]`;
    case "WordRef":
      return `<word ${v.word.name}>`;
    case "ModuleRef":
      return `<module ${v.module.name}>`;
    case "VariableRef":
      return `<variable ${v.variable.name}>`;
    case "Options":
      return `<options ${v.options.toString()}>`;
  }
}

// ─────────────────────────────────────────────────────────────────
// Host conversion (for native word implementations)
// ─────────────────────────────────────────────────────────────────

export type HostValue = null | boolean | number | bigint | string | Date | HostValue[] | { [key: string]: HostValue };

/**
 * Convert a Val to a plain JS value. Ints within the safe range become
 * numbers, larger ones stay bigint. Temporal values become their ISO text.
 */
export function toHost(v: Val): HostValue {
  switch (v.tag) {
    case "Int": {
      const asNumber = Number(v.value);
      return Number.isSafeInteger(asNumber) ? asNumber : v.value;
    }
    case "Float":
      return v.value;
    case "Bool":
      return v.b;
    case "Str":
      return v.s;
    case "Null":
      return null;
    case "Array":
      return v.items.map(toHost);
    case "Record": {
      const out: { [key: string]: HostValue } = {};
      for (const [k, item] of v.fields) out[k] = toHost(item);
      return out;
    }
    case "Instant":
    case "PlainDate":
    case "ZonedDateTime":
      return v.iso;
    default:
      throw new TypeError(`Cannot convert ${v.tag} to a host value`);
  }
}

/**
 * Convert a plain JS value to a Val. Integral numbers become Int; use
 * VFloat directly when a whole-number Float is wanted.
 */
export function fromHost(h: HostValue | undefined): Val {
  if (h === null || h === undefined) return VNull;
  if (typeof h === "boolean") return VBool(h);
  if (typeof h === "bigint") return VInt(h);
  if (typeof h === "number") return Number.isInteger(h) ? VInt(h) : VFloat(h);
  if (typeof h === "string") return VStr(h);
  if (h instanceof Date) return VInstant(h.toISOString());
  if (Array.isArray(h)) return VArray(h.map(fromHost));
  return VRecord(Object.entries(h).map(([k, item]): [string, Val] => [k, fromHost(item)]));
}
