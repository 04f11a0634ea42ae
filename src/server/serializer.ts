/**
 * Serializer - convert between interpreter values and wire JSON
 *
 * Decoding validates untrusted input and raises WireFormatError with the
 * JSON path of the offending value.
 */

import { WireFormatError } from '../core/errors';
import {
  VArray,
  VBool,
  VFloat,
  VInstant,
  VInt,
  VNull,
  VPlainDate,
  VRecord,
  VStr,
  VZoned,
  type Val,
} from '../core/eval/values';
import type {
  ExecuteSequenceRequest,
  ExecuteWordRequest,
  GetModuleInfoRequest,
  WireFloat,
  WireValue,
} from './runtimeService';

const INT_PATTERN = /^-?\d+$/;
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

// ============================================================
// ENCODE
// ============================================================

function encodeFloat(n: number): WireFloat {
  if (Number.isNaN(n)) return 'NaN';
  if (n === Infinity) return 'Infinity';
  if (n === -Infinity) return '-Infinity';
  return n;
}

/**
 * Encode a value for the wire. Word, module, variable and options values
 * only exist inside one interpreter and cannot be sent.
 */
export function encodeValue(v: Val): WireValue {
  switch (v.tag) {
    case 'Int':
      return { int_value: v.value.toString() };
    case 'Float':
      return { float_value: encodeFloat(v.value) };
    case 'Bool':
      return { bool_value: v.b };
    case 'Str':
      return { string_value: v.s };
    case 'Null':
      return { null_value: {} };
    case 'Array':
      return { array_value: { items: v.items.map(encodeValue) } };
    case 'Record':
      return {
        record_value: {
          fields: Array.from(v.fields, ([key, value]) => ({ key, value: encodeValue(value) })),
        },
      };
    case 'Instant':
      return { instant_value: { iso8601: v.iso } };
    case 'PlainDate':
      return { plain_date_value: { iso8601_date: v.iso } };
    case 'ZonedDateTime':
      return { zoned_datetime_value: { iso8601: v.iso, timezone: v.timezone } };
    case 'WordRef':
    case 'ModuleRef':
    case 'VariableRef':
    case 'Options':
      throw new WireFormatError(`Cannot serialize ${v.tag} value`);
  }
}

export function encodeStack(values: Val[]): WireValue[] {
  return values.map(encodeValue);
}

// ============================================================
// DECODE
// ============================================================

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectObject(value: unknown, path: string): Record<string, unknown> {
  if (!isObject(value)) throw new WireFormatError(`${path}: expected an object`);
  return value;
}

function expectString(value: unknown, path: string): string {
  if (typeof value !== 'string') throw new WireFormatError(`${path}: expected a string`);
  return value;
}

function expectArray(value: unknown, path: string): unknown[] {
  if (!Array.isArray(value)) throw new WireFormatError(`${path}: expected an array`);
  return value;
}

function decodeInt(raw: unknown, path: string): Val {
  if (typeof raw === 'string' && INT_PATTERN.test(raw)) return VInt(BigInt(raw));
  if (typeof raw === 'number' && Number.isSafeInteger(raw)) return VInt(raw);
  throw new WireFormatError(`${path}.int_value: expected an integer`);
}

function decodeFloat(raw: unknown, path: string): Val {
  if (typeof raw === 'number') return VFloat(raw);
  switch (raw) {
    case 'NaN':
      return VFloat(NaN);
    case 'Infinity':
      return VFloat(Infinity);
    case '-Infinity':
      return VFloat(-Infinity);
  }
  throw new WireFormatError(`${path}.float_value: expected a number`);
}

/** Decode one wire value. Exactly one variant key must be present. */
export function decodeValue(raw: unknown, path = 'value'): Val {
  const obj = expectObject(raw, path);
  const keys = Object.keys(obj);
  if (keys.length !== 1) {
    throw new WireFormatError(`${path}: expected exactly one value field (got ${keys.length})`);
  }
  const key = keys[0];
  const body = obj[key];

  switch (key) {
    case 'int_value':
      return decodeInt(body, path);
    case 'float_value':
      return decodeFloat(body, path);
    case 'bool_value':
      if (typeof body !== 'boolean') throw new WireFormatError(`${path}.bool_value: expected a boolean`);
      return VBool(body);
    case 'string_value':
      return VStr(expectString(body, `${path}.string_value`));
    case 'null_value':
      return VNull;
    case 'array_value': {
      const items = expectArray(expectObject(body, `${path}.array_value`).items ?? [], `${path}.array_value.items`);
      return VArray(items.map((item, i) => decodeValue(item, `${path}.array_value.items[${i}]`)));
    }
    case 'record_value': {
      const fieldsPath = `${path}.record_value.fields`;
      const fields = expectArray(expectObject(body, `${path}.record_value`).fields ?? [], fieldsPath);
      const entries: Array<[string, Val]> = fields.map((field, i) => {
        const entry = expectObject(field, `${fieldsPath}[${i}]`);
        return [expectString(entry.key, `${fieldsPath}[${i}].key`), decodeValue(entry.value, `${fieldsPath}[${i}].value`)];
      });
      return VRecord(entries);
    }
    case 'instant_value': {
      const iso = expectString(expectObject(body, `${path}.instant_value`).iso8601, `${path}.instant_value.iso8601`);
      if (Number.isNaN(Date.parse(iso))) throw new WireFormatError(`${path}.instant_value: invalid timestamp '${iso}'`);
      return VInstant(iso);
    }
    case 'plain_date_value': {
      const p = `${path}.plain_date_value`;
      const iso = expectString(expectObject(body, p).iso8601_date, `${p}.iso8601_date`);
      if (!DATE_PATTERN.test(iso)) throw new WireFormatError(`${p}: invalid date '${iso}'`);
      return VPlainDate(iso);
    }
    case 'zoned_datetime_value': {
      const p = `${path}.zoned_datetime_value`;
      const zoned = expectObject(body, p);
      return VZoned(expectString(zoned.iso8601, `${p}.iso8601`), expectString(zoned.timezone, `${p}.timezone`));
    }
    default:
      throw new WireFormatError(`${path}: unknown value field '${key}'`);
  }
}

export function decodeStack(raw: unknown, path = 'stack'): Val[] {
  if (raw === undefined) return [];
  return expectArray(raw, path).map((item, i) => decodeValue(item, `${path}[${i}]`));
}

// ============================================================
// REQUESTS
// ============================================================

export function parseExecuteWordRequest(raw: unknown): ExecuteWordRequest {
  const body = expectObject(raw ?? {}, 'request');
  const word_name = expectString(body.word_name, 'word_name');
  if (word_name === '') throw new WireFormatError('word_name: must not be empty');
  return { word_name, stack: wireItems(body.stack) };
}

export function parseExecuteSequenceRequest(raw: unknown): ExecuteSequenceRequest {
  const body = expectObject(raw ?? {}, 'request');
  const word_names = expectArray(body.word_names ?? [], 'word_names').map((name, i) => expectString(name, `word_names[${i}]`));
  return { word_names, stack: wireItems(body.stack) };
}

export function parseGetModuleInfoRequest(raw: unknown): GetModuleInfoRequest {
  const body = expectObject(raw ?? {}, 'request');
  return { module_name: expectString(body.module_name, 'module_name') };
}

/** Re-encode a validated stack so the request carries typed wire values. */
function wireItems(raw: unknown): WireValue[] {
  return encodeStack(decodeStack(raw));
}
