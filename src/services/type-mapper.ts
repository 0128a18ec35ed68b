/**
 * Type Mapper
 *
 * Derives a type tag from a SQLite declared type, maps tags onto fixed
 * PostgreSQL column types, and coerces individual row values into those types.
 * Mapping depends on the tag alone; row values never influence it.
 */

import { DestinationType, SourceTypeTag, type DestinationValue, type SourceValue } from '../types/migration-types';

const TYPE_MAP: Readonly<Record<SourceTypeTag, DestinationType>> = {
  [SourceTypeTag.INTEGER]: DestinationType.BIGINT,
  [SourceTypeTag.REAL]: DestinationType.DOUBLE_PRECISION,
  [SourceTypeTag.TEXT]: DestinationType.TEXT,
  [SourceTypeTag.UNSPECIFIED]: DestinationType.TEXT,
  [SourceTypeTag.BLOB]: DestinationType.BYTEA,
  [SourceTypeTag.NUMERIC]: DestinationType.NUMERIC,
  [SourceTypeTag.BOOLEAN]: DestinationType.BOOLEAN,
  [SourceTypeTag.TEMPORAL]: DestinationType.TIMESTAMP
};

/**
 * Applies SQLite's affinity rules (in their documented order) to a declared type.
 * Types that land in NUMERIC affinity are split into boolean, temporal and numeric.
 */
export function deriveTypeTag(declaredType: string): SourceTypeTag {
  const type = declaredType.trim().toUpperCase();

  if (type === '') return SourceTypeTag.UNSPECIFIED;
  if (type.includes('INT')) return SourceTypeTag.INTEGER;
  if (type.includes('CHAR') || type.includes('CLOB') || type.includes('TEXT')) return SourceTypeTag.TEXT;
  if (type.includes('BLOB')) return SourceTypeTag.BLOB;
  if (type.includes('REAL') || type.includes('FLOA') || type.includes('DOUB')) return SourceTypeTag.REAL;
  if (type.includes('BOOL')) return SourceTypeTag.BOOLEAN;
  if (type.includes('DATE') || type.includes('TIME')) return SourceTypeTag.TEMPORAL;

  return SourceTypeTag.NUMERIC;
}

export function mapType(tag: SourceTypeTag): DestinationType {
  return TYPE_MAP[tag];
}

// ===== VALUE COERCION =====

export type CoercionResult =
  | { ok: true; value: DestinationValue }
  | { ok: false; reason: string };

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const TIMESTAMP_PATTERN = /^\d{4}-\d{2}-\d{2}([ T]\d{2}:\d{2}(:\d{2}(\.\d+)?)?)?\s?(Z|[+-]\d{2}(:?\d{2})?)?$/i;

const BOOLEAN_WORDS: Readonly<Record<string, boolean>> = {
  true: true,
  t: true,
  yes: true,
  y: true,
  '1': true,
  false: false,
  f: false,
  no: false,
  n: false,
  '0': false
};

/**
 * Short, log-safe description of a source value
 */
export function describeValue(value: SourceValue): string {
  if (value === null) return 'NULL';
  if (Buffer.isBuffer(value)) return `<blob ${value.length} bytes>`;
  if (typeof value === 'string') {
    return value.length > 40 ? `'${value.slice(0, 40)}…'` : `'${value}'`;
  }
  return String(value);
}

function fail(value: SourceValue, type: DestinationType): CoercionResult {
  return { ok: false, reason: `cannot represent ${describeValue(value)} as ${type}` };
}

function toInt64(value: bigint, original: SourceValue): CoercionResult {
  if (value < INT64_MIN || value > INT64_MAX) {
    return { ok: false, reason: `${describeValue(original)} is outside the BIGINT range` };
  }
  return { ok: true, value: value.toString() };
}

function coerceBigint(value: Exclude<SourceValue, null>): CoercionResult {
  if (typeof value === 'bigint') {
    return toInt64(value, value);
  }
  if (typeof value === 'number') {
    return Number.isInteger(value) ? toInt64(BigInt(value), value) : fail(value, DestinationType.BIGINT);
  }
  if (typeof value === 'string' && INTEGER_PATTERN.test(value.trim())) {
    return toInt64(BigInt(value.trim()), value);
  }
  return fail(value, DestinationType.BIGINT);
}

function coerceDouble(value: Exclude<SourceValue, null>): CoercionResult {
  if (typeof value === 'number') {
    return { ok: true, value };
  }
  if (typeof value === 'bigint') {
    return { ok: true, value: Number(value) };
  }
  if (typeof value === 'string' && DECIMAL_PATTERN.test(value.trim())) {
    return { ok: true, value: Number(value.trim()) };
  }
  return fail(value, DestinationType.DOUBLE_PRECISION);
}

function coerceNumeric(value: Exclude<SourceValue, null>): CoercionResult {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? { ok: true, value } : fail(value, DestinationType.NUMERIC);
  }
  if (typeof value === 'bigint') {
    return { ok: true, value: value.toString() };
  }
  if (typeof value === 'string' && DECIMAL_PATTERN.test(value.trim())) {
    return { ok: true, value: value.trim() };
  }
  return fail(value, DestinationType.NUMERIC);
}

function coerceText(value: Exclude<SourceValue, null>): CoercionResult {
  if (typeof value === 'string') {
    return { ok: true, value };
  }
  if (typeof value === 'number' || typeof value === 'bigint') {
    return { ok: true, value: String(value) };
  }
  return fail(value, DestinationType.TEXT);
}

function coerceBytea(value: Exclude<SourceValue, null>): CoercionResult {
  if (Buffer.isBuffer(value)) {
    return { ok: true, value };
  }
  if (typeof value === 'string') {
    return { ok: true, value: Buffer.from(value, 'utf8') };
  }
  return fail(value, DestinationType.BYTEA);
}

function coerceBoolean(value: Exclude<SourceValue, null>): CoercionResult {
  if (Buffer.isBuffer(value)) {
    return fail(value, DestinationType.BOOLEAN);
  }
  const word = String(value).trim().toLowerCase();
  const mapped = BOOLEAN_WORDS[word];
  return mapped === undefined ? fail(value, DestinationType.BOOLEAN) : { ok: true, value: mapped };
}

/**
 * UTC wall-clock text with no offset; a Date parameter would be sent in the host's local zone
 */
function toUtcTimestamp(date: Date): string {
  return date.toISOString().slice(0, 23).replace('T', ' ');
}

function coerceTimestamp(value: Exclude<SourceValue, null>): CoercionResult {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return TIMESTAMP_PATTERN.test(trimmed) && !Number.isNaN(Date.parse(trimmed.replace(' ', 'T')))
      ? { ok: true, value: trimmed }
      : fail(value, DestinationType.TIMESTAMP);
  }
  if (typeof value === 'number' || typeof value === 'bigint') {
    // numeric timestamps are unix epoch seconds, as written by SQLite's unixepoch()
    const date = new Date(Number(value) * 1000);
    return Number.isNaN(date.getTime())
      ? fail(value, DestinationType.TIMESTAMP)
      : { ok: true, value: toUtcTimestamp(date) };
  }
  return fail(value, DestinationType.TIMESTAMP);
}

/**
 * Converts one source value into the representation sent for the destination type.
 * NULL passes through; nullability is enforced by the destination.
 */
export function coerceValue(type: DestinationType, value: SourceValue): CoercionResult {
  if (value === null) {
    return { ok: true, value: null };
  }

  switch (type) {
    case DestinationType.BIGINT:
      return coerceBigint(value);
    case DestinationType.DOUBLE_PRECISION:
      return coerceDouble(value);
    case DestinationType.NUMERIC:
      return coerceNumeric(value);
    case DestinationType.TEXT:
      return coerceText(value);
    case DestinationType.BYTEA:
      return coerceBytea(value);
    case DestinationType.BOOLEAN:
      return coerceBoolean(value);
    case DestinationType.TIMESTAMP:
      return coerceTimestamp(value);
  }
}
