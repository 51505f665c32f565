/**
 * querykit - SQLite Value Kinds
 *
 * Bindable values for SQLite and the codec converting entity properties into them.
 * SQLite has no native boolean, date or JSON storage: booleans bind as 0/1,
 * datetimes as ISO strings and JSON as text.
 */

import {
  castToBoolean,
  castToBytes,
  castToDatetime,
  castToInteger,
  castToNumber,
  castToString,
  decodeField,
  formatDate,
  formatTime,
} from '../TypeCast';
import { NIL_UUID, isJsonLike, unwrapOptional, type ValueCodec } from '../ValueCodec';
import type { FieldKind } from '../types';

// ============================================
// Value Kinds
// ============================================

export type SqliteValue =
  | { kind: 'Text'; value: string }
  | { kind: 'Integer'; value: number | bigint }
  | { kind: 'Real'; value: number }
  | { kind: 'Bool'; value: boolean }
  | { kind: 'DateTime'; value: Date }
  | { kind: 'Date'; value: string }
  | { kind: 'Time'; value: string }
  | { kind: 'Blob'; value: Uint8Array }
  | { kind: 'Json'; value: unknown }
  | { kind: 'Uuid'; value: string }
  | { kind: 'Null' };

/**
 * Constructors for each SQLite value kind
 * @example SqliteValue.integer(42)
 */
export const SqliteValue = {
  text: (value: string): SqliteValue => ({ kind: 'Text', value }),
  integer: (value: number | bigint): SqliteValue => ({ kind: 'Integer', value }),
  real: (value: number): SqliteValue => ({ kind: 'Real', value }),
  bool: (value: boolean): SqliteValue => ({ kind: 'Bool', value }),
  dateTime: (value: Date): SqliteValue => ({ kind: 'DateTime', value }),
  date: (value: string): SqliteValue => ({ kind: 'Date', value }),
  time: (value: string): SqliteValue => ({ kind: 'Time', value }),
  blob: (value: Uint8Array): SqliteValue => ({ kind: 'Blob', value }),
  json: (value: unknown): SqliteValue => ({ kind: 'Json', value }),
  uuid: (value: string): SqliteValue => ({ kind: 'Uuid', value }),
  null: (): SqliteValue => ({ kind: 'Null' }),
};

const SQLITE_TYPES: Record<SqliteValue['kind'], string> = {
  Text: 'TEXT',
  Integer: 'INTEGER',
  Real: 'REAL',
  Bool: 'BOOLEAN',
  DateTime: 'DATETIME',
  Date: 'DATE',
  Time: 'TIME',
  Blob: 'BLOB',
  Json: 'JSON',
  Uuid: 'TEXT',
  Null: 'NULL',
};

// ============================================
// Conversion
// ============================================

function convertSqlite(value: unknown): SqliteValue {
  const inner = unwrapOptional(value);
  if (inner === null || inner === undefined) return SqliteValue.null();
  if (typeof inner === 'string') return SqliteValue.text(inner);
  if (typeof inner === 'number') {
    return Number.isInteger(inner) ? SqliteValue.integer(inner) : SqliteValue.real(inner);
  }
  if (typeof inner === 'bigint') return SqliteValue.integer(inner);
  if (typeof inner === 'boolean') return SqliteValue.bool(inner);
  if (inner instanceof Date) return SqliteValue.dateTime(inner);
  if (inner instanceof Uint8Array) return SqliteValue.blob(inner);
  if (isJsonLike(inner)) return SqliteValue.json(inner);
  return SqliteValue.null();
}

function fromSqliteField(kind: FieldKind, value: unknown): SqliteValue {
  const inner = unwrapOptional(value);
  if (inner === null || inner === undefined) return SqliteValue.null();

  switch (kind) {
    case 'text':
    case 'inet':
    case 'decimal': {
      const text = castToString(inner);
      return text === null ? convertSqlite(inner) : SqliteValue.text(text);
    }
    case 'uuid': {
      const uuid = castToString(inner);
      return uuid === null ? convertSqlite(inner) : SqliteValue.uuid(uuid);
    }
    case 'integer':
    case 'bigint': {
      const int = castToInteger(inner);
      return int === null ? convertSqlite(inner) : SqliteValue.integer(int);
    }
    case 'real': {
      const real = castToNumber(inner);
      return real === null ? convertSqlite(inner) : SqliteValue.real(real);
    }
    case 'boolean': {
      const bool = castToBoolean(inner);
      return bool === null ? convertSqlite(inner) : SqliteValue.bool(bool);
    }
    case 'datetime': {
      const date = castToDatetime(inner);
      return date === null ? convertSqlite(inner) : SqliteValue.dateTime(date);
    }
    case 'date':
      return inner instanceof Date
        ? SqliteValue.date(formatDate(inner))
        : SqliteValue.date(String(inner));
    case 'time':
      return inner instanceof Date
        ? SqliteValue.time(formatTime(inner))
        : SqliteValue.time(String(inner));
    case 'blob': {
      const bytes = castToBytes(inner);
      return bytes === null ? convertSqlite(inner) : SqliteValue.blob(bytes);
    }
    case 'json':
      return SqliteValue.json(inner);
    case 'auto':
      return convertSqlite(inner);
  }
}

function encodeSqlite(value: SqliteValue): unknown {
  switch (value.kind) {
    case 'Bool':
      return value.value ? 1 : 0;
    case 'DateTime':
      return value.value.toISOString();
    case 'Blob':
      return Buffer.from(value.value);
    case 'Json':
      return JSON.stringify(value.value);
    case 'Null':
      return null;
    default:
      return value.value;
  }
}

// ============================================
// Codec
// ============================================

export const sqliteCodec: ValueCodec<SqliteValue> = {
  dialect: 'sqlite',
  fromField: fromSqliteField,
  convert: convertSqlite,

  isDefaultValue(value: SqliteValue): boolean {
    switch (value.kind) {
      case 'Integer':
        return value.value === 0 || value.value === 0n;
      case 'Text':
        return value.value === '';
      case 'Uuid':
        return value.value === '' || value.value === NIL_UUID;
      case 'Null':
        return true;
      default:
        return false;
    }
  },

  isNull: (value) => value.kind === 'Null',
  null: () => SqliteValue.null(),
  bool: (value) => SqliteValue.bool(value),
  encode: encodeSqlite,
  sqlType: (value) => SQLITE_TYPES[value.kind],
  decode: decodeField,
};
