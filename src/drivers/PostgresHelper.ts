/**
 * querykit - PostgreSQL Value Kinds
 *
 * Bindable values for PostgreSQL and the codec converting entity properties into them.
 * INT8 values are bound as decimal strings so that node-postgres keeps full precision.
 */

import {
  castToBigInt,
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

export type PgValue =
  | { kind: 'Null' }
  | { kind: 'Bool'; value: boolean }
  | { kind: 'Int2'; value: number }
  | { kind: 'Int4'; value: number }
  | { kind: 'Int8'; value: bigint }
  | { kind: 'Float4'; value: number }
  | { kind: 'Float8'; value: number }
  | { kind: 'Numeric'; value: string }
  | { kind: 'Text'; value: string }
  | { kind: 'Bytea'; value: Uint8Array }
  | { kind: 'Date'; value: string }
  | { kind: 'Time'; value: string }
  | { kind: 'Timestamp'; value: Date }
  | { kind: 'Timestamptz'; value: Date }
  | { kind: 'Interval'; value: string }
  | { kind: 'Inet'; value: string }
  | { kind: 'Cidr'; value: string }
  | { kind: 'MacAddr'; value: string }
  | { kind: 'Uuid'; value: string }
  | { kind: 'Json'; value: unknown };

export const PgValue = {
  null: (): PgValue => ({ kind: 'Null' }),
  bool: (value: boolean): PgValue => ({ kind: 'Bool', value }),
  int2: (value: number): PgValue => ({ kind: 'Int2', value }),
  int4: (value: number): PgValue => ({ kind: 'Int4', value }),
  int8: (value: bigint): PgValue => ({ kind: 'Int8', value }),
  float4: (value: number): PgValue => ({ kind: 'Float4', value }),
  float8: (value: number): PgValue => ({ kind: 'Float8', value }),
  numeric: (value: string): PgValue => ({ kind: 'Numeric', value }),
  text: (value: string): PgValue => ({ kind: 'Text', value }),
  bytea: (value: Uint8Array): PgValue => ({ kind: 'Bytea', value }),
  date: (value: string): PgValue => ({ kind: 'Date', value }),
  time: (value: string): PgValue => ({ kind: 'Time', value }),
  timestamp: (value: Date): PgValue => ({ kind: 'Timestamp', value }),
  timestamptz: (value: Date): PgValue => ({ kind: 'Timestamptz', value }),
  interval: (value: string): PgValue => ({ kind: 'Interval', value }),
  inet: (value: string): PgValue => ({ kind: 'Inet', value }),
  cidr: (value: string): PgValue => ({ kind: 'Cidr', value }),
  macAddr: (value: string): PgValue => ({ kind: 'MacAddr', value }),
  uuid: (value: string): PgValue => ({ kind: 'Uuid', value }),
  json: (value: unknown): PgValue => ({ kind: 'Json', value }),
};

const PG_TYPES: Record<PgValue['kind'], string> = {
  Null: 'NULL',
  Bool: 'BOOL',
  Int2: 'INT2',
  Int4: 'INT4',
  Int8: 'INT8',
  Float4: 'FLOAT4',
  Float8: 'FLOAT8',
  Numeric: 'NUMERIC',
  Text: 'TEXT',
  Bytea: 'BYTEA',
  Date: 'DATE',
  Time: 'TIME',
  Timestamp: 'TIMESTAMP',
  Timestamptz: 'TIMESTAMPTZ',
  Interval: 'INTERVAL',
  Inet: 'INET',
  Cidr: 'CIDR',
  MacAddr: 'MACADDR',
  Uuid: 'UUID',
  Json: 'JSONB',
};

const INT4_MIN = -2147483648;
const INT4_MAX = 2147483647;

// ============================================
// Conversion
// ============================================

/** INT4 when the integer fits 32 bits, INT8 otherwise */
function integerValue(value: number | bigint): PgValue {
  if (typeof value === 'bigint') return PgValue.int8(value);
  return value >= INT4_MIN && value <= INT4_MAX
    ? PgValue.int4(value)
    : PgValue.int8(BigInt(value));
}

function convertPg(value: unknown): PgValue {
  const inner = unwrapOptional(value);
  if (inner === null || inner === undefined) return PgValue.null();
  if (typeof inner === 'string') return PgValue.text(inner);
  if (typeof inner === 'number') {
    return Number.isInteger(inner) ? integerValue(inner) : PgValue.float8(inner);
  }
  if (typeof inner === 'bigint') return PgValue.int8(inner);
  if (typeof inner === 'boolean') return PgValue.bool(inner);
  if (inner instanceof Date) return PgValue.timestamptz(inner);
  if (inner instanceof Uint8Array) return PgValue.bytea(inner);
  if (isJsonLike(inner)) return PgValue.json(inner);
  return PgValue.null();
}

function fromPgField(kind: FieldKind, value: unknown): PgValue {
  const inner = unwrapOptional(value);
  if (inner === null || inner === undefined) return PgValue.null();

  switch (kind) {
    case 'text': {
      const text = castToString(inner);
      return text === null ? convertPg(inner) : PgValue.text(text);
    }
    case 'uuid': {
      const uuid = castToString(inner);
      return uuid === null ? convertPg(inner) : PgValue.uuid(uuid);
    }
    case 'inet': {
      const addr = castToString(inner);
      return addr === null ? convertPg(inner) : PgValue.inet(addr);
    }
    case 'integer': {
      const int = castToInteger(inner);
      return int === null ? convertPg(inner) : integerValue(int);
    }
    case 'bigint': {
      const big = castToBigInt(inner);
      return big === null ? convertPg(inner) : PgValue.int8(big);
    }
    case 'real': {
      const real = castToNumber(inner);
      return real === null ? convertPg(inner) : PgValue.float8(real);
    }
    case 'decimal': {
      const numeric = castToString(inner);
      return numeric === null ? convertPg(inner) : PgValue.numeric(numeric);
    }
    case 'boolean': {
      const bool = castToBoolean(inner);
      return bool === null ? convertPg(inner) : PgValue.bool(bool);
    }
    case 'datetime': {
      const date = castToDatetime(inner);
      return date === null ? convertPg(inner) : PgValue.timestamptz(date);
    }
    case 'date':
      return inner instanceof Date ? PgValue.date(formatDate(inner)) : PgValue.date(String(inner));
    case 'time':
      return inner instanceof Date ? PgValue.time(formatTime(inner)) : PgValue.time(String(inner));
    case 'blob': {
      const bytes = castToBytes(inner);
      return bytes === null ? convertPg(inner) : PgValue.bytea(bytes);
    }
    case 'json':
      return PgValue.json(inner);
    case 'auto':
      return convertPg(inner);
  }
}

function encodePg(value: PgValue): unknown {
  switch (value.kind) {
    case 'Null':
      return null;
    case 'Int8':
      return value.value.toString();
    case 'Bytea':
      return Buffer.from(value.value);
    case 'Json':
      return JSON.stringify(value.value);
    default:
      return value.value;
  }
}

// ============================================
// Codec
// ============================================

export const pgCodec: ValueCodec<PgValue> = {
  dialect: 'postgres',
  fromField: fromPgField,
  convert: convertPg,

  isDefaultValue(value: PgValue): boolean {
    switch (value.kind) {
      case 'Int2':
      case 'Int4':
        return value.value === 0;
      case 'Int8':
        return value.value === 0n;
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
  null: () => PgValue.null(),
  bool: (value) => PgValue.bool(value),
  encode: encodePg,
  sqlType: (value) => PG_TYPES[value.kind],
  decode: decodeField,
};
