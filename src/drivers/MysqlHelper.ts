/**
 * querykit - MySQL Value Kinds
 *
 * Bindable values for MySQL, including the unsigned integer family,
 * and the codec converting entity properties into them.
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

export type MysqlValue =
  | { kind: 'Null' }
  | { kind: 'Bool'; value: boolean }
  | { kind: 'TinyInt'; value: number }
  | { kind: 'SmallInt'; value: number }
  | { kind: 'Int'; value: number }
  | { kind: 'BigInt'; value: bigint }
  | { kind: 'TinyIntUnsigned'; value: number }
  | { kind: 'SmallIntUnsigned'; value: number }
  | { kind: 'IntUnsigned'; value: number }
  | { kind: 'BigIntUnsigned'; value: bigint }
  | { kind: 'Float'; value: number }
  | { kind: 'Double'; value: number }
  | { kind: 'Decimal'; value: string }
  | { kind: 'Text'; value: string }
  | { kind: 'Blob'; value: Uint8Array }
  | { kind: 'Date'; value: string }
  | { kind: 'Time'; value: string }
  | { kind: 'DateTime'; value: Date }
  | { kind: 'Timestamp'; value: Date }
  | { kind: 'Json'; value: unknown }
  | { kind: 'Uuid'; value: string }
  | { kind: 'IpAddr'; value: string };

export const MysqlValue = {
  null: (): MysqlValue => ({ kind: 'Null' }),
  bool: (value: boolean): MysqlValue => ({ kind: 'Bool', value }),
  tinyInt: (value: number): MysqlValue => ({ kind: 'TinyInt', value }),
  smallInt: (value: number): MysqlValue => ({ kind: 'SmallInt', value }),
  int: (value: number): MysqlValue => ({ kind: 'Int', value }),
  bigInt: (value: bigint): MysqlValue => ({ kind: 'BigInt', value }),
  tinyIntUnsigned: (value: number): MysqlValue => ({ kind: 'TinyIntUnsigned', value }),
  smallIntUnsigned: (value: number): MysqlValue => ({ kind: 'SmallIntUnsigned', value }),
  intUnsigned: (value: number): MysqlValue => ({ kind: 'IntUnsigned', value }),
  bigIntUnsigned: (value: bigint): MysqlValue => ({ kind: 'BigIntUnsigned', value }),
  float: (value: number): MysqlValue => ({ kind: 'Float', value }),
  double: (value: number): MysqlValue => ({ kind: 'Double', value }),
  decimal: (value: string): MysqlValue => ({ kind: 'Decimal', value }),
  text: (value: string): MysqlValue => ({ kind: 'Text', value }),
  blob: (value: Uint8Array): MysqlValue => ({ kind: 'Blob', value }),
  date: (value: string): MysqlValue => ({ kind: 'Date', value }),
  time: (value: string): MysqlValue => ({ kind: 'Time', value }),
  dateTime: (value: Date): MysqlValue => ({ kind: 'DateTime', value }),
  timestamp: (value: Date): MysqlValue => ({ kind: 'Timestamp', value }),
  json: (value: unknown): MysqlValue => ({ kind: 'Json', value }),
  uuid: (value: string): MysqlValue => ({ kind: 'Uuid', value }),
  ipAddr: (value: string): MysqlValue => ({ kind: 'IpAddr', value }),
};

const MYSQL_TYPES: Record<MysqlValue['kind'], string> = {
  Null: 'NULL',
  Bool: 'BOOLEAN',
  TinyInt: 'TINYINT',
  SmallInt: 'SMALLINT',
  Int: 'INT',
  BigInt: 'BIGINT',
  TinyIntUnsigned: 'TINYINT UNSIGNED',
  SmallIntUnsigned: 'SMALLINT UNSIGNED',
  IntUnsigned: 'INT UNSIGNED',
  BigIntUnsigned: 'BIGINT UNSIGNED',
  Float: 'FLOAT',
  Double: 'DOUBLE',
  Decimal: 'DECIMAL',
  Text: 'TEXT',
  Blob: 'BLOB',
  Date: 'DATE',
  Time: 'TIME',
  DateTime: 'DATETIME',
  Timestamp: 'TIMESTAMP',
  Json: 'JSON',
  Uuid: 'CHAR(36)',
  IpAddr: 'VARCHAR(45)',
};

const INT_MIN = -2147483648;
const INT_MAX = 2147483647;

// ============================================
// Conversion
// ============================================

/** INT when the integer fits 32 bits, BIGINT otherwise */
function integerValue(value: number | bigint): MysqlValue {
  if (typeof value === 'bigint') return MysqlValue.bigInt(value);
  return value >= INT_MIN && value <= INT_MAX
    ? MysqlValue.int(value)
    : MysqlValue.bigInt(BigInt(value));
}

function convertMysql(value: unknown): MysqlValue {
  const inner = unwrapOptional(value);
  if (inner === null || inner === undefined) return MysqlValue.null();
  if (typeof inner === 'string') return MysqlValue.text(inner);
  if (typeof inner === 'number') {
    return Number.isInteger(inner) ? integerValue(inner) : MysqlValue.double(inner);
  }
  if (typeof inner === 'bigint') return MysqlValue.bigInt(inner);
  if (typeof inner === 'boolean') return MysqlValue.bool(inner);
  if (inner instanceof Date) return MysqlValue.dateTime(inner);
  if (inner instanceof Uint8Array) return MysqlValue.blob(inner);
  if (isJsonLike(inner)) return MysqlValue.json(inner);
  return MysqlValue.null();
}

function fromMysqlField(kind: FieldKind, value: unknown): MysqlValue {
  const inner = unwrapOptional(value);
  if (inner === null || inner === undefined) return MysqlValue.null();

  switch (kind) {
    case 'text': {
      const text = castToString(inner);
      return text === null ? convertMysql(inner) : MysqlValue.text(text);
    }
    case 'uuid': {
      const uuid = castToString(inner);
      return uuid === null ? convertMysql(inner) : MysqlValue.uuid(uuid);
    }
    case 'inet': {
      const addr = castToString(inner);
      return addr === null ? convertMysql(inner) : MysqlValue.ipAddr(addr);
    }
    case 'integer': {
      const int = castToInteger(inner);
      return int === null ? convertMysql(inner) : integerValue(int);
    }
    case 'bigint': {
      const big = castToBigInt(inner);
      return big === null ? convertMysql(inner) : MysqlValue.bigInt(big);
    }
    case 'real': {
      const real = castToNumber(inner);
      return real === null ? convertMysql(inner) : MysqlValue.double(real);
    }
    case 'decimal': {
      const decimal = castToString(inner);
      return decimal === null ? convertMysql(inner) : MysqlValue.decimal(decimal);
    }
    case 'boolean': {
      const bool = castToBoolean(inner);
      return bool === null ? convertMysql(inner) : MysqlValue.bool(bool);
    }
    case 'datetime': {
      const date = castToDatetime(inner);
      return date === null ? convertMysql(inner) : MysqlValue.dateTime(date);
    }
    case 'date':
      return inner instanceof Date
        ? MysqlValue.date(formatDate(inner))
        : MysqlValue.date(String(inner));
    case 'time':
      return inner instanceof Date
        ? MysqlValue.time(formatTime(inner))
        : MysqlValue.time(String(inner));
    case 'blob': {
      const bytes = castToBytes(inner);
      return bytes === null ? convertMysql(inner) : MysqlValue.blob(bytes);
    }
    case 'json':
      return MysqlValue.json(inner);
    case 'auto':
      return convertMysql(inner);
  }
}

function encodeMysql(value: MysqlValue): unknown {
  switch (value.kind) {
    case 'Null':
      return null;
    case 'BigInt':
    case 'BigIntUnsigned':
      return value.value.toString();
    case 'Blob':
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

export const mysqlCodec: ValueCodec<MysqlValue> = {
  dialect: 'mysql',
  fromField: fromMysqlField,
  convert: convertMysql,

  isDefaultValue(value: MysqlValue): boolean {
    switch (value.kind) {
      case 'TinyInt':
      case 'SmallInt':
      case 'Int':
      case 'TinyIntUnsigned':
      case 'SmallIntUnsigned':
      case 'IntUnsigned':
        return value.value === 0;
      case 'BigInt':
      case 'BigIntUnsigned':
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
  null: () => MysqlValue.null(),
  bool: (value) => MysqlValue.bool(value),
  encode: encodeMysql,
  sqlType: (value) => MYSQL_TYPES[value.kind],
  decode: decodeField,
};
