/**
 * SqliteHelper Tests
 */

import { describe, it, expect } from 'vitest';
import { SqliteValue, sqliteCodec } from '../../src/drivers/SqliteHelper';
import { NIL_UUID } from '../../src/ValueCodec';

describe('SqliteHelper', () => {
  describe('convert', () => {
    it('should pick the value kind from the runtime type', () => {
      expect(sqliteCodec.convert(5)).toEqual(SqliteValue.integer(5));
      expect(sqliteCodec.convert(10n)).toEqual(SqliteValue.integer(10n));
      expect(sqliteCodec.convert(0.5)).toEqual(SqliteValue.real(0.5));
      expect(sqliteCodec.convert('x')).toEqual(SqliteValue.text('x'));
      expect(sqliteCodec.convert(false)).toEqual(SqliteValue.bool(false));
      expect(sqliteCodec.convert([1])).toEqual(SqliteValue.json([1]));
      expect(sqliteCodec.convert(undefined)).toEqual(SqliteValue.null());
    });
  });

  describe('fromField', () => {
    it('should store decimals and addresses as text', () => {
      expect(sqliteCodec.fromField('decimal', 1.5)).toEqual(SqliteValue.text('1.5'));
      expect(sqliteCodec.fromField('inet', '::1')).toEqual(SqliteValue.text('::1'));
    });

    it('should store every integer width as INTEGER', () => {
      expect(sqliteCodec.fromField('bigint', '12')).toEqual(SqliteValue.integer(12));
      expect(sqliteCodec.fromField('integer', 3.7)).toEqual(SqliteValue.integer(3));
    });

    it('should keep UUIDs as their own kind', () => {
      expect(sqliteCodec.fromField('uuid', NIL_UUID)).toEqual(SqliteValue.uuid(NIL_UUID));
    });
  });

  describe('encode', () => {
    it('should bind booleans as 0/1 and dates as ISO text', () => {
      expect(sqliteCodec.encode(SqliteValue.bool(true))).toBe(1);
      expect(sqliteCodec.encode(SqliteValue.bool(false))).toBe(0);
      expect(sqliteCodec.encode(SqliteValue.dateTime(new Date('2024-01-01T00:00:00Z')))).toBe(
        '2024-01-01T00:00:00.000Z'
      );
      expect(sqliteCodec.encode(SqliteValue.json({ a: 1 }))).toBe('{"a":1}');
      expect(sqliteCodec.encode(SqliteValue.null())).toBeNull();
      expect(sqliteCodec.encode(SqliteValue.text('t'))).toBe('t');
    });
  });

  it('should flag default values', () => {
    expect(sqliteCodec.isDefaultValue(SqliteValue.integer(0))).toBe(true);
    expect(sqliteCodec.isDefaultValue(SqliteValue.integer(0n))).toBe(true);
    expect(sqliteCodec.isDefaultValue(SqliteValue.uuid(''))).toBe(true);
    expect(sqliteCodec.isDefaultValue(SqliteValue.real(0))).toBe(false);
  });

  it('should name SQL types', () => {
    expect(sqliteCodec.sqlType(SqliteValue.uuid('x'))).toBe('TEXT');
    expect(sqliteCodec.sqlType(SqliteValue.bool(true))).toBe('BOOLEAN');
    expect(sqliteCodec.sqlType(SqliteValue.null())).toBe('NULL');
  });
});
