/**
 * querykit - Value Codec Contract
 *
 * Each dialect defines a tagged union of bindable values (`SqliteValue`, `MysqlValue`, `PgValue`)
 * and a codec implementing `ValueCodec<V>`. Builders stay generic over the value type; the
 * table facades and the executor use the codec to turn entity properties into values and
 * values into driver parameters.
 */

import type { Dialect, FieldKind } from './types';

// ============================================
// Codec Interface
// ============================================

export interface ValueCodec<V> {
  readonly dialect: Dialect;

  /** Convert an entity property according to its declared kind */
  fromField(kind: FieldKind, value: unknown): V;

  /**
   * Convert any host value by its runtime type.
   * `Optional` boxes are unwrapped; unsupported values become the Null variant. Never throws.
   */
  convert(value: unknown): V;

  /** Scalar defaults: integer 0, empty text, nil UUID and Null */
  isDefaultValue(value: V): boolean;

  isNull(value: V): boolean;

  null(): V;

  bool(value: boolean): V;

  /** Driver parameter for a value */
  encode(value: V): unknown;

  /** Declared SQL type name; `NULL` for the Null variant */
  sqlType(value: V): string;

  /** Cast a raw driver value back to the host type of a declared field kind */
  decode(kind: FieldKind, raw: unknown): unknown;
}

// ============================================
// Optional Values
// ============================================

/**
 * An explicit present/absent box.
 * Entities may hold `Optional` properties; conversion unwraps them to any depth.
 */
export class Optional<T> {
  private constructor(
    readonly isSome: boolean,
    readonly value: T | undefined
  ) {}

  static some<T>(value: T): Optional<T> {
    return new Optional<T>(true, value);
  }

  static none<T = never>(): Optional<T> {
    return new Optional<T>(false, undefined);
  }
}

export function some<T>(value: T): Optional<T> {
  return Optional.some(value);
}

export function none<T = never>(): Optional<T> {
  return Optional.none<T>();
}

/**
 * Strip `Optional` boxes; an absent box at any depth yields undefined
 */
export function unwrapOptional(value: unknown): unknown {
  let current = value;
  while (current instanceof Optional) {
    if (!current.isSome) return undefined;
    current = current.value;
  }
  return current;
}

// ============================================
// Emptiness
// ============================================

/**
 * True for null/undefined, `none()` at any depth, `""`, `"null"` in any case,
 * an empty byte buffer and an empty array
 */
export function isEmptyOrNone(value: unknown): boolean {
  const inner = unwrapOptional(value);
  if (inner === null || inner === undefined) return true;
  if (typeof inner === 'string') return inner === '' || inner.toLowerCase() === 'null';
  if (inner instanceof Uint8Array) return inner.length === 0;
  if (Array.isArray(inner)) return inner.length === 0;
  return false;
}

/** All-zero UUID */
export const NIL_UUID = '00000000-0000-0000-0000-000000000000';

/**
 * Plain object or array, bound as JSON
 */
export function isJsonLike(value: unknown): boolean {
  if (Array.isArray(value)) return true;
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}
