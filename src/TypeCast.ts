/**
 * querykit - Type Cast Helpers
 *
 * Host-side conversions shared by the dialect codecs, in both directions:
 * entity property → bindable scalar, and driver row value → entity property.
 * All helpers are total: null/undefined map to null, unparseable input maps to null.
 */

import type { FieldKind } from './types';

// ============================================
// Scalars
// ============================================

export function castToDatetime(val: unknown): Date | null {
  if (val === null || val === undefined) return null;
  if (val instanceof Date) return val;
  if (typeof val === 'string' || typeof val === 'number') {
    const date = new Date(val);
    return isNaN(date.getTime()) ? null : date;
  }
  return null;
}

/**
 * Accepts booleans, numbers (non-zero is true) and 'true'/'t'/'1' / 'false'/'f'/'0'
 */
export function castToBoolean(val: unknown): boolean | null {
  if (val === null || val === undefined) return null;
  if (typeof val === 'boolean') return val;
  if (typeof val === 'number') return val !== 0;
  if (typeof val === 'bigint') return val !== 0n;
  if (typeof val === 'string') {
    const lower = val.toLowerCase();
    if (lower === 'true' || lower === 't' || lower === '1') return true;
    if (lower === 'false' || lower === 'f' || lower === '0') return false;
  }
  return null;
}

export function castToNumber(val: unknown): number | null {
  if (val === null || val === undefined) return null;
  if (typeof val === 'number') return isNaN(val) ? null : val;
  if (typeof val === 'bigint') return Number(val);
  if (typeof val === 'string' && val.trim() !== '') {
    const n = Number(val);
    return isNaN(n) ? null : n;
  }
  return null;
}

/**
 * Integer cast that keeps precision: safe integers stay numbers, larger ones become bigint
 */
export function castToInteger(val: unknown): number | bigint | null {
  if (val === null || val === undefined) return null;
  if (typeof val === 'bigint') return val;
  if (typeof val === 'number') return Number.isFinite(val) ? Math.trunc(val) : null;
  if (typeof val === 'string' && /^-?\d+$/.test(val.trim())) {
    const big = BigInt(val.trim());
    return big >= BigInt(Number.MIN_SAFE_INTEGER) && big <= BigInt(Number.MAX_SAFE_INTEGER)
      ? Number(big)
      : big;
  }
  return null;
}

export function castToBigInt(val: unknown): bigint | null {
  if (val === null || val === undefined) return null;
  if (typeof val === 'bigint') return val;
  if (typeof val === 'number') return Number.isInteger(val) ? BigInt(val) : null;
  if (typeof val === 'string' && /^-?\d+$/.test(val.trim())) return BigInt(val.trim());
  return null;
}

export function castToString(val: unknown): string | null {
  if (val === null || val === undefined) return null;
  if (typeof val === 'string') return val;
  if (val instanceof Date) return val.toISOString();
  if (typeof val === 'number' || typeof val === 'bigint' || typeof val === 'boolean') {
    return String(val);
  }
  return null;
}

export function castToBytes(val: unknown): Uint8Array | null {
  if (val === null || val === undefined) return null;
  if (val instanceof Uint8Array) return val;
  if (typeof val === 'string') return new TextEncoder().encode(val);
  return null;
}

/**
 * Parse JSON text; objects and arrays pass through
 */
export function castToJson(val: unknown): unknown {
  if (val === null || val === undefined) return null;
  if (typeof val === 'object') return val;
  if (typeof val === 'string') {
    try {
      return JSON.parse(val);
    } catch {
      return null;
    }
  }
  return null;
}

// ============================================
// Date Parts
// ============================================

/** `YYYY-MM-DD` in UTC */
export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** `HH:MM:SS` in UTC */
export function formatTime(date: Date): string {
  return date.toISOString().slice(11, 19);
}

/** `YYYY-MM-DD HH:MM:SS` in UTC, the literal format MySQL accepts for DATETIME */
export function formatDateTime(date: Date): string {
  return `${formatDate(date)} ${formatTime(date)}`;
}

// ============================================
// Row Decoding
// ============================================

/**
 * Cast a raw driver value to the host type of a declared field kind.
 * `auto` fields keep the driver's value.
 */
export function decodeField(kind: FieldKind, raw: unknown): unknown {
  if (raw === null || raw === undefined) return null;
  switch (kind) {
    case 'boolean':
      return castToBoolean(raw);
    case 'datetime':
      return castToDatetime(raw);
    case 'integer':
      return castToInteger(raw);
    case 'bigint':
      return castToBigInt(raw);
    case 'real':
      return castToNumber(raw);
    case 'decimal':
    case 'text':
    case 'uuid':
    case 'inet':
    case 'time':
      return castToString(raw);
    case 'date':
      return raw instanceof Date ? formatDate(raw) : castToString(raw);
    case 'blob':
      return castToBytes(raw);
    case 'json':
      return castToJson(raw);
    case 'auto':
      return raw;
  }
}
