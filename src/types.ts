/**
 * querykit - Type Definitions
 */

// ============================================
// Statement Output
// ============================================

/**
 * Finalized statement: SQL text with `?` placeholders and the values bound to them,
 * in placeholder order.
 */
export interface SqlBuildResult<V> {
  sql: string;
  params: V[];
}

/**
 * Anything that can be finalized into a statement.
 * Every statement builder, `Expr` and `Subquery` implements it.
 */
export interface Buildable<V> {
  build(): SqlBuildResult<V>;
}

/** Host scalars accepted by builders when no dialect value kind is involved */
export type SqlValue =
  | string
  | number
  | bigint
  | boolean
  | Date
  | Uint8Array
  | null;

// ============================================
// Ordering
// ============================================

/** Sort direction for ORDER BY */
export type SortOrder = 'ASC' | 'DESC';

// ============================================
// Dialects
// ============================================

/** SQL dialects the builders can emit */
export type Dialect = 'sqlite' | 'mysql' | 'postgres';

// ============================================
// Primary Keys
// ============================================

/**
 * Primary key descriptor for a table facade.
 * A single key may be generated by the database (serial, autoincrement, default uuid).
 */
export type PrimaryKey =
  | { type: 'single'; name: string; autoGenerate: boolean }
  | { type: 'composite'; names: string[] };

/**
 * Get the key column names in declaration order
 */
export function primaryKeyNames(pk: PrimaryKey): string[] {
  return pk.type === 'single' ? [pk.name] : [...pk.names];
}

// ============================================
// Entity Fields
// ============================================

/**
 * Declared kind of an entity property.
 * `auto` leaves the choice of value kind to the runtime type of the value.
 */
export type FieldKind =
  | 'auto'
  | 'text'
  | 'integer'
  | 'bigint'
  | 'real'
  | 'decimal'
  | 'boolean'
  | 'datetime'
  | 'date'
  | 'time'
  | 'blob'
  | 'json'
  | 'uuid'
  | 'inet';

/** One field of an entity instance, as yielded by the field iterator */
export interface EntityField {
  name: string;
  kind: FieldKind;
  value: unknown;
}

/** Class of a decorated entity */
export type EntityClass<T extends object = object> = new () => T;

// ============================================
// Pagination Results
// ============================================

export interface PaginatedResult<T> {
  data: T[];
  total: number;
  pageNumber: number;
  pageSize: number;
}

export interface CursorPaginatedResult<T, C> {
  data: T[];
  nextCursor: C | null;
  prevCursor: C | null;
  limit: number;
  sortOrder: SortOrder;
}
