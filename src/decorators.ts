/**
 * querykit - Decorators for Entity Definition
 *
 * `@model('table')` names the table of an entity class; `@column()` and its variants
 * register each persisted property with the kind used to convert it into a dialect value.
 * Field order is declaration order.
 *
 * @example
 * ```typescript
 * @model('article')
 * class Article {
 *   @column.integer({ primaryKey: true, autoGenerate: true }) id = 0;
 *   @column.text() title = '';
 *   @column.integer() views = 0;
 *   @column.boolean() deleted = false;
 * }
 * ```
 */

import 'reflect-metadata';
import type { EntityClass, EntityField, FieldKind, PrimaryKey } from './types';
import type { ValueCodec } from './ValueCodec';

// ============================================
// Metadata Keys
// ============================================

const COLUMNS_KEY = Symbol('querykit:columns');
const TABLE_KEY = Symbol('querykit:table');

// ============================================
// Types
// ============================================

/**
 * Column metadata stored by decorators
 * @internal
 */
export interface ColumnMeta {
  propertyKey: string;
  columnName: string;
  kind: FieldKind;
  primaryKey: boolean;
  autoGenerate: boolean;
}

/** Options that can be passed to @column decorators */
export interface ColumnOptions {
  /** Custom column name (defaults to property name) */
  columnName?: string;
  /** Mark this column as part of the primary key */
  primaryKey?: boolean;
  /** The database generates this key (serial, autoincrement, default uuid) */
  autoGenerate?: boolean;
}

type ModelConstructor = { new (...args: unknown[]): object };

// ============================================
// Internal Helpers
// ============================================

/**
 * Infer the field kind from design:type metadata.
 * Only available when the compiler emits decorator metadata; `auto` otherwise.
 */
function inferKindFromDesignType(target: object, propertyKey: string): FieldKind {
  const designType: unknown = Reflect.getMetadata('design:type', target, propertyKey);
  switch (designType) {
    case Boolean:
      return 'boolean';
    case Date:
      return 'datetime';
    case BigInt:
      return 'bigint';
    case String:
      return 'text';
    default:
      return 'auto';
  }
}

function readColumns(constructor: object): Map<string, ColumnMeta> {
  const columns: Map<string, ColumnMeta> | undefined = Reflect.getMetadata(COLUMNS_KEY, constructor);
  return columns ?? new Map();
}

function registerColumn(target: object, meta: ColumnMeta): void {
  const constructor = target.constructor;
  // Copy so that a subclass never writes into its parent's map
  const columns = new Map(readColumns(constructor));
  columns.set(meta.propertyKey, meta);
  Reflect.defineMetadata(COLUMNS_KEY, columns, constructor);
}

function createColumnDecorator(kind: FieldKind | null) {
  return function (columnNameOrOptions?: string | ColumnOptions): PropertyDecorator {
    return function (target: object, propertyKey: string | symbol) {
      const propKey = String(propertyKey);
      const options: ColumnOptions =
        typeof columnNameOrOptions === 'string'
          ? { columnName: columnNameOrOptions }
          : columnNameOrOptions ?? {};

      registerColumn(target, {
        propertyKey: propKey,
        columnName: options.columnName || propKey,
        kind: kind ?? inferKindFromDesignType(target, propKey),
        primaryKey: options.primaryKey ?? false,
        autoGenerate: options.autoGenerate ?? false,
      });
    };
  };
}

// ============================================
// @column Decorator and Variants
// ============================================

/**
 * Column decorator for entity properties.
 *
 * `@column()` infers the kind from the property's design type where the compiler emits it
 * (boolean, Date, bigint, string) and converts by runtime type otherwise.
 * The variants fix the kind explicitly:
 *
 * ```typescript
 * @column() name?: string;
 * @column('display_name') displayName?: string;
 * @column.integer({ primaryKey: true }) id?: number;
 * @column.json() settings?: Record<string, unknown>;
 * @column.date() birth_date?: string;
 * ```
 *
 * @category Decorators
 */
export const column = Object.assign(createColumnDecorator(null), {
  text: createColumnDecorator('text'),
  integer: createColumnDecorator('integer'),
  bigint: createColumnDecorator('bigint'),
  real: createColumnDecorator('real'),
  /** Arbitrary-precision number carried as a string */
  decimal: createColumnDecorator('decimal'),
  boolean: createColumnDecorator('boolean'),
  datetime: createColumnDecorator('datetime'),
  /** `YYYY-MM-DD` */
  date: createColumnDecorator('date'),
  /** `HH:MM:SS` */
  time: createColumnDecorator('time'),
  blob: createColumnDecorator('blob'),
  json: createColumnDecorator('json'),
  uuid: createColumnDecorator('uuid'),
  inet: createColumnDecorator('inet'),
});

// ============================================
// @model Decorator
// ============================================

/**
 * Model decorator: names the table of an entity class.
 * Without a name the table is the snake_case class name.
 *
 * @category Decorators
 */
// Overload 1: @model (without arguments)
export function model<T extends ModelConstructor>(constructor: T): T;
// Overload 2: @model('table_name')
export function model(tableName: string): <T extends ModelConstructor>(constructor: T) => T;
// Implementation
export function model<T extends ModelConstructor>(
  tableNameOrConstructor: string | T
): T | (<U extends ModelConstructor>(constructor: U) => U) {
  if (typeof tableNameOrConstructor === 'string') {
    const tableName = tableNameOrConstructor;
    return function <U extends ModelConstructor>(constructor: U): U {
      Reflect.defineMetadata(TABLE_KEY, tableName, constructor);
      return constructor;
    };
  }
  Reflect.defineMetadata(TABLE_KEY, toSnakeCase(tableNameOrConstructor.name), tableNameOrConstructor);
  return tableNameOrConstructor;
}

// ============================================
// Utility Functions
// ============================================

/**
 * `ArticleTag` → `article_tag`, `HTTPLog` → `http_log`
 */
export function toSnakeCase(name: string): string {
  return name
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .toLowerCase();
}

/**
 * Table name of an entity class: the `@model` name, else the snake_case class name
 */
export function tableNameOf(entity: EntityClass): string {
  const tableName: string | undefined = Reflect.getMetadata(TABLE_KEY, entity);
  return tableName ?? toSnakeCase(entity.name);
}

/**
 * Column metadata of an entity class in declaration order
 * @internal
 */
export function getColumnMeta(entity: object): ColumnMeta[] {
  return Array.from(readColumns(entity).values());
}

/**
 * Column names of an entity class.
 * Classes without `@column` properties fall back to the own keys of a fresh instance.
 */
export function columnNamesOf(entity: EntityClass): string[] {
  const meta = getColumnMeta(entity);
  if (meta.length > 0) {
    return meta.map((m) => m.columnName);
  }
  return Object.keys(new entity());
}

/**
 * Declared kind of a column, or undefined when the class does not declare it
 */
export function columnKindOf(entity: EntityClass, columnName: string): FieldKind | undefined {
  return getColumnMeta(entity).find((m) => m.columnName === columnName)?.kind;
}

/**
 * Primary key declared through `@column...({ primaryKey: true })`, or null when none is declared
 */
export function primaryKeyOf(entity: EntityClass): PrimaryKey | null {
  const keys = getColumnMeta(entity).filter((m) => m.primaryKey);
  if (keys.length === 0) return null;
  if (keys.length === 1) {
    return { type: 'single', name: keys[0].columnName, autoGenerate: keys[0].autoGenerate };
  }
  return { type: 'composite', names: keys.map((m) => m.columnName) };
}

/**
 * Fields of an entity instance as `{ name, kind, value }`, in declaration order.
 * `name` is the column name. Undecorated objects yield their own enumerable
 * properties with kind `auto`.
 */
export function getEntityFields(entity: object): EntityField[] {
  const meta = getColumnMeta(entity.constructor);
  if (meta.length === 0) {
    return Object.entries(entity).map(([name, value]): EntityField => ({ name, kind: 'auto', value }));
  }
  return meta.map((m) => ({
    name: m.columnName,
    kind: m.kind,
    value: Reflect.get(entity, m.propertyKey),
  }));
}

/**
 * Build an entity from a result row.
 * Each decorated column present in the row is cast through the codec's `decode`;
 * undecorated classes receive every row value as is.
 */
export function fromRow<T extends object, V>(
  entity: EntityClass<T>,
  row: Record<string, unknown>,
  codec?: ValueCodec<V>
): T {
  const instance = new entity();
  const meta = getColumnMeta(entity);

  if (meta.length === 0) {
    for (const [key, value] of Object.entries(row)) {
      Reflect.set(instance, key, value);
    }
    return instance;
  }

  for (const m of meta) {
    if (!(m.columnName in row)) continue;
    const raw = row[m.columnName];
    Reflect.set(instance, m.propertyKey, codec ? codec.decode(m.kind, raw) : raw);
  }
  return instance;
}
