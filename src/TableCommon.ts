/**
 * querykit - Table Facade Core
 *
 * Statement construction shared by the single-key and composite-key facades.
 * Keys arrive here as tuples in primary-key declaration order; the facades only
 * adapt the key shape.
 *
 * Global filters (the soft-delete flag and the process-wide filter) are added as
 * separate WHERE clauses after the caller's conditions, on reads, updates and hard
 * deletes. Inserts, upserts, soft deletes, restores and `updateByCond` take none.
 */

import { Agg } from './Aggregate';
import { columnKindOf, columnNamesOf, getEntityFields, primaryKeyOf, tableNameOf } from './decorators';
import { DeleteBuilder } from './DeleteBuilder';
import { getSqlBuilder } from './drivers';
import type { SqlBuilder } from './drivers/types';
import { col, type Expr } from './Expr';
import { batchExtract } from './Fields';
import {
  getGlobalFilter,
  getGlobalSoftDeleteField,
  type GlobalFilterConfig,
  type SoftDeleteConfig,
} from './GlobalConfig';
import { InsertBuilder } from './InsertBuilder';
import { QueryError } from './QueryError';
import { SelectBuilder } from './SelectBuilder';
import { UpdateBuilder } from './UpdateBuilder';
import { isEmptyOrNone, type ValueCodec } from './ValueCodec';
import {
  primaryKeyNames,
  type EntityClass,
  type EntityField,
  type PrimaryKey,
  type SortOrder,
  type SqlValue,
} from './types';

// ============================================
// Types
// ============================================

/** Callback adding conditions (and ordering, joins...) to a facade-built statement */
export type QueryFilter<B> = (builder: B) => void;

export interface TableOptions<T extends object, V> {
  entity: EntityClass<T>;
  /** Defaults to the `@model` table name */
  table?: string;
  /** Defaults to the key declared on the entity's columns */
  primaryKey?: PrimaryKey;
  codec: ValueCodec<V>;
  /** Defaults to the process-wide setting; null disables soft delete */
  softDelete?: SoftDeleteConfig | null;
  /** Defaults to the process-wide setting; null disables the filter */
  globalFilter?: GlobalFilterConfig<V> | null;
}

/** An INSERT plus the names a dialect upsert tail needs */
export interface UpsertStatement<V> {
  builder: InsertBuilder<V>;
  columns: string[];
  primaryKeys: string[];
}

/** Page query and the COUNT(*) of the same conditions */
export interface PaginatedStatements<V> {
  data: SelectBuilder<V>;
  count: SelectBuilder<V>;
}

export interface CursorOptions {
  /** Column the cursor walks; defaults to the key of a single-key table */
  column?: string;
  /** Last value seen; omit for the first page */
  cursor?: SqlValue;
  sortOrder?: SortOrder;
}

/**
 * Verbs common to both facades. `K` is the key shape: a scalar for single-key
 * tables, a tuple for composite keys.
 */
export interface TableFacade<T extends object, V, K> {
  readonly common: TableCommon<T, V>;

  insertOne(entity: T): InsertBuilder<V>;
  insertMany(entities: readonly T[]): InsertBuilder<V>;
  upsertOne(entity: T): UpsertStatement<V>;
  upsertMany(entities: readonly T[]): UpsertStatement<V>;
  updateOne(entity: T): UpdateBuilder<V>;
  updateByCond(filter: QueryFilter<UpdateBuilder<V>>): UpdateBuilder<V>;
  deleteByPk(key: K): DeleteBuilder<V> | UpdateBuilder<V>;
  deleteMany(keys: readonly K[]): DeleteBuilder<V> | UpdateBuilder<V>;
  deleteByCond(filter: QueryFilter<DeleteBuilder<V>>): DeleteBuilder<V> | UpdateBuilder<V>;
  restoreByPk(key: K): UpdateBuilder<V>;
  restoreMany(keys: readonly K[]): UpdateBuilder<V>;
  restoreByCond(filter: QueryFilter<UpdateBuilder<V>>): UpdateBuilder<V>;
  getOneByPk(key: K): SelectBuilder<V>;
  getOneByCond(filter: QueryFilter<SelectBuilder<V>>): SelectBuilder<V>;
  getListByCond(filter: QueryFilter<SelectBuilder<V>>): SelectBuilder<V>;
  getListPaginated(
    pageNumber: number,
    pageSize: number,
    filter?: QueryFilter<SelectBuilder<V>>
  ): PaginatedStatements<V>;
  getListByCursor(
    limit: number,
    filter?: QueryFilter<SelectBuilder<V>>,
    options?: CursorOptions
  ): SelectBuilder<V>;
  cursorColumn(options: CursorOptions): string;
  exists(filter?: QueryFilter<SelectBuilder<V>>): SelectBuilder<V>;
  count(filter?: QueryFilter<SelectBuilder<V>>): SelectBuilder<V>;
}

/** Statements that take global filters */
interface Filterable<V> {
  where(condition: Expr<V>): unknown;
}

const noFilter = (): void => {};

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

// ============================================
// TableCommon Class
// ============================================

export class TableCommon<T extends object, V> {
  readonly entity: EntityClass<T>;
  readonly table: string;
  readonly primaryKey: PrimaryKey;
  readonly codec: ValueCodec<V>;
  readonly sqlBuilder: SqlBuilder;
  readonly softDelete: SoftDeleteConfig | null;
  readonly globalFilter: GlobalFilterConfig<V> | null;

  /**
   * @throws QueryError `NoPrimaryKeyDefined` when neither the options nor the entity name a key
   */
  constructor(options: TableOptions<T, V>) {
    const primaryKey = options.primaryKey ?? primaryKeyOf(options.entity);
    if (!primaryKey || primaryKeyNames(primaryKey).some((name) => name === '')) {
      throw new QueryError('NoPrimaryKeyDefined');
    }
    this.entity = options.entity;
    this.table = options.table ?? tableNameOf(options.entity);
    this.primaryKey = primaryKey;
    this.codec = options.codec;
    this.sqlBuilder = getSqlBuilder(options.codec.dialect);
    this.softDelete = options.softDelete === undefined ? getGlobalSoftDeleteField() : options.softDelete;
    this.globalFilter = options.globalFilter === undefined ? getGlobalFilter() : options.globalFilter;
  }

  get keyNames(): string[] {
    return primaryKeyNames(this.primaryKey);
  }

  // ============================================
  // Filters and Keys
  // ============================================

  isSoftDeleteEnabled(): boolean {
    return this.softDelete !== null && !this.softDelete.excludeTables.includes(this.table);
  }

  /**
   * `AND <softDeleteField> = false`, then `AND <global filter>`, each unless this table is excluded
   */
  applyGlobalFilters(builder: Filterable<V>): void {
    if (this.softDelete && !this.softDelete.excludeTables.includes(this.table)) {
      builder.where(col(this.softDelete.field).eq(this.codec.bool(false)));
    }
    if (this.globalFilter && !this.globalFilter.excludeTables.includes(this.table)) {
      builder.where(this.globalFilter.expr);
    }
  }

  /**
   * `k1 = ? AND k2 = ?` for one key tuple
   * @throws QueryError `NoPrimaryKeyDefined` for an empty tuple, `SingleKeyTypeInvalid` on an arity mismatch
   */
  keyPredicate(key: readonly SqlValue[]): Expr<V> {
    const names = this.keyNames;
    if (key.length === 0) {
      throw new QueryError('NoPrimaryKeyDefined');
    }
    if (key.length !== names.length) {
      throw new QueryError('SingleKeyTypeInvalid');
    }
    const terms = names.map((name, i) => col(name).eq(this.convertKey(name, key[i])));
    return terms.slice(1).reduce<Expr<V>>((acc, term) => acc.and(term), terms[0]);
  }

  /**
   * `k IN (?, ...)` for a single key, `(a = ? AND b = ?) OR ...` for composite keys
   * @throws QueryError `KeysListEmpty` when keys is empty
   */
  keysPredicate(keys: readonly (readonly SqlValue[])[]): Expr<V> {
    if (keys.length === 0) {
      throw new QueryError('KeysListEmpty');
    }
    const names = this.keyNames;
    if (names.length === 1) {
      const values = keys.map((key) => {
        if (key.length !== 1) throw new QueryError('SingleKeyTypeInvalid');
        return this.convertKey(names[0], key[0]);
      });
      return col(names[0]).isIn(values);
    }
    const tuples = keys.map((key) => this.keyPredicate(key).paren());
    return tuples.slice(1).reduce<Expr<V>>((acc, tuple) => acc.or(tuple), tuples[0]);
  }

  /** Key value converted by the declared kind of its column */
  convertKey(name: string, value: SqlValue): V {
    return this.codec.fromField(columnKindOf(this.entity, name) ?? 'auto', value);
  }

  convertField(field: EntityField): V {
    return this.codec.fromField(field.kind, field.value);
  }

  // ============================================
  // Insert and Upsert
  // ============================================

  /**
   * @throws QueryError `ValueInvalid` naming the first empty field, `ColumnsListEmpty`
   */
  insertOne(entity: T, exclude: readonly string[]): InsertBuilder<V> {
    const fields = getEntityFields(entity).filter((field) => !exclude.includes(field.name));
    const empty = fields.find((field) => isEmptyOrNone(field.value));
    if (empty) {
      throw new QueryError('ValueInvalid', empty.name);
    }
    if (fields.length === 0) {
      throw new QueryError('ColumnsListEmpty');
    }
    return InsertBuilder.into<V>(this.table)
      .forDialect(this.sqlBuilder)
      .columns(fields.map((field) => field.name))
      .values([fields.map((field) => this.convertField(field))]);
  }

  /**
   * @throws QueryError `NoEntitiesProvided`, `ColumnsListEmpty`
   */
  insertMany(entities: readonly T[], exclude: readonly string[]): InsertBuilder<V> {
    if (entities.length === 0) {
      throw new QueryError('NoEntitiesProvided');
    }
    const { names, rows } = batchExtract(entities, exclude, false);
    if (names.length === 0) {
      throw new QueryError('ColumnsListEmpty');
    }
    return InsertBuilder.into<V>(this.table)
      .forDialect(this.sqlBuilder)
      .columns(names)
      .values(rows.map((row) => row.map((field) => this.convertField(field))));
  }

  /**
   * INSERT of every field. With `useDefaultExpr`, a key field holding a default value
   * (0, empty text, nil UUID, none) is written as the dialect's DEFAULT keyword.
   * @throws QueryError `NoEntitiesProvided`, `ColumnsListEmpty`
   */
  upsertMany(entities: readonly T[], useDefaultExpr: boolean): UpsertStatement<V> {
    if (entities.length === 0) {
      throw new QueryError('NoEntitiesProvided');
    }
    const keyNames = this.keyNames;
    const { names, rows } = batchExtract(entities, [], false);
    if (names.length === 0) {
      throw new QueryError('ColumnsListEmpty');
    }

    const defaultCells: number[] = [];
    const values = rows.map((row, r) =>
      row.map((field, c) => {
        const value = this.convertField(field);
        const isDefaultKey =
          keyNames.includes(field.name) &&
          (isEmptyOrNone(field.value) || this.codec.isDefaultValue(value));
        if (!isDefaultKey) return value;
        if (useDefaultExpr) defaultCells.push(r * names.length + c);
        return this.codec.null();
      })
    );

    const builder = InsertBuilder.into<V>(this.table)
      .forDialect(this.sqlBuilder)
      .columns(names)
      .values(values);
    for (const index of defaultCells) {
      builder.replaceExprAt(index, this.sqlBuilder.defaultKeyword);
    }
    return { builder, columns: names, primaryKeys: keyNames };
  }

  // ============================================
  // Update
  // ============================================

  /**
   * Key fields become the WHERE, every other field a SET
   * @throws QueryError `ColumnsListEmpty`, `PrimaryKeyNotFound`
   */
  updateOne(entity: T): UpdateBuilder<V> {
    const keyNames = this.keyNames;
    const fields = getEntityFields(entity);
    const setFields = fields.filter((field) => !keyNames.includes(field.name));
    if (setFields.length === 0) {
      throw new QueryError('ColumnsListEmpty');
    }

    const builder = UpdateBuilder.table<V>(this.table)
      .forDialect(this.sqlBuilder)
      .setCols(
        setFields.map((field) => field.name),
        setFields.map((field) => this.convertField(field))
      );

    for (const name of keyNames) {
      const field = fields.find((f) => f.name === name);
      if (!field || isEmptyOrNone(field.value)) {
        throw new QueryError('PrimaryKeyNotFound', name);
      }
      builder.where(col(name).eq(this.convertField(field)));
    }

    this.applyGlobalFilters(builder);
    return builder;
  }

  updateByCond(filter: QueryFilter<UpdateBuilder<V>>): UpdateBuilder<V> {
    const builder = UpdateBuilder.table<V>(this.table).forDialect(this.sqlBuilder);
    filter(builder);
    return builder;
  }

  // ============================================
  // Delete and Restore
  // ============================================

  /**
   * `UPDATE t SET <field> = <flag>` for soft delete (`true`) and restore (`false`)
   * @throws QueryError `SoftDeleteConfigNotSet`, `RestoreOperationNotSupported`, `SoftDeleteColumnTypeInvalid`
   */
  private softDeleteUpdate(flag: boolean): UpdateBuilder<V> {
    if (!this.softDelete) {
      throw new QueryError('SoftDeleteConfigNotSet');
    }
    if (this.softDelete.excludeTables.includes(this.table)) {
      throw new QueryError('RestoreOperationNotSupported');
    }
    const field = this.softDelete.field;
    const kind = columnKindOf(this.entity, field);
    if (kind !== undefined && kind !== 'boolean' && kind !== 'auto') {
      throw new QueryError('SoftDeleteColumnTypeInvalid', field);
    }
    return UpdateBuilder.table<V>(this.table)
      .forDialect(this.sqlBuilder)
      .set(field, this.codec.bool(flag));
  }

  /**
   * Soft delete when enabled for this table, else a DELETE with the global filters
   */
  deleteWhere(condition: Expr<V>): DeleteBuilder<V> | UpdateBuilder<V> {
    if (this.isSoftDeleteEnabled()) {
      return this.softDeleteUpdate(true).where(condition);
    }
    const builder = DeleteBuilder.from<V>(this.table).forDialect(this.sqlBuilder).where(condition);
    this.applyGlobalFilters(builder);
    return builder;
  }

  /**
   * Conditions are collected on a DELETE; a soft delete moves them onto the UPDATE
   */
  deleteByCond(filter: QueryFilter<DeleteBuilder<V>>): DeleteBuilder<V> | UpdateBuilder<V> {
    const builder = DeleteBuilder.from<V>(this.table).forDialect(this.sqlBuilder);
    filter(builder);
    if (this.isSoftDeleteEnabled()) {
      const update = this.softDeleteUpdate(true);
      for (const clause of builder.takeWhereClauses()) {
        update.where(clause);
      }
      return update;
    }
    this.applyGlobalFilters(builder);
    return builder;
  }

  restoreWhere(condition: Expr<V>): UpdateBuilder<V> {
    return this.softDeleteUpdate(false).where(condition);
  }

  restoreByCond(filter: QueryFilter<UpdateBuilder<V>>): UpdateBuilder<V> {
    const builder = this.softDeleteUpdate(false);
    filter(builder);
    return builder;
  }

  // ============================================
  // Select
  // ============================================

  selectBuilder(): SelectBuilder<V> {
    return SelectBuilder.columns<V>(columnNamesOf(this.entity)).from(this.table);
  }

  selectWhere(condition: Expr<V>): SelectBuilder<V> {
    const builder = this.selectBuilder().where(condition);
    this.applyGlobalFilters(builder);
    return builder;
  }

  selectByCond(filter: QueryFilter<SelectBuilder<V>>): SelectBuilder<V> {
    const builder = this.selectBuilder();
    filter(builder);
    this.applyGlobalFilters(builder);
    return builder;
  }

  /**
   * LIMIT size OFFSET (page - 1) * size, plus the COUNT(*) of the same conditions
   * @throws QueryError `PageNumberInvalid` unless both are positive integers
   */
  getListPaginated(
    pageNumber: number,
    pageSize: number,
    filter: QueryFilter<SelectBuilder<V>> = noFilter
  ): PaginatedStatements<V> {
    if (!isPositiveInteger(pageNumber) || !isPositiveInteger(pageSize)) {
      throw new QueryError('PageNumberInvalid');
    }
    const offset = (pageNumber - 1) * pageSize;
    const data = this.selectByCond(filter).limitOffset(
      this.codec.convert(pageSize),
      this.codec.convert(offset)
    );
    return { data, count: this.count(filter) };
  }

  /**
   * `[WHERE column > ?] ORDER BY column ASC LIMIT ?` (`<` and DESC when descending)
   * @throws QueryError `LimitInvalid` unless limit is a positive integer
   */
  getListByCursor(
    column: string,
    limit: number,
    filter: QueryFilter<SelectBuilder<V>> = noFilter,
    options: CursorOptions = {}
  ): SelectBuilder<V> {
    if (!isPositiveInteger(limit)) {
      throw new QueryError('LimitInvalid');
    }
    const sortOrder = options.sortOrder ?? 'ASC';
    const builder = this.selectBuilder();
    filter(builder);
    if (options.cursor !== undefined) {
      const cursor = this.codec.convert(options.cursor);
      builder.where(sortOrder === 'ASC' ? col(column).gt(cursor) : col(column).lt(cursor));
    }
    this.applyGlobalFilters(builder);
    return builder.orderBy(column, sortOrder).limitOffset(this.codec.convert(limit));
  }

  /** `SELECT 1 FROM t ...` */
  exists(filter: QueryFilter<SelectBuilder<V>> = noFilter): SelectBuilder<V> {
    const builder = SelectBuilder.columns<V>(['1']).from(this.table);
    filter(builder);
    this.applyGlobalFilters(builder);
    return builder;
  }

  /** `SELECT COUNT(*) AS count FROM t ...`; ORDER BY from the filter is dropped */
  count(filter: QueryFilter<SelectBuilder<V>> = noFilter): SelectBuilder<V> {
    const builder = SelectBuilder.columns<V>([])
      .aggregate(Agg.count<V>('*', 'count'))
      .from(this.table);
    filter(builder);
    builder.clearOrderBy();
    this.applyGlobalFilters(builder);
    return builder;
  }
}
