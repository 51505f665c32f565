/**
 * querykit - Table Operations
 *
 * Executes the statements of a table facade and decodes the rows into entities.
 *
 * @example
 * ```typescript
 * const articles = new TableOperations(
 *   new SingleKeyTable({ entity: Article, codec: pgCodec }),
 *   new QueryExecutor(pgCodec)
 * );
 * const page = await articles.getListPaginated(2, 20, (q) => q.orderBy('id', 'DESC'));
 * // page: { data: Article[], total, pageNumber: 2, pageSize: 20 }
 * ```
 */

import type { DeleteBuilder } from './DeleteBuilder';
import type { QueryResult } from './drivers/types';
import { getValue } from './Fields';
import type { QueryExecutor } from './QueryExecutor';
import type { SelectBuilder } from './SelectBuilder';
import type { CursorOptions, QueryFilter, TableFacade, UpsertStatement } from './TableCommon';
import type { CursorPaginatedResult, PaginatedResult } from './types';
import type { UpdateBuilder } from './UpdateBuilder';
import type { InsertBuilder } from './InsertBuilder';

export class TableOperations<T extends object, V, K> {
  constructor(
    readonly table: TableFacade<T, V, K>,
    readonly executor: QueryExecutor<V>
  ) {}

  // ============================================
  // Reads
  // ============================================

  async getOneByPk(key: K): Promise<T | null> {
    return this.executor.fetchOptional(this.table.getOneByPk(key), this.table.common.entity);
  }

  async getOneByCond(filter: QueryFilter<SelectBuilder<V>>): Promise<T | null> {
    return this.executor.fetchOptional(this.table.getOneByCond(filter), this.table.common.entity);
  }

  async getListByCond(filter: QueryFilter<SelectBuilder<V>>): Promise<T[]> {
    return this.executor.fetchAll(this.table.getListByCond(filter), this.table.common.entity);
  }

  /**
   * Page rows and total count, queried concurrently
   */
  async getListPaginated(
    pageNumber: number,
    pageSize: number,
    filter?: QueryFilter<SelectBuilder<V>>
  ): Promise<PaginatedResult<T>> {
    const statements = this.table.getListPaginated(pageNumber, pageSize, filter);
    const [data, total] = await Promise.all([
      this.executor.fetchAll(statements.data, this.table.common.entity),
      this.countOf(statements.count),
    ]);
    return { data, total, pageNumber, pageSize };
  }

  /**
   * Keyset page. Cursors are set only when a full page came back:
   * `nextCursor` comes from the last row, `prevCursor` from the first row when the page
   * itself started from a cursor. `cursorFn` derives a cursor from a row; without it the
   * cursor column value is used.
   */
  async getListByCursor(
    limit: number,
    filter?: QueryFilter<SelectBuilder<V>>,
    options?: CursorOptions
  ): Promise<CursorPaginatedResult<T, unknown>>;
  async getListByCursor<C>(
    limit: number,
    filter: QueryFilter<SelectBuilder<V>> | undefined,
    options: CursorOptions,
    cursorFn: (row: T) => C
  ): Promise<CursorPaginatedResult<T, C>>;
  async getListByCursor<C>(
    limit: number,
    filter?: QueryFilter<SelectBuilder<V>>,
    options: CursorOptions = {},
    cursorFn?: (row: T) => C
  ): Promise<CursorPaginatedResult<T, unknown>> {
    const builder = this.table.getListByCursor(limit, filter, options);
    const column = this.table.cursorColumn(options);
    const extract = cursorFn ?? ((row: T): unknown => this.cursorValue(row, column));
    const data = await this.executor.fetchAll(builder, this.table.common.entity);
    const fullPage = data.length === limit;
    return {
      data,
      nextCursor: fullPage ? extract(data[data.length - 1]) : null,
      prevCursor: fullPage && options.cursor !== undefined ? extract(data[0]) : null,
      limit,
      sortOrder: options.sortOrder ?? 'ASC',
    };
  }

  async exists(filter?: QueryFilter<SelectBuilder<V>>): Promise<boolean> {
    const row = await this.executor.fetchOptional(this.table.exists(filter));
    return row !== null;
  }

  async count(filter?: QueryFilter<SelectBuilder<V>>): Promise<number> {
    return this.countOf(this.table.count(filter));
  }

  // ============================================
  // Writes
  // ============================================

  async insertOne(entity: T): Promise<QueryResult> {
    return this.executor.execute(this.table.insertOne(entity));
  }

  async insertMany(entities: readonly T[]): Promise<QueryResult> {
    return this.executor.execute(this.table.insertMany(entities));
  }

  /**
   * Insert, or update every non-key column when the key already exists
   */
  async upsertOne(entity: T): Promise<QueryResult> {
    return this.executor.execute(this.withUpsertTail(this.table.upsertOne(entity)));
  }

  async upsertMany(entities: readonly T[]): Promise<QueryResult> {
    return this.executor.execute(this.withUpsertTail(this.table.upsertMany(entities)));
  }

  async updateOne(entity: T): Promise<QueryResult> {
    return this.executor.execute(this.table.updateOne(entity));
  }

  async updateByCond(filter: QueryFilter<UpdateBuilder<V>>): Promise<QueryResult> {
    return this.executor.execute(this.table.updateByCond(filter));
  }

  async deleteByPk(key: K): Promise<QueryResult> {
    return this.executor.execute(this.table.deleteByPk(key));
  }

  async deleteMany(keys: readonly K[]): Promise<QueryResult> {
    return this.executor.execute(this.table.deleteMany(keys));
  }

  async deleteByCond(filter: QueryFilter<DeleteBuilder<V>>): Promise<QueryResult> {
    return this.executor.execute(this.table.deleteByCond(filter));
  }

  async restoreByPk(key: K): Promise<QueryResult> {
    return this.executor.execute(this.table.restoreByPk(key));
  }

  async restoreMany(keys: readonly K[]): Promise<QueryResult> {
    return this.executor.execute(this.table.restoreMany(keys));
  }

  async restoreByCond(filter: QueryFilter<UpdateBuilder<V>>): Promise<QueryResult> {
    return this.executor.execute(this.table.restoreByCond(filter));
  }

  // ============================================
  // Internals
  // ============================================

  private withUpsertTail(statement: UpsertStatement<V>): InsertBuilder<V> {
    const { builder, columns, primaryKeys } = statement;
    const updateColumns = columns.filter((name) => !primaryKeys.includes(name));
    return this.table.common.sqlBuilder.applyUpsert(builder, primaryKeys, updateColumns);
  }

  private cursorValue(entity: T, column: string): unknown {
    return getValue(entity, column) ?? null;
  }

  /**
   * COUNT(*) arrives as a number, a bigint or a numeric string depending on the driver
   */
  private async countOf(builder: SelectBuilder<V>): Promise<number> {
    const row = await this.executor.fetchOne(builder);
    return Number(row.count ?? 0);
  }
}
