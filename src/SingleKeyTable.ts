/**
 * querykit - Single-Key Table Facade
 *
 * @example
 * ```typescript
 * @model('article')
 * class Article {
 *   @column.integer({ primaryKey: true, autoGenerate: true }) id?: number;
 *   @column.text() title?: string;
 *   @column.boolean() deleted?: boolean;
 * }
 *
 * const articles = new SingleKeyTable({
 *   entity: Article,
 *   codec: pgCodec,
 *   softDelete: { field: 'deleted', excludeTables: [] },
 * });
 * articles.deleteByPk(5).build();
 * // → { sql: 'UPDATE article SET deleted = ? WHERE id = ?', params: [Bool(true), Int4(5)] }
 * ```
 */

import type { DeleteBuilder } from './DeleteBuilder';
import type { InsertBuilder } from './InsertBuilder';
import { QueryError } from './QueryError';
import type { SelectBuilder } from './SelectBuilder';
import {
  TableCommon,
  type CursorOptions,
  type PaginatedStatements,
  type QueryFilter,
  type TableFacade,
  type TableOptions,
  type UpsertStatement,
} from './TableCommon';
import type { UpdateBuilder } from './UpdateBuilder';
import type { SqlValue } from './types';

export class SingleKeyTable<T extends object, V> implements TableFacade<T, V, SqlValue> {
  readonly common: TableCommon<T, V>;
  private readonly keyName: string;
  private readonly autoGenerate: boolean;

  /**
   * @throws QueryError `NoPrimaryKeyDefined` without a key, `SingleKeyTypeInvalid` for a composite key
   */
  constructor(options: TableOptions<T, V>) {
    this.common = new TableCommon(options);
    const primaryKey = this.common.primaryKey;
    if (primaryKey.type !== 'single') {
      throw new QueryError('SingleKeyTypeInvalid');
    }
    this.keyName = primaryKey.name;
    this.autoGenerate = primaryKey.autoGenerate;
  }

  /**
   * One key value; an array or a default value (0, empty text, nil UUID, null) is rejected
   */
  private keyTuple(key: SqlValue): SqlValue[] {
    if (Array.isArray(key)) {
      throw new QueryError('SingleKeyTypeInvalid');
    }
    const codec = this.common.codec;
    if (codec.isDefaultValue(this.common.convertKey(this.keyName, key))) {
      throw new QueryError('NoPrimaryKeyDefined');
    }
    return [key];
  }

  private insertExclusions(): string[] {
    return this.autoGenerate ? [this.keyName] : [];
  }

  // ============================================
  // Insert / Upsert / Update
  // ============================================

  /**
   * INSERT of every field but a generated key; every inserted field must hold a value
   */
  insertOne(entity: T): InsertBuilder<V> {
    return this.common.insertOne(entity, this.insertExclusions());
  }

  insertMany(entities: readonly T[]): InsertBuilder<V> {
    return this.common.insertMany(entities, this.insertExclusions());
  }

  upsertOne(entity: T): UpsertStatement<V> {
    return this.common.upsertMany([entity], this.autoGenerate);
  }

  upsertMany(entities: readonly T[]): UpsertStatement<V> {
    return this.common.upsertMany(entities, this.autoGenerate);
  }

  updateOne(entity: T): UpdateBuilder<V> {
    return this.common.updateOne(entity);
  }

  updateByCond(filter: QueryFilter<UpdateBuilder<V>>): UpdateBuilder<V> {
    return this.common.updateByCond(filter);
  }

  // ============================================
  // Delete / Restore
  // ============================================

  deleteByPk(key: SqlValue): DeleteBuilder<V> | UpdateBuilder<V> {
    return this.common.deleteWhere(this.common.keyPredicate(this.keyTuple(key)));
  }

  deleteMany(keys: readonly SqlValue[]): DeleteBuilder<V> | UpdateBuilder<V> {
    return this.common.deleteWhere(this.common.keysPredicate(keys.map((key) => [key])));
  }

  deleteByCond(filter: QueryFilter<DeleteBuilder<V>>): DeleteBuilder<V> | UpdateBuilder<V> {
    return this.common.deleteByCond(filter);
  }

  restoreByPk(key: SqlValue): UpdateBuilder<V> {
    return this.common.restoreWhere(this.common.keyPredicate(this.keyTuple(key)));
  }

  restoreMany(keys: readonly SqlValue[]): UpdateBuilder<V> {
    return this.common.restoreWhere(this.common.keysPredicate(keys.map((key) => [key])));
  }

  restoreByCond(filter: QueryFilter<UpdateBuilder<V>>): UpdateBuilder<V> {
    return this.common.restoreByCond(filter);
  }

  // ============================================
  // Select
  // ============================================

  getOneByPk(key: SqlValue): SelectBuilder<V> {
    return this.common.selectWhere(this.common.keyPredicate(this.keyTuple(key)));
  }

  getOneByCond(filter: QueryFilter<SelectBuilder<V>>): SelectBuilder<V> {
    return this.common.selectByCond(filter);
  }

  getListByCond(filter: QueryFilter<SelectBuilder<V>>): SelectBuilder<V> {
    return this.common.selectByCond(filter);
  }

  getListPaginated(
    pageNumber: number,
    pageSize: number,
    filter?: QueryFilter<SelectBuilder<V>>
  ): PaginatedStatements<V> {
    return this.common.getListPaginated(pageNumber, pageSize, filter);
  }

  /**
   * Keyset page over the primary key unless `options.column` names another column
   */
  getListByCursor(
    limit: number,
    filter?: QueryFilter<SelectBuilder<V>>,
    options: CursorOptions = {}
  ): SelectBuilder<V> {
    return this.common.getListByCursor(this.cursorColumn(options), limit, filter, options);
  }

  cursorColumn(options: CursorOptions): string {
    return options.column ?? this.keyName;
  }

  exists(filter?: QueryFilter<SelectBuilder<V>>): SelectBuilder<V> {
    return this.common.exists(filter);
  }

  count(filter?: QueryFilter<SelectBuilder<V>>): SelectBuilder<V> {
    return this.common.count(filter);
  }
}
