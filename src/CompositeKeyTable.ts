/**
 * querykit - Composite-Key Table Facade
 *
 * Same verbs as `SingleKeyTable`; keys are tuples in primary-key declaration order.
 *
 * @example
 * ```typescript
 * const tags = new CompositeKeyTable({
 *   entity: ArticleTag,
 *   primaryKey: { type: 'composite', names: ['article_id', 'tag_id'] },
 *   codec: sqliteCodec,
 * });
 * tags.deleteByPk([1, 7]).build();
 * // → DELETE FROM article_tag WHERE article_id = ? AND tag_id = ?
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

export type CompositeKey = readonly SqlValue[];

export class CompositeKeyTable<T extends object, V> implements TableFacade<T, V, CompositeKey> {
  readonly common: TableCommon<T, V>;

  /**
   * @throws QueryError `NoPrimaryKeyDefined` without a key, `SingleKeyTypeInvalid` unless the key has two or more columns
   */
  constructor(options: TableOptions<T, V>) {
    this.common = new TableCommon(options);
    const primaryKey = this.common.primaryKey;
    if (primaryKey.type !== 'composite' || primaryKey.names.length < 2) {
      throw new QueryError('SingleKeyTypeInvalid');
    }
  }

  // Composite keys are written as given; none is generated by the database

  insertOne(entity: T): InsertBuilder<V> {
    return this.common.insertOne(entity, []);
  }

  insertMany(entities: readonly T[]): InsertBuilder<V> {
    return this.common.insertMany(entities, []);
  }

  upsertOne(entity: T): UpsertStatement<V> {
    return this.common.upsertMany([entity], false);
  }

  upsertMany(entities: readonly T[]): UpsertStatement<V> {
    return this.common.upsertMany(entities, false);
  }

  updateOne(entity: T): UpdateBuilder<V> {
    return this.common.updateOne(entity);
  }

  updateByCond(filter: QueryFilter<UpdateBuilder<V>>): UpdateBuilder<V> {
    return this.common.updateByCond(filter);
  }

  deleteByPk(key: CompositeKey): DeleteBuilder<V> | UpdateBuilder<V> {
    return this.common.deleteWhere(this.common.keyPredicate(key));
  }

  deleteMany(keys: readonly CompositeKey[]): DeleteBuilder<V> | UpdateBuilder<V> {
    return this.common.deleteWhere(this.common.keysPredicate(keys));
  }

  deleteByCond(filter: QueryFilter<DeleteBuilder<V>>): DeleteBuilder<V> | UpdateBuilder<V> {
    return this.common.deleteByCond(filter);
  }

  restoreByPk(key: CompositeKey): UpdateBuilder<V> {
    return this.common.restoreWhere(this.common.keyPredicate(key));
  }

  restoreMany(keys: readonly CompositeKey[]): UpdateBuilder<V> {
    return this.common.restoreWhere(this.common.keysPredicate(keys));
  }

  restoreByCond(filter: QueryFilter<UpdateBuilder<V>>): UpdateBuilder<V> {
    return this.common.restoreByCond(filter);
  }

  getOneByPk(key: CompositeKey): SelectBuilder<V> {
    return this.common.selectWhere(this.common.keyPredicate(key));
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

  getListByCursor(
    limit: number,
    filter?: QueryFilter<SelectBuilder<V>>,
    options: CursorOptions = {}
  ): SelectBuilder<V> {
    return this.common.getListByCursor(this.cursorColumn(options), limit, filter, options);
  }

  /**
   * @throws QueryError `ColumnsListEmpty` when no cursor column is given
   */
  cursorColumn(options: CursorOptions): string {
    if (!options.column) {
      throw new QueryError(
        'ColumnsListEmpty',
        undefined,
        'Cursor pagination on a composite key table needs an explicit column'
      );
    }
    return options.column;
  }

  exists(filter?: QueryFilter<SelectBuilder<V>>): SelectBuilder<V> {
    return this.common.exists(filter);
  }

  count(filter?: QueryFilter<SelectBuilder<V>>): SelectBuilder<V> {
    return this.common.count(filter);
  }
}
