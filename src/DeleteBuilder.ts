/**
 * querykit - DELETE Statement Builder
 */

import { Expr } from './Expr';
import { QueryError } from './QueryError';
import { WhereClause } from './WhereClause';
import type { WithCTE } from './WithCTE';
import { assertReturningSupported } from './drivers/types';
import type { SqlBuilder } from './drivers/types';
import type { Buildable, SqlBuildResult, SqlValue } from './types';

/**
 * @example
 * ```typescript
 * DeleteBuilder.from('article_tag').byPrimaryKey(['article_id', 'tag_id'], [1, 7]).build();
 * // → { sql: 'DELETE FROM article_tag WHERE article_id = ? AND tag_id = ?', params: [1, 7] }
 * ```
 */
export class DeleteBuilder<V = SqlValue> implements Buildable<V> {
  private withClause: WithCTE<V> | null = null;
  private whereClause = new WhereClause<V>();
  private returningColumns: string[] = [];
  private dialect: SqlBuilder | null = null;
  private tail: SqlBuildResult<V>[] = [];

  private constructor(readonly tableName: string) {}

  static from<V = SqlValue>(table: string): DeleteBuilder<V> {
    return new DeleteBuilder<V>(table);
  }

  where(condition: Expr<V>): this {
    this.whereClause.push(condition);
    return this;
  }

  andWhere(condition: Expr<V>): this {
    this.whereClause.and(condition);
    return this;
  }

  orWhere(condition: Expr<V>): this {
    this.whereClause.or(condition);
    return this;
  }

  /**
   * `k1 = ? AND k2 = ?` ANDed onto the WHERE clause
   * @throws QueryError `NoPrimaryKeyDefined` when columns is empty,
   *   `SingleKeyTypeInvalid` when the value count differs
   */
  byPrimaryKey(columns: string[], values: V[]): this {
    if (columns.length === 0) {
      throw new QueryError('NoPrimaryKeyDefined');
    }
    if (columns.length !== values.length) {
      throw new QueryError('SingleKeyTypeInvalid');
    }
    columns.forEach((column, i) => {
      this.whereClause.and(Expr.col(column).eq(values[i]));
    });
    return this;
  }

  takeWhereClauses(): Expr<V>[] {
    return this.whereClause.take();
  }

  /**
   * Target a dialect; RETURNING is then rejected where the dialect has none
   * @throws QueryError `ReturningNotSupported`
   */
  forDialect(dialect: SqlBuilder): this {
    assertReturningSupported(dialect, this.returningColumns);
    this.dialect = dialect;
    return this;
  }

  returning(columns: string[]): this {
    assertReturningSupported(this.dialect, columns);
    this.returningColumns = [...columns];
    return this;
  }

  with(withClause: WithCTE<V>): this {
    this.withClause = withClause;
    return this;
  }

  append(sql: string, values: V[] = []): this {
    this.tail.push({ sql, params: [...values] });
    return this;
  }

  build(): SqlBuildResult<V> {
    const parts: string[] = [];
    const params: V[] = [];

    if (this.withClause && !this.withClause.isEmpty()) {
      const withSql = this.withClause.build();
      parts.push(withSql.sql);
      params.push(...withSql.params);
    }

    parts.push(`DELETE FROM ${this.tableName}`);

    const where = this.whereClause.build('WHERE');
    if (where.sql) {
      parts.push(where.sql);
      params.push(...where.params);
    }
    if (this.returningColumns.length > 0) {
      parts.push(`RETURNING ${this.returningColumns.join(', ')}`);
    }

    let sql = parts.join(' ');
    for (const fragment of this.tail) {
      sql += fragment.sql;
      params.push(...fragment.params);
    }
    return { sql, params };
  }

  /**
   * Build, then clear every clause, keeping the table
   */
  buildMut(): SqlBuildResult<V> {
    const result = this.build();
    this.withClause = null;
    this.whereClause.clear();
    this.returningColumns = [];
    this.tail = [];
    return result;
  }
}
