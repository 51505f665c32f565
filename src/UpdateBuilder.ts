/**
 * querykit - UPDATE Statement Builder
 *
 * @example
 * ```typescript
 * UpdateBuilder.table('article')
 *   .setExpr('views', 'views + 1')
 *   .where(col('id').eq(1))
 *   .build();
 * // → { sql: 'UPDATE article SET views = views + 1 WHERE id = ?', params: [1] }
 * ```
 */

import type { CaseWhen } from './CaseWhen';
import type { Expr } from './Expr';
import type { Join } from './Join';
import { QueryError } from './QueryError';
import { WhereClause } from './WhereClause';
import type { WithCTE } from './WithCTE';
import { assertReturningSupported } from './drivers/types';
import type { SqlBuilder } from './drivers/types';
import type { Buildable, SqlBuildResult, SqlValue } from './types';

type Assignment<V> =
  | { type: 'value'; column: string; value: V }
  | { type: 'expr'; column: string; sql: string; params: V[] }
  | { type: 'case'; column: string; expr: CaseWhen<V> };

export class UpdateBuilder<V = SqlValue> implements Buildable<V> {
  private withClause: WithCTE<V> | null = null;
  private assignments: Assignment<V>[] = [];
  private joins: Join<V>[] = [];
  private whereClause = new WhereClause<V>();
  private returningColumns: string[] = [];
  private dialect: SqlBuilder | null = null;
  private tail: SqlBuildResult<V>[] = [];

  private constructor(
    readonly tableName: string,
    readonly alias?: string
  ) {}

  static table<V = SqlValue>(table: string, alias?: string): UpdateBuilder<V> {
    return new UpdateBuilder<V>(table, alias);
  }

  // ============================================
  // SET
  // ============================================

  /** `column = ?` */
  set(column: string, value: V): this {
    return this.assign({ type: 'value', column, value });
  }

  /**
   * `a = ?, b = ?` pairing columns and values by position
   * @throws QueryError `ColumnsListEmpty` when columns is empty, `ValueInvalid` when the lengths differ
   */
  setCols(columns: string[], values: V[]): this {
    if (columns.length === 0) {
      throw new QueryError('ColumnsListEmpty');
    }
    if (columns.length !== values.length) {
      throw new QueryError(
        'ValueInvalid',
        undefined,
        `${columns.length} columns given with ${values.length} values`
      );
    }
    columns.forEach((column, i) => this.set(column, values[i]));
    return this;
  }

  /** `column = <sql>` with the SQL text's own bound values */
  setExpr(column: string, sql: string, params: V[] = []): this {
    return this.assign({ type: 'expr', column, sql, params: [...params] });
  }

  /** `column = CASE ... END` */
  setCase(column: string, expr: CaseWhen<V>): this {
    return this.assign({ type: 'case', column, expr });
  }

  // ============================================
  // Clauses
  // ============================================

  /** MySQL-style `UPDATE t JOIN ... SET ...` */
  join(join: Join<V>): this {
    this.joins.push(join);
    return this;
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

  /** Remove and return the WHERE clauses, one expression per clause */
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

  // ============================================
  // Build
  // ============================================

  /**
   * @throws QueryError `ColumnsListEmpty` when nothing is set
   */
  build(): SqlBuildResult<V> {
    if (this.assignments.length === 0) {
      throw new QueryError('ColumnsListEmpty');
    }
    const parts: string[] = [];
    const params: V[] = [];

    if (this.withClause && !this.withClause.isEmpty()) {
      const withSql = this.withClause.build();
      parts.push(withSql.sql);
      params.push(...withSql.params);
    }

    parts.push(this.alias ? `UPDATE ${this.tableName} AS ${this.alias}` : `UPDATE ${this.tableName}`);

    for (const join of this.joins) {
      const built = join.build();
      parts.push(built.sql);
      params.push(...built.params);
    }

    const sets = this.assignments.map((assignment) => {
      switch (assignment.type) {
        case 'value':
          params.push(assignment.value);
          return `${assignment.column} = ?`;
        case 'expr':
          params.push(...assignment.params);
          return `${assignment.column} = ${assignment.sql}`;
        case 'case': {
          const built = assignment.expr.build();
          params.push(...built.params);
          return `${assignment.column} = ${built.sql}`;
        }
      }
    });
    parts.push(`SET ${sets.join(', ')}`);

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
   * Build, then clear assignments and every clause, keeping the table
   */
  buildMut(): SqlBuildResult<V> {
    const result = this.build();
    this.withClause = null;
    this.assignments = [];
    this.joins = [];
    this.whereClause.clear();
    this.returningColumns = [];
    this.tail = [];
    return result;
  }

  /** Re-setting a column replaces its assignment in place */
  private assign(assignment: Assignment<V>): this {
    const index = this.assignments.findIndex((a) => a.column === assignment.column);
    if (index >= 0) {
      this.assignments[index] = assignment;
    } else {
      this.assignments.push(assignment);
    }
    return this;
  }
}
