/**
 * querykit - SELECT Statement Builder
 *
 * Emission order:
 * WITH → SELECT projection → FROM → JOIN → WHERE → GROUP BY → HAVING → UNION → ORDER BY →
 * LIMIT/OFFSET → appended SQL.
 *
 * @example
 * ```typescript
 * const { sql, params } = SelectBuilder.columns(['id', 'name'])
 *   .from('users')
 *   .where(col('age').eq(23))
 *   .andWhere(col('salary').gt(45))
 *   .orWhere(col('status').isIn(['A', 'B']))
 *   .orderBy('name', 'ASC')
 *   .orderBy('age', 'DESC')
 *   .build();
 * // sql: SELECT id, name FROM users WHERE age = ? AND salary > ? OR status IN (?, ?)
 * //      ORDER BY name ASC, age DESC
 * // params: [23, 45, 'A', 'B']
 * ```
 */

import { Agg } from './Aggregate';
import type { CaseWhen } from './CaseWhen';
import type { Expr } from './Expr';
import type { Join } from './Join';
import { QueryError } from './QueryError';
import { WhereClause } from './WhereClause';
import type { WithCTE } from './WithCTE';
import type { Buildable, SortOrder, SqlBuildResult, SqlValue } from './types';

// ============================================
// Types
// ============================================

type ProjectionItem<V> =
  | { type: 'column'; name: string }
  | { type: 'aggregate' }
  | { type: 'case'; expr: CaseWhen<V> }
  | { type: 'subquery'; query: Buildable<V>; alias: string };

type LimitSlot<V> =
  | { type: 'bound'; limit: V; offset?: V }
  | { type: 'literal'; limit: number; offset?: number };

// ============================================
// SelectBuilder Class
// ============================================

export class SelectBuilder<V = SqlValue> implements Buildable<V> {
  private withClause: WithCTE<V> | null = null;
  private projection: ProjectionItem<V>[] = [];
  private base: SqlBuildResult<V> | null = null;
  private table: string | null = null;
  private tableAlias: string | null = null;
  private joins: Join<V>[] = [];
  private whereClause = new WhereClause<V>();
  private agg: Agg<V> | null = null;
  private unions: { all: boolean; query: Buildable<V> }[] = [];
  private order = new Map<string, SortOrder>();
  private limitSlot: LimitSlot<V> | null = null;
  private tail: SqlBuildResult<V>[] = [];

  // ============================================
  // Construction
  // ============================================

  /** `SELECT a, b` (`SELECT *` when the list is empty) */
  static columns<V = SqlValue>(columns: string[]): SelectBuilder<V> {
    return new SelectBuilder<V>().select(columns);
  }

  /** `SELECT * FROM table` */
  static table<V = SqlValue>(table: string, alias?: string): SelectBuilder<V> {
    return new SelectBuilder<V>().from(table, alias);
  }

  /**
   * Start from verbatim SQL in place of the projection and FROM.
   * Clauses added afterwards are emitted after it.
   */
  static raw<V = SqlValue>(sql: string, params: V[] = []): SelectBuilder<V> {
    const builder = new SelectBuilder<V>();
    builder.base = { sql, params: [...params] };
    return builder;
  }

  select(columns: string[]): this {
    for (const name of columns) {
      this.projection.push({ type: 'column', name });
    }
    return this;
  }

  from(table: string, alias?: string): this {
    this.table = table;
    this.tableAlias = alias ?? null;
    return this;
  }

  with(withClause: WithCTE<V>): this {
    this.withClause = withClause;
    return this;
  }

  join(join: Join<V>): this {
    this.joins.push(join);
    return this;
  }

  // ============================================
  // Projection
  // ============================================

  /**
   * Add the aggregates of `agg` to the projection.
   * `agg` takes over GROUP BY and HAVING; columns and conditions already set on this builder
   * come first. A later call replaces the aggregates.
   */
  aggregate(agg: Agg<V>): this {
    if (!this.projection.some((item) => item.type === 'aggregate')) {
      this.projection.push({ type: 'aggregate' });
    }
    if (this.agg) {
      agg.mergeGrouping(this.agg);
    }
    this.agg = agg;
    return this;
  }

  caseWhen(expr: CaseWhen<V>): this {
    this.projection.push({ type: 'case', expr });
    return this;
  }

  /** `(subquery) AS alias` in the projection */
  subquery(query: Buildable<V>, alias: string): this {
    this.projection.push({ type: 'subquery', query, alias });
    return this;
  }

  // ============================================
  // Filtering
  // ============================================

  /** Start a new WHERE clause; clauses are joined with AND */
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

  /** Remove and return the WHERE clauses */
  takeWhereClauses(): Expr<V>[] {
    return this.whereClause.take();
  }

  groupBy(columns: string[]): this {
    this.grouping().groupBy(columns);
    return this;
  }

  having(condition: Expr<V>): this {
    this.grouping().having(condition);
    return this;
  }

  andHaving(condition: Expr<V>): this {
    this.grouping().andHaving(condition);
    return this;
  }

  orHaving(condition: Expr<V>): this {
    this.grouping().orHaving(condition);
    return this;
  }

  union(query: Buildable<V>): this {
    this.unions.push({ all: false, query });
    return this;
  }

  unionAll(query: Buildable<V>): this {
    this.unions.push({ all: true, query });
    return this;
  }

  // ============================================
  // Ordering and Limits
  // ============================================

  /**
   * Add an ORDER BY column; ordering the same column again replaces its direction in place
   */
  orderBy(column: string, order: SortOrder = 'ASC'): this {
    this.order.set(column, order);
    return this;
  }

  /** Drop every ORDER BY column */
  clearOrderBy(): this {
    this.order.clear();
    return this;
  }

  /** `LIMIT ? [OFFSET ?]` with both values bound */
  limitOffset(limit: V, offset?: V): this {
    this.limitSlot = { type: 'bound', limit, offset };
    return this;
  }

  /**
   * `LIMIT n [OFFSET m]` with the integers inlined
   * @throws QueryError `LimitInvalid` for a negative or non-integer value
   */
  limitOffsetLiteral(limit: number, offset?: number): this {
    if (!isCount(limit) || (offset !== undefined && !isCount(offset))) {
      throw new QueryError('LimitInvalid');
    }
    this.limitSlot = { type: 'literal', limit, offset };
    return this;
  }

  /** Append verbatim SQL at the end of the statement */
  append(sql: string, values: V[] = []): this {
    this.tail.push({ sql, params: [...values] });
    return this;
  }

  // ============================================
  // Build
  // ============================================

  build(): SqlBuildResult<V> {
    const parts: string[] = [];
    const params: V[] = [];

    if (this.withClause && !this.withClause.isEmpty()) {
      const withSql = this.withClause.build();
      parts.push(withSql.sql);
      params.push(...withSql.params);
    }

    if (this.base) {
      parts.push(this.base.sql);
      params.push(...this.base.params);
    } else {
      let head = `SELECT ${this.buildProjection(params)}`;
      if (this.table) {
        head += this.tableAlias ? ` FROM ${this.table} AS ${this.tableAlias}` : ` FROM ${this.table}`;
      }
      parts.push(head);
    }

    for (const join of this.joins) {
      const built = join.build();
      parts.push(built.sql);
      params.push(...built.params);
    }

    const where = this.whereClause.build('WHERE');
    if (where.sql) {
      parts.push(where.sql);
      params.push(...where.params);
    }

    if (this.agg) {
      const groupHaving = this.agg.buildGroupHaving();
      if (groupHaving.sql) {
        parts.push(groupHaving.sql.trimStart());
        params.push(...groupHaving.params);
      }
    }

    for (const { all, query } of this.unions) {
      const built = query.build();
      parts.push(`${all ? 'UNION ALL' : 'UNION'} ${built.sql}`);
      params.push(...built.params);
    }

    if (this.order.size > 0) {
      const items = Array.from(this.order, ([column, order]) => `${column} ${order}`);
      parts.push(`ORDER BY ${items.join(', ')}`);
    }

    if (this.limitSlot) {
      if (this.limitSlot.type === 'bound') {
        parts.push('LIMIT ?');
        params.push(this.limitSlot.limit);
        if (this.limitSlot.offset !== undefined) {
          parts.push('OFFSET ?');
          params.push(this.limitSlot.offset);
        }
      } else {
        parts.push(`LIMIT ${this.limitSlot.limit}`);
        if (this.limitSlot.offset !== undefined) {
          parts.push(`OFFSET ${this.limitSlot.offset}`);
        }
      }
    }

    let sql = parts.join(' ');
    for (const fragment of this.tail) {
      sql += fragment.sql;
      params.push(...fragment.params);
    }
    return { sql, params };
  }

  /**
   * Build, then clear every clause and bound value except the projection and FROM target
   */
  buildMut(): SqlBuildResult<V> {
    const result = this.build();
    this.withClause = null;
    this.joins = [];
    this.whereClause.clear();
    this.agg?.clearGrouping();
    this.unions = [];
    this.order.clear();
    this.limitSlot = null;
    this.tail = [];
    return result;
  }

  private buildProjection(params: V[]): string {
    if (this.projection.length === 0) {
      return '*';
    }
    const items: string[] = [];
    for (const item of this.projection) {
      switch (item.type) {
        case 'column':
          items.push(item.name);
          break;
        case 'aggregate':
          if (this.agg) items.push(...this.agg.buildAggregates());
          break;
        case 'case': {
          const built = item.expr.build();
          items.push(built.sql);
          params.push(...built.params);
          break;
        }
        case 'subquery': {
          const built = item.query.build();
          items.push(`(${built.sql}) AS ${item.alias}`);
          params.push(...built.params);
          break;
        }
      }
    }
    return items.length > 0 ? items.join(', ') : '*';
  }

  private grouping(): Agg<V> {
    if (!this.agg) {
      this.agg = new Agg<V>();
    }
    return this.agg;
  }
}

function isCount(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}
