/**
 * querykit - Aggregates, GROUP BY and HAVING
 */

import type { Expr } from './Expr';
import { WhereClause } from './WhereClause';
import type { SqlBuildResult } from './types';

export type AggregateFunction = 'COUNT' | 'SUM' | 'AVG' | 'MIN' | 'MAX';

interface AggregateSpec {
  func: AggregateFunction;
  column: string;
  alias?: string;
}

/**
 * Aggregate projections plus the GROUP BY / HAVING tail of a SELECT.
 *
 * @example
 * ```typescript
 * const agg = Agg.count<number>('*', 'total')
 *   .sum('amount', 'revenue')
 *   .groupBy(['customer_id'])
 *   .having(Expr.raw('SUM(amount) > ?', [1000]));
 * SelectBuilder.columns(['customer_id']).aggregate(agg).from('orders');
 * // → SELECT customer_id, COUNT(*) AS total, SUM(amount) AS revenue FROM orders
 * //   GROUP BY customer_id HAVING SUM(amount) > ?
 * ```
 */
export class Agg<V> {
  private aggregates: AggregateSpec[] = [];
  private groupColumns: string[] = [];
  private havingClause = new WhereClause<V>();

  static count<V>(column: string, alias?: string): Agg<V> {
    return new Agg<V>().count(column, alias);
  }

  static sum<V>(column: string, alias?: string): Agg<V> {
    return new Agg<V>().sum(column, alias);
  }

  static avg<V>(column: string, alias?: string): Agg<V> {
    return new Agg<V>().avg(column, alias);
  }

  static min<V>(column: string, alias?: string): Agg<V> {
    return new Agg<V>().min(column, alias);
  }

  static max<V>(column: string, alias?: string): Agg<V> {
    return new Agg<V>().max(column, alias);
  }

  count(column: string, alias?: string): this {
    return this.add('COUNT', column, alias);
  }

  sum(column: string, alias?: string): this {
    return this.add('SUM', column, alias);
  }

  avg(column: string, alias?: string): this {
    return this.add('AVG', column, alias);
  }

  min(column: string, alias?: string): this {
    return this.add('MIN', column, alias);
  }

  max(column: string, alias?: string): this {
    return this.add('MAX', column, alias);
  }

  groupBy(columns: string[]): this {
    this.groupColumns.push(...columns);
    return this;
  }

  /** Start or extend HAVING with AND */
  having(condition: Expr<V>): this {
    this.havingClause.and(condition);
    return this;
  }

  andHaving(condition: Expr<V>): this {
    this.havingClause.and(condition);
    return this;
  }

  orHaving(condition: Expr<V>): this {
    this.havingClause.or(condition);
    return this;
  }

  /**
   * `FUNC(col) [AS alias]` projections in insertion order
   */
  buildAggregates(): string[] {
    return this.aggregates.map(({ func, column, alias }) =>
      alias ? `${func}(${column}) AS ${alias}` : `${func}(${column})`
    );
  }

  /**
   * ` GROUP BY ... HAVING ...` with a leading space, or empty
   * @throws Error when HAVING is set without GROUP BY columns or aggregates
   */
  buildGroupHaving(): SqlBuildResult<V> {
    let sql = '';
    if (this.groupColumns.length > 0) {
      sql += ` GROUP BY ${this.groupColumns.join(', ')}`;
    }
    if (this.havingClause.isEmpty()) {
      return { sql, params: [] };
    }
    if (this.groupColumns.length === 0 && this.aggregates.length === 0) {
      throw new Error('HAVING requires a GROUP BY column or an aggregate');
    }
    const having = this.havingClause.build('HAVING');
    return { sql: `${sql} ${having.sql}`, params: having.params };
  }

  /**
   * Put the GROUP BY columns and HAVING clauses of `earlier` ahead of this one's
   */
  mergeGrouping(earlier: Agg<V>): this {
    this.groupColumns = [...earlier.groupColumns, ...this.groupColumns];
    this.havingClause.prepend(earlier.havingClause);
    return this;
  }

  /** Drop GROUP BY columns and HAVING conditions, keeping the aggregates */
  clearGrouping(): void {
    this.groupColumns = [];
    this.havingClause.clear();
  }

  private add(func: AggregateFunction, column: string, alias?: string): this {
    this.aggregates.push({ func, column, alias });
    return this;
  }
}
