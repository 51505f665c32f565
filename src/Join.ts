/**
 * querykit - JOIN Clause
 */

import type { Expr } from './Expr';
import type { Buildable, SqlBuildResult } from './types';

export type JoinKind = 'INNER' | 'LEFT' | 'RIGHT' | 'FULL' | 'CROSS';

const JOIN_KEYWORDS: Record<JoinKind, string> = {
  INNER: 'INNER JOIN',
  LEFT: 'LEFT JOIN',
  RIGHT: 'RIGHT JOIN',
  FULL: 'FULL OUTER JOIN',
  CROSS: 'CROSS JOIN',
};

/**
 * A join target with its ON condition.
 *
 * @example
 * ```typescript
 * Join.left('orders', 'o').on(Expr.fromStr('o.user_id = u.id')).and(col('o.status').eq('paid'));
 * // → LEFT JOIN orders AS o ON o.user_id = u.id AND o.status = ?
 * ```
 */
export class Join<V> implements Buildable<V> {
  private condition: Expr<V> | null = null;

  private constructor(
    readonly kind: JoinKind,
    readonly table: string,
    readonly alias?: string
  ) {}

  static inner<V>(table: string, alias?: string): Join<V> {
    return new Join<V>('INNER', table, alias);
  }

  static left<V>(table: string, alias?: string): Join<V> {
    return new Join<V>('LEFT', table, alias);
  }

  static right<V>(table: string, alias?: string): Join<V> {
    return new Join<V>('RIGHT', table, alias);
  }

  static fullOuter<V>(table: string, alias?: string): Join<V> {
    return new Join<V>('FULL', table, alias);
  }

  static cross<V>(table: string, alias?: string): Join<V> {
    return new Join<V>('CROSS', table, alias);
  }

  /**
   * Set the ON condition, replacing any previous one
   */
  on(condition: Expr<V>): this {
    this.condition = condition;
    return this;
  }

  and(condition: Expr<V>): this {
    this.condition = this.condition ? this.condition.and(condition) : condition;
    return this;
  }

  or(condition: Expr<V>): this {
    this.condition = this.condition ? this.condition.or(condition) : condition;
    return this;
  }

  /**
   * @throws Error when a non-CROSS join has no ON condition, or a CROSS join has one
   */
  build(): SqlBuildResult<V> {
    const target = this.alias ? `${this.table} AS ${this.alias}` : this.table;
    const head = `${JOIN_KEYWORDS[this.kind]} ${target}`;

    if (this.kind === 'CROSS') {
      if (this.condition) {
        throw new Error(`CROSS JOIN ${this.table} does not take an ON condition`);
      }
      return { sql: head, params: [] };
    }
    if (!this.condition) {
      throw new Error(`${JOIN_KEYWORDS[this.kind]} ${this.table} requires an ON condition`);
    }
    const on = this.condition.build();
    return { sql: `${head} ON ${on.sql}`, params: on.params };
  }
}
