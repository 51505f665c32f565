/**
 * querykit - Subquery Builder
 *
 * A free-form statement recorded as ordered text and bind parts. It renders only when a
 * parent builder or expression consumes it (`Expr.inSubquery`, `SelectBuilder#subquery`, ...).
 *
 * @example
 * ```typescript
 * const active = Subquery.new<number>()
 *   .select(['user_id'])
 *   .from('sessions')
 *   .where((w) => w.push('expires_at > ').pushBind(1700000000));
 * Expr.inSubquery('id', active);
 * // → id IN (SELECT user_id FROM sessions WHERE expires_at > ?)
 * ```
 */

import { columnNamesOf, tableNameOf } from './decorators';
import type { Expr } from './Expr';
import type { Buildable, EntityClass, SqlBuildResult } from './types';

type SubqueryPart<V> = { type: 'text'; sql: string } | { type: 'bind'; value: V };

export class Subquery<V> implements Buildable<V> {
  private parts: SubqueryPart<V>[] = [];

  static new<V>(): Subquery<V> {
    return new Subquery<V>();
  }

  /** `SELECT a, b` */
  select(columns: string[]): this {
    return this.push(`SELECT ${columns.length > 0 ? columns.join(', ') : '*'}`);
  }

  /** `SELECT` every column of an entity class */
  selectDefault(entity: EntityClass): this {
    return this.select(columnNamesOf(entity));
  }

  from(table: string): this {
    return this.push(` FROM ${table}`);
  }

  /** ` FROM` the table of an entity class */
  fromDefault(entity: EntityClass): this {
    return this.from(tableNameOf(entity));
  }

  /** ` WHERE ` followed by whatever the callback pushes */
  where(build: (subquery: this) => void): this {
    this.push(' WHERE ');
    build(this);
    return this;
  }

  /** Verbatim text */
  push(sql: string): this {
    this.parts.push({ type: 'text', sql });
    return this;
  }

  /** A `?` bound to value */
  pushBind(value: V): this {
    this.parts.push({ type: 'bind', value });
    return this;
  }

  /** An expression's text and values */
  pushExpr(expr: Expr<V>): this {
    const { sql, params } = expr.build();
    let rest = sql;
    for (const value of params) {
      const at = rest.indexOf('?');
      this.push(rest.slice(0, at));
      this.pushBind(value);
      rest = rest.slice(at + 1);
    }
    if (rest) this.push(rest);
    return this;
  }

  build(): SqlBuildResult<V> {
    let sql = '';
    const params: V[] = [];
    for (const part of this.parts) {
      if (part.type === 'text') {
        sql += part.sql;
      } else {
        sql += '?';
        params.push(part.value);
      }
    }
    return { sql, params };
  }
}
