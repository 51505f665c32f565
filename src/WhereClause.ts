/**
 * querykit - WHERE/HAVING Accumulator
 *
 * Shared by the statement builders. `push` starts a new clause; clauses are joined with AND.
 * `and` / `or` extend the last clause without adding parentheses, so
 * `and(a).and(b).or(c)` renders `a AND b OR c`. Use `Expr#or` when grouping is wanted.
 * Once there are several clauses, a clause holding an OR connector is parenthesized.
 */

import { Expr } from './Expr';
import type { SqlBuildResult } from './types';

interface ClausePart<V> {
  connector: 'AND' | 'OR';
  expr: Expr<V>;
}

/** @internal */
export class WhereClause<V> {
  private clauses: ClausePart<V>[][] = [];

  /**
   * Start a new clause
   */
  push(expr: Expr<V>): this {
    this.clauses.push([{ connector: 'AND', expr }]);
    return this;
  }

  /**
   * Extend the last clause with AND (or start the first one)
   */
  and(expr: Expr<V>): this {
    return this.combine('AND', expr);
  }

  /**
   * Extend the last clause with OR (or start the first one)
   */
  or(expr: Expr<V>): this {
    return this.combine('OR', expr);
  }

  /**
   * Insert the clauses of `other` before this one's, each staying a separate clause
   */
  prepend(other: WhereClause<V>): this {
    this.clauses = [...other.clauses.map((parts) => [...parts]), ...this.clauses];
    return this;
  }

  isEmpty(): boolean {
    return this.clauses.length === 0;
  }

  /**
   * Remove and return the accumulated clauses, one expression per clause
   */
  take(): Expr<V>[] {
    const exprs = this.clauses.map((parts) => {
      const { sql, params } = renderParts(parts);
      const expr = Expr.predicate(sql, params);
      return hasOr(parts) ? expr.paren() : expr;
    });
    this.clauses = [];
    return exprs;
  }

  clear(): void {
    this.clauses = [];
  }

  /**
   * Render `<keyword> clause1 AND clause2`, or an empty result when nothing was added
   */
  build(keyword: 'WHERE' | 'HAVING' = 'WHERE'): SqlBuildResult<V> {
    if (this.clauses.length === 0) {
      return { sql: '', params: [] };
    }
    const sqlParts: string[] = [];
    const params: V[] = [];
    const grouped = this.clauses.length > 1;
    for (const parts of this.clauses) {
      const rendered = renderParts(parts);
      sqlParts.push(grouped && hasOr(parts) ? `(${rendered.sql})` : rendered.sql);
      params.push(...rendered.params);
    }
    return { sql: `${keyword} ${sqlParts.join(' AND ')}`, params };
  }

  private combine(connector: 'AND' | 'OR', expr: Expr<V>): this {
    const last = this.clauses[this.clauses.length - 1];
    if (last) {
      last.push({ connector, expr });
    } else {
      this.clauses.push([{ connector: 'AND', expr }]);
    }
    return this;
  }
}

function hasOr<V>(parts: ClausePart<V>[]): boolean {
  return parts.some((part) => part.connector === 'OR');
}

function renderParts<V>(parts: ClausePart<V>[]): SqlBuildResult<V> {
  let sql = '';
  const params: V[] = [];
  parts.forEach((part, i) => {
    const built = part.expr.build();
    sql += i === 0 ? built.sql : ` ${part.connector} ${built.sql}`;
    params.push(...built.params);
  });
  return { sql, params };
}
