/**
 * querykit - Expression Algebra
 *
 * `Expr` is an immutable SQL fragment with `?` placeholders and the values bound to them.
 * Leaves are created from a column reference (`col('age').gt(18)`), from raw SQL, or from a
 * subquery. Leaves are combined with `and`, `or` and `not`; every combinator returns a new
 * expression and keeps the values in left-to-right placeholder order.
 *
 * @example
 * ```typescript
 * const cond = col('age').gte(18).and(col('status').isIn(['active', 'pending']));
 * cond.build();
 * // → { sql: 'age >= ? AND status IN (?, ?)', params: [18, 'active', 'pending'] }
 * ```
 */

import type { Buildable, SqlBuildResult } from './types';
import { QueryError } from './QueryError';

// ============================================
// Types
// ============================================

/**
 * How an expression was produced.
 * Used to decide where parentheses are needed when combining.
 */
export type ExprKind = 'predicate' | 'raw' | 'and' | 'or' | 'not' | 'group';

/** Comparison operators for column predicates */
export type CompareOperator = '=' | '!=' | '<' | '<=' | '>' | '>=' | 'LIKE';

// ============================================
// Expr Class
// ============================================

export class Expr<V> implements Buildable<V> {
  private constructor(
    readonly sql: string,
    readonly values: readonly V[],
    readonly kind: ExprKind
  ) {}

  // ============================================
  // Leaf Constructors
  // ============================================

  /**
   * Start a predicate on a column
   * @example Expr.col('users.id').eq(1)
   */
  static col(name: string, qualifier?: string): ColumnRef {
    return new ColumnRef(name, qualifier);
  }

  /**
   * Verbatim SQL without parameters
   * @example Expr.fromStr('deleted_at IS NULL')
   */
  static fromStr<V = never>(sql: string): Expr<V> {
    return new Expr<V>(sql, [], 'raw');
  }

  /**
   * Verbatim SQL with its own bound values
   * @example Expr.raw('created_at > NOW() - ?::interval', ['1 day'])
   */
  static raw<V>(sql: string, values: readonly V[]): Expr<V> {
    const placeholders = countPlaceholders(sql);
    if (placeholders !== values.length) {
      throw new QueryError(
        'ValueInvalid',
        sql,
        `Raw expression has ${placeholders} placeholders but ${values.length} values: ${sql}`
      );
    }
    return new Expr<V>(sql, [...values], 'raw');
  }

  /** `column IN (subquery)` */
  static inSubquery<V>(column: string, subquery: Buildable<V>): Expr<V> {
    const { sql, params } = subquery.build();
    return new Expr<V>(`${column} IN (${sql})`, params, 'predicate');
  }

  /** `column NOT IN (subquery)` */
  static notInSubquery<V>(column: string, subquery: Buildable<V>): Expr<V> {
    const { sql, params } = subquery.build();
    return new Expr<V>(`${column} NOT IN (${sql})`, params, 'predicate');
  }

  /** `EXISTS (subquery)` */
  static exists<V>(subquery: Buildable<V>): Expr<V> {
    const { sql, params } = subquery.build();
    return new Expr<V>(`EXISTS (${sql})`, params, 'predicate');
  }

  /** `NOT EXISTS (subquery)` */
  static notExists<V>(subquery: Buildable<V>): Expr<V> {
    const { sql, params } = subquery.build();
    return new Expr<V>(`NOT EXISTS (${sql})`, params, 'predicate');
  }

  /** @internal */
  static predicate<V>(sql: string, values: readonly V[]): Expr<V> {
    return new Expr<V>(sql, values, 'predicate');
  }

  // ============================================
  // Combinators
  // ============================================

  /**
   * `a AND b`. An OR operand is parenthesized.
   */
  and<W>(other: Expr<W>): Expr<V | W> {
    const left = this.kind === 'or' ? enclose(this.sql) : this.sql;
    const right = other.kind === 'or' ? enclose(other.sql) : other.sql;
    return new Expr<V | W>(`${left} AND ${right}`, [...this.values, ...other.values], 'and');
  }

  /**
   * `(a OR b)`, always parenthesized
   */
  or<W>(other: Expr<W>): Expr<V | W> {
    return new Expr<V | W>(
      `(${this.sql} OR ${other.sql})`,
      [...this.values, ...other.values],
      'or'
    );
  }

  /** `NOT (a)` */
  not(): Expr<V> {
    return new Expr<V>(`NOT (${this.sql})`, this.values, 'not');
  }

  /** `(a)` */
  paren(): Expr<V> {
    return new Expr<V>(`(${this.sql})`, this.values, 'group');
  }

  /**
   * Finalize to SQL text and values
   */
  build(): SqlBuildResult<V> {
    return { sql: this.sql, params: [...this.values] };
  }
}

// ============================================
// ColumnRef - Predicate Builder
// ============================================

/**
 * Reference to a column, optionally qualified by a table name or alias.
 * Each comparison method returns a leaf `Expr`.
 */
export class ColumnRef {
  readonly name: string;
  readonly qualifier?: string;

  constructor(name: string, qualifier?: string) {
    if (!name) {
      throw new Error('Column name must not be empty');
    }
    this.name = name;
    this.qualifier = qualifier;
  }

  /** Column name as emitted, qualifier dot-joined */
  toString(): string {
    return this.qualifier ? `${this.qualifier}.${this.name}` : this.name;
  }

  private compare<V>(operator: CompareOperator, value: V): Expr<V> {
    return Expr.predicate(`${this.toString()} ${operator} ?`, [value]);
  }

  eq<V>(value: V): Expr<V> {
    return this.compare('=', value);
  }

  ne<V>(value: V): Expr<V> {
    return this.compare('!=', value);
  }

  lt<V>(value: V): Expr<V> {
    return this.compare('<', value);
  }

  lte<V>(value: V): Expr<V> {
    return this.compare('<=', value);
  }

  gt<V>(value: V): Expr<V> {
    return this.compare('>', value);
  }

  gte<V>(value: V): Expr<V> {
    return this.compare('>=', value);
  }

  like<V>(value: V): Expr<V> {
    return this.compare('LIKE', value);
  }

  isNull<V = never>(): Expr<V> {
    return Expr.predicate<V>(`${this.toString()} IS NULL`, []);
  }

  isNotNull<V = never>(): Expr<V> {
    return Expr.predicate<V>(`${this.toString()} IS NOT NULL`, []);
  }

  /**
   * `column IN (?, ?, ...)`
   * @throws QueryError `EmptyInList` when values is empty
   */
  isIn<V>(values: readonly V[]): Expr<V> {
    return this.inList('IN', values);
  }

  /**
   * `column NOT IN (?, ?, ...)`
   * @throws QueryError `EmptyInList` when values is empty
   */
  notIn<V>(values: readonly V[]): Expr<V> {
    return this.inList('NOT IN', values);
  }

  between<V>(low: V, high: V): Expr<V> {
    return Expr.predicate(`${this.toString()} BETWEEN ? AND ?`, [low, high]);
  }

  private inList<V>(operator: 'IN' | 'NOT IN', values: readonly V[]): Expr<V> {
    if (values.length === 0) {
      throw new QueryError('EmptyInList', this.toString());
    }
    const placeholders = values.map(() => '?').join(', ');
    return Expr.predicate(`${this.toString()} ${operator} (${placeholders})`, [...values]);
  }
}

/**
 * Shorthand for `Expr.col()`
 */
export function col(name: string, qualifier?: string): ColumnRef {
  return new ColumnRef(name, qualifier);
}

// ============================================
// Helper Functions
// ============================================

/**
 * Count `?` placeholders in SQL text
 */
export function countPlaceholders(sql: string): number {
  let count = 0;
  for (const ch of sql) {
    if (ch === '?') count++;
  }
  return count;
}

/**
 * Wrap in parentheses unless the whole text is already one parenthesized group
 */
function enclose(sql: string): string {
  if (sql.startsWith('(') && sql.endsWith(')')) {
    let depth = 0;
    for (let i = 0; i < sql.length; i++) {
      if (sql[i] === '(') depth++;
      else if (sql[i] === ')') depth--;
      if (depth === 0 && i < sql.length - 1) {
        return `(${sql})`;
      }
    }
    return sql;
  }
  return `(${sql})`;
}
