/**
 * querykit - Common Table Expressions
 */

import type { Buildable, SqlBuildResult } from './types';

/**
 * One named CTE: `name[(a, b)] AS (body)`.
 * The body is any buildable statement, normally a `SelectBuilder`.
 */
export class CTE<V> {
  private columnNames: string[] | null = null;

  constructor(
    readonly name: string,
    private readonly query: Buildable<V>
  ) {}

  /** Explicit column list for the CTE */
  columns(columns: string[]): this {
    this.columnNames = [...columns];
    return this;
  }

  build(): SqlBuildResult<V> {
    const head = this.columnNames ? `${this.name}(${this.columnNames.join(', ')})` : this.name;
    const body = this.query.build();
    return { sql: `${head} AS (${body.sql})`, params: body.params };
  }
}

/**
 * A `WITH` prefix collecting one or more CTEs.
 *
 * @example
 * ```typescript
 * const adults = SelectBuilder.columns(['id', 'name']).from('users').where(col('age').gt(18));
 * UpdateBuilder.table('employees')
 *   .with(WithCTE.of(new CTE('adult_users', adults)))
 *   .set('salary', 10000)
 *   .where(Expr.fromStr('id IN (SELECT id FROM adult_users)'));
 * // → WITH adult_users AS (SELECT id, name FROM users WHERE age > ?) UPDATE employees ...
 * ```
 */
export class WithCTE<V> implements Buildable<V> {
  private ctes: CTE<V>[] = [];

  static of<V>(...ctes: CTE<V>[]): WithCTE<V> {
    const withCte = new WithCTE<V>();
    for (const cte of ctes) {
      withCte.add(cte);
    }
    return withCte;
  }

  /**
   * @throws Error when a CTE with the same name was already added
   */
  add(cte: CTE<V>): this {
    if (this.ctes.some((existing) => existing.name === cte.name)) {
      throw new Error(`Duplicate CTE name: ${cte.name}`);
    }
    this.ctes.push(cte);
    return this;
  }

  isEmpty(): boolean {
    return this.ctes.length === 0;
  }

  /**
   * `WITH c1 AS (...), c2 AS (...)` without a trailing space; empty when no CTE was added
   */
  build(): SqlBuildResult<V> {
    if (this.ctes.length === 0) {
      return { sql: '', params: [] };
    }
    const parts: string[] = [];
    const params: V[] = [];
    for (const cte of this.ctes) {
      const built = cte.build();
      parts.push(built.sql);
      params.push(...built.params);
    }
    return { sql: `WITH ${parts.join(', ')}`, params };
  }
}
