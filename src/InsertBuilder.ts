/**
 * querykit - INSERT Statement Builder
 *
 * @example
 * ```typescript
 * InsertBuilder.into('users')
 *   .columns(['name', 'age'])
 *   .values([['John', 30], ['Jane', 25]])
 *   .build();
 * // → { sql: 'INSERT INTO users (name, age) VALUES (?, ?), (?, ?)',
 * //     params: ['John', 30, 'Jane', 25] }
 * ```
 */

import type { Expr } from './Expr';
import { QueryError } from './QueryError';
import type { WithCTE } from './WithCTE';
import { assertReturningSupported } from './drivers/types';
import type { SqlBuilder } from './drivers/types';
import type { Buildable, SqlBuildResult, SqlValue } from './types';

/** A VALUES cell: a bound value, or SQL text substituted for it */
type InsertCell<V> = { type: 'value'; value: V } | { type: 'expr'; sql: string };

export class InsertBuilder<V = SqlValue> implements Buildable<V> {
  private withClause: WithCTE<V> | null = null;
  private columnNames: string[] = [];
  private rows: InsertCell<V>[][] = [];
  private conflictTail: SqlBuildResult<V> | null = null;
  private returningColumns: string[] = [];
  private dialect: SqlBuilder | null = null;
  private tail: SqlBuildResult<V>[] = [];

  private constructor(readonly table: string) {}

  static into<V = SqlValue>(table: string): InsertBuilder<V> {
    return new InsertBuilder<V>(table);
  }

  /**
   * @throws QueryError `ColumnsListEmpty` when columns is empty
   */
  columns(columns: string[]): this {
    if (columns.length === 0) {
      throw new QueryError('ColumnsListEmpty');
    }
    this.columnNames = [...columns];
    return this;
  }

  /**
   * Add rows, one value per column in column order
   * @throws QueryError `NoEntitiesProvided` when rows is empty
   * @throws QueryError `ValueInvalid` naming the zero-based row whose length differs from the column list
   */
  values(rows: V[][]): this {
    if (rows.length === 0) {
      throw new QueryError('NoEntitiesProvided');
    }
    if (this.columnNames.length === 0) {
      throw new QueryError('ColumnsListEmpty');
    }
    rows.forEach((row, index) => {
      if (row.length !== this.columnNames.length) {
        throw new QueryError(
          'ValueInvalid',
          `row ${index}`,
          `row ${index} has ${row.length} values for ${this.columnNames.length} columns`
        );
      }
    });
    for (const row of rows) {
      this.rows.push(row.map((value): InsertCell<V> => ({ type: 'value', value })));
    }
    return this;
  }

  /**
   * Substitute SQL text (e.g. `DEFAULT`, `NULL`) for the value at a flat cell position.
   * Positions count cells row by row: row `r`, column `c` is `r * columns + c`.
   * Out-of-range positions are ignored.
   */
  replaceExprAt(index: number, sql: string): this {
    const width = this.columnNames.length;
    if (width === 0 || index < 0) return this;
    const row = this.rows[Math.floor(index / width)];
    if (!row) return this;
    row[index % width] = { type: 'expr', sql };
    return this;
  }

  // ============================================
  // Conflict Handling
  // ============================================

  /**
   * ` ON CONFLICT (target) DO UPDATE SET c = EXCLUDED.c [WHERE condition]` (SQLite, PostgreSQL)
   * @throws QueryError `ColumnsListEmpty` when there is nothing to update
   */
  onConflictDoUpdate(conflictTarget: string[], updateColumns: string[], condition?: Expr<V>): this {
    if (updateColumns.length === 0) {
      throw new QueryError('ColumnsListEmpty');
    }
    const sets = updateColumns.map((column) => `${column} = EXCLUDED.${column}`).join(', ');
    let sql = ` ON CONFLICT (${conflictTarget.join(', ')}) DO UPDATE SET ${sets}`;
    const params: V[] = [];
    if (condition) {
      const built = condition.build();
      sql += ` WHERE ${built.sql}`;
      params.push(...built.params);
    }
    this.conflictTail = { sql, params };
    return this;
  }

  /** ` ON CONFLICT (target) DO NOTHING` (SQLite, PostgreSQL) */
  onConflictDoNothing(conflictTarget: string[]): this {
    this.conflictTail = { sql: ` ON CONFLICT (${conflictTarget.join(', ')}) DO NOTHING`, params: [] };
    return this;
  }

  /**
   * ` ON DUPLICATE KEY UPDATE c = VALUES(c)` (MySQL).
   * With a condition each column becomes `c = IF(condition, VALUES(c), c)`.
   * @throws QueryError `ColumnsListEmpty` when there is nothing to update
   */
  onDuplicate(updateColumns: string[], condition?: Expr<V>): this {
    if (updateColumns.length === 0) {
      throw new QueryError('ColumnsListEmpty');
    }
    const params: V[] = [];
    const sets = updateColumns.map((column) => {
      if (!condition) {
        return `${column} = VALUES(${column})`;
      }
      const built = condition.build();
      params.push(...built.params);
      return `${column} = IF(${built.sql}, VALUES(${column}), ${column})`;
    });
    this.conflictTail = { sql: ` ON DUPLICATE KEY UPDATE ${sets.join(', ')}`, params };
    return this;
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

  /** ` RETURNING a, b` (SQLite 3.35+, PostgreSQL) */
  returning(columns: string[]): this {
    assertReturningSupported(this.dialect, columns);
    this.returningColumns = [...columns];
    return this;
  }

  with(withClause: WithCTE<V>): this {
    this.withClause = withClause;
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

  /**
   * @throws QueryError `ColumnsListEmpty` without columns, `NoEntitiesProvided` without rows
   */
  build(): SqlBuildResult<V> {
    if (this.columnNames.length === 0) {
      throw new QueryError('ColumnsListEmpty');
    }
    if (this.rows.length === 0) {
      throw new QueryError('NoEntitiesProvided');
    }

    const params: V[] = [];
    let prefix = '';
    if (this.withClause && !this.withClause.isEmpty()) {
      const withSql = this.withClause.build();
      prefix = `${withSql.sql} `;
      params.push(...withSql.params);
    }

    const rowsSql = this.rows.map((row) => {
      const cells = row.map((cell) => {
        if (cell.type === 'expr') return cell.sql;
        params.push(cell.value);
        return '?';
      });
      return `(${cells.join(', ')})`;
    });

    let sql = `${prefix}INSERT INTO ${this.table} (${this.columnNames.join(', ')}) VALUES ${rowsSql.join(', ')}`;

    if (this.conflictTail) {
      sql += this.conflictTail.sql;
      params.push(...this.conflictTail.params);
    }
    if (this.returningColumns.length > 0) {
      sql += ` RETURNING ${this.returningColumns.join(', ')}`;
    }
    for (const fragment of this.tail) {
      sql += fragment.sql;
      params.push(...fragment.params);
    }
    return { sql, params };
  }

  /**
   * Build, then clear rows and every tail, keeping the table and column list
   */
  buildMut(): SqlBuildResult<V> {
    const result = this.build();
    this.withClause = null;
    this.rows = [];
    this.conflictTail = null;
    this.returningColumns = [];
    this.tail = [];
    return result;
  }
}
