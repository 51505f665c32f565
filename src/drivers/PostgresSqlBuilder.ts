/**
 * querykit - PostgreSQL SQL Builder
 */

import type { SqlBuilder } from './types';

/**
 * Convert ?-style placeholders to PostgreSQL-style ($1, $2, ...), left to right.
 * Every `?` is a placeholder; builders never emit a literal question mark.
 *
 * @example rewritePlaceholders('SELECT * FROM t WHERE a = ? AND b = ?')
 * // → 'SELECT * FROM t WHERE a = $1 AND b = $2'
 */
export function rewritePlaceholders(sql: string): string {
  let index = 0;
  return sql.replace(/\?/g, () => `$${++index}`);
}

/**
 * PostgreSQL SQL Builder implementation
 */
export const postgresSqlBuilder: SqlBuilder = {
  driverType: 'postgres',
  defaultKeyword: 'DEFAULT',
  supportsReturning: true,

  applyUpsert(builder, conflictColumns, updateColumns, condition) {
    if (updateColumns.length === 0) {
      return builder.onConflictDoNothing(conflictColumns);
    }
    return builder.onConflictDoUpdate(conflictColumns, updateColumns, condition);
  },

  formatPlaceholders: rewritePlaceholders,
};
