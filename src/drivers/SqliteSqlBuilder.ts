/**
 * querykit - SQLite SQL Builder
 *
 * SQLite (3.24+) shares PostgreSQL's ON CONFLICT syntax but has no DEFAULT keyword
 * inside a VALUES row; NULL makes an INTEGER PRIMARY KEY take the next rowid.
 */

import type { SqlBuilder } from './types';

/**
 * SQLite SQL Builder implementation
 */
export const sqliteSqlBuilder: SqlBuilder = {
  driverType: 'sqlite',
  defaultKeyword: 'NULL',
  supportsReturning: true,

  applyUpsert(builder, conflictColumns, updateColumns, condition) {
    if (updateColumns.length === 0) {
      return builder.onConflictDoNothing(conflictColumns);
    }
    return builder.onConflictDoUpdate(conflictColumns, updateColumns, condition);
  },

  formatPlaceholders: (sql) => sql,
};
