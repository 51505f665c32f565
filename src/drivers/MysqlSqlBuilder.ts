/**
 * querykit - MySQL SQL Builder
 *
 * MySQL resolves conflicts on any unique key, so the conflict target is not written.
 */

import type { SqlBuilder } from './types';

/**
 * MySQL SQL Builder implementation
 */
export const mysqlSqlBuilder: SqlBuilder = {
  driverType: 'mysql',
  defaultKeyword: 'DEFAULT',
  supportsReturning: false,

  applyUpsert(builder, conflictColumns, updateColumns, condition) {
    // No DO NOTHING form: assigning a key column to itself keeps the row unchanged
    const columns = updateColumns.length > 0 ? updateColumns : conflictColumns.slice(0, 1);
    return builder.onDuplicate(columns, condition);
  },

  formatPlaceholders: (sql) => sql,
};
