/**
 * querykit - Database Drivers
 *
 * Driver implementations, per-dialect value codecs and per-dialect SQL details.
 */

import type { Dialect } from '../types';
import type { SqlBuilder } from './types';
import { postgresSqlBuilder } from './PostgresSqlBuilder';
import { sqliteSqlBuilder } from './SqliteSqlBuilder';
import { mysqlSqlBuilder } from './MysqlSqlBuilder';

// Types
export type {
  DBConfig,
  Logger,
  QueryResult,
  DBConnection,
  DBDriver,
  DBDriverOptions,
  SqlBuilder,
} from './types';
export { defaultLogger } from './types';

// PostgreSQL Driver
export { PostgresDriver, createPostgresDriver, closeAllPostgresPools } from './postgres';

// SQLite Driver
export { SqliteDriver, createSqliteDriver } from './sqlite';

// MySQL Driver
export { MysqlDriver, createMysqlDriver, closeAllMysqlPools } from './mysql';

// Value kinds and codecs
export { PgValue, pgCodec } from './PostgresHelper';
export { SqliteValue, sqliteCodec } from './SqliteHelper';
export { MysqlValue, mysqlCodec } from './MysqlHelper';

// Dialect SQL
export { postgresSqlBuilder, rewritePlaceholders } from './PostgresSqlBuilder';
export { sqliteSqlBuilder } from './SqliteSqlBuilder';
export { mysqlSqlBuilder } from './MysqlSqlBuilder';

/**
 * Get the SQL builder of a dialect
 */
export function getSqlBuilder(dialect: Dialect): SqlBuilder {
  switch (dialect) {
    case 'sqlite':
      return sqliteSqlBuilder;
    case 'mysql':
      return mysqlSqlBuilder;
    case 'postgres':
      return postgresSqlBuilder;
  }
}
