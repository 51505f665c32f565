/**
 * querykit - Database Handler
 *
 * Connection layer shared by every executor: one driver per handler, an optional
 * bound connection for transactions, and the process-wide handler.
 *
 * Drivers:
 * - PostgreSQL via pg
 * - SQLite via better-sqlite3
 * - MySQL via mysql2
 *
 * Each driver package is loaded the first time a statement runs, so only the one in use
 * has to be installed.
 */

import type { DBConfig, DBDriver, DBDriverOptions, DBConnection, QueryResult, Logger } from './drivers/types';
import { defaultLogger } from './drivers/types';
import { createPostgresDriver, closeAllPostgresPools } from './drivers/postgres';
import { createSqliteDriver } from './drivers/sqlite';
import { createMysqlDriver, closeAllMysqlPools } from './drivers/mysql';
import type { Dialect } from './types';

export type { DBConfig, QueryResult, Logger, DBConnection };

const DRIVER_FACTORIES: Record<Dialect, (options: DBDriverOptions) => DBDriver> = {
  postgres: createPostgresDriver,
  sqlite: createSqliteDriver,
  mysql: createMysqlDriver,
};

export interface DBHandlerOptions {
  /** Separate target for writes and transactions (PostgreSQL, MySQL) */
  writerConfig?: DBConfig;
  logger?: Logger;
  /** Connection every statement runs on, set by `withConnection` */
  connection?: DBConnection;
  /** Use this driver instead of creating one from the config */
  driver?: DBDriver;
}

/**
 * @example
 * ```typescript
 * const handler = new DBHandler({ database: './app.sqlite', driver: 'sqlite' });
 * const result = await handler.execute('SELECT * FROM article WHERE id = ?', [1]);
 *
 * await handler.transaction(async (tx) => {
 *   await tx.executeWrite('UPDATE article SET views = views + 1 WHERE id = ?', [1]);
 * });
 * ```
 */
export class DBHandler {
  private readonly config: DBConfig;
  private readonly dialect: Dialect;
  private readonly driver: DBDriver;
  private readonly connection: DBConnection | null;
  private logger: Logger;

  constructor(config: DBConfig, options: DBHandlerOptions = {}) {
    this.config = config;
    this.dialect = config.driver || 'postgres';
    this.logger = options.logger || defaultLogger;
    this.connection = options.connection || null;
    this.driver =
      options.driver ||
      DRIVER_FACTORIES[this.dialect]({ config, writerConfig: options.writerConfig, logger: this.logger });
  }

  getDialect(): Dialect {
    return this.dialect;
  }

  getDriver(): DBDriver {
    return this.driver;
  }

  /** Whether every statement runs on one bound connection */
  inTransaction(): boolean {
    return this.connection !== null;
  }

  // ============================================
  // Statements
  // ============================================

  async execute(sql: string, params: unknown[] = []): Promise<QueryResult> {
    return this.connection ? this.connection.query(sql, params) : this.driver.execute(sql, params);
  }

  /** INSERT/UPDATE/DELETE; the driver may route these to a writer pool */
  async executeWrite(sql: string, params: unknown[] = []): Promise<QueryResult> {
    return this.connection ? this.connection.query(sql, params) : this.driver.executeWrite(sql, params);
  }

  // ============================================
  // Connections and Transactions
  // ============================================

  /** A dedicated connection; the caller releases it */
  async getConnection(): Promise<DBConnection> {
    return this.driver.getConnection();
  }

  /** Handler sharing this driver whose statements all run on `connection` */
  withConnection(connection: DBConnection): DBHandler {
    return new DBHandler(this.config, { driver: this.driver, connection, logger: this.logger });
  }

  /**
   * Run `fn` between BEGIN and COMMIT on one connection.
   * Any error rolls back and is rethrown unchanged; the connection is always released.
   */
  async transaction<T>(fn: (tx: DBHandler) => Promise<T>): Promise<T> {
    if (this.connection) {
      throw new Error('Transaction already in progress on this handler');
    }
    const connection = await this.driver.getConnection();
    try {
      await connection.query('BEGIN');
      const result = await fn(this.withConnection(connection));
      await connection.query('COMMIT');
      return result;
    } catch (error) {
      await connection.query('ROLLBACK');
      throw error;
    } finally {
      connection.release();
    }
  }

  async close(): Promise<void> {
    return this.driver.close();
  }

  setLogger(logger: Logger): void {
    this.logger = logger;
    this.driver.setLogger(logger);
  }

  getLogger(): Logger {
    return this.logger;
  }
}

// ============================================
// Global Handler
// ============================================

let globalHandler: DBHandler | null = null;
let globalConfig: DBConfig | null = null;

/**
 * Create the process-wide handler used by executors built without one
 */
export function initDBHandler(config: DBConfig, options?: DBHandlerOptions): DBHandler {
  globalConfig = config;
  globalHandler = new DBHandler(config, options);
  return globalHandler;
}

/**
 * @throws Error if `initDBHandler` has not run
 */
export function getDBHandler(): DBHandler {
  if (!globalHandler) {
    throw new Error('DBHandler not initialized. Call initDBHandler() first.');
  }
  return globalHandler;
}

export function getDBConfig(): DBConfig | null {
  return globalConfig;
}

/**
 * Close the global handler and every pool the drivers opened
 */
export async function closeAllPools(): Promise<void> {
  if (globalHandler) {
    await globalHandler.close();
    globalHandler = null;
    globalConfig = null;
  }
  await closeAllPostgresPools();
  await closeAllMysqlPools();
}
