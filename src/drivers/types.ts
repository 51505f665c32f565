/**
 * querykit - Database Driver Types
 *
 * Abstract interface for database drivers and for the per-dialect SQL specifics
 * the statement builders need.
 * Implement `DBDriver` to support a different database engine.
 */

import type { Expr } from '../Expr';
import type { InsertBuilder } from '../InsertBuilder';
import { QueryError } from '../QueryError';
import type { Dialect } from '../types';

/**
 * Connection target. `database` is a file path (or `:memory:`) for SQLite.
 */
export interface DBConfig {
  host?: string;
  port?: number;
  database: string;
  user?: string;
  password?: string;
  /** Pool size (default 10) */
  max?: number;
  /** Connect timeout in seconds (default 30) */
  timeout?: number;
  /** Statement timeout in seconds (default 30, PostgreSQL only) */
  queryTimeout?: number;
  /** Defaults to 'postgres' */
  driver?: Dialect;
}

export interface Logger {
  debug: (message: string, ...args: unknown[]) => void;
  info: (message: string, ...args: unknown[]) => void;
  warn: (message: string, ...args: unknown[]) => void;
  error: (message: string, ...args: unknown[]) => void;
}

/** Rows of a row-returning statement, else the affected row count */
export interface QueryResult {
  rows: Record<string, unknown>[];
  rowCount: number;
}

/**
 * One connection held for a transaction
 */
export interface DBConnection {
  query(sql: string, params?: unknown[]): Promise<QueryResult>;
  /** Hand the connection back to its pool */
  release(): void;
}

/**
 * Engine driver behind a DBHandler.
 * SQL arrives with `?` placeholders and values already encoded by the dialect codec;
 * a driver rewrites placeholders where its engine needs another form.
 */
export interface DBDriver {
  /** 'postgres', 'sqlite', 'mysql' */
  readonly name: string;

  execute(sql: string, params?: unknown[]): Promise<QueryResult>;

  /** INSERT/UPDATE/DELETE; may run on a separate writer pool */
  executeWrite(sql: string, params?: unknown[]): Promise<QueryResult>;

  /** Dedicated connection for a transaction, from the writer pool where there is one */
  getConnection(): Promise<DBConnection>;

  close(): Promise<void>;

  setLogger(logger: Logger): void;
}

export interface DBDriverOptions {
  /** Target for reads */
  config: DBConfig;
  /** Target for writes and transactions; defaults to `config` */
  writerConfig?: DBConfig;
  logger?: Logger;
}

/**
 * Default logger: silent debug/info, console warn/error
 */
export const defaultLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: console.warn,
  error: console.error,
};

// ============================================
// Dialect SQL
// ============================================

/**
 * Per-dialect statement details
 */
export interface SqlBuilder {
  readonly driverType: Dialect;

  /** Keyword written in place of a database-generated key in a multi-row upsert */
  readonly defaultKeyword: 'DEFAULT' | 'NULL';

  /** Whether INSERT/UPDATE/DELETE accept a RETURNING clause */
  readonly supportsReturning: boolean;

  /**
   * Attach the dialect's insert-or-update tail.
   * `conflictColumns` is ignored where the dialect resolves conflicts on any unique key (MySQL).
   */
  applyUpsert<V>(
    builder: InsertBuilder<V>,
    conflictColumns: string[],
    updateColumns: string[],
    condition?: Expr<V>
  ): InsertBuilder<V>;

  /** Rewrite `?` placeholders into the engine's native form */
  formatPlaceholders(sql: string): string;
}

/**
 * @throws QueryError `ReturningNotSupported` when columns are requested from a dialect without RETURNING
 */
export function assertReturningSupported(dialect: SqlBuilder | null, columns: readonly string[]): void {
  if (dialect && !dialect.supportsReturning && columns.length > 0) {
    throw new QueryError('ReturningNotSupported', dialect.driverType);
  }
}
