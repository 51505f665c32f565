/**
 * querykit - SQLite Driver
 *
 * better-sqlite3, loaded on first use. The engine is synchronous; one database handle
 * serves every query and every transaction of the driver.
 */

import type BetterSqlite3 from 'better-sqlite3';
import type { DBConfig, DBDriver, DBDriverOptions, DBConnection, QueryResult, Logger } from './types';
import { defaultLogger } from './types';
import { loadDriverPackage, timedRun } from './pool';

type SqliteDatabase = BetterSqlite3.Database;

/**
 * Values the codec left unconverted: booleans as 0/1, dates as ISO text, objects as JSON text
 */
function convertParams(params: unknown[]): unknown[] {
  return params.map((param) => {
    if (param === undefined || param === null) return null;
    if (typeof param === 'boolean') return param ? 1 : 0;
    if (param instanceof Date) return param.toISOString();
    if (param instanceof Uint8Array) return param;
    if (typeof param === 'object') return JSON.stringify(param);
    return param;
  });
}

function isRow(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Statements that produce rows (SELECT, WITH, RETURNING) return them;
 * everything else reports the changed row count
 */
function runStatement(db: SqliteDatabase, sql: string, params: unknown[]): QueryResult {
  const stmt = db.prepare(sql);
  if (stmt.reader) {
    const rows = stmt.all(...params).filter(isRow);
    return { rows, rowCount: rows.length };
  }
  return { rows: [], rowCount: stmt.run(...params).changes };
}

// ============================================
// Transaction Connection
// ============================================

class SqliteConnection implements DBConnection {
  constructor(
    private readonly db: SqliteDatabase,
    private readonly logger: Logger
  ) {}

  async query(sql: string, params: unknown[] = []): Promise<QueryResult> {
    const values = convertParams(params);
    return timedRun(this.logger, 'Transaction', sql, values, () => runStatement(this.db, sql, values));
  }

  release(): void {
    // the handle is shared and stays open until the driver closes
  }
}

// ============================================
// SQLite Driver
// ============================================

/**
 * `config.database` is a file path or `:memory:`. File databases run in WAL mode.
 */
export class SqliteDriver implements DBDriver {
  readonly name = 'sqlite';

  private db: SqliteDatabase | null = null;
  private readonly config: DBConfig;
  private logger: Logger;

  constructor(options: DBDriverOptions) {
    this.config = options.config;
    this.logger = options.logger || defaultLogger;
  }

  async execute(sql: string, params: unknown[] = []): Promise<QueryResult> {
    return this.run('Query', sql, params);
  }

  async executeWrite(sql: string, params: unknown[] = []): Promise<QueryResult> {
    return this.run('Write', sql, params);
  }

  async getConnection(): Promise<DBConnection> {
    return new SqliteConnection(this.open(), this.logger);
  }

  async close(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  setLogger(logger: Logger): void {
    this.logger = logger;
  }

  private open(): SqliteDatabase {
    if (!this.db) {
      const Database = loadDriverPackage<typeof BetterSqlite3>('better-sqlite3', () => require('better-sqlite3'));
      const db = new Database(this.config.database);
      if (this.config.database !== ':memory:') {
        db.pragma('journal_mode = WAL');
      }
      this.db = db;
    }
    return this.db;
  }

  private async run(label: 'Query' | 'Write', sql: string, params: unknown[]): Promise<QueryResult> {
    const db = this.open();
    const values = convertParams(params);
    return timedRun(this.logger, label, sql, values, () => runStatement(db, sql, values));
  }
}

export function createSqliteDriver(options: DBDriverOptions): SqliteDriver {
  return new SqliteDriver(options);
}
