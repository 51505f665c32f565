/**
 * querykit - MySQL Driver
 *
 * mysql2/promise pools, loaded on first use so that mysql2 stays optional.
 * MySQL takes `?` placeholders as emitted by the builders.
 */

import type { DBConfig, DBDriver, DBDriverOptions, DBConnection, QueryResult, Logger } from './types';
import { defaultLogger } from './types';
import { PoolRegistry, loadDriverPackage, timedRun } from './pool';

type Mysql2Module = typeof import('mysql2/promise');
type Mysql2Pool = import('mysql2/promise').Pool;
type Mysql2PoolConnection = import('mysql2/promise').PoolConnection;
type Mysql2Result = import('mysql2/promise').RowDataPacket[] | import('mysql2/promise').ResultSetHeader;

let mysql2Module: Mysql2Module | null = null;

function getMysql2Module(): Mysql2Module {
  if (!mysql2Module) {
    mysql2Module = loadDriverPackage<Mysql2Module>('mysql2/promise', () => require('mysql2/promise'));
  }
  return mysql2Module;
}

const pools = new PoolRegistry<Mysql2Pool>((config) =>
  getMysql2Module().createPool({
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    waitForConnections: true,
    connectionLimit: config.max || 10,
    connectTimeout: (config.timeout || 30) * 1000,
  })
);

/**
 * Close every MySQL pool opened in this process
 */
export async function closeAllMysqlPools(): Promise<void> {
  await pools.closeAll();
}

// ============================================
// Values and Results
// ============================================

function convertParams(params: unknown[]): unknown[] {
  return params.map((param) => (param === undefined ? null : param));
}

/**
 * Rows for SELECT-like statements, affected row count for writes
 */
function toQueryResult(result: Mysql2Result): QueryResult {
  if (Array.isArray(result)) {
    return { rows: result, rowCount: result.length };
  }
  return { rows: [], rowCount: result.affectedRows };
}

async function settle(pending: Promise<[Mysql2Result, unknown]>): Promise<QueryResult> {
  const [result] = await pending;
  return toQueryResult(result);
}

// ============================================
// Transaction Connection
// ============================================

class MysqlConnection implements DBConnection {
  constructor(
    private readonly connection: Mysql2PoolConnection,
    private readonly logger: Logger
  ) {}

  async query(sql: string, params: unknown[] = []): Promise<QueryResult> {
    const values = convertParams(params);
    return timedRun(this.logger, 'Transaction', sql, values, () =>
      settle(this.connection.query<Mysql2Result>(sql, values))
    );
  }

  release(): void {
    this.connection.release();
  }
}

// ============================================
// MySQL Driver
// ============================================

/**
 * Reads go to the pool of `config`; writes and transactions to the pool of
 * `writerConfig` when one is given.
 */
export class MysqlDriver implements DBDriver {
  readonly name = 'mysql';

  private readonly config: DBConfig;
  private readonly writerConfig: DBConfig | null;
  private logger: Logger;

  constructor(options: DBDriverOptions) {
    this.config = options.config;
    this.writerConfig = options.writerConfig || null;
    this.logger = options.logger || defaultLogger;
  }

  async execute(sql: string, params: unknown[] = []): Promise<QueryResult> {
    return this.run(pools.get(this.config), 'Query', sql, params);
  }

  async executeWrite(sql: string, params: unknown[] = []): Promise<QueryResult> {
    return this.run(this.writerPool(), 'Write', sql, params);
  }

  async getConnection(): Promise<DBConnection> {
    const connection = await this.writerPool().getConnection();
    return new MysqlConnection(connection, this.logger);
  }

  async close(): Promise<void> {
    await pools.close(this.config);
    if (this.writerConfig) {
      await pools.close(this.writerConfig);
    }
  }

  setLogger(logger: Logger): void {
    this.logger = logger;
  }

  private writerPool(): Mysql2Pool {
    return pools.get(this.writerConfig ?? this.config);
  }

  private async run(pool: Mysql2Pool, label: 'Query' | 'Write', sql: string, params: unknown[]): Promise<QueryResult> {
    const values = convertParams(params);
    return timedRun(this.logger, label, sql, values, () => settle(pool.query<Mysql2Result>(sql, values)));
  }
}

export function createMysqlDriver(options: DBDriverOptions): MysqlDriver {
  return new MysqlDriver(options);
}
