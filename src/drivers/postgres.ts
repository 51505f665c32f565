/**
 * querykit - PostgreSQL Driver
 *
 * node-postgres (pg) pools, loaded on first use so that pg stays optional.
 * Statements arrive with `?` placeholders and are sent as `$1, $2, ...`.
 */

import type { DBConfig, DBDriver, DBDriverOptions, DBConnection, QueryResult, Logger } from './types';
import { defaultLogger } from './types';
import { postgresSqlBuilder } from './PostgresSqlBuilder';
import { PoolRegistry, loadDriverPackage, timedRun } from './pool';

type PgModule = typeof import('pg');
type Pool = import('pg').Pool;
type PoolClient = import('pg').PoolClient;
type PgResult = import('pg').QueryResult<Record<string, unknown>>;

let pgModule: PgModule | null = null;

function getPgModule(): PgModule {
  if (!pgModule) {
    pgModule = loadDriverPackage<PgModule>('pg', () => require('pg'));
  }
  return pgModule;
}

const pools = new PoolRegistry<Pool>((config) => {
  const { Pool } = getPgModule();
  return new Pool({
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    max: config.max || 10,
    connectionTimeoutMillis: (config.timeout || 30) * 1000,
    query_timeout: (config.queryTimeout || 30) * 1000,
  });
});

/**
 * Close every PostgreSQL pool opened in this process
 */
export async function closeAllPostgresPools(): Promise<void> {
  await pools.closeAll();
}

function toQueryResult(result: PgResult): QueryResult {
  return { rows: result.rows, rowCount: result.rowCount ?? 0 };
}

// ============================================
// Transaction Connection
// ============================================

class PostgresConnection implements DBConnection {
  constructor(
    private readonly client: PoolClient,
    private readonly logger: Logger
  ) {}

  async query(sql: string, params: unknown[] = []): Promise<QueryResult> {
    const text = postgresSqlBuilder.formatPlaceholders(sql);
    return timedRun(this.logger, 'Transaction', text, params, async () =>
      toQueryResult(await this.client.query<Record<string, unknown>>(text, params))
    );
  }

  release(): void {
    this.client.release();
  }
}

// ============================================
// PostgreSQL Driver
// ============================================

/**
 * Reads go to the pool of `config`; writes and transactions to the pool of
 * `writerConfig` when one is given.
 * @internal
 */
export class PostgresDriver implements DBDriver {
  readonly name = 'postgres';

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
    const client = await this.writerPool().connect();
    return new PostgresConnection(client, this.logger);
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

  private writerPool(): Pool {
    return pools.get(this.writerConfig ?? this.config);
  }

  private async run(pool: Pool, label: 'Query' | 'Write', sql: string, params: unknown[]): Promise<QueryResult> {
    const text = postgresSqlBuilder.formatPlaceholders(sql);
    return timedRun(this.logger, label, text, params, async () =>
      toQueryResult(await pool.query<Record<string, unknown>>(text, params))
    );
  }
}

export function createPostgresDriver(options: DBDriverOptions): PostgresDriver {
  return new PostgresDriver(options);
}
