/**
 * querykit - Driver Plumbing
 *
 * Pool cache keyed by connection target, and the timed, logged statement run
 * every driver and transaction connection goes through.
 */

import type { DBConfig, Logger, QueryResult } from './types';

export type RunLabel = 'Query' | 'Write' | 'Transaction';

interface Closable {
  end(): Promise<void>;
}

/**
 * Pools shared by every driver pointing at the same host, port and database
 * @internal
 */
export class PoolRegistry<P extends Closable> {
  private readonly pools = new Map<string, P>();

  constructor(private readonly create: (config: DBConfig) => P) {}

  static keyOf(config: DBConfig): string {
    return `${config.host}:${config.port}/${config.database}`;
  }

  get(config: DBConfig): P {
    const key = PoolRegistry.keyOf(config);
    const existing = this.pools.get(key);
    if (existing) return existing;

    const pool = this.create(config);
    this.pools.set(key, pool);
    return pool;
  }

  async close(config: DBConfig): Promise<void> {
    const key = PoolRegistry.keyOf(config);
    const pool = this.pools.get(key);
    if (pool) {
      this.pools.delete(key);
      await pool.end();
    }
  }

  async closeAll(): Promise<void> {
    const pools = [...this.pools.values()];
    this.pools.clear();
    for (const pool of pools) {
      await pool.end();
    }
  }
}

/**
 * Run one statement, logging the SQL and values at debug, the duration and row count
 * after it, and the SQL at error when it fails (the error is rethrown)
 * @internal
 */
export async function timedRun(
  logger: Logger,
  label: RunLabel,
  sql: string,
  params: unknown[],
  run: () => Promise<QueryResult> | QueryResult
): Promise<QueryResult> {
  logger.debug(`SQL: ${sql}`, params);
  const startTime = Date.now();
  try {
    const result = await run();
    logger.debug(`${label} completed in ${Date.now() - startTime}ms, rows: ${result.rowCount}`);
    return result;
  } catch (error) {
    logger.error(`${label} failed: ${sql}`, error);
    throw error;
  }
}

/**
 * Load an optional driver package on first use
 * @throws Error naming the package to install when it is missing
 */
export function loadDriverPackage<M>(packageName: string, load: () => M): M {
  try {
    return load();
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'MODULE_NOT_FOUND') {
      const root = packageName.split('/')[0];
      throw new Error(`This driver requires the ${root} package. Install it with: npm install ${root}`, {
        cause: err,
      });
    }
    throw err;
  }
}
