/**
 * In-process DBDriver stand-in: records every statement and answers from a queue of results
 */

import type { DBConnection, DBDriver, Logger, QueryResult } from '../../src/drivers/types';

export interface RecordedQuery {
  via: 'execute' | 'executeWrite' | 'connection';
  sql: string;
  params: unknown[];
}

export class FakeDriver implements DBDriver {
  readonly name = 'fake';
  readonly queries: RecordedQuery[] = [];
  released = 0;
  closed = false;
  logger: Logger | null = null;

  private results: QueryResult[] = [];
  private failOn: string | null = null;

  /** Results handed out in order; an empty result once the queue runs out */
  respond(...results: QueryResult[]): this {
    this.results.push(...results);
    return this;
  }

  /** Reject the first statement whose SQL contains the fragment */
  failWhen(fragment: string): this {
    this.failOn = fragment;
    return this;
  }

  async execute(sql: string, params: unknown[] = []): Promise<QueryResult> {
    return this.run('execute', sql, params);
  }

  async executeWrite(sql: string, params: unknown[] = []): Promise<QueryResult> {
    return this.run('executeWrite', sql, params);
  }

  async getConnection(): Promise<DBConnection> {
    return {
      query: async (sql: string, params: unknown[] = []) => this.run('connection', sql, params),
      release: () => {
        this.released++;
      },
    };
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  setLogger(logger: Logger): void {
    this.logger = logger;
  }

  get statements(): string[] {
    return this.queries.map((q) => q.sql);
  }

  private run(via: RecordedQuery['via'], sql: string, params: unknown[]): QueryResult {
    this.queries.push({ via, sql, params });
    if (this.failOn !== null && sql.includes(this.failOn)) {
      this.failOn = null;
      throw new Error(`fake failure: ${sql}`);
    }
    return this.results.shift() ?? { rows: [], rowCount: 0 };
  }
}

export function rows(...data: Record<string, unknown>[]): QueryResult {
  return { rows: data, rowCount: data.length };
}
