/**
 * querykit - Query Executor
 *
 * Runs built statements through a DBHandler: values are encoded with the dialect
 * codec, rows are decoded into entities with `fromRow`.
 *
 * Writes can be batched: `beginTransaction()`, `enqueue(builder)`..., `commit()`.
 * The pending list changes synchronously, so commit takes the whole batch before
 * it first awaits the driver.
 *
 * @example
 * ```typescript
 * const executor = new QueryExecutor(pgCodec);
 * const article = await executor.fetchOptional(articles.getOneByPk(5), Article);
 *
 * executor.beginTransaction();
 * executor.enqueue(articles.insertOne(draft));
 * executor.enqueue(articles.deleteByPk(3));
 * await executor.commit();
 * ```
 */

import { getDBHandler, type DBHandler } from './DBHandler';
import { fromRow } from './decorators';
import type { Logger, QueryResult } from './drivers/types';
import type { EntityClass, Buildable } from './types';
import type { ValueCodec } from './ValueCodec';

export type Row = Record<string, unknown>;

export class QueryExecutor<V> {
  private inTransaction = false;
  private pending: Buildable<V>[] = [];

  /**
   * @param handler - Defaults to the global handler, resolved on each query
   */
  constructor(
    readonly codec: ValueCodec<V>,
    private readonly handler?: DBHandler
  ) {}

  /**
   * Handler queries run on (pool access)
   */
  getHandler(): DBHandler {
    return this.handler ?? getDBHandler();
  }

  setLogger(logger: Logger): void {
    this.getHandler().setLogger(logger);
  }

  // ============================================
  // Reads
  // ============================================

  fetchAll(query: Buildable<V>): Promise<Row[]>;
  fetchAll<T extends object>(query: Buildable<V>, entity: EntityClass<T>): Promise<T[]>;
  async fetchAll<T extends object>(query: Buildable<V>, entity?: EntityClass<T>): Promise<Row[] | T[]> {
    const rows = await this.query(query);
    return entity ? rows.map((row) => fromRow(entity, row, this.codec)) : rows;
  }

  fetchOptional(query: Buildable<V>): Promise<Row | null>;
  fetchOptional<T extends object>(query: Buildable<V>, entity: EntityClass<T>): Promise<T | null>;
  async fetchOptional<T extends object>(query: Buildable<V>, entity?: EntityClass<T>): Promise<Row | T | null> {
    const rows = await this.query(query);
    if (rows.length === 0) return null;
    return entity ? fromRow(entity, rows[0], this.codec) : rows[0];
  }

  /**
   * @throws Error when the query returns no row
   */
  fetchOne(query: Buildable<V>): Promise<Row>;
  fetchOne<T extends object>(query: Buildable<V>, entity: EntityClass<T>): Promise<T>;
  async fetchOne<T extends object>(query: Buildable<V>, entity?: EntityClass<T>): Promise<Row | T> {
    const rows = await this.query(query);
    if (rows.length === 0) {
      throw new Error(`Query returned no rows: ${query.build().sql}`);
    }
    return entity ? fromRow(entity, rows[0], this.codec) : rows[0];
  }

  // ============================================
  // Writes
  // ============================================

  async execute(query: Buildable<V>): Promise<QueryResult> {
    const { sql, params } = query.build();
    return this.getHandler().executeWrite(sql, this.encode(params));
  }

  /**
   * Start collecting statements for one transaction
   * @throws Error when a batch is already open
   */
  beginTransaction(): void {
    if (this.inTransaction) {
      throw new Error('Transaction already started');
    }
    this.inTransaction = true;
    this.pending = [];
  }

  /**
   * @throws Error when no batch is open
   */
  enqueue(query: Buildable<V>): void {
    if (!this.inTransaction) {
      throw new Error('No transaction in progress. Call beginTransaction() first.');
    }
    this.pending.push(query);
  }

  /**
   * Run the collected statements in enqueue order in one transaction
   * @throws Error when no batch is open; rethrows the first failing statement's error
   */
  async commit(): Promise<QueryResult[]> {
    if (!this.inTransaction) {
      throw new Error('No transaction in progress. Call beginTransaction() first.');
    }
    const batch = this.pending;
    this.pending = [];
    this.inTransaction = false;
    return this.executeWithTransaction(batch);
  }

  /**
   * Drop the collected statements without running them
   */
  rollback(): void {
    this.pending = [];
    this.inTransaction = false;
  }

  /**
   * BEGIN, each statement in order, COMMIT on one connection.
   * The first failure rolls back and is rethrown unchanged; the connection is always released.
   */
  async executeWithTransaction(queries: readonly Buildable<V>[]): Promise<QueryResult[]> {
    return this.getHandler().transaction(async (tx) => {
      const results: QueryResult[] = [];
      for (const query of queries) {
        const { sql, params } = query.build();
        results.push(await tx.executeWrite(sql, this.encode(params)));
      }
      return results;
    });
  }

  // ============================================
  // Internals
  // ============================================

  private encode(params: readonly V[]): unknown[] {
    return params.map((value) => this.codec.encode(value));
  }

  private async query(query: Buildable<V>): Promise<Row[]> {
    const { sql, params } = query.build();
    const result = await this.getHandler().execute(sql, this.encode(params));
    return result.rows;
  }
}
