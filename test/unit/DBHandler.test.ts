/**
 * DBHandler Tests
 */

import { describe, it, expect } from 'vitest';
import { DBHandler, getDBConfig, getDBHandler, initDBHandler } from '../../src/DBHandler';
import { FakeDriver, rows } from '../helpers/fakeDriver';

const silent = { debug: () => {}, info: () => {}, warn: () => {}, error: () => {} };

describe('DBHandler', () => {
  it('should require initialization before use', () => {
    expect(() => getDBHandler()).toThrow('DBHandler not initialized. Call initDBHandler() first.');
    expect(getDBConfig()).toBeNull();
  });

  it('should keep the initialized handler and config', () => {
    const fake = new FakeDriver();
    const config = { database: 'test', driver: 'sqlite' as const };
    const handler = initDBHandler(config, { driver: fake });

    expect(getDBHandler()).toBe(handler);
    expect(getDBConfig()).toEqual(config);
    expect(handler.getDriver()).toBe(fake);
  });

  it('should default to the postgres dialect', () => {
    expect(new DBHandler({ database: 'test' }, { driver: new FakeDriver() }).getDialect()).toBe('postgres');
    expect(new DBHandler({ database: 'test', driver: 'mysql' }, { driver: new FakeDriver() }).getDialect()).toBe(
      'mysql'
    );
  });

  it('should route reads and writes to the driver', async () => {
    const fake = new FakeDriver().respond(rows({ n: 1 }));
    const handler = new DBHandler({ database: 'test', driver: 'sqlite' }, { driver: fake });

    expect((await handler.execute('SELECT 1 AS n')).rows).toEqual([{ n: 1 }]);
    await handler.executeWrite('DELETE FROM t WHERE id = ?', [3]);

    expect(handler.inTransaction()).toBe(false);
    expect(fake.queries).toEqual([
      { via: 'execute', sql: 'SELECT 1 AS n', params: [] },
      { via: 'executeWrite', sql: 'DELETE FROM t WHERE id = ?', params: [3] },
    ]);
  });

  it('should route every query through a bound connection', async () => {
    const fake = new FakeDriver();
    const handler = new DBHandler({ database: 'test', driver: 'sqlite' }, { driver: fake, logger: silent });
    const bound = handler.withConnection(await handler.getConnection());

    await bound.execute('SELECT 1');
    await bound.executeWrite('UPDATE t SET a = ?', [1]);

    expect(bound.inTransaction()).toBe(true);
    expect(bound.getDriver()).toBe(fake);
    expect(bound.getLogger()).toBe(silent);
    expect(fake.queries.map((q) => q.via)).toEqual(['connection', 'connection']);
  });

  describe('transaction', () => {
    it('should commit and return the callback result', async () => {
      const fake = new FakeDriver();
      const handler = new DBHandler({ database: 'test', driver: 'sqlite' }, { driver: fake });

      const result = await handler.transaction(async (tx) => {
        await tx.executeWrite('UPDATE t SET a = ?', [1]);
        return tx.inTransaction();
      });

      expect(result).toBe(true);
      expect(fake.statements).toEqual(['BEGIN', 'UPDATE t SET a = ?', 'COMMIT']);
      expect(fake.released).toBe(1);
    });

    it('should roll back and rethrow the callback error', async () => {
      const fake = new FakeDriver();
      const handler = new DBHandler({ database: 'test', driver: 'sqlite' }, { driver: fake });

      await expect(
        handler.transaction(async () => {
          throw new Error('stop');
        })
      ).rejects.toThrow('stop');
      expect(fake.statements).toEqual(['BEGIN', 'ROLLBACK']);
      expect(fake.released).toBe(1);
    });

    it('should not nest on a bound handler', async () => {
      const fake = new FakeDriver();
      const handler = new DBHandler({ database: 'test', driver: 'sqlite' }, { driver: fake });

      await expect(handler.transaction((tx) => tx.transaction(async () => 1))).rejects.toThrow(
        'Transaction already in progress on this handler'
      );
      expect(fake.statements).toEqual(['BEGIN', 'ROLLBACK']);
    });
  });

  it('should pass the logger to the driver', () => {
    const fake = new FakeDriver();
    const handler = new DBHandler({ database: 'test', driver: 'sqlite' }, { driver: fake });
    handler.setLogger(silent);

    expect(handler.getLogger()).toBe(silent);
    expect(fake.logger).toBe(silent);
  });

  it('should close the driver', async () => {
    const fake = new FakeDriver();
    await new DBHandler({ database: 'test', driver: 'sqlite' }, { driver: fake }).close();
    expect(fake.closed).toBe(true);
  });
});
