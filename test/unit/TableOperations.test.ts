/**
 * TableOperations Tests
 */

import 'reflect-metadata';
import { describe, it, expect, beforeEach } from 'vitest';
import { CompositeKeyTable } from '../../src/CompositeKeyTable';
import { DBHandler } from '../../src/DBHandler';
import { SqliteValue, sqliteCodec } from '../../src/drivers/SqliteHelper';
import { col } from '../../src/Expr';
import { QueryExecutor } from '../../src/QueryExecutor';
import { SingleKeyTable } from '../../src/SingleKeyTable';
import { TableOperations } from '../../src/TableOperations';
import { Article, ArticleTag, article } from '../helpers/entities';
import { FakeDriver, rows } from '../helpers/fakeDriver';

const COLUMNS = 'id, title, views, deleted';

function articleRow(id: number) {
  return { id, title: `t${id}`, views: id * 10, deleted: 0 };
}

describe('TableOperations', () => {
  let fake: FakeDriver;
  let executor: QueryExecutor<SqliteValue>;

  const table = new SingleKeyTable({
    entity: Article,
    codec: sqliteCodec,
    softDelete: { field: 'deleted', excludeTables: [] },
    globalFilter: null,
  });
  const ops = () => new TableOperations(table, executor);

  beforeEach(() => {
    fake = new FakeDriver();
    executor = new QueryExecutor(sqliteCodec, new DBHandler({ database: 'test', driver: 'sqlite' }, { driver: fake }));
  });

  // ============================================
  // Reads
  // ============================================

  describe('reads', () => {
    it('should load one entity by key', async () => {
      fake.respond(rows(articleRow(5)));
      const found = await ops().getOneByPk(5);

      expect(found).toEqual(article({ id: 5, title: 't5', views: 50, deleted: false }));
      expect(fake.queries).toEqual([
        { via: 'execute', sql: `SELECT ${COLUMNS} FROM article WHERE id = ? AND deleted = ?`, params: [5, 0] },
      ]);
    });

    it('should return null for a missing row', async () => {
      expect(await ops().getOneByPk(5)).toBeNull();
    });

    it('should load a list by conditions', async () => {
      fake.respond(rows(articleRow(1), articleRow(2)));
      const list = await ops().getListByCond((q) => q.where(col('views').gt(sqliteCodec.convert(5))));

      expect(list.map((a) => a.id)).toEqual([1, 2]);
      expect(fake.queries[0].params).toEqual([5, 0]);
    });
  });

  describe('getListPaginated', () => {
    it('should return the page with the total', async () => {
      fake.respond(rows(articleRow(3), articleRow(4)), rows({ count: '7' }));
      const page = await ops().getListPaginated(2, 2);

      expect(page.data.map((a) => a.id)).toEqual([3, 4]);
      expect(page.total).toBe(7);
      expect(page.pageNumber).toBe(2);
      expect(page.pageSize).toBe(2);
      expect(fake.queries).toEqual([
        {
          via: 'execute',
          sql: `SELECT ${COLUMNS} FROM article WHERE deleted = ? LIMIT ? OFFSET ?`,
          params: [0, 2, 2],
        },
        { via: 'execute', sql: 'SELECT COUNT(*) AS count FROM article WHERE deleted = ?', params: [0] },
      ]);
    });

    it('should reject an invalid page before querying', async () => {
      await expect(ops().getListPaginated(0, 10)).rejects.toMatchObject({ kind: 'PageNumberInvalid' });
      expect(fake.queries).toHaveLength(0);
    });
  });

  describe('count', () => {
    it('should convert driver counts to numbers', async () => {
      fake.respond(rows({ count: 3n }), rows({ count: 4 }));
      expect(await ops().count()).toBe(3);
      expect(await ops().count()).toBe(4);
    });
  });

  describe('getListByCursor', () => {
    it('should give a next cursor after a full first page', async () => {
      fake.respond(rows(articleRow(1), articleRow(2)));
      const page = await ops().getListByCursor(2);

      expect(page.data.map((a) => a.id)).toEqual([1, 2]);
      expect(page.nextCursor).toBe(2);
      expect(page.prevCursor).toBeNull();
      expect(page.limit).toBe(2);
      expect(page.sortOrder).toBe('ASC');
    });

    it('should give both cursors after a full page that started from a cursor', async () => {
      fake.respond(rows(articleRow(3), articleRow(4)));
      const page = await ops().getListByCursor(2, undefined, { cursor: 2 });

      expect(page.nextCursor).toBe(4);
      expect(page.prevCursor).toBe(3);
      expect(fake.queries[0]).toEqual({
        via: 'execute',
        sql: `SELECT ${COLUMNS} FROM article WHERE id > ? AND deleted = ? ORDER BY id ASC LIMIT ?`,
        params: [2, 0, 2],
      });
    });

    it('should derive cursors with the given extractor', async () => {
      fake.respond(rows(articleRow(3), articleRow(4)));
      const page = await ops().getListByCursor(2, undefined, { cursor: 2 }, (a) => `${a.id}:${a.title}`);

      expect(page.nextCursor).toBe('4:t4');
      expect(page.prevCursor).toBe('3:t3');
      expect(fake.statements).toEqual([
        `SELECT ${COLUMNS} FROM article WHERE id > ? AND deleted = ? ORDER BY id ASC LIMIT ?`,
      ]);
    });

    it('should give no cursors after a short page', async () => {
      fake.respond(rows(articleRow(5)));
      const page = await ops().getListByCursor(2, undefined, { cursor: 4, sortOrder: 'DESC' });

      expect(page.nextCursor).toBeNull();
      expect(page.prevCursor).toBeNull();
      expect(page.sortOrder).toBe('DESC');
    });

    it('should reject a composite table without a cursor column', async () => {
      const tags = new TableOperations(
        new CompositeKeyTable({ entity: ArticleTag, codec: sqliteCodec, softDelete: null, globalFilter: null }),
        executor
      );
      await expect(tags.getListByCursor(5)).rejects.toMatchObject({ kind: 'ColumnsListEmpty' });
    });
  });

  describe('exists', () => {
    it('should report whether a row came back', async () => {
      fake.respond(rows({ '1': 1 }));
      expect(await ops().exists((q) => q.where(col('title').eq(sqliteCodec.convert('x'))))).toBe(true);
      expect(await ops().exists()).toBe(false);
      expect(fake.statements).toEqual([
        'SELECT 1 FROM article WHERE title = ? AND deleted = ?',
        'SELECT 1 FROM article WHERE deleted = ?',
      ]);
    });
  });

  // ============================================
  // Writes
  // ============================================

  describe('writes', () => {
    it('should add the dialect upsert tail', async () => {
      await ops().upsertOne(article({ id: 0, title: 'new', views: 0, deleted: false }));

      expect(fake.queries).toEqual([
        {
          via: 'executeWrite',
          sql:
            'INSERT INTO article (id, title, views, deleted) VALUES (NULL, ?, ?, ?) ' +
            'ON CONFLICT (id) DO UPDATE SET title = EXCLUDED.title, views = EXCLUDED.views, deleted = EXCLUDED.deleted',
          params: ['new', 0, 0],
        },
      ]);
    });

    it('should run deletes and restores as writes', async () => {
      fake.respond({ rows: [], rowCount: 1 });
      const result = await ops().deleteByPk(5);
      await ops().restoreMany([5, 6]);

      expect(result.rowCount).toBe(1);
      expect(fake.queries).toEqual([
        { via: 'executeWrite', sql: 'UPDATE article SET deleted = ? WHERE id = ?', params: [1, 5] },
        { via: 'executeWrite', sql: 'UPDATE article SET deleted = ? WHERE id IN (?, ?)', params: [0, 5, 6] },
      ]);
    });

    it('should run updates and inserts as writes', async () => {
      await ops().updateOne(article({ id: 5, title: 'T', views: 1, deleted: false }));
      await ops().insertMany([article({ title: 'a', views: 1, deleted: false })]);

      expect(fake.queries).toEqual([
        {
          via: 'executeWrite',
          sql: 'UPDATE article SET title = ?, views = ?, deleted = ? WHERE id = ? AND deleted = ?',
          params: ['T', 1, 0, 5, 0],
        },
        {
          via: 'executeWrite',
          sql: 'INSERT INTO article (title, views, deleted) VALUES (?, ?, ?)',
          params: ['a', 1, 0],
        },
      ]);
    });
  });
});
