/**
 * Decorators Tests
 */

import 'reflect-metadata';
import { describe, it, expect } from 'vitest';
import {
  column,
  columnKindOf,
  columnNamesOf,
  fromRow,
  getEntityFields,
  model,
  primaryKeyOf,
  tableNameOf,
  toSnakeCase,
} from '../../src/decorators';
import { sqliteCodec } from '../../src/drivers/SqliteHelper';
import { Account, Article, ArticleTag } from '../helpers/entities';

// ============================================
// Model Definitions
// ============================================

@model
class AuditEntry {
  @column.integer({ primaryKey: true }) id?: number;
}

class Plain {
  a = 1;
  b = 'x';
}

class BaseRecord {
  @column.integer({ primaryKey: true }) id?: number;
}

class NamedRecord extends BaseRecord {
  @column.text() name?: string;
}

describe('decorators', () => {
  describe('toSnakeCase', () => {
    it('should split words and acronyms', () => {
      expect(toSnakeCase('ArticleTag')).toBe('article_tag');
      expect(toSnakeCase('HTTPLog')).toBe('http_log');
      expect(toSnakeCase('user2Fa')).toBe('user2_fa');
    });
  });

  describe('@model', () => {
    it('should name the table', () => {
      expect(tableNameOf(Article)).toBe('article');
      expect(tableNameOf(ArticleTag)).toBe('article_tag');
    });

    it('should default to the snake_case class name', () => {
      expect(tableNameOf(AuditEntry)).toBe('audit_entry');
      expect(tableNameOf(Plain)).toBe('plain');
    });
  });

  describe('@column', () => {
    it('should list column names in declaration order', () => {
      expect(columnNamesOf(Article)).toEqual(['id', 'title', 'views', 'deleted']);
      expect(columnNamesOf(Account)).toEqual(['id', 'display_name', 'created_at', 'settings']);
    });

    it('should fall back to own keys for undecorated classes', () => {
      expect(columnNamesOf(Plain)).toEqual(['a', 'b']);
    });

    it('should record the declared kind', () => {
      expect(columnKindOf(Account, 'settings')).toBe('json');
      expect(columnKindOf(Account, 'display_name')).toBe('text');
      expect(columnKindOf(Account, 'missing')).toBeUndefined();
    });

    it('should inherit parent columns without changing the parent', () => {
      expect(columnNamesOf(NamedRecord)).toEqual(['id', 'name']);
      expect(columnNamesOf(BaseRecord)).toEqual(['id']);
    });
  });

  describe('primaryKeyOf', () => {
    it('should describe single and composite keys', () => {
      expect(primaryKeyOf(Article)).toEqual({ type: 'single', name: 'id', autoGenerate: true });
      expect(primaryKeyOf(ArticleTag)).toEqual({ type: 'composite', names: ['article_id', 'tag_id'] });
      expect(primaryKeyOf(Plain)).toBeNull();
    });
  });

  describe('getEntityFields', () => {
    it('should yield column name, kind and value', () => {
      const account = Object.assign(new Account(), { id: 'a-1', displayName: 'Ann' });
      expect(getEntityFields(account)).toEqual([
        { name: 'id', kind: 'uuid', value: 'a-1' },
        { name: 'display_name', kind: 'text', value: 'Ann' },
        { name: 'created_at', kind: 'datetime', value: undefined },
        { name: 'settings', kind: 'json', value: undefined },
      ]);
    });

    it('should yield own properties of undecorated objects as auto', () => {
      expect(getEntityFields({ a: 1, b: 'x' })).toEqual([
        { name: 'a', kind: 'auto', value: 1 },
        { name: 'b', kind: 'auto', value: 'x' },
      ]);
    });
  });

  describe('fromRow', () => {
    it('should cast row values through the codec', () => {
      const entity = fromRow(Article, { id: '5', title: 'Hello', views: 3, deleted: 1, extra: 'x' }, sqliteCodec);
      expect(entity).toBeInstanceOf(Article);
      expect(entity.id).toBe(5);
      expect(entity.title).toBe('Hello');
      expect(entity.views).toBe(3);
      expect(entity.deleted).toBe(true);
      expect(Reflect.get(entity, 'extra')).toBeUndefined();
    });

    it('should map column names back to properties', () => {
      const account = fromRow(Account, { id: 'a-1', display_name: 'Ann', settings: '{"theme":"dark"}' }, sqliteCodec);
      expect(account.displayName).toBe('Ann');
      expect(account.settings).toEqual({ theme: 'dark' });
      expect(account.created_at).toBeUndefined();
    });

    it('should keep raw values without a codec', () => {
      expect(fromRow(Article, { id: '5' }).id).toBe('5');
    });

    it('should copy every value into undecorated classes', () => {
      const plain = fromRow(Plain, { a: 9, c: true });
      expect(plain.a).toBe(9);
      expect(Reflect.get(plain, 'c')).toBe(true);
    });
  });
});
