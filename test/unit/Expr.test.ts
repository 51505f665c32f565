/**
 * Expr Tests
 */

import { describe, it, expect } from 'vitest';
import { Expr, col, countPlaceholders } from '../../src/Expr';
import { QueryError } from '../../src/QueryError';
import { SelectBuilder } from '../../src/SelectBuilder';
import { captureError } from '../helpers/errors';

describe('Expr', () => {
  // ============================================
  // Column Predicates
  // ============================================

  describe('ColumnRef', () => {
    it('should build comparison predicates', () => {
      expect(col('age').eq(23).build()).toEqual({ sql: 'age = ?', params: [23] });
      expect(col('age').ne(23).build().sql).toBe('age != ?');
      expect(col('age').lt(23).build().sql).toBe('age < ?');
      expect(col('age').lte(23).build().sql).toBe('age <= ?');
      expect(col('age').gt(23).build().sql).toBe('age > ?');
      expect(col('age').gte(23).build().sql).toBe('age >= ?');
      expect(col('name').like('Jo%').build()).toEqual({ sql: 'name LIKE ?', params: ['Jo%'] });
    });

    it('should qualify the column name', () => {
      expect(col('id', 'u').eq(1).build().sql).toBe('u.id = ?');
      expect(Expr.col('id', 'u').toString()).toBe('u.id');
    });

    it('should build IS NULL and IS NOT NULL without values', () => {
      expect(col('deleted_at').isNull().build()).toEqual({ sql: 'deleted_at IS NULL', params: [] });
      expect(col('deleted_at').isNotNull().build()).toEqual({
        sql: 'deleted_at IS NOT NULL',
        params: [],
      });
    });

    it('should build BETWEEN with both bounds', () => {
      expect(col('age').between(18, 65).build()).toEqual({
        sql: 'age BETWEEN ? AND ?',
        params: [18, 65],
      });
    });

    it('should build IN and NOT IN lists', () => {
      expect(col('status').isIn(['A', 'B']).build()).toEqual({
        sql: 'status IN (?, ?)',
        params: ['A', 'B'],
      });
      expect(col('status').notIn(['X']).build()).toEqual({
        sql: 'status NOT IN (?)',
        params: ['X'],
      });
    });

    it('should reject an empty IN list', () => {
      const error = captureError(() => col('id').isIn([]));
      expect(error).toBeInstanceOf(QueryError);
      expect(error).toMatchObject({ kind: 'EmptyInList', message: 'IN list for id must not be empty' });
    });

    it('should reject an empty column name', () => {
      expect(() => col('')).toThrow('Column name must not be empty');
    });
  });

  // ============================================
  // Combinators
  // ============================================

  describe('combinators', () => {
    it('should join with AND keeping values in order', () => {
      const cond = col('age').gte(18).and(col('status').isIn(['active', 'pending']));
      expect(cond.build()).toEqual({
        sql: 'age >= ? AND status IN (?, ?)',
        params: [18, 'active', 'pending'],
      });
    });

    it('should always parenthesize OR', () => {
      expect(col('a').eq(1).or(col('b').eq(2)).build()).toEqual({
        sql: '(a = ? OR b = ?)',
        params: [1, 2],
      });
    });

    it('should not double-wrap an OR operand of AND', () => {
      const cond = col('x').eq(0).and(col('a').eq(1).or(col('b').eq(2)));
      expect(cond.build().sql).toBe('x = ? AND (a = ? OR b = ?)');
    });

    it('should negate with NOT', () => {
      expect(col('a').eq(1).not().build()).toEqual({ sql: 'NOT (a = ?)', params: [1] });
    });

    it('should group with paren', () => {
      expect(col('a').eq(1).and(col('b').eq(2)).paren().build().sql).toBe('(a = ? AND b = ?)');
    });
  });

  // ============================================
  // Raw and Subquery Leaves
  // ============================================

  describe('raw expressions', () => {
    it('should take verbatim SQL', () => {
      const cond = Expr.fromStr('deleted_at IS NULL').and(col('a').eq(1));
      expect(cond.build()).toEqual({ sql: 'deleted_at IS NULL AND a = ?', params: [1] });
    });

    it('should check placeholder count against values', () => {
      expect(Expr.raw('SUM(amount) > ?', [1000]).build()).toEqual({
        sql: 'SUM(amount) > ?',
        params: [1000],
      });
      const error = captureError(() => Expr.raw('a = ?', []));
      expect(error).toBeInstanceOf(QueryError);
      expect(error).toMatchObject({
        kind: 'ValueInvalid',
        subject: 'a = ?',
        message: 'Raw expression has 1 placeholders but 0 values: a = ?',
      });
    });
  });

  describe('subquery predicates', () => {
    const paid = SelectBuilder.columns(['user_id']).from('orders').where(col('total').gt(100));

    it('should embed IN and NOT IN subqueries', () => {
      expect(Expr.inSubquery('id', paid).build()).toEqual({
        sql: 'id IN (SELECT user_id FROM orders WHERE total > ?)',
        params: [100],
      });
      expect(Expr.notInSubquery('id', paid).build().sql).toBe(
        'id NOT IN (SELECT user_id FROM orders WHERE total > ?)'
      );
    });

    it('should embed EXISTS and NOT EXISTS subqueries', () => {
      expect(Expr.exists(paid).build().sql).toBe(
        'EXISTS (SELECT user_id FROM orders WHERE total > ?)'
      );
      expect(Expr.notExists(paid).build().params).toEqual([100]);
    });
  });

  describe('countPlaceholders', () => {
    it('should count question marks', () => {
      expect(countPlaceholders('a = ? AND b IN (?, ?)')).toBe(3);
      expect(countPlaceholders('SELECT 1')).toBe(0);
    });
  });
});
