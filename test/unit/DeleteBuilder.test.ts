/**
 * DeleteBuilder Tests
 */

import { describe, it, expect } from 'vitest';
import { DeleteBuilder } from '../../src/DeleteBuilder';
import { col } from '../../src/Expr';
import { captureError } from '../helpers/errors';

describe('DeleteBuilder', () => {
  it('should delete every row without a condition', () => {
    expect(DeleteBuilder.from('logs').build()).toEqual({ sql: 'DELETE FROM logs', params: [] });
  });

  it('should match a composite primary key', () => {
    const { sql, params } = DeleteBuilder.from('article_tag')
      .byPrimaryKey(['article_id', 'tag_id'], [1, 7])
      .build();

    expect(sql).toBe('DELETE FROM article_tag WHERE article_id = ? AND tag_id = ?');
    expect(params).toEqual([1, 7]);
  });

  it('should reject a key without columns or with the wrong arity', () => {
    expect(captureError(() => DeleteBuilder.from('t').byPrimaryKey([], []))).toMatchObject({
      kind: 'NoPrimaryKeyDefined',
    });
    expect(captureError(() => DeleteBuilder.from('t').byPrimaryKey(['a', 'b'], [1]))).toMatchObject({
      kind: 'SingleKeyTypeInvalid',
    });
  });

  it('should combine conditions and RETURNING', () => {
    const { sql, params } = DeleteBuilder.from('sessions')
      .where(col('expired').eq(true))
      .orWhere(col('user_id').isNull())
      .where(col('tenant_id').eq(3))
      .returning(['id'])
      .build();

    expect(sql).toBe('DELETE FROM sessions WHERE (expired = ? OR user_id IS NULL) AND tenant_id = ? RETURNING id');
    expect(params).toEqual([true, 3]);
  });

  it('should clear conditions after buildMut', () => {
    const builder = DeleteBuilder.from('t').where(col('id').eq(1));
    expect(builder.buildMut().sql).toBe('DELETE FROM t WHERE id = ?');
    expect(builder.build().sql).toBe('DELETE FROM t');
  });
});
