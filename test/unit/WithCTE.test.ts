/**
 * WithCTE Tests
 */

import { describe, it, expect } from 'vitest';
import { col } from '../../src/Expr';
import { SelectBuilder } from '../../src/SelectBuilder';
import { CTE, WithCTE } from '../../src/WithCTE';
import type { SqlValue } from '../../src/types';

describe('WithCTE', () => {
  const recent = SelectBuilder.columns(['id', 'user_id']).from('orders').where(col('year').eq(2024));
  const totals = SelectBuilder.columns(['user_id', 'SUM(amount)']).from('orders').groupBy(['user_id']);

  it('should render one CTE', () => {
    expect(WithCTE.of(new CTE('recent', recent)).build()).toEqual({
      sql: 'WITH recent AS (SELECT id, user_id FROM orders WHERE year = ?)',
      params: [2024],
    });
  });

  it('should render an explicit column list', () => {
    const cte = new CTE('totals', totals).columns(['uid', 'total']);
    expect(cte.build().sql).toBe('totals(uid, total) AS (SELECT user_id, SUM(amount) FROM orders GROUP BY user_id)');
  });

  it('should join several CTEs with commas', () => {
    const withCte = WithCTE.of(new CTE('recent', recent)).add(new CTE('totals', totals));
    expect(withCte.build().sql).toBe(
      'WITH recent AS (SELECT id, user_id FROM orders WHERE year = ?), totals AS (SELECT user_id, SUM(amount) FROM orders GROUP BY user_id)'
    );
  });

  it('should reject a duplicate name', () => {
    const withCte = WithCTE.of(new CTE('recent', recent));
    expect(() => withCte.add(new CTE('recent', totals))).toThrow('Duplicate CTE name: recent');
  });

  it('should render nothing when empty', () => {
    const empty = WithCTE.of<SqlValue>();
    expect(empty.isEmpty()).toBe(true);
    expect(empty.build()).toEqual({ sql: '', params: [] });
    expect(SelectBuilder.table('t').with(empty).build().sql).toBe('SELECT * FROM t');
  });
});
