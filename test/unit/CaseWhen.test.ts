/**
 * CaseWhen Tests
 */

import { describe, it, expect } from 'vitest';
import { CaseWhen } from '../../src/CaseWhen';
import { col } from '../../src/Expr';
import type { SqlValue } from '../../src/types';

describe('CaseWhen', () => {
  it('should render arms in order with SQL results', () => {
    const { sql, params } = CaseWhen.case<SqlValue>()
      .when(col('age').lt(18), "'minor'")
      .when(col('age').lt(65), "'adult'")
      .build();

    expect(sql).toBe("CASE WHEN age < ? THEN 'minor' WHEN age < ? THEN 'adult' END");
    expect(params).toEqual([18, 65]);
  });

  it('should bind value results after their condition', () => {
    const { sql, params } = CaseWhen.case<SqlValue>()
      .whenValue(col('score').gte(90), 'A')
      .whenValue(col('score').gte(80), 'B')
      .elseValue('C')
      .alias('grade')
      .build();

    expect(sql).toBe('CASE WHEN score >= ? THEN ? WHEN score >= ? THEN ? ELSE ? END AS grade');
    expect(params).toEqual([90, 'A', 80, 'B', 'C']);
  });

  it('should take an ELSE as SQL text', () => {
    expect(CaseWhen.case<SqlValue>().when(col('a').isNull(), '0').else('a').build().sql).toBe(
      'CASE WHEN a IS NULL THEN 0 ELSE a END'
    );
  });

  it('should require a WHEN arm', () => {
    expect(() => CaseWhen.case<SqlValue>().else('0').build()).toThrow(
      'CASE expression requires at least one WHEN arm'
    );
  });
});
