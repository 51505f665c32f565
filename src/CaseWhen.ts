/**
 * querykit - CASE / WHEN Expression
 */

import type { Expr } from './Expr';
import type { Buildable, SqlBuildResult } from './types';

/** Result of an arm: SQL text, or a value bound as a parameter */
type CaseResult<V> = { sql: string } | { value: V };

interface CaseArm<V> {
  condition: Expr<V>;
  result: CaseResult<V>;
}

/**
 * Ordered WHEN arms with an optional ELSE.
 *
 * @example
 * ```typescript
 * CaseWhen.case<number | string>()
 *   .when(col('age').lt(18), "'minor'")
 *   .whenValue(col('age').gte(65), 'senior')
 *   .else("'adult'")
 *   .alias('age_group');
 * // → CASE WHEN age < ? THEN 'minor' WHEN age >= ? THEN ? ELSE 'adult' END AS age_group
 * ```
 */
export class CaseWhen<V> implements Buildable<V> {
  private arms: CaseArm<V>[] = [];
  private otherwise: CaseResult<V> | null = null;
  private aliasName: string | null = null;

  static case<V>(): CaseWhen<V> {
    return new CaseWhen<V>();
  }

  /** `WHEN condition THEN result` with result as SQL text */
  when(condition: Expr<V>, result: string): this {
    this.arms.push({ condition, result: { sql: result } });
    return this;
  }

  /** `WHEN condition THEN ?` with the result bound */
  whenValue(condition: Expr<V>, value: V): this {
    this.arms.push({ condition, result: { value } });
    return this;
  }

  else(result: string): this {
    this.otherwise = { sql: result };
    return this;
  }

  elseValue(value: V): this {
    this.otherwise = { value };
    return this;
  }

  alias(name: string): this {
    this.aliasName = name;
    return this;
  }

  /**
   * @throws Error when no WHEN arm was added
   */
  build(): SqlBuildResult<V> {
    if (this.arms.length === 0) {
      throw new Error('CASE expression requires at least one WHEN arm');
    }
    let sql = 'CASE';
    const params: V[] = [];

    for (const arm of this.arms) {
      const cond = arm.condition.build();
      sql += ` WHEN ${cond.sql} THEN ${appendResult(arm.result, params, cond.params)}`;
    }
    if (this.otherwise) {
      sql += ` ELSE ${appendResult(this.otherwise, params, [])}`;
    }
    sql += ' END';
    if (this.aliasName) {
      sql += ` AS ${this.aliasName}`;
    }
    return { sql, params };
  }
}

function appendResult<V>(result: CaseResult<V>, params: V[], conditionParams: V[]): string {
  params.push(...conditionParams);
  if ('sql' in result) {
    return result.sql;
  }
  params.push(result.value);
  return '?';
}
