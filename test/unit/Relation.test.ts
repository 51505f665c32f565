/**
 * Relation Tests
 */

import { describe, it, expect } from 'vitest';
import { RelationError } from '../../src/QueryError';
import { validateRelation } from '../../src/Relation';
import { captureError } from '../helpers/errors';

describe('validateRelation', () => {
  it('should accept matching values', () => {
    expect(() => validateRelation('OneToOne', 1, [1])).not.toThrow();
    expect(() => validateRelation('OneToMany', 'u-1', ['u-1', 'u-1'])).not.toThrow();
    expect(() => validateRelation('ManyToMany', 7, [7])).not.toThrow();
  });

  it('should compare dates by time', () => {
    const at = new Date('2024-01-01T00:00:00Z');
    expect(() => validateRelation('OneToOne', at, [new Date(at.getTime())])).not.toThrow();
  });

  it('should require exactly one value for OneToOne', () => {
    const error = captureError(() => validateRelation('OneToOne', 1, [1, 1]));
    expect(error).toBeInstanceOf(RelationError);
    expect(error).toMatchObject({
      kind: 'RelationValueEmpty',
      count: 2,
      message: 'Expected non-empty values, got 2',
    });
  });

  it('should require at least one value for OneToMany', () => {
    expect(captureError(() => validateRelation('OneToMany', 1, []))).toMatchObject({
      kind: 'RelationValueEmpty',
      count: 0,
    });
  });

  it('should report the first mismatching value', () => {
    expect(captureError(() => validateRelation('OneToMany', 1, [1, 2, 3]))).toMatchObject({
      kind: 'RelationValueMismatch',
      index: 1,
      expected: '1',
      actual: '2',
      message: 'Value mismatch: index 1, expected 1, got 2',
    });
  });
});
