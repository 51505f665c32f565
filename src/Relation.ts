/**
 * querykit - Relation Validation
 *
 * Checks that values loaded for a relation carry the key of the owning row.
 * No relation loading happens here; callers fetch related rows themselves.
 */

import { RelationError } from './QueryError';

export type RelationKind = 'OneToOne' | 'OneToMany' | 'ManyToMany';

/**
 * Validate related key values against the owning key.
 *
 * - `OneToOne`: exactly one value, equal to the key.
 * - `OneToMany` / `ManyToMany`: at least one value, each equal to the key.
 *
 * @throws RelationError `RelationValueEmpty` on a wrong count, `RelationValueMismatch` on the first differing value
 *
 * @example
 * ```typescript
 * validateRelation('OneToMany', author.id, posts.map((p) => p.author_id));
 * ```
 */
export function validateRelation<K>(kind: RelationKind, key: K, values: readonly K[]): void {
  if (kind === 'OneToOne' ? values.length !== 1 : values.length === 0) {
    throw RelationError.valueEmpty(values.length);
  }
  values.forEach((value, index) => {
    if (!sameKey(key, value)) {
      throw RelationError.valueMismatch(index, String(key), String(value));
    }
  });
}

/** Equality for key values; Dates compare by time */
function sameKey(a: unknown, b: unknown): boolean {
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime();
  }
  return a === b;
}
