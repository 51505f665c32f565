/**
 * querykit - Entity Field Extraction
 *
 * Pure helpers turning entity instances into column names and values for the
 * statement builders. Field order is declaration order.
 */

import { getEntityFields } from './decorators';
import type { EntityField } from './types';
import { isEmptyOrNone } from './ValueCodec';

/** Column names and their values, position-aligned */
export interface ExtractedFields<T> {
  names: string[];
  values: T[];
}

/**
 * Every field of an entity, values left as they are on the instance
 */
export function extractAll(entity: object): ExtractedFields<unknown> {
  const fields = getEntityFields(entity);
  return {
    names: fields.map((f) => f.name),
    values: fields.map((f) => f.value),
  };
}

/**
 * Fields minus the excluded columns; with `skipNull` also minus empty-or-none values
 */
export function extractWithFilter(
  fields: EntityField[],
  exclude: readonly string[],
  skipNull: boolean
): EntityField[] {
  return fields.filter(
    (field) => !exclude.includes(field.name) && !(skipNull && isEmptyOrNone(field.value))
  );
}

/**
 * `extractWithFilter`, then convert each kept field with `bind`
 */
export function extractWithBind<T>(
  fields: EntityField[],
  exclude: readonly string[],
  skipNull: boolean,
  bind: (field: EntityField) => T
): ExtractedFields<T> {
  const kept = extractWithFilter(fields, exclude, skipNull);
  return {
    names: kept.map((f) => f.name),
    values: kept.map(bind),
  };
}

/**
 * Filtered fields of every entity; the column list comes from the first entity
 */
export function batchExtract(
  entities: readonly object[],
  exclude: readonly string[],
  skipNull: boolean
): { names: string[]; rows: EntityField[][] } {
  const rows = entities.map((entity) => extractWithFilter(getEntityFields(entity), exclude, skipNull));
  return {
    names: rows.length > 0 ? rows[0].map((f) => f.name) : [],
    rows,
  };
}

/**
 * Value of one column, or undefined when the entity has no such field
 */
export function getValue(entity: object, name: string): unknown {
  return getEntityFields(entity).find((f) => f.name === name)?.value;
}

/**
 * Value of one column across entities
 */
export function getValues(entities: readonly object[], name: string): unknown[] {
  return entities.map((entity) => getValue(entity, name));
}
