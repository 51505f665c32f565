/**
 * querykit - Typed, composable SQL statement builders
 *
 * Statements for SQLite, MySQL and PostgreSQL, built from column expressions or
 * from decorated entity classes, and executed through a shared driver layer.
 *
 * @example
 * ```typescript
 * import 'reflect-metadata';
 * import { SelectBuilder, col, pgCodec, QueryExecutor, initDBHandler } from 'querykit';
 *
 * initDBHandler({ host: 'localhost', port: 5432, database: 'app', user: 'app', password: 'test-secret' });
 *
 * const query = SelectBuilder.columns(['id', 'name'])
 *   .from('users')
 *   .where(col('age').gt(pgCodec.convert(18)))
 *   .orderBy('name');
 *
 * const rows = await new QueryExecutor(pgCodec).fetchAll(query);
 * ```
 */

// ============================================
// Core Types
// ============================================

export type {
  SqlBuildResult,
  Buildable,
  SqlValue,
  SortOrder,
  Dialect,
  PrimaryKey,
  FieldKind,
  EntityField,
  EntityClass,
  PaginatedResult,
  CursorPaginatedResult,
} from './types';
export { primaryKeyNames } from './types';

// ============================================
// Errors
// ============================================

export { QueryError, RelationError } from './QueryError';
export type { QueryErrorKind, RelationErrorKind } from './QueryError';

// ============================================
// Expressions and Clauses
// ============================================

export { Expr, ColumnRef, col, countPlaceholders } from './Expr';
export type { ExprKind, CompareOperator } from './Expr';
export { Join } from './Join';
export type { JoinKind } from './Join';
export { CaseWhen } from './CaseWhen';
export { Agg } from './Aggregate';
export type { AggregateFunction } from './Aggregate';
export { CTE, WithCTE } from './WithCTE';
export { Subquery } from './Subquery';

// ============================================
// Statement Builders
// ============================================

export { SelectBuilder } from './SelectBuilder';
export { InsertBuilder } from './InsertBuilder';
export { UpdateBuilder } from './UpdateBuilder';
export { DeleteBuilder } from './DeleteBuilder';

// ============================================
// Values
// ============================================

export type { ValueCodec } from './ValueCodec';
export { Optional, some, none, unwrapOptional, isEmptyOrNone, NIL_UUID } from './ValueCodec';
export {
  castToDatetime,
  castToBoolean,
  castToNumber,
  castToInteger,
  castToBigInt,
  castToString,
  castToBytes,
  castToJson,
  formatDate,
  formatTime,
  formatDateTime,
  decodeField,
} from './TypeCast';

// ============================================
// Entities
// ============================================

export {
  model,
  column,
  toSnakeCase,
  tableNameOf,
  columnNamesOf,
  columnKindOf,
  primaryKeyOf,
  getEntityFields,
  fromRow,
} from './decorators';
export type { ColumnOptions } from './decorators';
export {
  extractAll,
  extractWithFilter,
  extractWithBind,
  batchExtract,
  getValue,
  getValues,
} from './Fields';
export type { ExtractedFields } from './Fields';
export { validateRelation } from './Relation';
export type { RelationKind } from './Relation';

// ============================================
// Global Configuration
// ============================================

export {
  setGlobalSoftDeleteField,
  setGlobalFilter,
  getGlobalSoftDeleteField,
  getGlobalFilter,
  setConfigLogger,
} from './GlobalConfig';
export type { SoftDeleteConfig, GlobalFilterConfig } from './GlobalConfig';

// ============================================
// Table Facades and Execution
// ============================================

export { TableCommon } from './TableCommon';
export type {
  TableOptions,
  TableFacade,
  QueryFilter,
  UpsertStatement,
  PaginatedStatements,
  CursorOptions,
} from './TableCommon';
export { SingleKeyTable } from './SingleKeyTable';
export { CompositeKeyTable } from './CompositeKeyTable';
export type { CompositeKey } from './CompositeKeyTable';
export { TableOperations } from './TableOperations';
export { QueryExecutor } from './QueryExecutor';
export type { Row } from './QueryExecutor';

// ============================================
// Database Handler and Drivers
// ============================================

export { DBHandler, initDBHandler, getDBHandler, getDBConfig, closeAllPools } from './DBHandler';
export type { DBHandlerOptions } from './DBHandler';
export * from './drivers';
