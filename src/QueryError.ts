/**
 * querykit - Errors
 *
 * Statement construction failures are raised synchronously by the builders and table
 * facades. Driver failures are logged by the driver and rethrown unchanged.
 */

// ============================================
// QueryError
// ============================================

export type QueryErrorKind =
  | 'NoEntitiesProvided'
  | 'ColumnsListEmpty'
  | 'PrimaryKeyNotFound'
  | 'NoPrimaryKeyDefined'
  | 'ValueInvalid'
  | 'SingleKeyTypeInvalid'
  | 'PageNumberInvalid'
  | 'LimitInvalid'
  | 'SoftDeleteConfigNotSet'
  | 'SoftDeleteColumnTypeInvalid'
  | 'RestoreOperationNotSupported'
  | 'EmptyInList'
  | 'KeysListEmpty'
  | 'ReturningNotSupported';

function defaultMessage(kind: QueryErrorKind, subject?: string): string {
  switch (kind) {
    case 'NoEntitiesProvided':
      return 'No entities provided';
    case 'ColumnsListEmpty':
      return 'Columns list is empty';
    case 'PrimaryKeyNotFound':
      return subject ? `Primary key ${subject} not found` : 'Primary key not found';
    case 'NoPrimaryKeyDefined':
      return 'No primary key defined';
    case 'ValueInvalid':
      return `Field ${subject ?? '(unknown)'} has an invalid value`;
    case 'SingleKeyTypeInvalid':
      return 'Primary key value does not match the key arity of the table';
    case 'PageNumberInvalid':
      return 'Page number and page size must be greater than 0';
    case 'LimitInvalid':
      return 'Limit must be greater than 0';
    case 'SoftDeleteConfigNotSet':
      return 'Soft delete config not set';
    case 'SoftDeleteColumnTypeInvalid':
      return subject
        ? `Soft delete column ${subject} must be a boolean field`
        : 'Soft delete column must be a boolean field';
    case 'RestoreOperationNotSupported':
      return 'Restore operation is not supported for this table';
    case 'EmptyInList':
      return subject ? `IN list for ${subject} must not be empty` : 'IN list must not be empty';
    case 'KeysListEmpty':
      return 'Keys list is empty';
    case 'ReturningNotSupported':
      return `RETURNING is not supported by ${subject ?? 'this dialect'}`;
  }
}

/**
 * Raised when a statement cannot be built from the given input.
 *
 * @example
 * ```typescript
 * try {
 *   articles.getListPaginated(0, 10);
 * } catch (err) {
 *   if (err instanceof QueryError && err.kind === 'PageNumberInvalid') { ... }
 * }
 * ```
 */
export class QueryError extends Error {
  constructor(
    public readonly kind: QueryErrorKind,
    public readonly subject?: string,
    message?: string
  ) {
    super(message ?? defaultMessage(kind, subject));
    this.name = 'QueryError';
    Error.captureStackTrace(this, this.constructor);
  }
}

// ============================================
// RelationError
// ============================================

export type RelationErrorKind = 'RelationValueMismatch' | 'RelationValueEmpty';

/**
 * Raised by the relation validator when related values do not carry the expected key.
 */
export class RelationError extends Error {
  private constructor(
    public readonly kind: RelationErrorKind,
    message: string,
    public readonly index?: number,
    public readonly expected?: string,
    public readonly actual?: string,
    public readonly count?: number
  ) {
    super(message);
    this.name = 'RelationError';
    Error.captureStackTrace(this, this.constructor);
  }

  static valueMismatch(index: number, expected: string, actual: string): RelationError {
    return new RelationError(
      'RelationValueMismatch',
      `Value mismatch: index ${index}, expected ${expected}, got ${actual}`,
      index,
      expected,
      actual
    );
  }

  static valueEmpty(count: number): RelationError {
    return new RelationError(
      'RelationValueEmpty',
      `Expected non-empty values, got ${count}`,
      undefined,
      undefined,
      undefined,
      count
    );
  }
}
