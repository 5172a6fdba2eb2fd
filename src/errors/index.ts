/**
 * Error Handling Module
 *
 * Standardized error hierarchy for the versioning layer.
 * All errors extend from HistoryError which provides:
 * - Error codes for programmatic handling
 * - Serialization support
 * - Cause chaining for debugging
 * - Type guards for error checking
 *
 * Error Hierarchy:
 * - HistoryError (base class)
 *   - ConfigurationError (invalid handler configuration, fatal at construction)
 *   - KeyConsistencyError (primary-key fields missing or mismatched)
 *   - TransactionError (commit conflicts, exhausted retries)
 *   - StorageError (document store not usable)
 *
 * Chain-integrity anomalies are not represented here: read paths log them
 * and degrade instead of throwing.
 *
 * @module errors
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Error codes for versioning operations.
 * These codes are stable and can be used for programmatic error handling.
 */
export enum ErrorCode {
  // General errors
  UNKNOWN = 'UNKNOWN',
  INTERNAL = 'INTERNAL',

  // Configuration errors
  INVALID_CONFIG = 'INVALID_CONFIG',
  MISSING_PRIMARY_KEY = 'MISSING_PRIMARY_KEY',

  // Key consistency errors
  MISSING_KEY = 'MISSING_KEY',
  KEY_MISMATCH = 'KEY_MISMATCH',

  // Transaction errors
  TRANSACTION_ERROR = 'TRANSACTION_ERROR',
  COMMIT_CONFLICT = 'COMMIT_CONFLICT',
  RETRIES_EXHAUSTED = 'RETRIES_EXHAUSTED',
  INVALID_STATE = 'INVALID_STATE',

  // Storage errors
  STORAGE_ERROR = 'STORAGE_ERROR',
}

// =============================================================================
// Serialized Error Format
// =============================================================================

/**
 * Serializable error format
 */
export interface SerializedError {
  /** Error class name */
  name: string
  /** Error code for programmatic handling */
  code: ErrorCode
  /** Human-readable error message */
  message: string
  /** Stack trace (included outside production) */
  stack?: string | undefined
  /** Additional context data */
  context?: Record<string, unknown> | undefined
  /** Serialized cause (if error chaining) */
  cause?: SerializedError | undefined
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all versioning errors.
 *
 * @example
 * ```typescript
 * throw new HistoryError('Operation failed', ErrorCode.INTERNAL, {
 *   operation: 'patch',
 *   collection: 'contacts'
 * })
 * ```
 */
export class HistoryError extends Error {
  override readonly name: string = 'HistoryError'
  readonly code: ErrorCode
  readonly context: Record<string, unknown>
  override readonly cause?: Error | undefined

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message)
    this.code = code
    this.context = context ?? {}
    this.cause = cause
    Object.setPrototypeOf(this, new.target.prototype)
  }

  /**
   * Serialize error for logging or transport
   */
  toJSON(): SerializedError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      stack: process.env.NODE_ENV !== 'production' ? this.stack : undefined,
      context: Object.keys(this.context).length > 0 ? this.context : undefined,
      cause: this.cause instanceof HistoryError ? this.cause.toJSON() : undefined,
    }
  }

  /**
   * Check if error matches a specific code
   */
  is(code: ErrorCode): boolean {
    return this.code === code
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

/**
 * Error thrown when a record-type handler is configured incorrectly.
 * Not recoverable: raised at construction time.
 */
export class ConfigurationError extends HistoryError {
  override readonly name = 'ConfigurationError'
  /** Option that failed validation */
  readonly option: string | undefined

  constructor(
    message: string,
    context?: { option?: string; value?: unknown; collection?: string },
    code: ErrorCode = ErrorCode.INVALID_CONFIG
  ) {
    super(message, code, context)
    this.option = context?.option
    Object.setPrototypeOf(this, ConfigurationError.prototype)
  }
}

/**
 * Error thrown when a record type declares no primary-key fields.
 */
export class MissingPrimaryKeyError extends ConfigurationError {
  constructor(collection: string) {
    super(
      `Collection "${collection}" is missing a primary key declaration`,
      { option: 'primaryKey', collection },
      ErrorCode.MISSING_PRIMARY_KEY
    )
    Object.setPrototypeOf(this, MissingPrimaryKeyError.prototype)
  }
}

// =============================================================================
// Key Consistency Errors
// =============================================================================

/**
 * Error thrown when primary-key fields are missing from a record, or when
 * two records being compared disagree on a primary-key value.
 */
export class KeyConsistencyError extends HistoryError {
  override readonly name = 'KeyConsistencyError'
  /** Primary-key fields at fault */
  readonly fields: readonly string[]
  /** Conflicting values, one entry per compared record */
  readonly values: readonly unknown[]

  constructor(
    message: string,
    code: ErrorCode.MISSING_KEY | ErrorCode.KEY_MISMATCH,
    fields: readonly string[],
    values: readonly unknown[] = []
  ) {
    super(message, code, { fields, values })
    this.fields = fields
    this.values = values
    Object.setPrototypeOf(this, KeyConsistencyError.prototype)
  }

  /**
   * Primary-key fields absent from a record
   */
  static missing(fields: readonly string[]): KeyConsistencyError {
    return new KeyConsistencyError(
      `Keys not present: ${fields.join(', ')}`,
      ErrorCode.MISSING_KEY,
      fields
    )
  }

  /**
   * Records disagree on the value of a primary-key field
   */
  static mismatch(field: string, values: readonly unknown[]): KeyConsistencyError {
    return new KeyConsistencyError(
      `Differing keys present for "${field}": ${values.map(v => JSON.stringify(v)).join(' != ')}`,
      ErrorCode.KEY_MISMATCH,
      [field],
      values
    )
  }
}

// =============================================================================
// Transaction Errors
// =============================================================================

/**
 * Error codes for transaction operations
 */
export type TransactionErrorCode =
  | ErrorCode.COMMIT_CONFLICT
  | ErrorCode.RETRIES_EXHAUSTED
  | ErrorCode.INVALID_STATE
  | ErrorCode.TRANSACTION_ERROR

/**
 * Transaction-specific error class
 */
export class TransactionError extends HistoryError {
  override readonly name = 'TransactionError'
  readonly transactionId: string | undefined

  constructor(
    message: string,
    code: TransactionErrorCode = ErrorCode.TRANSACTION_ERROR,
    transactionId?: string,
    cause?: Error
  ) {
    super(message, code, transactionId ? { transactionId } : undefined, cause)
    this.transactionId = transactionId
    Object.setPrototypeOf(this, TransactionError.prototype)
  }

  /**
   * Whether the transaction layer may run the callback again
   */
  get retryable(): boolean {
    return this.code === ErrorCode.COMMIT_CONFLICT
  }

  /**
   * Check if an error is a TransactionError
   */
  static isTransactionError(error: unknown): error is TransactionError {
    return error instanceof TransactionError
  }
}

// =============================================================================
// Storage Errors
// =============================================================================

/**
 * Error thrown when the document store cannot serve a request.
 */
export class StorageError extends HistoryError {
  override readonly name = 'StorageError'

  constructor(message: string, context?: Record<string, unknown>, cause?: Error) {
    super(message, ErrorCode.STORAGE_ERROR, context, cause)
    Object.setPrototypeOf(this, StorageError.prototype)
  }
}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if a value is a HistoryError
 */
export function isHistoryError(error: unknown): error is HistoryError {
  return error instanceof HistoryError
}

/**
 * Check if a value is a KeyConsistencyError
 */
export function isKeyConsistencyError(error: unknown): error is KeyConsistencyError {
  return error instanceof KeyConsistencyError
}

/**
 * Check if a value is a ConfigurationError
 */
export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError
}
