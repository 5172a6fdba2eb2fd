/**
 * versioned-collections
 *
 * Temporal versioning for document collections: every write is kept as a
 * reverse delta or a periodic snapshot, so any past state of a record can
 * be read back by timestamp or by version.
 *
 * @packageDocumentation
 */

// Record-type handler
export { HistoricalCollection, type HistoricalCollectionOptions } from './HistoricalCollection'

// Versioning engine
export * from './history'

// Stores
export { MemoryDocumentStore, MongooseDocumentStore, type MemoryDocumentStoreOptions } from './storage'

// Configuration
export {
  resolveHistoryConfig,
  loadHistoryConfigFromEnv,
  type HistoryConfig,
  type HistoryConfigOptions,
} from './config'

// Errors
export {
  ErrorCode,
  HistoryError,
  ConfigurationError,
  MissingPrimaryKeyError,
  KeyConsistencyError,
  TransactionError,
  StorageError,
  isHistoryError,
  isKeyConsistencyError,
  isConfigurationError,
  type SerializedError,
  type TransactionErrorCode,
} from './errors'

// Transactions
export { withRetry, isRetryableError, type RetryInfo, type RetryOptions } from './transaction'

// Logging
export { consoleLogger, noopLogger, scopedLogger, type Logger } from './utils/logger'

// Constants
export {
  DEFAULT_NUM_DELTAS_BEFORE_SNAPSHOT,
  DEFAULT_INTERNAL_METADATA_KEYNAME,
  DEFAULT_TRANSACTION_CONSISTENCY,
  DELTAS_COLLECTION_SUFFIX,
} from './constants'

// Types
export * from './types'
