/**
 * Constants
 *
 * Centralized defaults used throughout the codebase.
 * Eliminates magic numbers and provides single source of truth.
 */

// =============================================================================
// Versioning
// =============================================================================

/**
 * Default checkpoint interval: at most this many reverse deltas separate
 * the live record from the nearest snapshot
 */
export const DEFAULT_NUM_DELTAS_BEFORE_SNAPSHOT = 5

/**
 * Default name of the field that carries the metadata header on live
 * records and delta entries
 */
export const DEFAULT_INTERNAL_METADATA_KEYNAME = '__HISTORICAL_COLLECTION_INTERNAL_METADATA'

/**
 * Suffix of the delta collection paired with each live collection
 */
export const DELTAS_COLLECTION_SUFFIX = '_deltas'

/**
 * Identity field assigned by the document store
 */
export const ID_FIELD = '_id'

/**
 * Version the initial snapshot is tagged with
 */
export const ORIGIN_VERSION = { major: 0, minor: 0 } as const

/**
 * Version of a freshly created live record
 */
export const INITIAL_VERSION = { major: 1, minor: 0 } as const

// =============================================================================
// Transactions
// =============================================================================

/**
 * Default write acknowledgement timeout in milliseconds
 */
export const DEFAULT_WRITE_TIMEOUT_MS = 1000

/**
 * Default consistency requested for every versioning transaction:
 * local reads, majority-acknowledged commits, primary reads
 */
export const DEFAULT_TRANSACTION_CONSISTENCY = {
  readConcern: 'local',
  writeConcern: { w: 'majority', wtimeoutMS: DEFAULT_WRITE_TIMEOUT_MS },
  readPreference: 'primary',
} as const

/**
 * Maximum number of retries after a commit conflict (in-memory store)
 */
export const DEFAULT_MAX_RETRIES = 5

/**
 * Base delay between transaction retries in milliseconds (in-memory store)
 */
export const DEFAULT_TRANSACTION_RETRY_DELAY = 5

/**
 * Upper bound for a single retry delay in milliseconds
 */
export const DEFAULT_RETRY_MAX_DELAY = 250
