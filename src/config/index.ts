/**
 * Configuration
 *
 * Resolves the options a HistoricalCollection is constructed with into a
 * validated configuration, and reads overrides from environment variables.
 *
 * Environment variables (all optional):
 * - HISTORY_NUM_DELTAS_BEFORE_SNAPSHOT: checkpoint interval
 * - HISTORY_INTERNAL_METADATA_KEYNAME: header field name
 * - HISTORY_WRITE_TIMEOUT_MS: majority write acknowledgement timeout
 *
 * @module config
 */

import {
  DEFAULT_INTERNAL_METADATA_KEYNAME,
  DEFAULT_NUM_DELTAS_BEFORE_SNAPSHOT,
  DEFAULT_TRANSACTION_CONSISTENCY,
  DELTAS_COLLECTION_SUFFIX,
} from '../constants'
import { ConfigurationError, MissingPrimaryKeyError } from '../errors'
import type { TransactionConsistency } from '../types/storage'

// =============================================================================
// Types
// =============================================================================

/**
 * Tunables of the versioning engine
 */
export interface HistoryConfigOptions {
  /** Checkpoint interval (default: 5) */
  numDeltasBeforeSnapshot?: number | undefined
  /** Field that carries the metadata header (default: __HISTORICAL_COLLECTION_INTERNAL_METADATA) */
  internalMetadataKeyname?: string | undefined
  /** Overrides of the transaction consistency */
  transaction?: Partial<TransactionConsistency> | undefined
}

/**
 * Validated configuration of one record type
 */
export interface HistoryConfig {
  readonly name: string
  readonly deltasName: string
  readonly primaryKey: readonly string[]
  readonly numDeltasBeforeSnapshot: number
  readonly internalMetadataKeyname: string
  readonly transaction: TransactionConsistency
}

// =============================================================================
// Resolution
// =============================================================================

/**
 * Validate options and fill in defaults
 *
 * @throws MissingPrimaryKeyError when no primary-key field is declared
 * @throws ConfigurationError for any other invalid option
 */
export function resolveHistoryConfig(
  name: string,
  primaryKey: readonly string[] | undefined,
  options: HistoryConfigOptions = {}
): HistoryConfig {
  if (!name) {
    throw new ConfigurationError('Collection name must be a non-empty string', { option: 'name', value: name })
  }

  if (!primaryKey || primaryKey.length === 0) {
    throw new MissingPrimaryKeyError(name)
  }

  const blank = primaryKey.find(field => typeof field !== 'string' || field.length === 0)
  if (blank !== undefined) {
    throw new ConfigurationError(`Collection "${name}" declares an empty primary-key field`, {
      option: 'primaryKey',
      value: primaryKey,
      collection: name,
    })
  }

  if (new Set(primaryKey).size !== primaryKey.length) {
    throw new ConfigurationError(`Collection "${name}" declares a primary-key field twice`, {
      option: 'primaryKey',
      value: primaryKey,
      collection: name,
    })
  }

  const numDeltasBeforeSnapshot = options.numDeltasBeforeSnapshot ?? DEFAULT_NUM_DELTAS_BEFORE_SNAPSHOT
  if (!Number.isInteger(numDeltasBeforeSnapshot) || numDeltasBeforeSnapshot < 1) {
    throw new ConfigurationError('numDeltasBeforeSnapshot must be a positive integer', {
      option: 'numDeltasBeforeSnapshot',
      value: numDeltasBeforeSnapshot,
      collection: name,
    })
  }

  const internalMetadataKeyname = options.internalMetadataKeyname ?? DEFAULT_INTERNAL_METADATA_KEYNAME
  if (!internalMetadataKeyname || internalMetadataKeyname.startsWith('$') || internalMetadataKeyname.includes('.')) {
    throw new ConfigurationError('internalMetadataKeyname must be a non-empty field name without "." or a leading "$"', {
      option: 'internalMetadataKeyname',
      value: internalMetadataKeyname,
      collection: name,
    })
  }

  if (primaryKey.includes(internalMetadataKeyname)) {
    throw new ConfigurationError('internalMetadataKeyname cannot be a primary-key field', {
      option: 'internalMetadataKeyname',
      value: internalMetadataKeyname,
      collection: name,
    })
  }

  const transaction: TransactionConsistency = {
    ...DEFAULT_TRANSACTION_CONSISTENCY,
    ...options.transaction,
  }
  if (!Number.isInteger(transaction.writeConcern.wtimeoutMS) || transaction.writeConcern.wtimeoutMS < 0) {
    throw new ConfigurationError('transaction.writeConcern.wtimeoutMS must be a non-negative integer', {
      option: 'transaction.writeConcern.wtimeoutMS',
      value: transaction.writeConcern.wtimeoutMS,
      collection: name,
    })
  }

  return {
    name,
    deltasName: `${name}${DELTAS_COLLECTION_SUFFIX}`,
    primaryKey: [...primaryKey],
    numDeltasBeforeSnapshot,
    internalMetadataKeyname,
    transaction,
  }
}

// =============================================================================
// Environment
// =============================================================================

function parseInteger(variable: string, raw: string): number {
  const value = Number(raw)
  if (raw.trim() === '' || !Number.isInteger(value)) {
    throw new ConfigurationError(`${variable} must be an integer, got "${raw}"`, { option: variable, value: raw })
  }
  return value
}

/**
 * Read configuration overrides from environment variables
 *
 * @example
 * ```typescript
 * const contacts = new HistoricalCollection({
 *   name: 'contacts',
 *   primaryKey: ['email'],
 *   store,
 *   ...loadHistoryConfigFromEnv(),
 * })
 * ```
 */
export function loadHistoryConfigFromEnv(env: NodeJS.ProcessEnv = process.env): HistoryConfigOptions {
  const options: HistoryConfigOptions = {}

  const interval = env.HISTORY_NUM_DELTAS_BEFORE_SNAPSHOT
  if (interval !== undefined) {
    options.numDeltasBeforeSnapshot = parseInteger('HISTORY_NUM_DELTAS_BEFORE_SNAPSHOT', interval)
  }

  const keyname = env.HISTORY_INTERNAL_METADATA_KEYNAME
  if (keyname !== undefined && keyname !== '') {
    options.internalMetadataKeyname = keyname
  }

  const timeout = env.HISTORY_WRITE_TIMEOUT_MS
  if (timeout !== undefined) {
    options.transaction = {
      writeConcern: {
        w: DEFAULT_TRANSACTION_CONSISTENCY.writeConcern.w,
        wtimeoutMS: parseInteger('HISTORY_WRITE_TIMEOUT_MS', timeout),
      },
    }
  }

  return options
}
