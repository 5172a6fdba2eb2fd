/**
 * Transaction retry helpers
 *
 * The versioning layer relies on the document store to run each write as
 * an all-or-nothing transaction and to re-run the callback when it loses a
 * race with a concurrent writer. MongoDB's driver does this itself; the
 * in-memory store uses withRetry() below.
 *
 * @example
 * ```typescript
 * const result = await withRetry(async (attempt) => {
 *   const tx = store.begin()
 *   const value = await work(tx)
 *   tx.commit()
 *   return value
 * }, { maxRetries: 3, retryDelay: 10 })
 * ```
 */

import {
  DEFAULT_MAX_RETRIES,
  DEFAULT_RETRY_MAX_DELAY,
  DEFAULT_TRANSACTION_RETRY_DELAY,
} from '../constants'
import { ErrorCode, TransactionError } from '../errors'
import { getSecureRandom } from '../utils/random'
import { noopLogger, type Logger } from '../utils/logger'

// =============================================================================
// Types
// =============================================================================

/**
 * Information passed to the onRetry callback
 */
export interface RetryInfo {
  /** The retry attempt number (1-indexed, so first retry is 1) */
  attempt: number
  /** The error that triggered the retry */
  error: unknown
  /** The delay in milliseconds before this retry */
  delay: number
}

/**
 * Retry behavior
 */
export interface RetryOptions {
  /** Maximum number of retries after the first attempt (default: 5) */
  maxRetries?: number | undefined
  /** Base delay in milliseconds, doubled on each retry (default: 5) */
  retryDelay?: number | undefined
  /** Upper bound for a single delay (default: 250) */
  maxDelay?: number | undefined
  /** Decide whether an error is worth another attempt */
  shouldRetry?: ((error: unknown) => boolean) | undefined
  /** Called before each retry */
  onRetry?: ((info: RetryInfo) => void) | undefined
  logger?: Logger | undefined
}

// =============================================================================
// Retry
// =============================================================================

/**
 * Default function to determine if an error is retryable
 */
export function isRetryableError(error: unknown): boolean {
  return error instanceof TransactionError && error.retryable
}

/**
 * Exponential backoff with jitter, capped at maxDelay
 */
function calculateDelay(attempt: number, baseDelay: number, maxDelay: number): number {
  const delay = baseDelay * Math.pow(2, attempt - 1) * (0.5 + getSecureRandom() * 0.5)
  return Math.floor(Math.min(Math.max(0, delay), maxDelay))
}

/**
 * Run `fn` until it succeeds, retrying retryable failures
 *
 * Each attempt receives its 1-indexed attempt number. A non-retryable
 * error is rethrown as is; running out of retries throws a TransactionError
 * with code RETRIES_EXHAUSTED whose cause is the last failure.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxRetries = DEFAULT_MAX_RETRIES,
    retryDelay = DEFAULT_TRANSACTION_RETRY_DELAY,
    maxDelay = DEFAULT_RETRY_MAX_DELAY,
    shouldRetry = isRetryableError,
    onRetry,
    logger = noopLogger,
  } = options

  let attempt = 0

  while (true) {
    attempt++
    try {
      return await fn(attempt)
    } catch (error) {
      if (!shouldRetry(error)) {
        throw error
      }

      if (attempt > maxRetries) {
        logger.error(`Transaction failed after ${attempt} attempts`, error)
        throw new TransactionError(
          `Transaction failed after ${attempt} attempts`,
          ErrorCode.RETRIES_EXHAUSTED,
          error instanceof TransactionError ? error.transactionId : undefined,
          error instanceof Error ? error : undefined
        )
      }

      const delay = calculateDelay(attempt, retryDelay, maxDelay)
      logger.warn(`Transaction conflict, retrying (attempt ${attempt + 1}) in ${delay}ms`)
      onRetry?.({ attempt, error, delay })
      await new Promise(resolve => setTimeout(resolve, delay))
    }
  }
}
