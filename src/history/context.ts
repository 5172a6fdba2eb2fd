/**
 * Shared context of the versioning functions
 *
 * @module history/context
 */

import type { HistoryConfig } from '../config'
import type { Logger } from '../utils/logger'

/**
 * Everything a versioning operation needs besides the store:
 * the record type's configuration, an injected logger, and the clock
 */
export interface HistoryContext {
  readonly config: HistoryConfig
  readonly logger: Logger
  readonly now: () => Date
}
