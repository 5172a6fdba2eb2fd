/**
 * Type definitions
 *
 * @module types
 */

export type * from './filter'
export type * from './history'
export type * from './storage'

export {
  isVersion,
  isCallerMetadata,
  parseDeltas,
  parseMetadataHeader,
  parseDeltaHeader,
} from './type-guards'
