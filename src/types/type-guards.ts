/**
 * Type guards for headers read back from a document store
 *
 * Stored documents are untyped; these guards narrow the header found under
 * the internal metadata key before the engine relies on it. A value that
 * does not satisfy a guard is treated as absent by the caller.
 */

import { isRecord } from '../utils/comparison'
import type {
  CallerMetadata,
  DeltaHeader,
  Deltas,
  MetadataHeader,
  Stamp,
  Version,
} from './history'

/**
 * Check for a `{ major, minor }` pair of integers
 */
export function isVersion(value: unknown): value is Version {
  return isRecord(value) && Number.isInteger(value.major) && Number.isInteger(value.minor)
}

/**
 * Check for caller metadata: a plain object or null
 */
export function isCallerMetadata(value: unknown): value is CallerMetadata {
  return value === null || isRecord(value)
}

function toStamp(value: Record<string, unknown>): Stamp | null {
  const { timestamp } = value
  const metadata = value.metadata ?? null
  if (!(timestamp instanceof Date) || !isCallerMetadata(metadata)) return null
  return { timestamp, metadata }
}

/**
 * Parse a reverse-delta payload, defaulting missing parts to empty
 */
export function parseDeltas(value: unknown): Deltas | null {
  if (!isRecord(value)) return null
  const added = value.added ?? {}
  const updated = value.updated ?? {}
  const removed = value.removed ?? []
  if (!isRecord(added) || !isRecord(updated)) return null
  if (!Array.isArray(removed) || !removed.every((f): f is string => typeof f === 'string')) return null
  return { added, updated, removed }
}

/**
 * Parse the header of a live record
 *
 * @returns the header, or null when it is missing or malformed
 */
export function parseMetadataHeader(value: unknown): MetadataHeader | null {
  if (!isRecord(value) || !isVersion(value.version)) return null
  if (!isRecord(value.created) || !isRecord(value.updated)) return null

  const created = toStamp(value.created)
  const updated = toStamp(value.updated)
  if (!created || !updated) return null

  let deleted: Stamp | null = null
  if (isRecord(value.deleted)) {
    deleted = toStamp(value.deleted)
  }

  return {
    previousDelta: value.previousDelta ?? null,
    version: { major: value.version.major, minor: value.version.minor },
    created,
    updated,
    deleted,
  }
}

/**
 * Parse the header of a delta entry
 *
 * @returns the header, or null when it is missing or malformed
 */
export function parseDeltaHeader(value: unknown): DeltaHeader | null {
  if (!isRecord(value) || !isVersion(value.version)) return null
  if (!(value.timestamp instanceof Date)) return null

  const metadata = value.metadata ?? null
  if (!isCallerMetadata(metadata)) return null

  const key = value.key ?? {}
  if (!isRecord(key)) return null

  const base = {
    version: { major: value.version.major, minor: value.version.minor },
    timestamp: value.timestamp,
    previousDelta: value.previousDelta ?? null,
    metadata,
    key,
  }

  if (value.type === 'snapshot') {
    return { ...base, type: 'snapshot' }
  }
  if (value.type === 'patch') {
    const deltas = parseDeltas(value.deltas)
    if (!deltas) return null
    return { ...base, type: 'patch', deltas }
  }
  return null
}
