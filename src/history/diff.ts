/**
 * Diff Engine
 *
 * Field-level difference between two versions of a record. `a` is the newer
 * state and `b` the older one: the resulting Deltas, applied to `a`,
 * reproduce `b`. Pure functions, no store access.
 *
 * @module history/diff
 */

import { ID_FIELD } from '../constants'
import { KeyConsistencyError } from '../errors'
import type { Deltas, Document, PrimaryKeyValues } from '../types/history'
import { deepEqual } from '../utils/comparison'

/**
 * What the diff functions need to know about the record type
 */
export interface DiffOptions {
  readonly primaryKey: readonly string[]
  readonly internalMetadataKeyname: string
  /** Extra fields excluded from comparison */
  readonly ignoreFields?: readonly string[] | undefined
}

function ignoredFields(options: DiffOptions): Set<string> {
  return new Set([ID_FIELD, options.internalMetadataKeyname, ...(options.ignoreFields ?? [])])
}

// =============================================================================
// Keys
// =============================================================================

/**
 * Extract the primary-key tuple of a record
 *
 * @throws KeyConsistencyError listing every primary-key field the record lacks
 */
export function primaryKeyOf(doc: Document, primaryKey: readonly string[]): PrimaryKeyValues {
  const missing = primaryKey.filter(field => !Object.hasOwn(doc, field))
  if (missing.length > 0) {
    throw KeyConsistencyError.missing(missing)
  }
  return Object.fromEntries(primaryKey.map(field => [field, doc[field]]))
}

/**
 * Verify that every record carries every primary-key field, with the same
 * value across records
 *
 * @throws KeyConsistencyError
 */
export function checkKeys(primaryKey: readonly string[], ...docs: Document[]): void {
  const keys = docs.map(doc => primaryKeyOf(doc, primaryKey))
  const [first, ...rest] = keys
  if (!first) return

  for (const field of primaryKey) {
    const other = rest.find(key => !deepEqual(key[field], first[field]))
    if (other) {
      throw KeyConsistencyError.mismatch(field, [first[field], other[field]])
    }
  }
}

// =============================================================================
// Field Differences
// =============================================================================

/**
 * Fields present in `b` but absent in `a`, with their values from `b`
 */
export function additions(a: Document, b: Document, options: DiffOptions): Document {
  checkKeys(options.primaryKey, a, b)
  const ignored = ignoredFields(options)
  return Object.fromEntries(
    Object.entries(b).filter(([field]) => !ignored.has(field) && !Object.hasOwn(a, field))
  )
}

/**
 * Names of fields present in `a` but absent in `b`
 */
export function removals(a: Document, b: Document, options: DiffOptions): string[] {
  checkKeys(options.primaryKey, a, b)
  const ignored = ignoredFields(options)
  return Object.keys(a).filter(field => !ignored.has(field) && !Object.hasOwn(b, field))
}

/**
 * Fields present in both whose value differs, with their values from `b`
 */
export function updates(a: Document, b: Document, options: DiffOptions): Document {
  const ignored = ignoredFields(options)
  return Object.fromEntries(
    Object.entries(b).filter(([field, value]) =>
      !ignored.has(field) && Object.hasOwn(a, field) && value !== undefined && !deepEqual(a[field], value)
    )
  )
}

/**
 * Reverse delta turning `newer` back into `older`
 *
 * @example
 * createDeltas({ id: 1, a: 2, b: 9 }, { id: 1, a: 1 }, options)
 * // { added: {}, updated: { a: 1 }, removed: ['b'] }
 */
export function createDeltas(newer: Document, older: Document, options: DiffOptions): Deltas {
  return {
    added: additions(newer, older, options),
    updated: updates(newer, older, options),
    removed: removals(newer, older, options),
  }
}

/**
 * True when a delta changes nothing
 */
export function isEmptyDelta(deltas: Deltas): boolean {
  return Object.keys(deltas.added).length === 0
    && Object.keys(deltas.updated).length === 0
    && deltas.removed.length === 0
}
