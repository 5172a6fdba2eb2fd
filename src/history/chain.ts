/**
 * Delta chain access
 *
 * Helpers shared by the writer and both walkers: reading delta entries and
 * live headers out of stored documents, building key filters, and applying
 * a reverse delta to a working document.
 *
 * @module history/chain
 */

import { ID_FIELD } from '../constants'
import type { Filter } from '../types/filter'
import type {
  DeltaEntry,
  Deltas,
  Document,
  DocumentId,
  MetadataHeader,
  PrimaryKeyValues,
} from '../types/history'
import type { DocumentCollection } from '../types/storage'
import { parseDeltaHeader, parseMetadataHeader } from '../types/type-guards'
import type { Logger } from '../utils/logger'
import type { HistoryContext } from './context'

// =============================================================================
// Stored Documents
// =============================================================================

/**
 * Record fields of a stored document: everything except the store identity
 * and the metadata header
 */
export function recordFields(doc: Document, metaKey: string): Document {
  const fields: Document = {}
  for (const [field, value] of Object.entries(doc)) {
    if (field !== ID_FIELD && field !== metaKey) {
      fields[field] = value
    }
  }
  return fields
}

/**
 * Header of a live record, or null when it has none
 */
export function liveHeader(doc: Document, metaKey: string): MetadataHeader | null {
  return parseMetadataHeader(doc[metaKey])
}

/**
 * Interpret a stored document as a delta entry
 */
export function toDeltaEntry(doc: Document, metaKey: string): DeltaEntry | null {
  const header = parseDeltaHeader(doc[metaKey])
  if (!header) return null
  return {
    id: doc[ID_FIELD],
    header,
    fields: header.type === 'snapshot' ? recordFields(doc, metaKey) : {},
  }
}

/**
 * Fetch one delta entry by identity
 *
 * A missing entry (dangling reference) or a malformed one is logged as a
 * chain anomaly and reported as null.
 */
export async function loadDelta(
  deltas: DocumentCollection,
  id: DocumentId,
  ctx: HistoryContext
): Promise<DeltaEntry | null> {
  const doc = await deltas.findOne({ [ID_FIELD]: id })
  if (!doc) {
    ctx.logger.warn(`Dangling delta reference ${String(id)} in "${deltas.name}"`)
    return null
  }
  const entry = toDeltaEntry(doc, ctx.config.internalMetadataKeyname)
  if (!entry) {
    ctx.logger.warn(`Malformed delta entry ${String(id)} in "${deltas.name}"`)
  }
  return entry
}

// =============================================================================
// Filters
// =============================================================================

/**
 * Filter selecting a live record by primary key
 */
export function keyFilter(key: PrimaryKeyValues): Filter {
  return { ...key }
}

/**
 * Filter selecting the delta entries that belong to a primary key
 */
export function deltaKeyFilter(key: PrimaryKeyValues, metaKey: string): Filter {
  return Object.fromEntries(
    Object.entries(key).map(([field, value]) => [`${metaKey}.key.${field}`, value])
  )
}

// =============================================================================
// Applying Deltas
// =============================================================================

/**
 * Apply one stored delta to a working document in place: set every
 * `added`/`updated` field to its stored value, then drop every `removed`
 * field. Removing a field the document lacks is logged and skipped.
 */
export function applyDelta(doc: Document, deltas: Deltas, logger: Logger): void {
  for (const [field, value] of Object.entries(deltas.added)) {
    doc[field] = value
  }
  for (const [field, value] of Object.entries(deltas.updated)) {
    doc[field] = value
  }
  for (const field of deltas.removed) {
    if (!Object.hasOwn(doc, field)) {
      logger.warn(`Field "${field}" was not present in the document; skipping removal`)
      continue
    }
    delete doc[field]
  }
}
