/**
 * Revision listing
 *
 * @module history/revisions
 */

import type { DeltaEntry, Document, DocumentId, RevisionInfo } from '../types/history'
import type { DocumentCollection } from '../types/storage'
import { keyFilter, liveHeader, loadDelta } from './chain'
import type { HistoryContext } from './context'
import { primaryKeyOf } from './diff'

/**
 * Walk a record's chain backward from the live record
 *
 * Stops at the origin, at a dangling or malformed entry, or on a cycle.
 */
export async function walkChain(
  deltas: DocumentCollection,
  ctx: HistoryContext,
  start: DocumentId | null
): Promise<DeltaEntry[]> {
  const entries: DeltaEntry[] = []
  const seen = new Set<DocumentId>()
  let id = start

  while (id !== null && id !== undefined) {
    if (seen.has(id)) {
      ctx.logger.warn(`Cycle in delta chain of "${deltas.name}" at ${String(id)}`)
      break
    }
    seen.add(id)

    const entry = await loadDelta(deltas, id, ctx)
    if (!entry) break

    entries.push(entry)
    id = entry.header.previousDelta
  }

  return entries
}

/**
 * List the revisions of a record, newest first
 */
export async function listRevisions(
  live: DocumentCollection,
  deltas: DocumentCollection,
  ctx: HistoryContext,
  record: Document
): Promise<RevisionInfo[]> {
  const current = await live.findOne(keyFilter(primaryKeyOf(record, ctx.config.primaryKey)))
  const header = current ? liveHeader(current, ctx.config.internalMetadataKeyname) : null
  if (!header) return []

  const entries = await walkChain(deltas, ctx, header.previousDelta)
  return entries.map(entry => ({
    id: entry.id,
    type: entry.header.type,
    version: entry.header.version,
    timestamp: entry.header.timestamp,
    metadata: entry.header.metadata,
  }))
}
