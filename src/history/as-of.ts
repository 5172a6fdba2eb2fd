/**
 * Chain Walker: by timestamp
 *
 * Reconstructs a record as it was at a point in time by walking the delta
 * chain backward from the live record and undoing every write made at or
 * after that time.
 *
 * @module history/as-of
 */

import { ID_FIELD } from '../constants'
import type { Deltas, Document } from '../types/history'
import type { DocumentCollection } from '../types/storage'
import { applyDelta, keyFilter, liveHeader, loadDelta, recordFields } from './chain'
import type { HistoryContext } from './context'
import { primaryKeyOf } from './diff'

/**
 * Find the live version of a record, by its store identity when it has
 * one, otherwise by primary key
 */
export async function findLive(
  live: DocumentCollection,
  ctx: HistoryContext,
  record: Document
): Promise<Document | null> {
  if (record[ID_FIELD] !== undefined && record[ID_FIELD] !== null) {
    return live.findOne({ [ID_FIELD]: record[ID_FIELD] })
  }
  return live.findOne(keyFilter(primaryKeyOf(record, ctx.config.primaryKey)))
}

/**
 * Reconstruct `record` as of `at`
 *
 * Walks back from the live record while entries are stamped at or after
 * `at`, collecting their reverse deltas. A snapshot on the way replaces the
 * base and drops what was collected so far. The walk stops at the first
 * entry stamped before `at` (a snapshot there becomes the base; a patch
 * there is a write that already happened and is left alone), at the origin,
 * or at a broken reference.
 *
 * @returns the record fields with the live record's `_id`, or null when the
 * record did not exist at `at`
 */
export async function getRevisionByDate(
  live: DocumentCollection,
  deltas: DocumentCollection,
  ctx: HistoryContext,
  record: Document,
  at: Date
): Promise<Document | null> {
  const metaKey = ctx.config.internalMetadataKeyname

  const current = await findLive(live, ctx, record)
  if (!current) return null

  const header = liveHeader(current, metaKey)
  if (!header) {
    ctx.logger.warn(`Record in "${live.name}" has no metadata header`)
    return null
  }
  if (header.created.timestamp > at) return null

  let base = recordFields(current, metaKey)
  let pending: Deltas[] = []
  const seen = new Set<unknown>()
  let id = header.previousDelta

  while (id !== null && id !== undefined) {
    if (seen.has(id)) {
      ctx.logger.warn(`Cycle in delta chain of "${deltas.name}" at ${String(id)}`)
      break
    }
    seen.add(id)

    const entry = await loadDelta(deltas, id, ctx)
    if (!entry) break

    if (entry.header.timestamp < at) {
      if (entry.header.type === 'snapshot') {
        base = entry.fields
        pending = []
      }
      break
    }

    if (entry.header.type === 'snapshot') {
      base = entry.fields
      pending = []
    } else {
      pending.push(entry.header.deltas)
    }

    id = entry.header.previousDelta
  }

  // Both bases are fresh copies; a shallow copy keeps driver value types
  const revision = { ...base }
  for (const delta of pending) {
    applyDelta(revision, delta, ctx.logger)
  }

  return { [ID_FIELD]: current[ID_FIELD], ...revision }
}
