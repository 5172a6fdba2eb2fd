/**
 * Chain Walker: by version
 *
 * Reconstructs the state tagged with a `{major, minor}` version. A snapshot
 * with that tag is returned as stored. For a patch, the walk goes forward
 * (following the entries whose `previousDelta` points back) to the next
 * snapshot or to the live record, and the stored payloads of the collected
 * patches are applied from there back to the target.
 *
 * @module history/as-of-version
 */

import { ID_FIELD } from '../constants'
import type { CallerMetadata, DeltaEntry, Document, DocumentId, PatchHeader, Version } from '../types/history'
import type { Filter } from '../types/filter'
import type { DocumentCollection } from '../types/storage'
import { applyDelta, deltaKeyFilter, keyFilter, liveHeader, recordFields, toDeltaEntry } from './chain'
import type { HistoryContext } from './context'
import { primaryKeyOf } from './diff'

function withVersion(fields: Document, metaKey: string, version: Version, metadata: CallerMetadata): Document {
  return { ...fields, [metaKey]: { version, metadata } }
}

/**
 * Reconstruct the state tagged `{major, minor}`
 *
 * Without `record` the lookup spans the whole collection and the first
 * matching entry wins; with it, only that record's chain is searched.
 * A version that no entry carries resolves to a live record at that
 * version, if any.
 *
 * @returns record fields (no `_id`) plus a `{ version, metadata }` header,
 * or null when no path to the version exists
 */
export async function getRevisionByVersion(
  live: DocumentCollection,
  deltas: DocumentCollection,
  ctx: HistoryContext,
  major: number,
  minor: number,
  record?: Document
): Promise<Document | null> {
  const metaKey = ctx.config.internalMetadataKeyname
  const key = record ? primaryKeyOf(record, ctx.config.primaryKey) : null

  const versionFilter: Filter = {
    [`${metaKey}.version.major`]: major,
    [`${metaKey}.version.minor`]: minor,
  }

  const startDoc = await deltas.findOne(key ? { ...versionFilter, ...deltaKeyFilter(key, metaKey) } : versionFilter)
  if (!startDoc) {
    const current = await live.findOne(key ? { ...versionFilter, ...keyFilter(key) } : versionFilter)
    const header = current ? liveHeader(current, metaKey) : null
    if (!current || !header) return null
    return withVersion(recordFields(current, metaKey), metaKey, header.version, header.updated.metadata)
  }

  const start = toDeltaEntry(startDoc, metaKey)
  if (!start) {
    ctx.logger.warn(`Malformed delta entry ${String(startDoc[ID_FIELD])} in "${deltas.name}"`)
    return null
  }

  if (start.header.type === 'snapshot') {
    return withVersion(start.fields, metaKey, start.header.version, start.header.metadata)
  }

  // Forward walk: collect patches until a snapshot
  const patches: DeltaEntry<PatchHeader>[] = [{ ...start, header: start.header }]
  const seen = new Set<DocumentId>([start.id])
  let base: Document | null = null
  let lastId = start.id

  for (;;) {
    const nextDoc = await deltas.findOne({ [`${metaKey}.previousDelta`]: lastId })
    if (!nextDoc) break

    const next = toDeltaEntry(nextDoc, metaKey)
    if (!next) {
      ctx.logger.warn(`Malformed delta entry ${String(nextDoc[ID_FIELD])} in "${deltas.name}"`)
      return null
    }
    if (seen.has(next.id)) {
      ctx.logger.warn(`Cycle in delta chain of "${deltas.name}" at ${String(next.id)}`)
      return null
    }
    seen.add(next.id)

    if (next.header.type === 'snapshot') {
      base = next.fields
      break
    }
    patches.push({ ...next, header: next.header })
    lastId = next.id
  }

  if (!base) {
    const current = await live.findOne({ [`${metaKey}.previousDelta`]: lastId })
    if (!current) {
      ctx.logger.warn(`No snapshot or live record follows delta ${String(lastId)} in "${deltas.name}"`)
      return null
    }
    base = recordFields(current, metaKey)
  }

  const revision = { ...base }
  for (const patch of patches.reverse()) {
    applyDelta(revision, patch.header.deltas, ctx.logger)
  }

  return withVersion(revision, metaKey, start.header.version, start.header.metadata)
}
