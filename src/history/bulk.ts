/**
 * Bulk Patch Coordinator
 *
 * Versions a batch of records one transaction per record, then optionally
 * flags every live record missing from the batch as deleted. Nothing is
 * atomic across records, and the trailing mark-deleted update runs outside
 * the per-record transactions.
 *
 * @module history/bulk
 */

import { ID_FIELD } from '../constants'
import type { Filter } from '../types/filter'
import type {
  BulkOutcome,
  CallerMetadata,
  Document,
  MarkDeletedOutcome,
  PatchOutcome,
  PrimaryKeyValues,
} from '../types/history'
import type { DocumentCollection, DocumentStore } from '../types/storage'
import { keyFilter } from './chain'
import type { HistoryContext } from './context'
import { primaryKeyOf } from './diff'
import { patchRecord, type PatchOptions } from './patch'

/**
 * Options of a bulk patch
 */
export interface PatchManyOptions {
  /** Flag live records whose key is not in the batch as deleted */
  missingMarkDeleted?: boolean | undefined
  /** Restricts which missing records get flagged */
  missingMarkDeletedFilter?: Filter | undefined
  /** Caller metadata for every write, including the deleted flag */
  metadata?: CallerMetadata | undefined
  force?: boolean | undefined
  ignoreFields?: readonly string[] | undefined
}

/**
 * Version one record in its own transaction
 */
export async function patchOne(
  store: DocumentStore,
  ctx: HistoryContext,
  record: Document,
  options: PatchOptions = {}
): Promise<PatchOutcome | null> {
  // Key problems surface before any transaction starts
  const key = primaryKeyOf(record, ctx.config.primaryKey)
  return store.runInTransaction(
    scope => patchRecord(scope, ctx, record, key, options),
    ctx.config.transaction
  )
}

/**
 * Version a batch of records
 *
 * @returns one outcome per write that changed something, followed by the
 * mark-deleted outcome when requested
 */
export async function patchMany(
  store: DocumentStore,
  ctx: HistoryContext,
  records: readonly Document[],
  options: PatchManyOptions = {}
): Promise<BulkOutcome[]> {
  const outcomes: BulkOutcome[] = []
  const keys: PrimaryKeyValues[] = []

  for (const record of records) {
    keys.push(primaryKeyOf(record, ctx.config.primaryKey))
    const outcome = await patchOne(store, ctx, record, {
      force: options.force,
      ignoreFields: options.ignoreFields,
      metadata: options.metadata,
    })
    if (outcome) outcomes.push(outcome)
  }

  if (options.missingMarkDeleted) {
    const live = store.collection(ctx.config.name)
    outcomes.push(await markMissingDeleted(live, ctx, keys, options.missingMarkDeletedFilter ?? {}, options.metadata ?? null))
  }

  return outcomes
}

/**
 * Set the `deleted` stamp on every not-yet-deleted live record whose key is
 * not among `keys` and that matches `filter`. Header-only: no delta entry
 * is written and record fields stay as they are.
 */
export async function markMissingDeleted(
  live: DocumentCollection,
  ctx: HistoryContext,
  keys: readonly PrimaryKeyValues[],
  filter: Filter,
  metadata: CallerMetadata
): Promise<MarkDeletedOutcome> {
  const metaKey = ctx.config.internalMetadataKeyname

  const clauses: Filter[] = []
  if (keys.length > 0) {
    clauses.push({ $nor: keys.map(keyFilter) })
  }
  clauses.push({ [`${metaKey}.deleted.timestamp`]: null })
  clauses.push(filter)

  const missing = await live.find({ $and: clauses })
  const ids = missing.map(doc => doc[ID_FIELD])

  if (ids.length === 0) {
    ctx.logger.info(`No missing records to mark deleted in "${live.name}"`)
    return { kind: 'marked-deleted', ids, matchedCount: 0, modifiedCount: 0 }
  }

  const result = await live.updateMany(
    { [ID_FIELD]: { $in: ids } },
    { $set: { [`${metaKey}.deleted`]: { timestamp: ctx.now(), metadata } } }
  )

  ctx.logger.info(`Marked ${result.modifiedCount} missing record(s) deleted in "${live.name}"`)
  return { kind: 'marked-deleted', ids, matchedCount: result.matchedCount, modifiedCount: result.modifiedCount }
}
