/**
 * Chain-scoped hard delete
 *
 * @module history/erase
 */

import { ID_FIELD } from '../constants'
import type { Document, EraseOutcome } from '../types/history'
import type { DocumentStore } from '../types/storage'
import { deltaKeyFilter, keyFilter, liveHeader } from './chain'
import type { HistoryContext } from './context'
import { primaryKeyOf } from './diff'
import { walkChain } from './revisions'

/**
 * Erase a record and its whole history
 *
 * Deletes, in one transaction, the live record and every delta entry that
 * is either on its chain or carries its key. Not recoverable.
 */
export async function deleteDocAndPatches(
  store: DocumentStore,
  ctx: HistoryContext,
  record: Document
): Promise<EraseOutcome> {
  const { config } = ctx
  const key = primaryKeyOf(record, config.primaryKey)

  const outcome = await store.runInTransaction(async scope => {
    const live = scope.collection(config.name)
    const deltas = scope.collection(config.deltasName)

    const current = await live.findOne(keyFilter(key))
    const header = current ? liveHeader(current, config.internalMetadataKeyname) : null
    const chain = header ? await walkChain(deltas, ctx, header.previousDelta) : []

    const removedRecords = await live.deleteMany(keyFilter(key))
    const removedDeltas = await deltas.deleteMany({
      $or: [
        { [ID_FIELD]: { $in: chain.map(entry => entry.id) } },
        deltaKeyFilter(key, config.internalMetadataKeyname),
      ],
    })

    return { deletedRecords: removedRecords.deletedCount, deletedDeltas: removedDeltas.deletedCount }
  }, config.transaction)

  ctx.logger.info(
    `Erased ${outcome.deletedRecords} record(s) and ${outcome.deletedDeltas} delta entries from "${config.name}"`,
    key
  )
  return outcome
}
