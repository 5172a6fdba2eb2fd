/**
 * Patch/Snapshot Orchestrator
 *
 * Runs inside one store transaction per incoming record. Compares the
 * incoming state with the stored one and decides between:
 * - create: no stored record yet; write the initial snapshot, then the record
 * - no-op: nothing changed and the write is not forced
 * - patch: write a reverse-delta entry, bump `minor`, replace the record
 * - checkpoint: the last `numDeltasBeforeSnapshot - 1` entries hold no
 *   snapshot; write a snapshot of the incoming state instead, bump `major`
 *
 * The transaction layer may run the function again after a conflict, so
 * everything it writes is derived from what it reads in that attempt.
 *
 * @module history/patch
 */

import { ID_FIELD, ORIGIN_VERSION } from '../constants'
import type {
  CallerMetadata,
  Deltas,
  Document,
  DocumentId,
  MetadataHeader,
  PatchHeader,
  PatchOutcome,
  PrimaryKeyValues,
  SnapshotHeader,
} from '../types/history'
import type { DocumentCollection, TransactionScope } from '../types/storage'
import { keyFilter, liveHeader, loadDelta, recordFields } from './chain'
import type { HistoryContext } from './context'
import { createDeltas, isEmptyDelta } from './diff'
import { nextHeader, type HeaderTransition } from './header'

/**
 * Per-call options of a patch
 */
export interface PatchOptions {
  /** Write a (possibly empty) patch even when nothing changed */
  force?: boolean | undefined
  /** Fields left out of the comparison */
  ignoreFields?: readonly string[] | undefined
  /** Caller metadata recorded on the write */
  metadata?: CallerMetadata | undefined
}

interface WriteInput {
  readonly key: PrimaryKeyValues
  readonly fields: Document
  readonly metadata: CallerMetadata
  readonly timestamp: Date
}

// =============================================================================
// Orchestrator
// =============================================================================

/**
 * Version one incoming record
 *
 * @param scope - Collections of the running transaction
 * @param key - Primary-key tuple of `incoming`, already validated
 * @returns the write outcome, or null for a no-op write
 */
export async function patchRecord(
  scope: TransactionScope,
  ctx: HistoryContext,
  incoming: Document,
  key: PrimaryKeyValues,
  options: PatchOptions = {}
): Promise<PatchOutcome | null> {
  const { config } = ctx
  const metaKey = config.internalMetadataKeyname
  const live = scope.collection(config.name)
  const deltas = scope.collection(config.deltasName)

  const input: WriteInput = {
    key,
    fields: recordFields(incoming, metaKey),
    metadata: options.metadata ?? null,
    timestamp: ctx.now(),
  }

  const stored = await live.findOne(keyFilter(key))
  const header = stored ? liveHeader(stored, metaKey) : null

  if (!stored || !header) {
    return createRecord(live, deltas, ctx, input, stored)
  }

  const storedId = stored[ID_FIELD]
  const reverse = createDeltas(input.fields, stored, {
    primaryKey: config.primaryKey,
    internalMetadataKeyname: metaKey,
    ignoreFields: options.ignoreFields,
  })

  if (isEmptyDelta(reverse) && !options.force) {
    if (header.deleted) {
      await live.updateMany({ [ID_FIELD]: storedId }, { $set: { [`${metaKey}.deleted`]: null } })
      ctx.logger.debug(`Restored soft-deleted record in "${config.name}"`, key)
      return { kind: 'restored', id: storedId, version: header.version }
    }
    ctx.logger.debug(`No changes for record in "${config.name}"`, key)
    return null
  }

  const due = await checkpointDue(deltas, header.previousDelta, ctx)

  const transition: HeaderTransition = due
    ? { kind: 'snapshotted', previous: header, deltaId: await writeSnapshot(deltas, ctx, input, header) }
    : { kind: 'patched', previous: header, deltaId: await writePatch(deltas, ctx, input, header, reverse) }

  const next = nextHeader(transition, input.timestamp, input.metadata)
  await live.replaceOne({ [ID_FIELD]: storedId }, { ...input.fields, [metaKey]: next })

  if (transition.kind === 'snapshotted') {
    ctx.logger.debug(`Checkpoint for record in "${config.name}" at version ${next.version.major}.${next.version.minor}`, key)
    return { kind: 'snapshotted', id: storedId, deltaId: transition.deltaId, version: next.version }
  }

  ctx.logger.debug(`Patched record in "${config.name}" to version ${next.version.major}.${next.version.minor}`, key)
  return { kind: 'patched', id: storedId, deltaId: transition.deltaId, version: next.version, deltas: reverse }
}

// =============================================================================
// Writes
// =============================================================================

/**
 * First version of a record: the initial snapshot, then the live record.
 * A stored document without a header is replaced in place.
 */
async function createRecord(
  live: DocumentCollection,
  deltas: DocumentCollection,
  ctx: HistoryContext,
  input: WriteInput,
  headerless: Document | null
): Promise<PatchOutcome> {
  const metaKey = ctx.config.internalMetadataKeyname

  const origin: SnapshotHeader = {
    type: 'snapshot',
    version: ORIGIN_VERSION,
    timestamp: input.timestamp,
    previousDelta: null,
    metadata: null,
    key: input.key,
  }
  const { insertedId: deltaId } = await deltas.insertOne({ ...input.fields, [metaKey]: origin })

  const header = nextHeader({ kind: 'created', deltaId }, input.timestamp, input.metadata)
  const doc = { ...input.fields, [metaKey]: header }

  let id: DocumentId
  if (headerless) {
    id = headerless[ID_FIELD]
    await live.replaceOne({ [ID_FIELD]: id }, doc)
  } else {
    id = (await live.insertOne(doc)).insertedId
  }

  ctx.logger.debug(`Created record in "${ctx.config.name}"`, input.key)
  return { kind: 'created', id, deltaId, version: header.version }
}

/**
 * Reverse-delta entry for a regular write. It carries the version and the
 * caller metadata of the state it reconstructs.
 */
async function writePatch(
  deltas: DocumentCollection,
  ctx: HistoryContext,
  input: WriteInput,
  previous: MetadataHeader,
  reverse: Deltas
): Promise<DocumentId> {
  const header: PatchHeader = {
    type: 'patch',
    deltas: reverse,
    version: previous.version,
    timestamp: input.timestamp,
    previousDelta: previous.previousDelta,
    metadata: previous.updated.metadata,
    key: input.key,
  }
  const result = await deltas.insertOne({ [ctx.config.internalMetadataKeyname]: header })
  return result.insertedId
}

/**
 * Checkpoint entry: the full incoming state, tagged with the stored version
 */
async function writeSnapshot(
  deltas: DocumentCollection,
  ctx: HistoryContext,
  input: WriteInput,
  previous: MetadataHeader
): Promise<DocumentId> {
  const header: SnapshotHeader = {
    type: 'snapshot',
    version: previous.version,
    timestamp: input.timestamp,
    previousDelta: previous.previousDelta,
    metadata: input.metadata,
    key: input.key,
  }
  const result = await deltas.insertOne({ ...input.fields, [ctx.config.internalMetadataKeyname]: header })
  return result.insertedId
}

// =============================================================================
// Checkpoint Policy
// =============================================================================

/**
 * Whether the next write must be a checkpoint
 *
 * Walks back from the live record's newest entry for at most
 * `numDeltasBeforeSnapshot - 1` entries. A snapshot within that budget,
 * or a chain that ends or breaks first, means a patch is enough.
 */
export async function checkpointDue(
  deltas: DocumentCollection,
  start: DocumentId | null,
  ctx: HistoryContext
): Promise<boolean> {
  const budget = ctx.config.numDeltasBeforeSnapshot
  let id = start
  let hops = 1

  while (hops < budget) {
    if (id === null) return false

    const entry = await loadDelta(deltas, id, ctx)
    if (!entry || entry.header.type === 'snapshot') return false

    id = entry.header.previousDelta
    if (id === null) return false

    hops++
  }

  return true
}
