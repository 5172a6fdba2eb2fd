/**
 * Bulk Patch Coordinator Tests
 */

import { describe, it, expect, beforeEach } from 'vitest'
import type { HistoricalCollection } from '../../../src/HistoricalCollection'
import type { MemoryDocumentStore } from '../../../src/storage/MemoryDocumentStore'
import { DEFAULT_INTERNAL_METADATA_KEYNAME } from '../../../src/constants'
import { KeyConsistencyError } from '../../../src/errors'
import type { BulkOutcome, Document } from '../../../src/types/history'
import {
  TEST_EPOCH,
  createTestCollection,
  headerOf,
  type RecordingLogger,
  type TestClock,
} from '../../factories'

const M = DEFAULT_INTERNAL_METADATA_KEYNAME

function kinds(outcomes: BulkOutcome[]): string[] {
  return outcomes.map(outcome => outcome.kind)
}

describe('patchMany', () => {
  let collection: HistoricalCollection
  let store: MemoryDocumentStore
  let clock: TestClock
  let logger: RecordingLogger

  beforeEach(() => {
    ({ collection, store, clock, logger } = createTestCollection())
  })

  async function liveId(filter: Document): Promise<unknown> {
    const live = await collection.findOne(filter)
    return live?._id
  }

  it('versions every record of the batch', async () => {
    const outcomes = await collection.patchMany([{ id: 1, a: 1 }, { id: 2, a: 2 }, { id: 3, a: 3 }])

    expect(kinds(outcomes)).toEqual(['created', 'created', 'created'])
    expect(await collection.find()).toHaveLength(3)
  })

  it('leaves unchanged records out of the outcomes', async () => {
    await collection.patchMany([{ id: 1, a: 1 }, { id: 2, a: 2 }])

    const outcomes = await collection.patchMany([{ id: 1, a: 1 }, { id: 2, a: 5 }])

    expect(kinds(outcomes)).toEqual(['patched'])
  })

  it('passes force and ignoreFields to every write', async () => {
    await collection.patchMany([{ id: 1, a: 1, seen: 1 }])

    const ignored = await collection.patchMany([{ id: 1, a: 1, seen: 2 }], { ignoreFields: ['seen'] })
    const forced = await collection.patchMany([{ id: 1, a: 1, seen: 1 }], { force: true })

    expect(ignored).toEqual([])
    expect(kinds(forced)).toEqual(['patched'])
  })

  it('rejects a record without its primary key', async () => {
    await expect(collection.patchMany([{ a: 1 }])).rejects.toBeInstanceOf(KeyConsistencyError)
  })

  describe('missingMarkDeleted', () => {
    beforeEach(async () => {
      await collection.patchMany([{ id: 1, a: 1 }, { id: 2, a: 2 }, { id: 3, a: 3 }])
    })

    it('flags live records absent from the batch', async () => {
      const t1 = clock.advance()

      const outcomes = await collection.patchMany([{ id: 1, a: 1 }, { id: 2, a: 5 }], {
        missingMarkDeleted: true,
        metadata: { source: 'sync' },
      })

      expect(outcomes).toHaveLength(2)
      expect(outcomes[0]?.kind).toBe('patched')
      expect(outcomes[1]).toEqual({
        kind: 'marked-deleted',
        ids: [await liveId({ id: 3 })],
        matchedCount: 1,
        modifiedCount: 1,
      })
      expect(headerOf(await collection.findOne({ id: 3 })).deleted).toEqual({
        timestamp: t1,
        metadata: { source: 'sync' },
      })
      expect(headerOf(await collection.findOne({ id: 1 })).deleted).toBeNull()
      expect(logger.messages('info')).toEqual(['[contacts] Marked 1 missing record(s) deleted in "contacts"'])
    })

    it('changes neither the record fields nor the history', async () => {
      await collection.patchMany([{ id: 1, a: 1 }], { missingMarkDeleted: true })

      const flagged = await collection.findOne({ id: 3 })
      expect(flagged).toMatchObject({ id: 3, a: 3 })
      expect(headerOf(flagged).version).toEqual({ major: 1, minor: 0 })
      expect(await store.collection('contacts_deltas').find({ [`${M}.key.id`]: 3 })).toHaveLength(1)
    })

    it('does not flag a record twice', async () => {
      await collection.patchMany([{ id: 1, a: 1 }], { missingMarkDeleted: true })
      clock.advance()

      const outcomes = await collection.patchMany([{ id: 1, a: 1 }], { missingMarkDeleted: true })

      expect(outcomes).toEqual([{ kind: 'marked-deleted', ids: [], matchedCount: 0, modifiedCount: 0 }])
      expect(headerOf(await collection.findOne({ id: 2 })).deleted?.timestamp).toEqual(TEST_EPOCH)
      expect(logger.messages('info')).toEqual([
        '[contacts] Marked 2 missing record(s) deleted in "contacts"',
        '[contacts] No missing records to mark deleted in "contacts"',
      ])
    })

    it('flags every live record for an empty batch', async () => {
      const outcomes = await collection.patchMany([], { missingMarkDeleted: true })

      expect(outcomes).toEqual([
        {
          kind: 'marked-deleted',
          ids: [await liveId({ id: 1 }), await liveId({ id: 2 }), await liveId({ id: 3 })],
          matchedCount: 3,
          modifiedCount: 3,
        },
      ])
      expect(headerOf(await collection.findOne({ id: 1 })).deleted).toEqual({ timestamp: TEST_EPOCH, metadata: null })
    })

    it('is undone by writing the record again', async () => {
      await collection.patchMany([{ id: 1, a: 1 }], { missingMarkDeleted: true })

      const outcome = await collection.patchOne({ id: 3, a: 3 })

      expect(outcome?.kind).toBe('restored')
      expect(headerOf(await collection.findOne({ id: 3 })).deleted).toBeNull()
    })
  })

  it('restricts flagging to records matching the filter', async () => {
    await collection.patchMany([
      { id: 1, group: 'a' },
      { id: 2, group: 'b' },
      { id: 3, group: 'a' },
    ])

    const outcomes = await collection.patchMany([{ id: 1, group: 'a' }], {
      missingMarkDeleted: true,
      missingMarkDeletedFilter: { group: 'a' },
    })

    expect(outcomes).toEqual([
      { kind: 'marked-deleted', ids: [await liveId({ id: 3 })], matchedCount: 1, modifiedCount: 1 },
    ])
    expect(headerOf(await collection.findOne({ id: 2 })).deleted).toBeNull()
  })

  it('matches missing records on the whole composite key', async () => {
    const composite = createTestCollection({ primaryKey: ['tenant', 'id'] })
    await composite.collection.patchMany([
      { tenant: 'x', id: 1 },
      { tenant: 'y', id: 1 },
      { tenant: 'x', id: 2 },
    ])

    const outcomes = await composite.collection.patchMany([{ tenant: 'x', id: 1 }], { missingMarkDeleted: true })

    const y1 = await composite.collection.findOne({ tenant: 'y', id: 1 })
    const x2 = await composite.collection.findOne({ tenant: 'x', id: 2 })
    expect(outcomes).toEqual([
      { kind: 'marked-deleted', ids: [y1?._id, x2?._id], matchedCount: 2, modifiedCount: 2 },
    ])
  })
})
