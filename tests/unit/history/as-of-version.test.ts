/**
 * Chain Walker Tests: by version
 */

import { describe, it, expect, beforeEach } from 'vitest'
import type { HistoricalCollection } from '../../../src/HistoricalCollection'
import type { MemoryDocumentStore } from '../../../src/storage/MemoryDocumentStore'
import { DEFAULT_INTERNAL_METADATA_KEYNAME } from '../../../src/constants'
import { createTestCollection, type RecordingLogger } from '../../factories'

const M = DEFAULT_INTERNAL_METADATA_KEYNAME

describe('getRevisionByVersion', () => {
  let collection: HistoricalCollection
  let store: MemoryDocumentStore
  let logger: RecordingLogger

  beforeEach(async () => {
    ({ collection, store, logger } = createTestCollection())
  })

  describe('within one checkpoint interval', () => {
    beforeEach(async () => {
      await collection.patchOne({ id: 1, a: 1 }, { metadata: { step: 0 } })
      await collection.patchOne({ id: 1, a: 2 }, { metadata: { step: 1 } })
      await collection.patchOne({ id: 1, a: 2, b: 9 }, { metadata: { step: 2 } })
    })

    it('reproduces the state submitted at each minor version', async () => {
      expect(await collection.getRevisionByVersion(1, 0)).toEqual({
        id: 1,
        a: 1,
        [M]: { version: { major: 1, minor: 0 }, metadata: { step: 0 } },
      })
      expect(await collection.getRevisionByVersion(1, 1)).toEqual({
        id: 1,
        a: 2,
        [M]: { version: { major: 1, minor: 1 }, metadata: { step: 1 } },
      })
    })

    it('resolves the current version to the live record', async () => {
      expect(await collection.getRevisionByVersion(1, 2)).toEqual({
        id: 1,
        a: 2,
        b: 9,
        [M]: { version: { major: 1, minor: 2 }, metadata: { step: 2 } },
      })
    })

    it('returns the initial snapshot as stored', async () => {
      expect(await collection.getRevisionByVersion(0, 0)).toEqual({
        id: 1,
        a: 1,
        [M]: { version: { major: 0, minor: 0 }, metadata: null },
      })
    })

    it('returns null for a version that never existed', async () => {
      expect(await collection.getRevisionByVersion(7, 0)).toBeNull()
    })
  })

  it('scopes the lookup to one record when given', async () => {
    await collection.patchOne({ id: 1, a: 1 })
    await collection.patchOne({ id: 1, a: 2 })
    await collection.patchOne({ id: 2, a: 10 })
    await collection.patchOne({ id: 2, a: 20 })

    expect(await collection.getRevisionByVersion(1, 0, { id: 2 })).toMatchObject({ id: 2, a: 10 })
    expect(await collection.getRevisionByVersion(1, 0, { id: 1 })).toMatchObject({ id: 1, a: 1 })
    expect(await collection.getRevisionByVersion(1, 1, { id: 2 })).toMatchObject({ id: 2, a: 20 })
  })

  describe('across a checkpoint', () => {
    let small: ReturnType<typeof createTestCollection>

    beforeEach(async () => {
      small = createTestCollection({ numDeltasBeforeSnapshot: 2 })
      for (const a of [1, 2, 3, 4]) {
        await small.collection.patchOne({ id: 1, a })
      }
    })

    it('walks forward to the checkpoint snapshot', async () => {
      expect(await small.collection.getRevisionByVersion(1, 0)).toMatchObject({
        id: 1,
        a: 1,
        [M]: { version: { major: 1, minor: 0 } },
      })
    })

    it('walks forward to the live record after the checkpoint', async () => {
      expect(await small.collection.getRevisionByVersion(2, 0)).toMatchObject({
        id: 1,
        a: 3,
        [M]: { version: { major: 2, minor: 0 } },
      })
    })

    it('returns a checkpoint snapshot as stored', async () => {
      expect(await small.collection.getRevisionByVersion(1, 1)).toMatchObject({
        id: 1,
        a: 3,
        [M]: { version: { major: 1, minor: 1 } },
      })
    })
  })

  it('drops the store identity from the result', async () => {
    await collection.patchOne({ id: 1, a: 1 })
    await collection.patchOne({ id: 1, a: 2 })

    const revision = await collection.getRevisionByVersion(1, 0)
    expect(revision).not.toHaveProperty('_id')
  })

  it('returns null when nothing follows a patch', async () => {
    await collection.patchOne({ id: 1, a: 1 })
    const patched = await collection.patchOne({ id: 1, a: 2 })
    await store.collection('contacts').deleteMany({ id: 1 })

    expect(await collection.getRevisionByVersion(1, 0)).toBeNull()
    const deltaId = patched?.kind === 'patched' ? patched.deltaId : undefined
    expect(logger.messages('warn')).toEqual([
      `[contacts] No snapshot or live record follows delta ${String(deltaId)} in "contacts_deltas"`,
    ])
  })
})
