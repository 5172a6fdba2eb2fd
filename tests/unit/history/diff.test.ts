/**
 * Diff Engine Tests
 *
 * `a` is always the newer state and `b` the older one: the reverse delta,
 * applied to `a`, must give back `b`.
 */

import { describe, it, expect } from 'vitest'
import {
  additions,
  checkKeys,
  createDeltas,
  isEmptyDelta,
  primaryKeyOf,
  removals,
  updates,
  type DiffOptions,
} from '../../../src/history/diff'
import { applyDelta } from '../../../src/history/chain'
import { ErrorCode, KeyConsistencyError } from '../../../src/errors'
import { createRecordingLogger } from '../../factories'

const options: DiffOptions = {
  primaryKey: ['id'],
  internalMetadataKeyname: '__meta',
}

describe('Diff Engine', () => {
  // ===========================================================================
  // Field Differences
  // ===========================================================================

  describe('additions', () => {
    it('returns fields only the older record has, with their old values', () => {
      expect(additions({ id: 1, a: 2 }, { id: 1, a: 1, b: 3 }, options)).toEqual({ b: 3 })
    })

    it('ignores the identity and metadata fields', () => {
      expect(additions({ id: 1 }, { id: 1, _id: 'x', __meta: { version: 1 } }, options)).toEqual({})
    })
  })

  describe('removals', () => {
    it('returns names of fields only the newer record has', () => {
      expect(removals({ id: 1, a: 2, c: 4 }, { id: 1, a: 1 }, options)).toEqual(['c'])
    })

    it('ignores the identity and metadata fields', () => {
      expect(removals({ id: 1, _id: 'x', __meta: {} }, { id: 1 }, options)).toEqual([])
    })
  })

  describe('updates', () => {
    it('returns changed fields with their old values', () => {
      expect(updates({ id: 1, a: 2, c: 4 }, { id: 1, a: 1, c: 4 }, options)).toEqual({ a: 1 })
    })

    it('skips fields whose old value is undefined', () => {
      expect(updates({ id: 1, a: 2 }, { id: 1, a: undefined }, options)).toEqual({})
    })

    it('compares nested values structurally', () => {
      expect(updates({ id: 1, tags: ['a', 'b'] }, { id: 1, tags: ['a', 'b'] }, options)).toEqual({})
      expect(updates({ id: 1, address: { city: 'Oslo' } }, { id: 1, address: { city: 'Bergen' } }, options))
        .toEqual({ address: { city: 'Bergen' } })
    })

    it('compares dates by time', () => {
      const older = { id: 1, seen: new Date('2024-01-01T00:00:00.000Z') }
      const newer = { id: 1, seen: new Date('2024-01-01T00:00:00.000Z') }
      expect(updates(newer, older, options)).toEqual({})
    })
  })

  // ===========================================================================
  // Reverse Deltas
  // ===========================================================================

  describe('createDeltas', () => {
    it('builds the delta that turns the newer state back into the older one', () => {
      const deltas = createDeltas({ id: 1, a: 2, b: 9 }, { id: 1, a: 1 }, options)
      expect(deltas).toEqual({ added: {}, updated: { a: 1 }, removed: ['b'] })

      const doc = { id: 1, a: 2, b: 9 }
      applyDelta(doc, deltas, createRecordingLogger())
      expect(doc).toEqual({ id: 1, a: 1 })
    })

    it('swapping the arguments gives the forward delta', () => {
      const deltas = createDeltas({ id: 1, a: 1 }, { id: 1, a: 2, b: 9 }, options)
      expect(deltas).toEqual({ added: { b: 9 }, updated: { a: 2 }, removed: [] })

      const doc = { id: 1, a: 1 }
      applyDelta(doc, deltas, createRecordingLogger())
      expect(doc).toEqual({ id: 1, a: 2, b: 9 })
    })

    it('leaves out ignored fields', () => {
      const deltas = createDeltas(
        { id: 1, a: 2, syncedAt: 5 },
        { id: 1, a: 1, syncedAt: 4 },
        { ...options, ignoreFields: ['syncedAt'] }
      )
      expect(deltas).toEqual({ added: {}, updated: { a: 1 }, removed: [] })
    })

    it('tracks fields named like built-in object members', () => {
      expect(createDeltas({ id: 1, constructor: 'c' }, { id: 1 }, options))
        .toEqual({ added: {}, updated: {}, removed: ['constructor'] })
      expect(createDeltas({ id: 1 }, { id: 1, toString: 'x' }, options))
        .toEqual({ added: { toString: 'x' }, updated: {}, removed: [] })
      expect(createDeltas({ id: 1, valueOf: 2 }, { id: 1, valueOf: 1 }, options))
        .toEqual({ added: {}, updated: { valueOf: 1 }, removed: [] })
    })

    it('is empty for equal records', () => {
      const deltas = createDeltas({ id: 1, a: 1, _id: 'new' }, { id: 1, a: 1, _id: 'old' }, options)
      expect(isEmptyDelta(deltas)).toBe(true)
    })
  })

  // ===========================================================================
  // Keys
  // ===========================================================================

  describe('primary keys', () => {
    it('extracts the key tuple in declaration order', () => {
      expect(primaryKeyOf({ b: 2, a: 1, c: 3 }, ['a', 'b'])).toEqual({ a: 1, b: 2 })
    })

    it('lists every missing key field', () => {
      try {
        primaryKeyOf({ a: 1 }, ['id', 'region'])
        expect.unreachable('primaryKeyOf should throw')
      } catch (error) {
        expect(error).toBeInstanceOf(KeyConsistencyError)
        if (!(error instanceof KeyConsistencyError)) return
        expect(error.message).toBe('Keys not present: id, region')
        expect(error.code).toBe(ErrorCode.MISSING_KEY)
        expect(error.fields).toEqual(['id', 'region'])
      }
    })

    it('does not find a key field on the object prototype', () => {
      expect(() => primaryKeyOf({ id: 1 }, ['constructor'])).toThrow('Keys not present: constructor')
    })

    it('rejects records that disagree on a key value', () => {
      expect(() => additions({ id: 1 }, { id: 2 }, options)).toThrow('Differing keys present for "id": 1 != 2')
      expect(() => removals({ id: 'a' }, { id: 'b' }, options)).toThrow('Differing keys present for "id": "a" != "b"')
    })

    it('reports the conflicting values', () => {
      try {
        checkKeys(['id', 'region'], { id: 1, region: 'eu' }, { id: 1, region: 'us' })
        expect.unreachable('checkKeys should throw')
      } catch (error) {
        expect(error).toBeInstanceOf(KeyConsistencyError)
        if (!(error instanceof KeyConsistencyError)) return
        expect(error.code).toBe(ErrorCode.KEY_MISMATCH)
        expect(error.fields).toEqual(['region'])
        expect(error.values).toEqual(['eu', 'us'])
      }
    })

    it('accepts records with equal keys', () => {
      expect(() => checkKeys(['id'], { id: 1, a: 1 }, { id: 1, a: 2 })).not.toThrow()
    })
  })
})

describe('applyDelta', () => {
  it('skips and logs removal of a field the document lacks', () => {
    const logger = createRecordingLogger()
    const doc: Record<string, unknown> = { id: 1, a: 1 }

    applyDelta(doc, { added: { b: 2 }, updated: {}, removed: ['z'] }, logger)

    expect(doc).toEqual({ id: 1, a: 1, b: 2 })
    expect(logger.messages('warn')).toEqual(['Field "z" was not present in the document; skipping removal'])
  })

  it('removes an own field named like a built-in object member', () => {
    const logger = createRecordingLogger()
    const doc: Record<string, unknown> = { id: 1, hasOwnProperty: 'x' }

    applyDelta(doc, { added: {}, updated: {}, removed: ['hasOwnProperty', 'toString'] }, logger)

    expect(doc).toEqual({ id: 1 })
    expect(logger.messages('warn')).toEqual(['Field "toString" was not present in the document; skipping removal'])
  })
})
