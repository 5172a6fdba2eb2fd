/**
 * Filter Evaluation Tests
 *
 * MongoDB-style matching used by the in-memory store.
 */

import { describe, it, expect } from 'vitest'
import { matchesCondition, matchesFilter } from '../../src/query/filter'

describe('matchesFilter', () => {
  const doc = {
    id: 7,
    name: 'Ada',
    tags: ['admin', 'ops'],
    meta: { deleted: null, version: { major: 1, minor: 2 } },
    seen: new Date('2024-03-01T00:00:00.000Z'),
  }

  it('matches everything with an empty filter', () => {
    expect(matchesFilter(doc, {})).toBe(true)
  })

  it('rejects non-objects', () => {
    expect(matchesFilter(null, { id: 7 })).toBe(false)
    expect(matchesFilter('x', { id: 7 })).toBe(false)
  })

  it('treats fields inherited from Object.prototype as missing', () => {
    expect(matchesFilter(doc, { toString: { $exists: true } })).toBe(false)
    expect(matchesFilter(doc, { constructor: null })).toBe(true)
    expect(matchesFilter({ id: 1, toString: 'x' }, { toString: 'x' })).toBe(true)
  })

  it('matches by equality on top-level and dotted fields', () => {
    expect(matchesFilter(doc, { id: 7, name: 'Ada' })).toBe(true)
    expect(matchesFilter(doc, { 'meta.version.minor': 2 })).toBe(true)
    expect(matchesFilter(doc, { 'meta.version.minor': 3 })).toBe(false)
  })

  it('treats null as matching null or missing', () => {
    expect(matchesFilter(doc, { 'meta.deleted': null })).toBe(true)
    expect(matchesFilter(doc, { 'meta.deleted.timestamp': null })).toBe(true)
    expect(matchesFilter(doc, { missing: null })).toBe(true)
    expect(matchesFilter(doc, { id: null })).toBe(false)
  })

  it('compares whole values structurally', () => {
    expect(matchesFilter(doc, { tags: ['admin', 'ops'] })).toBe(true)
    expect(matchesFilter(doc, { meta: { deleted: null, version: { major: 1, minor: 2 } } })).toBe(true)
  })

  it('supports comparison operators', () => {
    expect(matchesFilter(doc, { id: { $gt: 5, $lte: 7 } })).toBe(true)
    expect(matchesFilter(doc, { id: { $lt: 7 } })).toBe(false)
    expect(matchesFilter(doc, { seen: { $gte: new Date('2024-01-01T00:00:00.000Z') } })).toBe(true)
    expect(matchesFilter(doc, { missing: { $gt: 0 } })).toBe(false)
  })

  it('supports $in, $nin, $ne and $exists', () => {
    expect(matchesFilter(doc, { id: { $in: [1, 7] } })).toBe(true)
    expect(matchesFilter(doc, { id: { $nin: [1, 7] } })).toBe(false)
    expect(matchesFilter(doc, { name: { $ne: 'Bob' } })).toBe(true)
    expect(matchesFilter(doc, { name: { $exists: true } })).toBe(true)
    expect(matchesFilter(doc, { missing: { $exists: false } })).toBe(true)
  })

  it('supports logical operators', () => {
    expect(matchesFilter(doc, { $and: [{ id: 7 }, { name: 'Ada' }] })).toBe(true)
    expect(matchesFilter(doc, { $or: [{ id: 1 }, { name: 'Ada' }] })).toBe(true)
    expect(matchesFilter(doc, { $nor: [{ id: 1 }, { id: 2 }] })).toBe(true)
    expect(matchesFilter(doc, { $nor: [{ id: 1 }, { id: 7 }] })).toBe(false)
    expect(matchesFilter(doc, { $not: { id: 7 } })).toBe(false)
  })

  it('supports a field-level $not', () => {
    expect(matchesFilter(doc, { id: { $not: { $gt: 10 } } })).toBe(true)
  })

  it('throws on an unknown operator', () => {
    expect(() => matchesFilter(doc, { id: { $regex: 'x' } })).toThrow('Unknown query operator: $regex')
  })
})

describe('matchesCondition', () => {
  it('matches anything for an undefined condition', () => {
    expect(matchesCondition(42, undefined)).toBe(true)
  })
})
