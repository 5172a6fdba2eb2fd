/**
 * Metadata Header Transition Tests
 */

import { describe, it, expect } from 'vitest'
import { nextHeader } from '../../../src/history/header'
import type { MetadataHeader } from '../../../src/types/history'

const t0 = new Date('2024-01-01T00:00:00.000Z')
const t1 = new Date('2024-01-02T00:00:00.000Z')

const stored: MetadataHeader = {
  previousDelta: 'd1',
  version: { major: 2, minor: 3 },
  created: { timestamp: t0, metadata: { by: 'import' } },
  updated: { timestamp: t0, metadata: { by: 'import' } },
  deleted: { timestamp: t0, metadata: null },
}

describe('nextHeader', () => {
  it('starts a new record at version 1.0', () => {
    expect(nextHeader({ kind: 'created', deltaId: 'd0' }, t1, { by: 'api' })).toEqual({
      previousDelta: 'd0',
      version: { major: 1, minor: 0 },
      created: { timestamp: t1, metadata: { by: 'api' } },
      updated: { timestamp: t1, metadata: { by: 'api' } },
      deleted: null,
    })
  })

  it('bumps minor on a patch and keeps created', () => {
    expect(nextHeader({ kind: 'patched', previous: stored, deltaId: 'd2' }, t1, null)).toEqual({
      previousDelta: 'd2',
      version: { major: 2, minor: 4 },
      created: { timestamp: t0, metadata: { by: 'import' } },
      updated: { timestamp: t1, metadata: null },
      deleted: null,
    })
  })

  it('bumps major and resets minor on a checkpoint', () => {
    const next = nextHeader({ kind: 'snapshotted', previous: stored, deltaId: 'd3' }, t1, null)
    expect(next.version).toEqual({ major: 3, minor: 0 })
    expect(next.previousDelta).toBe('d3')
    expect(next.deleted).toBeNull()
  })

  it('does not touch the previous header', () => {
    nextHeader({ kind: 'patched', previous: stored, deltaId: 'd2' }, t1, null)
    expect(stored.version).toEqual({ major: 2, minor: 3 })
    expect(stored.previousDelta).toBe('d1')
  })
})
