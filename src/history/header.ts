/**
 * Metadata header transitions
 *
 * The header of a live record is an immutable value. Every write computes
 * the next header from a tagged transition in one place and stores it
 * together with the record fields; nothing edits a header field by field.
 *
 * @module history/header
 */

import { INITIAL_VERSION } from '../constants'
import type { CallerMetadata, DocumentId, MetadataHeader } from '../types/history'

/**
 * How a write moves a record's header forward
 */
export type HeaderTransition =
  /** First write of a primary key, after the initial snapshot */
  | { readonly kind: 'created'; readonly deltaId: DocumentId }
  /** Regular write, after a reverse-delta entry */
  | { readonly kind: 'patched'; readonly previous: MetadataHeader; readonly deltaId: DocumentId }
  /** Checkpoint write, after a snapshot entry */
  | { readonly kind: 'snapshotted'; readonly previous: MetadataHeader; readonly deltaId: DocumentId }

/**
 * Compute the header a write leaves on the live record
 *
 * `created` is set on the first write and carried over afterwards;
 * `updated` always records this write; a write clears `deleted`.
 */
export function nextHeader(
  transition: HeaderTransition,
  timestamp: Date,
  metadata: CallerMetadata
): MetadataHeader {
  const stamp = { timestamp, metadata }

  switch (transition.kind) {
    case 'created':
      return {
        previousDelta: transition.deltaId,
        version: INITIAL_VERSION,
        created: stamp,
        updated: stamp,
        deleted: null,
      }

    case 'patched':
      return {
        previousDelta: transition.deltaId,
        version: {
          major: transition.previous.version.major,
          minor: transition.previous.version.minor + 1,
        },
        created: transition.previous.created,
        updated: stamp,
        deleted: null,
      }

    case 'snapshotted':
      return {
        previousDelta: transition.deltaId,
        version: {
          major: transition.previous.version.major + 1,
          minor: 0,
        },
        created: transition.previous.created,
        updated: stamp,
        deleted: null,
      }
  }
}

