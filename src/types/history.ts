/**
 * Data model of the versioning layer
 *
 * Live records carry a MetadataHeader under the configured internal
 * metadata key. Every write appends a DeltaEntry (snapshot or reverse
 * patch) to the paired `<name>_deltas` collection; the entries form a
 * singly linked list through `previousDelta`, newest first.
 */

// =============================================================================
// Documents
// =============================================================================

/**
 * A stored or incoming document: a mapping of field names to values
 */
export type Document = Record<string, unknown>

/**
 * Identity assigned by the document store (`_id`). A generated string in
 * MemoryDocumentStore, an ObjectId under MongoDB.
 */
export type DocumentId = unknown

/**
 * Primary-key tuple of a record, keyed by primary-key field name
 */
export type PrimaryKeyValues = Record<string, unknown>

/**
 * Caller-supplied metadata attached to writes (who, why, source...)
 */
export type CallerMetadata = Record<string, unknown> | null

// =============================================================================
// Versions and Stamps
// =============================================================================

/**
 * Record version. `major` increments when a checkpoint snapshot is taken,
 * `minor` on every patch since the last checkpoint.
 */
export interface Version {
  readonly major: number
  readonly minor: number
}

/**
 * Time and caller metadata of a lifecycle event
 */
export interface Stamp {
  readonly timestamp: Date
  readonly metadata: CallerMetadata
}

// =============================================================================
// Live Record Header
// =============================================================================

/**
 * Header embedded in every live record
 */
export interface MetadataHeader {
  /** Newest delta entry; reconstructs the state before the last write */
  readonly previousDelta: DocumentId | null
  readonly version: Version
  /** Set once when the record is first written */
  readonly created: Stamp
  /** Overwritten on every successful write */
  readonly updated: Stamp
  /** Soft-delete flag set by patchMany's mark-deleted path */
  readonly deleted: Stamp | null
}

// =============================================================================
// Delta Entries
// =============================================================================

/**
 * Field-level reverse delta: applied to the state after a write, it
 * produces the state before that write
 */
export interface Deltas {
  /** Fields to set back (absent in the newer state) */
  readonly added: Document
  /** Fields to set back to their older value */
  readonly updated: Document
  /** Fields to drop (absent in the older state) */
  readonly removed: readonly string[]
}

/**
 * Delta entry kinds
 */
export type DeltaType = 'snapshot' | 'patch'

interface DeltaHeaderBase {
  /** Version the record held before the write that created the entry */
  readonly version: Version
  /** Time of the write that produced the entry */
  readonly timestamp: Date
  /** Next older entry, null at the origin */
  readonly previousDelta: DocumentId | null
  readonly metadata: CallerMetadata
  /** Primary key of the record the entry belongs to */
  readonly key: PrimaryKeyValues
}

/**
 * Header of a full-state entry; the record fields sit beside the header
 */
export interface SnapshotHeader extends DeltaHeaderBase {
  readonly type: 'snapshot'
}

/**
 * Header of a reverse-delta entry
 */
export interface PatchHeader extends DeltaHeaderBase {
  readonly type: 'patch'
  readonly deltas: Deltas
}

export type DeltaHeader = SnapshotHeader | PatchHeader

/**
 * A delta entry as read back from the store
 */
export interface DeltaEntry<H extends DeltaHeader = DeltaHeader> {
  readonly id: DocumentId
  readonly header: H
  /** Record fields captured by a snapshot; empty for patches */
  readonly fields: Document
}

// =============================================================================
// Write Outcomes
// =============================================================================

interface OutcomeBase {
  /** Store identity of the live record */
  readonly id: DocumentId
  /** Version of the live record after the write */
  readonly version: Version
}

/** First write of a primary key: initial snapshot + live record */
export interface CreatedOutcome extends OutcomeBase {
  readonly kind: 'created'
  readonly deltaId: DocumentId
}

/** Regular write: reverse-delta entry + replaced live record */
export interface PatchedOutcome extends OutcomeBase {
  readonly kind: 'patched'
  readonly deltaId: DocumentId
  readonly deltas: Deltas
}

/** Checkpoint write: snapshot entry + replaced live record */
export interface SnapshottedOutcome extends OutcomeBase {
  readonly kind: 'snapshotted'
  readonly deltaId: DocumentId
}

/** Unchanged write to a soft-deleted record: deleted flag cleared */
export interface RestoredOutcome extends OutcomeBase {
  readonly kind: 'restored'
}

export type PatchOutcome = CreatedOutcome | PatchedOutcome | SnapshottedOutcome | RestoredOutcome

/** Result of patchMany's mark-deleted pass */
export interface MarkDeletedOutcome {
  readonly kind: 'marked-deleted'
  readonly ids: readonly DocumentId[]
  readonly matchedCount: number
  readonly modifiedCount: number
}

export type BulkOutcome = PatchOutcome | MarkDeletedOutcome

/** Result of deleteDocAndPatches */
export interface EraseOutcome {
  readonly deletedRecords: number
  readonly deletedDeltas: number
}

/**
 * One entry of a record's history, as listed by revisions()
 */
export interface RevisionInfo {
  readonly id: DocumentId
  readonly type: DeltaType
  readonly version: Version
  readonly timestamp: Date
  readonly metadata: CallerMetadata
}
