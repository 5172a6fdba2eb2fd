/**
 * Document store adapter interface
 *
 * The versioning layer never talks to a database directly. It reads and
 * writes two named collections per record type (the live collection and
 * its `<name>_deltas` companion) through this interface, and groups the
 * writes of one patch into a single store transaction.
 */

import type { Filter, UpdateSpec } from './filter'
import type { Document, DocumentId } from './history'

// =============================================================================
// Results
// =============================================================================

export interface InsertOneResult {
  readonly acknowledged: boolean
  readonly insertedId: DocumentId
}

export interface UpdateResult {
  readonly acknowledged: boolean
  readonly matchedCount: number
  readonly modifiedCount: number
}

export interface DeleteResult {
  readonly acknowledged: boolean
  readonly deletedCount: number
}

// =============================================================================
// Collections
// =============================================================================

/**
 * CRUD surface of one named collection
 */
export interface DocumentCollection {
  /** Collection name */
  readonly name: string

  findOne(filter: Filter): Promise<Document | null>

  find(filter: Filter): Promise<Document[]>

  /** Insert a document; the store assigns `_id` when it is absent */
  insertOne(doc: Document): Promise<InsertOneResult>

  /** Replace the first match, keeping its `_id` */
  replaceOne(filter: Filter, doc: Document): Promise<UpdateResult>

  updateMany(filter: Filter, update: UpdateSpec): Promise<UpdateResult>

  deleteMany(filter: Filter): Promise<DeleteResult>
}

// =============================================================================
// Transactions
// =============================================================================

/**
 * Consistency requested for a transaction
 */
export interface TransactionConsistency {
  readonly readConcern: 'local' | 'majority' | 'snapshot'
  readonly writeConcern: {
    readonly w: 'majority' | number
    /** Bound on the wait for write acknowledgement */
    readonly wtimeoutMS: number
  }
  readonly readPreference: 'primary'
}

/**
 * Collections as seen from inside a transaction: reads observe the
 * transaction's own writes, writes become visible to others only when the
 * transaction commits
 */
export interface TransactionScope {
  collection(name: string): DocumentCollection
}

/**
 * A document store that can run several operations atomically
 */
export interface DocumentStore {
  /** Collection handle outside of any transaction */
  collection(name: string): DocumentCollection

  /**
   * Run `callback` so that either all of its writes apply or none do.
   *
   * The store may invoke the callback more than once when it conflicts with
   * a concurrent transaction; the callback must re-read whatever it depends
   * on through the scope it is given.
   */
  runInTransaction<T>(
    callback: (scope: TransactionScope) => Promise<T>,
    consistency: TransactionConsistency
  ): Promise<T>
}
