/**
 * HistoricalCollection
 *
 * Record-type handler: a live collection plus its paired `<name>_deltas`
 * collection, both reached through an injected DocumentStore. Every write
 * goes through the versioning engine so that past states can be read back
 * by timestamp or by version.
 *
 * @example
 * ```typescript
 * import { HistoricalCollection, MemoryDocumentStore, consoleLogger } from 'versioned-collections'
 *
 * const contacts = new HistoricalCollection({
 *   name: 'contacts',
 *   primaryKey: ['email'],
 *   store: new MemoryDocumentStore(),
 *   logger: consoleLogger,
 * })
 *
 * await contacts.patchOne({ email: 'a@example.com', name: 'Ada' })
 * await contacts.patchOne({ email: 'a@example.com', name: 'Ada L.' }, { metadata: { by: 'import' } })
 *
 * const before = await contacts.getRevisionByVersion(1, 0, { email: 'a@example.com' })
 * ```
 */

import { resolveHistoryConfig, type HistoryConfig, type HistoryConfigOptions } from './config'
import {
  deleteDocAndPatches,
  getRevisionByDate,
  getRevisionByVersion,
  listRevisions,
  patchMany,
  patchOne,
  type HistoryContext,
  type PatchManyOptions,
  type PatchOptions,
} from './history'
import type { Filter } from './types/filter'
import type { BulkOutcome, Document, EraseOutcome, PatchOutcome, RevisionInfo } from './types/history'
import type { DocumentCollection, DocumentStore } from './types/storage'
import { noopLogger, scopedLogger, type Logger } from './utils/logger'

/**
 * Construction options of a HistoricalCollection
 */
export interface HistoricalCollectionOptions extends HistoryConfigOptions {
  /** Name of the live collection */
  name: string
  /** Ordered primary-key field names (required, non-empty) */
  primaryKey: readonly string[]
  /** Store holding both collections */
  store: DocumentStore
  logger?: Logger | undefined
  /** Source of write timestamps (default: wall clock) */
  clock?: (() => Date) | undefined
}

export class HistoricalCollection {
  readonly config: HistoryConfig
  private readonly store: DocumentStore
  private readonly ctx: HistoryContext

  /**
   * @throws ConfigurationError for a missing primary key or any invalid option
   */
  constructor(options: HistoricalCollectionOptions) {
    this.config = resolveHistoryConfig(options.name, options.primaryKey, options)
    this.store = options.store
    this.ctx = {
      config: this.config,
      logger: scopedLogger(options.logger ?? noopLogger, this.config.name),
      now: options.clock ?? (() => new Date()),
    }
  }

  get name(): string {
    return this.config.name
  }

  /** Live collection */
  get live(): DocumentCollection {
    return this.store.collection(this.config.name)
  }

  /** Delta collection */
  get deltas(): DocumentCollection {
    return this.store.collection(this.config.deltasName)
  }

  // ===========================================================================
  // Writes
  // ===========================================================================

  /**
   * Version one record
   *
   * @returns null when nothing changed and `force` is not set
   * @throws KeyConsistencyError when the record lacks a primary-key field
   */
  async patchOne(record: Document, options: PatchOptions = {}): Promise<PatchOutcome | null> {
    return patchOne(this.store, this.ctx, record, options)
  }

  /**
   * Version a batch of records, optionally flagging live records missing
   * from the batch as deleted
   */
  async patchMany(records: readonly Document[], options: PatchManyOptions = {}): Promise<BulkOutcome[]> {
    return patchMany(this.store, this.ctx, records, options)
  }

  /**
   * Erase a record and its entire history. Unlike the `deleted` flag this
   * cannot be undone.
   */
  async deleteDocAndPatches(record: Document): Promise<EraseOutcome> {
    return deleteDocAndPatches(this.store, this.ctx, record)
  }

  // ===========================================================================
  // Reads
  // ===========================================================================

  /**
   * The record as it was at `at`, or null if it did not exist then
   */
  async getRevisionByDate(record: Document, at: Date): Promise<Document | null> {
    return getRevisionByDate(this.live, this.deltas, this.ctx, record, at)
  }

  /**
   * The state tagged `{major, minor}`; pass `record` to search only its chain
   */
  async getRevisionByVersion(major: number, minor: number, record?: Document): Promise<Document | null> {
    return getRevisionByVersion(this.live, this.deltas, this.ctx, major, minor, record)
  }

  /**
   * Revisions of a record, newest first
   */
  async revisions(record: Document): Promise<RevisionInfo[]> {
    return listRevisions(this.live, this.deltas, this.ctx, record)
  }

  async findOne(filter: Filter = {}): Promise<Document | null> {
    return this.live.findOne(filter)
  }

  async find(filter: Filter = {}): Promise<Document[]> {
    return this.live.find(filter)
  }
}
