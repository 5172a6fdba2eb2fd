/**
 * MemoryDocumentStore - In-memory implementation of DocumentStore
 *
 * Used for testing and for embedding the versioning layer without a
 * database. Transactions are optimistic: writes are buffered in the
 * transaction scope, reads inside the scope see those writes, and at commit
 * every read the callback performed is re-run against committed state. If
 * any of them would now return something different, the attempt aborts
 * with a COMMIT_CONFLICT and the callback runs again.
 */

import { ErrorCode, StorageError, TransactionError } from '../errors'
import { matchesFilter } from '../query/filter'
import { withRetry, type RetryOptions } from '../transaction'
import type { Filter, UpdateSpec } from '../types/filter'
import type { Document } from '../types/history'
import type {
  DeleteResult,
  DocumentCollection,
  DocumentStore,
  InsertOneResult,
  TransactionConsistency,
  TransactionScope,
  UpdateResult,
} from '../types/storage'
import { deepClone, setNestedValue } from '../utils/comparison'
import { noopLogger, type Logger } from '../utils/logger'
import { generateId } from '../utils/random'

/** Stored document entry */
interface StoredDocument {
  doc: Document
  /** Store-wide write counter value of the last write to this document */
  revision: number
}

/** A read performed inside a transaction, kept for commit validation */
interface RecordedRead {
  collection: string
  filter: Filter
  fingerprint: string
}

/**
 * Visible state of one collection, either committed or through a
 * transaction's buffered writes
 */
interface CollectionView {
  match(filter: Filter): Array<[string, Document]>
  has(key: string): boolean
  write(key: string, doc: Document | null): void
}

export interface MemoryDocumentStoreOptions {
  /** Retry behavior on commit conflicts */
  retry?: RetryOptions | undefined
  logger?: Logger | undefined
}

/**
 * Stable map key for a document identity
 */
function idKey(id: unknown): string {
  if (typeof id === 'string') return id
  if (typeof id === 'number') return `#${id}`
  return JSON.stringify(id)
}

/**
 * In-memory document store for tests and embedded use
 */
export class MemoryDocumentStore implements DocumentStore {
  readonly type = 'memory'

  /** Committed documents per collection, in insertion order */
  private collections = new Map<string, Map<string, StoredDocument>>()

  private revision = 0

  private transactionCounter = 0

  private readonly retry: RetryOptions

  private readonly logger: Logger

  constructor(options: MemoryDocumentStoreOptions = {}) {
    this.logger = options.logger ?? noopLogger
    this.retry = { logger: this.logger, ...options.retry }
  }

  collection(name: string): DocumentCollection {
    return new MemoryCollection(name, this.committedView(name))
  }

  /**
   * Run `callback` as one optimistic transaction, retried on conflict.
   * Commits are serializable in one process, so the consistency options
   * have nothing to tune here.
   */
  async runInTransaction<T>(
    callback: (scope: TransactionScope) => Promise<T>,
    _consistency: TransactionConsistency
  ): Promise<T> {
    return withRetry(async () => {
      const tx = new MemoryTransaction(this, `tx-${++this.transactionCounter}`)
      const result = await callback(tx)
      tx.commit()
      return result
    }, this.retry)
  }

  /**
   * Names of collections that hold at least one document
   */
  collectionNames(): string[] {
    return [...this.collections.entries()]
      .filter(([, docs]) => docs.size > 0)
      .map(([name]) => name)
  }

  /**
   * Drop every collection
   */
  clear(): void {
    this.collections.clear()
  }

  // ===========================================================================
  // Committed state (package-internal)
  // ===========================================================================

  /** @internal */
  committed(name: string): Map<string, StoredDocument> {
    let docs = this.collections.get(name)
    if (!docs) {
      docs = new Map()
      this.collections.set(name, docs)
    }
    return docs
  }

  /** @internal */
  commitWrite(name: string, key: string, doc: Document | null): void {
    const docs = this.committed(name)
    if (doc === null) {
      docs.delete(key)
    } else {
      docs.set(key, { doc, revision: ++this.revision })
    }
  }

  /**
   * Identity and revision of every committed match, used to detect that a
   * read would now see something different
   *
   * @internal
   */
  fingerprint(name: string, filter: Filter): string {
    const parts: string[] = []
    for (const [key, entry] of this.committed(name)) {
      if (matchesFilter(entry.doc, filter)) {
        parts.push(`${key}@${entry.revision}`)
      }
    }
    return parts.join(',')
  }

  private committedView(name: string): CollectionView {
    return {
      match: (filter) => {
        const matches: Array<[string, Document]> = []
        for (const [key, entry] of this.committed(name)) {
          if (matchesFilter(entry.doc, filter)) {
            matches.push([key, entry.doc])
          }
        }
        return matches
      },
      has: (key) => this.committed(name).has(key),
      write: (key, doc) => this.commitWrite(name, key, doc),
    }
  }
}

// =============================================================================
// Transactions
// =============================================================================

/**
 * One attempt of a transaction callback
 */
class MemoryTransaction implements TransactionScope {
  /** Buffered writes per collection; null marks a deletion */
  private writes = new Map<string, Map<string, Document | null>>()

  private reads: RecordedRead[] = []

  private status: 'pending' | 'committed' = 'pending'

  constructor(
    private readonly store: MemoryDocumentStore,
    readonly id: string
  ) {}

  collection(name: string): DocumentCollection {
    return new MemoryCollection(name, this.view(name))
  }

  /**
   * Validate recorded reads against committed state, then publish the
   * buffered writes. Runs synchronously, so no other transaction can
   * interleave between validation and publication.
   */
  commit(): void {
    if (this.status !== 'pending') {
      throw new TransactionError('Transaction already committed', ErrorCode.INVALID_STATE, this.id)
    }

    for (const read of this.reads) {
      if (this.store.fingerprint(read.collection, read.filter) !== read.fingerprint) {
        throw new TransactionError(
          `Write conflict on collection "${read.collection}"`,
          ErrorCode.COMMIT_CONFLICT,
          this.id
        )
      }
    }

    for (const [name, docs] of this.writes) {
      for (const [key, doc] of docs) {
        this.store.commitWrite(name, key, doc)
      }
    }
    this.status = 'committed'
  }

  private buffered(name: string): Map<string, Document | null> {
    let docs = this.writes.get(name)
    if (!docs) {
      docs = new Map()
      this.writes.set(name, docs)
    }
    return docs
  }

  private view(name: string): CollectionView {
    return {
      match: (filter) => {
        this.reads.push({ collection: name, filter: deepClone(filter), fingerprint: this.store.fingerprint(name, filter) })

        const buffered = this.buffered(name)
        const matches: Array<[string, Document]> = []
        for (const [key, entry] of this.store.committed(name)) {
          const doc = buffered.has(key) ? buffered.get(key) : entry.doc
          if (doc && matchesFilter(doc, filter)) {
            matches.push([key, doc])
          }
        }
        for (const [key, doc] of buffered) {
          if (doc && !this.store.committed(name).has(key) && matchesFilter(doc, filter)) {
            matches.push([key, doc])
          }
        }
        return matches
      },
      has: (key) => {
        const buffered = this.buffered(name)
        if (buffered.has(key)) return buffered.get(key) != null
        return this.store.committed(name).has(key)
      },
      write: (key, doc) => {
        this.buffered(name).set(key, doc)
      },
    }
  }
}

// =============================================================================
// Collections
// =============================================================================

/**
 * DocumentCollection over a committed or transactional view
 */
class MemoryCollection implements DocumentCollection {
  constructor(
    readonly name: string,
    private readonly view: CollectionView
  ) {}

  async findOne(filter: Filter): Promise<Document | null> {
    const [first] = this.view.match(filter)
    return first ? deepClone(first[1]) : null
  }

  async find(filter: Filter): Promise<Document[]> {
    return this.view.match(filter).map(([, doc]) => deepClone(doc))
  }

  async insertOne(doc: Document): Promise<InsertOneResult> {
    const stored = deepClone(doc)
    if (stored._id === undefined) {
      stored._id = generateId()
    }
    const key = idKey(stored._id)
    if (this.view.has(key)) {
      throw new StorageError(`Duplicate key in collection "${this.name}"`, {
        collection: this.name,
        id: stored._id,
      })
    }
    this.view.write(key, stored)
    return { acknowledged: true, insertedId: stored._id }
  }

  async replaceOne(filter: Filter, doc: Document): Promise<UpdateResult> {
    const [first] = this.view.match(filter)
    if (!first) {
      return { acknowledged: true, matchedCount: 0, modifiedCount: 0 }
    }
    const [key, current] = first
    const replacement = deepClone(doc)
    replacement._id = current._id
    this.view.write(key, replacement)
    return { acknowledged: true, matchedCount: 1, modifiedCount: 1 }
  }

  async updateMany(filter: Filter, update: UpdateSpec): Promise<UpdateResult> {
    const matches = this.view.match(filter)
    for (const [key, current] of matches) {
      const updated = deepClone(current)
      for (const [path, value] of Object.entries(update.$set)) {
        setNestedValue(updated, path, deepClone(value))
      }
      this.view.write(key, updated)
    }
    return { acknowledged: true, matchedCount: matches.length, modifiedCount: matches.length }
  }

  async deleteMany(filter: Filter): Promise<DeleteResult> {
    const matches = this.view.match(filter)
    for (const [key] of matches) {
      this.view.write(key, null)
    }
    return { acknowledged: true, deletedCount: matches.length }
  }
}
