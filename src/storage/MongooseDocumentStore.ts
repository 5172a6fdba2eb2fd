/**
 * MongooseDocumentStore - DocumentStore over a mongoose connection
 *
 * Collections are reached through the connection's native database handle,
 * so record types need no mongoose schema. Transactions use a client
 * session; the driver re-runs the callback on transient transaction errors
 * and on unknown commit results, which gives the retry-on-conflict behavior
 * the versioning layer depends on.
 *
 * @example
 * ```typescript
 * const connection = await mongoose.createConnection(uri).asPromise()
 * const contacts = new HistoricalCollection({
 *   name: 'contacts',
 *   primaryKey: ['clientId', 'email'],
 *   store: new MongooseDocumentStore(connection),
 * })
 * ```
 */

import type { Connection, mongo } from 'mongoose'
import { ErrorCode, StorageError, TransactionError } from '../errors'
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

export class MongooseDocumentStore implements DocumentStore {
  readonly type = 'mongoose'

  constructor(private readonly connection: Connection) {}

  collection(name: string): DocumentCollection {
    return new MongooseCollection(this.native(name))
  }

  async runInTransaction<T>(
    callback: (scope: TransactionScope) => Promise<T>,
    consistency: TransactionConsistency
  ): Promise<T> {
    const session = await this.connection.startSession()
    const holder: { outcome?: { value: T } } = {}

    try {
      await session.withTransaction(
        async () => {
          holder.outcome = { value: await callback(this.scope(session)) }
        },
        {
          readConcern: { level: consistency.readConcern },
          writeConcern: {
            w: consistency.writeConcern.w,
            wtimeoutMS: consistency.writeConcern.wtimeoutMS,
          },
          readPreference: consistency.readPreference,
        }
      )
    } finally {
      await session.endSession()
    }

    if (!holder.outcome) {
      throw new TransactionError('Transaction was aborted before the callback completed', ErrorCode.TRANSACTION_ERROR)
    }
    return holder.outcome.value
  }

  private scope(session: mongo.ClientSession): TransactionScope {
    return {
      collection: (name) => new MongooseCollection(this.native(name), session),
    }
  }

  private native(name: string): mongo.Collection {
    const db = this.connection.db
    if (!db) {
      throw new StorageError('Mongoose connection has no database handle; is it open?', {
        collection: name,
      })
    }
    return db.collection(name)
  }
}

/**
 * DocumentCollection over a native driver collection, optionally bound to
 * a transaction session
 */
class MongooseCollection implements DocumentCollection {
  readonly name: string

  constructor(
    private readonly collection: mongo.Collection,
    private readonly session?: mongo.ClientSession
  ) {
    this.name = collection.collectionName
  }

  async findOne(filter: Filter): Promise<Document | null> {
    return this.collection.findOne(filter, { session: this.session })
  }

  async find(filter: Filter): Promise<Document[]> {
    return this.collection.find(filter, { session: this.session }).toArray()
  }

  async insertOne(doc: Document): Promise<InsertOneResult> {
    const result = await this.collection.insertOne(doc, { session: this.session })
    return { acknowledged: result.acknowledged, insertedId: result.insertedId }
  }

  async replaceOne(filter: Filter, doc: Document): Promise<UpdateResult> {
    const result = await this.collection.replaceOne(filter, doc, { session: this.session })
    return {
      acknowledged: result.acknowledged,
      matchedCount: result.matchedCount,
      modifiedCount: result.modifiedCount,
    }
  }

  async updateMany(filter: Filter, update: UpdateSpec): Promise<UpdateResult> {
    const result = await this.collection.updateMany(filter, update, { session: this.session })
    return {
      acknowledged: result.acknowledged,
      matchedCount: result.matchedCount,
      modifiedCount: result.modifiedCount,
    }
  }

  async deleteMany(filter: Filter): Promise<DeleteResult> {
    const result = await this.collection.deleteMany(filter, { session: this.session })
    return { acknowledged: result.acknowledged, deletedCount: result.deletedCount }
  }
}
