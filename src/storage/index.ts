/**
 * Document store adapters
 *
 * @module storage
 */

export { MemoryDocumentStore, type MemoryDocumentStoreOptions } from './MemoryDocumentStore'
export { MongooseDocumentStore } from './MongooseDocumentStore'
