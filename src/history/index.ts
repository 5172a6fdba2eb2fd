/**
 * Versioning engine
 *
 * @module history
 */

export type { HistoryContext } from './context'
export { primaryKeyOf, checkKeys, additions, removals, updates, createDeltas, isEmptyDelta, type DiffOptions } from './diff'
export { nextHeader, type HeaderTransition } from './header'
export { applyDelta, deltaKeyFilter, keyFilter, liveHeader, loadDelta, recordFields, toDeltaEntry } from './chain'
export { patchRecord, checkpointDue, type PatchOptions } from './patch'
export { patchOne, patchMany, markMissingDeleted, type PatchManyOptions } from './bulk'
export { getRevisionByDate, findLive } from './as-of'
export { getRevisionByVersion } from './as-of-version'
export { listRevisions, walkChain } from './revisions'
export { deleteDocAndPatches } from './erase'
