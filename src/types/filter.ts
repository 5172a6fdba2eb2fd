/**
 * MongoDB-style filter and update types
 *
 * The subset of the query language the versioning layer issues against a
 * document store, and that MemoryDocumentStore evaluates.
 */

// =============================================================================
// Field Operators
// =============================================================================

/**
 * Operators that apply to a single field value
 */
export interface FieldOperators {
  /** Equality comparison */
  $eq?: unknown
  /** Not equal comparison */
  $ne?: unknown
  /** Greater than comparison */
  $gt?: unknown
  /** Greater than or equal comparison */
  $gte?: unknown
  /** Less than comparison */
  $lt?: unknown
  /** Less than or equal comparison */
  $lte?: unknown
  /** In array comparison */
  $in?: unknown[]
  /** Not in array comparison */
  $nin?: unknown[]
  /** Field presence */
  $exists?: boolean
  /** Negated operator set */
  $not?: FieldOperators
}

// =============================================================================
// Filter
// =============================================================================

/**
 * Filter on documents
 *
 * Keys are field names (dot notation reaches into nested objects), values
 * are either a literal to compare for equality or a FieldOperators object.
 * `null` matches a field that is null or missing.
 *
 * @example
 * ```typescript
 * const filter: Filter = {
 *   $and: [
 *     { 'meta.deleted.timestamp': null },
 *     { status: { $in: ['active', 'pending'] } },
 *   ],
 * }
 * ```
 */
export interface Filter {
  /** Field filters - key is field name, value is filter condition */
  [field: string]: unknown

  /** Logical AND */
  $and?: Filter[]

  /** Logical OR */
  $or?: Filter[]

  /** Logical NOT */
  $not?: Filter

  /** Logical NOR */
  $nor?: Filter[]
}

// =============================================================================
// Update
// =============================================================================

/**
 * Update specification for bulk updates
 *
 * @example
 * { $set: { 'meta.deleted': { timestamp: new Date(), metadata: null } } }
 */
export interface UpdateSpec {
  /** Set field values (dot notation allowed) */
  $set: Record<string, unknown>
}
