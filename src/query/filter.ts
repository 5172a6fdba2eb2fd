/**
 * Filter Evaluation
 *
 * In-memory evaluation of MongoDB-style filters, used by MemoryDocumentStore.
 *
 * ## Null vs Undefined Handling
 *
 * Follows MongoDB's conventions:
 * - `{ field: null }` matches documents where field is null OR missing
 * - `$eq`, `$ne`, `$in`, `$nin` treat null and undefined as equivalent
 * - `$gt`, `$gte`, `$lt`, `$lte` never match null or missing values
 * - `{ field: { $exists: false } }` matches only if field is missing
 */

import type { Filter } from '../types/filter'
import { deepEqual, compareValues, getNestedValue, isNullish, isRecord } from '../utils/comparison'

// =============================================================================
// Main Filter Evaluation
// =============================================================================

/**
 * Check if a document matches a filter
 *
 * @param row - The document to check
 * @param filter - MongoDB-style filter
 * @returns true if the document matches the filter
 */
export function matchesFilter(row: unknown, filter: Filter): boolean {
  if (Object.keys(filter).length === 0) {
    return true
  }

  if (!isRecord(row)) {
    return false
  }

  if (filter.$and && !filter.$and.every(sub => matchesFilter(row, sub))) {
    return false
  }

  if (filter.$or && !filter.$or.some(sub => matchesFilter(row, sub))) {
    return false
  }

  if (filter.$not && matchesFilter(row, filter.$not)) {
    return false
  }

  if (filter.$nor && filter.$nor.some(sub => matchesFilter(row, sub))) {
    return false
  }

  for (const [field, condition] of Object.entries(filter)) {
    if (field.startsWith('$')) continue

    if (!matchesCondition(getNestedValue(row, field), condition)) {
      return false
    }
  }

  return true
}

/**
 * Check if a value matches a condition
 *
 * - null condition: matches null or undefined
 * - undefined condition: always matches
 * - operator object: every operator must match
 * - anything else: deep equality
 */
export function matchesCondition(value: unknown, condition: unknown): boolean {
  if (condition === null) {
    return isNullish(value)
  }

  if (condition === undefined) {
    return true
  }

  if (isOperatorObject(condition)) {
    return evaluateOperators(value, condition)
  }

  return deepEqual(value, condition)
}

// =============================================================================
// Helper Functions
// =============================================================================

function isOperatorObject(value: unknown): value is Record<string, unknown> {
  return isRecord(value) && Object.keys(value).some(k => k.startsWith('$'))
}

/**
 * Evaluate a single comparison operator against a value
 *
 * @returns true if matches, false if not, undefined if unknown operator
 */
function evaluateComparisonOperator(value: unknown, op: string, opValue: unknown): boolean | undefined {
  switch (op) {
    case '$eq':
      return deepEqual(value, opValue)

    case '$ne':
      return !deepEqual(value, opValue)

    case '$gt': {
      if (isNullish(value)) return false
      const cmp = compareValues(value, opValue)
      return !Number.isNaN(cmp) && cmp > 0
    }

    case '$gte': {
      if (isNullish(value)) return false
      const cmp = compareValues(value, opValue)
      return !Number.isNaN(cmp) && cmp >= 0
    }

    case '$lt': {
      if (isNullish(value)) return false
      const cmp = compareValues(value, opValue)
      return !Number.isNaN(cmp) && cmp < 0
    }

    case '$lte': {
      if (isNullish(value)) return false
      const cmp = compareValues(value, opValue)
      return !Number.isNaN(cmp) && cmp <= 0
    }

    case '$in':
      if (!Array.isArray(opValue)) return false
      return opValue.some(v => deepEqual(value, v))

    case '$nin':
      if (!Array.isArray(opValue)) return false
      return !opValue.some(v => deepEqual(value, v))

    default:
      return undefined
  }
}

/**
 * Evaluate operator conditions
 */
function evaluateOperators(value: unknown, operators: Record<string, unknown>): boolean {
  for (const [op, opValue] of Object.entries(operators)) {
    const comparisonResult = evaluateComparisonOperator(value, op, opValue)
    if (comparisonResult !== undefined) {
      if (!comparisonResult) return false
      continue
    }

    switch (op) {
      case '$not':
        // Field-level $not: negate the inner operator set
        if (!isRecord(opValue)) return false
        if (evaluateOperators(value, opValue)) return false
        break

      case '$exists':
        if (opValue === true) {
          if (value === undefined) return false
        } else {
          if (value !== undefined) return false
        }
        break

      default:
        throw new Error(`Unknown query operator: ${op}`)
    }
  }

  return true
}
