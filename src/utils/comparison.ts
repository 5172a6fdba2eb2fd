/**
 * Shared Comparison and Value Utilities
 *
 * Canonical implementations of value comparison, equality checking,
 * cloning, and nested value access used by the filter evaluator, the
 * in-memory store and the diff engine.
 */

// =============================================================================
// Deep Equality
// =============================================================================

/**
 * Deep equality check for two values
 *
 * Handles:
 * - Primitives (strict equality)
 * - null/undefined (treated as equal, MongoDB equality semantics)
 * - Dates (compared by timestamp)
 * - Arrays (element-wise comparison)
 * - Objects (key-value comparison)
 *
 * @example
 * deepEqual({ a: 1 }, { a: 1 }) // true
 * deepEqual([1, 2], [1, 2]) // true
 * deepEqual(new Date('2024-01-01'), new Date('2024-01-01')) // true
 */
export function deepEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true
  if (a === null || a === undefined) return b === null || b === undefined

  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime()
  }

  if (Array.isArray(a) && Array.isArray(b)) {
    if (a.length !== b.length) return false
    return a.every((v, i) => deepEqual(v, b[i]))
  }

  if (isRecord(a) && isRecord(b)) {
    const aKeys = Object.keys(a)
    const bKeys = Object.keys(b)
    if (aKeys.length !== bKeys.length) return false
    return aKeys.every(k => deepEqual(a[k], b[k]))
  }

  return false
}

// =============================================================================
// Value Comparison for Ordering
// =============================================================================

/**
 * Compare two values for ordering
 *
 * null/undefined sort first; numbers, strings and dates compare natively;
 * booleans order false < true; anything else falls back to string order.
 *
 * @returns -1 if a < b, 0 if equal, 1 if a > b, NaN if uncomparable
 */
export function compareValues(a: unknown, b: unknown): number {
  if (a === null || a === undefined) {
    return b === null || b === undefined ? 0 : -1
  }
  if (b === null || b === undefined) return 1

  if (typeof a === 'number' && typeof b === 'number') {
    if (Number.isNaN(a) || Number.isNaN(b)) return NaN
    return a < b ? -1 : a > b ? 1 : 0
  }

  if (typeof a === 'string' && typeof b === 'string') {
    return a < b ? -1 : a > b ? 1 : 0
  }

  if (a instanceof Date && b instanceof Date) {
    const diff = a.getTime() - b.getTime()
    return diff < 0 ? -1 : diff > 0 ? 1 : 0
  }

  if (typeof a === 'boolean' && typeof b === 'boolean') {
    return a === b ? 0 : a ? 1 : -1
  }

  const aStr = String(a)
  const bStr = String(b)
  return aStr < bStr ? -1 : aStr > bStr ? 1 : 0
}

// =============================================================================
// Nested Value Access
// =============================================================================

/**
 * Get a nested value from an object using dot notation
 *
 * @example
 * getNestedValue({ a: { b: 1 } }, 'a.b') // 1
 * getNestedValue({ items: [{ x: 1 }] }, 'items.0.x') // 1
 */
export function getNestedValue(obj: Record<string, unknown>, path: string): unknown {
  const parts = path.split('.')
  let current: unknown = obj

  for (const part of parts) {
    if (Array.isArray(current)) {
      const index = parseInt(part, 10)
      if (isNaN(index)) return undefined
      current = current[index]
    } else if (isRecord(current)) {
      current = Object.hasOwn(current, part) ? current[part] : undefined
    } else {
      return undefined
    }
  }

  return current
}

/**
 * Set a nested value using dot notation, creating intermediate objects
 * where the path does not exist yet
 *
 * @example
 * const doc = { meta: { deleted: null } }
 * setNestedValue(doc, 'meta.deleted', { timestamp })
 */
export function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.')
  const last = parts.pop()
  if (last === undefined) return

  let current = obj
  for (const part of parts) {
    const next = current[part]
    if (isRecord(next)) {
      current = next
    } else {
      const created: Record<string, unknown> = {}
      current[part] = created
      current = created
    }
  }
  current[last] = value
}

// =============================================================================
// Deep Clone
// =============================================================================

/**
 * Deep clone a value, preserving Date instances
 *
 * Uses structuredClone for safe, complete deep copies.
 *
 * @example
 * const original = { date: new Date(), nested: { value: 1 } }
 * const clone = deepClone(original)
 * clone.nested.value = 2 // original.nested.value is still 1
 */
export function deepClone<T>(obj: T): T {
  if (obj === null || obj === undefined) return obj
  return structuredClone(obj)
}

// =============================================================================
// Type Helpers
// =============================================================================

/**
 * Check if a value is null or undefined (nullish)
 */
export function isNullish(value: unknown): value is null | undefined {
  return value === null || value === undefined
}

/**
 * Check if a value is a non-array, non-Date object
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date)
}
