/**
 * Cryptographically secure random utilities
 *
 * SECURITY: Never use Math.random() for ID generation.
 *
 * @module utils/random
 */

/**
 * Generate cryptographically secure random bytes
 *
 * Uses the Web Crypto API (globalThis.crypto, Node.js >= 15).
 */
function getRandomBytes(length: number): Uint8Array {
  const bytes = new Uint8Array(length)
  crypto.getRandomValues(bytes)
  return bytes
}

/**
 * Generate a cryptographically secure random number in range [0, 1)
 */
export function getSecureRandom(): number {
  const bytes = getRandomBytes(4)
  let value = 0
  for (const byte of bytes) {
    value = value * 256 + byte
  }
  return value / 0x100000000
}

let lastSeconds = 0
let counter = 0

/**
 * Generate a 24-character hex identifier shaped like a MongoDB ObjectId:
 * 4 bytes of epoch seconds, 5 random bytes, 3 bytes of a per-process
 * counter. Identifiers generated in the same second sort by creation order.
 *
 * @example
 * generateId() // '6530f1c2a94b0e7d1c000001'
 */
export function generateId(): string {
  const seconds = Math.floor(Date.now() / 1000)
  if (seconds !== lastSeconds) {
    lastSeconds = seconds
    counter = 0
  }
  counter = (counter + 1) % 0x1000000

  const random = Array.from(getRandomBytes(5), b => b.toString(16).padStart(2, '0')).join('')
  return seconds.toString(16).padStart(8, '0') + random + counter.toString(16).padStart(6, '0')
}
