/**
 * General utility helpers for Trellis
 */

import { createHash } from 'crypto'

/**
 * Hex-encoded SHA-256 digest of a UTF-8 string
 */
export function sha256(input: string): string {
  return createHash('sha256').update(input, 'utf8').digest('hex')
}

/**
 * Check if a value is a plain object (not an array, Date, or other special object)
 * @param value - Value to check
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false
  }
  const proto = Object.getPrototypeOf(value) as unknown
  return proto === Object.prototype || proto === null
}

/**
 * Format an unknown thrown value as a message string
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
