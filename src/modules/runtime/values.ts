/**
 * Value semantics shared by generated template code and the built-in
 * filters: string conversion, truthiness, iteration and comparison.
 */

import { isPlainObject } from '../../utils/helpers.js'

export type IterationEntry = [key: unknown, value: unknown]

export function toStr(value: unknown): string {
  if (value === undefined || value === null) return ''
  if (typeof value === 'string') return value
  if (typeof value === 'boolean') return value ? '1' : ''
  return String(value)
}

export function toNumber(value: unknown): number {
  if (typeof value === 'number') return value
  if (typeof value === 'boolean') return value ? 1 : 0
  if (value === undefined || value === null || value === '') return 0
  const n = Number(value)
  return Number.isNaN(n) ? 0 : n
}

/** Empty collections are falsy, in addition to JavaScript's falsy values */
export function truthy(value: unknown): boolean {
  if (Array.isArray(value)) return value.length > 0
  if (value instanceof Map || value instanceof Set) return value.size > 0
  return Boolean(value)
}

export function isIterable(value: unknown): boolean {
  return (
    Array.isArray(value) || value instanceof Map || value instanceof Set || isPlainObject(value)
  )
}

/**
 * Key/value pairs of a sequence or mapping. Scalars, null and undefined
 * iterate as empty.
 */
export function iterate(value: unknown): IterationEntry[] {
  if (value === undefined || value === null) return []
  if (Array.isArray(value)) return value.map((item, index): IterationEntry => [index, item])
  if (value instanceof Map) return [...value.entries()]
  if (value instanceof Set) return [...value].map((item, index): IterationEntry => [index, item])
  if (typeof value === 'object') return Object.entries(value)
  return []
}

export function length(value: unknown): number {
  if (value === undefined || value === null) return 0
  if (typeof value === 'string') return value.length
  if (typeof value === 'number' || typeof value === 'boolean') return toStr(value).length
  return iterate(value).length
}

/** Loose equality: numbers and numeric strings compare by value */
export function equals(left: unknown, right: unknown): boolean {
  if (left === right) return true
  if (
    (typeof left === 'number' && typeof right === 'string') ||
    (typeof left === 'string' && typeof right === 'number')
  ) {
    return right !== '' && left !== '' && Number(left) === Number(right)
  }
  return false
}

export function compare(left: unknown, right: unknown): number {
  if (isNumeric(left) && isNumeric(right)) {
    return Number(left) - Number(right)
  }
  const a = toStr(left)
  const b = toStr(right)
  return a < b ? -1 : a > b ? 1 : 0
}

/** `needle in haystack` */
export function contains(haystack: unknown, needle: unknown): boolean {
  if (typeof haystack === 'string') {
    return haystack.includes(toStr(needle))
  }
  if (haystack instanceof Map) {
    return haystack.has(needle)
  }
  return iterate(haystack).some(([, value]) => equals(value, needle))
}

function isNumeric(value: unknown): boolean {
  if (typeof value === 'number') return !Number.isNaN(value)
  return typeof value === 'string' && value.trim() !== '' && !Number.isNaN(Number(value))
}
