/**
 * CoreExtension — the filters, functions, tests and operators every
 * environment starts with.
 */

import { RUNTIME_VAR as rt } from '../compiler/scope.js'
import {
  isIterable,
  iterate,
  length,
  toNumber,
  toStr,
} from '../runtime/values.js'
import {
  TemplateFilter,
  TemplateFunction,
  TemplateTest,
  type BinaryOperator,
  type Extension,
  type ExtensionOperators,
  type UnaryOperator,
} from './extension.js'

// ---------------------------------------------------------------------------
// Filters
// ---------------------------------------------------------------------------

function capitalize(value: unknown): string {
  const s = toStr(value)
  return s.charAt(0).toUpperCase() + s.slice(1).toLowerCase()
}

function join(value: unknown, glue: unknown = ''): string {
  return iterate(value)
    .map(([, item]) => toStr(item))
    .join(toStr(glue))
}

function defaultFilter(value: unknown, fallback: unknown = ''): unknown {
  return isEmpty(value) ? fallback : value
}

function first(value: unknown): unknown {
  if (typeof value === 'string') return value.charAt(0)
  return iterate(value)[0]?.[1]
}

function last(value: unknown): unknown {
  if (typeof value === 'string') return value.charAt(value.length - 1)
  const entries = iterate(value)
  return entries[entries.length - 1]?.[1]
}

function keys(value: unknown): unknown[] {
  return iterate(value).map(([key]) => key)
}

function reverse(value: unknown): unknown {
  if (typeof value === 'string') return [...value].reverse().join('')
  return iterate(value)
    .map(([, item]) => item)
    .reverse()
}

function jsonEncode(value: unknown): string {
  return JSON.stringify(value) ?? 'null'
}

// ---------------------------------------------------------------------------
// Functions
// ---------------------------------------------------------------------------

function range(low: unknown, high: unknown, step: unknown = 1): number[] {
  const from = toNumber(low)
  const to = toNumber(high)
  const size = Math.abs(toNumber(step)) || 1
  const result: number[] = []
  if (from <= to) {
    for (let i = from; i <= to; i += size) result.push(i)
  } else {
    for (let i = from; i >= to; i -= size) result.push(i)
  }
  return result
}

function collectNumbers(args: unknown[]): number[] {
  const values = args.length === 1 && isIterable(args[0]) ? iterate(args[0]).map(([, v]) => v) : args
  return values.map(toNumber)
}

function max(...args: unknown[]): number | null {
  const values = collectNumbers(args)
  return values.length > 0 ? Math.max(...values) : null
}

function min(...args: unknown[]): number | null {
  const values = collectNumbers(args)
  return values.length > 0 ? Math.min(...values) : null
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

function isEmpty(value: unknown): boolean {
  if (value === undefined || value === null || value === false || value === '') return true
  return isIterable(value) && length(value) === 0
}

function isNone(value: unknown): boolean {
  return value === undefined || value === null
}

// ---------------------------------------------------------------------------
// Operators
// ---------------------------------------------------------------------------

function binary(
  precedence: number,
  compile: (left: string, right: string) => string
): BinaryOperator {
  return { kind: 'expression', precedence, associativity: 'left', compile }
}

function arithmetic(precedence: number, symbol: string): BinaryOperator {
  return binary(
    precedence,
    (l, r) => `(${rt}.toNumber(${l}) ${symbol} ${rt}.toNumber(${r}))`
  )
}

function comparison(symbol: string): BinaryOperator {
  return binary(20, (l, r) => `(${rt}.compare(${l}, ${r}) ${symbol} 0)`)
}

const UNARY_OPERATORS: Record<string, UnaryOperator> = {
  not: { precedence: 50, compile: (x) => `!${rt}.truthy(${x})` },
  '-': { precedence: 500, compile: (x) => `(-${rt}.toNumber(${x}))` },
  '+': { precedence: 500, compile: (x) => `${rt}.toNumber(${x})` },
}

const BINARY_OPERATORS: Record<string, BinaryOperator> = {
  or: binary(10, (l, r) => `(${rt}.truthy(${l}) || ${rt}.truthy(${r}))`),
  and: binary(15, (l, r) => `(${rt}.truthy(${l}) && ${rt}.truthy(${r}))`),
  '==': binary(20, (l, r) => `${rt}.equals(${l}, ${r})`),
  '!=': binary(20, (l, r) => `!${rt}.equals(${l}, ${r})`),
  '<': comparison('<'),
  '>': comparison('>'),
  '<=': comparison('<='),
  '>=': comparison('>='),
  in: binary(20, (l, r) => `${rt}.contains(${r}, ${l})`),
  'not in': binary(20, (l, r) => `!${rt}.contains(${r}, ${l})`),
  '+': arithmetic(30, '+'),
  '-': arithmetic(30, '-'),
  '~': binary(40, (l, r) => `(${rt}.toStr(${l}) + ${rt}.toStr(${r}))`),
  '*': arithmetic(60, '*'),
  '/': arithmetic(60, '/'),
  '%': arithmetic(60, '%'),
  is: { kind: 'test', precedence: 100, negated: false },
  'is not': { kind: 'test', precedence: 100, negated: true },
}

// ---------------------------------------------------------------------------
// CoreExtension
// ---------------------------------------------------------------------------

export class CoreExtension implements Extension {
  readonly name = 'core'

  getFilters(): TemplateFilter[] {
    return [
      new TemplateFilter('upper', (v) => toStr(v).toUpperCase()),
      new TemplateFilter('lower', (v) => toStr(v).toLowerCase()),
      new TemplateFilter('capitalize', capitalize),
      new TemplateFilter('trim', (v) => toStr(v).trim()),
      new TemplateFilter('length', length),
      new TemplateFilter('join', join),
      new TemplateFilter('default', defaultFilter),
      new TemplateFilter('first', first),
      new TemplateFilter('last', last),
      new TemplateFilter('keys', keys),
      new TemplateFilter('reverse', reverse),
      new TemplateFilter('json_encode', jsonEncode),
      new TemplateFilter('raw', (v) => v, { isSafe: true }),
    ]
  }

  getFunctions(): TemplateFunction[] {
    return [
      new TemplateFunction('range', range),
      new TemplateFunction('max', max),
      new TemplateFunction('min', min),
    ]
  }

  getTests(): TemplateTest[] {
    return [
      new TemplateTest('defined', (v) => v !== undefined),
      new TemplateTest('empty', isEmpty),
      new TemplateTest('even', (v) => toNumber(v) % 2 === 0),
      new TemplateTest('odd', (v) => Math.abs(toNumber(v) % 2) === 1),
      new TemplateTest('null', isNone),
      new TemplateTest('none', isNone),
      new TemplateTest('iterable', isIterable),
    ]
  }

  getOperators(): ExtensionOperators {
    return { unary: UNARY_OPERATORS, binary: BINARY_OPERATORS }
  }
}
