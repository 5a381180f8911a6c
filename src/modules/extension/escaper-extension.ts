/**
 * EscaperExtension — output escaping.
 *
 * Provides the `escape` / `e` filters and the default strategy the code
 * generator applies to every `{{ }}` output whose last filter is not safe.
 */

import { TemplateRuntimeError } from '../../core/errors.js'
import { toStr } from '../runtime/values.js'
import { TemplateFilter, type Extension } from './extension.js'

export const ESCAPING_STRATEGIES = ['html', 'js', 'url'] as const
export type EscapingStrategy = (typeof ESCAPING_STRATEGIES)[number]

const HTML_ENTITIES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#039;',
}

export function isEscapingStrategy(value: unknown): value is EscapingStrategy {
  return ESCAPING_STRATEGIES.some((strategy) => strategy === value)
}

/**
 * Escape a value for the given context.
 * @throws {TemplateRuntimeError} for an unknown strategy
 */
export function escape(value: unknown, strategy: unknown = 'html'): string {
  const s = toStr(value)
  switch (strategy) {
    case 'html':
      return s.replace(/[&<>"']/g, (ch) => HTML_ENTITIES[ch] ?? ch)
    case 'js':
      return s.replace(/[^a-zA-Z0-9,._]/g, (ch) => {
        const code = ch.charCodeAt(0)
        return `\\u${code.toString(16).toUpperCase().padStart(4, '0')}`
      })
    case 'url':
      return encodeURIComponent(s)
    default:
      throw new TemplateRuntimeError(
        `Invalid escaping strategy "${toStr(strategy)}" (valid ones: ${ESCAPING_STRATEGIES.join(', ')}).`
      )
  }
}

export class EscaperExtension implements Extension {
  readonly name = 'escaper'

  /**
   * @param defaultStrategy - strategy applied to output automatically; false disables autoescaping
   */
  constructor(private readonly defaultStrategy: EscapingStrategy | false = 'html') {}

  getDefaultStrategy(): EscapingStrategy | false {
    return this.defaultStrategy
  }

  getConfigSignature(): string {
    return this.defaultStrategy === false ? 'off' : this.defaultStrategy
  }

  getFilters(): TemplateFilter[] {
    return [
      new TemplateFilter('escape', escape, { isSafe: true }),
      new TemplateFilter('e', escape, { isSafe: true }),
    ]
  }
}
