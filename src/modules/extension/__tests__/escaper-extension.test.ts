import { describe, it, expect } from 'vitest'
import { TemplateRuntimeError } from '../../../core/errors.js'
import { EscaperExtension, escape, isEscapingStrategy } from '../escaper-extension.js'

describe('escape', () => {
  it('escapes html special characters', () => {
    expect(escape(`<a href="x">'&'</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;&#039;&amp;&#039;&lt;/a&gt;')
  })

  it('escapes for javascript strings', () => {
    expect(escape('a"b', 'js')).toBe('a\\u0022b')
  })

  it('escapes for urls', () => {
    expect(escape('a b&c', 'url')).toBe('a%20b%26c')
  })

  it('converts non-strings first', () => {
    expect(escape(null)).toBe('')
    expect(escape(5)).toBe('5')
  })

  it('rejects unknown strategies', () => {
    expect(() => escape('x', 'css')).toThrow(TemplateRuntimeError)
    expect(() => escape('x', 'css')).toThrow('Invalid escaping strategy "css" (valid ones: html, js, url).')
  })
})

describe('isEscapingStrategy', () => {
  it('accepts known strategies only', () => {
    expect(isEscapingStrategy('html')).toBe(true)
    expect(isEscapingStrategy('css')).toBe(false)
    expect(isEscapingStrategy(false)).toBe(false)
  })
})

describe('EscaperExtension', () => {
  it('contributes its strategy to the signature', () => {
    expect(new EscaperExtension().getConfigSignature()).toBe('html')
    expect(new EscaperExtension('js').getConfigSignature()).toBe('js')
    expect(new EscaperExtension(false).getConfigSignature()).toBe('off')
  })

  it('provides safe escape filters', () => {
    const filters = new EscaperExtension().getFilters()
    expect(filters.map((f) => f.name)).toEqual(['escape', 'e'])
    expect(filters.every((f) => f.isSafe)).toBe(true)
  })
})
