/**
 * Tests for the template error hierarchy
 */

import { describe, it, expect } from 'vitest'
import {
  TemplateError,
  LoaderError,
  TemplateSyntaxError,
  TemplateRuntimeError,
  LogicError,
  ConfigError,
} from '../src/core/errors.js'

describe('Template errors', () => {
  describe('subclasses', () => {
    it('should create loader error', () => {
      const error = new LoaderError('Template "a.html" is not defined.')
      expect(error.code).toBe('LOADER_ERROR')
      expect(error.name).toBe('LoaderError')
      expect(error).toBeInstanceOf(TemplateError)
      expect(error).toBeInstanceOf(Error)
    })

    it('should create syntax error', () => {
      const error = new TemplateSyntaxError('Unexpected token.')
      expect(error.code).toBe('SYNTAX_ERROR')
      expect(error.name).toBe('TemplateSyntaxError')
      expect(error).toBeInstanceOf(TemplateError)
    })

    it('should create runtime error', () => {
      const error = new TemplateRuntimeError('Variable "x" does not exist.')
      expect(error.code).toBe('RUNTIME_ERROR')
      expect(error.name).toBe('TemplateRuntimeError')
      expect(error).toBeInstanceOf(TemplateError)
    })

    it('should create logic error with context', () => {
      const error = new LogicError('Unable to add global "y".', { name: 'y' })
      expect(error.code).toBe('LOGIC_ERROR')
      expect(error.name).toBe('LogicError')
      expect(error.context.name).toBe('y')
    })

    it('should create config error with context', () => {
      const error = new ConfigError('Missing required field', { field: 'cache.path' })
      expect(error.code).toBe('CONFIG_ERROR')
      expect(error.name).toBe('ConfigError')
      expect(error.context.field).toBe('cache.path')
    })
  })

  describe('message decoration', () => {
    it('leaves the message alone without a template name or line', () => {
      const error = new TemplateSyntaxError('Unclosed comment.')
      expect(error.message).toBe('Unclosed comment.')
      expect(error.templateName).toBeUndefined()
      expect(error.lineno).toBe(-1)
    })

    it('appends the template name and line before the final period', () => {
      const error = new TemplateSyntaxError('Unclosed comment.', {
        templateName: 'page.html',
        lineno: 3,
      })
      expect(error.message).toBe('Unclosed comment in "page.html" at line 3.')
      expect(error.rawMessage).toBe('Unclosed comment.')
    })

    it('keeps a trailing question mark at the end', () => {
      const error = new LoaderError('Did you mean "b.html"?', { templateName: 'a.html' })
      expect(error.message).toBe('Did you mean "b.html" in "a.html"?')
    })

    it('appends without punctuation when the message has none', () => {
      const error = new TemplateRuntimeError('Boom', { lineno: 7 })
      expect(error.message).toBe('Boom at line 7')
    })

    it('rebuilds the message when the name and line are set later', () => {
      const error = new TemplateRuntimeError('Boom.')
      error.setTemplateName('x.html')
      expect(error.message).toBe('Boom in "x.html".')
      error.setLineno(2)
      expect(error.message).toBe('Boom in "x.html" at line 2.')
      expect(error.templateName).toBe('x.html')
      expect(error.lineno).toBe(2)
    })
  })

  it('preserves the cause', () => {
    const cause = new Error('disk full')
    const error = new TemplateRuntimeError('Failed to write cache file "k".', { cause })
    expect(error.cause).toBe(cause)
  })

  it('serializes to JSON', () => {
    const error = new LoaderError('Not found.', {
      templateName: 'a.html',
      lineno: 1,
      context: { paths: ['/tmp'] },
    })
    const json = error.toJSON()
    expect(json.name).toBe('LoaderError')
    expect(json.message).toBe('Not found in "a.html" at line 1.')
    expect(json.code).toBe('LOADER_ERROR')
    expect(json.templateName).toBe('a.html')
    expect(json.lineno).toBe(1)
    expect(json.context).toEqual({ paths: ['/tmp'] })
    expect(typeof json.stack).toBe('string')
  })
})
