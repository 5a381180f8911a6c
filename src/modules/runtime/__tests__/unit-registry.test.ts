import { describe, it, expect } from 'vitest'
import { LogicError, TemplateRuntimeError } from '../../../core/errors.js'
import { UnitRegistry, evaluateUnit, isTemplateUnit } from '../unit-registry.js'

const UNIT = 'return { templateName: "a.html", display(context, rt, out) { out.push("a"); } };'

describe('isTemplateUnit', () => {
  it('accepts objects with a name and a display method', () => {
    expect(isTemplateUnit({ templateName: 'x', display: () => undefined })).toBe(true)
    expect(isTemplateUnit({ templateName: 'x' })).toBe(false)
    expect(isTemplateUnit(null)).toBe(false)
  })
})

describe('evaluateUnit', () => {
  it('evaluates content into a unit', () => {
    expect(evaluateUnit(UNIT, 'id-1').templateName).toBe('a.html')
  })

  it('reports content that does not evaluate', () => {
    expect(() => evaluateUnit('return {', 'id-1')).toThrow(TemplateRuntimeError)
    expect(() => evaluateUnit('throw new Error("bad")', 'id-1')).toThrow(
      'Unable to activate compiled template "id-1" (bad).'
    )
  })

  it('reports content that evaluates to something else', () => {
    expect(() => evaluateUnit('return 42;', 'id-1')).toThrow(
      'Compiled template "id-1" did not produce a template unit.'
    )
  })
})

describe('UnitRegistry', () => {
  it('defines a unit once per identity', () => {
    const registry = new UnitRegistry()
    expect(registry.has('id-1')).toBe(false)

    const unit = registry.define('id-1', UNIT)

    expect(registry.has('id-1')).toBe(true)
    expect(registry.get('id-1')).toBe(unit)
    expect(registry.size).toBe(1)
  })

  it('refuses to redefine an identity', () => {
    const registry = new UnitRegistry()
    registry.define('id-1', UNIT)
    expect(() => registry.define('id-1', UNIT)).toThrow(LogicError)
    expect(() => registry.define('id-1', UNIT)).toThrow('Template unit "id-1" is already defined.')
  })

  it('leaves the identity undefined when activation fails', () => {
    const registry = new UnitRegistry()
    expect(() => registry.define('id-1', 'return 1;')).toThrow(TemplateRuntimeError)
    expect(registry.has('id-1')).toBe(false)
  })
})
