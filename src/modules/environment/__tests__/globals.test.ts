import { describe, it, expect } from 'vitest'
import { LogicError } from '../../../core/errors.js'
import { ArrayLoader } from '../../loader/array-loader.js'
import { UnitRegistry } from '../../runtime/unit-registry.js'
import { Environment } from '../environment.js'
import { GlobalsRegistry } from '../globals.js'

function stubExtensions(globals: Record<string, unknown> = {}) {
  let initialized = false
  return {
    isInitialized: () => initialized,
    getGlobals: () => ({ ...globals }),
    initialize: () => {
      initialized = true
    },
  }
}

describe('GlobalsRegistry', () => {
  it('lets later additions win before initialization', () => {
    const registry = new GlobalsRegistry(stubExtensions())
    registry.add('x', 1)
    registry.add('x', 2)
    expect(registry.getAll()['x']).toBe(2)
  })

  it('overlays extension globals with local ones', () => {
    const registry = new GlobalsRegistry(stubExtensions({ site: 'ext', lang: 'en' }))
    registry.add('site', 'local')
    expect(registry.getAll()).toEqual({ site: 'local', lang: 'en' })
  })

  it('only updates existing names once initialized', () => {
    const extensions = stubExtensions({ lang: 'en' })
    const registry = new GlobalsRegistry(extensions)
    registry.add('x', 1)
    extensions.initialize()

    expect(() => registry.add('y', 1)).toThrow(LogicError)
    expect(() => registry.add('y', 1)).toThrow(
      'Unable to add global "y" as the runtime or the extensions have already been initialized.'
    )

    registry.add('x', 3)
    registry.add('lang', 'fr')
    expect(registry.getAll()).toEqual({ lang: 'fr', x: 3 })
  })

  it('resolves the snapshot once after initialization', () => {
    const extensions = stubExtensions()
    const registry = new GlobalsRegistry(extensions)
    extensions.initialize()
    expect(registry.getAll()).toBe(registry.getAll())
  })

  it('merges a context over the globals', () => {
    const registry = new GlobalsRegistry(stubExtensions())
    registry.add('a', 2)
    registry.add('b', 3)
    expect(registry.merge({ a: 1 })).toEqual({ a: 1, b: 3 })
  })

  it('keeps context entries set to undefined', () => {
    const registry = new GlobalsRegistry(stubExtensions())
    registry.add('a', 2)
    expect(registry.merge({ a: undefined })).toEqual({ a: undefined })
  })

  it('stores a global named __proto__ as a plain entry', () => {
    const extensions = stubExtensions()
    const registry = new GlobalsRegistry(extensions)
    registry.add('__proto__', { polluted: 1 })

    const merged = registry.merge({})
    expect(Object.keys(merged)).toEqual(['__proto__'])
    expect(Object.getPrototypeOf(merged)).toBe(Object.prototype)
    expect(Object.getOwnPropertyDescriptor(merged, '__proto__')?.value).toEqual({ polluted: 1 })

    extensions.initialize()
    registry.add('__proto__', { polluted: 2 })
    expect(Object.getOwnPropertyDescriptor(registry.getAll(), '__proto__')?.value).toEqual({ polluted: 2 })
  })
})

describe('Environment globals', () => {
  function createEnv(): Environment {
    return new Environment(new ArrayLoader({ 'x.html': '{{ x }}' }), { units: new UnitRegistry() })
  }

  it('follows the add, initialize, update lifecycle', () => {
    const env = createEnv()
    env.addGlobal('x', 1)
    env.addGlobal('x', 2)
    expect(env.getGlobals()['x']).toBe(2)

    expect(env.render('x.html')).toBe('2')

    expect(() => env.addGlobal('y', 1)).toThrow(LogicError)
    env.addGlobal('x', 3)
    expect(env.getGlobals()['x']).toBe(3)
    expect(env.render('x.html')).toBe('3')
  })

  it('lets the render context shadow globals', () => {
    const env = createEnv()
    env.addGlobal('a', 2)
    env.addGlobal('b', 3)
    expect(env.mergeGlobals({ a: 1 })).toEqual({ a: 1, b: 3 })
    expect(env.render('x.html', { x: 'ctx' })).toBe('ctx')
  })

  it('exposes extension globals', () => {
    const env = createEnv()
    env.addExtension({ name: 'site', getGlobals: () => ({ x: 'from extension' }) })
    expect(env.render('x.html')).toBe('from extension')
  })
})
