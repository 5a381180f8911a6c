import { describe, it, expect, vi } from 'vitest'
import { ArrayLoader } from '../array-loader.js'
import { ChainLoader } from '../chain-loader.js'
import type { Loader } from '../loader.js'
import { LoaderError } from '../../../core/errors.js'

describe('ChainLoader', () => {
  it('delegates to the first loader that has the template', () => {
    const chain = new ChainLoader([
      new ArrayLoader({ 'a.html': 'first a' }),
      new ArrayLoader({ 'a.html': 'second a', 'b.html': 'second b' }),
    ])
    expect(chain.getSource('a.html')).toBe('first a')
    expect(chain.getSource('b.html')).toBe('second b')
    expect(chain.getCacheKey('b.html')).toBe('b.html:second b')
    expect(chain.isFresh('b.html', 0)).toBe(true)
  })

  it('reports existence across all loaders', () => {
    const chain = new ChainLoader([new ArrayLoader({ 'a.html': 'a' })])
    chain.addLoader(new ArrayLoader({ 'b.html': 'b' }))
    expect(chain.exists('a.html')).toBe(true)
    expect(chain.exists('b.html')).toBe(true)
    expect(chain.exists('c.html')).toBe(false)
    expect(chain.getLoaders()).toHaveLength(2)
  })

  it('raises a LoaderError when no loader has the template', () => {
    const chain = new ChainLoader([new ArrayLoader()])
    expect(() => chain.getSource('missing.html')).toThrow(
      new LoaderError('Template "missing.html" is not defined.')
    )
  })

  it('collects the messages of loaders that failed', () => {
    const failing: Loader = {
      exists: () => true,
      getSource: () => {
        throw new LoaderError('Disk unavailable.')
      },
      getCacheKey: () => 'x',
      isFresh: () => true,
    }
    const chain = new ChainLoader([failing])
    expect(() => chain.getSource('x.html')).toThrow(
      'Template "x.html" is not defined (Disk unavailable.).'
    )
  })

  it('propagates errors that are not loader errors', () => {
    const broken: Loader = {
      exists: () => true,
      getSource: () => {
        throw new TypeError('bug')
      },
      getCacheKey: () => 'x',
      isFresh: () => true,
    }
    expect(() => new ChainLoader([broken]).getSource('x.html')).toThrow(TypeError)
  })

  it('caches existence until a loader is added', () => {
    const inner = new ArrayLoader({ 'a.html': 'a' })
    const spy = vi.spyOn(inner, 'exists')
    const chain = new ChainLoader([inner])
    chain.exists('a.html')
    chain.exists('a.html')
    expect(spy).toHaveBeenCalledTimes(1)

    chain.addLoader(new ArrayLoader())
    chain.exists('a.html')
    expect(spy).toHaveBeenCalledTimes(2)
  })
})
