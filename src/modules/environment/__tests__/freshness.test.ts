import { describe, it, expect, vi } from 'vitest'
import type { Loader } from '../../loader/loader.js'
import { FreshnessChecker } from '../freshness.js'

function stubLoader(fresh: boolean): Loader {
  return {
    getSource: () => '',
    getCacheKey: (name: string) => name,
    isFresh: vi.fn(() => fresh),
    exists: () => true,
  }
}

function checker(loader: Loader, lastModified = 100): FreshnessChecker {
  return new FreshnessChecker({
    getLoader: () => loader,
    getExtensionLastModified: () => lastModified,
  })
}

describe('FreshnessChecker', () => {
  it('is fresh when extensions are not newer and the loader agrees', () => {
    const loader = stubLoader(true)
    expect(checker(loader).isFresh('a.html', 100)).toBe(true)
    expect(loader.isFresh).toHaveBeenCalledWith('a.html', 100)
  })

  it('is stale when the loader reports a change', () => {
    expect(checker(stubLoader(false)).isFresh('a.html', 100)).toBe(false)
  })

  it('is stale when the extensions are newer, without asking the loader', () => {
    const loader = stubLoader(true)
    expect(checker(loader).isFresh('a.html', 99)).toBe(false)
    expect(loader.isFresh).not.toHaveBeenCalled()
  })
})
