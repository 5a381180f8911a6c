import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { existsSync, mkdtempSync, readdirSync, rmSync, utimesSync, writeFileSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'
import { TemplateRuntimeError } from '../../../core/errors.js'
import { sha256 } from '../../../utils/helpers.js'
import { FilesystemArtifactStore } from '../filesystem-store.js'

let root: string

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), 'trellis-fs-store-'))
})

afterEach(() => {
  rmSync(root, { recursive: true, force: true })
})

describe('FilesystemArtifactStore', () => {
  it('shards keys by the identity hash', () => {
    const store = new FilesystemArtifactStore(join(root, 'cache'))
    const hash = sha256('__Template_abc')
    expect(store.generateKey('page.html', '__Template_abc')).toBe(
      join(root, 'cache', hash.slice(0, 2), `${hash}.js`)
    )
  })

  it('ignores the template name when generating keys', () => {
    const store = new FilesystemArtifactStore(root)
    expect(store.generateKey('a.html', 'id')).toBe(store.generateKey('b.html', 'id'))
  })

  it('reports 0 for a missing artifact', () => {
    const store = new FilesystemArtifactStore(root)
    expect(store.getTimestamp(store.generateKey('a', 'id'))).toBe(0)
  })

  it('writes artifacts and reads them back', () => {
    const store = new FilesystemArtifactStore(join(root, 'cache'))
    const key = store.generateKey('a', 'id')
    store.write(key, 'return 1;')

    const define = vi.fn()
    store.activate(key, define)
    expect(define).toHaveBeenCalledWith('return 1;')
  })

  it('replaces existing artifacts without leaving temporary files', () => {
    const store = new FilesystemArtifactStore(root)
    const key = store.generateKey('a', 'id')
    store.write(key, 'first')
    store.write(key, 'second')

    const define = vi.fn()
    store.activate(key, define)
    expect(define).toHaveBeenCalledWith('second')
    expect(readdirSync(join(key, '..'))).toEqual([`${sha256('id')}.js`])
  })

  it('uses the file modification time as timestamp', () => {
    const store = new FilesystemArtifactStore(root)
    const key = store.generateKey('a', 'id')
    store.write(key, 'content')
    utimesSync(key, 1_000, 1_000)
    expect(store.getTimestamp(key)).toBe(1_000_000)
  })

  it('does nothing when activating a missing artifact', () => {
    const store = new FilesystemArtifactStore(root)
    const define = vi.fn()
    store.activate(store.generateKey('a', 'id'), define)
    expect(define).not.toHaveBeenCalled()
  })

  it('reports a cache directory that cannot be created', () => {
    const blocker = join(root, 'blocker')
    writeFileSync(blocker, '')
    const store = new FilesystemArtifactStore(blocker)
    const key = store.generateKey('a', 'id')
    expect(() => store.write(key, 'x')).toThrow(TemplateRuntimeError)
    expect(() => store.write(key, 'x')).toThrow(`Unable to create the cache directory "${join(key, '..')}".`)
  })

  it('clears every artifact', () => {
    const dir = join(root, 'cache')
    const store = new FilesystemArtifactStore(dir)
    store.write(store.generateKey('a', 'id'), 'x')
    store.clear()
    expect(existsSync(dir)).toBe(false)
  })
})
