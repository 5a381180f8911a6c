import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, mkdirSync, rmSync, utimesSync, writeFileSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'
import { FilesystemLoader, MAIN_NAMESPACE } from '../filesystem-loader.js'
import { LoaderError } from '../../../core/errors.js'

let root: string

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), 'trellis-fs-loader-'))
  mkdirSync(join(root, 'templates', 'pages'), { recursive: true })
  mkdirSync(join(root, 'overrides'), { recursive: true })
  mkdirSync(join(root, 'emails'), { recursive: true })
  writeFileSync(join(root, 'templates', 'base.html'), 'base')
  writeFileSync(join(root, 'templates', 'pages', 'home.html'), 'home')
  writeFileSync(join(root, 'overrides', 'base.html'), 'override')
  writeFileSync(join(root, 'emails', 'welcome.txt'), 'welcome')
})

afterEach(() => {
  rmSync(root, { recursive: true, force: true })
})

describe('FilesystemLoader', () => {
  it('loads templates relative to the root path', () => {
    const loader = new FilesystemLoader('templates', root)
    expect(loader.getSource('base.html')).toBe('base')
    expect(loader.getSource('pages/home.html')).toBe('home')
  })

  it('uses the resolved file path as cache key', () => {
    const loader = new FilesystemLoader('templates', root)
    expect(loader.getCacheKey('pages/home.html')).toBe(join(root, 'templates', 'pages', 'home.html'))
  })

  it('normalizes backslashes and repeated slashes', () => {
    const loader = new FilesystemLoader('templates', root)
    expect(loader.getSource('pages\\home.html')).toBe('home')
    expect(loader.getSource('pages//home.html')).toBe('home')
  })

  it('searches paths in order and supports prependPath', () => {
    const loader = new FilesystemLoader(['templates', 'overrides'], root)
    expect(loader.getSource('base.html')).toBe('base')

    loader.prependPath('overrides')
    expect(loader.getSource('base.html')).toBe('override')
    expect(loader.getPaths()).toEqual([
      join(root, 'overrides'),
      join(root, 'templates'),
      join(root, 'overrides'),
    ])
  })

  it('resolves namespaced names', () => {
    const loader = new FilesystemLoader('templates', root)
    loader.addPath('emails', 'mail')
    expect(loader.getSource('@mail/welcome.txt')).toBe('welcome')
    expect(loader.getNamespaces()).toEqual([MAIN_NAMESPACE, 'mail'])
  })

  it('rejects unknown namespaces and malformed namespaced names', () => {
    const loader = new FilesystemLoader('templates', root)
    expect(() => loader.getSource('@nope/a.html')).toThrow(
      'There are no registered paths for namespace "nope".'
    )
    expect(() => loader.getSource('@nope')).toThrow(
      'Malformed namespaced template name "@nope" (expecting "@namespace/template_name").'
    )
  })

  it('refuses names that escape the configured directories', () => {
    const loader = new FilesystemLoader('templates', root)
    expect(() => loader.getSource('../overrides/base.html')).toThrow(
      'Looks like you try to load a template outside configured directories (../overrides/base.html).'
    )
    expect(loader.getSource('pages/../base.html')).toBe('base')
  })

  it('refuses names with NUL bytes', () => {
    const loader = new FilesystemLoader('templates', root)
    expect(() => loader.getSource('base\0.html')).toThrow(LoaderError)
  })

  it('reports missing templates with the searched paths', () => {
    const loader = new FilesystemLoader('templates', root)
    expect(loader.exists('missing.html')).toBe(false)
    expect(() => loader.getSource('missing.html')).toThrow(
      `Unable to find template "missing.html" (looked into: ${join(root, 'templates')}).`
    )
  })

  it('fails for a directory that does not exist', () => {
    expect(() => new FilesystemLoader('nowhere', root)).toThrow(LoaderError)
  })

  it('is fresh until the file changes after the given time', () => {
    const loader = new FilesystemLoader('templates', root)
    const file = join(root, 'templates', 'base.html')
    utimesSync(file, new Date(10_000), new Date(10_000))

    expect(loader.isFresh('base.html', 10_000)).toBe(true)
    expect(loader.isFresh('base.html', 20_000)).toBe(true)
    expect(loader.isFresh('base.html', 9_999)).toBe(false)
  })
})
