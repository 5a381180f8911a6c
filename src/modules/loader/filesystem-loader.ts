/**
 * FilesystemLoader — loads templates from one or more directories.
 *
 * Names are relative paths ("pages/home.html"). A name starting with
 * "@namespace/" is looked up only in the paths registered for that namespace;
 * any other name searches the main namespace. Paths are searched in order and
 * the first existing file wins.
 */

import { existsSync, readFileSync, statSync } from 'fs'
import { isAbsolute, join, resolve } from 'path'
import { LoaderError } from '../../core/errors.js'
import { errorMessage } from '../../utils/helpers.js'
import type { Loader } from './loader.js'

/** Namespace used for names without an "@namespace/" prefix */
export const MAIN_NAMESPACE = '__main__'

export class FilesystemLoader implements Loader {
  private readonly _paths = new Map<string, string[]>()
  private readonly _cache = new Map<string, string>()
  private readonly _errorCache = new Map<string, string>()
  private readonly _rootPath: string

  /**
   * @param paths - directories of the main namespace
   * @param rootPath - base for relative paths (default: current working directory)
   */
  constructor(paths: string | string[] = [], rootPath: string = process.cwd()) {
    this._rootPath = resolve(rootPath)
    const list = typeof paths === 'string' ? [paths] : paths
    if (list.length > 0) {
      this.setPaths(list)
    }
  }

  getPaths(namespace: string = MAIN_NAMESPACE): string[] {
    return [...(this._paths.get(namespace) ?? [])]
  }

  getNamespaces(): string[] {
    return [...this._paths.keys()]
  }

  setPaths(paths: string | string[], namespace: string = MAIN_NAMESPACE): void {
    this._paths.set(namespace, [])
    for (const path of typeof paths === 'string' ? [paths] : paths) {
      this.addPath(path, namespace)
    }
  }

  addPath(path: string, namespace: string = MAIN_NAMESPACE): void {
    this.clearCaches()
    const dir = this.checkDirectory(path)
    const existing = this._paths.get(namespace) ?? []
    existing.push(dir)
    this._paths.set(namespace, existing)
  }

  prependPath(path: string, namespace: string = MAIN_NAMESPACE): void {
    this.clearCaches()
    const dir = this.checkDirectory(path)
    const existing = this._paths.get(namespace) ?? []
    existing.unshift(dir)
    this._paths.set(namespace, existing)
  }

  getSource(name: string): string {
    const file = this.findTemplate(name)
    try {
      return readFileSync(file, 'utf-8')
    } catch (err) {
      throw new LoaderError(`Unable to read template "${name}" (${errorMessage(err)}).`, {
        cause: err,
      })
    }
  }

  getCacheKey(name: string): string {
    return this.findTemplate(name)
  }

  isFresh(name: string, time: number): boolean {
    return statSync(this.findTemplate(name)).mtimeMs <= time
  }

  exists(name: string): boolean {
    const normalized = normalizeName(name)
    if (this._cache.has(normalized)) {
      return true
    }
    try {
      this.findTemplate(normalized)
      return true
    } catch (err) {
      if (err instanceof LoaderError) {
        return false
      }
      throw err
    }
  }

  private findTemplate(name: string): string {
    const normalized = normalizeName(name)

    const cached = this._cache.get(normalized)
    if (cached !== undefined) {
      return cached
    }
    const cachedError = this._errorCache.get(normalized)
    if (cachedError !== undefined) {
      throw new LoaderError(cachedError)
    }

    validateName(normalized)
    const [namespace, shortName] = parseName(normalized)

    const paths = this._paths.get(namespace)
    if (paths === undefined) {
      const message = `There are no registered paths for namespace "${namespace}".`
      this._errorCache.set(normalized, message)
      throw new LoaderError(message)
    }

    for (const dir of paths) {
      const candidate = join(dir, shortName)
      if (existsSync(candidate) && statSync(candidate).isFile()) {
        this._cache.set(normalized, candidate)
        return candidate
      }
    }

    const message = `Unable to find template "${normalized}" (looked into: ${paths.join(', ')}).`
    this._errorCache.set(normalized, message)
    throw new LoaderError(message)
  }

  private checkDirectory(path: string): string {
    const dir = isAbsolute(path) ? path : resolve(this._rootPath, path)
    if (!existsSync(dir) || !statSync(dir).isDirectory()) {
      throw new LoaderError(`The "${path}" directory does not exist ("${dir}").`)
    }
    return dir
  }

  private clearCaches(): void {
    this._cache.clear()
    this._errorCache.clear()
  }
}

// ---------------------------------------------------------------------------
// Name handling
// ---------------------------------------------------------------------------

function normalizeName(name: string): string {
  return name.replace(/\\/g, '/').replace(/\/{2,}/g, '/')
}

function validateName(name: string): void {
  if (name.includes('\0')) {
    throw new LoaderError('A template name cannot contain NUL bytes.')
  }

  let level = 0
  for (const part of name.replace(/^\/+/, '').split('/')) {
    if (part === '..') {
      level--
    } else if (part !== '.' && part !== '') {
      level++
    }
    if (level < 0) {
      throw new LoaderError(
        `Looks like you try to load a template outside configured directories (${name}).`
      )
    }
  }
}

function parseName(name: string): [string, string] {
  if (!name.startsWith('@')) {
    return [MAIN_NAMESPACE, name]
  }
  const slash = name.indexOf('/')
  if (slash === -1) {
    throw new LoaderError(
      `Malformed namespaced template name "${name}" (expecting "@namespace/template_name").`
    )
  }
  return [name.slice(1, slash), name.slice(slash + 1)]
}
