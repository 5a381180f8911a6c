/**
 * FilesystemArtifactStore — one JavaScript file per compiled template.
 *
 * Layout: `<directory>/<first two hex chars>/<sha256(identity)>.js`. Writes go
 * to a temporary file in the target directory and are renamed into place, so
 * concurrent writers of the same identity leave one complete file behind.
 */

import { mkdirSync, readFileSync, renameSync, rmSync, statSync, writeFileSync } from 'node:fs'
import { randomUUID } from 'node:crypto'
import { dirname, join, resolve } from 'node:path'
import { TemplateRuntimeError } from '../../core/errors.js'
import { errorMessage, sha256 } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import type { ArtifactStore } from './artifact-store.js'

const logger = createLogger('cache:filesystem')

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

export class FilesystemArtifactStore implements ArtifactStore {
  private readonly _directory: string

  constructor(directory: string) {
    this._directory = resolve(directory)
  }

  getDirectory(): string {
    return this._directory
  }

  generateKey(_name: string, identity: string): string {
    const hash = sha256(identity)
    return join(this._directory, hash.slice(0, 2), `${hash}.js`)
  }

  getTimestamp(key: string): number {
    return statSync(key, { throwIfNoEntry: false })?.mtimeMs ?? 0
  }

  activate(key: string, define: (content: string) => void): void {
    let content: string
    try {
      content = readFileSync(key, 'utf8')
    } catch (err: unknown) {
      if (isNotFound(err)) {
        return
      }
      throw new TemplateRuntimeError(`Unable to read cache file "${key}".`, { cause: err })
    }
    define(content)
  }

  write(key: string, content: string): void {
    const dir = dirname(key)
    try {
      mkdirSync(dir, { recursive: true })
    } catch (err: unknown) {
      throw new TemplateRuntimeError(`Unable to create the cache directory "${dir}".`, {
        cause: err,
      })
    }

    const tmpFile = join(dir, `.${randomUUID()}.tmp`)
    try {
      writeFileSync(tmpFile, content, 'utf8')
      renameSync(tmpFile, key)
    } catch (err: unknown) {
      rmSync(tmpFile, { force: true })
      throw new TemplateRuntimeError(`Failed to write cache file "${key}".`, { cause: err })
    }
    logger.debug({ key, bytes: content.length }, 'Cache file written')
  }

  /** Remove every stored artifact */
  clear(): void {
    try {
      rmSync(this._directory, { recursive: true, force: true })
    } catch (err: unknown) {
      throw new TemplateRuntimeError(
        `Unable to clear the cache directory "${this._directory}" (${errorMessage(err)}).`,
        { cause: err }
      )
    }
  }
}
