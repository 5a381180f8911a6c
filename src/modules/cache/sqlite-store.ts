/**
 * SqliteArtifactStore — compiled templates in a single SQLite table.
 *
 * Uses the better-sqlite3 synchronous API, so the environment's load pipeline
 * stays synchronous. Writes are single-statement upserts.
 */

import BetterSqlite3 from 'better-sqlite3'
import type { Database as BetterSqlite3Database, Statement } from 'better-sqlite3'
import { LogicError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import type { ArtifactStore } from './artifact-store.js'

const logger = createLogger('cache:sqlite')

interface ArtifactRow {
  content: string
  updated_at: number
}

export interface SqliteArtifactStoreOptions {
  /** Clock for `updated_at`; defaults to Date.now */
  now?: () => number
}

export function applyArtifactSchema(db: BetterSqlite3Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS template_artifacts (
      key        TEXT PRIMARY KEY,
      content    TEXT NOT NULL,
      updated_at INTEGER NOT NULL
    )
  `)
}

function openDatabase(path: string): BetterSqlite3Database {
  logger.debug({ path }, 'Opening artifact database')
  const db = new BetterSqlite3(path)
  db.pragma('journal_mode = WAL')
  db.pragma('synchronous = NORMAL')
  db.pragma('busy_timeout = 5000')
  return db
}

export class SqliteArtifactStore implements ArtifactStore {
  private _db: BetterSqlite3Database | null
  private readonly _ownsDatabase: boolean
  private readonly _now: () => number

  private readonly _stmtTimestamp: Statement<[string], Pick<ArtifactRow, 'updated_at'>>
  private readonly _stmtContent: Statement<[string], Pick<ArtifactRow, 'content'>>
  private readonly _stmtUpsert: Statement<[{ key: string; content: string; updatedAt: number }]>

  /**
   * @param database - a database file path (":memory:" for a private
   *   in-memory store) or an open connection, which the store will not close
   */
  constructor(database: string | BetterSqlite3Database, options: SqliteArtifactStoreOptions = {}) {
    this._now = options.now ?? Date.now
    this._ownsDatabase = typeof database === 'string'
    const db = typeof database === 'string' ? openDatabase(database) : database
    applyArtifactSchema(db)
    this._db = db

    this._stmtTimestamp = db.prepare<[string], Pick<ArtifactRow, 'updated_at'>>(
      'SELECT updated_at FROM template_artifacts WHERE key = ?'
    )
    this._stmtContent = db.prepare<[string], Pick<ArtifactRow, 'content'>>(
      'SELECT content FROM template_artifacts WHERE key = ?'
    )
    this._stmtUpsert = db.prepare<[{ key: string; content: string; updatedAt: number }]>(`
      INSERT INTO template_artifacts (key, content, updated_at)
      VALUES (@key, @content, @updatedAt)
      ON CONFLICT(key) DO UPDATE SET
        content    = excluded.content,
        updated_at = excluded.updated_at
    `)
  }

  generateKey(_name: string, identity: string): string {
    return identity
  }

  getTimestamp(key: string): number {
    this.assertOpen()
    return this._stmtTimestamp.get(key)?.updated_at ?? 0
  }

  activate(key: string, define: (content: string) => void): void {
    this.assertOpen()
    const row = this._stmtContent.get(key)
    if (row !== undefined) {
      define(row.content)
    }
  }

  write(key: string, content: string): void {
    this.assertOpen()
    this._stmtUpsert.run({ key, content, updatedAt: this._now() })
  }

  /** Close the connection if the store opened it */
  close(): void {
    if (this._db === null) {
      return
    }
    if (this._ownsDatabase) {
      this._db.close()
    }
    this._db = null
  }

  private assertOpen(): void {
    if (this._db === null) {
      throw new LogicError('SqliteArtifactStore: connection is closed')
    }
  }
}
