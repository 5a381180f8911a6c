/**
 * ArtifactStore interface — persists compiled template content between runs.
 */

// ---------------------------------------------------------------------------
// ArtifactStore interface
// ---------------------------------------------------------------------------

export interface ArtifactStore {
  /** Storage key for the artifact of `name` compiled under `identity` */
  generateKey(name: string, identity: string): string

  /** Modification time of the stored artifact (epoch ms), 0 when absent */
  getTimestamp(key: string): number

  /**
   * Read the stored artifact and hand its content to `define`. No-op when
   * nothing is stored under `key`.
   */
  activate(key: string, define: (content: string) => void): void

  /**
   * Store `content` under `key`, replacing any previous artifact. Readers
   * never observe a partially written artifact.
   */
  write(key: string, content: string): void
}

export function isArtifactStore(value: unknown): value is ArtifactStore {
  return (
    typeof value === 'object' &&
    value !== null &&
    'generateKey' in value &&
    typeof value.generateKey === 'function' &&
    'getTimestamp' in value &&
    typeof value.getTimestamp === 'function' &&
    'activate' in value &&
    typeof value.activate === 'function' &&
    'write' in value &&
    typeof value.write === 'function'
  )
}

// ---------------------------------------------------------------------------
// NullArtifactStore
// ---------------------------------------------------------------------------

/** Store used when caching is disabled: nothing is kept */
export class NullArtifactStore implements ArtifactStore {
  generateKey(_name: string, _identity: string): string {
    return ''
  }

  getTimestamp(_key: string): number {
    return 0
  }

  activate(_key: string, _define: (content: string) => void): void {}

  write(_key: string, _content: string): void {}
}
