/**
 * EnvironmentEvents interface — defines all typed events for the event bus.
 *
 * Event naming convention: {subject}:{action} (e.g., "template:compiled", "artifact:written")
 */

/** Where an activated unit's content came from */
export type ActivationSource = 'artifact' | 'compiled'

/**
 * Complete typed map of all events emitted by a template environment.
 * Use `keyof EnvironmentEvents` to constrain event keys.
 */
export interface EnvironmentEvents {
  /** Template source was compiled because no usable artifact existed */
  'template:compiled': {
    name: string
    identity: string
    durationMs: number
  }

  /** Compiled content was activated into the running process */
  'template:activated': {
    name: string
    identity: string
    source: ActivationSource
  }

  /** A template instance was created and memoized */
  'template:loaded': {
    name: string
    identity: string
  }

  /** Compiled content was persisted to the artifact store */
  'artifact:written': {
    name: string
    identity: string
    key: string
  }
}
