/**
 * Pipeline events — lets hosts watch what an Environment does with a template
 * (compile, activate, load, persist) without hooking into the environment.
 *
 * Handlers run inside emit(), on the same call stack as the load that raised
 * the event, so a handler sees the environment exactly as it was at that step.
 */

import { EventEmitter } from 'node:events'
import type { EnvironmentEvents } from './event-bus.types.js'

export type EventName = keyof EnvironmentEvents
export type EventHandler<K extends EventName> = (payload: EnvironmentEvents[K]) => void

/** What the Environment needs from a bus; `eventBus` option type */
export interface TypedEventBus {
  emit<K extends EventName>(event: K, payload: EnvironmentEvents[K]): void
  on<K extends EventName>(event: K, handler: EventHandler<K>): void
  /** Removing a handler that was never added does nothing */
  off<K extends EventName>(event: K, handler: EventHandler<K>): void
}

/**
 * @example
 * const bus = createEventBus()
 * bus.on('artifact:written', ({ name, key }) => {
 *   console.log(`cached ${name} at ${key}`)
 * })
 * const env = new Environment(loader, { cache: 'var/cache', eventBus: bus })
 */
export class TypedEventBusImpl implements TypedEventBus {
  private readonly _emitter = new EventEmitter()

  constructor() {
    // One listener per event per watching host; a process may host many environments.
    this._emitter.setMaxListeners(100)
  }

  emit<K extends EventName>(event: K, payload: EnvironmentEvents[K]): void {
    this._emitter.emit(event, payload)
  }

  on<K extends EventName>(event: K, handler: EventHandler<K>): void {
    // EventEmitter listeners take untyped rest arguments
    this._emitter.on(event, handler as (payload: unknown) => void)
  }

  off<K extends EventName>(event: K, handler: EventHandler<K>): void {
    this._emitter.off(event, handler as (payload: unknown) => void)
  }
}

export function createEventBus(): TypedEventBus {
  return new TypedEventBusImpl()
}
