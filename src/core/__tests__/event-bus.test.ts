/**
 * Unit tests for TypedEventBus and EnvironmentEvents type safety.
 *
 * Covers:
 *  - Emit/subscribe with correct payload type
 *  - Unsubscribe removes handler
 *  - Multiple handlers for same event all invoked
 *  - Event dispatch is synchronous
 */

import { describe, it, expect, vi, beforeEach } from 'vitest'
import { TypedEventBusImpl, createEventBus } from '../event-bus.js'
import type { TypedEventBus } from '../event-bus.js'
import type { EnvironmentEvents } from '../event-bus.types.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makeHandler<K extends keyof EnvironmentEvents>(
  _event: K
): (payload: EnvironmentEvents[K]) => void {
  return vi.fn()
}

const IDENTITY = '__Template_abc'

// ---------------------------------------------------------------------------
// TypedEventBusImpl unit tests
// ---------------------------------------------------------------------------

describe('TypedEventBusImpl', () => {
  let bus: TypedEventBus

  beforeEach(() => {
    bus = new TypedEventBusImpl()
  })

  // -------------------------------------------------------------------------
  // Basic emit / subscribe
  // -------------------------------------------------------------------------

  it('invokes handler when matching event is emitted', () => {
    const handler = makeHandler('template:compiled')
    bus.on('template:compiled', handler)

    const payload: EnvironmentEvents['template:compiled'] = {
      name: 'page.html',
      identity: IDENTITY,
      durationMs: 3,
    }
    bus.emit('template:compiled', payload)

    expect(handler).toHaveBeenCalledOnce()
    expect(handler).toHaveBeenCalledWith(payload)
  })

  it('does NOT invoke handler for a different event', () => {
    const handler = makeHandler('template:compiled')
    bus.on('template:compiled', handler)

    bus.emit('template:loaded', { name: 'page.html', identity: IDENTITY })

    expect(handler).not.toHaveBeenCalled()
  })

  it('passes the activation source through', () => {
    const handler = makeHandler('template:activated')
    bus.on('template:activated', handler)

    bus.emit('template:activated', { name: 'page.html', identity: IDENTITY, source: 'artifact' })

    expect(handler).toHaveBeenCalledWith({ name: 'page.html', identity: IDENTITY, source: 'artifact' })
  })

  // -------------------------------------------------------------------------
  // Unsubscribe
  // -------------------------------------------------------------------------

  it('unsubscribe with off() removes the handler', () => {
    const handler = makeHandler('template:loaded')
    bus.on('template:loaded', handler)

    bus.off('template:loaded', handler)
    bus.emit('template:loaded', { name: 'page.html', identity: IDENTITY })

    expect(handler).not.toHaveBeenCalled()
  })

  it('off() is a no-op when handler was not registered', () => {
    const handler = makeHandler('template:loaded')
    expect(() => bus.off('template:loaded', handler)).not.toThrow()
  })

  it('off() only removes the specific handler, not others', () => {
    const handlerA = makeHandler('artifact:written')
    const handlerB = makeHandler('artifact:written')

    bus.on('artifact:written', handlerA)
    bus.on('artifact:written', handlerB)

    bus.off('artifact:written', handlerA)
    bus.emit('artifact:written', { name: 'page.html', identity: IDENTITY, key: 'k' })

    expect(handlerA).not.toHaveBeenCalled()
    expect(handlerB).toHaveBeenCalledOnce()
  })

  // -------------------------------------------------------------------------
  // Multiple handlers
  // -------------------------------------------------------------------------

  it('invokes handlers in registration order', () => {
    const order: number[] = []
    bus.on('template:loaded', () => order.push(1))
    bus.on('template:loaded', () => order.push(2))
    bus.on('template:loaded', () => order.push(3))

    bus.emit('template:loaded', { name: 'page.html', identity: IDENTITY })

    expect(order).toEqual([1, 2, 3])
  })

  // -------------------------------------------------------------------------
  // Synchronous dispatch
  // -------------------------------------------------------------------------

  it('dispatches events synchronously', () => {
    let handlerCalled = false
    bus.on('template:loaded', () => {
      handlerCalled = true
    })

    bus.emit('template:loaded', { name: 'page.html', identity: IDENTITY })
    expect(handlerCalled).toBe(true)
  })

  it('emit() can be called with no handlers registered', () => {
    expect(() =>
      bus.emit('template:compiled', { name: 'page.html', identity: IDENTITY, durationMs: 0 })
    ).not.toThrow()
  })
})

describe('createEventBus', () => {
  it('returns independent buses', () => {
    const a = createEventBus()
    const b = createEventBus()
    const handler = makeHandler('template:loaded')
    a.on('template:loaded', handler)

    b.emit('template:loaded', { name: 'page.html', identity: IDENTITY })

    expect(handler).not.toHaveBeenCalled()
  })
})
