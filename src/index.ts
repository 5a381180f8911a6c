/**
 * Trellis - Main module exports
 * Public API surface for the template environment
 */

// Core errors
export * from './core/errors.js'
// Utilities
export { createLogger, childLogger, logger } from './utils/logger.js'
export * from './utils/helpers.js'

// Event Bus
export type { TypedEventBus, EventName, EventHandler } from './core/event-bus.js'
export type { EnvironmentEvents, ActivationSource } from './core/event-bus.types.js'
export { createEventBus, TypedEventBusImpl } from './core/event-bus.js'

// Environment
export * from './modules/environment/index.js'

// Loaders
export * from './modules/loader/index.js'

// Extensions
export * from './modules/extension/index.js'

// Compiler
export * from './modules/compiler/index.js'

// Runtime
export * from './modules/runtime/index.js'

// Artifact stores
export * from './modules/cache/index.js'

// Configuration
export * from './modules/config/index.js'
