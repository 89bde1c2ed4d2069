/**
 * specgen - Main module exports
 * Public API surface for programmatic use
 */

// Core errors
export * from './core/errors.js'
// Utilities
export { createLogger, logger } from './utils/logger.js'
export { pathExists, writeFileAtomic, withTempDir } from './utils/fs-safe.js'

// Configuration
export * from './modules/config/index.js'

// Spec builder
export * from './modules/spec-builder/index.js'
