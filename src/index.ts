/**
 * p2pconf - Main module exports
 * Public API surface for the configuration registry
 */

// Core errors
export * from './core/errors.js'
// Utilities
export { createLogger, childLogger, logger } from './utils/logger.js'

// Configuration registry
export * from './modules/config/index.js'
