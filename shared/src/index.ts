/**
 * @idlestop/shared - Shared types and utilities for idlestop
 *
 * This package provides:
 * - Configuration types, defaults and environment parsing
 * - Activity and monitor status wire types
 * - NATS subject patterns and client utilities
 */

// Re-export all types
export * from './types/index.js';

export { ConfigurationError } from './errors.js';

export {
  parseInteger,
  parseShutdownTime,
  parsePort,
  parseBoolean,
  parseList,
} from './config/env.js';

// Re-export NATS utilities
export * from './nats/index.js';
