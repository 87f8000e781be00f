/**
 * @schoolbell/core - Core package for Schoolbell
 *
 * Re-exports domain types, configuration, local-day helpers and utilities.
 */

// Types
export * from './types/index.js';

// Configuration
export * from './config/index.js';

// Local calendar days
export * from './time/index.js';

// Utilities
export {
  sleep,
  retry,
  truncate,
  errorMessage,
  clamp,
  isPlainObject,
  deepMerge,
} from './utils/index.js';
