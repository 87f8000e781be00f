export {
  SchoolbellConfigSchema,
  DEFAULT_CONFIG,
  MIN_INTERVAL_MINUTES,
  MAX_INTERVAL_MINUTES,
  MIN_LOOKAHEAD_DAYS,
  MAX_LOOKAHEAD_DAYS,
  MAX_RETRIES,
  MAX_RETRY_DELAY_MS,
  MAX_CALENDAR_DAYS,
  type SchoolbellConfig,
  type ChildConfig,
  type HealthThresholds,
} from './schema.js';
export { loadConfig } from './loader.js';
export { validateConfig, isValidTimezone, type ValidationResult, type ValidationError, type ValidationWarning } from './validator.js';
export { resolveSchoolbellHome, buildPaths, ensureDirectories, type SchoolbellPaths } from './paths.js';
