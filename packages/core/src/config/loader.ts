/**
 * @schoolbell/core - Configuration loader
 *
 * Loads schoolbell.json from SCHOOLBELL_HOME, merges with defaults, applies
 * environment overrides and validates.
 */

import { readFileSync, existsSync, writeFileSync } from 'node:fs';
import { DEFAULT_CONFIG, type SchoolbellConfig } from './schema.js';
import { validateConfig, type ValidationResult } from './validator.js';
import { ensureDirectories } from './paths.js';
import { deepMerge, errorMessage, isPlainObject } from '../utils/index.js';

const LOG_LEVELS: ReadonlyArray<SchoolbellConfig['logging']['level']> = [
  'trace',
  'debug',
  'info',
  'warn',
  'error',
  'silent',
];

/**
 * Read the config file, creating it with defaults when missing.
 */
function readRawConfig(configPath: string): unknown {
  if (!existsSync(configPath)) {
    writeFileSync(configPath, JSON.stringify(DEFAULT_CONFIG, null, 2), 'utf-8');
    return DEFAULT_CONFIG;
  }

  const text = readFileSync(configPath, 'utf-8');
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new Error(`Failed to parse ${configPath}: ${errorMessage(err)}`);
  }
}

/**
 * Apply SCHOOLBELL_* environment overrides on top of the file contents.
 */
function applyEnvOverrides(config: SchoolbellConfig): void {
  const level = process.env['SCHOOLBELL_LOG_LEVEL'];
  const match = LOG_LEVELS.find((l) => l === level);
  if (match) {
    config.logging.level = match;
  }

  const tz = process.env['SCHOOLBELL_TIMEZONE'];
  if (tz) {
    config.timezone = tz;
  }
}

/**
 * Load the Schoolbell configuration.
 *
 * 1. Read SCHOOLBELL_HOME/schoolbell.json (create with defaults if missing)
 * 2. Deep-merge with DEFAULT_CONFIG
 * 3. Apply environment overrides
 * 4. Validate (TypeBox defaults, clamping, zone checks)
 */
export function loadConfig(): { config: SchoolbellConfig; validation: ValidationResult } {
  const paths = ensureDirectories();
  const rawJson = readRawConfig(paths.config);

  if (!isPlainObject(rawJson)) {
    throw new Error(`Failed to parse ${paths.config}: expected a JSON object`);
  }

  const merged = deepMerge(structuredClone(DEFAULT_CONFIG), rawJson);
  const first = validateConfig(merged);

  applyEnvOverrides(first.config);

  // Re-run so overridden values go through the same rules
  const validation = validateConfig(first.config);
  return {
    config: validation.config,
    validation: {
      ...validation,
      valid: first.valid && validation.valid,
      errors: [...first.errors, ...validation.errors],
      warnings: [...first.warnings, ...validation.warnings],
    },
  };
}
