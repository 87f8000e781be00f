/**
 * @schoolbell/core - Configuration validator
 *
 * Validates a SchoolbellConfig object using TypeBox, applies business rules
 * (clamp polling interval and lookahead, check time zones, duplicate children).
 */

import { Value, ValuePointer } from '@sinclair/typebox/value';
import { IANAZone } from 'luxon';
import {
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
} from './schema.js';
import { clamp, deepMerge, isPlainObject } from '../utils/index.js';

/** Validation result */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationWarning[];
  config: SchoolbellConfig;
}

export interface ValidationError {
  path: string;
  message: string;
}

export interface ValidationWarning {
  path: string;
  message: string;
}

/**
 * Validate and normalise a SchoolbellConfig object.
 *
 * 1. Merge over defaults, TypeBox schema check; values that fail it are reset
 *    to their defaults (children that fail it are dropped)
 * 2. Clamp polling interval to 15-60 minutes, retries to 0-5
 * 3. Clamp task lookahead (global and per child) to 1-30 days
 * 4. Validate IANA time zones
 * 5. Warn on duplicate child ids
 */
export function validateConfig(raw: unknown): ValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];

  // ----- TypeBox schema validation -----
  const merged = isPlainObject(raw) ? deepMerge(Value.Clone(DEFAULT_CONFIG), raw) : raw;
  let candidate = Value.Default(SchoolbellConfigSchema, Value.Clone(merged));
  for (const err of Value.Errors(SchoolbellConfigSchema, candidate)) {
    errors.push({
      path: err.path,
      message: err.message,
    });
  }

  if (errors.length > 0) {
    candidate = Value.Default(SchoolbellConfigSchema, repair(candidate, errors));
  }

  const config: SchoolbellConfig = Value.Check(SchoolbellConfigSchema, candidate)
    ? candidate
    : Value.Clone(DEFAULT_CONFIG);

  // ----- Business rules -----
  const interval = config.polling.intervalMinutes;
  const clampedInterval = clamp(interval, MIN_INTERVAL_MINUTES, MAX_INTERVAL_MINUTES);
  if (clampedInterval !== interval) {
    warnings.push({
      path: '/polling/intervalMinutes',
      message: `intervalMinutes (${interval}) outside ${MIN_INTERVAL_MINUTES}-${MAX_INTERVAL_MINUTES}, clamping to ${clampedInterval}`,
    });
    config.polling.intervalMinutes = clampedInterval;
  }

  config.polling.retries = clampWithWarning(config.polling.retries, 0, MAX_RETRIES, '/polling/retries', warnings);
  config.polling.retryDelayMs = clampWithWarning(
    config.polling.retryDelayMs,
    0,
    MAX_RETRY_DELAY_MS,
    '/polling/retryDelayMs',
    warnings,
  );
  config.calendar.daysAhead = clampWithWarning(config.calendar.daysAhead, 1, MAX_CALENDAR_DAYS, '/calendar/daysAhead', warnings);
  config.tasks.lookaheadDays = clampLookahead(config.tasks.lookaheadDays, '/tasks/lookaheadDays', warnings);

  if (!IANAZone.isValidZone(config.timezone)) {
    errors.push({
      path: '/timezone',
      message: `Time zone "${config.timezone}" is not a valid IANA zone`,
    });
    config.timezone = DEFAULT_CONFIG.timezone;
  }

  const seen = new Set<string>();
  config.children.forEach((child, i) => {
    const prefix = `/children/${i}`;

    if (seen.has(child.id)) {
      warnings.push({
        path: `${prefix}/id`,
        message: `Duplicate child id "${child.id}" found`,
      });
    }
    seen.add(child.id);

    if (child.timezone !== undefined && !IANAZone.isValidZone(child.timezone)) {
      errors.push({
        path: `${prefix}/timezone`,
        message: `Time zone "${child.timezone}" is not a valid IANA zone`,
      });
      child.timezone = undefined;
    }

    if (child.taskLookaheadDays !== undefined) {
      child.taskLookaheadDays = clampLookahead(child.taskLookaheadDays, `${prefix}/taskLookaheadDays`, warnings);
    }
  });

  return {
    valid: errors.length === 0,
    errors,
    warnings,
    config,
  };
}

function clampLookahead(days: number, path: string, warnings: ValidationWarning[]): number {
  const clamped = clamp(Math.round(days), MIN_LOOKAHEAD_DAYS, MAX_LOOKAHEAD_DAYS);
  if (clamped !== days) {
    warnings.push({
      path,
      message: `lookahead (${days}) outside ${MIN_LOOKAHEAD_DAYS}-${MAX_LOOKAHEAD_DAYS} days, clamping to ${clamped}`,
    });
  }
  return clamped;
}

function clampWithWarning(value: number, min: number, max: number, path: string, warnings: ValidationWarning[]): number {
  const clamped = clamp(Math.round(value), min, max);
  if (clamped !== value) {
    warnings.push({ path, message: `${value} outside ${min}-${max}, clamping to ${clamped}` });
  }
  return clamped;
}

const CHILD_PATH = /^\/children\/(\d+)(\/|$)/;

/**
 * Reset every failing path to its default, or remove it when the default has
 * none. A failing child entry is removed as a whole.
 */
function repair(candidate: unknown, errors: readonly ValidationError[]): unknown {
  if (!isPlainObject(candidate) || errors.some((e) => e.path === '')) {
    return Value.Clone(DEFAULT_CONFIG);
  }

  const badChildren = new Set<number>();

  for (const { path } of errors) {
    const child = CHILD_PATH.exec(path);
    if (child) {
      badChildren.add(Number(child[1]));
      continue;
    }

    const fallback: unknown = ValuePointer.Get(DEFAULT_CONFIG, path);
    if (fallback !== undefined) {
      ValuePointer.Set(candidate, path, Value.Clone(fallback));
    } else {
      ValuePointer.Delete(candidate, path);
    }
  }

  const children = candidate['children'];
  if (badChildren.size > 0 && Array.isArray(children)) {
    candidate['children'] = children.filter((_, i) => !badChildren.has(i));
  }

  return candidate;
}

/**
 * Check a single IANA time zone name.
 */
export function isValidTimezone(zone: string): boolean {
  return IANAZone.isValidZone(zone);
}
