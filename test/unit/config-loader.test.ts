/**
 * Unit Tests for Config Loader
 *
 * Tests loading defaults, merging, interval/lookahead clamping, time zone
 * validation and environment overrides.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  DEFAULT_CONFIG,
  isValidTimezone,
  loadConfig,
  validateConfig,
} from '@schoolbell/core';

let tempDir: string;

describe('Config Loader', () => {
  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'schoolbell-config-test-'));
    vi.stubEnv('SCHOOLBELL_HOME', tempDir);
    vi.stubEnv('SCHOOLBELL_LOG_LEVEL', '');
    vi.stubEnv('SCHOOLBELL_TIMEZONE', '');
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await rm(tempDir, { recursive: true, force: true });
  });

  // ---------------------------------------------------------------------------
  // Load default config
  // ---------------------------------------------------------------------------
  describe('Load default config', () => {
    it('DEFAULT_CONFIG polls every 15 minutes with a 7 day lookahead', () => {
      expect(DEFAULT_CONFIG.polling.intervalMinutes).toBe(15);
      expect(DEFAULT_CONFIG.tasks.lookaheadDays).toBe(7);
      expect(DEFAULT_CONFIG.calendar.daysAhead).toBe(30);
    });

    it('DEFAULT_CONFIG passes validation without warnings', () => {
      const result = validateConfig(DEFAULT_CONFIG);
      expect(result.valid).toBe(true);
      expect(result.errors).toEqual([]);
      expect(result.warnings).toEqual([]);
    });

    it('writes the defaults when no config file exists', () => {
      const { config, validation } = loadConfig();

      expect(validation.valid).toBe(true);
      expect(config).toEqual(DEFAULT_CONFIG);

      const file = join(tempDir, 'schoolbell.json');
      expect(existsSync(file)).toBe(true);
      expect(JSON.parse(readFileSync(file, 'utf-8'))).toEqual(DEFAULT_CONFIG);
    });

    it('creates the logs directory', () => {
      loadConfig();
      expect(existsSync(join(tempDir, 'logs'))).toBe(true);
    });
  });

  // ---------------------------------------------------------------------------
  // Merging
  // ---------------------------------------------------------------------------
  describe('Merging with defaults', () => {
    it('fills sections missing from the file', async () => {
      await writeFile(
        join(tempDir, 'schoolbell.json'),
        JSON.stringify({
          timezone: 'Europe/London',
          children: [{ id: 'child-1', name: 'Ada', taskLookaheadDays: 14 }],
        }),
      );

      const { config, validation } = loadConfig();

      expect(validation.valid).toBe(true);
      expect(config.timezone).toBe('Europe/London');
      expect(config.polling.intervalMinutes).toBe(15);
      expect(config.health.thresholds.connection).toBe(3);
      expect(config.children).toEqual([{ id: 'child-1', name: 'Ada', taskLookaheadDays: 14 }]);
    });

    it('throws on unparseable JSON', async () => {
      await writeFile(join(tempDir, 'schoolbell.json'), '{ not json');
      expect(() => loadConfig()).toThrow(/Failed to parse/);
    });

    it('throws when the file is not an object', async () => {
      await writeFile(join(tempDir, 'schoolbell.json'), '[1, 2, 3]');
      expect(() => loadConfig()).toThrow(/expected a JSON object/);
    });
  });

  // ---------------------------------------------------------------------------
  // Clamping
  // ---------------------------------------------------------------------------
  describe('Clamping', () => {
    it('clamps the polling interval up to 15 minutes', () => {
      const result = validateConfig({ polling: { intervalMinutes: 5 } });
      expect(result.config.polling.intervalMinutes).toBe(15);
      expect(result.warnings.map((w) => w.path)).toEqual(['/polling/intervalMinutes']);
      expect(result.valid).toBe(true);
    });

    it('clamps the polling interval down to 60 minutes', () => {
      const result = validateConfig({ polling: { intervalMinutes: 90 } });
      expect(result.config.polling.intervalMinutes).toBe(60);
    });

    it('clamps the global lookahead to 30 days', () => {
      const result = validateConfig({ tasks: { lookaheadDays: 45 } });
      expect(result.config.tasks.lookaheadDays).toBe(30);
      expect(result.warnings[0]?.path).toBe('/tasks/lookaheadDays');
    });

    it('clamps and rounds per-child lookahead', () => {
      const result = validateConfig({
        children: [
          { id: 'a', name: 'A', taskLookaheadDays: 45 },
          { id: 'b', name: 'B', taskLookaheadDays: 2.6 },
        ],
      });
      expect(result.config.children[0]?.taskLookaheadDays).toBe(30);
      expect(result.config.children[1]?.taskLookaheadDays).toBe(3);
      expect(result.warnings.map((w) => w.path)).toEqual([
        '/children/0/taskLookaheadDays',
        '/children/1/taskLookaheadDays',
      ]);
    });
  });

  // ---------------------------------------------------------------------------
  // Validation rules
  // ---------------------------------------------------------------------------
  describe('Validation rules', () => {
    it('rejects an unknown time zone and falls back to UTC', () => {
      const result = validateConfig({ timezone: 'Mars/Olympus_Mons' });
      expect(result.valid).toBe(false);
      expect(result.errors.map((e) => e.path)).toEqual(['/timezone']);
      expect(result.config.timezone).toBe('UTC');
    });

    it('drops an unknown child time zone', () => {
      const result = validateConfig({
        children: [{ id: 'a', name: 'A', timezone: 'Nowhere/Special' }],
      });
      expect(result.errors.map((e) => e.path)).toEqual(['/children/0/timezone']);
      expect(result.config.children[0]?.timezone).toBeUndefined();
    });

    it('warns on duplicate child ids', () => {
      const result = validateConfig({
        children: [
          { id: 'a', name: 'A' },
          { id: 'a', name: 'A again' },
        ],
      });
      expect(result.valid).toBe(true);
      expect(result.warnings.map((w) => w.path)).toEqual(['/children/1/id']);
    });

    it('resets a value of the wrong type to its default', () => {
      const result = validateConfig({ polling: { intervalMinutes: 'often' } });
      expect(result.valid).toBe(false);
      expect(result.errors.map((e) => e.path)).toContain('/polling/intervalMinutes');
      expect(result.config).toEqual(DEFAULT_CONFIG);
    });

    it('keeps the rest of the config when one value has the wrong type', () => {
      const result = validateConfig({
        school: { name: 'Hillside Primary', secret: 42 },
        tasks: { lookaheadDays: 'soon' },
        children: [{ id: 'c1', name: 'Ada' }],
      });
      expect(result.valid).toBe(false);
      expect(result.config.tasks.lookaheadDays).toBe(7);
      expect(result.config.school).toEqual({ name: 'Hillside Primary' });
      expect(result.config.children).toEqual([{ id: 'c1', name: 'Ada' }]);
    });

    it('drops only the child entry that fails the schema', () => {
      const result = validateConfig({
        children: [
          { id: 'c1', name: 'Ada' },
          { id: '', name: 'Nameless' },
          { id: 'c3', name: 'Cy' },
        ],
      });
      expect(result.valid).toBe(false);
      expect(result.config.children.map((c) => c.id)).toEqual(['c1', 'c3']);
    });

    it('falls back to defaults when the config is not an object', () => {
      const result = validateConfig('not a config');
      expect(result.valid).toBe(false);
      expect(result.config).toEqual(DEFAULT_CONFIG);
    });
  });

  // ---------------------------------------------------------------------------
  // Out-of-range values
  // ---------------------------------------------------------------------------
  describe('Out-of-range values', () => {
    const children = [{ id: 'c1', name: 'Ada' }];
    const school = { name: 'Hillside Primary', userGuid: 'parent-1' };

    it('a zero lookahead is clamped and the children survive', () => {
      const result = validateConfig({ tasks: { lookaheadDays: 0 }, children });
      expect(result.valid).toBe(true);
      expect(result.config.tasks.lookaheadDays).toBe(1);
      expect(result.config.children).toEqual(children);
      expect(result.warnings.map((w) => w.path)).toEqual(['/tasks/lookaheadDays']);
    });

    it('a zero interval is clamped and the children and school survive', () => {
      const result = validateConfig({ polling: { intervalMinutes: 0 }, school, children });
      expect(result.valid).toBe(true);
      expect(result.config.polling.intervalMinutes).toBe(15);
      expect(result.config.children).toEqual(children);
      expect(result.config.school).toEqual(school);
    });

    it('too many retries are clamped to 5 and the children survive', () => {
      const result = validateConfig({ polling: { retries: 6 }, children });
      expect(result.valid).toBe(true);
      expect(result.config.polling.retries).toBe(5);
      expect(result.config.children).toEqual(children);
      expect(result.warnings.map((w) => w.path)).toEqual(['/polling/retries']);
    });

    it('a negative retry delay and a long calendar window are clamped', () => {
      const result = validateConfig({ polling: { retryDelayMs: -10 }, calendar: { daysAhead: 90 } });
      expect(result.config.polling.retryDelayMs).toBe(0);
      expect(result.config.calendar.daysAhead).toBe(60);
      expect(result.warnings.map((w) => w.path)).toEqual(['/polling/retryDelayMs', '/calendar/daysAhead']);
    });

    it('isValidTimezone checks IANA names', () => {
      expect(isValidTimezone('America/New_York')).toBe(true);
      expect(isValidTimezone('Not/AZone')).toBe(false);
    });
  });

  // ---------------------------------------------------------------------------
  // Environment overrides
  // ---------------------------------------------------------------------------
  describe('Environment overrides', () => {
    it('SCHOOLBELL_LOG_LEVEL sets the log level', () => {
      vi.stubEnv('SCHOOLBELL_LOG_LEVEL', 'debug');
      const { config } = loadConfig();
      expect(config.logging.level).toBe('debug');
    });

    it('ignores an unknown log level', () => {
      vi.stubEnv('SCHOOLBELL_LOG_LEVEL', 'loud');
      const { config } = loadConfig();
      expect(config.logging.level).toBe('info');
    });

    it('SCHOOLBELL_TIMEZONE goes through zone validation', () => {
      vi.stubEnv('SCHOOLBELL_TIMEZONE', 'Moon/Base');
      const { config, validation } = loadConfig();
      expect(validation.valid).toBe(false);
      expect(validation.errors.map((e) => e.path)).toEqual(['/timezone']);
      expect(config.timezone).toBe('UTC');
    });

    it('SCHOOLBELL_TIMEZONE sets a valid zone', () => {
      vi.stubEnv('SCHOOLBELL_TIMEZONE', 'Australia/Sydney');
      const { config } = loadConfig();
      expect(config.timezone).toBe('Australia/Sydney');
    });
  });
});
