/**
 * @schoolbell/core - Full TypeBox schema for schoolbell.json configuration
 *
 * Sections: school, timezone, polling, tasks, calendar, display, health, children, logging
 */

import { Type, type Static } from '@sinclair/typebox';

// ---------------------------------------------------------------------------
// Sub-schemas
// ---------------------------------------------------------------------------

const SchoolSchema = Type.Object({
  name: Type.String({ default: 'School' }),
  code: Type.Optional(Type.String()),
  host: Type.Optional(Type.String()),
  deviceId: Type.Optional(Type.String()),
  secret: Type.Optional(Type.String()),
  userGuid: Type.Optional(Type.String({ description: 'Account holder; tracked when no children are listed' })),
  userName: Type.Optional(Type.String()),
});

const PollingSchema = Type.Object({
  intervalMinutes: Type.Number({ default: 15, description: 'Clamped to 15-60' }),
  retries: Type.Number({ default: 2, description: 'Per-call retries for connection failures, clamped to 0-5' }),
  retryDelayMs: Type.Number({ default: 2000, description: 'Clamped to 0-60000' }),
});

const TasksSchema = Type.Object({
  lookaheadDays: Type.Number({ default: 7, description: 'Clamped to 1-30' }),
});

const CalendarSchema = Type.Object({
  daysAhead: Type.Number({ default: 30, description: 'Clamped to 1-60' }),
});

const DisplaySchema = Type.Object({
  showClassTimes: Type.Boolean({ default: false }),
});

const ThresholdsSchema = Type.Object({
  authentication: Type.Number({ minimum: 1, default: 1 }),
  connection: Type.Number({ minimum: 1, default: 3 }),
  rate_limit: Type.Number({ minimum: 1, default: 3 }),
  data_format: Type.Number({ minimum: 1, default: 5 }),
});

const HealthSchema = Type.Object({
  thresholds: ThresholdsSchema,
});

const ChildSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  name: Type.String(),
  timezone: Type.Optional(Type.String()),
  taskLookaheadDays: Type.Optional(Type.Number({ description: 'Clamped to 1-30' })),
  showClassTimes: Type.Optional(Type.Boolean()),
});

const LoggingSchema = Type.Object({
  level: Type.Union(
    [
      Type.Literal('trace'),
      Type.Literal('debug'),
      Type.Literal('info'),
      Type.Literal('warn'),
      Type.Literal('error'),
      Type.Literal('silent'),
    ],
    { default: 'info' },
  ),
});

// ---------------------------------------------------------------------------
// Root config schema
// ---------------------------------------------------------------------------

export const SchoolbellConfigSchema = Type.Object({
  $schema: Type.Optional(Type.String()),
  version: Type.Number({ default: 1 }),
  school: Type.Optional(SchoolSchema),
  timezone: Type.String({ default: 'UTC' }),
  polling: PollingSchema,
  tasks: TasksSchema,
  calendar: CalendarSchema,
  display: DisplaySchema,
  health: HealthSchema,
  children: Type.Array(ChildSchema, { default: [] }),
  logging: LoggingSchema,
});

export type SchoolbellConfig = Static<typeof SchoolbellConfigSchema>;
export type ChildConfig = Static<typeof ChildSchema>;
export type HealthThresholds = Static<typeof ThresholdsSchema>;

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const MIN_INTERVAL_MINUTES = 15;
export const MAX_INTERVAL_MINUTES = 60;
export const MIN_LOOKAHEAD_DAYS = 1;
export const MAX_LOOKAHEAD_DAYS = 30;
export const MAX_RETRIES = 5;
export const MAX_RETRY_DELAY_MS = 60_000;
export const MAX_CALENDAR_DAYS = 60;

export const DEFAULT_CONFIG: SchoolbellConfig = {
  version: 1,
  timezone: 'UTC',
  polling: {
    intervalMinutes: 15,
    retries: 2,
    retryDelayMs: 2000,
  },
  tasks: {
    lookaheadDays: 7,
  },
  calendar: {
    daysAhead: 30,
  },
  display: {
    showClassTimes: false,
  },
  health: {
    thresholds: {
      authentication: 1,
      connection: 3,
      rate_limit: 3,
      data_format: 5,
    },
  },
  children: [],
  logging: {
    level: 'info',
  },
};
