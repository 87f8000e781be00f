/**
 * Schoolbell - Entry point
 *
 * Boots the update coordinator around a transport supplied by the host:
 *   1. Load configuration from @schoolbell/core
 *   2. Resolve the tracked children
 *   3. Build and start the coordinator
 *   4. Handle graceful shutdown
 */

import { pino, type Logger } from 'pino';
import { buildPaths, loadConfig, type SchoolbellConfig } from '@schoolbell/core';
import type { IssueSink, ReauthHandler } from '@schoolbell/health';
import {
  SyncCoordinator,
  trackedChildren,
  type CycleResult,
  type SchoolDataSource,
} from '@schoolbell/sync';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface StartOptions {
  source: SchoolDataSource;
  issueSink?: IssueSink;
  reauth?: ReauthHandler;
  /** Register SIGINT/SIGTERM handlers. Default true. */
  handleSignals?: boolean;
  logger?: Logger;
}

export interface SchoolbellHandle {
  coordinator: SyncCoordinator;
  config: SchoolbellConfig;
  /** Result of the first cycle. */
  firstCycle: CycleResult;
  stop(): void;
}

// ---------------------------------------------------------------------------
// Bootstrap
// ---------------------------------------------------------------------------

export async function startSchoolbell(options: StartOptions): Promise<SchoolbellHandle> {
  // ---- 1. Load config ----

  const { config, validation } = loadConfig();
  const log = options.logger ?? pino({ name: 'schoolbell', level: config.logging.level });

  log.info({ home: buildPaths().home }, 'Schoolbell starting');

  if (!validation.valid) {
    for (const err of validation.errors) {
      log.warn({ path: err.path }, `Config validation error: ${err.message}`);
    }
  }
  for (const warn of validation.warnings) {
    log.warn({ path: warn.path }, `Config warning: ${warn.message}`);
  }

  // ---- 2. Children ----

  const children = trackedChildren(config);
  if (children.length === 0) {
    log.warn('No children configured and no account holder set; nothing will be fetched');
  }

  // ---- 3. Coordinator ----

  const coordinator = new SyncCoordinator({
    source: options.source,
    children,
    intervalMinutes: config.polling.intervalMinutes,
    calendarDaysAhead: config.calendar.daysAhead,
    retries: config.polling.retries,
    retryDelayMs: config.polling.retryDelayMs,
    thresholds: config.health.thresholds,
    issueSink: options.issueSink,
    reauth: options.reauth,
    logger: log,
  });

  coordinator.start();
  const firstCycle = await coordinator.refresh();

  if (firstCycle.ok) {
    log.info({ children: children.length }, 'Schoolbell is ready');
  } else {
    log.warn({ kind: firstCycle.kind, error: firstCycle.error.message }, 'First update failed; retrying on schedule');
  }

  // ---- 4. Graceful shutdown ----

  const onSignal = (signal: NodeJS.Signals): void => {
    log.info({ signal }, 'Shutting down');
    stop();
  };

  function stop(): void {
    coordinator.stop();
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }

  if (options.handleSignals ?? true) {
    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);
  }

  return { coordinator, config, firstCycle, stop };
}

export type { SchoolDataSource, CycleResult } from '@schoolbell/sync';
