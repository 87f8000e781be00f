/**
 * @schoolbell/sync - Diagnostics report
 */

import type { SchoolbellConfig } from '@schoolbell/core';
import type { HealthState, Issue } from '@schoolbell/health';
import type { SyncCoordinator } from './coordinator.js';

export const REDACTED = '**REDACTED**';

export interface DiagnosticsReport {
  config: {
    school: {
      name: string;
      code: string;
      host: string;
      deviceId: string;
      secret: string;
      userGuid: string;
    };
    timezone: string;
    intervalMinutes: number;
    lookaheadDays: number;
    children: Array<{ id: string; name: string; timezone: string; lookaheadDays: number }>;
  };
  coordinator: {
    running: boolean;
    lastUpdateSuccess: boolean;
    stale: boolean;
    statistics: HealthState;
    issues: Issue[];
  };
  dataSummary: {
    childrenCount: number;
    hasData: boolean;
    lastUpdated: string | null;
  };
}

/**
 * Point-in-time report for a support surface. Credentials never leave here
 * in clear text.
 */
export function buildDiagnostics(
  coordinator: SyncCoordinator,
  config: SchoolbellConfig,
  now: Date = new Date(),
): DiagnosticsReport {
  const school = config.school;
  const snapshotState = coordinator.getSnapshot();
  const snapshot = snapshotState.status === 'ready' ? snapshotState.snapshot : null;

  return {
    config: {
      school: {
        name: school?.name ?? 'Unknown',
        code: school?.code ?? 'Unknown',
        host: school?.host ?? 'Unknown',
        deviceId: REDACTED,
        secret: REDACTED,
        userGuid: school?.userGuid ?? 'Unknown',
      },
      timezone: config.timezone,
      intervalMinutes: config.polling.intervalMinutes,
      lookaheadDays: config.tasks.lookaheadDays,
      children: coordinator.getChildren().map((tracked) => ({
        id: tracked.child.id,
        name: tracked.child.name,
        timezone: tracked.child.timezone,
        lookaheadDays: tracked.lookaheadDays,
      })),
    },
    coordinator: {
      running: coordinator.isRunning(),
      lastUpdateSuccess: coordinator.lastUpdateSucceeded(),
      stale: coordinator.isStale(now),
      statistics: coordinator.getStatistics(),
      issues: coordinator.listIssues(),
    },
    dataSummary: {
      childrenCount: snapshot?.children.size ?? 0,
      hasData: snapshot !== null,
      lastUpdated: snapshot?.producedAt.toISOString() ?? null,
    },
  };
}
