/**
 * @schoolbell/sync - Tracked children
 *
 * Resolves the configured children into the per-child settings the
 * orchestrator and the view reads need.
 */

import type { Child, ChildConfig, SchoolbellConfig } from '@schoolbell/core';

export interface TrackedChild {
  child: Child;
  lookaheadDays: number;
  showClassTimes: boolean;
}

/**
 * Per-child settings fall back to the global ones. When no children are
 * listed, the account holder (`school.userGuid`) is tracked instead.
 */
export function trackedChildren(config: SchoolbellConfig): TrackedChild[] {
  let entries: ChildConfig[] = config.children;

  if (entries.length === 0 && config.school?.userGuid) {
    entries = [{ id: config.school.userGuid, name: config.school.userName ?? 'Student' }];
  }

  return entries.map((entry) => ({
    child: {
      id: entry.id,
      name: entry.name,
      timezone: entry.timezone ?? config.timezone,
    },
    lookaheadDays: entry.taskLookaheadDays ?? config.tasks.lookaheadDays,
    showClassTimes: entry.showClassTimes ?? config.display.showClassTimes,
  }));
}
