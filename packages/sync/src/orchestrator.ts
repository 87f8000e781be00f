/**
 * @schoolbell/sync - FetchOrchestrator
 *
 * Runs one polling cycle: events and tasks for every tracked child, fetched
 * concurrently, normalised, and folded into a single frozen snapshot. Any
 * child's failure rejects the whole cycle, so no partial snapshot is ever
 * produced. The first failure aborts pending retries, and the cycle settles
 * only once every call has, so nothing from it outlives it.
 */

import { pino, type Logger } from 'pino';
import {
  addLocalDays,
  createSnapshot,
  errorMessage,
  localDay,
  retry,
  type ChildSnapshot,
  type Snapshot,
  type TaskWindow,
} from '@schoolbell/core';
import { classify, toSyncError } from '@schoolbell/health';
import type { TrackedChild } from './children.js';
import { parseEvents, parseTasks } from './payload.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * The transport collaborator. Both calls resolve to raw JSON and reject with
 * whatever the transport throws; the classifier sorts that out.
 */
export interface SchoolDataSource {
  fetchEvents(childId: string, start: Date, end: Date): Promise<unknown>;
  fetchTasks(childId: string, window: TaskWindow): Promise<unknown>;
}

export interface FetchOrchestratorOptions {
  source: SchoolDataSource;
  /** Days of lessons requested from the start of today. Default 30. */
  calendarDaysAhead?: number;
  /** Per-call retries for connection failures. Default 2. */
  retries?: number;
  retryDelayMs?: number;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// FetchOrchestrator
// ---------------------------------------------------------------------------

export class FetchOrchestrator {
  private readonly source: SchoolDataSource;
  private readonly calendarDaysAhead: number;
  private readonly retries: number;
  private readonly retryDelayMs: number;
  private readonly log: Logger;

  constructor(options: FetchOrchestratorOptions) {
    this.source = options.source;
    this.calendarDaysAhead = options.calendarDaysAhead ?? 30;
    this.retries = options.retries ?? 2;
    this.retryDelayMs = options.retryDelayMs ?? 2000;
    this.log = options.logger ?? pino({ name: '@schoolbell/sync' });
  }

  /**
   * Fetch every child and build a snapshot stamped with the completion time.
   *
   * @throws SchoolSyncError of the classified kind when any call fails
   */
  async runCycle(children: readonly TrackedChild[], now: Date = new Date()): Promise<Snapshot> {
    const controller = new AbortController();
    const fail = (err: unknown): never => {
      if (!controller.signal.aborted) controller.abort(err);
      throw err;
    };

    const settled = await Promise.allSettled(
      children.map((tracked) => this.fetchChild(tracked, now, controller.signal, fail).catch(fail)),
    );

    if (controller.signal.aborted) {
      throw toSyncError(controller.signal.reason);
    }

    const entries = settled.flatMap((result) => (result.status === 'fulfilled' ? [result.value] : []));
    return createSnapshot(new Date(), entries);
  }

  private async fetchChild(
    tracked: TrackedChild,
    now: Date,
    signal: AbortSignal,
    fail: (err: unknown) => never,
  ): Promise<ChildSnapshot> {
    const { child } = tracked;
    const startOfToday = localDay(now, child.timezone).start;
    const eventsEnd = addLocalDays(startOfToday, this.calendarDaysAhead, child.timezone);
    const window: TaskWindow = {
      from: startOfToday,
      to: addLocalDays(startOfToday, tracked.lookaheadDays + 1, child.timezone),
      includeOverdue: true,
    };

    const [eventsResult, tasksResult] = await Promise.allSettled([
      this.withRetry(child.id, 'events', signal, () => this.source.fetchEvents(child.id, startOfToday, eventsEnd)).catch(
        fail,
      ),
      this.withRetry(child.id, 'tasks', signal, () => this.source.fetchTasks(child.id, window)).catch(fail),
    ]);
    if (eventsResult.status === 'rejected') throw eventsResult.reason;
    if (tasksResult.status === 'rejected') throw tasksResult.reason;

    const events = parseEvents(eventsResult.value, child.id, this.log);
    const tasks = parseTasks(tasksResult.value, child.id, this.log).filter(
      (task) => task.dueAt === null || task.dueAt.getTime() <= window.to.getTime(),
    );

    this.log.debug({ childId: child.id, events: events.length, tasks: tasks.length }, 'Child fetched');
    return { child, events, tasks };
  }

  private withRetry<T>(
    childId: string,
    what: 'events' | 'tasks',
    signal: AbortSignal,
    fn: () => Promise<T>,
  ): Promise<T> {
    return retry(fn, {
      signal,
      maxRetries: this.retries,
      initialDelayMs: this.retryDelayMs,
      shouldRetry: (err) => classify(err) === 'connection',
      onRetry: (err, attempt) => {
        this.log.warn({ childId, what, attempt, error: errorMessage(err) }, 'Retrying fetch');
      },
    });
  }
}
