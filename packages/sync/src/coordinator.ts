/**
 * @schoolbell/sync - SyncCoordinator
 *
 * Owns the published snapshot, the polling loop and the health/issue
 * bookkeeping. At most one cycle runs at a time; readers always see the last
 * fully published snapshot and never wait on a cycle.
 *
 * Events:
 *   - started / stopped
 *   - update        (snapshot)       a new snapshot was published
 *   - cycle-failed  (SchoolSyncError) a cycle failed; the old snapshot stays
 */

import { EventEmitter } from 'node:events';
import { pino, type Logger } from 'pino';
import {
  EMPTY_SNAPSHOT_STATE,
  MS_PER_MINUTE,
  errorMessage,
  type Snapshot,
  type SnapshotState,
} from '@schoolbell/core';
import {
  HealthTracker,
  IssueNotifier,
  toSyncError,
  type ErrorKind,
  type HealthState,
  type Issue,
  type IssueSink,
  type ReauthHandler,
  type SchoolSyncError,
  type Thresholds,
} from '@schoolbell/health';
import {
  calendarEvents,
  currentOrNextEvent,
  projectView,
  type CalendarEntry,
  type UnavailableView,
  type ViewKind,
  type ViewOf,
} from '@schoolbell/views';
import type { TrackedChild } from './children.js';
import { FetchOrchestrator, type SchoolDataSource } from './orchestrator.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type CycleResult =
  | { ok: true; snapshot: Snapshot }
  | { ok: false; kind: ErrorKind; error: SchoolSyncError };

export interface SyncCoordinatorOptions {
  source: SchoolDataSource;
  children: readonly TrackedChild[];
  /** Minutes between scheduled cycles. Default 15. */
  intervalMinutes?: number;
  calendarDaysAhead?: number;
  retries?: number;
  retryDelayMs?: number;
  thresholds?: Partial<Thresholds>;
  issueSink?: IssueSink;
  reauth?: ReauthHandler;
  logger?: Logger;
}

/** Upper bound on scheduled ticks skipped after repeated throttling. */
const MAX_BACKOFF_TICKS = 4;

// ---------------------------------------------------------------------------
// SyncCoordinator
// ---------------------------------------------------------------------------

export class SyncCoordinator extends EventEmitter {
  private readonly children: readonly TrackedChild[];
  private readonly childrenById: ReadonlyMap<string, TrackedChild>;
  private readonly intervalMinutes: number;
  private readonly orchestrator: FetchOrchestrator;
  private readonly tracker: HealthTracker;
  private readonly notifier: IssueNotifier;
  private readonly log: Logger;

  private state: SnapshotState = EMPTY_SNAPSHOT_STATE;
  private lastSucceeded = false;
  private inFlight: Promise<CycleResult> | null = null;
  private timer: ReturnType<typeof setInterval> | null = null;
  private running = false;

  private rateLimitStreak = 0;
  private backoffTicks = 0;

  constructor(options: SyncCoordinatorOptions) {
    super();
    this.children = options.children;
    this.childrenById = new Map(options.children.map((c) => [c.child.id, c]));
    this.intervalMinutes = options.intervalMinutes ?? 15;
    this.log = options.logger ?? pino({ name: '@schoolbell/sync' });

    this.orchestrator = new FetchOrchestrator({
      source: options.source,
      calendarDaysAhead: options.calendarDaysAhead,
      retries: options.retries,
      retryDelayMs: options.retryDelayMs,
      logger: this.log,
    });

    this.notifier = new IssueNotifier({
      sink: options.issueSink,
      reauth: options.reauth,
      logger: this.log,
    });

    this.tracker = new HealthTracker({
      thresholds: options.thresholds,
      logger: this.log,
      onEnteredAlerting: (kind, health) => {
        this.raiseIssue(kind, health);
      },
      onClearedAlerting: (kind) => {
        this.notifier.onClearedAlerting(kind);
      },
    });
  }

  // -----------------------------------------------------------------------
  // Lifecycle
  // -----------------------------------------------------------------------

  /**
   * Run a cycle now and then every `intervalMinutes`. The timer keeps the
   * process alive until `stop()`. Await `refresh()` afterwards to join the
   * first cycle.
   */
  start(): void {
    if (this.running) return;
    this.running = true;

    this.timer = setInterval(() => {
      this.tick();
    }, this.intervalMinutes * MS_PER_MINUTE);

    this.log.info(
      { children: this.children.length, intervalMinutes: this.intervalMinutes },
      'Coordinator started',
    );
    this.emit('started');

    this.tick();
  }

  /**
   * Stop scheduling cycles. A cycle already in flight still completes.
   */
  stop(): void {
    if (!this.running) return;
    this.running = false;

    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }

    this.log.info('Coordinator stopped');
    this.emit('stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  // -----------------------------------------------------------------------
  // Cycles
  // -----------------------------------------------------------------------

  /**
   * Run one cycle, or join the one already in flight. Ignores rate-limit
   * backoff.
   */
  refresh(): Promise<CycleResult> {
    if (this.inFlight) {
      return this.inFlight;
    }

    const cycle = this.runCycle().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = cycle;
    return cycle;
  }

  triggerManualRefresh(): Promise<CycleResult> {
    this.log.info('Manual refresh requested');
    return this.refresh();
  }

  private tick(): void {
    if (this.inFlight) {
      this.log.debug('Previous cycle still running; skipping tick');
      return;
    }
    if (this.backoffTicks > 0) {
      this.backoffTicks--;
      this.log.debug({ remaining: this.backoffTicks }, 'Rate limited; skipping tick');
      return;
    }

    this.refresh().catch((err: unknown) => {
      this.log.error({ error: errorMessage(err) }, 'Scheduled cycle failed unexpectedly');
    });
  }

  private async runCycle(): Promise<CycleResult> {
    let snapshot: Snapshot;

    try {
      snapshot = await this.orchestrator.runCycle(this.children, new Date());
    } catch (err) {
      return this.handleFailure(toSyncError(err));
    }

    this.state = { status: 'ready', snapshot };
    this.lastSucceeded = true;
    this.rateLimitStreak = 0;
    this.backoffTicks = 0;
    this.tracker.record({ ok: true, at: snapshot.producedAt });

    this.log.info(
      { children: snapshot.children.size, producedAt: snapshot.producedAt.toISOString() },
      'Snapshot published',
    );
    this.emit('update', snapshot);

    return { ok: true, snapshot };
  }

  private handleFailure(error: SchoolSyncError): CycleResult {
    const { kind } = error;
    this.lastSucceeded = false;

    if (kind === 'rate_limit') {
      this.rateLimitStreak++;
      this.backoffTicks = Math.min(2 ** (this.rateLimitStreak - 1), MAX_BACKOFF_TICKS);
    } else {
      this.rateLimitStreak = 0;
      this.backoffTicks = 0;
    }

    const details = { kind, error: error.message, backoffTicks: this.backoffTicks };
    if (kind === 'authentication') {
      this.log.error(details, 'Cycle failed');
    } else {
      this.log.warn(details, 'Cycle failed');
    }

    const transitions = this.tracker.record({ ok: false, at: new Date(), kind, message: error.message });

    // Already alerting: keep the standing issue's details current.
    if (this.tracker.isAlerting(kind) && !transitions.some((t) => t.type === 'entered_alerting')) {
      this.raiseIssue(kind, this.tracker.getState());
    }

    this.emit('cycle-failed', error);
    return { ok: false, kind, error };
  }

  private raiseIssue(kind: ErrorKind, health: Readonly<HealthState>): void {
    this.notifier.onEnteredAlerting(kind, {
      consecutiveFailures: health.kinds[kind].consecutiveFailures,
      errorMessage: health.lastError?.message,
      intervalMinutes: this.intervalMinutes,
    });
  }

  // -----------------------------------------------------------------------
  // Readers
  // -----------------------------------------------------------------------

  getSnapshot(): SnapshotState {
    return this.state;
  }

  /**
   * Project one view for a child. Unavailable until a snapshot exists, and
   * for children the snapshot does not know.
   */
  getView<K extends ViewKind>(childId: string, kind: K, now: Date = new Date()): ViewOf<K> | UnavailableView<K> {
    if (this.state.status === 'empty') {
      return { kind, childId, available: false, reason: 'no_data' };
    }

    const { snapshot } = this.state;
    const tracked = this.childrenById.get(childId);
    if (!tracked || !snapshot.children.has(childId)) {
      return { kind, childId, available: false, reason: 'unknown_child' };
    }

    return projectView(kind, {
      snapshot,
      childId,
      now,
      timezone: tracked.child.timezone,
      lookaheadDays: tracked.lookaheadDays,
      showClassTimes: tracked.showClassTimes,
    });
  }

  getCalendarEvents(childId: string, start: Date, end: Date): CalendarEntry[] {
    if (this.state.status === 'empty') return [];
    return calendarEvents(this.state.snapshot, childId, start, end);
  }

  getCurrentOrNextEvent(childId: string, now: Date = new Date()): CalendarEntry | null {
    if (this.state.status === 'empty') return null;
    return currentOrNextEvent(this.state.snapshot, childId, now);
  }

  getChildren(): readonly TrackedChild[] {
    return this.children;
  }

  lastUpdateSucceeded(): boolean {
    return this.lastSucceeded;
  }

  /** A copy of the health counters; changing it does not affect tracking. */
  getStatistics(): HealthState {
    return structuredClone(this.tracker.getState());
  }

  /**
   * True when the published snapshot is being served after a failed cycle,
   * or is older than two polling intervals.
   */
  isStale(now: Date = new Date()): boolean {
    if (this.state.status === 'empty') return false;
    if (!this.lastSucceeded) return true;
    const age = now.getTime() - this.state.snapshot.producedAt.getTime();
    return age > 2 * this.intervalMinutes * MS_PER_MINUTE;
  }

  listIssues(): Issue[] {
    return this.notifier.listIssues();
  }

  onUpdate(listener: (snapshot: Snapshot) => void): () => void {
    this.on('update', listener);
    return () => {
      this.off('update', listener);
    };
  }
}
