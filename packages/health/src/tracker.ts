/**
 * @schoolbell/health - HealthTracker
 *
 * Tracks consecutive failures per error kind, decides when a sustained
 * failure crosses its threshold (and when it clears), and keeps lifetime
 * counters for the diagnostics surface.
 *
 * The state machine lives in the pure `reduceHealth` reducer so it can be
 * exercised without a clock or a network; `HealthTracker` wraps it with
 * logging and transition callbacks.
 */

import { pino, type Logger } from 'pino';
import { ERROR_KINDS, type ErrorKind } from './errors.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Stage of a single kind: healthy -> degrading (below threshold) -> alerting. */
export type HealthStage = 'healthy' | 'degrading' | 'alerting';

export interface KindHealth {
  consecutiveFailures: number;
  threshold: number;
  alerting: boolean;
  /** Lifetime failures of this kind; never reset. */
  totalFailures: number;
}

export interface HealthState {
  kinds: Record<ErrorKind, KindHealth>;
  totalCycles: number;
  successfulCycles: number;
  failedCycles: number;
  lastSuccessAt: string | null;
  lastFailureAt: string | null;
  lastError: { kind: ErrorKind; message: string } | null;
}

export type CycleOutcome =
  | { ok: true; at: Date }
  | { ok: false; at: Date; kind: ErrorKind; message: string };

export interface HealthTransition {
  type: 'entered_alerting' | 'cleared_alerting';
  kind: ErrorKind;
  /** Count at the moment of the transition (0 when cleared). */
  consecutiveFailures: number;
}

export type Thresholds = Record<ErrorKind, number>;

/** Credentials do not self-heal, transient network issues usually do. */
export const DEFAULT_THRESHOLDS: Readonly<Thresholds> = Object.freeze({
  authentication: 1,
  connection: 3,
  rate_limit: 3,
  data_format: 5,
});

// ---------------------------------------------------------------------------
// Reducer
// ---------------------------------------------------------------------------

export function createHealthState(thresholds: Partial<Thresholds> = {}): HealthState {
  const fresh = (kind: ErrorKind): KindHealth => ({
    consecutiveFailures: 0,
    threshold: Math.max(1, thresholds[kind] ?? DEFAULT_THRESHOLDS[kind]),
    alerting: false,
    totalFailures: 0,
  });

  return {
    kinds: {
      authentication: fresh('authentication'),
      connection: fresh('connection'),
      rate_limit: fresh('rate_limit'),
      data_format: fresh('data_format'),
    },
    totalCycles: 0,
    successfulCycles: 0,
    failedCycles: 0,
    lastSuccessAt: null,
    lastFailureAt: null,
    lastError: null,
  };
}

/**
 * Apply one cycle outcome. Returns a new state and the alerting edges it
 * crossed; the input state is not modified.
 *
 * - failure of kind k: only k's counter moves; reaching the threshold while
 *   not alerting yields exactly one `entered_alerting`
 * - success: every counter returns to 0, every alerting kind yields one
 *   `cleared_alerting`
 */
export function reduceHealth(
  state: HealthState,
  outcome: CycleOutcome,
): { state: HealthState; transitions: HealthTransition[] } {
  const transitions: HealthTransition[] = [];
  const at = outcome.at.toISOString();
  const kinds = { ...state.kinds };

  if (outcome.ok) {
    for (const kind of ERROR_KINDS) {
      const current = kinds[kind];
      if (current.alerting) {
        transitions.push({ type: 'cleared_alerting', kind, consecutiveFailures: 0 });
      }
      kinds[kind] = { ...current, consecutiveFailures: 0, alerting: false };
    }

    return {
      state: {
        ...state,
        kinds,
        totalCycles: state.totalCycles + 1,
        successfulCycles: state.successfulCycles + 1,
        lastSuccessAt: at,
      },
      transitions,
    };
  }

  const current = kinds[outcome.kind];
  const consecutiveFailures = current.consecutiveFailures + 1;
  const crossed = consecutiveFailures >= current.threshold;

  if (crossed && !current.alerting) {
    transitions.push({ type: 'entered_alerting', kind: outcome.kind, consecutiveFailures });
  }

  kinds[outcome.kind] = {
    ...current,
    consecutiveFailures,
    alerting: current.alerting || crossed,
    totalFailures: current.totalFailures + 1,
  };

  return {
    state: {
      ...state,
      kinds,
      totalCycles: state.totalCycles + 1,
      failedCycles: state.failedCycles + 1,
      lastFailureAt: at,
      lastError: { kind: outcome.kind, message: outcome.message },
    },
    transitions,
  };
}

export function stageOf(health: KindHealth): HealthStage {
  if (health.alerting) return 'alerting';
  if (health.consecutiveFailures > 0) return 'degrading';
  return 'healthy';
}

// ---------------------------------------------------------------------------
// HealthTracker
// ---------------------------------------------------------------------------

export interface HealthTrackerOptions {
  thresholds?: Partial<Thresholds>;
  onEnteredAlerting?: (kind: ErrorKind, health: Readonly<HealthState>) => void;
  onClearedAlerting?: (kind: ErrorKind, health: Readonly<HealthState>) => void;
  logger?: Logger;
}

/**
 * ```ts
 * const tracker = new HealthTracker({
 *   onEnteredAlerting: (kind) => notifier.onEnteredAlerting(kind),
 *   onClearedAlerting: (kind) => notifier.onClearedAlerting(kind),
 * });
 * tracker.record({ ok: false, at: new Date(), kind: 'connection', message: 'timeout' });
 * ```
 */
export class HealthTracker {
  private state: HealthState;
  private readonly log: Logger;
  private readonly onEnteredAlerting?: HealthTrackerOptions['onEnteredAlerting'];
  private readonly onClearedAlerting?: HealthTrackerOptions['onClearedAlerting'];

  constructor(options: HealthTrackerOptions = {}) {
    this.state = createHealthState(options.thresholds);
    this.onEnteredAlerting = options.onEnteredAlerting;
    this.onClearedAlerting = options.onClearedAlerting;
    this.log = options.logger ?? pino({ name: '@schoolbell/health' });
  }

  /**
   * Record one cycle outcome and fire the callbacks for every edge it crossed.
   */
  record(outcome: CycleOutcome): HealthTransition[] {
    const { state, transitions } = reduceHealth(this.state, outcome);
    this.state = state;

    if (!outcome.ok) {
      this.log.debug(
        { kind: outcome.kind, consecutiveFailures: state.kinds[outcome.kind].consecutiveFailures },
        'Cycle failure recorded',
      );
    }

    for (const transition of transitions) {
      if (transition.type === 'entered_alerting') {
        this.log.warn(
          { kind: transition.kind, consecutiveFailures: transition.consecutiveFailures },
          'Failure threshold crossed',
        );
        this.onEnteredAlerting?.(transition.kind, this.state);
      } else {
        this.log.info({ kind: transition.kind }, 'Failure cleared');
        this.onClearedAlerting?.(transition.kind, this.state);
      }
    }

    return transitions;
  }

  getState(): Readonly<HealthState> {
    return this.state;
  }

  stage(kind: ErrorKind): HealthStage {
    return stageOf(this.state.kinds[kind]);
  }

  isAlerting(kind: ErrorKind): boolean {
    return this.state.kinds[kind].alerting;
  }
}
