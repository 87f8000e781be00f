/**
 * Unit Tests for the Health Tracker
 *
 * Tests the pure reducer (thresholds, edges, resets, lifetime counters) and
 * the HealthTracker wrapper's callbacks.
 */
import { describe, it, expect, vi } from 'vitest';
import {
  DEFAULT_THRESHOLDS,
  HealthTracker,
  createHealthState,
  reduceHealth,
  stageOf,
  type CycleOutcome,
  type ErrorKind,
  type HealthState,
  type HealthTransition,
} from '@schoolbell/health';

vi.mock('pino', () => ({
  pino: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

const AT = new Date('2025-03-10T09:00:00Z');

function fail(kind: ErrorKind, message = `${kind} failed`): CycleOutcome {
  return { ok: false, at: AT, kind, message };
}

const OK: CycleOutcome = { ok: true, at: AT };

/** Fold outcomes through the reducer, collecting every transition. */
function run(outcomes: CycleOutcome[], start: HealthState = createHealthState()) {
  let state = start;
  const transitions: HealthTransition[] = [];
  for (const outcome of outcomes) {
    const next = reduceHealth(state, outcome);
    state = next.state;
    transitions.push(...next.transitions);
  }
  return { state, transitions };
}

describe('Health Tracker', () => {
  // ---------------------------------------------------------------------------
  // Initial state
  // ---------------------------------------------------------------------------
  describe('createHealthState', () => {
    it('uses the default thresholds', () => {
      const state = createHealthState();
      expect(state.kinds.authentication.threshold).toBe(1);
      expect(state.kinds.connection.threshold).toBe(3);
      expect(state.kinds.rate_limit.threshold).toBe(3);
      expect(state.kinds.data_format.threshold).toBe(5);
      expect(DEFAULT_THRESHOLDS.data_format).toBe(5);
    });

    it('accepts overrides and never goes below 1', () => {
      const state = createHealthState({ connection: 2, data_format: 0 });
      expect(state.kinds.connection.threshold).toBe(2);
      expect(state.kinds.data_format.threshold).toBe(1);
    });

    it('starts healthy with zeroed counters', () => {
      const state = createHealthState();
      expect(stageOf(state.kinds.connection)).toBe('healthy');
      expect(state.totalCycles).toBe(0);
      expect(state.lastSuccessAt).toBeNull();
      expect(state.lastError).toBeNull();
    });
  });

  // ---------------------------------------------------------------------------
  // Thresholds
  // ---------------------------------------------------------------------------
  describe('Thresholds', () => {
    it('enters alerting exactly once after threshold consecutive failures', () => {
      const first = run([fail('connection'), fail('connection')]);
      expect(first.transitions).toEqual([]);
      expect(stageOf(first.state.kinds.connection)).toBe('degrading');

      const third = reduceHealth(first.state, fail('connection'));
      expect(third.transitions).toEqual([
        { type: 'entered_alerting', kind: 'connection', consecutiveFailures: 3 },
      ]);
      expect(stageOf(third.state.kinds.connection)).toBe('alerting');

      const fourth = reduceHealth(third.state, fail('connection'));
      expect(fourth.transitions).toEqual([]);
      expect(fourth.state.kinds.connection.consecutiveFailures).toBe(4);
    });

    it('alerts on the first authentication failure', () => {
      const { transitions } = run([fail('authentication')]);
      expect(transitions).toEqual([
        { type: 'entered_alerting', kind: 'authentication', consecutiveFailures: 1 },
      ]);
    });

    it('needs five data_format failures', () => {
      const four = run([1, 2, 3, 4].map(() => fail('data_format')));
      expect(four.transitions).toEqual([]);
      const five = reduceHealth(four.state, fail('data_format'));
      expect(five.transitions).toHaveLength(1);
    });

    it('a failure of one kind leaves the other kinds alone', () => {
      const { state } = run([fail('connection'), fail('connection'), fail('data_format')]);
      expect(state.kinds.connection.consecutiveFailures).toBe(2);
      expect(state.kinds.data_format.consecutiveFailures).toBe(1);
      expect(state.kinds.rate_limit.consecutiveFailures).toBe(0);
    });
  });

  // ---------------------------------------------------------------------------
  // Success resets
  // ---------------------------------------------------------------------------
  describe('Success', () => {
    it('a single interleaved success resets the counter', () => {
      const { state, transitions } = run([
        fail('connection'),
        fail('connection'),
        OK,
        fail('connection'),
        fail('connection'),
      ]);
      expect(transitions).toEqual([]);
      expect(state.kinds.connection.consecutiveFailures).toBe(2);
    });

    it('clears every alerting kind once', () => {
      const { state, transitions } = run([
        fail('authentication'),
        fail('rate_limit'),
        fail('rate_limit'),
        fail('rate_limit'),
        OK,
        OK,
      ]);

      expect(transitions).toEqual([
        { type: 'entered_alerting', kind: 'authentication', consecutiveFailures: 1 },
        { type: 'entered_alerting', kind: 'rate_limit', consecutiveFailures: 3 },
        { type: 'cleared_alerting', kind: 'authentication', consecutiveFailures: 0 },
        { type: 'cleared_alerting', kind: 'rate_limit', consecutiveFailures: 0 },
      ]);
      expect(stageOf(state.kinds.rate_limit)).toBe('healthy');
    });

    it('keeps lifetime counters across resets', () => {
      const { state } = run([
        fail('connection'),
        fail('connection'),
        fail('connection'),
        fail('connection'),
        OK,
      ]);

      expect(state.totalCycles).toBe(5);
      expect(state.failedCycles).toBe(4);
      expect(state.successfulCycles).toBe(1);
      expect(state.kinds.connection.totalFailures).toBe(4);
      expect(state.kinds.connection.consecutiveFailures).toBe(0);
      expect(state.lastSuccessAt).toBe('2025-03-10T09:00:00.000Z');
      expect(state.lastFailureAt).toBe('2025-03-10T09:00:00.000Z');
      expect(state.lastError).toEqual({ kind: 'connection', message: 'connection failed' });
    });

    it('does not mutate the input state', () => {
      const before = createHealthState();
      reduceHealth(before, fail('connection'));
      expect(before.kinds.connection.consecutiveFailures).toBe(0);
      expect(before.totalCycles).toBe(0);
    });
  });

  // ---------------------------------------------------------------------------
  // HealthTracker wrapper
  // ---------------------------------------------------------------------------
  describe('HealthTracker', () => {
    it('forwards transitions to the callbacks', () => {
      const onEnteredAlerting = vi.fn();
      const onClearedAlerting = vi.fn();
      const tracker = new HealthTracker({ onEnteredAlerting, onClearedAlerting });

      tracker.record(fail('connection'));
      tracker.record(fail('connection'));
      expect(tracker.stage('connection')).toBe('degrading');
      expect(onEnteredAlerting).not.toHaveBeenCalled();

      tracker.record(fail('connection'));
      expect(onEnteredAlerting).toHaveBeenCalledTimes(1);
      expect(onEnteredAlerting.mock.calls[0]?.[0]).toBe('connection');
      expect(tracker.isAlerting('connection')).toBe(true);

      tracker.record(OK);
      expect(onClearedAlerting).toHaveBeenCalledTimes(1);
      expect(onClearedAlerting.mock.calls[0]?.[0]).toBe('connection');
      expect(tracker.isAlerting('connection')).toBe(false);
    });

    it('uses configured thresholds', () => {
      const onEnteredAlerting = vi.fn();
      const tracker = new HealthTracker({ thresholds: { connection: 1 }, onEnteredAlerting });

      const transitions = tracker.record(fail('connection'));
      expect(transitions).toHaveLength(1);
      expect(onEnteredAlerting).toHaveBeenCalledTimes(1);
    });

    it('exposes the current state', () => {
      const tracker = new HealthTracker();
      tracker.record(fail('rate_limit', 'slow down'));
      const state = tracker.getState();
      expect(state.failedCycles).toBe(1);
      expect(state.lastError).toEqual({ kind: 'rate_limit', message: 'slow down' });
    });
  });
});
