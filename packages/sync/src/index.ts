/**
 * @schoolbell/sync - Polling, snapshot publishing and diagnostics
 *
 * Provides:
 *   - Raw payload normalisation (TypeBox-checked records)
 *   - A fetch orchestrator that builds one snapshot per cycle
 *   - The coordinator that owns the polling loop and the published snapshot
 *   - A redacted diagnostics report
 *
 * @packageDocumentation
 */

export { trackedChildren, type TrackedChild } from './children.js';

export {
  parseEvents,
  parseTasks,
  isCompletedStatus,
  RawEventSchema,
  RawTaskSchema,
  type RawEvent,
  type RawTask,
} from './payload.js';

export {
  FetchOrchestrator,
  type SchoolDataSource,
  type FetchOrchestratorOptions,
} from './orchestrator.js';

export {
  SyncCoordinator,
  type CycleResult,
  type SyncCoordinatorOptions,
} from './coordinator.js';

export { buildDiagnostics, REDACTED, type DiagnosticsReport } from './diagnostics.js';
