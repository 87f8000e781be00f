/**
 * @schoolbell/health - Failure classification and sustained-failure alerting
 *
 * Provides:
 *   - A closed error-kind taxonomy with a total classifier
 *   - A per-kind health state machine behind a pure reducer
 *   - Standing issue records driven by alerting transitions
 *
 * @packageDocumentation
 */

// Errors - taxonomy and classifier
export {
  ERROR_KINDS,
  SchoolSyncError,
  AuthenticationError,
  TokenExpiredError,
  ConnectionError,
  RateLimitError,
  DataFormatError,
  HttpError,
  classify,
  classifyHttpStatus,
  isErrorKind,
  toSyncError,
  type ErrorKind,
} from './errors.js';

// Tracker - per-kind failure state machine
export {
  HealthTracker,
  DEFAULT_THRESHOLDS,
  createHealthState,
  reduceHealth,
  stageOf,
  type HealthStage,
  type KindHealth,
  type HealthState,
  type CycleOutcome,
  type HealthTransition,
  type Thresholds,
  type HealthTrackerOptions,
} from './tracker.js';

// Issues - standing problem records
export {
  IssueNotifier,
  issueIdFor,
  type Issue,
  type IssueSeverity,
  type IssueContext,
  type IssueSink,
  type ReauthHandler,
  type IssueNotifierOptions,
} from './issues.js';
