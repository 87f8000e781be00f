/**
 * @schoolbell/health - IssueNotifier
 *
 * Keeps one standing, user-visible problem record per error kind. Raised
 * when the HealthTracker enters alerting for that kind and dismissed when it
 * clears. Authentication issues also arm the external re-auth flow.
 */

import { pino, type Logger } from 'pino';
import type { ErrorKind } from './errors.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type IssueSeverity = 'error' | 'warning';

export interface Issue {
  /** `<kind>_error`, e.g. "connection_error". */
  id: string;
  kind: ErrorKind;
  severity: IssueSeverity;
  title: string;
  description: string;
  placeholders: Record<string, string>;
  createdAt: string;
  updatedAt: string;
}

/** Context available when an issue is raised. */
export interface IssueContext {
  consecutiveFailures?: number;
  errorMessage?: string;
  /** Current polling interval, used to suggest a slower one on throttling. */
  intervalMinutes?: number;
}

/** Destination for issue records (a dashboard, an alert channel, ...). */
export interface IssueSink {
  upsert(issue: Issue): void;
  dismiss(issueId: string): void;
}

/** Hook into the external config layer's re-authentication flow. */
export interface ReauthHandler {
  request(reason: string): void;
}

export interface IssueNotifierOptions {
  sink?: IssueSink;
  reauth?: ReauthHandler;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Templates
// ---------------------------------------------------------------------------

interface IssueTemplate {
  severity: IssueSeverity;
  title: string;
  describe: (placeholders: Record<string, string>) => string;
}

const TEMPLATES: Record<ErrorKind, IssueTemplate> = {
  authentication: {
    severity: 'error',
    title: 'Authentication failed',
    describe: () => 'The school service rejected the stored credentials. Sign in again to resume updates.',
  },
  connection: {
    severity: 'warning',
    title: 'Cannot reach the school service',
    describe: (p) =>
      `Updates have failed ${p['consecutive_failures'] ?? 'several'} times in a row. Showing the last data received.`,
  },
  rate_limit: {
    severity: 'warning',
    title: 'Requests are being throttled',
    describe: (p) =>
      `The school service is limiting requests. Consider raising the update interval to ${p['update_interval'] ?? 'a longer'} minutes.`,
  },
  data_format: {
    severity: 'warning',
    title: 'Unexpected data from the school service',
    describe: (p) => `Responses could not be read: ${p['error_message'] ?? 'unknown error'}`,
  },
};

export function issueIdFor(kind: ErrorKind): string {
  return `${kind}_error`;
}

function placeholdersFor(kind: ErrorKind, context: IssueContext): Record<string, string> {
  const placeholders: Record<string, string> = {};

  if (context.consecutiveFailures !== undefined) {
    placeholders['consecutive_failures'] = String(context.consecutiveFailures);
  }
  if (context.errorMessage !== undefined) {
    placeholders['error_message'] = context.errorMessage;
  }
  if (kind === 'rate_limit' && context.intervalMinutes !== undefined) {
    placeholders['update_interval'] = String(context.intervalMinutes + 5);
  }

  return placeholders;
}

// ---------------------------------------------------------------------------
// IssueNotifier
// ---------------------------------------------------------------------------

export class IssueNotifier {
  private readonly issues = new Map<ErrorKind, Issue>();
  private readonly sink?: IssueSink;
  private readonly reauth?: ReauthHandler;
  private readonly log: Logger;

  constructor(options: IssueNotifierOptions = {}) {
    this.sink = options.sink;
    this.reauth = options.reauth;
    this.log = options.logger ?? pino({ name: '@schoolbell/issues' });
  }

  /**
   * Create the issue for `kind`, or refresh it when it is already raised.
   */
  onEnteredAlerting(kind: ErrorKind, context: IssueContext = {}, now: Date = new Date()): Issue {
    const template = TEMPLATES[kind];
    const placeholders = placeholdersFor(kind, context);
    const existing = this.issues.get(kind);
    const at = now.toISOString();

    const issue: Issue = {
      id: issueIdFor(kind),
      kind,
      severity: template.severity,
      title: template.title,
      description: template.describe(placeholders),
      placeholders,
      createdAt: existing?.createdAt ?? at,
      updatedAt: at,
    };

    this.issues.set(kind, issue);
    this.sink?.upsert(issue);

    if (!existing) {
      this.log.warn({ issue: issue.id, severity: issue.severity }, 'Issue raised');
      if (kind === 'authentication') {
        this.reauth?.request(context.errorMessage ?? 'Authentication failed');
      }
    }

    return issue;
  }

  /**
   * Remove the issue for `kind`. No-op when none is raised.
   */
  onClearedAlerting(kind: ErrorKind): boolean {
    const existing = this.issues.get(kind);
    if (!existing) {
      return false;
    }

    this.issues.delete(kind);
    this.sink?.dismiss(existing.id);
    this.log.info({ issue: existing.id }, 'Issue dismissed');
    return true;
  }

  hasIssue(kind: ErrorKind): boolean {
    return this.issues.has(kind);
  }

  getIssue(kind: ErrorKind): Issue | undefined {
    return this.issues.get(kind);
  }

  listIssues(): Issue[] {
    return [...this.issues.values()];
  }
}
