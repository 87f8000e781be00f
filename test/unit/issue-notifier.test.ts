/**
 * Unit Tests for the Issue Notifier
 *
 * Tests raising, refreshing and dismissing standing issues, severities,
 * placeholders and the re-auth hook.
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { IssueNotifier, issueIdFor, type IssueSink, type ReauthHandler } from '@schoolbell/health';

vi.mock('pino', () => ({
  pino: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

describe('IssueNotifier', () => {
  let sink: { upsert: ReturnType<typeof vi.fn>; dismiss: ReturnType<typeof vi.fn> };
  let reauth: { request: ReturnType<typeof vi.fn> };
  let notifier: IssueNotifier;

  beforeEach(() => {
    sink = { upsert: vi.fn(), dismiss: vi.fn() };
    reauth = { request: vi.fn() };
    const issueSink: IssueSink = sink;
    const reauthHandler: ReauthHandler = reauth;
    notifier = new IssueNotifier({ sink: issueSink, reauth: reauthHandler });
  });

  // ---------------------------------------------------------------------------
  // Raising
  // ---------------------------------------------------------------------------
  describe('onEnteredAlerting', () => {
    it('creates an issue keyed by kind', () => {
      const issue = notifier.onEnteredAlerting(
        'connection',
        { consecutiveFailures: 3 },
        new Date('2025-03-10T09:00:00Z'),
      );

      expect(issue.id).toBe('connection_error');
      expect(issue.severity).toBe('warning');
      expect(issue.placeholders).toEqual({ consecutive_failures: '3' });
      expect(issue.description).toBe(
        'Updates have failed 3 times in a row. Showing the last data received.',
      );
      expect(issue.createdAt).toBe('2025-03-10T09:00:00.000Z');
      expect(sink.upsert).toHaveBeenCalledWith(issue);
      expect(notifier.hasIssue('connection')).toBe(true);
    });

    it('authentication issues are errors and arm re-auth', () => {
      const issue = notifier.onEnteredAlerting('authentication', { errorMessage: 'Invalid secret' });
      expect(issue.severity).toBe('error');
      expect(reauth.request).toHaveBeenCalledWith('Invalid secret');
    });

    it('other kinds do not arm re-auth', () => {
      notifier.onEnteredAlerting('connection');
      notifier.onEnteredAlerting('rate_limit');
      notifier.onEnteredAlerting('data_format');
      expect(reauth.request).not.toHaveBeenCalled();
    });

    it('suggests a slower interval on rate limiting', () => {
      const issue = notifier.onEnteredAlerting('rate_limit', { intervalMinutes: 15 });
      expect(issue.placeholders['update_interval']).toBe('20');
      expect(issue.description).toBe(
        'The school service is limiting requests. Consider raising the update interval to 20 minutes.',
      );
    });

    it('includes the last message for data format problems', () => {
      const issue = notifier.onEnteredAlerting('data_format', { errorMessage: 'Expected a list of tasks, got object' });
      expect(issue.description).toBe('Responses could not be read: Expected a list of tasks, got object');
    });

    it('refreshing an existing issue keeps createdAt and does not re-arm re-auth', () => {
      notifier.onEnteredAlerting('authentication', {}, new Date('2025-03-10T09:00:00Z'));
      const refreshed = notifier.onEnteredAlerting('authentication', {}, new Date('2025-03-10T09:15:00Z'));

      expect(refreshed.createdAt).toBe('2025-03-10T09:00:00.000Z');
      expect(refreshed.updatedAt).toBe('2025-03-10T09:15:00.000Z');
      expect(reauth.request).toHaveBeenCalledTimes(1);
      expect(sink.upsert).toHaveBeenCalledTimes(2);
      expect(notifier.listIssues()).toHaveLength(1);
    });
  });

  // ---------------------------------------------------------------------------
  // Dismissing
  // ---------------------------------------------------------------------------
  describe('onClearedAlerting', () => {
    it('removes a raised issue', () => {
      notifier.onEnteredAlerting('connection');
      expect(notifier.onClearedAlerting('connection')).toBe(true);
      expect(sink.dismiss).toHaveBeenCalledWith('connection_error');
      expect(notifier.hasIssue('connection')).toBe(false);
    });

    it('is a no-op when nothing is raised', () => {
      expect(notifier.onClearedAlerting('rate_limit')).toBe(false);
      expect(sink.dismiss).not.toHaveBeenCalled();
    });

    it('re-arms re-auth for a new authentication issue after a clear', () => {
      notifier.onEnteredAlerting('authentication');
      notifier.onClearedAlerting('authentication');
      notifier.onEnteredAlerting('authentication');
      expect(reauth.request).toHaveBeenCalledTimes(2);
    });
  });

  it('works without a sink', () => {
    const bare = new IssueNotifier();
    bare.onEnteredAlerting('data_format');
    expect(bare.getIssue('data_format')?.id).toBe(issueIdFor('data_format'));
  });
});
