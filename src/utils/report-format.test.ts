import { emptySummary } from '../ingest/cycle.js';
import type { MailboxReport } from '../types/index.js';
import { formatMailboxReport, formatRunReport } from './report-format.js';

function report(overrides: Partial<MailboxReport> = {}): MailboxReport {
  return {
    mailbox: 'support',
    policy: 'delete_after_processing',
    status: 'done',
    summary: { ...emptySummary(), yielded: 2, expunged: 2 },
    messages: [
      { uid: 1, from: 'ann@example.com', subject: 'Printer' },
      { uid: 2, from: 'bob@example.com', subject: '' },
    ],
    startedAt: '2024-05-06T10:00:00.000Z',
    finishedAt: '2024-05-06T10:00:01.000Z',
    ...overrides,
  };
}

describe('formatMailboxReport', () => {
  it('lists counts and messages for a finished mailbox', () => {
    expect(formatMailboxReport(report())).toBe(
      [
        '✅ support (delete_after_processing)',
        '   2 ingested · 0 duplicate · 0 filtered · 2 deleted',
        '   • Printer — ann@example.com',
        '   • (no subject) — bob@example.com',
      ].join('\n'),
    );
  });

  it('shows the failure message', () => {
    const failed = report({
      status: 'failed',
      summary: emptySummary(),
      failure: { kind: 'ConnectionError', message: 'ConnectionError for mailbox "support": timeout' },
      messages: [],
    });

    expect(formatMailboxReport(failed)).toBe(
      '❌ support — ConnectionError for mailbox "support": timeout',
    );
  });

  it('adds errors, oversized and cancellation when present', () => {
    const busy = report({
      summary: { ...emptySummary(), yielded: 1, parseErrors: 1, fetchErrors: 1, oversized: 3, cancelled: true },
      messages: [],
    });

    expect(formatMailboxReport(busy)).toBe(
      [
        '✅ support (delete_after_processing)',
        '   1 ingested · 0 duplicate · 0 filtered · 3 oversized · 2 error(s) · cancelled',
      ].join('\n'),
    );
  });
});

describe('formatRunReport', () => {
  it('adds a totals line', () => {
    const text = formatRunReport({
      reports: [report({ messages: [] })],
      totals: { mailboxes: 1, failed: 0, yielded: 2 },
    });

    expect(text.split('\n').at(-1)).toBe('1 mailbox(es), 2 message(s) ingested, 0 failed');
  });

  it('says when nothing ran', () => {
    expect(formatRunReport({ reports: [], totals: { mailboxes: 0, failed: 0, yielded: 0 } })).toBe(
      'No active mailboxes to ingest.',
    );
  });
});
