/**
 * Plain-text rendering of run reports, shared by the CLI and MCP tools.
 */

import type { CycleSummary, MailboxReport, RunReport } from '../types/index.js';

function countsLine(summary: CycleSummary): string {
  const parts = [
    `${summary.yielded} ingested`,
    `${summary.skippedDuplicate} duplicate`,
    `${summary.skippedFiltered} filtered`,
  ];
  if (summary.oversized > 0) parts.push(`${summary.oversized} oversized`);
  const errors =
    summary.parseErrors + summary.fetchErrors + summary.dedupErrors + summary.retentionErrors;
  if (errors > 0) parts.push(`${errors} error(s)`);
  if (summary.archived > 0 || summary.archiveErrors > 0) {
    parts.push(`${summary.archived} archived`);
  }
  if (summary.expunged > 0) parts.push(`${summary.expunged} deleted`);
  if (summary.cancelled) parts.push('cancelled');
  return parts.join(' · ');
}

export function formatMailboxReport(report: MailboxReport): string {
  if (report.status === 'failed') {
    const lines = [`❌ ${report.mailbox} — ${report.failure?.message ?? 'failed'}`];
    if (report.summary.yielded > 0) lines.push(`   ${countsLine(report.summary)}`);
    return lines.join('\n');
  }
  const lines = [`✅ ${report.mailbox} (${report.policy})`, `   ${countsLine(report.summary)}`];
  report.messages.slice(0, 10).forEach((m) => {
    lines.push(`   • ${m.subject || '(no subject)'} — ${m.from}`);
  });
  if (report.messages.length > 10) {
    lines.push(`   … and ${report.messages.length - 10} more`);
  }
  return lines.join('\n');
}

export function formatRunReport(run: RunReport): string {
  if (run.reports.length === 0) return 'No active mailboxes to ingest.';
  const { mailboxes, failed, yielded } = run.totals;
  return [
    ...run.reports.map(formatMailboxReport),
    '',
    `${mailboxes} mailbox(es), ${yielded} message(s) ingested, ${failed} failed`,
  ].join('\n');
}
