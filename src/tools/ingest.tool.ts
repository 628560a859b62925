/**
 * MCP tools: run_ingestion, list_ingested, scheduler_status
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';

import type IngestionService from '../services/ingestion.service.js';
import type SchedulerService from '../services/scheduler.service.js';
import { formatRunReport } from '../utils/report-format.js';

function errorResult(prefix: string, err: unknown) {
  const errMsg = err instanceof Error ? err.message : String(err);
  return {
    isError: true,
    content: [{ type: 'text' as const, text: `${prefix}: ${errMsg}` }],
  };
}

export default function registerIngestTools(
  server: McpServer,
  ingestion: IngestionService,
  scheduler: SchedulerService,
): void {
  // ---------------------------------------------------------------------------
  // run_ingestion
  // ---------------------------------------------------------------------------
  server.tool(
    'run_ingestion',
    'Run one ingestion pass. Accepted messages are stored, then the mailbox retention policy ' +
      'is applied (which may mark messages read or delete them from the server).',
    {
      mailbox: z
        .string()
        .optional()
        .describe('Mailbox name from list_mailboxes. Omit to run every active mailbox.'),
    },
    { readOnlyHint: false, destructiveHint: true, idempotentHint: false },
    async ({ mailbox }) => {
      try {
        const run = await ingestion.runAll(mailbox ? [mailbox] : []);
        return {
          isError: run.totals.failed > 0,
          content: [{ type: 'text' as const, text: formatRunReport(run) }],
        };
      } catch (err) {
        return errorResult('Failed to run ingestion', err);
      }
    },
  );

  // ---------------------------------------------------------------------------
  // list_ingested
  // ---------------------------------------------------------------------------
  server.tool(
    'list_ingested',
    'List messages already ingested for a mailbox, newest first.',
    {
      mailbox: z.string().describe('Mailbox name from list_mailboxes'),
      limit: z.number().int().min(1).max(100).default(20).describe('Maximum messages to return'),
    },
    { readOnlyHint: true, destructiveHint: false },
    async ({ mailbox, limit }) => {
      try {
        const messages = await ingestion.listIngested(mailbox, limit);
        const listed = messages.map((m) => ({
          uid: m.uid,
          messageId: m.messageId ?? null,
          from: m.from,
          subject: m.subject,
          date: m.date ?? null,
          attachments: m.attachments.map((a) => a.filename),
          storedAt: m.storedAt,
        }));
        return {
          content: [{ type: 'text' as const, text: JSON.stringify(listed, null, 2) }],
        };
      } catch (err) {
        return errorResult('Failed to list ingested messages', err);
      }
    },
  );

  // ---------------------------------------------------------------------------
  // scheduler_status
  // ---------------------------------------------------------------------------
  server.tool(
    'scheduler_status',
    'Show whether the background scheduler is running and the outcome of its last pass.',
    {},
    { readOnlyHint: true, destructiveHint: false },
    async () => {
      const status = scheduler.getStatus();
      const lines = [
        `Scheduler: ${status.started ? 'started' : 'stopped'}${status.running ? ' (pass in progress)' : ''}`,
        `Interval: ${status.intervalSeconds}s · passes so far: ${status.runs}`,
      ];
      const last = status.lastRun;
      if (!last) {
        lines.push('No pass has completed yet.');
      } else {
        lines.push(`Last pass: ${last.startedAt} → ${last.finishedAt}`);
        lines.push(last.report ? formatRunReport(last.report) : `Failed: ${last.error ?? 'unknown error'}`);
      }
      return {
        content: [{ type: 'text' as const, text: lines.join('\n') }],
      };
    },
  );
}
