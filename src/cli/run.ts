/**
 * Ingestion subcommands.
 *
 * - run [mailbox…]  — one pass over the named (or all active) mailboxes
 * - schedule        — foreground loop until SIGINT/SIGTERM
 */

import { loadConfig } from '../config/loader.js';
import { createConsoleDiagnostics } from '../ingest/diagnostics.js';
import { createServices } from '../services/index.js';
import { formatRunReport } from '../utils/report-format.js';

export async function runOnce(names: string[]): Promise<void> {
  const config = await loadConfig();
  const { ingestion } = createServices(config, createConsoleDiagnostics(config.settings.logLevel));

  const controller = new AbortController();
  const abort = () => {
    controller.abort();
  };
  process.once('SIGINT', abort);
  process.once('SIGTERM', abort);

  try {
    const run = await ingestion.runAll(names, { signal: controller.signal });
    console.log(formatRunReport(run));
    if (run.totals.failed > 0) {
      process.exitCode = 1;
    }
  } finally {
    process.off('SIGINT', abort);
    process.off('SIGTERM', abort);
  }
}

export async function runSchedule(): Promise<void> {
  const config = await loadConfig();
  const diagnostics = createConsoleDiagnostics(config.settings.logLevel);
  const { scheduler } = createServices(config, diagnostics);

  console.error(
    `Ingesting ${config.mailboxes.filter((m) => m.active).length} mailbox(es) every ${config.settings.interval}s. Ctrl+C to stop.`,
  );
  scheduler.start();

  await new Promise<void>((resolve) => {
    const shutdown = () => {
      process.off('SIGINT', shutdown);
      process.off('SIGTERM', shutdown);
      console.error('Stopping after the current message…');
      resolve(scheduler.stop());
    };
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
  });

  const last = scheduler.getLastRun();
  if (last?.report) {
    console.log(formatRunReport(last.report));
  }
}
