/**
 * SchedulerService — periodic ingestion passes.
 *
 * Runs `runAll` once on start and then `interval` seconds after each pass
 * finishes, so passes never overlap. `stop()` cancels the pass in flight
 * (cycles stop between messages and still finalize) and waits for it.
 */

import type { DiagnosticSink } from '../ingest/diagnostics.js';
import { noopDiagnostics } from '../ingest/diagnostics.js';
import { describeError } from '../ingest/errors.js';
import type { RunReport } from '../types/index.js';
import type IngestionService from './ingestion.service.js';

export interface SchedulerRun {
  startedAt: string;
  finishedAt: string;
  /** Absent when the pass itself failed. */
  report?: RunReport;
  error?: string;
}

export interface SchedulerStatus {
  started: boolean;
  running: boolean;
  intervalSeconds: number;
  runs: number;
  lastRun: SchedulerRun | null;
}

export default class SchedulerService {
  private ingestion: Pick<IngestionService, 'runAll'>;

  private intervalSeconds: number;

  private diagnostics: DiagnosticSink;

  private now: () => Date;

  private started = false;

  private timer: ReturnType<typeof setTimeout> | null = null;

  private controller: AbortController | null = null;

  private current: Promise<void> | null = null;

  private lastRun: SchedulerRun | null = null;

  private runs = 0;

  constructor(
    ingestion: Pick<IngestionService, 'runAll'>,
    intervalSeconds: number,
    options: { diagnostics?: DiagnosticSink; now?: () => Date } = {},
  ) {
    this.ingestion = ingestion;
    this.intervalSeconds = intervalSeconds;
    this.diagnostics = options.diagnostics ?? noopDiagnostics;
    this.now = options.now ?? (() => new Date());
  }

  start(): void {
    if (this.started) return;
    this.started = true;
    this.tick();
  }

  async stop(): Promise<void> {
    this.started = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.controller?.abort();
    await this.current;
  }

  getLastRun(): SchedulerRun | null {
    return this.lastRun;
  }

  getStatus(): SchedulerStatus {
    return {
      started: this.started,
      running: this.current !== null,
      intervalSeconds: this.intervalSeconds,
      runs: this.runs,
      lastRun: this.lastRun,
    };
  }

  // -------------------------------------------------------------------------
  // Loop
  // -------------------------------------------------------------------------

  private tick(): void {
    this.timer = null;
    const controller = new AbortController();
    this.controller = controller;
    this.current = this.runOnce(controller.signal).finally(() => {
      this.current = null;
      this.controller = null;
      if (this.started) {
        this.timer = setTimeout(() => {
          this.tick();
        }, this.intervalSeconds * 1000);
      }
    });
  }

  private async runOnce(signal: AbortSignal): Promise<void> {
    const startedAt = this.now().toISOString();
    this.runs += 1;
    try {
      const report = await this.ingestion.runAll([], { signal });
      this.lastRun = { startedAt, finishedAt: this.now().toISOString(), report };
      await this.diagnostics.emit({
        level: report.totals.failed > 0 ? 'warning' : 'info',
        event: 'scheduler.pass',
        mailbox: '*',
        ...report.totals,
      });
    } catch (err) {
      this.lastRun = { startedAt, finishedAt: this.now().toISOString(), error: describeError(err) };
      await this.diagnostics.emit({
        level: 'error',
        event: 'scheduler.pass-failed',
        mailbox: '*',
        error: describeError(err),
      });
    }
  }
}
