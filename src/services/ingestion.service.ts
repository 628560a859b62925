/**
 * IngestionService — runs ingestion cycles for the configured mailboxes.
 *
 * Each accepted message is saved to the store before the cycle is pulled
 * again, then handed to the notifier. Mailboxes run in parallel up to
 * `settings.concurrency`; every mailbox gets its own session.
 */

import { openImapSession } from '../connections/session.js';
import type { SessionFactory } from '../connections/types.js';
import type { MessageCondition } from '../ingest/conditions.js';
import { allOf, compileMatchRules } from '../ingest/conditions.js';
import IngestionCycle, { drainCycle, emptySummary } from '../ingest/cycle.js';
import type { DiagnosticSink } from '../ingest/diagnostics.js';
import { noopDiagnostics } from '../ingest/diagnostics.js';
import { describeError, isIngestError } from '../ingest/errors.js';
import type {
  AppConfig,
  MailboxConfig,
  MailboxReport,
  MessageDigest,
  ParsedMessage,
  RunReport,
} from '../types/index.js';
import { mapConcurrent } from '../utils/concurrency.js';
import type { MessageStore, StoredMessage } from './message-store.js';
import type NotifierService from './notifier.service.js';

export interface IngestionServiceOptions {
  store: MessageStore;
  openSession?: SessionFactory;
  notifier?: NotifierService;
  diagnostics?: DiagnosticSink;
  /** Applied to every mailbox on top of its own `match` rules. */
  condition?: MessageCondition;
  now?: () => Date;
}

export interface RunOptions {
  signal?: AbortSignal;
}

function digest(message: ParsedMessage): MessageDigest {
  return {
    uid: message.uid,
    messageId: message.messageId,
    from: message.from,
    subject: message.subject,
    date: message.date,
  };
}

export default class IngestionService {
  private config: AppConfig;

  private store: MessageStore;

  private openSession: SessionFactory;

  private notifier: NotifierService | undefined;

  private diagnostics: DiagnosticSink;

  private condition: MessageCondition | undefined;

  private now: () => Date;

  constructor(config: AppConfig, options: IngestionServiceOptions) {
    this.config = config;
    this.store = options.store;
    this.openSession = options.openSession ?? openImapSession;
    this.notifier = options.notifier;
    this.diagnostics = options.diagnostics ?? noopDiagnostics;
    this.condition = options.condition;
    this.now = options.now ?? (() => new Date());
  }

  getMailboxNames(): string[] {
    return this.config.mailboxes.map((m) => m.name);
  }

  getMailbox(name: string): MailboxConfig {
    const mailbox = this.config.mailboxes.find((m) => m.name === name);
    if (!mailbox) {
      throw new Error(
        `Mailbox "${name}" not found. Available: ${this.getMailboxNames().join(', ')}`,
      );
    }
    return mailbox;
  }

  async listIngested(mailbox: string, limit?: number): Promise<StoredMessage[]> {
    this.getMailbox(mailbox);
    return this.store.list(mailbox, limit);
  }

  // -------------------------------------------------------------------------
  // Runs
  // -------------------------------------------------------------------------

  async runMailbox(name: string, options: RunOptions = {}): Promise<MailboxReport> {
    const config = this.getMailbox(name);
    const startedAt = this.now().toISOString();
    const messages: MessageDigest[] = [];

    const cycle = new IngestionCycle(config, {
      openSession: this.openSession,
      dedup: this.store,
      diagnostics: this.diagnostics,
      condition: allOf(compileMatchRules(config.match), this.condition),
      signal: options.signal,
    });

    let failure: MailboxReport['failure'];
    try {
      await drainCycle(cycle, this.store, async (message) => {
        messages.push(digest(message));
        await this.notifier?.notifyMessage(message);
      });
    } catch (err) {
      failure = {
        kind: isIngestError(err) ? err.kind : 'Error',
        message: describeError(err),
      };
      await this.diagnostics.emit({
        level: 'error',
        event: 'mailbox.failed',
        mailbox: name,
        kind: failure.kind,
        error: failure.message,
      });
    }

    const report: MailboxReport = {
      mailbox: name,
      policy: config.policy,
      status: failure ? 'failed' : 'done',
      summary: cycle.summary,
      failure,
      messages,
      startedAt,
      finishedAt: this.now().toISOString(),
    };
    await this.notifier?.notifyBatch(report);
    return report;
  }

  /**
   * Run the named mailboxes, or every active one. Unknown names are
   * rejected before anything runs.
   */
  async runAll(names: string[] = [], options: RunOptions = {}): Promise<RunReport> {
    const targets =
      names.length > 0
        ? names.map((n) => this.getMailbox(n))
        : this.config.mailboxes.filter((m) => m.active);

    const settled = await mapConcurrent(targets, this.config.settings.concurrency, async (m) =>
      this.runMailbox(m.name, options),
    );

    const reports = settled.map((result, i): MailboxReport => {
      if (result.status === 'fulfilled') return result.value;
      const at = this.now().toISOString();
      return {
        mailbox: targets[i].name,
        policy: targets[i].policy,
        status: 'failed',
        summary: emptySummary(),
        failure: { kind: 'Error', message: describeError(result.reason) },
        messages: [],
        startedAt: at,
        finishedAt: at,
      };
    });

    return {
      reports,
      totals: {
        mailboxes: reports.length,
        failed: reports.filter((r) => r.status === 'failed').length,
        yielded: reports.reduce((sum, r) => sum + r.summary.yielded, 0),
      },
    };
  }
}
