/**
 * NotifierService — webhook dispatch for ingested mail.
 *
 * One POST per accepted message (`mail.received`) and an optional
 * per-mailbox batch summary (`mail.batch`). Disabled when no webhook URL is
 * configured. Delivery problems are reported to the diagnostic sink and
 * never reach the caller.
 */

import type { DiagnosticSink } from '../ingest/diagnostics.js';
import { noopDiagnostics } from '../ingest/diagnostics.js';
import { describeError } from '../ingest/errors.js';
import { validateWebhookUrl } from '../safety/validation.js';
import type { MailboxReport, NotificationsConfig, ParsedMessage } from '../types/index.js';

const WEBHOOK_TIMEOUT_MS = 5000;

export default class NotifierService {
  private config: NotificationsConfig;

  private diagnostics: DiagnosticSink;

  /** Set once the URL has failed validation; no request is attempted after that. */
  private invalidUrl: string | null = null;

  constructor(config: NotificationsConfig, diagnostics: DiagnosticSink = noopDiagnostics) {
    this.config = config;
    this.diagnostics = diagnostics;
    if (config.webhookUrl) {
      try {
        validateWebhookUrl(config.webhookUrl);
      } catch (err) {
        this.invalidUrl = describeError(err);
      }
    }
  }

  get enabled(): boolean {
    return Boolean(this.config.webhookUrl) && this.invalidUrl === null;
  }

  async notifyMessage(message: ParsedMessage): Promise<void> {
    await this.dispatch(message.mailbox, {
      event: 'mail.received',
      mailbox: message.mailbox,
      uid: message.uid,
      message_id: message.messageId ?? null,
      from: message.from,
      to: message.to,
      subject: message.subject,
      date: message.date ?? null,
      attachments: message.attachments.length,
      timestamp: new Date().toISOString(),
    });
  }

  /** Sends a `mail.batch` summary when more than one message arrived. */
  async notifyBatch(report: MailboxReport): Promise<void> {
    if (!this.config.summary || report.messages.length <= 1) return;
    await this.dispatch(report.mailbox, {
      event: 'mail.batch',
      mailbox: report.mailbox,
      count: report.messages.length,
      subjects: report.messages.map((m) => m.subject),
      status: report.status,
      timestamp: new Date().toISOString(),
    });
  }

  // -------------------------------------------------------------------------
  // Webhook
  // -------------------------------------------------------------------------

  private async dispatch(mailbox: string, payload: Record<string, unknown>): Promise<void> {
    if (!this.config.webhookUrl) return;

    if (this.invalidUrl !== null) {
      await this.diagnostics.emit({
        level: 'warning',
        event: 'notifier.invalid-url',
        mailbox,
        error: this.invalidUrl,
      });
      return;
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => {
      controller.abort();
    }, WEBHOOK_TIMEOUT_MS);

    try {
      const resp = await fetch(this.config.webhookUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal: controller.signal,
      });
      if (!resp.ok) {
        await this.diagnostics.emit({
          level: 'warning',
          event: 'notifier.rejected',
          mailbox,
          status: resp.status,
        });
      }
    } catch (err) {
      await this.diagnostics.emit({
        level: 'warning',
        event: 'notifier.failed',
        mailbox,
        error: describeError(err),
      });
    } finally {
      clearTimeout(timeout);
    }
  }
}
