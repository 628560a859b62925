/**
 * IngestionCycle — one pass over one mailbox under one retention policy.
 *
 *   init → selecting → (no-candidates | iterating) → finalizing → done
 *   init | selecting → failed
 *
 * Accepted messages come out of a pull-based async iterator. The only
 * suspension point is the `yield` of an accepted message: its archive copy
 * and retention effect run when the consumer pulls the next value.
 *
 * Early termination by the consumer (break / return / throw inside
 * `for await`) still closes the session, leaves the last yielded message
 * untouched and never expunges. Cancellation through `signal` is checked
 * before each UID; the cycle then skips the remaining UIDs and finalizes
 * normally, expunging what it already marked.
 */

import type { MailSession, SessionFactory } from '../connections/types.js';
import type {
  CycleState,
  CycleSummary,
  MailboxConfig,
  ParsedMessage,
  ProcessingOutcome,
} from '../types/index.js';
import { copyToArchive, ensureArchiveFolder } from './archive.js';
import type { DedupFilter, PersistenceSink } from './collaborators.js';
import type { MessageCondition } from './conditions.js';
import type { DiagnosticEvent, DiagnosticSink } from './diagnostics.js';
import { noopDiagnostics } from './diagnostics.js';
import type { IngestError } from './errors.js';
import { classify, describeError } from './errors.js';
import fetchMessage from './fetcher.js';
import type { MessageParser } from './parser.js';
import { parseMessage } from './parser.js';
import type { PolicyBehavior } from './policy.js';
import { behaviorOf, isReadOnlyPolicy } from './policy.js';
import applyRetention from './retention.js';
import selectCandidates from './selector.js';
import filterBySize from './size-filter.js';

export interface CycleOptions {
  openSession: SessionFactory;
  dedup: DedupFilter;
  diagnostics?: DiagnosticSink;
  /** Extra acceptance condition; failing messages are skipped-by-condition. */
  condition?: MessageCondition;
  parse?: MessageParser;
  signal?: AbortSignal;
}

export function emptySummary(): CycleSummary {
  return {
    yielded: 0,
    skippedDuplicate: 0,
    skippedFiltered: 0,
    parseErrors: 0,
    fetchErrors: 0,
    dedupErrors: 0,
    oversized: 0,
    archived: 0,
    archiveErrors: 0,
    retentionApplied: 0,
    retentionErrors: 0,
    expunged: 0,
    cancelled: false,
  };
}

const OUTCOME_COUNTER: Record<
  ProcessingOutcome,
  'yielded' | 'skippedDuplicate' | 'skippedFiltered' | 'parseErrors' | 'fetchErrors' | 'dedupErrors'
> = {
  yielded: 'yielded',
  'skipped-duplicate': 'skippedDuplicate',
  'skipped-by-condition': 'skippedFiltered',
  'parse-error': 'parseErrors',
  'fetch-error': 'fetchErrors',
  'dedup-error': 'dedupErrors',
};

export default class IngestionCycle implements AsyncIterable<ParsedMessage> {
  readonly config: MailboxConfig;

  readonly behavior: PolicyBehavior;

  private options: CycleOptions;

  private diagnostics: DiagnosticSink;

  private parse: MessageParser;

  private currentState: CycleState = 'init';

  private counts: CycleSummary = emptySummary();

  private pendingDeletes: number[] = [];

  private failure: IngestError | undefined;

  private started = false;

  constructor(config: MailboxConfig, options: CycleOptions) {
    this.config = config;
    this.behavior = behaviorOf(config.policy);
    this.options = options;
    this.diagnostics = options.diagnostics ?? noopDiagnostics;
    this.parse = options.parse ?? parseMessage;
  }

  get state(): CycleState {
    return this.currentState;
  }

  get summary(): CycleSummary {
    return { ...this.counts };
  }

  /** The cycle-level failure, once the cycle is `failed`. */
  get error(): IngestError | undefined {
    return this.failure;
  }

  [Symbol.asyncIterator](): AsyncGenerator<ParsedMessage, CycleSummary, undefined> {
    if (this.started) {
      throw new Error(`Ingestion cycle for "${this.config.name}" can only be consumed once`);
    }
    this.started = true;
    return this.run();
  }

  // -------------------------------------------------------------------------
  // Driver
  // -------------------------------------------------------------------------

  private async *run(): AsyncGenerator<ParsedMessage, CycleSummary, undefined> {
    const { name: mailbox, policy, folder } = this.config;
    await this.emit({ level: 'info', event: 'cycle.start', mailbox, policy, folder });

    let session: MailSession;
    try {
      session = await this.options.openSession(this.config, {
        readOnly: isReadOnlyPolicy(policy),
      });
    } catch (err) {
      throw await this.fail(classify('ConnectionError', mailbox, err));
    }

    let completed = false;
    try {
      this.currentState = 'selecting';
      let uids: number[];
      try {
        uids = await this.select(session);
      } catch (err) {
        throw await this.fail(classify('SelectionError', mailbox, err));
      }

      if (uids.length === 0) {
        this.currentState = 'no-candidates';
        await this.emit({ level: 'info', event: 'cycle.no-candidates', mailbox });
        completed = true;
        return this.summary;
      }

      const archive =
        this.config.archive &&
        (await ensureArchiveFolder(session, this.config.archive, this.diagnostics))
          ? this.config.archive
          : undefined;

      this.currentState = 'iterating';
      // eslint-disable-next-line no-restricted-syntax
      for (const uid of uids) {
        if (this.options.signal?.aborted) {
          this.counts.cancelled = true;
          // eslint-disable-next-line no-await-in-loop
          await this.emit({
            level: 'info',
            event: 'cycle.cancelled',
            mailbox,
            remaining: uids.length - uids.indexOf(uid),
          });
          break;
        }
        // eslint-disable-next-line no-await-in-loop
        const message = await this.evaluate(session, uid);
        if (message) {
          yield message;
          // eslint-disable-next-line no-await-in-loop
          await this.accept(session, uid, archive);
        }
      }
      completed = true;
    } finally {
      await this.finalize(session, completed);
    }
    return this.summary;
  }

  // -------------------------------------------------------------------------
  // Selecting
  // -------------------------------------------------------------------------

  private async select(session: MailSession): Promise<number[]> {
    const { name: mailbox, maxMessageSize } = this.config;
    let uids = await selectCandidates(session, this.config.policy);
    await this.emit({
      level: 'debug',
      event: 'cycle.selected',
      mailbox,
      selection: this.behavior.selection,
      candidates: uids.length,
    });

    if (maxMessageSize !== undefined && uids.length > 0) {
      const kept = await filterBySize(session, uids, maxMessageSize, this.diagnostics);
      this.counts.oversized = uids.length - kept.length;
      uids = kept;
    }
    return uids;
  }

  // -------------------------------------------------------------------------
  // Iterating
  // -------------------------------------------------------------------------

  /** Fetch, parse, filter and dedup one UID. Never throws. */
  private async evaluate(session: MailSession, uid: number): Promise<ParsedMessage | undefined> {
    const mailbox = this.config.name;

    let message: ParsedMessage;
    try {
      const raw = await fetchMessage(session, uid, this.behavior.fetchMode, this.diagnostics);
      try {
        message = await this.parse(raw, mailbox);
      } catch (err) {
        return await this.record(uid, 'parse-error', classify('ParseError', mailbox, err, uid));
      }
    } catch (err) {
      return await this.record(uid, 'fetch-error', classify('FetchError', mailbox, err, uid));
    }

    const { condition } = this.options;
    if (condition) {
      let accepted: boolean;
      try {
        accepted = condition(message);
      } catch (err) {
        return await this.record(uid, 'skipped-by-condition', err);
      }
      if (!accepted) {
        return await this.record(uid, 'skipped-by-condition');
      }
    }

    if (message.messageId) {
      let duplicate: boolean;
      try {
        duplicate = await this.options.dedup.exists(message.messageId, mailbox);
      } catch (err) {
        return await this.record(uid, 'dedup-error', err, message.messageId);
      }
      if (duplicate) {
        return await this.record(uid, 'skipped-duplicate', undefined, message.messageId);
      }
    }

    await this.record(uid, 'yielded', undefined, message.messageId);
    return message;
  }

  /** Archive copy then retention effect for one accepted message. Never throws. */
  private async accept(
    session: MailSession,
    uid: number,
    archive: string | undefined,
  ): Promise<void> {
    if (archive) {
      const copied = await copyToArchive(session, uid, archive, this.diagnostics);
      if (copied) {
        this.counts.archived += 1;
      } else {
        this.counts.archiveErrors += 1;
      }
    }

    const { effect } = this.behavior;
    try {
      if (await applyRetention(session, uid, effect)) {
        this.counts.retentionApplied += 1;
        if (effect === 'delete') this.pendingDeletes.push(uid);
      }
    } catch (err) {
      this.counts.retentionErrors += 1;
      await this.emit({
        level: 'warning',
        event: 'retention.failed',
        mailbox: this.config.name,
        uid,
        effect,
        error: describeError(err),
      });
    }
  }

  private async record(
    uid: number,
    outcome: ProcessingOutcome,
    error?: unknown,
    messageId?: string,
  ): Promise<undefined> {
    this.counts[OUTCOME_COUNTER[outcome]] += 1;
    let level: DiagnosticEvent['level'] = 'debug';
    if (outcome === 'yielded') level = 'info';
    if (error !== undefined) level = 'warning';
    await this.emit({
      level,
      event: 'message.outcome',
      mailbox: this.config.name,
      uid,
      outcome,
      ...(messageId ? { messageId } : {}),
      ...(error !== undefined ? { error: describeError(error) } : {}),
    });
    return undefined;
  }

  // -------------------------------------------------------------------------
  // Finalizing
  // -------------------------------------------------------------------------

  private async finalize(session: MailSession, completed: boolean): Promise<void> {
    const mailbox = this.config.name;
    const failed = this.failure !== undefined;
    this.currentState = 'finalizing';

    if (!completed && !failed) {
      await this.emit({
        level: 'info',
        event: 'cycle.stopped-early',
        mailbox,
        pendingDeletes: this.pendingDeletes.length,
      });
    }

    if (completed && this.pendingDeletes.length > 0) {
      const uids = [...this.pendingDeletes];
      try {
        await session.expunge(uids);
        this.counts.expunged = uids.length;
        await this.emit({ level: 'info', event: 'cycle.expunged', mailbox, count: uids.length });
      } catch (err) {
        const error = classify('RetentionEnforcementError', mailbox, err);
        await this.emit({
          level: 'error',
          event: 'cycle.expunge-failed',
          mailbox,
          count: uids.length,
          error: describeError(error),
        });
      }
    }

    await session.close();
    this.currentState = failed ? 'failed' : 'done';
    await this.emit({
      level: 'info',
      event: failed ? 'cycle.failed' : 'cycle.finish',
      mailbox,
      summary: this.summary,
    });
  }

  private async fail(error: IngestError): Promise<IngestError> {
    this.failure = error;
    if (this.currentState === 'init') {
      this.currentState = 'failed';
      await this.emit({
        level: 'error',
        event: 'cycle.failed',
        mailbox: this.config.name,
        kind: error.kind,
        error: error.message,
      });
    } else {
      await this.emit({
        level: 'error',
        event: 'cycle.selection-failed',
        mailbox: this.config.name,
        kind: error.kind,
        error: error.message,
      });
    }
    return error;
  }

  private async emit(event: DiagnosticEvent): Promise<void> {
    try {
      await this.diagnostics.emit(event);
    } catch {
      // diagnostics are best-effort
    }
  }
}

// ---------------------------------------------------------------------------
// Drivers
// ---------------------------------------------------------------------------

/**
 * Consume a cycle to the end, handing every accepted message to `sink`
 * before pulling the next one. A failing save stops the cycle early (the
 * unsaved message gets no archive copy, no retention effect, no expunge)
 * and rejects with a PersistenceError.
 */
export async function drainCycle(
  cycle: IngestionCycle,
  sink?: PersistenceSink,
  onMessage?: (message: ParsedMessage) => void | Promise<void>,
): Promise<CycleSummary> {
  // eslint-disable-next-line no-restricted-syntax
  for await (const message of cycle) {
    if (sink) {
      try {
        // eslint-disable-next-line no-await-in-loop
        await sink.save(message);
      } catch (err) {
        throw classify('PersistenceError', cycle.config.name, err, message.uid);
      }
    }
    // eslint-disable-next-line no-await-in-loop
    await onMessage?.(message);
  }
  return cycle.summary;
}

/**
 * Run one full cycle for `config`. Rejects with ConnectionError or
 * SelectionError when the cycle fails; per-message problems only show up
 * in the returned summary.
 */
export async function runCycle(
  config: MailboxConfig,
  options: CycleOptions & { sink?: PersistenceSink },
): Promise<CycleSummary> {
  return drainCycle(new IngestionCycle(config, options), options.sink);
}
