import type { MailSession } from '../connections/types.js';
import type { FetchMode, RawMessage } from '../types/index.js';
import type { DiagnosticSink } from './diagnostics.js';
import { noopDiagnostics } from './diagnostics.js';
import { IngestError, classify, describeError } from './errors.js';

/**
 * Retrieve the full source of one message.
 *
 * The session always reads with BODY.PEEK[]. In `normal` mode the \Seen
 * flag a plain BODY[] fetch would set is stored right after; a failed store
 * is reported and the fetched content is still returned, since the
 * retention step re-asserts \Seen and counts its own failure. No content at
 * all means the message vanished (usually expunged by another client) and
 * is a FetchError like any transport failure.
 */
export default async function fetchMessage(
  session: MailSession,
  uid: number,
  mode: FetchMode,
  diagnostics: DiagnosticSink = noopDiagnostics,
): Promise<RawMessage> {
  let source: Buffer | null;
  try {
    source = await session.fetchSource(uid);
  } catch (err) {
    throw classify('FetchError', session.mailbox, err, uid);
  }
  if (!source) {
    throw new IngestError(
      'FetchError',
      session.mailbox,
      `No content returned for UID ${uid} in "${session.mailbox}" (message vanished?)`,
      { uid },
    );
  }

  if (mode === 'normal' && !session.readOnly) {
    try {
      await session.addFlags(uid, ['\\Seen']);
    } catch (err) {
      await diagnostics.emit({
        level: 'warning',
        event: 'fetch.seen-failed',
        mailbox: session.mailbox,
        uid,
        error: describeError(err),
      });
    }
  }
  return { uid, source };
}
