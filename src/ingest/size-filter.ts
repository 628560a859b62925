import type { MailSession } from '../connections/types.js';
import type { DiagnosticSink } from './diagnostics.js';
import { describeError } from './errors.js';

/**
 * Keep UIDs whose RFC822.SIZE is below `maxSize` bytes.
 *
 * Only sizes are requested, never content. A UID the server does not
 * report is kept (its fetch decides). When the probe itself fails the
 * candidate set is returned unchanged.
 */
export default async function filterBySize(
  session: MailSession,
  uids: number[],
  maxSize: number,
  diagnostics: DiagnosticSink,
): Promise<number[]> {
  if (uids.length === 0) return uids;

  let sizes: Map<number, number>;
  try {
    sizes = await session.probeSizes(uids);
  } catch (err) {
    await diagnostics.emit({
      level: 'warning',
      event: 'size-filter.probe-failed',
      mailbox: session.mailbox,
      error: describeError(err),
      candidates: uids.length,
    });
    return uids;
  }

  const kept = uids.filter((uid) => {
    const size = sizes.get(uid);
    return size === undefined || size < maxSize;
  });

  await diagnostics.emit({
    level: 'debug',
    event: 'size-filter.applied',
    mailbox: session.mailbox,
    maxSize,
    before: uids.length,
    after: kept.length,
  });
  return kept;
}
