import type { MailSession } from '../connections/types.js';
import type { RetentionEffect } from '../types/index.js';
import { classify } from './errors.js';

/**
 * Apply the post-processing effect for one accepted message.
 *
 * - `delete`: +FLAGS \Deleted only. The expunge is batched by the cycle.
 * - `mark-seen`: +FLAGS \Seen (a re-assert after a normal fetch).
 * - `none`: no command is sent.
 *
 * Returns `true` when a command was sent and accepted.
 * Throws RetentionEnforcementError; the message then stays as it was.
 */
export default async function applyRetention(
  session: MailSession,
  uid: number,
  effect: RetentionEffect,
): Promise<boolean> {
  if (effect === 'none') return false;
  const flag = effect === 'delete' ? '\\Deleted' : '\\Seen';
  try {
    await session.addFlags(uid, [flag]);
  } catch (err) {
    throw classify('RetentionEnforcementError', session.mailbox, err, uid);
  }
  return true;
}
