import type { MailSession } from '../connections/types.js';
import type { RetentionPolicy } from '../types/index.js';
import { classify } from './errors.js';
import { behaviorOf } from './policy.js';

/**
 * Candidate UIDs for one cycle, in server order.
 *
 * An empty array means "no candidates". A failing LIST/SEARCH is a
 * SelectionError: without it no message can be determined for this mailbox.
 */
export default async function selectCandidates(
  session: MailSession,
  policy: RetentionPolicy,
): Promise<number[]> {
  const { selection } = behaviorOf(policy);
  try {
    return selection === 'unseen' ? await session.searchUnseen() : await session.listUids();
  } catch (err) {
    throw classify('SelectionError', session.mailbox, err);
  }
}
