/**
 * Retention policies as data.
 *
 * Each policy selects a selection predicate, a fetch mode and a
 * post-processing effect. The engine reads only this table; there is no
 * per-policy control flow anywhere else.
 */

import type {
  FetchMode,
  RetentionEffect,
  RetentionPolicy,
  SelectionMode,
} from '../types/index.js';

export interface PolicyBehavior {
  selection: SelectionMode;
  fetchMode: FetchMode;
  effect: RetentionEffect;
}

export const POLICY_BEHAVIOR = {
  delete_after_processing: { selection: 'all', fetchMode: 'normal', effect: 'delete' },
  mark_seen_after_processing: { selection: 'all', fetchMode: 'normal', effect: 'mark-seen' },
  fetch_unseen_and_mark_seen: { selection: 'unseen', fetchMode: 'normal', effect: 'mark-seen' },
  fetch_unseen_peek_only: { selection: 'unseen', fetchMode: 'peek', effect: 'none' },
  fetch_all_peek_only: { selection: 'all', fetchMode: 'peek', effect: 'none' },
} as const satisfies Record<RetentionPolicy, PolicyBehavior>;

export function behaviorOf(policy: RetentionPolicy): PolicyBehavior {
  return POLICY_BEHAVIOR[policy];
}

/**
 * Policies that never change server state. Their folder is opened with
 * EXAMINE so the server itself refuses any flag change.
 */
export function isReadOnlyPolicy(policy: RetentionPolicy): boolean {
  const { fetchMode, effect } = behaviorOf(policy);
  return fetchMode === 'peek' && effect === 'none';
}

export function describePolicy(policy: RetentionPolicy): string {
  const { selection, effect } = behaviorOf(policy);
  const scope = selection === 'all' ? 'all messages' : 'unread messages only';
  switch (effect) {
    case 'delete':
      return `${scope}; deleted after processing`;
    case 'mark-seen':
      return `${scope}; marked as read after processing`;
    default:
      return `${scope}; left untouched`;
  }
}
