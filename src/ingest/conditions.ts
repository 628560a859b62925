/**
 * Acceptance conditions: per-mailbox `match` rules compiled into a predicate
 * over parsed messages. A message failing its mailbox's condition is
 * skipped without any server-side effect.
 */

import type { MatchRules, ParsedMessage } from '../types/index.js';

export type MessageCondition = (message: ParsedMessage) => boolean;

/** Convert a glob-like pattern (with `*` wildcards and `|` OR) to a RegExp. */
export function globToRegex(pattern: string): RegExp {
  const parts = pattern
    .split('|')
    .map((p) => p.trim())
    .filter(Boolean);
  const regexParts = parts.map((part) => {
    const escaped = part.replace(/[.+?^${}()[\]\\]/g, '\\$&');
    return escaped.replace(/\*/g, '.*');
  });
  return new RegExp(`^(?:${regexParts.join('|')})$`, 'i');
}

/**
 * Compile match rules. Every rule that is given must match (AND); `to`
 * matches when any single recipient does. An empty pattern counts as not
 * given; no rules means no condition.
 */
export function compileMatchRules(rules: MatchRules | undefined): MessageCondition | undefined {
  if (!rules || !(rules.from || rules.to || rules.subject)) return undefined;

  const from = rules.from ? globToRegex(rules.from) : undefined;
  const to = rules.to ? globToRegex(rules.to) : undefined;
  const subject = rules.subject ? globToRegex(rules.subject) : undefined;

  return (message) => {
    if (from) {
      const bare = /<([^>]+)>$/.exec(message.from)?.[1] ?? message.from;
      if (!from.test(message.from) && !from.test(bare)) return false;
    }
    if (to) {
      const matched = message.to.some((recipient) => {
        const bare = /<([^>]+)>$/.exec(recipient)?.[1] ?? recipient;
        return to.test(recipient) || to.test(bare);
      });
      if (!matched) return false;
    }
    if (subject && !subject.test(message.subject)) return false;
    return true;
  };
}

/** Combine conditions; all must accept. */
export function allOf(...conditions: (MessageCondition | undefined)[]): MessageCondition | undefined {
  const active = conditions.filter((c): c is MessageCondition => c !== undefined);
  if (active.length === 0) return undefined;
  return (message) => active.every((condition) => condition(message));
}
