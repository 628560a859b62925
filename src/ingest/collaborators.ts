import type { ParsedMessage } from '../types/index.js';

/**
 * Answers "has this message already been stored for this mailbox?".
 * Scope is always (Message-ID, mailbox identity): two mailboxes may hold
 * messages sharing a Message-ID.
 */
export interface DedupFilter {
  exists: (messageId: string, mailbox: string) => Promise<boolean>;
}

/** Takes ownership of accepted messages. */
export interface PersistenceSink {
  save: (message: ParsedMessage) => Promise<void>;
}
