import type { MailboxConfig } from '../types/index.js';

/**
 * One live, authenticated connection with the mailbox folder selected.
 *
 * Every method is a single protocol exchange; callers must not issue a
 * second call before the previous one settles.
 */
export interface MailSession {
  /** Mailbox identity (config name). */
  readonly mailbox: string;
  /** Folder currently selected. */
  readonly folder: string;
  /** True when the folder was opened with EXAMINE. */
  readonly readOnly: boolean;

  /** `UID SEARCH ALL`, in server order. */
  listUids: () => Promise<number[]>;
  /** `UID SEARCH UNSEEN`, in server order. */
  searchUnseen: () => Promise<number[]>;
  /** `UID FETCH <set> (RFC822.SIZE)`; UIDs the server skips are absent from the map. */
  probeSizes: (uids: number[]) => Promise<Map<number, number>>;
  folderExists: (name: string) => Promise<boolean>;
  createFolder: (name: string) => Promise<void>;
  /**
   * Full RFC 822 source via `BODY.PEEK[]` (no flag changes), or `null` when
   * the server returned nothing.
   */
  fetchSource: (uid: number) => Promise<Buffer | null>;
  addFlags: (uid: number, flags: string[]) => Promise<void>;
  copy: (uid: number, destination: string) => Promise<void>;
  /**
   * Expunge after re-marking these UIDs \Deleted. Exactly these UIDs with
   * UIDPLUS; without it a plain EXPUNGE removes every \Deleted message.
   */
  expunge: (uids: number[]) => Promise<void>;
  /** Idempotent; never throws. */
  close: () => Promise<void>;
}

export type SessionFactory = (config: MailboxConfig, options: { readOnly: boolean }) => Promise<MailSession>;
