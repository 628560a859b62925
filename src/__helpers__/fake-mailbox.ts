/**
 * In-process IMAP stand-in for tests.
 *
 * Holds one folder's messages with their flags and hands out MailSession
 * objects that behave the way a server does for the commands the engine
 * uses: fetches are BODY.PEEK[], EXAMINE refuses flag changes, and an
 * expunge only removes the listed UIDs that carry \Deleted (UIDPLUS).
 */

import type { MailSession, SessionFactory } from '../connections/types.js';
import type { MailboxConfig } from '../types/index.js';

export type FakeOperation =
  | 'connect'
  | 'listUids'
  | 'searchUnseen'
  | 'probeSizes'
  | 'folderExists'
  | 'createFolder'
  | 'fetchSource'
  | 'addFlags'
  | 'copy'
  | 'expunge';

interface StoredMessage {
  source: Buffer;
  flags: Set<string>;
  size?: number;
}

interface Failure {
  error: Error;
  uid?: number;
}

interface EmailOptions {
  from?: string;
  to?: string;
  subject?: string;
  messageId?: string | null;
  text?: string;
  date?: string;
}

/** Build a minimal RFC 822 message. `messageId: null` leaves the header out. */
export function buildEmail(options: EmailOptions = {}): string {
  const lines = [
    `From: ${options.from ?? 'Sender <sender@example.com>'}`,
    `To: ${options.to ?? 'inbox@example.com'}`,
    `Subject: ${options.subject ?? 'Test Email'}`,
    `Date: ${options.date ?? 'Mon, 06 May 2024 10:00:00 +0000'}`,
  ];
  if (options.messageId !== null) {
    lines.push(`Message-ID: ${options.messageId ?? '<test@example.com>'}`);
  }
  lines.push('Content-Type: text/plain; charset=utf-8', '', options.text ?? 'Hello from tests', '');
  return lines.join('\r\n');
}

export class FakeMailbox {
  readonly messages = new Map<number, StoredMessage>();

  readonly folders = new Set<string>(['INBOX']);

  readonly copies: { uid: number; destination: string }[] = [];

  readonly expungeCalls: number[][] = [];

  readonly opened: { folder: string; readOnly: boolean }[] = [];

  closeCount = 0;

  private failures = new Map<FakeOperation, Failure>();

  /** Unseen UIDs the server reports in UID SEARCH UNSEEN but does not return on fetch. */
  readonly vanished = new Set<number>();

  add(uid: number, source: string | Buffer, options: { seen?: boolean; size?: number } = {}): this {
    this.messages.set(uid, {
      source: typeof source === 'string' ? Buffer.from(source) : source,
      flags: new Set(options.seen ? ['\\Seen'] : []),
      size: options.size,
    });
    return this;
  }

  /** Make `operation` throw, for every UID or just for `uid`. */
  fail(operation: FakeOperation, error: Error = new Error(`${operation} failed`), uid?: number): this {
    this.failures.set(operation, { error, uid });
    return this;
  }

  flags(uid: number): string[] {
    return [...(this.messages.get(uid)?.flags ?? [])].sort();
  }

  seenUids(): number[] {
    return this.uids().filter((uid) => this.messages.get(uid)?.flags.has('\\Seen'));
  }

  uids(): number[] {
    return [...this.messages.keys()].sort((a, b) => a - b);
  }

  readonly openSession: SessionFactory = async (config, { readOnly }) => {
    this.check('connect');
    this.opened.push({ folder: config.folder, readOnly });
    return this.session(config, readOnly);
  };

  private check(operation: FakeOperation, uid?: number): void {
    const failure = this.failures.get(operation);
    if (!failure) return;
    if (failure.uid === undefined || failure.uid === uid) throw failure.error;
  }

  private session(config: MailboxConfig, readOnly: boolean): MailSession {
    const refuseWrites = (command: string): void => {
      if (readOnly) throw new Error(`${command} refused: mailbox opened read-only`);
    };

    return {
      mailbox: config.name,
      folder: config.folder,
      readOnly,
      listUids: async () => {
        this.check('listUids');
        return this.uids();
      },
      searchUnseen: async () => {
        this.check('searchUnseen');
        return this.uids().filter((uid) => !this.messages.get(uid)?.flags.has('\\Seen'));
      },
      probeSizes: async (uids) => {
        this.check('probeSizes');
        const sizes = new Map<number, number>();
        uids.forEach((uid) => {
          const message = this.messages.get(uid);
          if (message) sizes.set(uid, message.size ?? message.source.length);
        });
        return sizes;
      },
      folderExists: async (name) => {
        this.check('folderExists');
        return this.folders.has(name);
      },
      createFolder: async (name) => {
        this.check('createFolder');
        this.folders.add(name);
      },
      fetchSource: async (uid: number) => {
        this.check('fetchSource', uid);
        const message = this.messages.get(uid);
        if (!message || this.vanished.has(uid)) return null;
        return message.source;
      },
      addFlags: async (uid, flags) => {
        this.check('addFlags', uid);
        refuseWrites('STORE');
        const message = this.messages.get(uid);
        if (!message) throw new Error(`UID ${uid} does not exist`);
        flags.forEach((flag) => message.flags.add(flag));
      },
      copy: async (uid, destination) => {
        this.check('copy', uid);
        if (!this.folders.has(destination)) throw new Error(`[TRYCREATE] ${destination}`);
        this.copies.push({ uid, destination });
      },
      expunge: async (uids) => {
        this.check('expunge');
        refuseWrites('EXPUNGE');
        this.expungeCalls.push([...uids]);
        uids.forEach((uid) => {
          if (this.messages.get(uid)?.flags.has('\\Deleted')) this.messages.delete(uid);
        });
      },
      close: async () => {
        this.closeCount += 1;
      },
    };
  }
}

export function buildMailboxConfig(overrides: Partial<MailboxConfig> = {}): MailboxConfig {
  return {
    name: 'test',
    username: 'test@example.com',
    password: 'test-secret',
    active: true,
    folder: 'INBOX',
    policy: 'fetch_unseen_peek_only',
    imap: { host: 'imap.example.com', port: 993, tls: true, starttls: false, verifySsl: true },
    timeouts: { connection: 30_000, socket: 120_000 },
    ...overrides,
  };
}
