/**
 * IMAP session for one mailbox cycle.
 *
 * - One ImapFlow connection per cycle, never shared
 * - Folder opened with SELECT, or EXAMINE for non-mutating policies
 * - Every command runs under a timeout; a timed-out command drops the
 *   connection so nothing else can hang behind it
 * - `close()` is idempotent and never throws
 */

import { ImapFlow } from 'imapflow';

import { TimeoutError } from '../ingest/errors.js';
import { sanitizeMailboxName } from '../safety/validation.js';
import type { MailboxConfig } from '../types/index.js';
import type { MailSession, SessionFactory } from './types.js';

async function withTimeout<T>(operation: string, ms: number, run: () => Promise<T>): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const pending = run();
  const expiry = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new TimeoutError(operation, ms));
    }, ms);
  });
  try {
    return await Promise.race([pending, expiry]);
  } catch (err) {
    if (err instanceof TimeoutError) {
      // The command settles later against a dropped socket; the caller
      // already has its TimeoutError.
      pending.catch(() => undefined);
    }
    throw err;
  } finally {
    clearTimeout(timer);
  }
}

function buildClient(config: MailboxConfig): ImapFlow {
  return new ImapFlow({
    host: config.imap.host,
    port: config.imap.port,
    secure: config.imap.tls,
    doSTARTTLS: config.imap.tls ? undefined : config.imap.starttls,
    tls: {
      rejectUnauthorized: config.imap.verifySsl,
    },
    auth: { user: config.username, pass: config.password },
    connectionTimeout: config.timeouts.connection,
    greetingTimeout: config.timeouts.connection,
    socketTimeout: config.timeouts.socket,
    logger: false,
  });
}

export default class ImapSession implements MailSession {
  readonly mailbox: string;

  readonly folder: string;

  readonly readOnly: boolean;

  private client: ImapFlow;

  private commandTimeout: number;

  private closed = false;

  constructor(client: ImapFlow, config: MailboxConfig, readOnly: boolean) {
    this.client = client;
    this.mailbox = config.name;
    this.folder = sanitizeMailboxName(config.folder);
    this.readOnly = readOnly;
    this.commandTimeout = config.timeouts.socket;
  }

  // -------------------------------------------------------------------------
  // Command plumbing
  // -------------------------------------------------------------------------

  private async run<T>(operation: string, command: () => Promise<T>): Promise<T> {
    if (this.closed || !this.client.usable) {
      throw new Error(`IMAP connection for "${this.mailbox}" is no longer usable`);
    }
    try {
      return await withTimeout(operation, this.commandTimeout, command);
    } catch (err) {
      if (err instanceof TimeoutError) {
        this.client.close();
      }
      throw err;
    }
  }

  // -------------------------------------------------------------------------
  // Selection
  // -------------------------------------------------------------------------

  async listUids(): Promise<number[]> {
    const result = await this.run('UID SEARCH ALL', () =>
      this.client.search({ all: true }, { uid: true }),
    );
    return Array.isArray(result) ? result : [];
  }

  async searchUnseen(): Promise<number[]> {
    const result = await this.run('UID SEARCH UNSEEN', () =>
      this.client.search({ seen: false }, { uid: true }),
    );
    return Array.isArray(result) ? result : [];
  }

  async probeSizes(uids: number[]): Promise<Map<number, number>> {
    const sizes = new Map<number, number>();
    if (uids.length === 0) return sizes;
    await this.run('UID FETCH RFC822.SIZE', async () => {
      // eslint-disable-next-line no-restricted-syntax
      for await (const msg of this.client.fetch(
        uids.join(','),
        { uid: true, size: true },
        { uid: true },
      )) {
        if (typeof msg.size === 'number') {
          sizes.set(msg.uid, msg.size);
        }
      }
    });
    return sizes;
  }

  // -------------------------------------------------------------------------
  // Folders
  // -------------------------------------------------------------------------

  async folderExists(name: string): Promise<boolean> {
    const target = sanitizeMailboxName(name);
    const folders = await this.run('LIST', () => this.client.list());
    return folders.some((folder) => folder.path === target);
  }

  async createFolder(name: string): Promise<void> {
    const target = sanitizeMailboxName(name);
    await this.run('CREATE', () => this.client.mailboxCreate(target));
  }

  // -------------------------------------------------------------------------
  // Messages
  // -------------------------------------------------------------------------

  async fetchSource(uid: number): Promise<Buffer | null> {
    // ImapFlow always requests BODY.PEEK[].
    const msg = await this.run('UID FETCH BODY.PEEK[]', () =>
      this.client.fetchOne(String(uid), { uid: true, source: true }, { uid: true }),
    );
    if (!msg || !msg.source || msg.source.length === 0) {
      return null;
    }
    return msg.source;
  }

  async addFlags(uid: number, flags: string[]): Promise<void> {
    const ok = await this.run(`UID STORE +FLAGS (${flags.join(' ')})`, () =>
      this.client.messageFlagsAdd(String(uid), flags, { uid: true }),
    );
    if (!ok) {
      throw new Error(`IMAP server rejected +FLAGS (${flags.join(' ')}) for UID ${uid}`);
    }
  }

  async copy(uid: number, destination: string): Promise<void> {
    const target = sanitizeMailboxName(destination);
    const result = await this.run('UID COPY', () =>
      this.client.messageCopy(String(uid), target, { uid: true }),
    );
    if (!result) {
      throw new Error(`IMAP server rejected the copy of UID ${uid} to "${target}"`);
    }
  }

  async expunge(uids: number[]): Promise<void> {
    if (uids.length === 0) return;
    // STORE \Deleted for the set, then UID EXPUNGE when the server has
    // UIDPLUS. Without it ImapFlow sends a plain EXPUNGE, which also removes
    // any other message in the folder already flagged \Deleted.
    const ok = await this.run('UID EXPUNGE', () =>
      this.client.messageDelete(uids.join(','), { uid: true }),
    );
    if (!ok) {
      throw new Error(`IMAP server rejected the expunge of ${uids.length} message(s)`);
    }
  }

  // -------------------------------------------------------------------------
  // Shutdown
  // -------------------------------------------------------------------------

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    if (!this.client.usable) {
      this.client.close();
      return;
    }
    try {
      await withTimeout('LOGOUT', this.commandTimeout, () => this.client.logout());
    } catch {
      this.client.close();
    }
  }
}

/**
 * Connect, authenticate and open the configured folder.
 * Rejects with the underlying error (or TimeoutError); the caller classifies it.
 */
export const openImapSession: SessionFactory = async (config, { readOnly }) => {
  const client = buildClient(config);
  const folder = sanitizeMailboxName(config.folder);
  try {
    await withTimeout('connect', config.timeouts.connection, () => client.connect());
    await withTimeout(readOnly ? 'EXAMINE' : 'SELECT', config.timeouts.connection, () =>
      client.mailboxOpen(folder, { readOnly }),
    );
  } catch (err) {
    client.close();
    throw err;
  }
  return new ImapSession(client, config, readOnly);
};
