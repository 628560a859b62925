/**
 * File-backed message store.
 *
 * One JSON document per accepted message under
 * `<dataDir>/messages/<mailbox>/<key>.json`. The key is the SHA-256 of the
 * Message-ID, so the store doubles as the dedup index: `exists()` is a
 * single stat. Messages without a Message-ID get a `uid-<uid>-<time>` key
 * and are never found by `exists()`.
 */

import { createHash } from 'node:crypto';
import { access, mkdir, readFile, readdir, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { DedupFilter, PersistenceSink } from '../ingest/collaborators.js';
import type { ParsedMessage } from '../types/index.js';

export interface StoredMessage extends ParsedMessage {
  storedAt: string;
}

/** Dedup index, sink and read side of stored messages. */
export interface MessageStore extends DedupFilter, PersistenceSink {
  list: (mailbox: string, limit?: number) => Promise<StoredMessage[]>;
}

export function messageKey(messageId: string): string {
  return createHash('sha256').update(messageId).digest('hex');
}

/** Mailbox names become directory names; keep them to one safe path segment. */
function mailboxDir(name: string): string {
  return encodeURIComponent(name).replace(/\./g, '%2E');
}

function isStoredMessage(value: unknown): value is StoredMessage {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'uid' in value &&
    typeof value.uid === 'number' &&
    'mailbox' in value &&
    typeof value.mailbox === 'string' &&
    'storedAt' in value &&
    typeof value.storedAt === 'string'
  );
}

export default class FileMessageStore implements MessageStore {
  private root: string;

  private now: () => Date;

  constructor(dataDir: string, now: () => Date = () => new Date()) {
    this.root = path.join(dataDir, 'messages');
    this.now = now;
  }

  pathFor(mailbox: string, key: string): string {
    return path.join(this.root, mailboxDir(mailbox), `${key}.json`);
  }

  async exists(messageId: string, mailbox: string): Promise<boolean> {
    try {
      await access(this.pathFor(mailbox, messageKey(messageId)));
      return true;
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return false;
      throw err;
    }
  }

  async save(message: ParsedMessage): Promise<void> {
    const storedAt = this.now();
    const key = message.messageId
      ? messageKey(message.messageId)
      : `uid-${message.uid}-${storedAt.getTime()}`;
    const file = this.pathFor(message.mailbox, key);
    await mkdir(path.dirname(file), { recursive: true });

    const record: StoredMessage = { ...message, storedAt: storedAt.toISOString() };
    // atomic replace
    const tmp = `${file}.tmp`;
    await writeFile(tmp, `${JSON.stringify(record, null, 2)}\n`, 'utf-8');
    await rename(tmp, file);
  }

  /** Stored messages for one mailbox, newest first. */
  async list(mailbox: string, limit = 20): Promise<StoredMessage[]> {
    const dir = path.join(this.root, mailboxDir(mailbox));
    let files: string[];
    try {
      files = (await readdir(dir)).filter((f) => f.endsWith('.json'));
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
      throw err;
    }

    const records = await Promise.all(
      files.map(async (file) => {
        const parsed: unknown = JSON.parse(await readFile(path.join(dir, file), 'utf-8'));
        return isStoredMessage(parsed) ? parsed : undefined;
      }),
    );

    return records
      .filter((r): r is StoredMessage => r !== undefined)
      .sort((a, b) => b.storedAt.localeCompare(a.storedAt))
      .slice(0, limit);
  }
}
