import { mkdtemp, readFile, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import type { ParsedMessage } from '../types/index.js';
import FileMessageStore, { messageKey } from './message-store.js';

function message(overrides: Partial<ParsedMessage> = {}): ParsedMessage {
  return {
    mailbox: 'work',
    uid: 1,
    messageId: '<a@example.com>',
    from: 'sender@example.com',
    to: ['me@example.com'],
    subject: 'Hello',
    text: 'Body',
    attachments: [],
    headers: { subject: 'Hello' },
    size: 120,
    ...overrides,
  };
}

describe('FileMessageStore', () => {
  let dataDir: string;
  let clock: number;
  let store: FileMessageStore;

  beforeEach(async () => {
    dataDir = await mkdtemp(path.join(os.tmpdir(), 'imap-ingest-store-'));
    clock = Date.UTC(2024, 4, 6, 10, 0, 0);
    store = new FileMessageStore(dataDir, () => {
      clock += 1000;
      return new Date(clock);
    });
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  it('finds a saved Message-ID in the same mailbox only', async () => {
    await store.save(message());

    await expect(store.exists('<a@example.com>', 'work')).resolves.toBe(true);
    await expect(store.exists('<a@example.com>', 'personal')).resolves.toBe(false);
    await expect(store.exists('<b@example.com>', 'work')).resolves.toBe(false);
  });

  it('writes one JSON document keyed by the Message-ID hash', async () => {
    await store.save(message());

    const file = path.join(dataDir, 'messages', 'work', `${messageKey('<a@example.com>')}.json`);
    const record: unknown = JSON.parse(await readFile(file, 'utf-8'));
    expect(record).toMatchObject({
      uid: 1,
      subject: 'Hello',
      storedAt: '2024-05-06T10:00:01.000Z',
    });
  });

  it('stores messages without Message-ID under a uid key', async () => {
    await store.save(message({ messageId: undefined, uid: 42 }));

    const file = path.join(dataDir, 'messages', 'work', `uid-42-${Date.UTC(2024, 4, 6, 10, 0, 1)}.json`);
    await expect(readFile(file, 'utf-8')).resolves.toContain('"uid": 42');
  });

  it('lists newest first and honours the limit', async () => {
    await store.save(message({ uid: 1, messageId: '<1@example.com>' }));
    await store.save(message({ uid: 2, messageId: '<2@example.com>' }));
    await store.save(message({ uid: 3, messageId: '<3@example.com>' }));

    const listed = await store.list('work', 2);

    expect(listed.map((m) => m.uid)).toEqual([3, 2]);
  });

  it('lists nothing for an unknown mailbox', async () => {
    await expect(store.list('nobody')).resolves.toEqual([]);
  });

  it('keeps mailbox names inside the store directory', () => {
    expect(store.pathFor('../escape', 'k')).toBe(
      path.join(dataDir, 'messages', '%2E%2E%2Fescape', 'k.json'),
    );
  });
});
