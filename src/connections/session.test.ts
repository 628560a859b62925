import { buildEmail, buildMailboxConfig } from '../__helpers__/fake-mailbox.js';
import type { DiagnosticEvent } from '../ingest/diagnostics.js';
import fetchMessage from '../ingest/fetcher.js';
import { openImapSession } from './session.js';

// Mock imapflow module
const imap = vi.hoisted(() => {
  class MockImapFlow {
    static instances: MockImapFlow[] = [];

    /** Runs on every new client, before openImapSession touches it. */
    static onCreate: ((client: MockImapFlow) => void) | undefined;

    options: unknown;

    usable = true;

    connect = vi.fn(async () => {});

    mailboxOpen = vi.fn(async (_path: string, _options: object) => ({}));

    search = vi.fn(async (_query: object, _options: object): Promise<number[] | false> => []);

    fetch = vi.fn(
      (_range: string, _query: object, _options: object): AsyncGenerator<{ uid: number; size?: number }> =>
        (async function* empty() {})(),
    );

    fetchOne = vi.fn(
      async (_range: string, _query: object, _options: object): Promise<{ uid: number; source?: Buffer } | false> =>
        false,
    );

    list = vi.fn(async (): Promise<{ path: string }[]> => [{ path: 'INBOX' }]);

    mailboxCreate = vi.fn(async (_path: string) => ({}));

    messageFlagsAdd = vi.fn(async (_range: string, _flags: string[], _options: object) => true);

    messageCopy = vi.fn(async (_range: string, _destination: string, _options: object): Promise<object | false> => ({}));

    messageDelete = vi.fn(async (_range: string, _options: object) => true);

    logout = vi.fn(async () => {});

    close = vi.fn(() => {
      this.usable = false;
    });

    constructor(options: unknown) {
      this.options = options;
      MockImapFlow.instances.push(this);
      MockImapFlow.onCreate?.(this);
    }
  }
  return { MockImapFlow };
});

vi.mock('imapflow', () => ({ ImapFlow: imap.MockImapFlow }));

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const config = buildMailboxConfig();

function lastClient() {
  const client = imap.MockImapFlow.instances.at(-1);
  if (!client) throw new Error('no ImapFlow client was created');
  return client;
}

async function openSession(readOnly = false) {
  const session = await openImapSession(config, { readOnly });
  return { session, client: lastClient() };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('openImapSession', () => {
  beforeEach(() => {
    imap.MockImapFlow.instances = [];
    imap.MockImapFlow.onCreate = undefined;
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('connects with the mailbox credentials and timeouts', async () => {
    const { client } = await openSession();

    expect(client.options).toMatchObject({
      host: 'imap.example.com',
      port: 993,
      secure: true,
      tls: { rejectUnauthorized: true },
      auth: { user: 'test@example.com', pass: 'test-secret' },
      connectionTimeout: 30_000,
      socketTimeout: 120_000,
      logger: false,
    });
    expect(client.connect).toHaveBeenCalledOnce();
  });

  it('opens the folder with EXAMINE for read-only sessions', async () => {
    const { session, client } = await openSession(true);

    expect(client.mailboxOpen).toHaveBeenCalledWith('INBOX', { readOnly: true });
    expect(session.readOnly).toBe(true);
    expect(session.folder).toBe('INBOX');
  });

  it('opens the folder with SELECT otherwise', async () => {
    const { client } = await openSession(false);

    expect(client.mailboxOpen).toHaveBeenCalledWith('INBOX', { readOnly: false });
  });

  it('drops the client when the connection is refused', async () => {
    imap.MockImapFlow.onCreate = (client) => {
      client.connect.mockRejectedValueOnce(new Error('connect ECONNREFUSED'));
    };

    await expect(openImapSession(config, { readOnly: true })).rejects.toThrow('connect ECONNREFUSED');
    expect(lastClient().close).toHaveBeenCalledOnce();
    expect(lastClient().mailboxOpen).not.toHaveBeenCalled();
  });

  it('drops the client when the folder cannot be opened', async () => {
    imap.MockImapFlow.onCreate = (client) => {
      client.mailboxOpen.mockRejectedValueOnce(new Error('NO [NONEXISTENT] Unknown Mailbox'));
    };

    await expect(openImapSession(config, { readOnly: false })).rejects.toThrow('Unknown Mailbox');
    expect(lastClient().close).toHaveBeenCalledOnce();
  });

  it('gives up on a connect that never answers', async () => {
    vi.useFakeTimers();
    imap.MockImapFlow.onCreate = (client) => {
      client.connect.mockImplementationOnce(() => new Promise<void>(() => {}));
    };

    const assertion = expect(openImapSession(config, { readOnly: true })).rejects.toThrow(
      'connect timed out after 30000ms',
    );
    await vi.advanceTimersByTimeAsync(30_000);

    await assertion;
    expect(lastClient().close).toHaveBeenCalledOnce();
  });
});

describe('ImapSession', () => {
  beforeEach(() => {
    imap.MockImapFlow.instances = [];
    imap.MockImapFlow.onCreate = undefined;
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  // -----------------------------------------------------------------------
  // Selection
  // -----------------------------------------------------------------------

  describe('selection', () => {
    it('searches unseen messages by UID', async () => {
      const { session, client } = await openSession();
      client.search.mockResolvedValueOnce([4, 9]);

      expect(await session.searchUnseen()).toEqual([4, 9]);
      expect(client.search).toHaveBeenCalledWith({ seen: false }, { uid: true });
    });

    it('treats a failed search result as no UIDs', async () => {
      const { session, client } = await openSession();
      client.search.mockResolvedValueOnce(false);

      expect(await session.listUids()).toEqual([]);
      expect(client.search).toHaveBeenCalledWith({ all: true }, { uid: true });
    });

    it('collects sizes the server reports', async () => {
      const { session, client } = await openSession();
      client.fetch.mockImplementationOnce(async function* sizes() {
        yield { uid: 1, size: 1200 };
        yield { uid: 2 };
        yield { uid: 3, size: 40 };
      });

      const sizes = await session.probeSizes([1, 2, 3]);

      expect([...sizes]).toEqual([
        [1, 1200],
        [3, 40],
      ]);
      expect(client.fetch).toHaveBeenCalledWith('1,2,3', { uid: true, size: true }, { uid: true });
    });

    it('skips the size fetch for an empty candidate list', async () => {
      const { session, client } = await openSession();

      expect((await session.probeSizes([])).size).toBe(0);
      expect(client.fetch).not.toHaveBeenCalled();
    });
  });

  // -----------------------------------------------------------------------
  // Timeouts
  // -----------------------------------------------------------------------

  describe('timeouts', () => {
    it('drops the connection when a command stalls', async () => {
      vi.useFakeTimers();
      const { session, client } = await openSession();
      client.search.mockImplementationOnce(() => new Promise<number[]>(() => {}));

      const assertion = expect(session.searchUnseen()).rejects.toThrow(
        'UID SEARCH UNSEEN timed out after 120000ms',
      );
      await vi.advanceTimersByTimeAsync(120_000);

      await assertion;
      expect(client.close).toHaveBeenCalledOnce();
      await expect(session.listUids()).rejects.toThrow(
        'IMAP connection for "test" is no longer usable',
      );
    });
  });

  // -----------------------------------------------------------------------
  // Messages
  // -----------------------------------------------------------------------

  describe('messages', () => {
    it('reads the source without storing any flag', async () => {
      const { session, client } = await openSession();
      const source = Buffer.from(buildEmail());
      client.fetchOne.mockResolvedValueOnce({ uid: 7, source });

      expect(await session.fetchSource(7)).toBe(source);
      expect(client.fetchOne).toHaveBeenCalledWith('7', { uid: true, source: true }, { uid: true });
      expect(client.messageFlagsAdd).not.toHaveBeenCalled();
    });

    it('returns null when the message is gone', async () => {
      const { session, client } = await openSession();
      client.fetchOne.mockResolvedValueOnce(false);

      expect(await session.fetchSource(7)).toBeNull();
    });

    it('rejects a refused flag store', async () => {
      const { session, client } = await openSession();
      client.messageFlagsAdd.mockResolvedValueOnce(false);

      await expect(session.addFlags(7, ['\\Deleted'])).rejects.toThrow(
        'IMAP server rejected +FLAGS (\\Deleted) for UID 7',
      );
      expect(client.messageFlagsAdd).toHaveBeenCalledWith('7', ['\\Deleted'], { uid: true });
    });

    it('rejects a refused copy', async () => {
      const { session, client } = await openSession();
      client.messageCopy.mockResolvedValueOnce(false);

      await expect(session.copy(7, 'Processed')).rejects.toThrow(
        'IMAP server rejected the copy of UID 7 to "Processed"',
      );
    });

    it('expunges the marked UIDs in one command', async () => {
      const { session, client } = await openSession();

      await session.expunge([]);
      await session.expunge([1, 2]);

      expect(client.messageDelete).toHaveBeenCalledOnce();
      expect(client.messageDelete).toHaveBeenCalledWith('1,2', { uid: true });
    });

    it('rejects a refused expunge', async () => {
      const { session, client } = await openSession();
      client.messageDelete.mockResolvedValueOnce(false);

      await expect(session.expunge([1, 2])).rejects.toThrow(
        'IMAP server rejected the expunge of 2 message(s)',
      );
    });
  });

  // -----------------------------------------------------------------------
  // Folders
  // -----------------------------------------------------------------------

  describe('folders', () => {
    it('finds folders by path', async () => {
      const { session, client } = await openSession();
      client.list.mockResolvedValueOnce([{ path: 'INBOX' }, { path: 'Processed' }]);

      expect(await session.folderExists(' Processed ')).toBe(true);
    });

    it('refuses wildcard folder names before talking to the server', async () => {
      const { session, client } = await openSession();

      await expect(session.createFolder('Archive*')).rejects.toThrow('wildcard');
      expect(client.mailboxCreate).not.toHaveBeenCalled();
    });
  });

  // -----------------------------------------------------------------------
  // close
  // -----------------------------------------------------------------------

  describe('close', () => {
    it('logs out once however often it is called', async () => {
      const { session, client } = await openSession();

      await session.close();
      await session.close();

      expect(client.logout).toHaveBeenCalledOnce();
      expect(client.close).not.toHaveBeenCalled();
    });

    it('falls back to dropping the socket when logout fails', async () => {
      const { session, client } = await openSession();
      client.logout.mockRejectedValueOnce(new Error('BYE'));

      await expect(session.close()).resolves.toBeUndefined();
      expect(client.close).toHaveBeenCalledOnce();
    });

    it('skips logout on a connection that is already gone', async () => {
      const { session, client } = await openSession();
      client.usable = false;

      await session.close();

      expect(client.logout).not.toHaveBeenCalled();
      expect(client.close).toHaveBeenCalledOnce();
    });
  });
});

// ---------------------------------------------------------------------------
// fetchMessage over a real session
// ---------------------------------------------------------------------------

describe('fetchMessage with ImapSession', () => {
  beforeEach(() => {
    imap.MockImapFlow.instances = [];
    imap.MockImapFlow.onCreate = undefined;
  });

  it('stores \\Seen after a normal fetch', async () => {
    const { session, client } = await openSession();
    client.fetchOne.mockResolvedValueOnce({ uid: 7, source: Buffer.from(buildEmail()) });

    await fetchMessage(session, 7, 'normal');

    expect(client.messageFlagsAdd).toHaveBeenCalledWith('7', ['\\Seen'], { uid: true });
  });

  it('keeps the fetched source when the \\Seen store is refused', async () => {
    const { session, client } = await openSession();
    const source = Buffer.from(buildEmail());
    client.fetchOne.mockResolvedValueOnce({ uid: 7, source });
    client.messageFlagsAdd.mockResolvedValueOnce(false);
    const events: DiagnosticEvent[] = [];

    const raw = await fetchMessage(session, 7, 'normal', {
      emit: (event) => {
        events.push(event);
      },
    });

    expect(raw).toEqual({ uid: 7, source });
    expect(events).toEqual([
      {
        level: 'warning',
        event: 'fetch.seen-failed',
        mailbox: 'test',
        uid: 7,
        error: 'IMAP server rejected +FLAGS (\\Seen) for UID 7',
      },
    ]);
  });

  it('never stores a flag on a peek fetch', async () => {
    const { session, client } = await openSession(true);
    client.fetchOne.mockResolvedValueOnce({ uid: 7, source: Buffer.from(buildEmail()) });

    await fetchMessage(session, 7, 'peek');

    expect(client.messageFlagsAdd).not.toHaveBeenCalled();
  });
});
