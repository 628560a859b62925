import { __resetForTesting, bindServer, markInitialized, mcpLog } from './logging.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function createMockServer(connected = true) {
  return {
    isConnected: vi.fn(() => connected),
    sendLoggingMessage: vi.fn(async () => {}),
  };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('mcpLog', () => {
  beforeEach(() => {
    __resetForTesting();
  });

  it('is a no-op in CLI mode where no server is bound', async () => {
    await expect(mcpLog('info', 'ingest', { event: 'cycle.start' })).resolves.toBeUndefined();
  });

  it('holds records back until the initialized handshake', async () => {
    const mock = createMockServer();
    bindServer(mock as never);

    await mcpLog('info', 'ingest', { event: 'cycle.start', mailbox: 'support' });

    expect(mock.sendLoggingMessage).not.toHaveBeenCalled();
  });

  it('sends structured records once initialized', async () => {
    const mock = createMockServer();
    bindServer(mock as never);
    markInitialized();

    await mcpLog('warning', 'ingest', { event: 'archive.failed', mailbox: 'support', uid: 7 });

    expect(mock.sendLoggingMessage).toHaveBeenCalledWith({
      level: 'warning',
      logger: 'ingest',
      data: { event: 'archive.failed', mailbox: 'support', uid: 7 },
    });
  });

  it('skips sending after the transport disconnects', async () => {
    const mock = createMockServer(false);
    bindServer(mock as never);
    markInitialized();

    await mcpLog('error', 'server', 'shutting down');

    expect(mock.isConnected).toHaveBeenCalled();
    expect(mock.sendLoggingMessage).not.toHaveBeenCalled();
  });

  it('never rejects when the send fails', async () => {
    const mock = createMockServer();
    mock.sendLoggingMessage.mockRejectedValueOnce(new Error('transport closed'));
    bindServer(mock as never);
    markInitialized();

    await expect(mcpLog('error', 'ingest', 'boom')).resolves.toBeUndefined();
    expect(mock.sendLoggingMessage).toHaveBeenCalledOnce();
  });
});
