/**
 * MCP protocol logging bridge.
 *
 * Forwards structured log records to the connected MCP client over the
 * logging notification channel. Records are dropped until
 * `markInitialized()` runs after the `initialized` handshake, so nothing
 * reaches stdout ahead of the protocol.
 *
 * Outside server mode nothing is ever bound and `mcpLog` is a no-op; the
 * CLI logs through the console diagnostics sink instead.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

export type McpLogLevel =
  | 'debug'
  | 'info'
  | 'notice'
  | 'warning'
  | 'error'
  | 'critical'
  | 'alert'
  | 'emergency';

let mcpServerRef: McpServer | null = null;

let initialized = false;

export function bindServer(server: McpServer): void {
  mcpServerRef = server;
}

export function markInitialized(): void {
  initialized = true;
}

/**
 * Reset module state. **Test-only**.
 * @internal
 */
// eslint-disable-next-line @typescript-eslint/naming-convention, no-underscore-dangle
export function __resetForTesting(): void {
  mcpServerRef = null;
  initialized = false;
}

/**
 * Emit one record over the MCP logging channel.
 *
 * Dropped when no server is bound, the transport is disconnected or the
 * handshake has not completed. A failing send is discarded: logging must
 * never fail an ingestion cycle.
 */
export async function mcpLog(level: McpLogLevel, logger: string, data: unknown): Promise<void> {
  if (!initialized || !mcpServerRef?.isConnected()) return;
  try {
    await mcpServerRef.sendLoggingMessage({ level, logger, data });
  } catch {
    // transport already gone
  }
}
