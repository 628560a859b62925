/**
 * MCP server factory.
 */

import { readFileSync } from 'node:fs';

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

export const PKG_VERSION = readVersion();

export default function createServer(): McpServer {
  return new McpServer(
    { name: 'imap-ingest', version: PKG_VERSION },
    {
      capabilities: { logging: {} },
      instructions:
        'Ingests mail from configured IMAP mailboxes under per-mailbox retention policies. ' +
        'Use list_mailboxes to see what is configured, run_ingestion to run a pass, ' +
        'and list_ingested to read stored messages.',
    },
  );
}
