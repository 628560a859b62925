/**
 * MCP tool: list_mailboxes
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import { describePolicy } from '../ingest/policy.js';
import type { AppConfig } from '../types/index.js';

export default function registerMailboxesTools(server: McpServer, config: AppConfig): void {
  server.tool(
    'list_mailboxes',
    'List configured mailboxes with their folder, archive folder and retention policy.',
    {},
    { readOnlyHint: true, destructiveHint: false },
    async () => {
      const mailboxes = config.mailboxes.map((m) => ({
        name: m.name,
        active: m.active,
        host: m.imap.host,
        folder: m.folder,
        archive: m.archive ?? null,
        policy: m.policy,
        behavior: describePolicy(m.policy),
        maxMessageSize: m.maxMessageSize ?? null,
      }));
      return {
        content: [{ type: 'text' as const, text: JSON.stringify(mailboxes, null, 2) }],
      };
    },
  );
}
