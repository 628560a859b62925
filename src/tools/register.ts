/**
 * Tool registration — single wiring point.
 *
 * Registers all MCP tools with the server instance.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type IngestionService from '../services/ingestion.service.js';
import type SchedulerService from '../services/scheduler.service.js';
import type { AppConfig } from '../types/index.js';
import registerIngestTools from './ingest.tool.js';
import registerMailboxesTools from './mailboxes.tool.js';

export default function registerAllTools(
  server: McpServer,
  config: AppConfig,
  ingestion: IngestionService,
  scheduler: SchedulerService,
): void {
  registerMailboxesTools(server, config);
  registerIngestTools(server, ingestion, scheduler);
}
