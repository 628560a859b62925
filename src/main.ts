#!/usr/bin/env node
/**
 * imap-ingest — Main entry point.
 *
 * Subcommands:
 *   stdio     Run as MCP server over stdio (default)
 *   run       One ingestion pass
 *   schedule  Foreground polling loop
 *   config    Config management (show, edit, path, init)
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { loadConfig } from './config/loader.js';
import {
  combineDiagnostics,
  createConsoleDiagnostics,
  createMcpDiagnostics,
} from './ingest/diagnostics.js';
import { bindServer, markInitialized, mcpLog } from './logging.js';
import createServer, { PKG_VERSION } from './server.js';
import { createServices } from './services/index.js';
import registerAllTools from './tools/register.js';

const HELP = `
imap-ingest — retention-aware IMAP ingestion (MCP server + CLI)

Usage:
  imap-ingest [command]

Commands:
  stdio       Run as MCP server over stdio (default)
  run         Run one ingestion pass over all active (or the named) mailboxes
  schedule    Poll every configured interval until interrupted
  config      Config management (show, edit, path, init)
  help        Show this help message

Examples:
  imap-ingest                        # Start MCP server
  imap-ingest run                    # Ingest every active mailbox once
  imap-ingest run support billing    # Ingest specific mailboxes
  imap-ingest schedule               # Keep ingesting in the foreground
  imap-ingest config show            # Show config (passwords masked)
  imap-ingest config edit            # Edit global settings
  imap-ingest config path            # Print config file path
  imap-ingest config init            # Create template config
`.trim();

async function runServer(): Promise<void> {
  const config = await loadConfig();

  const { ingestion, scheduler } = createServices(
    config,
    combineDiagnostics(
      createMcpDiagnostics(config.settings.logLevel),
      // stderr copy for problems that happen before a client is listening
      createConsoleDiagnostics('warning'),
    ),
  );

  const server = createServer();
  bindServer(server);
  server.server.oninitialized = () => {
    markInitialized();
  };

  registerAllTools(server, config, ingestion, scheduler);

  const transport = new StdioServerTransport();
  await server.connect(transport);

  await mcpLog('info', 'server', 'imap-ingest server started');

  if (config.settings.scheduler) {
    scheduler.start();
  }

  // Graceful shutdown
  const shutdown = async () => {
    await scheduler.stop();
    await server.close();
  };

  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      console.error('Shutdown failed:', err instanceof Error ? err.message : String(err));
      process.exitCode = 1;
    });
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
}

async function main(): Promise<void> {
  const command = process.argv[2] ?? 'stdio';

  switch (command) {
    case 'stdio':
      await runServer();
      break;

    case 'run': {
      const { runOnce } = await import('./cli/run.js');
      await runOnce(process.argv.slice(3));
      break;
    }

    case 'schedule': {
      const { runSchedule } = await import('./cli/run.js');
      await runSchedule();
      break;
    }

    case 'config': {
      const { default: runConfigCommand } = await import('./cli/config-commands.js');
      await runConfigCommand(process.argv[3]);
      break;
    }

    case '--version':
    case '-v':
      console.log(PKG_VERSION);
      break;

    case 'help':
    case '--help':
    case '-h':
      console.log(HELP);
      break;

    default:
      console.error(`Unknown command: ${command}\n`);
      console.log(HELP);
      throw new Error(`Unknown command: ${command}`);
  }
}

main().catch((err) => {
  console.error('Fatal error:', err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
