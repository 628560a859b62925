/**
 * Service wiring shared by the MCP server and the CLI commands.
 */

import type { DiagnosticSink } from '../ingest/diagnostics.js';
import type { AppConfig } from '../types/index.js';
import IngestionService from './ingestion.service.js';
import FileMessageStore from './message-store.js';
import NotifierService from './notifier.service.js';
import SchedulerService from './scheduler.service.js';

export interface Services {
  store: FileMessageStore;
  notifier: NotifierService;
  ingestion: IngestionService;
  scheduler: SchedulerService;
}

export function createServices(config: AppConfig, diagnostics: DiagnosticSink): Services {
  const store = new FileMessageStore(config.settings.dataDir);
  const notifier = new NotifierService(config.settings.notifications, diagnostics);
  const ingestion = new IngestionService(config, { store, notifier, diagnostics });
  const scheduler = new SchedulerService(ingestion, config.settings.interval, { diagnostics });
  return { store, notifier, ingestion, scheduler };
}
