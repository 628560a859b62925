/**
 * Diagnostic sinks for the ingestion engine.
 *
 * The engine never logs through a module-level logger; it receives a sink
 * and emits structured events with fixed field names so that consumers can
 * filter on mailbox, UID or outcome without parsing text.
 */

import { mcpLog } from '../logging.js';
import type { LogLevel, ProcessingOutcome } from '../types/index.js';

export interface DiagnosticEvent {
  level: LogLevel;
  /** Dotted event name, e.g. `cycle.start`, `message.outcome`. */
  event: string;
  mailbox: string;
  uid?: number;
  outcome?: ProcessingOutcome;
  error?: string;
  [field: string]: unknown;
}

export interface DiagnosticSink {
  emit: (event: DiagnosticEvent) => void | Promise<void>;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warning: 2,
  error: 3,
};

export function meetsLevel(level: LogLevel, minimum: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minimum];
}

// ---------------------------------------------------------------------------
// Sinks
// ---------------------------------------------------------------------------

/** Forwards events over the MCP logging channel under the `ingest` logger. */
export function createMcpDiagnostics(minimum: LogLevel = 'debug'): DiagnosticSink {
  return {
    async emit(event) {
      if (!meetsLevel(event.level, minimum)) return;
      await mcpLog(event.level, 'ingest', event);
    },
  };
}

/**
 * One JSON line per event on stderr. stdout stays free for command output
 * (and for the MCP transport when running as a server).
 */
export function createConsoleDiagnostics(
  minimum: LogLevel = 'info',
  write: (line: string) => void = (line) => {
    process.stderr.write(`${line}\n`);
  },
): DiagnosticSink {
  return {
    emit(event) {
      if (!meetsLevel(event.level, minimum)) return;
      write(JSON.stringify({ time: new Date().toISOString(), ...event }));
    },
  };
}

export const noopDiagnostics: DiagnosticSink = {
  emit() {},
};

/** Fan one event out to several sinks, in order. */
export function combineDiagnostics(...sinks: DiagnosticSink[]): DiagnosticSink {
  return {
    async emit(event) {
      for (const sink of sinks) {
        // eslint-disable-next-line no-await-in-loop
        await sink.emit(event);
      }
    },
  };
}
