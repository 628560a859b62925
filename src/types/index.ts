/**
 * Shared TypeScript types for imap-ingest.
 */

// ---------------------------------------------------------------------------
// Retention policy
// ---------------------------------------------------------------------------

export const RETENTION_POLICIES = [
  'delete_after_processing',
  'mark_seen_after_processing',
  'fetch_unseen_and_mark_seen',
  'fetch_unseen_peek_only',
  'fetch_all_peek_only',
] as const;

export type RetentionPolicy = (typeof RETENTION_POLICIES)[number];

/** Which UIDs a cycle considers. */
export type SelectionMode = 'all' | 'unseen';

/** `normal` sets \Seen as a side effect, `peek` leaves every flag alone. */
export type FetchMode = 'normal' | 'peek';

export type RetentionEffect = 'delete' | 'mark-seen' | 'none';

// ---------------------------------------------------------------------------
// Mailbox
// ---------------------------------------------------------------------------

export interface ImapConfig {
  host: string;
  port: number;
  tls: boolean;
  starttls: boolean;
  verifySsl: boolean;
}

export interface MatchRules {
  from?: string;
  to?: string;
  subject?: string;
}

export interface TimeoutConfig {
  /** Milliseconds allowed for connect + login + folder open. */
  connection: number;
  /** Milliseconds allowed for any single command after that. */
  socket: number;
}

export interface MailboxConfig {
  /** Mailbox identity: dedup scope, store directory, log field. */
  name: string;
  username: string;
  password: string;
  active: boolean;
  folder: string;
  archive?: string;
  maxMessageSize?: number;
  policy: RetentionPolicy;
  match?: MatchRules;
  imap: ImapConfig;
  timeouts: TimeoutConfig;
}

// ---------------------------------------------------------------------------
// Settings
// ---------------------------------------------------------------------------

export type LogLevel = 'debug' | 'info' | 'warning' | 'error';

export interface NotificationsConfig {
  webhookUrl: string;
  summary: boolean;
}

export interface AppConfig {
  settings: {
    concurrency: number;
    /** Seconds between scheduled passes. */
    interval: number;
    logLevel: LogLevel;
    dataDir: string;
    scheduler: boolean;
    notifications: NotificationsConfig;
  };
  mailboxes: MailboxConfig[];
}

// ---------------------------------------------------------------------------
// Messages
// ---------------------------------------------------------------------------

export interface RawMessage {
  uid: number;
  source: Buffer;
}

export interface AttachmentMeta {
  filename: string;
  contentType: string;
  size: number;
}

export interface ParsedMessage {
  mailbox: string;
  uid: number;
  /** Dedup key. Absent means the message is never treated as a duplicate. */
  messageId?: string;
  from: string;
  to: string[];
  subject: string;
  /** ISO 8601, absent when the Date header is missing or unreadable. */
  date?: string;
  text: string;
  html?: string;
  attachments: AttachmentMeta[];
  headers: Record<string, string>;
  size: number;
}

// ---------------------------------------------------------------------------
// Outcomes
// ---------------------------------------------------------------------------

export type ProcessingOutcome =
  | 'yielded'
  | 'skipped-duplicate'
  | 'skipped-by-condition'
  | 'parse-error'
  | 'fetch-error'
  | 'dedup-error';

export type CycleState =
  | 'init'
  | 'selecting'
  | 'no-candidates'
  | 'iterating'
  | 'finalizing'
  | 'done'
  | 'failed';

export interface CycleSummary {
  yielded: number;
  skippedDuplicate: number;
  skippedFiltered: number;
  parseErrors: number;
  fetchErrors: number;
  dedupErrors: number;
  oversized: number;
  archived: number;
  archiveErrors: number;
  retentionApplied: number;
  retentionErrors: number;
  expunged: number;
  cancelled: boolean;
}

export interface MessageDigest {
  uid: number;
  messageId?: string;
  from: string;
  subject: string;
  date?: string;
}

export interface MailboxReport {
  mailbox: string;
  policy: RetentionPolicy;
  status: 'done' | 'failed';
  summary: CycleSummary;
  failure?: { kind: string; message: string };
  messages: MessageDigest[];
  startedAt: string;
  finishedAt: string;
}

export interface RunReport {
  reports: MailboxReport[];
  totals: {
    mailboxes: number;
    failed: number;
    yielded: number;
  };
}
