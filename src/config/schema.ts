/**
 * Zod schemas for configuration validation.
 */

import { z } from 'zod';

import { RETENTION_POLICIES } from '../types/index.js';

export const ImapConfigSchema = z.object({
  host: z.string().min(1, 'IMAP host is required'),
  port: z.number().int().min(1).max(65535).default(993),
  tls: z.boolean().default(true),
  starttls: z.boolean().default(false),
  verify_ssl: z.boolean().default(true),
});

export const MatchRulesSchema = z.object({
  from: z.string().optional(),
  to: z.string().optional(),
  subject: z.string().optional(),
});

export const MailboxConfigSchema = z.object({
  name: z.string().min(1, 'Mailbox name is required'),
  username: z.string().min(1, 'Username is required'),
  password: z.string().min(1, 'Password is required'),
  active: z.boolean().default(true),
  folder: z.string().min(1).default('INBOX'),
  archive: z.string().min(1).optional(),
  max_message_size: z.number().int().min(1).optional(),
  policy: z.enum(RETENTION_POLICIES).default('fetch_unseen_peek_only'),
  match: MatchRulesSchema.optional(),
  imap: ImapConfigSchema,
});

export const NotificationsConfigSchema = z.object({
  webhook_url: z.string().default(''),
  summary: z.boolean().default(true),
});

export const SettingsSchema = z.object({
  concurrency: z.number().int().min(1).max(16).default(2),
  interval: z.number().int().min(5).default(60),
  log_level: z.enum(['debug', 'info', 'warning', 'error']).default('info'),
  data_dir: z.string().min(1).optional(),
  connection_timeout: z.number().int().min(1).default(30),
  socket_timeout: z.number().int().min(1).default(120),
  scheduler: z.boolean().default(false),
  notifications: NotificationsConfigSchema.default({
    webhook_url: '',
    summary: true,
  }),
});

export const AppConfigFileSchema = z.object({
  settings: SettingsSchema.default({
    concurrency: 2,
    interval: 60,
    log_level: 'info',
    connection_timeout: 30,
    socket_timeout: 120,
    scheduler: false,
    notifications: {
      webhook_url: '',
      summary: true,
    },
  }),
  mailboxes: z
    .array(MailboxConfigSchema)
    .min(1, 'At least one mailbox is required')
    .refine((mailboxes) => new Set(mailboxes.map((m) => m.name)).size === mailboxes.length, {
      message: 'Mailbox names must be unique',
    }),
});

export type RawMailboxConfig = z.infer<typeof MailboxConfigSchema>;
export type RawAppConfig = z.infer<typeof AppConfigFileSchema>;
/** Shape accepted before defaults are applied (what a config file may omit). */
export type RawAppConfigInput = z.input<typeof AppConfigFileSchema>;
