/**
 * Configuration loader.
 *
 * Precedence: environment variables → TOML config file → defaults.
 */

import fs from 'node:fs/promises';
import path from 'node:path';

import { parse as parseTOML, stringify as stringifyTOML } from 'smol-toml';
import type { AppConfig, MailboxConfig } from '../types/index.js';
import type { RawAppConfig, RawAppConfigInput, RawMailboxConfig } from './schema.js';
import { AppConfigFileSchema, MailboxConfigSchema } from './schema.js';
import { CONFIG_FILE, DEFAULT_DATA_DIR, xdg } from './xdg.js';

const ENV_PREFIX = 'IMAP_INGEST_';

function env(name: string): string | undefined {
  const value = process.env[`${ENV_PREFIX}${name}`];
  return value === undefined || value === '' ? undefined : value;
}

function envInt(name: string): number | undefined {
  const value = env(name);
  return value === undefined ? undefined : parseInt(value, 10);
}

// ---------------------------------------------------------------------------
// Environment variable loader (single-mailbox quick setup)
// ---------------------------------------------------------------------------

function loadFromEnv(): RawAppConfigInput | null {
  const host = env('HOST');
  const username = env('USERNAME');
  const password = env('PASSWORD');

  if (!host || !username || !password) {
    return null;
  }

  return {
    mailboxes: [
      {
        name: env('MAILBOX_NAME') ?? 'default',
        username,
        password,
        folder: env('FOLDER'),
        archive: env('ARCHIVE'),
        max_message_size: envInt('MAX_MESSAGE_SIZE'),
        policy: MailboxConfigSchema.shape.policy.parse(env('POLICY')),
        imap: {
          host,
          port: envInt('PORT') ?? 993,
          tls: env('TLS') !== 'false',
          starttls: env('STARTTLS') === 'true',
          verify_ssl: env('VERIFY_SSL') !== 'false',
        },
      },
    ],
  };
}

// ---------------------------------------------------------------------------
// TOML file loader
// ---------------------------------------------------------------------------

async function loadFromFile(filePath: string = CONFIG_FILE): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null;
    throw err;
  }
  return parseTOML(content);
}

// ---------------------------------------------------------------------------
// Normalize raw config → typed AppConfig
// ---------------------------------------------------------------------------

function normalizeMailbox(raw: RawMailboxConfig, settings: RawAppConfig['settings']): MailboxConfig {
  return {
    name: raw.name,
    username: raw.username,
    password: raw.password,
    active: raw.active,
    folder: raw.folder,
    archive: raw.archive,
    maxMessageSize: raw.max_message_size,
    policy: raw.policy,
    match: raw.match,
    imap: {
      host: raw.imap.host,
      port: raw.imap.port,
      tls: raw.imap.tls,
      starttls: raw.imap.starttls,
      verifySsl: raw.imap.verify_ssl,
    },
    timeouts: {
      connection: settings.connection_timeout * 1000,
      socket: settings.socket_timeout * 1000,
    },
  };
}

function normalizeConfig(raw: RawAppConfig): AppConfig {
  const { settings } = raw;
  return {
    settings: {
      concurrency: settings.concurrency,
      interval: settings.interval,
      logLevel: settings.log_level,
      dataDir: settings.data_dir ?? DEFAULT_DATA_DIR,
      scheduler: settings.scheduler,
      notifications: {
        webhookUrl: settings.notifications.webhook_url,
        summary: settings.notifications.summary,
      },
    },
    mailboxes: raw.mailboxes.map((m) => normalizeMailbox(m, settings)),
  };
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Load raw (snake_case) config from TOML file without normalization.
 * Useful for read-modify-write operations in CLI commands.
 * Throws if no config file exists or validation fails.
 */
export async function loadRawConfig(configPath?: string): Promise<RawAppConfig> {
  const filePath = configPath ?? CONFIG_FILE;
  const fileConfig = await loadFromFile(filePath);
  if (fileConfig === null) {
    throw new Error(`No config file found at: ${filePath}`);
  }
  return AppConfigFileSchema.parse(fileConfig);
}

/**
 * Load and validate configuration from env vars or TOML file.
 * Throws on validation errors.
 */
export async function loadConfig(configPath?: string): Promise<AppConfig> {
  // 1. Try environment variables first
  const envConfig = loadFromEnv();
  if (envConfig) {
    const validated = AppConfigFileSchema.parse(envConfig);
    return normalizeConfig(validated);
  }

  // 2. Fall back to TOML config file
  const fileConfig = await loadFromFile(configPath);
  if (fileConfig !== null) {
    const validated = AppConfigFileSchema.parse(fileConfig);
    return normalizeConfig(validated);
  }

  throw new Error(
    `No configuration found.\n\n` +
      `Set environment variables (${ENV_PREFIX}HOST, ${ENV_PREFIX}USERNAME, ${ENV_PREFIX}PASSWORD, etc.)\n` +
      `or create a config file at: ${configPath ?? CONFIG_FILE}\n\n` +
      `Run 'imap-ingest config init' to write a template.`,
  );
}

/**
 * Save configuration to a TOML file.
 */
export async function saveConfig(
  config: RawAppConfigInput,
  filePath: string = CONFIG_FILE,
): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });
  const toml = stringifyTOML(config);
  await fs.writeFile(filePath, toml, 'utf-8');
}

/**
 * Generate a template TOML config string.
 */
export function generateTemplate(): string {
  return `# imap-ingest configuration
# Location: ${CONFIG_FILE}

[settings]
concurrency = 2           # mailboxes processed in parallel (1-16)
interval = 60             # seconds between scheduled passes
log_level = "info"        # debug | info | warning | error
# data_dir = "${DEFAULT_DATA_DIR}"
connection_timeout = 30   # seconds for connect + login + folder open
socket_timeout = 120      # seconds for any single IMAP command
scheduler = false         # run the scheduler inside the MCP server

[settings.notifications]
webhook_url = ""          # POST a JSON event per received message
summary = true            # also POST one batch summary per mailbox run

[[mailboxes]]
name = "support"
username = "support@example.com"
password = "your-app-password"
folder = "INBOX"
# archive = "Processed"   # copy every accepted message here first
# max_message_size = 10485760
# delete_after_processing | mark_seen_after_processing |
# fetch_unseen_and_mark_seen | fetch_unseen_peek_only | fetch_all_peek_only
policy = "fetch_unseen_peek_only"

# [mailboxes.match]       # optional, * wildcards and | alternatives
# from = "*@example.com"
# subject = "Ticket*|Support*"

[mailboxes.imap]
host = "imap.example.com"
port = 993
tls = true
starttls = false
verify_ssl = true
`;
}

/**
 * Check if a config file exists at the default XDG path.
 */
export async function configExists(filePath: string = CONFIG_FILE): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/** Re-export for convenience */
export { CONFIG_FILE, xdg };
