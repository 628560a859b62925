/**
 * Config management subcommands.
 *
 * - config show  — display current config with masked passwords
 * - config edit  — edit global settings interactively
 * - config path  — print config file path
 * - config init  — create a template config file
 */

import fs from 'node:fs/promises';
import path from 'node:path';

import { cancel, confirm, intro, isCancel, log, outro, text } from '@clack/prompts';

import {
  CONFIG_FILE,
  configExists,
  generateTemplate,
  loadConfig,
  loadRawConfig,
  saveConfig,
} from '../config/loader.js';
import { describePolicy } from '../ingest/policy.js';

function printConfigUsage(): void {
  console.log(`Usage: imap-ingest config <subcommand>

Subcommands:
  show    Show current configuration (passwords masked)
  edit    Edit global settings interactively
  path    Print config file path
  init    Create a template config file
`);
}

function showPath(): void {
  console.log(CONFIG_FILE);
}

async function showConfig(): Promise<void> {
  const exists = await configExists();
  if (!exists) {
    console.error(`No config file found at: ${CONFIG_FILE}`);
    console.error(`Run 'imap-ingest config init' to create one.`);
    throw new Error('Config file not found');
  }

  let config;
  try {
    config = await loadConfig();
  } catch (err) {
    throw new Error(`Failed to load config: ${err instanceof Error ? err.message : String(err)}`);
  }

  const { settings } = config;
  console.log(`Config file: ${CONFIG_FILE}\n`);
  console.log(`[settings]`);
  console.log(`  concurrency = ${settings.concurrency}`);
  console.log(`  interval    = ${settings.interval}s`);
  console.log(`  log_level   = ${settings.logLevel}`);
  console.log(`  data_dir    = ${settings.dataDir}`);
  console.log(`  scheduler   = ${settings.scheduler}`);
  console.log(`  webhook     = ${settings.notifications.webhookUrl || '(none)'}\n`);

  config.mailboxes.forEach((mailbox) => {
    console.log(`[mailboxes.${mailbox.name}]${mailbox.active ? '' : ' (inactive)'}`);
    console.log(`  username = ${mailbox.username}`);
    console.log(
      `  imap     = ${mailbox.imap.host}:${mailbox.imap.port} (${mailbox.imap.tls ? 'TLS' : 'plain'})`,
    );
    console.log(`  folder   = ${mailbox.folder}`);
    if (mailbox.archive) {
      console.log(`  archive  = ${mailbox.archive}`);
    }
    console.log(`  policy   = ${mailbox.policy} (${describePolicy(mailbox.policy)})`);
    console.log(`  password = ${'•'.repeat(8)}\n`);
  });
}

async function initConfig(): Promise<void> {
  intro('imap-ingest config init');

  const exists = await configExists();
  if (exists) {
    const overwrite = await confirm({
      message: `Config file already exists at ${CONFIG_FILE}. Overwrite?`,
      initialValue: false,
    });

    if (isCancel(overwrite) || !overwrite) {
      cancel('Cancelled.');
      return;
    }
  }

  await fs.mkdir(path.dirname(CONFIG_FILE), { recursive: true });
  await fs.writeFile(CONFIG_FILE, generateTemplate(), 'utf-8');
  log.success(`Template config created at ${CONFIG_FILE}`);
  log.info("Edit the file to add your mailboxes, then run 'imap-ingest run'.");
  outro('Done!');
}

function positiveInt(min: number, max?: number) {
  return (v: string | undefined): string | undefined => {
    const n = parseInt(v ?? '', 10);
    if (Number.isNaN(n) || n < min || (max !== undefined && n > max)) {
      return max === undefined ? `Must be an integer ≥ ${min}` : `Must be an integer ${min}-${max}`;
    }
    return undefined;
  };
}

async function editSettings(): Promise<void> {
  intro('imap-ingest › Edit Settings');

  const exists = await configExists();
  if (!exists) {
    log.error(`No config file found at: ${CONFIG_FILE}`);
    cancel("Run 'imap-ingest config init' first.");
    return;
  }

  const config = await loadRawConfig();
  const { settings } = config;

  log.info(`Current settings:`);
  log.info(`  concurrency = ${settings.concurrency}`);
  log.info(`  interval    = ${settings.interval}`);
  log.info(`  scheduler   = ${settings.scheduler}`);

  const concurrencyStr = await text({
    message: 'Mailboxes processed in parallel (1-16)',
    defaultValue: String(settings.concurrency),
    initialValue: String(settings.concurrency),
    validate: positiveInt(1, 16),
  });
  if (isCancel(concurrencyStr)) {
    cancel('Cancelled.');
    return;
  }

  const intervalStr = await text({
    message: 'Seconds between scheduled passes',
    defaultValue: String(settings.interval),
    initialValue: String(settings.interval),
    validate: positiveInt(5),
  });
  if (isCancel(intervalStr)) {
    cancel('Cancelled.');
    return;
  }

  const scheduler = await confirm({
    message: 'Run the scheduler inside the MCP server?',
    initialValue: settings.scheduler,
  });
  if (isCancel(scheduler)) {
    cancel('Cancelled.');
    return;
  }

  const updatedConfig = {
    ...config,
    settings: {
      ...settings,
      concurrency: parseInt(concurrencyStr, 10),
      interval: parseInt(intervalStr, 10),
      scheduler,
    },
  };

  await saveConfig(updatedConfig);
  log.success(`Settings updated. Config saved to ${CONFIG_FILE}`);
  outro('Done!');
}

export default async function runConfigCommand(subcommand?: string): Promise<void> {
  switch (subcommand) {
    case 'show':
      await showConfig();
      return;
    case 'edit':
      await editSettings();
      return;
    case 'path':
      showPath();
      return;
    case 'init':
      await initConfig();
      return;
    default:
      printConfigUsage();
  }
}
