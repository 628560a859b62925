/**
 * XDG Base Directory path resolution.
 * Follows the XDG Base Directory Specification for cross-platform config paths.
 *
 * @see https://specifications.freedesktop.org/basedir-spec/latest/
 */

import os from 'node:os';
import path from 'node:path';

const APP_NAME = 'imap-ingest';

export const xdg = {
  /** Config directory: ~/.config/imap-ingest/ */
  config: path.join(process.env.XDG_CONFIG_HOME ?? path.join(os.homedir(), '.config'), APP_NAME),

  /** Data directory: ~/.local/share/imap-ingest/ */
  data: path.join(
    process.env.XDG_DATA_HOME ?? path.join(os.homedir(), '.local', 'share'),
    APP_NAME,
  ),
} as const;

/** Full path to the config file */
export const CONFIG_FILE = path.join(xdg.config, 'config.toml');

/** Default root for stored messages (`settings.data_dir`). */
export const DEFAULT_DATA_DIR = xdg.data;
