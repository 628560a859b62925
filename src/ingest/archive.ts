/**
 * Archive folder handling. Best effort throughout: archiving never blocks
 * or changes the outcome of ingestion.
 */

import type { MailSession } from '../connections/types.js';
import type { DiagnosticSink } from './diagnostics.js';
import { classify, describeError } from './errors.js';

/**
 * Make sure the archive folder exists. Returns `false` when it neither
 * exists nor could be created, which disables archiving for the cycle.
 */
export async function ensureArchiveFolder(
  session: MailSession,
  name: string,
  diagnostics: DiagnosticSink,
): Promise<boolean> {
  try {
    if (await session.folderExists(name)) {
      await diagnostics.emit({
        level: 'debug',
        event: 'archive.folder-exists',
        mailbox: session.mailbox,
        folder: name,
      });
      return true;
    }
    await session.createFolder(name);
    await diagnostics.emit({
      level: 'info',
      event: 'archive.folder-created',
      mailbox: session.mailbox,
      folder: name,
    });
    return true;
  } catch (err) {
    const error = classify('ArchiveError', session.mailbox, err);
    await diagnostics.emit({
      level: 'warning',
      event: 'archive.unavailable',
      mailbox: session.mailbox,
      folder: name,
      error: describeError(error),
    });
    return false;
  }
}

/** Copy one accepted message. Returns whether the copy succeeded. */
export async function copyToArchive(
  session: MailSession,
  uid: number,
  name: string,
  diagnostics: DiagnosticSink,
): Promise<boolean> {
  try {
    await session.copy(uid, name);
    return true;
  } catch (err) {
    const error = classify('ArchiveError', session.mailbox, err, uid);
    await diagnostics.emit({
      level: 'warning',
      event: 'archive.copy-failed',
      mailbox: session.mailbox,
      uid,
      folder: name,
      error: describeError(error),
    });
    return false;
  }
}
