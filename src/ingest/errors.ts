/**
 * Ingestion error taxonomy.
 *
 * Cycle-level: ConnectionError, SelectionError.
 * Per-message: FetchError, ParseError, ArchiveError, RetentionEnforcementError.
 */

export type IngestErrorKind =
  | 'ConnectionError'
  | 'SelectionError'
  | 'FetchError'
  | 'ParseError'
  | 'ArchiveError'
  | 'RetentionEnforcementError'
  | 'PersistenceError';

export class IngestError extends Error {
  readonly kind: IngestErrorKind;

  readonly mailbox: string;

  readonly uid?: number;

  constructor(
    kind: IngestErrorKind,
    mailbox: string,
    message: string,
    options: { uid?: number; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = kind;
    this.kind = kind;
    this.mailbox = mailbox;
    this.uid = options.uid;
  }
}

/** Raised by the session when a single IMAP command exceeds its time budget. */
export class TimeoutError extends Error {
  constructor(operation: string, ms: number) {
    super(`${operation} timed out after ${ms}ms`);
    this.name = 'TimeoutError';
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isIngestError(err: unknown): err is IngestError {
  return err instanceof IngestError;
}

/**
 * Wrap any thrown value as an IngestError of the given kind, with the
 * thrown value as `cause`. Already-classified errors pass through untouched.
 */
export function classify(
  kind: IngestErrorKind,
  mailbox: string,
  err: unknown,
  uid?: number,
): IngestError {
  if (isIngestError(err)) return err;
  const where = uid === undefined ? `mailbox "${mailbox}"` : `UID ${uid} in "${mailbox}"`;
  return new IngestError(kind, mailbox, `${kind} for ${where}: ${describeError(err)}`, {
    uid,
    cause: err,
  });
}
