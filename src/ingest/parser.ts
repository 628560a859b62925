/**
 * RFC 822 / MIME parsing on top of mailparser.
 *
 * mailparser accepts almost anything, so structural checks that make a
 * payload "an email" happen here: the first line must be a header field
 * and at least one header must survive parsing. Everything else that goes
 * wrong inside mailparser is reported the same way, as a ParseError.
 */

import type { AddressObject, ParsedMail } from 'mailparser';
import { simpleParser } from 'mailparser';

import { normalizeMessageId } from '../safety/validation.js';
import type { AttachmentMeta, ParsedMessage, RawMessage } from '../types/index.js';
import { IngestError, describeError } from './errors.js';

/** `field-name ":"` per RFC 5322: printable ASCII except colon. */
const HEADER_FIELD = /^[\x21-\x39\x3B-\x7E]+:/;

function firstLine(source: Buffer): string {
  const head = source.subarray(0, 998).toString('latin1');
  const end = head.search(/\r?\n/);
  return end >= 0 ? head.slice(0, end) : head;
}

function addressText(value: AddressObject | AddressObject[] | undefined): string[] {
  if (!value) return [];
  const objects = Array.isArray(value) ? value : [value];
  return objects.flatMap((obj) =>
    obj.value.map((addr) => {
      if (addr.name && addr.address) return `${addr.name} <${addr.address}>`;
      return addr.address ?? addr.name;
    }),
  );
}

function collectHeaders(parsed: ParsedMail): Record<string, string> {
  const headers: Record<string, string> = {};
  parsed.headerLines.forEach(({ key, line }) => {
    if (key in headers) return;
    const colon = line.indexOf(':');
    headers[key] = (colon >= 0 ? line.slice(colon + 1) : line).replace(/\r?\n[ \t]+/g, ' ').trim();
  });
  return headers;
}

/**
 * mailparser substitutes the current time for an unreadable Date header,
 * so validity is decided from the raw value.
 */
function headerDate(raw: string | undefined): string | undefined {
  if (!raw) return undefined;
  const time = Date.parse(raw);
  return Number.isNaN(time) ? undefined : new Date(time).toISOString();
}

function collectAttachments(parsed: ParsedMail): AttachmentMeta[] {
  return parsed.attachments.map((att) => ({
    filename: att.filename ?? 'unnamed',
    contentType: att.contentType,
    size: att.size,
  }));
}

export async function parseMessage(raw: RawMessage, mailbox: string): Promise<ParsedMessage> {
  const fail = (reason: string, cause?: unknown): IngestError =>
    new IngestError('ParseError', mailbox, `Cannot parse UID ${raw.uid} in "${mailbox}": ${reason}`, {
      uid: raw.uid,
      cause,
    });

  if (!HEADER_FIELD.test(firstLine(raw.source))) {
    throw fail('payload does not start with a header field');
  }

  let parsed: ParsedMail;
  try {
    parsed = await simpleParser(raw.source);
  } catch (err) {
    throw fail(describeError(err), err);
  }

  if (parsed.headerLines.length === 0) {
    throw fail('no header fields found');
  }

  const headers = collectHeaders(parsed);

  return {
    mailbox,
    uid: raw.uid,
    messageId: normalizeMessageId(parsed.messageId),
    from: addressText(parsed.from).join(', '),
    to: addressText(parsed.to),
    subject: parsed.subject ?? '',
    date: headerDate(headers.date),
    text: parsed.text ?? '',
    html: typeof parsed.html === 'string' ? parsed.html : undefined,
    attachments: collectAttachments(parsed),
    headers,
    size: raw.source.length,
  };
}

export type MessageParser = typeof parseMessage;
