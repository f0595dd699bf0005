/**
 * EmailListParser - Turns the record-block text printed by listing scripts
 * into EmailRecord values.
 *
 * Input looks like:
 *
 *   ✉ Subject of an unread message
 *      From: Someone <someone@example.com>
 *      Date: Monday, 1 January 2024 at 09:00:00
 *   ✓ Subject of a read message
 *      ...
 *   TOTAL EMAILS: 2
 *
 * Anything else (banners, account headers, warnings) is skipped.
 */

import {
  type EmailRecord,
  type EmailRecordField,
  DECORATIVE_PREFIXES,
  FIELD_PREFIXES,
  READ_MARKER,
  TOTAL_EMAILS_PREFIX,
  UNREAD_MARKER,
} from './types.js';

const VARIATION_SELECTOR = '\uFE0F';

/**
 * Accumulates the fields of one record while lines are scanned.
 * `build()` returns a frozen value; the builder is discarded afterwards.
 */
export class EmailRecordBuilder {
  private readonly fields: Partial<Record<EmailRecordField, string>> = {};

  constructor(
    private readonly subject: string,
    private readonly isRead: boolean
  ) {}

  set(field: EmailRecordField, value: string): this {
    this.fields[field] = value;
    return this;
  }

  build(): EmailRecord {
    const record: EmailRecord = {
      subject: this.subject,
      isRead: this.isRead,
      ...(this.fields.sender !== undefined && { sender: this.fields.sender }),
      ...(this.fields.date !== undefined && { date: this.fields.date }),
      ...(this.fields.preview !== undefined && { preview: this.fields.preview }),
    };
    return Object.freeze(record);
  }
}

function isDecorative(line: string): boolean {
  return DECORATIVE_PREFIXES.some((prefix) => line.startsWith(prefix));
}

function recordStart(line: string): { isRead: boolean; subject: string } | null {
  const marker = line.startsWith(UNREAD_MARKER)
    ? UNREAD_MARKER
    : line.startsWith(READ_MARKER)
      ? READ_MARKER
      : null;
  if (!marker) return null;

  let rest = line.slice(marker.length);
  if (rest.startsWith(VARIATION_SELECTOR)) {
    rest = rest.slice(VARIATION_SELECTOR.length);
  }
  return { isRead: marker === READ_MARKER, subject: rest.trim() };
}

function fieldLine(line: string): { field: EmailRecordField; value: string } | null {
  for (const { field, prefix } of FIELD_PREFIXES) {
    if (line.startsWith(prefix)) {
      return { field, value: line.slice(prefix.length).trim() };
    }
  }
  return null;
}

/**
 * Parse listing output into records, in output order.
 * Never throws; unrecognised lines are dropped.
 */
export function parseEmailList(output: string): EmailRecord[] {
  const records: EmailRecord[] = [];
  let current: EmailRecordBuilder | null = null;

  const flush = () => {
    if (current) {
      records.push(current.build());
      current = null;
    }
  };

  for (const rawLine of output.split(/\r\n|\r|\n/)) {
    const line = rawLine.trim();
    if (!line || isDecorative(line)) continue;

    const start = recordStart(line);
    if (start) {
      flush();
      current = new EmailRecordBuilder(start.subject, start.isRead);
      continue;
    }

    if (line.startsWith(TOTAL_EMAILS_PREFIX)) {
      break;
    }

    const field = fieldLine(line);
    if (field && current) {
      current.set(field.field, field.value);
    }
  }

  flush();
  return records;
}
