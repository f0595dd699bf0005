/**
 * EmailListFormatter - Writes EmailRecord values in the same record-block
 * layout the listing scripts print, so text built here reads back through
 * parseEmailList unchanged. No tool prints through it: the scripts write
 * their own listings, and this is the reference for that layout.
 */

import {
  type EmailRecord,
  FIELD_PREFIXES,
  READ_MARKER,
  TOTAL_EMAILS_PREFIX,
  UNREAD_MARKER,
} from './types.js';

const FIELD_INDENT = '   ';

export function formatEmailRecord(record: EmailRecord): string {
  const lines = [`${record.isRead ? READ_MARKER : UNREAD_MARKER} ${record.subject}`];
  for (const { field, prefix } of FIELD_PREFIXES) {
    const value = record[field];
    if (value !== undefined) {
      lines.push(`${FIELD_INDENT}${prefix} ${value}`);
    }
  }
  return lines.join('\n');
}

export function formatEmailList(records: readonly EmailRecord[]): string {
  const blocks = records.map((record) => `${formatEmailRecord(record)}\n`);
  return `${blocks.join('\n')}\n${TOTAL_EMAILS_PREFIX}: ${records.length}\n`;
}
