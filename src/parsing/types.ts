// src/parsing/types.ts - Records recovered from AppleScript text output

/**
 * One message line-block from a listing script. Only `subject` and `isRead`
 * are guaranteed; the other fields appear when the script printed them.
 */
export interface EmailRecord {
  readonly subject: string;
  readonly isRead: boolean;
  readonly sender?: string;
  readonly date?: string;
  readonly preview?: string;
}

/** Unread count per account; -1 when the account's inbox could not be read. */
export type UnreadCounts = Record<string, number>;

export const UNREAD_MARKER = '✉';
export const READ_MARKER = '✓';
export const TOTAL_EMAILS_PREFIX = 'TOTAL EMAILS';

/** Banner, section and warning glyphs that never carry record data. */
export const DECORATIVE_PREFIXES: readonly string[] = ['=', '━', '📧', '⚠'];

export type EmailRecordField = 'sender' | 'date' | 'preview';

/** Field lines in the order the listing scripts print them. */
export const FIELD_PREFIXES: ReadonlyArray<{ field: EmailRecordField; prefix: string }> = [
  { field: 'sender', prefix: 'From:' },
  { field: 'date', prefix: 'Date:' },
  { field: 'preview', prefix: 'Preview:' },
];
