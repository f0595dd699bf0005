import { describe, it, expect } from 'vitest';
import {
  EmailRecordBuilder,
  formatEmailList,
  formatEmailRecord,
  parseEmailList,
  type EmailRecord,
} from '../../src/parsing/index.js';

describe('parseEmailList', () => {
  it('parses a single record and stops at the totals line', () => {
    const output = '✉ Hello\n   From: a@b.com\n   Date: 2024-01-01\nTOTAL EMAILS: 1\n';

    expect(parseEmailList(output)).toEqual([
      { subject: 'Hello', isRead: false, sender: 'a@b.com', date: '2024-01-01' },
    ]);
  });

  it('never reads past TOTAL EMAILS', () => {
    const output = '✓ Kept\nTOTAL EMAILS: 1\n✉ Ignored\n   From: late@example.com\n';

    expect(parseEmailList(output)).toEqual([{ subject: 'Kept', isRead: true }]);
  });

  it('returns an empty list for empty output', () => {
    expect(parseEmailList('')).toEqual([]);
    expect(parseEmailList('\n\n   \n')).toEqual([]);
  });

  it('emits one record per record-start line, even without fields', () => {
    expect(parseEmailList('✉ First\n✓ Second')).toEqual([
      { subject: 'First', isRead: false },
      { subject: 'Second', isRead: true },
    ]);
  });

  it('appends each record exactly once when the totals line closes it', () => {
    const records = parseEmailList('✉ Only\n   From: x@example.com\nTOTAL EMAILS: 1');
    expect(records).toHaveLength(1);
  });

  it('skips banners, separators, account headers and warnings', () => {
    const output = [
      'INBOX EMAILS - ALL ACCOUNTS',
      '========================================',
      '',
      '📧 ACCOUNT: Work',
      '━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━',
      '✉ Quarterly report',
      '   From: Finance <finance@example.com>',
      '   Date: Monday, 1 April 2024 at 09:00:00',
      '   Preview: Numbers are in',
      '⚠ Error accessing inbox for account Personal',
      '========================================',
      'TOTAL EMAILS: 1',
      '========================================',
    ].join('\n');

    expect(parseEmailList(output)).toEqual([
      {
        subject: 'Quarterly report',
        isRead: false,
        sender: 'Finance <finance@example.com>',
        date: 'Monday, 1 April 2024 at 09:00:00',
        preview: 'Numbers are in',
      },
    ]);
  });

  it('ignores field lines that appear before any record', () => {
    expect(parseEmailList('   From: orphan@example.com\n✓ Real')).toEqual([{ subject: 'Real', isRead: true }]);
  });

  it('keeps the last value when a field repeats', () => {
    expect(parseEmailList('✉ A\n   From: one@example.com\n   From: two@example.com')).toEqual([
      { subject: 'A', isRead: false, sender: 'two@example.com' },
    ]);
  });

  it('handles CRLF line endings and an emoji variation selector after the marker', () => {
    expect(parseEmailList('✉\uFE0F Windows\r\n   Date: today\r\n')).toEqual([
      { subject: 'Windows', isRead: false, date: 'today' },
    ]);
  });

  it('returns frozen records', () => {
    const [record] = parseEmailList('✉ Frozen');
    expect(Object.isFrozen(record)).toBe(true);
  });
});

describe('EmailRecordBuilder', () => {
  it('only includes fields that were set', () => {
    const record = new EmailRecordBuilder('Subject', true).set('preview', 'text').build();
    expect(record).toEqual({ subject: 'Subject', isRead: true, preview: 'text' });
    expect('sender' in record).toBe(false);
  });
});

describe('formatEmailList', () => {
  const records: EmailRecord[] = [
    { subject: 'Hello', isRead: false, sender: 'a@b.com', date: '2024-01-01' },
    { subject: 'Done', isRead: true, preview: 'All finished' },
  ];

  it('writes record blocks followed by the totals line', () => {
    expect(formatEmailRecord(records[0] ?? { subject: '', isRead: false })).toBe(
      '✉ Hello\n   From: a@b.com\n   Date: 2024-01-01'
    );
    expect(formatEmailList(records)).toBe(
      '✉ Hello\n   From: a@b.com\n   Date: 2024-01-01\n\n✓ Done\n   Preview: All finished\n\nTOTAL EMAILS: 2\n'
    );
  });

  it('reads back through parseEmailList', () => {
    expect(parseEmailList(formatEmailList(records))).toEqual(records);
  });

  it('formats an empty list as just the totals line', () => {
    expect(formatEmailList([])).toBe('\nTOTAL EMAILS: 0\n');
  });
});
