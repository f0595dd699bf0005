import { describe, it, expect } from 'vitest';
import {
  asInteger,
  asList,
  asString,
  dateVariableScript,
  escapeAppleScriptString,
  filterConditionScript,
  mailboxLookupScript,
  mailboxReference,
  mailboxSelectionScript,
  recipientsScript,
  splitRecipients,
  stripThreadPrefixes,
  tellMail,
  totalsScript,
} from '../../src/scripts/index.js';

describe('string literals', () => {
  it('escapes backslashes before quotes', () => {
    expect(escapeAppleScriptString('say "hi" \\ bye')).toBe('say \\"hi\\" \\\\ bye');
    expect(asString('He said "no"')).toBe('"He said \\"no\\""');
  });

  it('builds lists of quoted strings', () => {
    expect(asList(['INBOX', 'Inbox'])).toBe('{"INBOX", "Inbox"}');
  });

  it('only accepts non-negative integers', () => {
    expect(asInteger(0)).toBe('0');
    expect(asInteger(25)).toBe('25');
    expect(() => asInteger(-1)).toThrow(RangeError);
    expect(() => asInteger(1.5)).toThrow('Expected a non-negative integer, got 1.5');
  });
});

describe('mailbox resolution', () => {
  it('writes nested mailbox references innermost first', () => {
    expect(mailboxReference('Projects/Client A')).toBe(
      'mailbox "Client A" of mailbox "Projects" of targetAccount'
    );
    expect(mailboxReference('Archive', 'acct')).toBe('mailbox "Archive" of acct');
  });

  it('rejects an empty mailbox path', () => {
    expect(() => mailboxReference(' / ')).toThrow(RangeError);
  });

  it('uses inbox discovery for any spelling of INBOX', () => {
    const script = mailboxLookupScript('inbox', 'targetAccount', 'found');
    expect(script).toContain('set possibleInboxNames to {"INBOX", "Inbox",');
    expect(script).toContain('set found to mailbox inboxName of targetAccount');
  });

  it('selects every mailbox for All', () => {
    expect(mailboxSelectionScript('All').trim()).toBe('set searchMailboxes to every mailbox of targetAccount');
  });

  it('wraps a named mailbox lookup in a readable error', () => {
    const script = mailboxSelectionScript('Archive');
    expect(script).toContain('set searchMailbox to mailbox "Archive" of targetAccount');
    expect(script).toContain('error "Mailbox not found: Archive. " & errMsg');
    expect(script).toContain('set searchMailboxes to {searchMailbox}');
  });
});

describe('filterConditionScript', () => {
  it('matches everything when empty', () => {
    expect(filterConditionScript({})).toBe('true');
    expect(filterConditionScript({ readStatus: 'all' })).toBe('true');
  });

  it('joins every condition with and', () => {
    expect(
      filterConditionScript({
        subjectKeyword: 'Invoice "Q1"',
        sender: 'billing@',
        hasAttachments: true,
        readStatus: 'unread',
        dateFromVar: 'dateFrom',
        dateToVar: 'dateTo',
      })
    ).toBe(
      'messageSubject contains "Invoice \\"Q1\\"" and messageSender contains "billing@" and ' +
        '(count of mail attachments of aMessage) > 0 and messageRead is false and ' +
        'messageDate >= dateFrom and messageDate <= dateTo'
    );
  });

  it('can require no attachments and read messages', () => {
    expect(filterConditionScript({ hasAttachments: false, readStatus: 'read' })).toBe(
      '(count of mail attachments of aMessage) = 0 and messageRead is true'
    );
  });
});

describe('dateVariableScript', () => {
  it('sets the day to 1 before changing year and month', () => {
    const lines = dateVariableScript('dateTo', '2024-02-29', true)
      .trim()
      .split('\n')
      .map((line) => line.trim());
    expect(lines).toEqual([
      'set dateTo to current date',
      'set day of dateTo to 1',
      'set year of dateTo to 2024',
      'set month of dateTo to 2',
      'set day of dateTo to 29',
      'set time of dateTo to 86399',
    ]);
  });

  it('starts at midnight by default', () => {
    expect(dateVariableScript('dateFrom', '2024-01-05')).toContain('set time of dateFrom to 0');
  });

  it('rejects anything but YYYY-MM-DD', () => {
    expect(() => dateVariableScript('d', '05/01/2024')).toThrow('Invalid date "05/01/2024", expected YYYY-MM-DD');
  });
});

describe('recipients', () => {
  it('splits comma-separated addresses', () => {
    expect(splitRecipients(' a@example.com, ,b@example.com ')).toEqual(['a@example.com', 'b@example.com']);
    expect(splitRecipients(undefined)).toEqual([]);
  });

  it('makes one recipient per address', () => {
    expect(recipientsScript('cc', 'a@example.com,b@example.com').split('\n').map((l) => l.trim())).toEqual([
      'make new cc recipient at end of cc recipients with properties {address:"a@example.com"}',
      'make new cc recipient at end of cc recipients with properties {address:"b@example.com"}',
    ]);
    expect(recipientsScript('bcc', undefined)).toBe('');
  });
});

describe('misc', () => {
  it('strips reply and forward prefixes', () => {
    expect(stripThreadPrefixes('Re: Fwd: Budget review')).toBe('Budget review');
    expect(stripThreadPrefixes('FW: RE: Offsite')).toBe('Offsite');
  });

  it('writes the totals block the parser stops at', () => {
    const lines = totalsScript('TOTAL EMAILS: ', 'totalCount').trim().split('\n').map((l) => l.trim());
    expect(lines[1]).toBe('set outputText to outputText & "TOTAL EMAILS: " & totalCount & return');
  });

  it('wraps a body in a tell block', () => {
    expect(tellMail('  return 1')).toBe('tell application "Mail"\n  return 1\nend tell');
  });
});
