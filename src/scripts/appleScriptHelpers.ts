// src/scripts/appleScriptHelpers.ts - Shared AppleScript fragments for Mail scripts

/**
 * Inbox names Mail uses across providers and locales. Exchange accounts
 * expose a localized inbox instead of "INBOX".
 */
export const INBOX_NAMES: readonly string[] = [
  'INBOX',
  'Inbox',
  'Boîte de réception',
  'Posteingang',
  'Bandeja de entrada',
  'Posta in arrivo',
  'Caixa de entrada',
  'Входящие',
  '受信トレイ',
  '收件箱',
];

export const ALL_MAILBOXES = 'All';

export const SEPARATOR_LINE = '━'.repeat(40);
export const TOTALS_LINE = '='.repeat(40);

/** Subject prefixes stripped when matching a conversation topic. */
export const THREAD_PREFIXES: readonly string[] = ['Re:', 'Fwd:', 'FW:', 'RE:', 'Fw:'];

// --- Literals ---

/**
 * Escapes a value for use inside an AppleScript string literal.
 * Backslashes first, then double quotes.
 */
export function escapeAppleScriptString(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

/** Quoted, escaped AppleScript string literal. */
export function asString(value: string): string {
  return `"${escapeAppleScriptString(value)}"`;
}

export function asList(values: readonly string[]): string {
  return `{${values.map(asString).join(', ')}}`;
}

export function asBoolean(value: boolean): string {
  return value ? 'true' : 'false';
}

/** Non-negative integer literal; rejects anything that isn't one. */
export function asInteger(value: number): string {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`Expected a non-negative integer, got ${value}`);
  }
  return String(value);
}

// --- Mailbox resolution ---

/**
 * Sets `resultVar` to the first inbox name that exists on `accountVar`.
 * Raises an AppleScript error when none does.
 */
export function inboxDiscoveryScript(
  accountVar: string = 'anAccount',
  resultVar: string = 'inboxMailbox'
): string {
  return `
    set ${resultVar} to missing value
    set possibleInboxNames to ${asList(INBOX_NAMES)}
    repeat with inboxName in possibleInboxNames
      try
        set ${resultVar} to mailbox inboxName of ${accountVar}
        exit repeat
      end try
    end repeat
    if ${resultVar} is missing value then
      error "Could not find inbox for account " & (name of ${accountVar})
    end if
`;
}

/**
 * Reference to a possibly nested mailbox, written innermost first:
 * "Projects/Client" → mailbox "Client" of mailbox "Projects" of targetAccount
 */
export function mailboxReference(mailboxPath: string, accountVar: string = 'targetAccount'): string {
  const parts = mailboxPath
    .split('/')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
  if (parts.length === 0) {
    throw new RangeError('Mailbox path must contain at least one name');
  }
  return [...parts.reverse().map((part) => `mailbox ${asString(part)}`), accountVar].join(' of ');
}

/** Sets `resultVar` to a mailbox, using inbox discovery for any spelling of INBOX. */
export function mailboxLookupScript(
  mailbox: string,
  accountVar: string = 'targetAccount',
  resultVar: string = 'searchMailbox'
): string {
  if (mailbox.toUpperCase() === 'INBOX') {
    return inboxDiscoveryScript(accountVar, resultVar);
  }
  return `
    set ${resultVar} to ${mailboxReference(mailbox, accountVar)}
`;
}

/**
 * Looks a mailbox up and rethrows a readable error when it doesn't exist.
 * `label` prefixes the error ("Mailbox", "Source mailbox").
 */
export function requireMailboxScript(
  mailbox: string,
  resultVar: string,
  label: string = 'Mailbox',
  accountVar: string = 'targetAccount'
): string {
  return `
    try
      ${mailboxLookupScript(mailbox, accountVar, resultVar)}
    on error errMsg
      error ${asString(`${label} not found: ${mailbox}. `)} & errMsg
    end try
`;
}

/**
 * Sets `searchMailboxes` to a list: every mailbox of the account for "All",
 * otherwise the single named mailbox.
 */
export function mailboxSelectionScript(mailbox: string, accountVar: string = 'targetAccount'): string {
  if (mailbox === ALL_MAILBOXES) {
    return `
    set searchMailboxes to every mailbox of ${accountVar}
`;
  }
  return `
    ${requireMailboxScript(mailbox, 'searchMailbox', 'Mailbox', accountVar)}
    set searchMailboxes to {searchMailbox}
`;
}

// --- Message filters ---

export type ReadStatusFilter = 'all' | 'read' | 'unread';

export interface MessageFilter {
  subjectKeyword?: string;
  sender?: string;
  hasAttachments?: boolean;
  readStatus?: ReadStatusFilter;
  /** Variable holding a lower bound on `messageDate` (set by {@link dateVariableScript}). */
  dateFromVar?: string;
  /** Variable holding an upper bound on `messageDate`. */
  dateToVar?: string;
}

/**
 * AppleScript boolean expression over the loop variables `messageSubject`,
 * `messageSender`, `messageRead`, `messageDate` and `aMessage`.
 * An empty filter matches everything.
 */
export function filterConditionScript(filter: MessageFilter): string {
  const conditions: string[] = [];

  if (filter.subjectKeyword) {
    conditions.push(`messageSubject contains ${asString(filter.subjectKeyword)}`);
  }
  if (filter.sender) {
    conditions.push(`messageSender contains ${asString(filter.sender)}`);
  }
  if (filter.hasAttachments !== undefined) {
    conditions.push(
      filter.hasAttachments
        ? '(count of mail attachments of aMessage) > 0'
        : '(count of mail attachments of aMessage) = 0'
    );
  }
  if (filter.readStatus === 'read') {
    conditions.push('messageRead is true');
  } else if (filter.readStatus === 'unread') {
    conditions.push('messageRead is false');
  }
  if (filter.dateFromVar) {
    conditions.push(`messageDate >= ${filter.dateFromVar}`);
  }
  if (filter.dateToVar) {
    conditions.push(`messageDate <= ${filter.dateToVar}`);
  }

  return conditions.length > 0 ? conditions.join(' and ') : 'true';
}

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Sets `varName` to a date built from YYYY-MM-DD, at 00:00:00 or, with
 * `endOfDay`, 23:59:59. Day is reset to 1 before the month changes so a
 * short month never rolls over.
 */
export function dateVariableScript(varName: string, isoDate: string, endOfDay: boolean = false): string {
  const match = ISO_DATE.exec(isoDate);
  if (!match) {
    throw new RangeError(`Invalid date "${isoDate}", expected YYYY-MM-DD`);
  }
  const [, year, month, day] = match;
  return `
    set ${varName} to current date
    set day of ${varName} to 1
    set year of ${varName} to ${Number(year)}
    set month of ${varName} to ${Number(month)}
    set day of ${varName} to ${Number(day)}
    set time of ${varName} to ${endOfDay ? 86399 : 0}
`;
}

// --- Message output ---

/** Record-block lines for the current `aMessage`: marker + subject, From, Date. */
export function messageHeaderScript(outputVar: string = 'outputText'): string {
  return `
    if messageRead then
      set readIndicator to "✓"
    else
      set readIndicator to "✉"
    end if
    set ${outputVar} to ${outputVar} & readIndicator & " " & messageSubject & return
    set ${outputVar} to ${outputVar} & "   From: " & messageSender & return
    set ${outputVar} to ${outputVar} & "   Date: " & (messageDate as string) & return
`;
}

/**
 * Appends a one-line content preview of `aMessage` under `label`.
 * Line breaks become spaces; `maxLength` 0 keeps the whole body.
 */
export function contentPreviewScript(
  label: string,
  maxLength: number,
  outputVar: string = 'outputText',
  fallback: string | null = '[Not available]'
): string {
  const limit = asInteger(maxLength);
  const onError =
    fallback === null
      ? ''
      : `
    on error
      set ${outputVar} to ${outputVar} & "   ${label}: ${escapeAppleScriptString(fallback)}" & return`;
  return `
    try
      set msgContent to content of aMessage
      set AppleScript's text item delimiters to {return, linefeed}
      set contentParts to text items of msgContent
      set AppleScript's text item delimiters to " "
      set cleanText to contentParts as string
      set AppleScript's text item delimiters to ""
      if ${limit} > 0 and (length of cleanText) > ${limit} then
        set contentPreview to (text 1 thru ${limit} of cleanText) & "..."
      else
        set contentPreview to cleanText
      end if
      set ${outputVar} to ${outputVar} & "   ${label}: " & contentPreview & return${onError}
    end try
`;
}

export function totalsScript(label: string, countExpression: string, outputVar: string = 'outputText'): string {
  return `
    set ${outputVar} to ${outputVar} & "${TOTALS_LINE}" & return
    set ${outputVar} to ${outputVar} & "${label}" & ${countExpression} & return
    set ${outputVar} to ${outputVar} & "${TOTALS_LINE}" & return
`;
}

// --- Recipients ---

/** Splits "a@x.com, b@y.com" into trimmed, non-empty addresses. */
export function splitRecipients(addresses: string | undefined): string[] {
  if (!addresses) return [];
  return addresses
    .split(',')
    .map((address) => address.trim())
    .filter((address) => address.length > 0);
}

export type RecipientKind = 'to' | 'cc' | 'bcc';

/** One `make new … recipient` line per address, run inside `tell messageVar`. */
export function recipientsScript(kind: RecipientKind, addresses: string | undefined): string {
  return splitRecipients(addresses)
    .map(
      (address) =>
        `      make new ${kind} recipient at end of ${kind} recipients with properties {address:${asString(address)}}`
    )
    .join('\n');
}

// --- Threads ---

/** "Re: Fwd: Budget" → "Budget" */
export function stripThreadPrefixes(subject: string): string {
  let cleaned = subject;
  for (const prefix of THREAD_PREFIXES) {
    cleaned = cleaned.split(prefix).join('').trim();
  }
  return cleaned;
}

/** Wraps a body in `tell application "Mail"`. */
export function tellMail(body: string): string {
  return `tell application "Mail"
${body}
end tell`;
}
