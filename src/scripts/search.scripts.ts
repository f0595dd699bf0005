// src/scripts/search.scripts.ts - Keyword search, filtered search and thread scripts
import {
  ALL_MAILBOXES,
  SEPARATOR_LINE,
  type ReadStatusFilter,
  asInteger,
  asString,
  contentPreviewScript,
  dateVariableScript,
  filterConditionScript,
  mailboxSelectionScript,
  messageHeaderScript,
  stripThreadPrefixes,
  tellMail,
  totalsScript,
} from './appleScriptHelpers.js';

function searchLocation(mailbox: string): string {
  return mailbox === ALL_MAILBOXES ? 'all mailboxes' : mailbox;
}

export interface EmailWithContentOptions {
  account: string;
  subjectKeyword: string;
  maxResults: number;
  /** 0 keeps the whole body. */
  maxContentLength: number;
  mailbox: string;
}

/** Case-insensitive subject search that prints a content preview per match. */
export function buildEmailWithContentScript(options: EmailWithContentOptions): string {
  const keyword = asString(options.subjectKeyword.toLowerCase());
  return `on lowercase(str)
  return do shell script "printf '%s' " & quoted form of str & " | tr '[:upper:]' '[:lower:]'"
end lowercase

${tellMail(`
  set outputText to ${asString(`SEARCH RESULTS FOR: ${options.subjectKeyword}`)} & return
  set outputText to outputText & ${asString(`Searching in: ${searchLocation(options.mailbox)}`)} & return & return
  set resultCount to 0
  set lowerKeyword to ${keyword}

  try
    set targetAccount to account ${asString(options.account)}
    ${mailboxSelectionScript(options.mailbox)}

    repeat with currentMailbox in searchMailboxes
      set mailboxName to name of currentMailbox
      repeat with aMessage in every message of currentMailbox
        if resultCount >= ${asInteger(options.maxResults)} then exit repeat
        try
          set messageSubject to subject of aMessage
          if (my lowercase(messageSubject)) contains lowerKeyword then
            set messageSender to sender of aMessage
            set messageDate to date received of aMessage
            set messageRead to read status of aMessage
            ${messageHeaderScript()}
            set outputText to outputText & "   Mailbox: " & mailboxName & return
            ${contentPreviewScript('Content', options.maxContentLength)}
            set outputText to outputText & return
            set resultCount to resultCount + 1
          end if
        end try
      end repeat
      if resultCount >= ${asInteger(options.maxResults)} then exit repeat
    end repeat

    ${totalsScript('FOUND: ', 'resultCount & " matching email(s)"')}
  on error errMsg
    return "Error: " & errMsg
  end try
  return outputText
`)}`;
}

export interface SearchEmailsOptions {
  account: string;
  mailbox: string;
  subjectKeyword?: string;
  sender?: string;
  hasAttachments?: boolean;
  readStatus: ReadStatusFilter;
  /** YYYY-MM-DD, inclusive. */
  dateFrom?: string;
  /** YYYY-MM-DD, inclusive. */
  dateTo?: string;
  includeContent: boolean;
  maxResults: number;
}

export function buildSearchEmailsScript(options: SearchEmailsOptions): string {
  const dateSetup = [
    options.dateFrom ? dateVariableScript('dateFrom', options.dateFrom) : '',
    options.dateTo ? dateVariableScript('dateTo', options.dateTo, true) : '',
  ].join('');
  const condition = filterConditionScript({
    subjectKeyword: options.subjectKeyword,
    sender: options.sender,
    hasAttachments: options.hasAttachments,
    readStatus: options.readStatus,
    dateFromVar: options.dateFrom ? 'dateFrom' : undefined,
    dateToVar: options.dateTo ? 'dateTo' : undefined,
  });
  const preview = options.includeContent ? contentPreviewScript('Content', 300) : '';

  return tellMail(`
  set outputText to "SEARCH RESULTS" & return & return
  set outputText to outputText & ${asString(`Searching in: ${options.mailbox}`)} & return
  set outputText to outputText & ${asString(`Account: ${options.account}`)} & return & return
  set resultCount to 0
  ${dateSetup}
  try
    set targetAccount to account ${asString(options.account)}
    ${mailboxSelectionScript(options.mailbox)}

    repeat with currentMailbox in searchMailboxes
      set mailboxName to name of currentMailbox
      repeat with aMessage in every message of currentMailbox
        if resultCount >= ${asInteger(options.maxResults)} then exit repeat
        try
          set messageSubject to subject of aMessage
          set messageSender to sender of aMessage
          set messageDate to date received of aMessage
          set messageRead to read status of aMessage
          if ${condition} then
            ${messageHeaderScript()}
            set outputText to outputText & "   Mailbox: " & mailboxName & return
            ${preview}
            set outputText to outputText & return
            set resultCount to resultCount + 1
          end if
        end try
      end repeat
      if resultCount >= ${asInteger(options.maxResults)} then exit repeat
    end repeat

    ${totalsScript('FOUND: ', 'resultCount & " matching email(s)"')}
  on error errMsg
    return "Error: " & errMsg
  end try
  return outputText
`);
}

export interface EmailThreadOptions {
  account: string;
  subjectKeyword: string;
  mailbox: string;
  maxMessages: number;
}

export function buildEmailThreadScript(options: EmailThreadOptions): string {
  const topic = stripThreadPrefixes(options.subjectKeyword);
  return tellMail(`
  set outputText to "EMAIL THREAD VIEW" & return & return
  set outputText to outputText & ${asString(`Thread topic: ${topic}`)} & return
  set outputText to outputText & ${asString(`Account: ${options.account}`)} & return & return
  set threadMessages to {}
  set threadTopic to ${asString(topic)}

  try
    set targetAccount to account ${asString(options.account)}
    ${mailboxSelectionScript(options.mailbox)}

    repeat with currentMailbox in searchMailboxes
      repeat with aMessage in every message of currentMailbox
        if (count of threadMessages) >= ${asInteger(options.maxMessages)} then exit repeat
        try
          set messageSubject to subject of aMessage
          set cleanSubject to messageSubject
          if cleanSubject starts with "Re: " then
            set cleanSubject to text 5 thru -1 of cleanSubject
          end if
          if cleanSubject starts with "Fwd: " then
            set cleanSubject to text 6 thru -1 of cleanSubject
          else if cleanSubject starts with "FW: " then
            set cleanSubject to text 5 thru -1 of cleanSubject
          end if
          if cleanSubject contains threadTopic or messageSubject contains threadTopic then
            set end of threadMessages to aMessage
          end if
        end try
      end repeat
    end repeat

    set outputText to outputText & "${SEPARATOR_LINE}" & return
    set outputText to outputText & "FOUND " & (count of threadMessages) & " MESSAGE(S) IN THREAD" & return
    set outputText to outputText & "${SEPARATOR_LINE}" & return & return

    repeat with aMessage in threadMessages
      try
        set messageSubject to subject of aMessage
        set messageSender to sender of aMessage
        set messageDate to date received of aMessage
        set messageRead to read status of aMessage
        ${messageHeaderScript()}
        ${contentPreviewScript('Preview', 150, 'outputText', null)}
        set outputText to outputText & return
      end try
    end repeat
  on error errMsg
    return "Error: " & errMsg
  end try
  return outputText
`);
}
