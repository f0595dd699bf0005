// src/scripts/analytics.scripts.ts - Statistics and export scripts
import {
  SEPARATOR_LINE,
  asInteger,
  asString,
  requireMailboxScript,
  tellMail,
} from './appleScriptHelpers.js';

export type StatisticsScope = 'account_overview' | 'sender_stats' | 'mailbox_breakdown';

export type StatisticsOptions =
  | { scope: 'account_overview'; account: string; daysBack: number }
  | { scope: 'sender_stats'; account: string; sender: string; daysBack: number }
  | { scope: 'mailbox_breakdown'; account: string; mailbox: string };

/** Sets `targetDate`, and returns the extra condition for `messageDate`. */
function dateWindow(daysBack: number): { setup: string; condition: string } {
  if (daysBack <= 0) {
    return { setup: '', condition: '' };
  }
  return {
    setup: `set targetDate to (current date) - (${asInteger(daysBack)} * days)`,
    condition: ' and messageDate > targetDate',
  };
}

/** `round (part / whole * 100)`, 0 when the whole is 0. */
function percentScript(part: string, whole: string): string {
  return `(my percentOf(${part}, ${whole}))`;
}

const PERCENT_HANDLER = `on percentOf(part, whole)
  if whole = 0 then return 0
  return round ((part / whole) * 100)
end percentOf`;

function accountOverviewScript(account: string, daysBack: number): string {
  const window = dateWindow(daysBack);
  return `${PERCENT_HANDLER}

${tellMail(`
  set outputText to "╔══════════════════════════════════════════╗" & return
  set outputText to outputText & ${asString(`║      EMAIL STATISTICS - ${account}`)} & return
  set outputText to outputText & "╚══════════════════════════════════════════╝" & return & return
  ${window.setup}
  try
    set targetAccount to account ${asString(account)}
    set totalEmails to 0
    set totalUnread to 0
    set totalRead to 0
    set totalFlagged to 0
    set totalWithAttachments to 0
    set senderCounts to {}
    set mailboxCounts to {}

    repeat with aMailbox in every mailbox of targetAccount
      set mailboxName to name of aMailbox
      set mailboxTotal to 0
      repeat with aMessage in every message of aMailbox
        try
          set messageDate to date received of aMessage
          if true${window.condition} then
            set totalEmails to totalEmails + 1
            set mailboxTotal to mailboxTotal + 1
            if read status of aMessage then
              set totalRead to totalRead + 1
            else
              set totalUnread to totalUnread + 1
            end if
            try
              if flagged status of aMessage then set totalFlagged to totalFlagged + 1
            end try
            if (count of mail attachments of aMessage) > 0 then
              set totalWithAttachments to totalWithAttachments + 1
            end if
            set messageSender to sender of aMessage
            set senderFound to false
            repeat with senderPair in senderCounts
              if item 1 of senderPair is messageSender then
                set item 2 of senderPair to (item 2 of senderPair) + 1
                set senderFound to true
                exit repeat
              end if
            end repeat
            if not senderFound then set end of senderCounts to {messageSender, 1}
          end if
        end try
      end repeat
      if mailboxTotal > 0 then set end of mailboxCounts to {mailboxName, mailboxTotal}
    end repeat

    set outputText to outputText & "📊 VOLUME METRICS" & return
    set outputText to outputText & "${SEPARATOR_LINE}" & return
    set outputText to outputText & "Total Emails: " & totalEmails & return
    set outputText to outputText & "Unread: " & totalUnread & " (" & ${percentScript('totalUnread', 'totalEmails')} & "%)" & return
    set outputText to outputText & "Read: " & totalRead & " (" & ${percentScript('totalRead', 'totalEmails')} & "%)" & return
    set outputText to outputText & "Flagged: " & totalFlagged & return
    set outputText to outputText & "With Attachments: " & totalWithAttachments & " (" & ${percentScript('totalWithAttachments', 'totalEmails')} & "%)" & return & return

    set outputText to outputText & "👥 TOP SENDERS" & return
    set outputText to outputText & "${SEPARATOR_LINE}" & return
    set topCount to 0
    repeat with senderPair in senderCounts
      set topCount to topCount + 1
      if topCount > 5 then exit repeat
      set outputText to outputText & (item 1 of senderPair) & ": " & (item 2 of senderPair) & " emails" & return
    end repeat
    set outputText to outputText & return

    set outputText to outputText & "📁 MAILBOX DISTRIBUTION" & return
    set outputText to outputText & "${SEPARATOR_LINE}" & return
    set topCount to 0
    repeat with mailboxPair in mailboxCounts
      set topCount to topCount + 1
      if topCount > 5 then exit repeat
      set outputText to outputText & (item 1 of mailboxPair) & ": " & (item 2 of mailboxPair) & " (" & ${percentScript('item 2 of mailboxPair', 'totalEmails')} & "%)" & return
    end repeat
  on error errMsg
    return "Error: " & errMsg
  end try
  return outputText
`)}`;
}

function senderStatsScript(account: string, sender: string, daysBack: number): string {
  const window = dateWindow(daysBack);
  return tellMail(`
  set outputText to "SENDER STATISTICS" & return & return
  set outputText to outputText & ${asString(`Sender: ${sender}`)} & return
  set outputText to outputText & ${asString(`Account: ${account}`)} & return & return
  ${window.setup}
  try
    set targetAccount to account ${asString(account)}
    set totalFromSender to 0
    set unreadFromSender to 0
    set withAttachments to 0

    repeat with aMailbox in every mailbox of targetAccount
      repeat with aMessage in every message of aMailbox
        try
          set messageSender to sender of aMessage
          set messageDate to date received of aMessage
          if messageSender contains ${asString(sender)}${window.condition} then
            set totalFromSender to totalFromSender + 1
            if not (read status of aMessage) then set unreadFromSender to unreadFromSender + 1
            if (count of mail attachments of aMessage) > 0 then set withAttachments to withAttachments + 1
          end if
        end try
      end repeat
    end repeat

    set outputText to outputText & "Total emails: " & totalFromSender & return
    set outputText to outputText & "Unread: " & unreadFromSender & return
    set outputText to outputText & "With attachments: " & withAttachments & return
  on error errMsg
    return "Error: " & errMsg
  end try
  return outputText
`);
}

function mailboxBreakdownScript(account: string, mailbox: string): string {
  return tellMail(`
  set outputText to "MAILBOX STATISTICS" & return & return
  set outputText to outputText & ${asString(`Mailbox: ${mailbox}`)} & return
  set outputText to outputText & ${asString(`Account: ${account}`)} & return & return
  try
    set targetAccount to account ${asString(account)}
    ${requireMailboxScript(mailbox, 'targetMailbox')}
    set totalMessages to count of messages of targetMailbox
    set unreadMessages to unread count of targetMailbox
    set outputText to outputText & "Total messages: " & totalMessages & return
    set outputText to outputText & "Unread: " & unreadMessages & return
    set outputText to outputText & "Read: " & (totalMessages - unreadMessages) & return
  on error errMsg
    return "Error: " & errMsg
  end try
  return outputText
`);
}

export function buildStatisticsScript(options: StatisticsOptions): string {
  switch (options.scope) {
    case 'account_overview':
      return accountOverviewScript(options.account, options.daysBack);
    case 'sender_stats':
      return senderStatsScript(options.account, options.sender, options.daysBack);
    case 'mailbox_breakdown':
      return mailboxBreakdownScript(options.account, options.mailbox);
  }
}

export type ExportFormat = 'txt' | 'html';

export type ExportOptions =
  | {
      scope: 'single_email';
      account: string;
      subjectKeyword: string;
      mailbox: string;
      /** Absolute, validated directory. */
      saveDirectory: string;
      format: ExportFormat;
    }
  | {
      scope: 'entire_mailbox';
      account: string;
      mailbox: string;
      saveDirectory: string;
      format: ExportFormat;
    };

/** Sets `exportContent` from the message variables in the chosen format. */
function exportContentScript(format: ExportFormat): string {
  if (format === 'html') {
    return `
        set exportContent to "<html><body>"
        set exportContent to exportContent & "<h2>" & messageSubject & "</h2>"
        set exportContent to exportContent & "<p><strong>From:</strong> " & messageSender & "</p>"
        set exportContent to exportContent & "<p><strong>Date:</strong> " & (messageDate as string) & "</p>"
        set exportContent to exportContent & "<hr>" & messageContent
        set exportContent to exportContent & "</body></html>"
`;
  }
  return `
        set exportContent to "Subject: " & messageSubject & return
        set exportContent to exportContent & "From: " & messageSender & return
        set exportContent to exportContent & "Date: " & (messageDate as string) & return & return
        set exportContent to exportContent & messageContent
`;
}

const WRITE_FILE_HANDLER = `on writeExport(filePath, exportContent)
  set fileRef to open for access POSIX file filePath with write permission
  try
    set eof of fileRef to 0
    write exportContent to fileRef as «class utf8»
    close access fileRef
  on error errMsg
    close access fileRef
    error errMsg
  end try
end writeExport

on safeFileName(fileName)
  set AppleScript's text item delimiters to "/"
  set nameParts to text items of fileName
  set AppleScript's text item delimiters to "-"
  set cleaned to nameParts as string
  set AppleScript's text item delimiters to ""
  return cleaned
end safeFileName`;

function exportSingleScript(options: Extract<ExportOptions, { scope: 'single_email' }>): string {
  return `${WRITE_FILE_HANDLER}

${tellMail(`
  set outputText to "EXPORTING EMAIL" & return & return
  try
    set targetAccount to account ${asString(options.account)}
    ${requireMailboxScript(options.mailbox, 'targetMailbox')}
    set foundMessage to missing value
    repeat with aMessage in every message of targetMailbox
      try
        if (subject of aMessage) contains ${asString(options.subjectKeyword)} then
          set foundMessage to contents of aMessage
          exit repeat
        end if
      end try
    end repeat

    if foundMessage is not missing value then
      set messageSubject to subject of foundMessage
      set messageSender to sender of foundMessage
      set messageDate to date received of foundMessage
      set messageContent to content of foundMessage
      set filePath to ${asString(`${options.saveDirectory}/`)} & (my safeFileName(messageSubject)) & ${asString(`.${options.format}`)}
      ${exportContentScript(options.format)}
      my writeExport(filePath, exportContent)
      set outputText to outputText & "✓ Email exported successfully!" & return & return
      set outputText to outputText & "Subject: " & messageSubject & return
      set outputText to outputText & "Saved to: " & filePath & return
    else
      set outputText to outputText & ${asString(`⚠ No email found matching: ${options.subjectKeyword}`)} & return
    end if
  on error errMsg
    return "Error: " & errMsg
  end try
  return outputText
`)}`;
}

function exportMailboxScript(options: Extract<ExportOptions, { scope: 'entire_mailbox' }>): string {
  const exportDir = `${options.saveDirectory}/${options.mailbox.replace(/\//g, '-')}_export`;
  return `${WRITE_FILE_HANDLER}

${tellMail(`
  set outputText to "EXPORTING MAILBOX" & return & return
  try
    set targetAccount to account ${asString(options.account)}
    ${requireMailboxScript(options.mailbox, 'targetMailbox')}
    set mailboxMessages to every message of targetMailbox
    set messageCount to count of mailboxMessages
    set exportCount to 0
    set exportDir to ${asString(exportDir)}
    do shell script "mkdir -p " & quoted form of exportDir

    repeat with aMessage in mailboxMessages
      try
        set messageSubject to subject of aMessage
        set messageSender to sender of aMessage
        set messageDate to date received of aMessage
        set messageContent to content of aMessage
        set fileIndex to exportCount + 1
        set filePath to exportDir & "/" & (my safeFileName((fileIndex as string) & "_" & messageSubject)) & ${asString(`.${options.format}`)}
        ${exportContentScript(options.format)}
        my writeExport(filePath, exportContent)
        set exportCount to fileIndex
      on error
        -- skip messages that cannot be written
      end try
    end repeat

    set outputText to outputText & "✓ Mailbox exported successfully!" & return & return
    set outputText to outputText & ${asString(`Mailbox: ${options.mailbox}`)} & return
    set outputText to outputText & "Total emails: " & messageCount & return
    set outputText to outputText & "Exported: " & exportCount & return
    set outputText to outputText & "Location: " & exportDir & return
  on error errMsg
    return "Error: " & errMsg
  end try
  return outputText
`)}`;
}

export function buildExportScript(options: ExportOptions): string {
  switch (options.scope) {
    case 'single_email':
      return exportSingleScript(options);
    case 'entire_mailbox':
      return exportMailboxScript(options);
  }
}
