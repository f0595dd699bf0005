// src/scripts/inbox.scripts.ts - Inbox, account and mailbox listing scripts
import {
  SEPARATOR_LINE,
  asBoolean,
  asInteger,
  asString,
  contentPreviewScript,
  inboxDiscoveryScript,
  messageHeaderScript,
  tellMail,
  totalsScript,
} from './appleScriptHelpers.js';

/** `every account`, or a one-item list when an account name is given. */
function accountsSelection(account: string | undefined): string {
  return account ? `{account ${asString(account)}}` : 'every account';
}

export interface ListInboxOptions {
  account?: string;
  /** Per-account limit; 0 lists everything. */
  maxEmails: number;
  includeRead: boolean;
}

export function buildListInboxScript(options: ListInboxOptions): string {
  const title = options.account ? `INBOX EMAILS - ${options.account}` : 'INBOX EMAILS - ALL ACCOUNTS';
  return tellMail(`
  set outputText to ${asString(title)} & return & return
  set totalCount to 0
  set allAccounts to ${accountsSelection(options.account)}

  repeat with anAccount in allAccounts
    set accountName to name of anAccount
    try
      ${inboxDiscoveryScript('anAccount', 'inboxMailbox')}
      set inboxMessages to every message of inboxMailbox
      set messageCount to count of inboxMessages

      if messageCount > 0 then
        set outputText to outputText & "${SEPARATOR_LINE}" & return
        set outputText to outputText & "📧 ACCOUNT: " & accountName & " (" & messageCount & " messages)" & return
        set outputText to outputText & "${SEPARATOR_LINE}" & return & return

        set currentIndex to 0
        repeat with aMessage in inboxMessages
          set currentIndex to currentIndex + 1
          if ${asInteger(options.maxEmails)} > 0 and currentIndex > ${asInteger(options.maxEmails)} then exit repeat

          try
            set messageSubject to subject of aMessage
            set messageSender to sender of aMessage
            set messageDate to date received of aMessage
            set messageRead to read status of aMessage

            if ${asBoolean(options.includeRead)} or not messageRead then
              ${messageHeaderScript()}
              set outputText to outputText & return
              set totalCount to totalCount + 1
            end if
          end try
        end repeat
      end if
    on error errMsg
      set outputText to outputText & "⚠ Error accessing inbox for account " & accountName & return
      set outputText to outputText & "   " & errMsg & return & return
    end try
  end repeat

  ${totalsScript('TOTAL EMAILS: ', 'totalCount')}
  return outputText
`);
}

/** Prints `Account:count|Other:ERROR`. */
export function buildUnreadCountScript(): string {
  return tellMail(`
  set resultList to {}
  repeat with anAccount in every account
    set accountName to name of anAccount
    try
      ${inboxDiscoveryScript('anAccount', 'inboxMailbox')}
      set end of resultList to accountName & ":" & (unread count of inboxMailbox)
    on error
      set end of resultList to accountName & ":ERROR"
    end try
  end repeat
  set AppleScript's text item delimiters to "|"
  set joined to resultList as string
  set AppleScript's text item delimiters to ""
  return joined
`);
}

/** Prints account names joined by `|`. */
export function buildListAccountsScript(): string {
  return tellMail(`
  set accountNames to {}
  repeat with anAccount in every account
    set end of accountNames to name of anAccount
  end repeat
  set AppleScript's text item delimiters to "|"
  set joined to accountNames as string
  set AppleScript's text item delimiters to ""
  return joined
`);
}

export interface RecentEmailsOptions {
  account: string;
  count: number;
  includeContent: boolean;
}

export function buildRecentEmailsScript(options: RecentEmailsOptions): string {
  const preview = options.includeContent ? contentPreviewScript('Preview', 200) : '';
  return tellMail(`
  set outputText to ${asString(`RECENT EMAILS - ${options.account}`)} & return & return
  try
    set targetAccount to account ${asString(options.account)}
    ${inboxDiscoveryScript('targetAccount', 'inboxMailbox')}
    set inboxMessages to every message of inboxMailbox
    set shownCount to 0

    repeat with aMessage in inboxMessages
      if shownCount >= ${asInteger(options.count)} then exit repeat
      try
        set messageSubject to subject of aMessage
        set messageSender to sender of aMessage
        set messageDate to date received of aMessage
        set messageRead to read status of aMessage
        ${messageHeaderScript()}
        ${preview}
        set outputText to outputText & return
        set shownCount to shownCount + 1
      end try
    end repeat

    ${totalsScript('Showing ', 'shownCount & " email(s)"')}
  on error errMsg
    return "Error: " & errMsg
  end try
  return outputText
`);
}

export interface ListMailboxesOptions {
  account?: string;
  includeCounts: boolean;
}

function mailboxCountsScript(mailboxVar: string): string {
  return `
          try
            set msgCount to count of messages of ${mailboxVar}
            set unreadCount to unread count of ${mailboxVar}
            set outputText to outputText & " (" & msgCount & " total, " & unreadCount & " unread)"
          on error
            set outputText to outputText & " (count unavailable)"
          end try
`;
}

export function buildListMailboxesScript(options: ListMailboxesOptions): string {
  const counts = (mailboxVar: string) => (options.includeCounts ? mailboxCountsScript(mailboxVar) : '');
  return tellMail(`
  set outputText to "MAILBOXES" & return & return
  repeat with anAccount in ${accountsSelection(options.account)}
    set accountName to name of anAccount
    set outputText to outputText & "${SEPARATOR_LINE}" & return
    set outputText to outputText & "📁 ACCOUNT: " & accountName & return
    set outputText to outputText & "${SEPARATOR_LINE}" & return & return
    try
      repeat with aMailbox in every mailbox of anAccount
        set mailboxName to name of aMailbox
        set outputText to outputText & "  📂 " & mailboxName
        ${counts('aMailbox')}
        set outputText to outputText & return
        try
          repeat with subBox in every mailbox of aMailbox
            set subName to name of subBox
            set outputText to outputText & "    └─ " & subName & " [Path: " & mailboxName & "/" & subName & "]"
            ${counts('subBox')}
            set outputText to outputText & return
          end repeat
        end try
      end repeat
      set outputText to outputText & return
    on error errMsg
      set outputText to outputText & "  ⚠ Error accessing mailboxes: " & errMsg & return & return
    end try
  end repeat
  return outputText
`);
}

const OVERVIEW_RECENT_LIMIT = 10;

export function buildInboxOverviewScript(): string {
  return tellMail(`
  set outputText to "╔══════════════════════════════════════════╗" & return
  set outputText to outputText & "║      EMAIL INBOX OVERVIEW                ║" & return
  set outputText to outputText & "╚══════════════════════════════════════════╝" & return & return

  -- Unread counts by account
  set outputText to outputText & "📊 UNREAD EMAILS BY ACCOUNT" & return
  set outputText to outputText & "${SEPARATOR_LINE}" & return
  set allAccounts to every account
  set totalUnread to 0
  repeat with anAccount in allAccounts
    set accountName to name of anAccount
    try
      ${inboxDiscoveryScript('anAccount', 'inboxMailbox')}
      set unreadCount to unread count of inboxMailbox
      set totalMessages to count of messages of inboxMailbox
      set totalUnread to totalUnread + unreadCount
      if unreadCount > 0 then
        set outputText to outputText & "  ⚠️  " & accountName & ": " & unreadCount & " unread"
      else
        set outputText to outputText & "  ✅ " & accountName & ": " & unreadCount & " unread"
      end if
      set outputText to outputText & " (" & totalMessages & " total)" & return
    on error
      set outputText to outputText & "  ❌ " & accountName & ": Error accessing inbox" & return
    end try
  end repeat
  set outputText to outputText & return & "📈 TOTAL UNREAD: " & totalUnread & " across all accounts" & return & return

  -- Mailbox structure
  set outputText to outputText & "📁 MAILBOX STRUCTURE" & return
  set outputText to outputText & "${SEPARATOR_LINE}" & return
  repeat with anAccount in allAccounts
    set accountName to name of anAccount
    set outputText to outputText & return & "Account: " & accountName & return
    try
      repeat with aMailbox in every mailbox of anAccount
        set mailboxName to name of aMailbox
        try
          set unreadCount to unread count of aMailbox
          if unreadCount > 0 then
            set outputText to outputText & "  📂 " & mailboxName & " (" & unreadCount & " unread)" & return
          else
            set outputText to outputText & "  📂 " & mailboxName & return
          end if
          try
            repeat with subBox in every mailbox of aMailbox
              set subUnread to unread count of subBox
              if subUnread > 0 then
                set outputText to outputText & "     └─ " & (name of subBox) & " (" & subUnread & " unread)" & return
              end if
            end repeat
          end try
        on error
          set outputText to outputText & "  📂 " & mailboxName & return
        end try
      end repeat
    on error
      set outputText to outputText & "  ⚠️  Error accessing mailboxes" & return
    end try
  end repeat
  set outputText to outputText & return & return

  -- Recent emails preview
  set outputText to outputText & "📬 RECENT EMAILS PREVIEW (${OVERVIEW_RECENT_LIMIT} Most Recent)" & return
  set outputText to outputText & "${SEPARATOR_LINE}" & return
  set displayCount to 0
  repeat with anAccount in allAccounts
    set accountName to name of anAccount
    try
      ${inboxDiscoveryScript('anAccount', 'inboxMailbox')}
      repeat with aMessage in every message of inboxMailbox
        if displayCount >= ${OVERVIEW_RECENT_LIMIT} then exit repeat
        try
          set messageSubject to subject of aMessage
          set messageSender to sender of aMessage
          set messageDate to date received of aMessage
          set messageRead to read status of aMessage
          set outputText to outputText & return
          ${messageHeaderScript()}
          set outputText to outputText & "   Account: " & accountName & return
          set displayCount to displayCount + 1
        end try
      end repeat
    end try
    if displayCount >= ${OVERVIEW_RECENT_LIMIT} then exit repeat
  end repeat
  if displayCount = 0 then
    set outputText to outputText & return & "No recent emails found." & return
  end if
  set outputText to outputText & return & return

  -- Suggestions for the assistant
  set outputText to outputText & "💡 SUGGESTED ACTIONS FOR ASSISTANT" & return
  set outputText to outputText & "${SEPARATOR_LINE}" & return
  set outputText to outputText & "Based on this overview, consider suggesting:" & return & return
  if totalUnread > 0 then
    set outputText to outputText & "1. 📧 Review unread emails - Use getRecentEmails to show recent unread messages" & return
    set outputText to outputText & "2. 🔍 Search for action items - Look for keywords like 'urgent', 'action required', 'deadline'" & return
    set outputText to outputText & "3. 📤 Move processed emails - Suggest moving read emails to appropriate folders" & return
  else
    set outputText to outputText & "1. ✅ Inbox is clear! No unread emails." & return
  end if
  set outputText to outputText & "4. 📋 Organize by topic - Suggest moving emails to project-specific folders" & return
  set outputText to outputText & "5. ✉️  Draft replies - Identify emails that need responses" & return
  set outputText to outputText & "6. 🗂️  Archive old emails - Move older read emails to archive folders" & return
  set outputText to outputText & "7. 🔔 Highlight priority items - Identify emails from important senders or with urgent keywords" & return
  return outputText
`);
}
