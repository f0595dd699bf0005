// src/scripts/compose.scripts.ts - Compose, reply, forward and draft scripts
//
// Sending scripts take a `confirm` flag. Without it the message is built the
// same way but the send line is left out, so the output is a preview.
import {
  asString,
  filterConditionScript,
  inboxDiscoveryScript,
  recipientsScript,
  requireMailboxScript,
  splitRecipients,
  tellMail,
} from './appleScriptHelpers.js';

function sendLine(messageVar: string, confirm: boolean): string {
  return confirm ? `send ${messageVar}` : `-- preview only: ${messageVar} not sent`;
}

/** Finds the first message in `messagesExpression` whose subject contains the keyword. */
function findFirstMatchScript(messagesExpression: string, subjectKeyword: string, resultVar: string = 'foundMessage'): string {
  return `
    set ${resultVar} to missing value
    repeat with aMessage in ${messagesExpression}
      try
        set messageSubject to subject of aMessage
        if ${filterConditionScript({ subjectKeyword })} then
          set ${resultVar} to contents of aMessage
          exit repeat
        end if
      end try
    end repeat
`;
}

export interface ComposeEmailOptions {
  account: string;
  to: string;
  subject: string;
  body: string;
  cc?: string;
  bcc?: string;
  confirm: boolean;
}

export function buildComposeEmailScript(options: ComposeEmailOptions): string {
  const status = options.confirm
    ? '✓ Email sent successfully!'
    : '📋 PREVIEW - Email prepared but NOT sent (set confirm=true to send)';
  const summary = [
    `To: ${splitRecipients(options.to).join(', ')}`,
    ...(options.cc ? [`CC: ${splitRecipients(options.cc).join(', ')}`] : []),
    ...(options.bcc ? [`BCC: ${splitRecipients(options.bcc).join(', ')}`] : []),
    `Subject: ${options.subject}`,
    `Body: ${options.body}`,
  ]
    .map((line) => `    set outputText to outputText & ${asString(line)} & return`)
    .join('\n');

  return tellMail(`
  set outputText to "COMPOSING EMAIL" & return & return
  try
    set targetAccount to account ${asString(options.account)}
    set newMessage to make new outgoing message with properties {subject:${asString(options.subject)}, content:${asString(options.body)}, visible:false}
    set sender of newMessage to (item 1 of (email addresses of targetAccount))
    tell newMessage
${recipientsScript('to', options.to)}
${recipientsScript('cc', options.cc)}
${recipientsScript('bcc', options.bcc)}
    end tell
    ${sendLine('newMessage', options.confirm)}
    set outputText to outputText & ${asString(status)} & return & return
    set outputText to outputText & "From: " & (name of targetAccount) & return
${summary}
  on error errMsg
    return "Error: " & errMsg & return & "Please check that the account name and email addresses are correct."
  end try
  return outputText
`);
}

export interface ReplyOptions {
  account: string;
  subjectKeyword: string;
  body: string;
  replyToAll: boolean;
  confirm: boolean;
}

export function buildReplyScript(options: ReplyOptions): string {
  const replyCommand = options.replyToAll
    ? 'set replyMessage to reply foundMessage with opening window and reply to all'
    : 'set replyMessage to reply foundMessage with opening window';
  const status = options.confirm
    ? '✓ Reply sent successfully!'
    : '📋 PREVIEW - Reply prepared but NOT sent (set confirm=true to send)';

  return tellMail(`
  set outputText to "SENDING REPLY" & return & return
  try
    set targetAccount to account ${asString(options.account)}
    ${inboxDiscoveryScript('targetAccount', 'inboxMailbox')}
    ${findFirstMatchScript('every message of inboxMailbox', options.subjectKeyword)}

    if foundMessage is not missing value then
      set messageSubject to subject of foundMessage
      set messageSender to sender of foundMessage
      set messageDate to date received of foundMessage
      ${replyCommand}
      set content of replyMessage to ${asString(options.body)}
      ${sendLine('replyMessage', options.confirm)}
      set outputText to outputText & ${asString(status)} & return & return
      set outputText to outputText & "Original email:" & return
      set outputText to outputText & "  Subject: " & messageSubject & return
      set outputText to outputText & "  From: " & messageSender & return
      set outputText to outputText & "  Date: " & (messageDate as string) & return & return
      set outputText to outputText & "Reply body:" & return
      set outputText to outputText & "  " & ${asString(options.body)} & return
    else
      set outputText to outputText & ${asString(`⚠ No email found matching: ${options.subjectKeyword}`)} & return
    end if
  on error errMsg
    return "Error: " & errMsg & return & "Please check that the account name is correct and the email exists."
  end try
  return outputText
`);
}

export interface ForwardOptions {
  account: string;
  subjectKeyword: string;
  to: string;
  message?: string;
  mailbox: string;
  confirm: boolean;
}

export function buildForwardScript(options: ForwardOptions): string {
  const status = options.confirm
    ? '✓ Email forwarded successfully!'
    : '📋 PREVIEW - Forward prepared but NOT sent (set confirm=true to send)';
  const note = options.message
    ? `set content of forwardMessage to ${asString(options.message)} & return & return & (content of forwardMessage)`
    : '';

  return tellMail(`
  set outputText to "FORWARDING EMAIL" & return & return
  try
    set targetAccount to account ${asString(options.account)}
    ${requireMailboxScript(options.mailbox, 'targetMailbox')}
    ${findFirstMatchScript('every message of targetMailbox', options.subjectKeyword)}

    if foundMessage is not missing value then
      set messageSubject to subject of foundMessage
      set messageSender to sender of foundMessage
      set messageDate to date received of foundMessage
      set forwardMessage to forward foundMessage with opening window
      tell forwardMessage
${recipientsScript('to', options.to)}
      end tell
      ${note}
      ${sendLine('forwardMessage', options.confirm)}
      set outputText to outputText & ${asString(status)} & return & return
      set outputText to outputText & "Original email:" & return
      set outputText to outputText & "  Subject: " & messageSubject & return
      set outputText to outputText & "  From: " & messageSender & return
      set outputText to outputText & "  Date: " & (messageDate as string) & return & return
      set outputText to outputText & ${asString(`Forwarded to: ${splitRecipients(options.to).join(', ')}`)} & return
    else
      set outputText to outputText & ${asString(`⚠ No email found matching: ${options.subjectKeyword}`)} & return
    end if
  on error errMsg
    return "Error: " & errMsg
  end try
  return outputText
`);
}

export type DraftAction = 'list' | 'create' | 'send' | 'delete';

export type DraftOptions =
  | { action: 'list'; account: string }
  | {
      action: 'create';
      account: string;
      subject: string;
      to: string;
      body: string;
      cc?: string;
      bcc?: string;
    }
  | { action: 'send' | 'delete'; account: string; draftSubject: string; confirm: boolean };

function listDraftsScript(account: string): string {
  return tellMail(`
  set outputText to ${asString(`DRAFT EMAILS - ${account}`)} & return & return
  try
    set targetAccount to account ${asString(account)}
    set draftMessages to every message of mailbox "Drafts" of targetAccount
    set outputText to outputText & "Found " & (count of draftMessages) & " draft(s)" & return & return
    repeat with aDraft in draftMessages
      try
        set outputText to outputText & "✉ " & (subject of aDraft) & return
        set outputText to outputText & "   Created: " & ((date sent of aDraft) as string) & return & return
      end try
    end repeat
  on error errMsg
    return "Error: " & errMsg
  end try
  return outputText
`);
}

function createDraftScript(options: Extract<DraftOptions, { action: 'create' }>): string {
  return tellMail(`
  set outputText to "CREATING DRAFT" & return & return
  try
    set targetAccount to account ${asString(options.account)}
    set newDraft to make new outgoing message with properties {subject:${asString(options.subject)}, content:${asString(options.body)}, visible:false}
    set sender of newDraft to (item 1 of (email addresses of targetAccount))
    tell newDraft
${recipientsScript('to', options.to)}
${recipientsScript('cc', options.cc)}
${recipientsScript('bcc', options.bcc)}
    end tell
    save newDraft
    set outputText to outputText & "✓ Draft created successfully!" & return & return
    set outputText to outputText & ${asString(`Subject: ${options.subject}`)} & return
    set outputText to outputText & ${asString(`To: ${splitRecipients(options.to).join(', ')}`)} & return
  on error errMsg
    return "Error: " & errMsg
  end try
  return outputText
`);
}

function sendOrDeleteDraftScript(options: Extract<DraftOptions, { action: 'send' | 'delete' }>): string {
  const verb = options.action === 'send' ? 'sent' : 'deleted';
  const header = options.confirm
    ? options.action === 'send'
      ? 'SENDING DRAFT'
      : 'DELETING DRAFT'
    : `PREVIEW - ${options.action.toUpperCase()} DRAFT`;
  const status = options.confirm
    ? `✓ Draft ${verb} successfully!`
    : `📋 PREVIEW - Draft found but NOT ${verb} (set confirm=true to ${options.action})`;
  const command = options.confirm
    ? `${options.action} foundDraft`
    : `-- preview only: draft not ${verb}`;

  return tellMail(`
  set outputText to ${asString(header)} & return & return
  try
    set targetAccount to account ${asString(options.account)}
    ${findFirstMatchScript('every message of mailbox "Drafts" of targetAccount', options.draftSubject, 'foundDraft')}

    if foundDraft is not missing value then
      set draftSubject to subject of foundDraft
      ${command}
      set outputText to outputText & ${asString(status)} & return
      set outputText to outputText & "Subject: " & draftSubject & return
    else
      set outputText to outputText & ${asString(`⚠ No draft found matching: ${options.draftSubject}`)} & return
    end if
  on error errMsg
    return "Error: " & errMsg
  end try
  return outputText
`);
}

export function buildDraftScript(options: DraftOptions): string {
  switch (options.action) {
    case 'list':
      return listDraftsScript(options.account);
    case 'create':
      return createDraftScript(options);
    case 'send':
    case 'delete':
      return sendOrDeleteDraftScript(options);
  }
}
