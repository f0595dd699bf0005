// src/scripts/organize.scripts.ts - Move, status and trash scripts
import {
  asInteger,
  asString,
  filterConditionScript,
  mailboxReference,
  requireMailboxScript,
  tellMail,
  totalsScript,
} from './appleScriptHelpers.js';

export interface MoveEmailOptions {
  account: string;
  subjectKeyword: string;
  /** Nested mailboxes use "/" ("Projects/Client"). */
  toMailbox: string;
  fromMailbox: string;
  maxMoves: number;
}

export function buildMoveEmailScript(options: MoveEmailOptions): string {
  const route = `${options.fromMailbox} → ${options.toMailbox}`;
  return tellMail(`
  set outputText to "MOVING EMAILS" & return & return
  set movedCount to 0
  try
    set targetAccount to account ${asString(options.account)}
    ${requireMailboxScript(options.fromMailbox, 'sourceMailbox', 'Source mailbox')}
    set destMailbox to ${mailboxReference(options.toMailbox)}
    set sourceMessages to every message of sourceMailbox

    repeat with aMessage in sourceMessages
      if movedCount >= ${asInteger(options.maxMoves)} then exit repeat
      try
        set messageSubject to subject of aMessage
        if ${filterConditionScript({ subjectKeyword: options.subjectKeyword })} then
          set messageSender to sender of aMessage
          set messageDate to date received of aMessage
          move aMessage to destMailbox
          set outputText to outputText & "✓ Moved: " & messageSubject & return
          set outputText to outputText & "  From: " & messageSender & return
          set outputText to outputText & "  Date: " & (messageDate as string) & return
          set outputText to outputText & "  " & ${asString(route)} & return & return
          set movedCount to movedCount + 1
        end if
      end try
    end repeat

    ${totalsScript('TOTAL MOVED: ', 'movedCount & " email(s)"')}
  on error errMsg
    return "Error: " & errMsg & return & "Please check that account and mailbox names are correct. For nested mailboxes, use '/' separator (e.g., 'Projects/Client')."
  end try
  return outputText
`);
}

export type StatusAction = 'mark_read' | 'mark_unread' | 'flag' | 'unflag';

const STATUS_ACTIONS: Record<StatusAction, { command: string; label: string }> = {
  mark_read: { command: 'set read status of aMessage to true', label: 'Marked as read' },
  mark_unread: { command: 'set read status of aMessage to false', label: 'Marked as unread' },
  flag: { command: 'set flagged status of aMessage to true', label: 'Flagged' },
  unflag: { command: 'set flagged status of aMessage to false', label: 'Unflagged' },
};

export interface UpdateStatusOptions {
  account: string;
  action: StatusAction;
  subjectKeyword?: string;
  sender?: string;
  mailbox: string;
  maxUpdates: number;
}

export function buildUpdateStatusScript(options: UpdateStatusOptions): string {
  const { command, label } = STATUS_ACTIONS[options.action];
  const condition = filterConditionScript({
    subjectKeyword: options.subjectKeyword,
    sender: options.sender,
  });
  return tellMail(`
  set outputText to ${asString(`UPDATING EMAIL STATUS: ${label}`)} & return & return
  set updateCount to 0
  try
    set targetAccount to account ${asString(options.account)}
    ${requireMailboxScript(options.mailbox, 'targetMailbox')}

    repeat with aMessage in every message of targetMailbox
      if updateCount >= ${asInteger(options.maxUpdates)} then exit repeat
      try
        set messageSubject to subject of aMessage
        set messageSender to sender of aMessage
        set messageDate to date received of aMessage
        if ${condition} then
          ${command}
          set outputText to outputText & ${asString(`✓ ${label}: `)} & messageSubject & return
          set outputText to outputText & "   From: " & messageSender & return
          set outputText to outputText & "   Date: " & (messageDate as string) & return & return
          set updateCount to updateCount + 1
        end if
      end try
    end repeat

    ${totalsScript('TOTAL UPDATED: ', 'updateCount & " email(s)"')}
  on error errMsg
    return "Error: " & errMsg
  end try
  return outputText
`);
}

export type TrashAction = 'move_to_trash' | 'delete_permanent' | 'empty_trash';

export interface TrashOptions {
  account: string;
  action: TrashAction;
  subjectKeyword?: string;
  sender?: string;
  mailbox: string;
  maxDeletes: number;
  /** Without it, delete_permanent and empty_trash only preview. */
  confirm: boolean;
}

function emptyTrashScript(options: TrashOptions): string {
  const status = options.confirm
    ? `✓ Emptied trash for account: ${options.account}`
    : `📋 PREVIEW - Would empty trash for account: ${options.account} (set confirm=true to execute)`;
  const deletion = options.confirm
    ? `
    repeat with aMessage in trashMessages
      delete aMessage
    end repeat`
    : '-- preview only: nothing deleted';
  return tellMail(`
  set outputText to "EMPTYING TRASH" & return & return
  try
    set targetAccount to account ${asString(options.account)}
    set trashMessages to every message of mailbox "Trash" of targetAccount
    set messageCount to count of trashMessages
    ${deletion}
    set outputText to outputText & ${asString(status)} & return
    set outputText to outputText & "   Messages in trash: " & messageCount & return
  on error errMsg
    return "Error: " & errMsg
  end try
  return outputText
`);
}

function deletePermanentScript(options: TrashOptions): string {
  const header = options.confirm
    ? 'PERMANENTLY DELETING EMAILS'
    : 'PREVIEW - PERMANENT DELETION (set confirm=true to execute)';
  const status = options.confirm ? '✓ Permanently deleted' : '📋 Would permanently delete';
  const condition = filterConditionScript({
    subjectKeyword: options.subjectKeyword,
    sender: options.sender,
  });
  return tellMail(`
  set outputText to ${asString(header)} & return & return
  set deleteCount to 0
  try
    set targetAccount to account ${asString(options.account)}
    set trashMessages to every message of mailbox "Trash" of targetAccount
    repeat with aMessage in trashMessages
      if deleteCount >= ${asInteger(options.maxDeletes)} then exit repeat
      try
        set messageSubject to subject of aMessage
        set messageSender to sender of aMessage
        if ${condition} then
          set outputText to outputText & ${asString(`${status}: `)} & messageSubject & return
          set outputText to outputText & "   From: " & messageSender & return & return
          ${options.confirm ? 'delete aMessage' : '-- preview only: not deleted'}
          set deleteCount to deleteCount + 1
        end if
      end try
    end repeat

    ${totalsScript('TOTAL: ', 'deleteCount & " email(s)"')}
  on error errMsg
    return "Error: " & errMsg
  end try
  return outputText
`);
}

function moveToTrashScript(options: TrashOptions): string {
  const condition = filterConditionScript({
    subjectKeyword: options.subjectKeyword,
    sender: options.sender,
  });
  return tellMail(`
  set outputText to "MOVING EMAILS TO TRASH" & return & return
  set deleteCount to 0
  try
    set targetAccount to account ${asString(options.account)}
    ${requireMailboxScript(options.mailbox, 'sourceMailbox')}
    set trashMailbox to mailbox "Trash" of targetAccount
    set sourceMessages to every message of sourceMailbox

    repeat with aMessage in sourceMessages
      if deleteCount >= ${asInteger(options.maxDeletes)} then exit repeat
      try
        set messageSubject to subject of aMessage
        set messageSender to sender of aMessage
        set messageDate to date received of aMessage
        if ${condition} then
          move aMessage to trashMailbox
          set outputText to outputText & "✓ Moved to trash: " & messageSubject & return
          set outputText to outputText & "   From: " & messageSender & return
          set outputText to outputText & "   Date: " & (messageDate as string) & return & return
          set deleteCount to deleteCount + 1
        end if
      end try
    end repeat

    ${totalsScript('TOTAL MOVED TO TRASH: ', 'deleteCount & " email(s)"')}
  on error errMsg
    return "Error: " & errMsg
  end try
  return outputText
`);
}

export function buildTrashScript(options: TrashOptions): string {
  switch (options.action) {
    case 'empty_trash':
      return emptyTrashScript(options);
    case 'delete_permanent':
      return deletePermanentScript(options);
    case 'move_to_trash':
      return moveToTrashScript(options);
  }
}
