// src/scripts/attachments.scripts.ts - Attachment listing and saving scripts
import {
  asInteger,
  asString,
  filterConditionScript,
  inboxDiscoveryScript,
  tellMail,
  totalsScript,
} from './appleScriptHelpers.js';

export interface ListAttachmentsOptions {
  account: string;
  subjectKeyword: string;
  maxResults: number;
}

export function buildListAttachmentsScript(options: ListAttachmentsOptions): string {
  return tellMail(`
  set outputText to ${asString(`ATTACHMENTS FOR: ${options.subjectKeyword}`)} & return & return
  set resultCount to 0
  try
    set targetAccount to account ${asString(options.account)}
    ${inboxDiscoveryScript('targetAccount', 'inboxMailbox')}

    repeat with aMessage in every message of inboxMailbox
      if resultCount >= ${asInteger(options.maxResults)} then exit repeat
      try
        set messageSubject to subject of aMessage
        if ${filterConditionScript({ subjectKeyword: options.subjectKeyword })} then
          set outputText to outputText & "✉ " & messageSubject & return
          set outputText to outputText & "   From: " & (sender of aMessage) & return
          set outputText to outputText & "   Date: " & ((date received of aMessage) as string) & return & return

          set msgAttachments to mail attachments of aMessage
          set attachmentCount to count of msgAttachments
          if attachmentCount > 0 then
            set outputText to outputText & "   Attachments (" & attachmentCount & "):" & return
            repeat with anAttachment in msgAttachments
              set attachmentName to name of anAttachment
              try
                set sizeInKB to ((file size of anAttachment) / 1024) as integer
                set outputText to outputText & "   📎 " & attachmentName & " (" & sizeInKB & " KB)" & return
              on error
                set outputText to outputText & "   📎 " & attachmentName & return
              end try
            end repeat
          else
            set outputText to outputText & "   No attachments" & return
          end if
          set outputText to outputText & return
          set resultCount to resultCount + 1
        end if
      end try
    end repeat

    ${totalsScript('FOUND: ', 'resultCount & " matching email(s)"')}
  on error errMsg
    return "Error: " & errMsg
  end try
  return outputText
`);
}

export interface SaveAttachmentOptions {
  account: string;
  subjectKeyword: string;
  attachmentName: string;
  /** Absolute path, already validated. */
  savePath: string;
}

export function buildSaveAttachmentScript(options: SaveAttachmentOptions): string {
  return tellMail(`
  set outputText to ""
  try
    set targetAccount to account ${asString(options.account)}
    ${inboxDiscoveryScript('targetAccount', 'inboxMailbox')}
    set foundAttachment to false

    repeat with aMessage in every message of inboxMailbox
      try
        set messageSubject to subject of aMessage
        if ${filterConditionScript({ subjectKeyword: options.subjectKeyword })} then
          repeat with anAttachment in mail attachments of aMessage
            set attachmentFileName to name of anAttachment
            if attachmentFileName contains ${asString(options.attachmentName)} then
              save anAttachment in POSIX file ${asString(options.savePath)}
              set outputText to "✓ Attachment saved successfully!" & return & return
              set outputText to outputText & "Email: " & messageSubject & return
              set outputText to outputText & "Attachment: " & attachmentFileName & return
              set outputText to outputText & ${asString(`Saved to: ${options.savePath}`)} & return
              set foundAttachment to true
              exit repeat
            end if
          end repeat
          if foundAttachment then exit repeat
        end if
      end try
    end repeat

    if not foundAttachment then
      set outputText to "⚠ Attachment not found" & return
      set outputText to outputText & ${asString(`Email keyword: ${options.subjectKeyword}`)} & return
      set outputText to outputText & ${asString(`Attachment name: ${options.attachmentName}`)} & return
    end if
  on error errMsg
    return "Error: " & errMsg
  end try
  return outputText
`);
}
