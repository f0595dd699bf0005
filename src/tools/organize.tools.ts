// organize.tools.ts - Moving, flagging and deleting emails
import { z } from 'zod';
import { UserError } from 'fastmcp';
import { formatToolError } from '../errorHelpers.js';
import {
  type MailToolOptions,
  AccountParameter,
  ConfirmParameter,
  MailboxParameter,
  SubjectKeywordParameter,
} from '../types.js';
import { buildMoveEmailScript, buildTrashScript, buildUpdateStatusScript } from '../scripts/index.js';
import { runMailScript } from './toolHelpers.js';

export function registerOrganizeTools(options: MailToolOptions) {
  const { server, engine } = options;

  server.addTool({
    name: 'moveEmail',
    description:
      'Move emails whose subject contains a keyword to another mailbox. ' +
      'Nested mailboxes use "/" (e.g., "Projects/Client").',
    annotations: {
      title: 'Move Email',
      readOnlyHint: false,
      destructiveHint: false,
    },
    parameters: z.object({
      account: AccountParameter,
      subjectKeyword: SubjectKeywordParameter,
      toMailbox: z.string().min(1).describe('Destination mailbox'),
      fromMailbox: MailboxParameter,
      maxMoves: z
        .number()
        .int()
        .min(1)
        .optional()
        .default(1)
        .describe('Maximum emails to move (default: 1)'),
    }),
    async execute(args, { log }) {
      try {
        log.info(`Moving up to ${args.maxMoves} email(s) to ${args.toMailbox}`);
        return await runMailScript(
          engine,
          buildMoveEmailScript({
            account: args.account,
            subjectKeyword: args.subjectKeyword,
            toMailbox: args.toMailbox,
            fromMailbox: args.fromMailbox,
            maxMoves: args.maxMoves,
          })
        );
      } catch (error: unknown) {
        throw new Error(formatToolError('moveEmail', error));
      }
    },
  });

  server.addTool({
    name: 'updateEmailStatus',
    description: 'Mark emails as read or unread, or flag and unflag them. Matches by subject and/or sender.',
    annotations: {
      title: 'Update Email Status',
      readOnlyHint: false,
      destructiveHint: false,
      idempotentHint: true,
    },
    parameters: z.object({
      account: AccountParameter,
      action: z.enum(['mark_read', 'mark_unread', 'flag', 'unflag']).describe('Status change to apply'),
      subjectKeyword: z.string().min(1).optional().describe('Subject must contain this text'),
      sender: z.string().min(1).optional().describe('Sender must contain this text'),
      mailbox: MailboxParameter,
      maxUpdates: z
        .number()
        .int()
        .min(1)
        .optional()
        .default(10)
        .describe('Safety limit on emails updated (default: 10)'),
    }),
    async execute(args) {
      if (!args.subjectKeyword && !args.sender) {
        throw new UserError('Provide subjectKeyword or sender to select the emails to update.');
      }
      try {
        return await runMailScript(
          engine,
          buildUpdateStatusScript({
            account: args.account,
            action: args.action,
            subjectKeyword: args.subjectKeyword,
            sender: args.sender,
            mailbox: args.mailbox,
            maxUpdates: args.maxUpdates,
          })
        );
      } catch (error: unknown) {
        throw new Error(formatToolError('updateEmailStatus', error));
      }
    },
  });

  server.addTool({
    name: 'manageTrash',
    description:
      'Move emails to the trash, delete them permanently from the trash, or empty the trash. ' +
      'delete_permanent and empty_trash only preview unless confirm=true.',
    annotations: {
      title: 'Manage Trash',
      readOnlyHint: false,
      destructiveHint: true,
    },
    parameters: z.object({
      account: AccountParameter,
      action: z.enum(['move_to_trash', 'delete_permanent', 'empty_trash']).describe('Trash operation'),
      subjectKeyword: z.string().min(1).optional().describe('Subject must contain this text'),
      sender: z.string().min(1).optional().describe('Sender must contain this text'),
      mailbox: MailboxParameter,
      maxDeletes: z
        .number()
        .int()
        .min(1)
        .optional()
        .default(5)
        .describe('Safety limit on emails affected (default: 5)'),
      confirm: ConfirmParameter,
    }),
    async execute(args, { log }) {
      if (args.action !== 'empty_trash' && !args.subjectKeyword && !args.sender) {
        throw new UserError(`Action "${args.action}" requires subjectKeyword or sender.`);
      }
      try {
        if (args.confirm && args.action !== 'move_to_trash') {
          log.warn(`Running irreversible trash action ${args.action}`);
        }
        return await runMailScript(
          engine,
          buildTrashScript({
            account: args.account,
            action: args.action,
            subjectKeyword: args.subjectKeyword,
            sender: args.sender,
            mailbox: args.mailbox,
            maxDeletes: args.maxDeletes,
            confirm: args.confirm,
          })
        );
      } catch (error: unknown) {
        throw new Error(formatToolError('manageTrash', error));
      }
    },
  });
}
