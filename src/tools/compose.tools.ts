// compose.tools.ts - Composing, replying, forwarding and drafts
import { z } from 'zod';
import { formatToolError } from '../errorHelpers.js';
import {
  type MailToolOptions,
  AccountParameter,
  ConfirmParameter,
  MailboxParameter,
  RecipientsParameter,
  SubjectKeywordParameter,
} from '../types.js';
import {
  buildComposeEmailScript,
  buildDraftScript,
  buildForwardScript,
  buildReplyScript,
  type DraftOptions,
} from '../scripts/index.js';
import { requireParameters, runMailScript } from './toolHelpers.js';

const OptionalRecipients = z.string().min(1).optional();

export function registerComposeTools(options: MailToolOptions) {
  const { server, engine } = options;

  server.addTool({
    name: 'composeEmail',
    description:
      'Compose a new email from an account. Without confirm=true the message is only previewed, not sent.',
    annotations: {
      title: 'Compose Email',
      readOnlyHint: false,
      destructiveHint: false,
      openWorldHint: true,
    },
    parameters: z.object({
      account: AccountParameter,
      to: RecipientsParameter,
      subject: z.string().min(1).describe('Email subject'),
      body: z.string().describe('Email body (plain text)'),
      cc: OptionalRecipients.describe('CC recipients, comma-separated'),
      bcc: OptionalRecipients.describe('BCC recipients, comma-separated'),
      confirm: ConfirmParameter,
    }),
    async execute(args, { log }) {
      try {
        const output = await runMailScript(
          engine,
          buildComposeEmailScript({
            account: args.account,
            to: args.to,
            subject: args.subject,
            body: args.body,
            cc: args.cc,
            bcc: args.bcc,
            confirm: args.confirm,
          })
        );
        if (args.confirm) {
          log.info(`Sent email "${args.subject}"`);
        }
        return output;
      } catch (error: unknown) {
        throw new Error(formatToolError('composeEmail', error));
      }
    },
  });

  server.addTool({
    name: 'replyToEmail',
    description:
      'Reply to the first inbox email whose subject contains a keyword. ' +
      'Without confirm=true the reply is only previewed, not sent.',
    annotations: {
      title: 'Reply To Email',
      readOnlyHint: false,
      destructiveHint: false,
      openWorldHint: true,
    },
    parameters: z.object({
      account: AccountParameter,
      subjectKeyword: SubjectKeywordParameter,
      replyBody: z.string().min(1).describe('Reply text'),
      replyToAll: z.boolean().optional().default(false).describe('Reply to all recipients (default: false)'),
      confirm: ConfirmParameter,
    }),
    async execute(args) {
      try {
        return await runMailScript(
          engine,
          buildReplyScript({
            account: args.account,
            subjectKeyword: args.subjectKeyword,
            body: args.replyBody,
            replyToAll: args.replyToAll,
            confirm: args.confirm,
          })
        );
      } catch (error: unknown) {
        throw new Error(formatToolError('replyToEmail', error));
      }
    },
  });

  server.addTool({
    name: 'forwardEmail',
    description:
      'Forward the first email whose subject contains a keyword, with an optional note. ' +
      'Without confirm=true the forward is only previewed, not sent.',
    annotations: {
      title: 'Forward Email',
      readOnlyHint: false,
      destructiveHint: false,
      openWorldHint: true,
    },
    parameters: z.object({
      account: AccountParameter,
      subjectKeyword: SubjectKeywordParameter,
      to: RecipientsParameter,
      message: z.string().min(1).optional().describe('Note to put above the forwarded message'),
      mailbox: MailboxParameter,
      confirm: ConfirmParameter,
    }),
    async execute(args) {
      try {
        return await runMailScript(
          engine,
          buildForwardScript({
            account: args.account,
            subjectKeyword: args.subjectKeyword,
            to: args.to,
            message: args.message,
            mailbox: args.mailbox,
            confirm: args.confirm,
          })
        );
      } catch (error: unknown) {
        throw new Error(formatToolError('forwardEmail', error));
      }
    },
  });

  server.addTool({
    name: 'manageDrafts',
    description:
      'List, create, send or delete drafts. create needs subject, to and body; ' +
      'send and delete need draftSubject and only preview unless confirm=true.',
    annotations: {
      title: 'Manage Drafts',
      readOnlyHint: false,
      destructiveHint: true,
      openWorldHint: true,
    },
    parameters: z.object({
      account: AccountParameter,
      action: z.enum(['list', 'create', 'send', 'delete']).describe('Draft operation'),
      subject: z.string().min(1).optional().describe('Subject of a new draft (create)'),
      to: OptionalRecipients.describe('Recipients of a new draft, comma-separated (create)'),
      body: z.string().optional().describe('Body of a new draft (create)'),
      cc: OptionalRecipients.describe('CC recipients (create)'),
      bcc: OptionalRecipients.describe('BCC recipients (create)'),
      draftSubject: z.string().min(1).optional().describe('Subject keyword of an existing draft (send, delete)'),
      confirm: ConfirmParameter,
    }),
    async execute(args) {
      let draft: DraftOptions;
      switch (args.action) {
        case 'list':
          draft = { action: 'list', account: args.account };
          break;
        case 'create': {
          requireParameters('create', { subject: args.subject, to: args.to, body: args.body });
          draft = {
            action: 'create',
            account: args.account,
            subject: args.subject ?? '',
            to: args.to ?? '',
            body: args.body ?? '',
            cc: args.cc,
            bcc: args.bcc,
          };
          break;
        }
        case 'send':
        case 'delete':
          requireParameters(args.action, { draftSubject: args.draftSubject });
          draft = {
            action: args.action,
            account: args.account,
            draftSubject: args.draftSubject ?? '',
            confirm: args.confirm,
          };
          break;
      }

      try {
        return await runMailScript(engine, buildDraftScript(draft));
      } catch (error: unknown) {
        throw new Error(formatToolError('manageDrafts', error));
      }
    },
  });
}
