// search.tools.ts - Search, content and thread tools
import { z } from 'zod';
import { UserError } from 'fastmcp';
import { formatToolError } from '../errorHelpers.js';
import {
  type MailToolOptions,
  AccountParameter,
  IsoDateParameter,
  SearchMailboxParameter,
  SubjectKeywordParameter,
  MailboxParameter,
} from '../types.js';
import {
  buildEmailThreadScript,
  buildEmailWithContentScript,
  buildSearchEmailsScript,
} from '../scripts/index.js';
import { runMailScript } from './toolHelpers.js';

export function registerSearchTools(options: MailToolOptions) {
  const { server, engine } = options;

  server.addTool({
    name: 'getEmailWithContent',
    description:
      'Find emails whose subject contains a keyword (case-insensitive) and return them with a content preview.',
    annotations: {
      title: 'Get Email With Content',
      readOnlyHint: true,
    },
    parameters: z.object({
      account: AccountParameter,
      subjectKeyword: SubjectKeywordParameter,
      maxResults: z.number().int().min(1).optional().default(5).describe('Maximum matches (default: 5)'),
      maxContentLength: z
        .number()
        .int()
        .min(0)
        .optional()
        .default(300)
        .describe('Maximum preview length in characters (default: 300, 0 = full body)'),
      mailbox: SearchMailboxParameter,
    }),
    async execute(args) {
      try {
        return await runMailScript(
          engine,
          buildEmailWithContentScript({
            account: args.account,
            subjectKeyword: args.subjectKeyword,
            maxResults: args.maxResults,
            maxContentLength: args.maxContentLength,
            mailbox: args.mailbox,
          })
        );
      } catch (error: unknown) {
        throw new Error(formatToolError('getEmailWithContent', error));
      }
    },
  });

  server.addTool({
    name: 'searchEmails',
    description:
      'Search emails by subject, sender, attachments, read status and date range. ' +
      'All filters are combined with AND.',
    annotations: {
      title: 'Search Emails',
      readOnlyHint: true,
    },
    parameters: z.object({
      account: AccountParameter,
      mailbox: SearchMailboxParameter,
      subjectKeyword: z.string().min(1).optional().describe('Subject must contain this text'),
      sender: z.string().min(1).optional().describe('Sender must contain this text'),
      hasAttachments: z.boolean().optional().describe('Only emails with (true) or without (false) attachments'),
      readStatus: z
        .enum(['all', 'read', 'unread'])
        .optional()
        .default('all')
        .describe('Read status filter (default: "all")'),
      dateFrom: IsoDateParameter.describe('Earliest received date, YYYY-MM-DD (inclusive)'),
      dateTo: IsoDateParameter.describe('Latest received date, YYYY-MM-DD (inclusive)'),
      includeContent: z.boolean().optional().default(false).describe('Include a content preview (default: false)'),
      maxResults: z.number().int().min(1).optional().default(20).describe('Maximum results (default: 20)'),
    }),
    async execute(args) {
      if (args.dateFrom && args.dateTo && args.dateFrom > args.dateTo) {
        throw new UserError(`dateFrom (${args.dateFrom}) is after dateTo (${args.dateTo})`);
      }
      try {
        return await runMailScript(
          engine,
          buildSearchEmailsScript({
            account: args.account,
            mailbox: args.mailbox,
            subjectKeyword: args.subjectKeyword,
            sender: args.sender,
            hasAttachments: args.hasAttachments,
            readStatus: args.readStatus,
            dateFrom: args.dateFrom,
            dateTo: args.dateTo,
            includeContent: args.includeContent,
            maxResults: args.maxResults,
          })
        );
      } catch (error: unknown) {
        throw new Error(formatToolError('searchEmails', error));
      }
    },
  });

  server.addTool({
    name: 'getEmailThread',
    description:
      'Get the messages of a conversation. Re:/Fwd: prefixes are stripped from the keyword ' +
      'so replies and forwards of the same topic are included.',
    annotations: {
      title: 'Get Email Thread',
      readOnlyHint: true,
    },
    parameters: z.object({
      account: AccountParameter,
      subjectKeyword: SubjectKeywordParameter,
      mailbox: MailboxParameter,
      maxMessages: z.number().int().min(1).optional().default(50).describe('Maximum messages (default: 50)'),
    }),
    async execute(args) {
      try {
        return await runMailScript(
          engine,
          buildEmailThreadScript({
            account: args.account,
            subjectKeyword: args.subjectKeyword,
            mailbox: args.mailbox,
            maxMessages: args.maxMessages,
          })
        );
      } catch (error: unknown) {
        throw new Error(formatToolError('getEmailThread', error));
      }
    },
  });
}
