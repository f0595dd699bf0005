// inbox.tools.ts - Inbox, account and mailbox overview tools
import { z } from 'zod';
import { formatToolError } from '../errorHelpers.js';
import {
  type MailToolOptions,
  AccountParameter,
  OptionalAccountParameter,
  OutputFormatParameter,
} from '../types.js';
import { parseAccountNames, parseEmailList, parseUnreadCounts } from '../parsing/index.js';
import {
  buildInboxOverviewScript,
  buildListAccountsScript,
  buildListInboxScript,
  buildListMailboxesScript,
  buildRecentEmailsScript,
  buildUnreadCountScript,
} from '../scripts/index.js';
import { runMailScript } from './toolHelpers.js';

export function registerInboxTools(options: MailToolOptions) {
  const { server, engine } = options;

  server.addTool({
    name: 'listInboxEmails',
    description:
      'List emails from the inbox of every account, or of one account. ' +
      'Unread messages are marked ✉, read ones ✓.',
    annotations: {
      title: 'List Inbox Emails',
      readOnlyHint: true,
    },
    parameters: z.object({
      account: OptionalAccountParameter,
      maxEmails: z
        .number()
        .int()
        .min(0)
        .optional()
        .default(0)
        .describe('Maximum emails per account (default: 0 = all)'),
      includeRead: z.boolean().optional().default(true).describe('Include read emails (default: true)'),
      format: OutputFormatParameter,
    }),
    async execute(args, { log }) {
      try {
        const output = await runMailScript(
          engine,
          buildListInboxScript({
            account: args.account,
            maxEmails: args.maxEmails,
            includeRead: args.includeRead,
          })
        );
        if (args.format === 'json') {
          const records = parseEmailList(output);
          log.debug(`Parsed ${records.length} inbox records`);
          return JSON.stringify(records, null, 2);
        }
        return output;
      } catch (error: unknown) {
        throw new Error(formatToolError('listInboxEmails', error));
      }
    },
  });

  server.addTool({
    name: 'getUnreadCount',
    description: 'Get the number of unread inbox emails per account. Returns JSON; -1 means the count failed.',
    annotations: {
      title: 'Get Unread Count',
      readOnlyHint: true,
    },
    parameters: z.object({}),
    async execute() {
      try {
        const output = await runMailScript(engine, buildUnreadCountScript());
        return JSON.stringify(parseUnreadCounts(output), null, 2);
      } catch (error: unknown) {
        throw new Error(formatToolError('getUnreadCount', error));
      }
    },
  });

  server.addTool({
    name: 'listAccounts',
    description: 'List the names of all Mail accounts.',
    annotations: {
      title: 'List Mail Accounts',
      readOnlyHint: true,
    },
    parameters: z.object({}),
    async execute() {
      try {
        const accounts = parseAccountNames(await runMailScript(engine, buildListAccountsScript()));
        if (accounts.length === 0) {
          return 'No Mail accounts found.';
        }
        return `Found ${accounts.length} account(s):\n\n${accounts.map((name, i) => `${i + 1}. ${name}`).join('\n')}`;
      } catch (error: unknown) {
        throw new Error(formatToolError('listAccounts', error));
      }
    },
  });

  server.addTool({
    name: 'getRecentEmails',
    description: 'Get the most recent inbox emails of an account, optionally with a content preview.',
    annotations: {
      title: 'Get Recent Emails',
      readOnlyHint: true,
    },
    parameters: z.object({
      account: AccountParameter,
      count: z.number().int().min(1).max(200).optional().default(10).describe('Number of emails (default: 10)'),
      includeContent: z
        .boolean()
        .optional()
        .default(false)
        .describe('Include a content preview (slower, default: false)'),
      format: OutputFormatParameter,
    }),
    async execute(args) {
      try {
        const output = await runMailScript(
          engine,
          buildRecentEmailsScript({
            account: args.account,
            count: args.count,
            includeContent: args.includeContent,
          })
        );
        return args.format === 'json' ? JSON.stringify(parseEmailList(output), null, 2) : output;
      } catch (error: unknown) {
        throw new Error(formatToolError('getRecentEmails', error));
      }
    },
  });

  server.addTool({
    name: 'listMailboxes',
    description: 'List mailboxes (folders) of every account or of one account, with optional message counts.',
    annotations: {
      title: 'List Mailboxes',
      readOnlyHint: true,
    },
    parameters: z.object({
      account: OptionalAccountParameter,
      includeCounts: z
        .boolean()
        .optional()
        .default(true)
        .describe('Include total and unread counts (default: true)'),
    }),
    async execute(args) {
      try {
        return await runMailScript(
          engine,
          buildListMailboxesScript({ account: args.account, includeCounts: args.includeCounts })
        );
      } catch (error: unknown) {
        throw new Error(formatToolError('listMailboxes', error));
      }
    },
  });

  server.addTool({
    name: 'getInboxOverview',
    description:
      'Overview of the whole mailbox: unread counts per account, mailbox structure, ' +
      'a preview of recent emails and suggested next actions. A good first call.',
    annotations: {
      title: 'Get Inbox Overview',
      readOnlyHint: true,
    },
    parameters: z.object({}),
    async execute(_args, { log }) {
      try {
        log.info('Building inbox overview');
        return await runMailScript(engine, buildInboxOverviewScript());
      } catch (error: unknown) {
        throw new Error(formatToolError('getInboxOverview', error));
      }
    },
  });
}
