// analytics.tools.ts - Statistics and export
import { z } from 'zod';
import { formatToolError } from '../errorHelpers.js';
import { type MailToolOptions, AccountParameter, MailboxParameter } from '../types.js';
import {
  buildExportScript,
  buildStatisticsScript,
  type ExportOptions,
  type StatisticsOptions,
} from '../scripts/index.js';
import { requireParameters, resolveWritablePath, runMailScript } from './toolHelpers.js';

export function registerAnalyticsTools(options: MailToolOptions) {
  const { server, engine, config } = options;

  server.addTool({
    name: 'getStatistics',
    description:
      'Email statistics. account_overview: volume, read ratio, flags, attachments and top senders; ' +
      'sender_stats: emails from one sender; mailbox_breakdown: counts for one mailbox.',
    annotations: {
      title: 'Get Email Statistics',
      readOnlyHint: true,
    },
    parameters: z.object({
      account: AccountParameter,
      scope: z
        .enum(['account_overview', 'sender_stats', 'mailbox_breakdown'])
        .optional()
        .default('account_overview')
        .describe('Statistics scope (default: "account_overview")'),
      sender: z.string().min(1).optional().describe('Sender to analyse (sender_stats)'),
      mailbox: z.string().min(1).optional().describe('Mailbox to analyse (mailbox_breakdown)'),
      daysBack: z
        .number()
        .int()
        .min(0)
        .optional()
        .default(30)
        .describe('Days of history to include (default: 30, 0 = all)'),
    }),
    async execute(args) {
      let statistics: StatisticsOptions;
      switch (args.scope) {
        case 'account_overview':
          statistics = { scope: 'account_overview', account: args.account, daysBack: args.daysBack };
          break;
        case 'sender_stats':
          requireParameters('sender_stats', { sender: args.sender });
          statistics = {
            scope: 'sender_stats',
            account: args.account,
            sender: args.sender ?? '',
            daysBack: args.daysBack,
          };
          break;
        case 'mailbox_breakdown':
          requireParameters('mailbox_breakdown', { mailbox: args.mailbox });
          statistics = { scope: 'mailbox_breakdown', account: args.account, mailbox: args.mailbox ?? '' };
          break;
      }

      try {
        return await runMailScript(engine, buildStatisticsScript(statistics));
      } catch (error: unknown) {
        throw new Error(formatToolError('getStatistics', error));
      }
    },
  });

  server.addTool({
    name: 'exportEmails',
    description:
      'Export one email or a whole mailbox to .txt or .html files in a directory ' +
      'inside an allowed location (default: ~/Desktop).',
    annotations: {
      title: 'Export Emails',
      readOnlyHint: false,
      destructiveHint: false,
    },
    parameters: z.object({
      account: AccountParameter,
      scope: z.enum(['single_email', 'entire_mailbox']).describe('What to export'),
      subjectKeyword: z.string().min(1).optional().describe('Subject keyword of the email (single_email)'),
      mailbox: MailboxParameter,
      saveDirectory: z.string().min(1).optional().default('~/Desktop').describe('Target directory (default: ~/Desktop)'),
      format: z.enum(['txt', 'html']).optional().default('txt').describe('File format (default: "txt")'),
    }),
    async execute(args, { log }) {
      const saveDirectory = resolveWritablePath(args.saveDirectory, config.pathSecurity);
      let exportOptions: ExportOptions;
      if (args.scope === 'single_email') {
        requireParameters('single_email', { subjectKeyword: args.subjectKeyword });
        exportOptions = {
          scope: 'single_email',
          account: args.account,
          subjectKeyword: args.subjectKeyword ?? '',
          mailbox: args.mailbox,
          saveDirectory,
          format: args.format,
        };
      } else {
        exportOptions = {
          scope: 'entire_mailbox',
          account: args.account,
          mailbox: args.mailbox,
          saveDirectory,
          format: args.format,
        };
      }

      try {
        log.info(`Exporting ${args.scope} to ${saveDirectory}`);
        return await runMailScript(engine, buildExportScript(exportOptions));
      } catch (error: unknown) {
        throw new Error(formatToolError('exportEmails', error));
      }
    },
  });
}
