// attachments.tools.ts - Attachment listing and saving
import { z } from 'zod';
import { formatToolError } from '../errorHelpers.js';
import { type MailToolOptions, AccountParameter, SubjectKeywordParameter } from '../types.js';
import { buildListAttachmentsScript, buildSaveAttachmentScript } from '../scripts/index.js';
import { resolveWritablePath, runMailScript } from './toolHelpers.js';

export function registerAttachmentTools(options: MailToolOptions) {
  const { server, engine, config } = options;

  server.addTool({
    name: 'listEmailAttachments',
    description: 'List the attachments (name and size) of inbox emails whose subject contains a keyword.',
    annotations: {
      title: 'List Email Attachments',
      readOnlyHint: true,
    },
    parameters: z.object({
      account: AccountParameter,
      subjectKeyword: SubjectKeywordParameter,
      maxResults: z.number().int().min(1).optional().default(1).describe('Maximum emails to inspect (default: 1)'),
    }),
    async execute(args) {
      try {
        return await runMailScript(
          engine,
          buildListAttachmentsScript({
            account: args.account,
            subjectKeyword: args.subjectKeyword,
            maxResults: args.maxResults,
          })
        );
      } catch (error: unknown) {
        throw new Error(formatToolError('listEmailAttachments', error));
      }
    },
  });

  server.addTool({
    name: 'saveEmailAttachment',
    description:
      'Save an attachment of an inbox email to disk. The path must be absolute (or start with ~) ' +
      'and inside an allowed directory such as ~/Downloads.',
    annotations: {
      title: 'Save Email Attachment',
      readOnlyHint: false,
      destructiveHint: false,
    },
    parameters: z.object({
      account: AccountParameter,
      subjectKeyword: SubjectKeywordParameter,
      attachmentName: z.string().min(1).describe('Attachment file name (or part of it)'),
      savePath: z.string().min(1).describe('Full path of the file to write (e.g., "~/Downloads/report.pdf")'),
    }),
    async execute(args, { log }) {
      const savePath = resolveWritablePath(args.savePath, config.pathSecurity);
      try {
        log.info(`Saving attachment to ${savePath}`);
        return await runMailScript(
          engine,
          buildSaveAttachmentScript({
            account: args.account,
            subjectKeyword: args.subjectKeyword,
            attachmentName: args.attachmentName,
            savePath,
          })
        );
      } catch (error: unknown) {
        throw new Error(formatToolError('saveEmailAttachment', error));
      }
    },
  });
}
