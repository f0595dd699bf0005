// src/types.ts
import { z } from 'zod';
import { type FastMCP } from 'fastmcp';
import { type ExecutionEngine } from './automation/index.js';
import { type ServerConfig } from './serverWrapper.js';

// --- FastMCP Server Types ---
// Session auth type - matches FastMCP's internal type
export type FastMCPSessionAuth = Record<string, unknown> | undefined;

// Common type for FastMCP server instance
export type FastMCPServer = FastMCP<FastMCPSessionAuth>;

/** What every tool module receives from server.ts */
export interface MailToolOptions {
  server: FastMCPServer;
  engine: ExecutionEngine;
  config: ServerConfig;
}

// --- Zod Schema Fragments for Reusability ---

export const AccountParameter = z
  .string()
  .min(1)
  .describe('Mail account name as shown in Mail (e.g., "iCloud", "Work"). Use listAccounts to see them.');

export const OptionalAccountParameter = z
  .string()
  .min(1)
  .optional()
  .describe('Optional account name. Omit to cover every account.');

export const MailboxParameter = z
  .string()
  .min(1)
  .optional()
  .default('INBOX')
  .describe('Mailbox name (default: "INBOX"). Nested mailboxes use "/" (e.g., "Projects/Client").');

export const SearchMailboxParameter = z
  .string()
  .min(1)
  .optional()
  .default('INBOX')
  .describe('Mailbox to search (default: "INBOX"). Use "All" for every mailbox of the account.');

export const SubjectKeywordParameter = z
  .string()
  .min(1)
  .describe('Text the email subject must contain.');

export const ConfirmParameter = z
  .boolean()
  .optional()
  .default(false)
  .describe('If false (default), only previews the action. Set true to actually perform it.');

export const OutputFormatParameter = z
  .enum(['text', 'json'])
  .optional()
  .default('text')
  .describe(
    '"text" returns the formatted listing; "json" returns an array of ' +
      '{ subject, isRead, sender?, date?, preview? } records.'
  );

export const IsoDateParameter = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD')
  .optional();

export const RecipientsParameter = z
  .string()
  .min(1)
  .describe('Recipient email address(es), comma-separated for multiple.');

export type OutputFormat = z.infer<typeof OutputFormatParameter>;
