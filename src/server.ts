// src/server.ts - Apple Mail MCP Server
import { FastMCP } from 'fastmcp';

// Import tool modules
import { registerInboxTools } from './tools/inbox.tools.js';
import { registerSearchTools } from './tools/search.tools.js';
import { registerOrganizeTools } from './tools/organize.tools.js';
import { registerComposeTools } from './tools/compose.tools.js';
import { registerAttachmentTools } from './tools/attachments.tools.js';
import { registerAnalyticsTools } from './tools/analytics.tools.js';

import { createOsascriptRunner, ExecutionEngine, PromiseChainLock } from './automation/index.js';
import { createServerWithConfig, getServerConfigFromEnv, type ServerConfig } from './serverWrapper.js';
import { getErrorMessage } from './errorHelpers.js';
import { logger } from './logger.js';
import type { FastMCPServer, MailToolOptions } from './types.js';

export const SERVER_NAME = 'Apple Mail MCP Server';
export const SERVER_VERSION = '1.0.0';

/** One engine per process: its lock serializes every Mail script. */
export function createExecutionEngine(): ExecutionEngine {
  return new ExecutionEngine({
    lock: new PromiseChainLock(),
    runner: createOsascriptRunner(),
    logger,
  });
}

export function registerAllTools(options: MailToolOptions): void {
  registerInboxTools(options);
  registerSearchTools(options);
  registerOrganizeTools(options);
  registerComposeTools(options);
  registerAttachmentTools(options);
  registerAnalyticsTools(options);
}

/**
 * Builds the wrapped server with every tool registered.
 */
export function createMailServer(
  config: ServerConfig,
  engine: ExecutionEngine = createExecutionEngine()
): FastMCPServer {
  const baseServer: FastMCPServer = new FastMCP({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  // Wrap server to enforce read-only and no-third-party modes if configured
  const server = createServerWithConfig(baseServer, config);
  registerAllTools({ server, engine, config });
  return server;
}

// --- Server Startup ---
export async function startServer(config: ServerConfig = getServerConfigFromEnv()): Promise<void> {
  // Process-level handlers keep a stray rejection from killing the stdio session
  process.on('uncaughtException', (error) => {
    logger.error(`Uncaught Exception: ${getErrorMessage(error)}`);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error(`Unhandled Promise Rejection: ${getErrorMessage(reason)}`);
  });

  try {
    if (config.readOnly) {
      logger.warn('Starting Apple Mail MCP server in READ-ONLY mode. Write operations are disabled.');
    } else {
      logger.info('Starting Apple Mail MCP server...');
    }
    if (config.noThirdParty) {
      logger.warn('No-third-party mode: sending mail is disabled.');
    }

    const server = createMailServer(config);
    await server.start({ transportType: 'stdio' });
    logger.info('MCP Server running using stdio. Awaiting client connection...');
  } catch (startError: unknown) {
    logger.error(`FATAL: Server failed to start: ${getErrorMessage(startError)}`);
    process.exit(1);
  }
}
