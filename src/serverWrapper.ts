// src/serverWrapper.ts - Server wrapper for read-only mode, third-party blocking, user preferences and error handling
import { UserError, type FastMCP, type Tool, type ToolParameters } from 'fastmcp';
import type { FastMCPSessionAuth } from './types.js';
import {
  type PathSecurityConfig,
  DEFAULT_PATH_SECURITY_CONFIG,
  checkThirdPartyAction,
} from './securityHelpers.js';
import { getErrorDetails, getErrorMessage } from './errorHelpers.js';
import { logger } from './logger.js';

export interface ServerConfig {
  /** When true, tools with readOnlyHint: false will be blocked at runtime */
  readOnly: boolean;
  /** When true, tools that send mail to other people are blocked */
  noThirdParty: boolean;
  /** Path security configuration for attachment saves and exports */
  pathSecurity: PathSecurityConfig;
  /** Free-form preferences appended to every tool description */
  userPreferences?: string;
}

export const HELP_MESSAGE = `

Troubleshooting: run "apple-mail-mcp doctor" to check that Mail is running and that
this terminal may control it (System Settings > Privacy & Security > Automation).`;

function enhanceErrorMessage(error: unknown): string {
  return `${getErrorMessage(error)}${HELP_MESSAGE}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/** Appends the user's preferences to a tool description. */
export function describeWithPreferences(description: string | undefined, preferences: string | undefined): string | undefined {
  if (!preferences) {
    return description;
  }
  return `${description ?? ''}\n\nUser preferences: ${preferences}`;
}

/**
 * Wraps a tool's execute function with third-party checks and error handling
 */
function wrapExecuteWithErrorHandler<T extends FastMCPSessionAuth, Params extends ToolParameters>(
  tool: Tool<T, Params>,
  config: ServerConfig
): Tool<T, Params> {
  const originalExecute = tool.execute;

  const wrappedExecute: typeof tool.execute = async (args, context) => {
    if (config.noThirdParty) {
      const thirdPartyCheck = checkThirdPartyAction(tool.name, isRecord(args) ? args : {});
      if (thirdPartyCheck.blocked) {
        throw new UserError(
          `${thirdPartyCheck.reason ?? 'Blocked'}\n\nRestart the server without --no-third-party to enable sending.${HELP_MESSAGE}`
        );
      }
    }

    try {
      return await originalExecute(args, context);
    } catch (error) {
      if (error instanceof UserError) {
        throw error;
      }
      logger.warn(`Tool ${tool.name} failed`, getErrorDetails(error));
      throw new Error(enhanceErrorMessage(error));
    }
  };

  return { ...tool, execute: wrappedExecute };
}

/**
 * Wraps a FastMCP server to:
 * 1. Add global error handling with a troubleshooting hint to all tools
 * 2. Enforce read-only mode based on tool annotations (if enabled)
 * 3. Block sending mail (if enabled)
 * 4. Append user preferences to tool descriptions (if set)
 */
export function createServerWithConfig<T extends FastMCPSessionAuth>(
  server: FastMCP<T>,
  config: ServerConfig
): FastMCP<T> {
  const originalAddTool = server.addTool.bind(server);

  server.addTool = function <Params extends ToolParameters>(tool: Tool<T, Params>): void {
    const isReadOnly = tool.annotations?.readOnlyHint === true;
    const description = describeWithPreferences(tool.description, config.userPreferences);

    if (config.readOnly && !isReadOnly) {
      const toolName = tool.name;
      const blockedExecute: typeof tool.execute = () =>
        Promise.reject(
          new UserError(
            `Tool "${toolName}" is disabled: server is running in read-only mode. ` +
              `This tool would modify mail. Restart the server without --read-only to enable write operations.${HELP_MESSAGE}`
          )
        );

      originalAddTool({
        ...tool,
        execute: blockedExecute,
        description: `[READ-ONLY MODE - DISABLED] ${description ?? ''}`,
      });
      return;
    }

    originalAddTool({ ...wrapExecuteWithErrorHandler(tool, config), description });
  };

  return server;
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
}

/**
 * Parse server config from environment variables
 */
export function getServerConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const config: ServerConfig = {
    readOnly: env.APPLE_MAIL_MCP_READ_ONLY === 'true',
    noThirdParty: env.APPLE_MAIL_MCP_NO_THIRD_PARTY === 'true',
    pathSecurity: {
      ...DEFAULT_PATH_SECURITY_CONFIG,
      allowedWritePaths: [...DEFAULT_PATH_SECURITY_CONFIG.allowedWritePaths],
      forbiddenPathPatterns: [...DEFAULT_PATH_SECURITY_CONFIG.forbiddenPathPatterns],
    },
  };

  if (env.APPLE_MAIL_MCP_ALLOWED_WRITE_PATHS) {
    config.pathSecurity.allowedWritePaths = splitList(env.APPLE_MAIL_MCP_ALLOWED_WRITE_PATHS);
  }

  if (env.APPLE_MAIL_MCP_FORBIDDEN_PATHS) {
    config.pathSecurity.forbiddenPathPatterns = [
      ...config.pathSecurity.forbiddenPathPatterns,
      ...splitList(env.APPLE_MAIL_MCP_FORBIDDEN_PATHS),
    ];
  }

  const preferences = env.USER_EMAIL_PREFERENCES?.trim();
  if (preferences) {
    config.userPreferences = preferences;
  }

  return config;
}
