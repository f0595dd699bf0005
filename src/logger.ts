// src/logger.ts - stderr logger (stdout carries the MCP stdio transport)

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const PREFIX = '[apple-mail-mcp]';

/**
 * Logging surface shared with FastMCP's per-call `log` object, so engine code
 * can log through either one.
 */
export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

export function resolveLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return normalized && isLogLevel(normalized) ? normalized : 'info';
}

export function createLogger(
  level: LogLevel = resolveLogLevel(process.env.APPLE_MAIL_MCP_LOG_LEVEL),
  write: (line: string) => void = (line) => console.error(line)
): Logger {
  const emit = (lineLevel: LogLevel, message: string, data?: Record<string, unknown>) => {
    if (LEVEL_ORDER[lineLevel] < LEVEL_ORDER[level]) return;
    const suffix = data && Object.keys(data).length > 0 ? ` ${JSON.stringify(data)}` : '';
    write(`${PREFIX} ${lineLevel.toUpperCase()} ${message}${suffix}`);
  };

  return {
    debug: (message, data) => emit('debug', message, data),
    info: (message, data) => emit('info', message, data),
    warn: (message, data) => emit('warn', message, data),
    error: (message, data) => emit('error', message, data),
  };
}

export const logger = createLogger();
