/**
 * Logger that writes to stderr (stdout carries the MCP stdio protocol)
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[currentLevel];
}

export function formatMessage(level: LogLevel, context: string, message: string): string {
  const timestamp = new Date().toISOString();
  return `[${timestamp}] [${level.toUpperCase()}] [${context}] ${message}`;
}

function write(level: LogLevel, context: string, message: string, data?: unknown): void {
  if (!shouldLog(level)) return;
  if (data === undefined) {
    console.error(formatMessage(level, context, message));
  } else {
    console.error(formatMessage(level, context, message), data);
  }
}

export const logger = {
  debug(context: string, message: string, data?: unknown): void {
    write('debug', context, message, data);
  },

  info(context: string, message: string, data?: unknown): void {
    write('info', context, message, data);
  },

  warn(context: string, message: string, data?: unknown): void {
    write('warn', context, message, data);
  },

  error(context: string, message: string, error?: unknown): void {
    write('error', context, message, error);
  },
};
