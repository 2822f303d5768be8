// logger.ts - Structured logging utilities

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  requestId?: string;
  [key: string]: unknown;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  error?: string;
  stack?: string;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let minimumLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  minimumLevel = level;
}

const enabled = (level: LogLevel): boolean => LEVEL_ORDER[level] >= LEVEL_ORDER[minimumLevel];

function formatEntry(entry: LogEntry): string {
  return JSON.stringify(entry);
}

function createEntry(
  level: LogLevel,
  message: string,
  context?: LogContext,
  error?: Error,
): LogEntry {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
  };

  if (context && Object.keys(context).length > 0) {
    entry.context = context;
  }

  if (error) {
    entry.error = error.message;
    if (error.stack) {
      entry.stack = error.stack;
    }
  }

  return entry;
}

export const log = {
  debug(message: string, context?: LogContext): void {
    if (!enabled("debug")) return;
    console.debug(formatEntry(createEntry("debug", message, context)));
  },

  info(message: string, context?: LogContext): void {
    if (!enabled("info")) return;
    console.info(formatEntry(createEntry("info", message, context)));
  },

  warn(message: string, context?: LogContext, error?: Error): void {
    if (!enabled("warn")) return;
    console.warn(formatEntry(createEntry("warn", message, context, error)));
  },

  error(message: string, context?: LogContext, error?: Error): void {
    if (!enabled("error")) return;
    console.error(formatEntry(createEntry("error", message, context, error)));
  },
};

// Export for testing
export { createEntry, formatEntry };
