/**
 * Centralized logging utility for consistent log formatting and management.
 *
 * Console output is written to stderr: stdout belongs to the chat transcript
 * and, in server mode, to the stdio MCP transport.
 */

import * as Sentry from "@sentry/node";
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as util from 'node:util';

// Log levels
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3
}

export type LogContext = Error | Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const LEVEL_NAMES: Record<string, LogLevel> = {
  DEBUG: LogLevel.DEBUG,
  INFO: LogLevel.INFO,
  WARN: LogLevel.WARN,
  WARNING: LogLevel.WARN,
  ERROR: LogLevel.ERROR
};

export function parseLogLevel(value: string | undefined, fallback = LogLevel.INFO): LogLevel {
  if (!value) return fallback;
  return LEVEL_NAMES[value.trim().toUpperCase()] ?? fallback;
}

interface LoggerSettings {
  level: LogLevel;
  toConsole: boolean;
  toFile: boolean;
  filePath: string;
}

// Configuration
const settings: LoggerSettings = {
  level: parseLogLevel(process.env.LOG_LEVEL),
  toConsole: process.env.LOG_TO_CONSOLE !== 'false',
  toFile: process.env.LOG_TO_FILE === 'true',
  filePath: process.env.LOG_FILE_PATH || path.join(process.cwd(), 'logs', 'research-chat.log')
};

/**
 * Overrides the environment-derived settings, e.g. to silence logs in tests.
 */
export function configureLogger(overrides: Partial<LoggerSettings>): void {
  Object.assign(settings, overrides);
  if (settings.toFile) {
    ensureLogDirectory(settings.filePath);
  }
}

function ensureLogDirectory(filePath: string): void {
  const logDir = path.dirname(filePath);
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
}

if (settings.toFile) {
  ensureLogDirectory(settings.filePath);
}

// Logger factory
export function createLogger(module: string): Logger {
  const at = (level: LogLevel) => (message: string, context?: LogContext) => {
    if (settings.level <= level) {
      log(level, module, message, context);
    }
  };
  return {
    debug: at(LogLevel.DEBUG),
    info: at(LogLevel.INFO),
    warn: at(LogLevel.WARN),
    error: at(LogLevel.ERROR)
  };
}

// Internal log function
function log(level: LogLevel, module: string, message: string, context?: LogContext) {
  const timestamp = new Date().toISOString();
  const levelName = LogLevel[level];
  const correlationId = Sentry.getCurrentScope().getPropagationContext().traceId || 'N/A';

  const logEntry: Record<string, unknown> = {
    timestamp,
    level: levelName,
    module,
    message,
    correlationId,
  };

  if (context) {
    if (context instanceof Error) {
      logEntry.error_message = context.message;
      logEntry.error_stack = context.stack;
      logEntry.error_name = context.name;
    } else {
      logEntry.context_data = context;
    }
  }

  if (level === LogLevel.ERROR && context instanceof Error) {
    Sentry.captureException(context, (scope) => {
      scope.setTag('module', module);
      scope.setExtra('log_message', message);
      return scope;
    });
  } else {
    Sentry.addBreadcrumb({
      category: 'log',
      message: `[${module}] ${message}`,
      level: toSentryLevel(level),
      data: context instanceof Error ? { error: context.message } : context
    });
  }

  if (settings.toConsole) {
    console.error(safeStringify(logEntry));
  }

  if (settings.toFile) {
    fs.appendFileSync(settings.filePath, formatLine(timestamp, levelName, module, message, context) + '\n');
  }
}

function toSentryLevel(level: LogLevel): Sentry.SeverityLevel {
  switch (level) {
    case LogLevel.DEBUG:
      return 'debug';
    case LogLevel.INFO:
      return 'info';
    case LogLevel.WARN:
      return 'warning';
    default:
      return 'error';
  }
}

function safeStringify(entry: Record<string, unknown>): string {
  try {
    return JSON.stringify(entry);
  } catch (e) {
    const errorMessage = e instanceof Error ? e.message : String(e);
    return JSON.stringify({ ...entry, context_data: `[Error serializing context: ${errorMessage}]` });
  }
}

// Plain-text format used for the log file
function formatLine(timestamp: string, levelName: string, module: string, message: string, context?: LogContext): string {
  let line = `[${timestamp}] [${levelName}] [${module}] ${message}`;
  if (context instanceof Error) {
    line += `\nError: ${context.message}`;
    if (context.stack) {
      line += `\nStack: ${context.stack}`;
    }
  } else if (context) {
    line += `\nContext: ${util.inspect(context, { depth: 4 })}`;
  }
  return line;
}
