/**
 * Custom error types for research-chat
 */

export enum ErrorCode {
  // Tool errors
  TOOL_NOT_FOUND = 'TOOL_NOT_FOUND',
  TOOL_EXECUTION_FAILED = 'TOOL_EXECUTION_FAILED',
  TOOL_INVALID_ARGS = 'TOOL_INVALID_ARGS',
  TOOL_ROUND_LIMIT = 'TOOL_ROUND_LIMIT',

  // Backend errors
  CONNECTION_FAILED = 'CONNECTION_FAILED',
  PROMPT_NOT_FOUND = 'PROMPT_NOT_FOUND',
  RESOURCE_NOT_FOUND = 'RESOURCE_NOT_FOUND',

  // Configuration errors
  CONFIG_INVALID = 'CONFIG_INVALID',

  // External API errors
  PROVIDER_ERROR = 'PROVIDER_ERROR',
  SEARCH_FAILED = 'SEARCH_FAILED',
}

export class ChatError extends Error {
  code: ErrorCode;
  details?: unknown;

  constructor(message: string, code: ErrorCode, details?: unknown) {
    super(message);
    this.name = 'ChatError';
    this.code = code;
    this.details = details;
  }
}

export class ToolError extends ChatError {
  toolName: string;
  serverName?: string;

  constructor(
    message: string,
    toolName: string,
    serverName?: string,
    code: ErrorCode = ErrorCode.TOOL_EXECUTION_FAILED,
    details?: unknown
  ) {
    super(message, code, details);
    this.name = 'ToolError';
    this.toolName = toolName;
    this.serverName = serverName;
  }
}

export class ConnectionError extends ChatError {
  serverName: string;

  constructor(message: string, serverName: string, details?: unknown) {
    super(message, ErrorCode.CONNECTION_FAILED, details);
    this.name = 'ConnectionError';
    this.serverName = serverName;
  }
}

export class ConfigError extends ChatError {
  filePath: string;

  constructor(message: string, filePath: string, details?: unknown) {
    super(message, ErrorCode.CONFIG_INVALID, details);
    this.name = 'ConfigError';
    this.filePath = filePath;
  }
}

export class ArxivError extends ChatError {
  status?: number;

  constructor(message: string, status?: number) {
    super(message, ErrorCode.SEARCH_FAILED, { status });
    this.name = 'ArxivError';
    this.status = status;
  }
}

/**
 * Result of an operation whose failure the caller decides how to handle.
 */
export type Outcome<T, E extends Error = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function succeed<T>(value: T): Outcome<T, never> {
  return { ok: true, value };
}

export function fail<E extends Error>(error: E): Outcome<never, E> {
  return { ok: false, error };
}

// Error utility functions
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
