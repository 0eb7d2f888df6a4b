/**
 * Conversions between what the model emits / backends return and what goes
 * into the transcript.
 */

import { fail, succeed, toError, type Outcome } from './errors.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parses a tool call's argument text. Anything but a JSON object is a failure.
 */
export function parseToolArguments(text: string): Outcome<Record<string, unknown>> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    return fail(toError(error));
  }
  if (!isRecord(parsed)) {
    return fail(new Error(`Tool arguments must be a JSON object, got: ${text}`));
  }
  return succeed(parsed);
}

/**
 * Flattens an MCP tool result into plain text: text parts verbatim, any other
 * part as JSON, one part per line.
 */
export function formatToolContent(result: unknown): string {
  if (typeof result === 'string') {
    return result;
  }
  if (isRecord(result)) {
    const { content } = result;
    if (Array.isArray(content)) {
      return content.map(formatContentPart).join('\n');
    }
    if ('toolResult' in result) {
      return formatToolContent(result.toolResult);
    }
  }
  return JSON.stringify(result) ?? String(result);
}

function formatContentPart(part: unknown): string {
  if (isRecord(part) && part.type === 'text' && typeof part.text === 'string') {
    return part.text;
  }
  return typeof part === 'string' ? part : JSON.stringify(part);
}
