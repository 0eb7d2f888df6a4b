import * as readline from 'node:readline';
import { createLogger } from '../utils/logger.js';
import { getErrorMessage, toError } from '../lib/errors.js';
import type { AppContext } from '../lib/app-context.js';
import type { PromptDescriptor } from '../types/mcp.js';

const logger = createLogger('chat');

export const QUERY_PROMPT = 'Query: ';

export type ChatCommand =
  | { kind: 'quit' }
  | { kind: 'empty' }
  | { kind: 'resource'; uri: string }
  | { kind: 'list-prompts' }
  | { kind: 'prompt'; name: string; args: Record<string, string> }
  | { kind: 'usage'; message: string }
  | { kind: 'query'; text: string };

/**
 * Classifies one input line. `@folders` and `@<topic>` read resources,
 * `/prompts` and `/prompt <name> k=v ...` work with prompts, and anything
 * else is a query for the model.
 */
export function parseCommand(line: string): ChatCommand {
  const text = line.trim();
  if (!text) return { kind: 'empty' };
  if (text.toLowerCase() === 'quit') return { kind: 'quit' };

  if (text.startsWith('@')) {
    const target = text.slice(1).trim();
    if (!target) return { kind: 'usage', message: 'Usage: @folders or @<topic>' };
    return { kind: 'resource', uri: target === 'folders' ? 'papers://folders' : `papers://${encodeURIComponent(target)}` };
  }

  if (text.startsWith('/')) {
    const [command, ...rest] = text.split(/\s+/);
    if (command === '/prompts') return { kind: 'list-prompts' };
    if (command === '/prompt') {
      const [name, ...pairs] = rest;
      if (!name) return { kind: 'usage', message: 'Usage: /prompt <name> <arg1=value1> <arg2=value2>' };
      const args: Record<string, string> = {};
      for (const pair of pairs) {
        const separator = pair.indexOf('=');
        if (separator > 0) {
          args[pair.slice(0, separator)] = pair.slice(separator + 1);
        }
      }
      return { kind: 'prompt', name, args };
    }
    return { kind: 'usage', message: `Unknown command: ${command}` };
  }

  return { kind: 'query', text };
}

export function formatPromptList(prompts: PromptDescriptor[]): string {
  if (prompts.length === 0) return 'No prompts available.';
  const lines = ['Available prompts:'];
  for (const prompt of prompts) {
    lines.push(`- ${prompt.name}: ${prompt.description ?? ''}`.trimEnd());
    if (prompt.arguments.length > 0) {
      lines.push('  Arguments:');
      for (const arg of prompt.arguments) {
        lines.push(`    - ${arg.name}${arg.required ? ' (required)' : ''}`);
      }
    }
  }
  return lines.join('\n');
}

/**
 * Line-at-a-time front end over an AppContext.
 */
export class ChatSession {
  constructor(private readonly context: AppContext) {}

  /**
   * Handles one line. Returns false once the user asked to quit.
   */
  async handleLine(line: string): Promise<boolean> {
    const command = parseCommand(line);
    try {
      return await this.execute(command);
    } catch (error) {
      logger.error('Error handling input', toError(error));
      this.context.output(`Error: ${getErrorMessage(error)}`);
      return true;
    }
  }

  private async execute(command: ChatCommand): Promise<boolean> {
    const { output, registry, conversation } = this.context;

    switch (command.kind) {
      case 'quit':
        return false;
      case 'empty':
        return true;
      case 'usage':
        output(command.message);
        return true;
      case 'resource':
        output(await registry.readResource(command.uri));
        return true;
      case 'list-prompts':
        output(formatPromptList(registry.listPrompts()));
        return true;
      case 'prompt': {
        const result = await registry.getPrompt(command.name, command.args);
        const text = result.messages
          .map(message => (message.content.type === 'text' ? message.content.text : ''))
          .filter(Boolean)
          .join('\n');
        await conversation.processQuery(text);
        return true;
      }
      case 'query':
        await conversation.processQuery(command.text);
        return true;
    }
  }
}

/**
 * Reads queries from `input` until `quit` or end of input.
 */
export async function runChat(
  context: AppContext,
  input: NodeJS.ReadableStream = process.stdin,
  terminal: NodeJS.WritableStream = process.stdout
): Promise<void> {
  const session = new ChatSession(context);
  const rl = readline.createInterface({ input, output: terminal });

  context.output("\nMCP Chatbot Started!\nType your queries or 'quit' to exit.");
  rl.setPrompt(`\n${QUERY_PROMPT}`);
  rl.prompt();

  // Leaving the loop, by `quit` or end of input, closes the interface
  for await (const line of rl) {
    if (!(await session.handleLine(line))) break;
    rl.prompt();
  }
}
