/**
 * Everything one chat session holds: the connected backends, the model and the
 * conversation. Built once at startup and passed down explicitly.
 */

import { createLogger } from '../utils/logger.js';
import { Conversation, DEFAULT_MAX_TOOL_ROUNDS, type ConversationOptions } from './conversation.js';
import { LLMService, type ChatModel } from './llm-service.js';
import { MCPManager, stdioConnector, type ClientConnector } from './mcp-manager.js';
import type { OutputSink } from '../types/chat.js';
import type { ConnectionPolicy, MCPServerConfig } from '../types/mcp.js';

const logger = createLogger('appContext');

export const DEFAULT_SYSTEM_PROMPT = [
  'You are a helpful research assistant connected to several MCP servers.',
  'Use the research tools to search arXiv, look up saved papers and count them by topic.',
  "Use the 'fetch' tool for HTTP and HTTPS URLs.",
  "When asked to save or write content, use the filesystem 'write_file' tool; if paths are restricted, call 'list_allowed_directories' first and pick an allowed directory.",
  'Report the exact file path after saving.'
].join(' ');

export interface ChatOptions extends ConversationOptions {
  connectionPolicy: ConnectionPolicy;
}

export const DEFAULT_CHAT_OPTIONS: ChatOptions = {
  systemPrompt: DEFAULT_SYSTEM_PROMPT,
  transcriptMode: 'per-query',
  maxToolRounds: DEFAULT_MAX_TOOL_ROUNDS,
  argumentPolicy: 'empty',
  connectionPolicy: 'skip'
};

export interface AppContext {
  registry: MCPManager;
  model: ChatModel;
  conversation: Conversation;
  output: OutputSink;
  options: ChatOptions;
}

export interface AppContextInit {
  servers: MCPServerConfig[];
  options?: Partial<ChatOptions>;
  model?: ChatModel;
  connector?: ClientConnector;
  output?: OutputSink;
}

const consoleOutput: OutputSink = text => console.log(text);

/**
 * Connects every configured backend and assembles the session. Connections
 * already opened are closed again if assembly fails.
 */
export async function createAppContext(init: AppContextInit): Promise<AppContext> {
  const options: ChatOptions = { ...DEFAULT_CHAT_OPTIONS, ...init.options };
  const output = init.output ?? consoleOutput;
  const registry = new MCPManager(init.connector ?? stdioConnector);

  try {
    const model = init.model ?? new LLMService();
    await registry.registerAll(init.servers, options.connectionPolicy);
    logger.info(`Connected servers: ${registry.getConnectedServers().join(', ') || 'none'}`, {
      tools: registry.catalog().length
    });

    const conversation = new Conversation(model, registry, output, options);
    return { registry, model, conversation, output, options };
  } catch (error) {
    await registry.close();
    throw error;
  }
}

/**
 * Acquires a context, runs `fn` with it and releases every connection on all
 * exit paths.
 */
export async function withAppContext<T>(
  factory: () => Promise<AppContext>,
  fn: (context: AppContext) => Promise<T>
): Promise<T> {
  const context = await factory();
  try {
    return await fn(context);
  } finally {
    await context.registry.close();
  }
}
