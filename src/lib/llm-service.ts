import { generateText, InvalidToolArgumentsError, jsonSchema, tool, type CoreMessage, type LanguageModel, type Tool } from 'ai';
import { createOpenAI } from '@ai-sdk/openai';
import { createLogger } from '../utils/logger.js';
import { ChatError, ErrorCode, getErrorMessage, toError } from './errors.js';
import { parseToolArguments } from './tool-content.js';
import type { Message, ModelTurn } from '../types/chat.js';
import type { ToolDescriptor } from '../types/mcp.js';

const logger = createLogger('llmService');

export const MODEL_NAME = 'gpt-4o-mini';
export const MAX_OUTPUT_TOKENS = 2024;

export interface ChatRequest {
  messages: readonly Message[];
  tools: readonly ToolDescriptor[];
}

/**
 * One synchronous chat-completion round trip: transcript and tool catalog in,
 * assistant text and requested tool calls out.
 */
export interface ChatModel {
  complete(request: ChatRequest): Promise<ModelTurn>;
}

export interface LLMServiceOptions {
  apiKey?: string;
  baseURL?: string;
  // Overrides the provider model entirely
  model?: LanguageModel;
}

export function toCoreMessages(messages: readonly Message[]): CoreMessage[] {
  return messages.map((message): CoreMessage => {
    switch (message.role) {
      case 'system':
        return { role: 'system', content: message.content };
      case 'user':
        return { role: 'user', content: message.content };
      case 'assistant': {
        if (!message.toolCalls || message.toolCalls.length === 0) {
          return { role: 'assistant', content: message.content };
        }
        return {
          role: 'assistant',
          content: [
            ...(message.content ? [{ type: 'text' as const, text: message.content }] : []),
            ...message.toolCalls.map(call => {
              const parsed = parseToolArguments(call.arguments);
              return {
                type: 'tool-call' as const,
                toolCallId: call.id,
                toolName: call.name,
                args: parsed.ok ? parsed.value : {}
              };
            })
          ]
        };
      }
      case 'tool':
        return {
          role: 'tool',
          content: [{ type: 'tool-result', toolCallId: message.toolCallId, toolName: message.toolName, result: message.content }]
        };
    }
  });
}

/**
 * Exposes the catalog to the model without `execute`, so the SDK returns the
 * calls instead of running them.
 */
export function toToolSet(descriptors: readonly ToolDescriptor[]): Record<string, Tool> {
  const tools: Record<string, Tool> = {};
  for (const descriptor of descriptors) {
    tools[descriptor.name] = tool({
      description: descriptor.description,
      parameters: jsonSchema<Record<string, unknown>>(descriptor.inputSchema)
    });
  }
  return tools;
}

export class LLMService implements ChatModel {
  private model: LanguageModel;

  constructor(options: LLMServiceOptions = {}) {
    this.model = options.model ?? this.initializeModel(options);
  }

  private initializeModel(options: LLMServiceOptions): LanguageModel {
    const apiKey = options.apiKey || process.env.OPENAI_API_KEY;
    if (!apiKey) {
      throw new ChatError('OPENAI_API_KEY environment variable is required', ErrorCode.PROVIDER_ERROR);
    }
    const baseURL = options.baseURL || process.env.OPENAI_BASE_URL;
    const openai = createOpenAI(baseURL ? { apiKey, baseURL } : { apiKey });
    return openai(MODEL_NAME);
  }

  async complete({ messages, tools }: ChatRequest): Promise<ModelTurn> {
    // Argument text that failed to parse, by call id. The SDK is handed `{}`
    // so the call survives; the raw text is passed on for the caller to judge.
    const malformed = new Map<string, string>();

    try {
      const result = await generateText({
        model: this.model,
        messages: toCoreMessages(messages),
        tools: toToolSet(tools),
        maxTokens: MAX_OUTPUT_TOKENS,
        experimental_repairToolCall: async ({ toolCall, error }) => {
          if (!InvalidToolArgumentsError.isInstance(error)) {
            return null;
          }
          malformed.set(toolCall.toolCallId, toolCall.args);
          return { ...toolCall, args: '{}' };
        }
      });

      if (result.toolCalls.length > 0) {
        logger.debug(`Tool calls: ${result.toolCalls.length}`, { finishReason: result.finishReason });
      }

      return {
        text: result.text,
        toolCalls: result.toolCalls.map(call => ({
          id: call.toolCallId,
          name: call.toolName,
          arguments: malformed.get(call.toolCallId) ?? JSON.stringify(call.args)
        }))
      };
    } catch (error) {
      logger.error('Error generating response', toError(error));
      if (error instanceof ChatError) throw error;
      throw new ChatError(`Failed to generate response: ${getErrorMessage(error)}`, ErrorCode.PROVIDER_ERROR, {
        cause: getErrorMessage(error)
      });
    }
  }
}
