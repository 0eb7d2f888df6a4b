import { createLogger } from '../utils/logger.js';
import { ChatError, ErrorCode, ToolError } from './errors.js';
import { formatToolContent, parseToolArguments } from './tool-content.js';
import type { ChatModel } from './llm-service.js';
import type { ArgumentPolicy, Message, OutputSink, ToolCallRequest, TranscriptMode } from '../types/chat.js';
import type { ToolDescriptor } from '../types/mcp.js';

const logger = createLogger('conversation');

export const DEFAULT_MAX_TOOL_ROUNDS = 10;

/**
 * The part of the session registry the loop needs.
 */
export interface ToolRouter {
  catalog(): ToolDescriptor[];
  dispatch(toolName: string, args: Record<string, unknown>): Promise<unknown>;
}

export interface ConversationOptions {
  systemPrompt?: string;
  transcriptMode: TranscriptMode;
  maxToolRounds: number;
  argumentPolicy: ArgumentPolicy;
}

/**
 * Drives model turns and tool calls for one query until the model answers
 * without requesting tools.
 */
export class Conversation {
  private transcript: Message[] = [];

  constructor(
    private readonly model: ChatModel,
    private readonly router: ToolRouter,
    private readonly output: OutputSink,
    private readonly options: ConversationOptions
  ) {}

  get history(): readonly Message[] {
    return this.transcript;
  }

  reset(): void {
    this.transcript = [];
  }

  /**
   * Runs one query and returns the final assistant text. On failure the
   * transcript is restored to what it was before the query.
   */
  async processQuery(query: string): Promise<string> {
    if (this.options.transcriptMode === 'per-query') {
      this.reset();
    }
    const checkpoint = this.transcript.length;

    try {
      return await this.run(query);
    } catch (error) {
      this.transcript.splice(checkpoint);
      throw error;
    }
  }

  private async run(query: string): Promise<string> {
    if (this.transcript.length === 0 && this.options.systemPrompt) {
      this.transcript.push({ role: 'system', content: this.options.systemPrompt });
    }
    this.transcript.push({ role: 'user', content: query });

    let rounds = 0;
    for (;;) {
      const turn = await this.model.complete({ messages: [...this.transcript], tools: this.router.catalog() });

      if (turn.toolCalls.length > 0) {
        this.transcript.push({ role: 'assistant', content: turn.text, toolCalls: turn.toolCalls });
      } else if (turn.text) {
        this.transcript.push({ role: 'assistant', content: turn.text });
      }
      if (turn.text) {
        this.output(turn.text);
      }

      if (turn.toolCalls.length === 0) {
        return turn.text;
      }

      if (rounds === this.options.maxToolRounds) {
        throw new ChatError(
          `Stopped after ${rounds} tool rounds without a final answer`,
          ErrorCode.TOOL_ROUND_LIMIT,
          { pendingTools: turn.toolCalls.map(call => call.name) }
        );
      }
      rounds++;

      for (const call of turn.toolCalls) {
        await this.executeToolCall(call);
      }
    }
  }

  private async executeToolCall(call: ToolCallRequest): Promise<void> {
    this.output(`Calling tool ${call.name} with args ${call.arguments}`);

    const parsed = parseToolArguments(call.arguments);
    let args: Record<string, unknown>;
    if (parsed.ok) {
      args = parsed.value;
    } else if (this.options.argumentPolicy === 'abort') {
      throw new ToolError(
        `Invalid arguments for tool ${call.name}: ${parsed.error.message}`,
        call.name,
        undefined,
        ErrorCode.TOOL_INVALID_ARGS,
        { arguments: call.arguments }
      );
    } else {
      logger.warn(`Error parsing tool arguments for ${call.name}, calling with {}`, { reason: parsed.error.message });
      args = {};
    }

    const result = await this.router.dispatch(call.name, args);
    this.transcript.push({
      role: 'tool',
      toolCallId: call.id,
      toolName: call.name,
      content: formatToolContent(result)
    });
  }
}
