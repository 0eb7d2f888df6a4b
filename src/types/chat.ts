export interface ToolCallRequest {
  id: string;
  name: string;
  // Raw JSON text as produced by the model
  arguments: string;
}

export type Message =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string; toolCalls?: ToolCallRequest[] }
  | { role: 'tool'; content: string; toolCallId: string; toolName: string };

export interface ModelTurn {
  text: string;
  toolCalls: ToolCallRequest[];
}

export type TranscriptMode = 'per-query' | 'session';

// What to do with a tool call whose argument text is not a JSON object
export type ArgumentPolicy = 'empty' | 'abort';

export type OutputSink = (text: string) => void;
