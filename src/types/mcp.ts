import type { jsonSchema } from 'ai';

export interface MCPServerConfig {
  name: string;
  command: string;
  args: string[];
  env?: { [key: string]: string };
}

// What to do when one backend fails to connect
export type ConnectionPolicy = 'skip' | 'abort';

export type ToolInputSchema = Parameters<typeof jsonSchema>[0];

export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
}

export interface PromptArgumentDescriptor {
  name: string;
  description?: string;
  required?: boolean;
}

export interface PromptDescriptor {
  name: string;
  description?: string;
  arguments: PromptArgumentDescriptor[];
}

export interface ResourceDescriptor {
  uri: string;
  name: string;
  description?: string;
  mimeType?: string;
}

export interface RegisteredServer {
  name: string;
  tools: ToolDescriptor[];
  prompts: PromptDescriptor[];
  resources: ResourceDescriptor[];
  resourceTemplates: string[];
}
