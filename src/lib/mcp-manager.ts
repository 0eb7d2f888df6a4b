import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import type { GetPromptResult } from '@modelcontextprotocol/sdk/types.js';
import { createLogger } from '../utils/logger.js';
import {
  ChatError,
  ConnectionError,
  ErrorCode,
  fail,
  getErrorMessage,
  succeed,
  toError,
  ToolError,
  type Outcome
} from './errors.js';
import type {
  ConnectionPolicy,
  MCPServerConfig,
  PromptDescriptor,
  RegisteredServer,
  ResourceDescriptor,
  ToolDescriptor,
  ToolInputSchema
} from '../types/mcp.js';

const logger = createLogger('mcpManager');

export const CLIENT_INFO = { name: 'research-chat', version: '0.1.0' };

/**
 * Opens a connected MCP client for one configured backend.
 */
export type ClientConnector = (config: MCPServerConfig) => Promise<Client>;

export const stdioConnector: ClientConnector = async (config) => {
  const transport = new StdioClientTransport({
    command: config.command,
    args: config.args,
    env: {
      // Include existing environment (filter out undefined values)
      ...Object.fromEntries(
        Object.entries(process.env).filter((entry): entry is [string, string] => entry[1] !== undefined)
      ),
      // Override with config-specific env vars
      ...(config.env ?? {})
    },
    stderr: 'inherit'
  });

  const client = new Client(CLIENT_INFO, { capabilities: {} });
  await client.connect(transport);
  return client;
};

interface Indexed<T> {
  serverName: string;
  descriptor: T;
}

interface TemplateRoute {
  serverName: string;
  template: string;
  pattern: RegExp;
}

function isInputSchema(value: unknown): value is ToolInputSchema {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * `papers://{topic}` -> /^papers:\/\/([^/]+)$/
 */
export function templatePattern(template: string): RegExp {
  const source = template
    .split(/(\{[^}]+\})/)
    .map(part => (/^\{[^}]+\}$/.test(part) ? '([^/]+)' : part.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&')))
    .join('');
  return new RegExp(`^${source}$`);
}

/**
 * Session registry: the connected backends plus name -> owner indexes for
 * tools, prompts and resources. A name registered by a later backend replaces
 * the earlier owner.
 */
export class MCPManager {
  private clients: Map<string, Client> = new Map();
  private servers: Map<string, RegisteredServer> = new Map();
  private tools: Map<string, Indexed<ToolDescriptor>> = new Map();
  private prompts: Map<string, Indexed<PromptDescriptor>> = new Map();
  private resources: Map<string, Indexed<ResourceDescriptor>> = new Map();
  private templates: TemplateRoute[] = [];

  constructor(private readonly connector: ClientConnector = stdioConnector) {}

  async register(config: MCPServerConfig): Promise<Outcome<RegisteredServer, ConnectionError>> {
    if (this.servers.has(config.name)) {
      return fail(new ConnectionError(`Server "${config.name}" is already registered`, config.name));
    }

    let client: Client;
    try {
      client = await this.connector(config);
    } catch (error) {
      const err = toError(error);
      logger.error(`Failed to connect to MCP server ${config.name}`, err);
      return fail(new ConnectionError(`Failed to connect to ${config.name}: ${err.message}`, config.name, { cause: err.message }));
    }

    try {
      const registered = await this.describe(config.name, client);
      this.index(registered);
      this.clients.set(config.name, client);
      this.servers.set(config.name, registered);
      logger.info(`Connected to ${config.name} with tools: ${registered.tools.map(t => t.name).join(', ') || 'none'}`);
      return succeed(registered);
    } catch (error) {
      const err = toError(error);
      logger.error(`Failed to list capabilities of MCP server ${config.name}`, err);
      await this.closeClient(config.name, client);
      return fail(new ConnectionError(`Failed to initialize ${config.name}: ${err.message}`, config.name, { cause: err.message }));
    }
  }

  /**
   * Registers backends in order. Under 'skip' a failed backend is logged and
   * the rest proceed; under 'abort' the first failure is thrown.
   */
  async registerAll(
    configs: MCPServerConfig[],
    policy: ConnectionPolicy = 'skip'
  ): Promise<Outcome<RegisteredServer, ConnectionError>[]> {
    const outcomes: Outcome<RegisteredServer, ConnectionError>[] = [];
    for (const config of configs) {
      const outcome = await this.register(config);
      if (!outcome.ok) {
        if (policy === 'abort') {
          throw outcome.error;
        }
        logger.warn(`Skipping MCP server ${config.name}`, { reason: outcome.error.message });
      }
      outcomes.push(outcome);
    }
    return outcomes;
  }

  catalog(): ToolDescriptor[] {
    return Array.from(this.tools.values(), entry => entry.descriptor);
  }

  ownerOf(toolName: string): string | undefined {
    return this.tools.get(toolName)?.serverName;
  }

  getConnectedServers(): string[] {
    return Array.from(this.clients.keys());
  }

  async dispatch(toolName: string, args: Record<string, unknown>): Promise<unknown> {
    const entry = this.tools.get(toolName);
    if (!entry) {
      throw new ToolError(`No such tool: ${toolName}`, toolName, undefined, ErrorCode.TOOL_NOT_FOUND, {
        availableTools: Array.from(this.tools.keys())
      });
    }

    const client = this.requireClient(entry.serverName);
    logger.info('Calling tool on MCP client', { serverName: entry.serverName, toolName });
    logger.debug('Tool call arguments details', { serverName: entry.serverName, toolName, args });

    const startTime = Date.now();
    let result: unknown;
    try {
      result = await client.callTool({ name: toolName, arguments: args });
    } catch (error) {
      throw new ToolError(getErrorMessage(error), toolName, entry.serverName, ErrorCode.TOOL_EXECUTION_FAILED, {
        cause: toError(error)
      });
    }
    logger.info('Tool call completed', { serverName: entry.serverName, toolName, callTimeMs: Date.now() - startTime });
    return result;
  }

  listPrompts(): PromptDescriptor[] {
    return Array.from(this.prompts.values(), entry => entry.descriptor);
  }

  async getPrompt(name: string, args: Record<string, string>): Promise<GetPromptResult> {
    const entry = this.prompts.get(name);
    if (!entry) {
      throw new ChatError(`Prompt not found: ${name}`, ErrorCode.PROMPT_NOT_FOUND);
    }
    return this.requireClient(entry.serverName).getPrompt({ name, arguments: args });
  }

  listResources(): ResourceDescriptor[] {
    return Array.from(this.resources.values(), entry => entry.descriptor);
  }

  /**
   * Reads a resource and returns its text contents joined by newlines.
   */
  async readResource(uri: string): Promise<string> {
    const serverName = this.resources.get(uri)?.serverName
      ?? this.templates.find(route => route.pattern.test(uri))?.serverName;
    if (!serverName) {
      throw new ChatError(`Resource not found: ${uri}`, ErrorCode.RESOURCE_NOT_FOUND);
    }

    const result = await this.requireClient(serverName).readResource({ uri });
    return result.contents
      .map(content => ('text' in content && typeof content.text === 'string' ? content.text : `[binary content: ${content.uri}]`))
      .join('\n');
  }

  async disconnectFromServer(serverName: string): Promise<void> {
    const client = this.clients.get(serverName);
    if (!client) return;
    await this.closeClient(serverName, client);
    this.clients.delete(serverName);
    this.servers.delete(serverName);

    const indexes: Map<string, { serverName: string }>[] = [this.tools, this.prompts, this.resources];
    for (const index of indexes) {
      for (const [key, entry] of index) {
        if (entry.serverName === serverName) index.delete(key);
      }
    }
    this.templates = this.templates.filter(route => route.serverName !== serverName);
  }

  /**
   * Releases every connection. Safe to call more than once.
   */
  async close(): Promise<void> {
    for (const serverName of this.getConnectedServers()) {
      await this.disconnectFromServer(serverName);
    }
  }

  private requireClient(serverName: string): Client {
    const client = this.clients.get(serverName);
    if (!client) {
      throw new ChatError(`Not connected to server: ${serverName}`, ErrorCode.CONNECTION_FAILED);
    }
    return client;
  }

  private async closeClient(serverName: string, client: Client): Promise<void> {
    try {
      await client.close();
      logger.info(`Disconnected from MCP server: ${serverName}`);
    } catch (error) {
      logger.error(`Error disconnecting from ${serverName}`, toError(error));
    }
  }

  private async describe(name: string, client: Client): Promise<RegisteredServer> {
    const capabilities = client.getServerCapabilities();

    const tools: ToolDescriptor[] = [];
    if (capabilities?.tools) {
      const { tools: listed } = await client.listTools();
      for (const tool of listed) {
        tools.push({
          name: tool.name,
          description: tool.description ?? `Tool ${tool.name} from ${name}`,
          inputSchema: isInputSchema(tool.inputSchema) ? tool.inputSchema : { type: 'object', properties: {} }
        });
      }
    }

    const prompts: PromptDescriptor[] = [];
    if (capabilities?.prompts) {
      const { prompts: listed } = await client.listPrompts();
      for (const prompt of listed) {
        prompts.push({
          name: prompt.name,
          description: prompt.description,
          arguments: (prompt.arguments ?? []).map(arg => ({
            name: arg.name,
            description: arg.description,
            required: arg.required
          }))
        });
      }
    }

    const resources: ResourceDescriptor[] = [];
    const resourceTemplates: string[] = [];
    if (capabilities?.resources) {
      const { resources: listed } = await client.listResources();
      for (const resource of listed) {
        resources.push({
          uri: resource.uri,
          name: resource.name,
          description: resource.description,
          mimeType: resource.mimeType
        });
      }
      const { resourceTemplates: templates } = await client.listResourceTemplates();
      resourceTemplates.push(...templates.map(template => template.uriTemplate));
    }

    return { name, tools, prompts, resources, resourceTemplates };
  }

  private index(server: RegisteredServer): void {
    for (const descriptor of server.tools) {
      const previous = this.tools.get(descriptor.name);
      if (previous) {
        logger.warn(`Tool "${descriptor.name}" from ${server.name} replaces the one from ${previous.serverName}`);
        // Re-insert so catalog order follows registration order
        this.tools.delete(descriptor.name);
      }
      this.tools.set(descriptor.name, { serverName: server.name, descriptor });
    }

    for (const descriptor of server.prompts) {
      this.prompts.set(descriptor.name, { serverName: server.name, descriptor });
    }

    for (const descriptor of server.resources) {
      this.resources.set(descriptor.uri, { serverName: server.name, descriptor });
    }

    for (const template of server.resourceTemplates) {
      // Later backends are consulted first
      this.templates.unshift({ serverName: server.name, template, pattern: templatePattern(template) });
    }
  }
}
