import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { createLogger } from '../utils/logger.js';
import { ConfigError, getErrorMessage } from '../lib/errors.js';
import type { MCPServerConfig } from '../types/mcp.js';

const logger = createLogger('serverConfig');

export const DEFAULT_CONFIG_FILE = 'server_config.json';

const serverEntrySchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  env: z.record(z.string()).optional()
});

const serverConfigFileSchema = z.object({
  mcpServers: z.record(serverEntrySchema)
});

/**
 * Validates the parsed contents of a server configuration file. Entries keep
 * the order in which they appear in the file.
 */
export function parseServerConfig(raw: unknown, filePath = DEFAULT_CONFIG_FILE): MCPServerConfig[] {
  const parsed = serverConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(`Invalid server configuration in ${filePath}: ${issues.join('; ')}`, filePath, { issues });
  }

  return Object.entries(parsed.data.mcpServers).map(([name, entry]) => ({
    name,
    command: entry.command,
    args: entry.args,
    ...(entry.env ? { env: entry.env } : {})
  }));
}

export async function loadServerConfig(filePath = path.join(process.cwd(), DEFAULT_CONFIG_FILE)): Promise<MCPServerConfig[]> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw new ConfigError(`Cannot read server configuration ${filePath}: ${getErrorMessage(error)}`, filePath);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Server configuration ${filePath} is not valid JSON: ${getErrorMessage(error)}`, filePath);
  }

  const servers = parseServerConfig(raw, filePath);
  logger.debug('Server configuration loaded', { filePath, servers: servers.map(server => server.name) });
  return servers;
}
