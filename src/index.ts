#!/usr/bin/env node
/**
 * Entry point. Without flags, connects to the servers in server_config.json
 * and starts the chat; with `--server`, runs the research MCP server on stdio.
 */

// Must load before anything that reads the environment or logs
import "./env.js";
import "./instrument.js";

import * as Sentry from "@sentry/node";
import * as path from 'node:path';
import { createLogger } from './utils/logger.js';
import { setupGlobalErrorHandlers } from './utils/errorHandler.js';
import { loadServerConfig } from './config/server-config.js';
import { createAppContext, withAppContext } from './lib/app-context.js';
import { runChat } from './cli/chat.js';
import { runResearchServer } from './lib/mcp-servers/research-server.js';
import { getErrorMessage, toError } from './lib/errors.js';

const logger = createLogger('main');

setupGlobalErrorHandlers();

async function main(argv: string[]): Promise<void> {
  if (argv.includes('--server')) {
    await runResearchServer();
    return;
  }

  const configIndex = argv.indexOf('--config');
  const configPath = configIndex >= 0 ? argv[configIndex + 1] : undefined;
  const servers = await loadServerConfig(configPath ? path.resolve(configPath) : undefined);

  await withAppContext(
    () => createAppContext({ servers }),
    context => runChat(context)
  );
}

// Run the main function
(async () => {
  await main(process.argv.slice(2)).catch((error: unknown) => {
    logger.error('Fatal error', toError(error));
    console.error(`Error: ${getErrorMessage(error)}`);
    process.exitCode = 1;
  });
  await Sentry.flush(2000);
})();
