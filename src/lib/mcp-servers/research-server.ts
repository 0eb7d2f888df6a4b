/**
 * Research Papers MCP Server
 * Exposes arXiv search and the local paper cache as tools, two Markdown
 * resources and one prompt template. Runs over stdio.
 */

import * as path from 'node:path';
import { McpServer, ResourceTemplate } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { createLogger } from '../../utils/logger.js';
import { getErrorMessage, toError } from '../errors.js';
import { createArxivSearch } from '../arxiv-client.js';
import { PaperStore } from '../paper-store.js';
import { buildSearchPrompt, DEFAULT_MAX_RESULTS, ResearchTools } from '../research-tools.js';

const logger = createLogger('researchServer');

export const SERVER_NAME = 'research';
export const SERVER_VERSION = '0.1.0';
export const DEFAULT_PAPER_DIR = 'papers';

function textResult(value: unknown): CallToolResult {
  return {
    content: [
      {
        type: "text",
        text: typeof value === 'string' ? value : JSON.stringify(value, null, 2)
      }
    ]
  };
}

function errorResult(toolName: string, error: unknown): CallToolResult {
  logger.error(`Error in ${toolName}`, toError(error));
  return {
    content: [{ type: "text", text: `Error in ${toolName}: ${getErrorMessage(error)}` }],
    isError: true
  };
}

export function createResearchServer(tools: ResearchTools): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION
  }, {
    capabilities: {
      tools: {},
      resources: {},
      prompts: {}
    }
  });

  // === TOOLS ===
  server.tool(
    "search_papers",
    "Search for papers on arXiv based on a topic and store their information.",
    {
      topic: z.string().describe("The topic to search for"),
      max_results: z.number().int().min(1).default(DEFAULT_MAX_RESULTS).describe("Maximum number of results to retrieve (default: 5)")
    },
    async ({ topic, max_results }) => {
      try {
        return textResult(await tools.searchPapers(topic, max_results));
      } catch (error) {
        return errorResult('search_papers', error);
      }
    }
  );

  server.tool(
    "extract_info",
    "Search for information about a specific paper across all topic directories.",
    {
      paper_id: z.string().describe("The ID of the paper to look for")
    },
    async ({ paper_id }) => {
      try {
        return textResult(await tools.extractInfo(paper_id));
      } catch (error) {
        return errorResult('extract_info', error);
      }
    }
  );

  server.tool(
    "list_topics",
    "List all available research topics that have been searched.",
    async () => {
      try {
        return textResult(await tools.listTopics());
      } catch (error) {
        return errorResult('list_topics', error);
      }
    }
  );

  server.tool(
    "get_paper_count",
    "Get the count of papers for a specific topic or all topics.",
    {
      topic: z.string().optional().describe("The topic to count papers for (omit to count all topics)")
    },
    async ({ topic }) => {
      try {
        return textResult(await tools.getPaperCount(topic));
      } catch (error) {
        return errorResult('get_paper_count', error);
      }
    }
  );

  // === RESOURCES ===
  server.resource(
    "folders",
    "papers://folders",
    { description: "List of available topic folders", mimeType: "text/markdown" },
    async (uri) => ({
      contents: [{ uri: uri.href, mimeType: "text/markdown", text: await tools.renderFolderIndex() }]
    })
  );

  server.resource(
    "topic-papers",
    new ResourceTemplate("papers://{topic}", { list: undefined }),
    { description: "Papers stored for one topic", mimeType: "text/markdown" },
    async (uri, variables) => {
      const raw = variables.topic;
      const topic = decodeURIComponent(Array.isArray(raw) ? raw.join(' ') : raw);
      return {
        contents: [{ uri: uri.href, mimeType: "text/markdown", text: await tools.renderTopicPapers(topic) }]
      };
    }
  );

  // === PROMPTS ===
  server.prompt(
    "generate_search_prompt",
    "Generate a prompt to find and discuss academic papers on a specific topic.",
    {
      topic: z.string().describe("The research topic"),
      num_papers: z.string().optional().describe("How many papers to search for (default: 5)")
    },
    ({ topic, num_papers }) => {
      const parsed = num_papers ? Number.parseInt(num_papers, 10) : NaN;
      const count = Number.isInteger(parsed) && parsed > 0 ? parsed : DEFAULT_MAX_RESULTS;
      return {
        messages: [
          {
            role: "user",
            content: { type: "text", text: buildSearchPrompt(topic, count) }
          }
        ]
      };
    }
  );

  return server;
}

/**
 * Starts the server on stdin/stdout. Resolves once connected; the process then
 * lives until the client closes the pipe.
 */
export async function runResearchServer(paperDir = process.env.PAPER_DIR || DEFAULT_PAPER_DIR): Promise<McpServer> {
  logger.info('Starting Research Papers MCP Server...', { paperDir });

  const store = new PaperStore(path.resolve(process.cwd(), paperDir));
  const server = createResearchServer(new ResearchTools(store, createArxivSearch(), paperDir));

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info('Research Papers MCP Server started');

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down Research Papers MCP Server...`);
    server.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Error during shutdown', toError(error));
        process.exit(1);
      }
    );
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  return server;
}
