#!/usr/bin/env node
/**
 * Interview Agenda MCP Server
 * Main entry point for the Model Context Protocol server
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ListResourcesRequestSchema,
  ReadResourceRequestSchema,
  ListPromptsRequestSchema,
  GetPromptRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

import { getConfig } from './utils/config.js';
import { SchedulerError, formatErrorForMCP, wrapError } from './utils/error.js';
import { createLogger } from './utils/logger.js';
import { getSchedulingService } from './services/scheduling-service.js';
import { toolDefinitions, createToolHandlers } from './tools/index.js';
import { resourceDefinitions, createResourceHandlers } from './resources/index.js';
import { promptDefinitions, createPromptHandlers } from './prompts/index.js';

const logger = createLogger('interview-agenda');

/**
 * Create and configure the MCP server
 */
function createServer(): Server {
  // Load configuration
  const config = getConfig();
  logger.info(
    `Default policy: ${config.policy.timezone}, ${config.policy.gridQuantumMinutes}-minute grid, ` +
      `${config.policy.maxAgendasPerDay} agenda(s) per day`
  );

  const schedulingService = getSchedulingService();

  const toolHandlers = createToolHandlers(schedulingService);
  const resourceHandlers = createResourceHandlers(schedulingService);
  const promptHandlers = createPromptHandlers();

  // Create MCP server
  const server = new Server(
    {
      name: config.server.name,
      version: config.server.version,
    },
    {
      capabilities: {
        tools: {},
        resources: {},
        prompts: {},
      },
    }
  );

  // Register tool list handler
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: toolDefinitions.map(tool => ({
        name: tool.name,
        description: tool.description,
        inputSchema: tool.inputSchema,
      })),
    };
  });

  // Register tool call handler
  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const { name, arguments: args } = request.params;

    const handler = toolHandlers[name];
    if (!handler) {
      return {
        content: [
          {
            type: 'text',
            text: `Unknown tool: ${name}. Available tools: ${Object.keys(toolHandlers).join(', ')}`,
          },
        ],
        isError: true,
      };
    }

    try {
      return await handler(args ?? {}, { signal: extra.signal });
    } catch (error) {
      logger.error(`Error executing tool ${name}:`, error);

      // Handle Zod validation errors
      if (error instanceof z.ZodError) {
        const issues = error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
        return {
          content: [
            {
              type: 'text',
              text: `Validation error: ${issues}`,
            },
          ],
          isError: true,
        };
      }

      const schedulerError = error instanceof SchedulerError
        ? error
        : wrapError(error, { operation: name });
      return {
        content: [
          {
            type: 'text',
            text: formatErrorForMCP(schedulerError),
          },
        ],
        isError: true,
      };
    }
  });

  // Register resource list handler
  server.setRequestHandler(ListResourcesRequestSchema, async () => {
    return {
      resources: resourceDefinitions.map(resource => ({
        uri: resource.uri,
        name: resource.name,
        description: resource.description,
        mimeType: resource.mimeType,
      })),
    };
  });

  // Register resource read handler
  server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
    const { uri } = request.params;

    const handler = resourceHandlers[uri];
    if (handler) {
      return handler();
    }

    return {
      contents: [{
        uri,
        mimeType: 'text/plain',
        text: `Unknown resource: ${uri}`,
      }],
    };
  });

  // Register prompt list handler
  server.setRequestHandler(ListPromptsRequestSchema, async () => {
    return {
      prompts: promptDefinitions.map(prompt => ({
        name: prompt.name,
        description: prompt.description,
        arguments: prompt.arguments,
      })),
    };
  });

  // Register prompt get handler
  server.setRequestHandler(GetPromptRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    const handler = promptHandlers[name];
    if (!handler) {
      return {
        description: 'Unknown prompt',
        messages: [{
          role: 'user',
          content: {
            type: 'text',
            text: `Unknown prompt: ${name}. Available prompts: ${Object.keys(promptHandlers).join(', ')}`,
          },
        }],
      };
    }

    return handler(args ?? {});
  });

  return server;
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  logger.info('Starting Interview Agenda MCP server...');

  const server = createServer();
  const transport = new StdioServerTransport();

  await server.connect(transport);
  logger.info('Server running on stdio transport');

  const shutdown = (): void => {
    logger.info('Shutting down...');
    server.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Error while closing server:', error);
        process.exit(1);
      }
    );
  };

  // Handle graceful shutdown
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

// Run the server
main().catch((error) => {
  logger.error('Failed to start server:', error);
  process.exit(1);
});
