/**
 * Vercel MCP API Route
 * Exposes the interview agenda tools via Vercel's serverless functions
 */

import { createMcpHandler } from '@vercel/mcp-adapter';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { VercelRequest, VercelResponse } from '@vercel/node';

import { SchedulingService } from '../src/services/scheduling-service.js';
import { loadConfig } from '../src/utils/config.js';
import { createLogger } from '../src/utils/logger.js';
import {
  TOOL_DESCRIPTIONS,
  createToolHandlers,
  type ToolHandler,
} from '../src/tools/index.js';
import {
  ParseAvailabilityInputSchema,
  FindInterviewAgendasInputSchema,
  ValidateAgendaInputSchema,
} from '../src/schemas/tool-inputs.js';

const logger = createLogger('MCP');

// Promise memoization: concurrent cold-start requests share one initialization
let handlersPromise: Promise<Record<string, ToolHandler>> | null = null;

function getToolHandlers(): Promise<Record<string, ToolHandler>> {
  if (!handlersPromise) {
    handlersPromise = (async () => {
      const config = loadConfig();
      logger.info(`Config loaded - timezone: ${config.policy.timezone}`);
      return createToolHandlers(new SchedulingService(config.policy, config.limits));
    })();
  }
  return handlersPromise;
}

async function callTool(name: keyof typeof TOOL_DESCRIPTIONS, args: unknown, signal?: AbortSignal) {
  const handlers = await getToolHandlers();
  const handler = handlers[name];
  if (!handler) {
    return { content: [{ type: 'text' as const, text: `Unknown tool: ${name}` }], isError: true };
  }
  return handler(args, { signal });
}

// Create the MCP handler with all tools
const handler = createMcpHandler(
  (server: McpServer) => {
    server.tool(
      'parse_availability',
      TOOL_DESCRIPTIONS.parse_availability,
      ParseAvailabilityInputSchema.shape,
      async (args: Record<string, unknown>, extra: { signal?: AbortSignal }) =>
        callTool('parse_availability', args, extra.signal)
    );

    server.tool(
      'find_interview_agendas',
      TOOL_DESCRIPTIONS.find_interview_agendas,
      FindInterviewAgendasInputSchema.shape,
      async (args: Record<string, unknown>, extra: { signal?: AbortSignal }) =>
        callTool('find_interview_agendas', args, extra.signal)
    );

    server.tool(
      'validate_agenda',
      TOOL_DESCRIPTIONS.validate_agenda,
      ValidateAgendaInputSchema.shape,
      async (args: Record<string, unknown>, extra: { signal?: AbortSignal }) =>
        callTool('validate_agenda', args, extra.signal)
    );
  },
  {
    capabilities: {
      tools: {},
    },
  },
  {
    // Endpoints: /api/mcp (streamable HTTP), /api/sse and /api/message (SSE)
    basePath: '/api',
    maxDuration: 60,
    verboseLogs: false,
  }
);

export const config = {
  maxDuration: 60,
};

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

export default async function (req: VercelRequest, res: VercelResponse) {
  logger.debug(`Request received: ${req.method} ${req.url}`);

  // Health check endpoint
  if (req.url === '/api/mcp/health' || req.query?.health === 'true') {
    return res.status(200).json({ status: 'ok', timestamp: new Date().toISOString() });
  }

  // Convert Vercel req to Web Request
  const protocol = headerValue(req.headers['x-forwarded-proto']) ?? 'https';
  const host = headerValue(req.headers['x-forwarded-host']) ?? req.headers.host ?? 'localhost';
  const url = `${protocol}://${host}${req.url ?? ''}`;

  // Convert Node.js headers to Web API headers
  const headers = new Headers();
  for (const [key, value] of Object.entries(req.headers)) {
    if (value) {
      if (Array.isArray(value)) {
        value.forEach(v => headers.append(key, v));
      } else {
        headers.set(key, value);
      }
    }
  }

  const webRequest = new Request(url, {
    method: req.method,
    headers,
    body: req.method !== 'GET' && req.method !== 'HEAD' ? JSON.stringify(req.body) : undefined,
  });

  try {
    const webResponse = await handler(webRequest);

    // Convert Web Response to Vercel res
    res.status(webResponse.status);
    webResponse.headers.forEach((value, key) => {
      res.setHeader(key, value);
    });

    const body = await webResponse.text();
    logger.debug(`Handler returned status ${webResponse.status}, ${body.length} byte(s)`);
    return res.send(body);
  } catch (error) {
    logger.error('Handler error:', error);
    return res.status(500).json({
      error: 'Internal server error',
      message: error instanceof Error ? error.message : 'Unknown error',
    });
  }
}
