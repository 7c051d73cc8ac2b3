/**
 * MCP Server implementation for Discord.
 * Exposes tools for sending, reading, searching and reacting to messages,
 * plus a status resource.
 */

import { createRequire } from 'module';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';

const require = createRequire(import.meta.url);
const pkg = require('../package.json') as { version: string };
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ListResourcesRequestSchema,
  ReadResourceRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { DiscordGateway, createDiscordClient } from './api/discord-gateway.js';
import { Resolver } from './resolver/resolver.js';
import { MentionTranscoder } from './mentions/transcoder.js';
import { loadConfig } from './utils/config.js';

// Tool registry
import { getToolDefinitions, invokeTool } from './tools/registry.js';
import type { ToolContext } from './tools/types.js';

// Types
import { ErrorCode, createError, type McpError } from './types/errors.js';
import type { PlatformGateway } from './types/gateway.js';

const STATUS_RESOURCE_URI = 'discord://status';

// ─────────────────────────────────────────────────────────────────────────────
// MCP Server Class
// ─────────────────────────────────────────────────────────────────────────────

/**
 * MCP Server for Discord integration.
 *
 * Owns the resolver (and so its cache) for as long as the server lives.
 * Every tool call goes through the same gateway session.
 */
export class DiscordMcpServer {
  private readonly ctx: ToolContext;

  constructor(private readonly gateway: PlatformGateway) {
    const resolver = new Resolver(gateway);
    this.ctx = {
      gateway,
      resolver,
      mentions: new MentionTranscoder(gateway, resolver),
    };
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Response Formatting
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Returns a standard MCP error response.
   */
  private formatError(error: McpError) {
    return {
      content: [
        {
          type: 'text' as const,
          text: JSON.stringify({
            success: false,
            error: error.message,
            errorCode: error.code,
            retryable: error.retryable,
            suggestions: error.suggestions,
            candidates: error.candidates,
          }, null, 2),
        },
      ],
      isError: true,
    };
  }

  /**
   * Returns a standard MCP success response.
   */
  private formatSuccess(data: Record<string, unknown>) {
    return {
      content: [
        {
          type: 'text' as const,
          text: JSON.stringify({ success: true, ...data }, null, 2),
        },
      ],
    };
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Server Creation
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Creates and configures the MCP server.
   */
  createServer(): Server {
    const server = new Server(
      {
        name: 'discord-mcp',
        version: pkg.version,
      },
      {
        capabilities: {
          tools: {},
          resources: {},
        },
      }
    );

    // Handle resource listing
    server.setRequestHandler(ListResourcesRequestSchema, async () => {
      return {
        resources: [
          {
            uri: STATUS_RESOURCE_URI,
            name: 'Connection Status',
            description: 'Whether the Discord session is ready, the bot user, and how many servers it can see',
            mimeType: 'application/json',
          },
        ],
      };
    });

    // Handle resource reading
    server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
      const { uri } = request.params;

      if (uri !== STATUS_RESOURCE_URI) {
        throw new Error(`Unknown resource: ${uri}`);
      }

      const status = {
        ready: this.gateway.isReady(),
        botUser: this.gateway.getBotUserTag(),
        servers: this.gateway.listGuilds().length,
      };

      return {
        contents: [
          {
            uri,
            mimeType: 'application/json',
            text: JSON.stringify(status, null, 2),
          },
        ],
      };
    });

    // Handle tool listing
    server.setRequestHandler(ListToolsRequestSchema, async () => {
      return { tools: getToolDefinitions() };
    });

    // Handle tool calls; no failure here may take the session down
    server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;

      if (!this.gateway.isReady()) {
        return this.formatError(createError(
          ErrorCode.NOT_READY,
          'The Discord session is not connected yet.'
        ));
      }

      try {
        const result = await invokeTool(name, args, this.ctx);

        if (result.success) {
          return this.formatSuccess(result.data);
        }
        return this.formatError(result.error);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[tools] '${name}' failed: ${message}`);

        return this.formatError(createError(
          ErrorCode.UNKNOWN,
          message,
          { retryable: false }
        ));
      }
    });

    return server;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Exports
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates an MCP server over an existing gateway.
 */
export function createServer(gateway: PlatformGateway): Server {
  return new DiscordMcpServer(gateway).createServer();
}

/**
 * Connects to Discord, then serves MCP over stdio.
 */
export async function runServer(): Promise<void> {
  const config = loadConfig();
  if (!config.ok) {
    throw new Error(config.error.message);
  }

  const gateway = new DiscordGateway(createDiscordClient());
  await gateway.connect(config.value.discordToken, {
    prefetchMembers: config.value.prefetchMembers,
  });
  console.error('[server] Discord ready - starting MCP server...');

  const server = createServer(gateway);
  const transport = new StdioServerTransport();

  server.onclose = async () => {
    await gateway.disconnect();
  };

  await server.connect(transport);

  // Handle shutdown signals
  const shutdown = async () => {
    await gateway.disconnect();
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}
