/**
 * Server and channel listing tool handlers.
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { RegisteredTool, ToolContext, ToolResult } from './types.js';
import { handleApiResult } from './types.js';
import type { ChannelKind } from '../types/gateway.js';
import { LISTED_CHANNEL_KINDS } from '../constants.js';

// ─────────────────────────────────────────────────────────────────────────────
// Schemas
// ─────────────────────────────────────────────────────────────────────────────

export const ListServersInputSchema = z.object({});

export const ListChannelsInputSchema = z.object({
  server: z.string().trim().min(1, 'Server cannot be empty'),
});

// ─────────────────────────────────────────────────────────────────────────────
// Tool Definitions
// ─────────────────────────────────────────────────────────────────────────────

const listServersToolDefinition: Tool = {
  name: 'list_servers',
  description: 'List all Discord servers (guilds) the bot has access to, with their IDs and member counts.',
  inputSchema: {
    type: 'object',
    properties: {},
    required: [],
  },
};

const listChannelsToolDefinition: Tool = {
  name: 'list_channels',
  description: 'List the text, voice and forum channels in a specific server. Server can be name or ID.',
  inputSchema: {
    type: 'object',
    properties: {
      server: {
        type: 'string',
        description: 'Server name or ID',
      },
    },
    required: ['server'],
  },
};

// ─────────────────────────────────────────────────────────────────────────────
// Handlers
// ─────────────────────────────────────────────────────────────────────────────

function isListedKind(kind: ChannelKind): boolean {
  return (LISTED_CHANNEL_KINDS as readonly ChannelKind[]).includes(kind);
}

async function handleListServers(
  _input: z.infer<typeof ListServersInputSchema>,
  ctx: ToolContext
): Promise<ToolResult> {
  const guilds = ctx.gateway.listGuilds();

  return {
    success: true,
    data: {
      message: `Connected to ${guilds.length} servers`,
      count: guilds.length,
      servers: guilds.map(guild => ({
        id: guild.id,
        name: guild.name,
        memberCount: guild.memberCount,
      })),
    },
  };
}

async function handleListChannels(
  input: z.infer<typeof ListChannelsInputSchema>,
  ctx: ToolContext
): Promise<ToolResult> {
  const server = ctx.resolver.resolveServer(input.server);

  return handleApiResult(server, guild => {
    const channels = ctx.gateway
      .listChannels(guild.id)
      .filter(channel => isListedKind(channel.kind))
      .map(channel => ({ id: channel.id, name: channel.name, type: channel.kind }));

    return {
      server: { id: guild.id, name: guild.name },
      count: channels.length,
      channels,
    };
  });
}

// ─────────────────────────────────────────────────────────────────────────────
// Exports
// ─────────────────────────────────────────────────────────────────────────────

export const listServersTool: RegisteredTool<typeof ListServersInputSchema> = {
  definition: listServersToolDefinition,
  schema: ListServersInputSchema,
  handler: handleListServers,
};

export const listChannelsTool: RegisteredTool<typeof ListChannelsInputSchema> = {
  definition: listChannelsToolDefinition,
  schema: ListChannelsInputSchema,
  handler: handleListChannels,
};

/** All server-related tools. */
export const serverTools = [
  listServersTool,
  listChannelsTool,
];
