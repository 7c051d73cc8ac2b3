/**
 * Messaging-related tool handlers.
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { RegisteredTool, ToolContext, ToolResult } from './types.js';
import { handleApiResult } from './types.js';
import type { ChannelInfo, GuildInfo, MessageInfo } from '../types/gateway.js';
import { ErrorCode, createError } from '../types/errors.js';
import { err, map } from '../types/result.js';
import { isIdentifier, parseTarget } from '../resolver/target.js';
import { withMessage } from '../api/message-locator.js';
import { formatHumanReadableDate, formatTimestamp } from '../utils/formatters.js';
import {
  DEFAULT_READ_LIMIT,
  DEFAULT_SEARCH_LIMIT,
  MAX_READ_LIMIT,
  MAX_SEARCH_LIMIT,
} from '../constants.js';

// ─────────────────────────────────────────────────────────────────────────────
// Schemas
// ─────────────────────────────────────────────────────────────────────────────

export const SendMessageInputSchema = z.object({
  message: z.string().min(1, 'Message content cannot be empty'),
  target: z.string().trim().min(1, 'Target cannot be empty'),
});

export const EditMessageInputSchema = z.object({
  message_id: z.string().trim(),
  message: z.string().optional(),
});

export const ReadMessagesInputSchema = z.object({
  channel: z.string().trim().min(1, 'Channel cannot be empty'),
  limit: z.number().int().min(1).optional(),
});

export const SearchMessagesInputSchema = z.object({
  channel: z.string().trim().min(1, 'Channel cannot be empty'),
  query: z.string().min(1, 'Search query cannot be empty'),
  limit: z.number().int().min(1).optional(),
});

export const AddReactionInputSchema = z.object({
  message_id: z.string().trim(),
  emoji: z.string().trim().min(1, 'Emoji cannot be empty'),
});

// ─────────────────────────────────────────────────────────────────────────────
// Tool Definitions
// ─────────────────────────────────────────────────────────────────────────────

const sendMessageToolDefinition: Tool = {
  name: 'send_message',
  description: "Send a message to a Discord channel or user DM. Target can be a channel name, channel ID, username, or user ID. For ambiguous channel names (like 'general'), use 'ServerName/channel' format. Mention people with @username; they are converted to real Discord mentions.",
  inputSchema: {
    type: 'object',
    properties: {
      message: {
        type: 'string',
        description: 'The message content to send',
      },
      target: {
        type: 'string',
        description: "Channel name/ID or username/ID. Examples: 'general', 'MyServer/general', '@username', or snowflake IDs. Use 'ServerName/channel' for ambiguous channels.",
      },
    },
    required: ['message', 'target'],
  },
};

const editMessageToolDefinition: Tool = {
  name: 'edit_message',
  description: 'Edit or delete a message. If message is empty/blank, the message will be deleted. Message ID must be exact.',
  inputSchema: {
    type: 'object',
    properties: {
      message_id: {
        type: 'string',
        description: 'The ID of the message to edit/delete',
      },
      message: {
        type: 'string',
        description: 'New message content. Leave empty to delete the message.',
      },
    },
    required: ['message_id'],
  },
};

const readMessagesToolDefinition: Tool = {
  name: 'read_messages',
  description: "Read recent messages from a channel. Returns channel info and message history, oldest first. Channel can be name or ID. For ambiguous names, use 'ServerName/channel' format.",
  inputSchema: {
    type: 'object',
    properties: {
      channel: {
        type: 'string',
        description: "Channel name or ID. Examples: 'general', 'MyServer/general', or snowflake ID. Use 'ServerName/channel' for ambiguous channels.",
      },
      limit: {
        type: 'number',
        description: `Maximum number of messages to retrieve (default: ${DEFAULT_READ_LIMIT}, max: ${MAX_READ_LIMIT})`,
        default: DEFAULT_READ_LIMIT,
      },
    },
    required: ['channel'],
  },
};

const searchMessagesToolDefinition: Tool = {
  name: 'search_messages',
  description: "Search for messages containing specific text in a channel. Channel can be name or ID. For ambiguous names, use 'ServerName/channel' format.",
  inputSchema: {
    type: 'object',
    properties: {
      channel: {
        type: 'string',
        description: "Channel name or ID. Examples: 'general', 'MyServer/general', or snowflake ID",
      },
      query: {
        type: 'string',
        description: 'Search query text (case-insensitive)',
      },
      limit: {
        type: 'number',
        description: `Maximum number of recent messages to search through (default: ${DEFAULT_SEARCH_LIMIT}, max: ${MAX_SEARCH_LIMIT})`,
        default: DEFAULT_SEARCH_LIMIT,
      },
    },
    required: ['channel', 'query'],
  },
};

const addReactionToolDefinition: Tool = {
  name: 'add_reaction',
  description: 'Add a reaction emoji to a message. Message ID must be exact.',
  inputSchema: {
    type: 'object',
    properties: {
      message_id: {
        type: 'string',
        description: 'The ID of the message to react to',
      },
      emoji: {
        type: 'string',
        description: 'Emoji to react with (Unicode emoji or custom emoji as name:id)',
      },
    },
    required: ['message_id', 'emoji'],
  },
};

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

/** A blank replacement text means the message should be deleted. */
export function isDeleteRequest(content: string | undefined): boolean {
  return content === undefined || content.trim() === '';
}

function invalidMessageId(messageId: string): ToolResult {
  return {
    success: false,
    error: createError(
      ErrorCode.INVALID_INPUT,
      `'${messageId}' is not a valid message ID. Message IDs must be 17-20 digit numbers.`
    ),
  };
}

/** The server a channel or message belongs to, if any. */
function owningGuild(ctx: ToolContext, guildId: string | null): GuildInfo | undefined {
  return guildId === null ? undefined : ctx.gateway.getGuild(guildId);
}

/**
 * Formats messages for output, oldest first, with mentions made readable.
 * History arrives newest first from Discord.
 */
async function formatHistory(ctx: ToolContext, newestFirst: MessageInfo[]) {
  const oldestFirst = [...newestFirst].reverse();
  return Promise.all(oldestFirst.map(async message => ({
    id: message.id,
    author: message.authorName,
    authorId: message.authorId,
    timestamp: formatTimestamp(message.createdAt),
    when: formatHumanReadableDate(message.createdAt),
    content: await ctx.mentions.humanize(message.content),
  })));
}

function describeChannel(channel: ChannelInfo) {
  return {
    id: channel.id,
    name: channel.name,
    type: channel.kind,
    topic: channel.topic ?? undefined,
    server: channel.guildName ?? undefined,
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Handlers
// ─────────────────────────────────────────────────────────────────────────────

async function handleSendMessage(
  input: z.infer<typeof SendMessageInputSchema>,
  ctx: ToolContext
): Promise<ToolResult> {
  const target = parseTarget(input.target);

  let scope: GuildInfo | undefined;
  if (target.scope !== undefined) {
    const server = ctx.resolver.resolveServer(target.scope);
    if (!server.ok) {
      return { success: false, error: server.error };
    }
    scope = server.value;
  }

  // Channels first
  const channel = ctx.resolver.resolveChannel(target.reference, scope);
  if (channel.ok) {
    const content = await ctx.mentions.encode(input.message, owningGuild(ctx, channel.value.guildId));
    const sent = await ctx.gateway.sendMessage(channel.value.id, content);
    return handleApiResult(sent, message => ({
      message: `Message sent to #${channel.value.name} in ${channel.value.guildName ?? 'a direct message'}`,
      messageId: message.id,
      channelId: channel.value.id,
      server: channel.value.guildName ?? undefined,
    }));
  }

  // An ambiguous channel name says nothing about whether the target is a user
  if (channel.error.code === ErrorCode.AMBIGUOUS) {
    return { success: false, error: channel.error };
  }

  const user = await ctx.resolver.resolveUser(target.reference, scope);
  if (user.ok) {
    const content = await ctx.mentions.encode(input.message, scope);
    const sent = await ctx.gateway.sendDirectMessage(user.value.id, content);
    return handleApiResult(sent, message => ({
      message: `DM sent to ${user.value.username}`,
      messageId: message.id,
      userId: user.value.id,
    }));
  }

  return {
    success: false,
    error: createError(
      ErrorCode.NOT_FOUND,
      `Could not find channel or user '${input.target}'.\n\n` +
        `Channel lookup failed: ${channel.error.message}\n\n` +
        `User lookup failed: ${user.error.message}`,
      { suggestions: [...channel.error.suggestions, ...user.error.suggestions] }
    ),
  };
}

async function handleEditMessage(
  input: z.infer<typeof EditMessageInputSchema>,
  ctx: ToolContext
): Promise<ToolResult> {
  const messageId = input.message_id;
  if (!isIdentifier(messageId)) {
    return invalidMessageId(messageId);
  }

  const result = await withMessage(ctx.gateway, messageId, async message => {
    if (isDeleteRequest(input.message)) {
      const deleted = await ctx.gateway.deleteMessage(message.channelId, message.id);
      return map(deleted, () => ({
        message: `Message ${messageId} deleted successfully from #${message.channelName}`,
        action: 'deleted',
        messageId,
        channelId: message.channelId,
      }));
    }

    const content = await ctx.mentions.encode(input.message ?? '', owningGuild(ctx, message.guildId));
    const edited = await ctx.gateway.editMessage(message.channelId, message.id, content);
    return map(edited, () => ({
      message: `Message ${messageId} edited successfully in #${message.channelName}`,
      action: 'edited',
      messageId,
      channelId: message.channelId,
    }));
  });

  return handleApiResult(result, data => data);
}

async function handleReadMessages(
  input: z.infer<typeof ReadMessagesInputSchema>,
  ctx: ToolContext
): Promise<ToolResult> {
  const limit = Math.min(input.limit ?? DEFAULT_READ_LIMIT, MAX_READ_LIMIT);

  const channel = ctx.resolver.resolveTarget(input.channel);
  if (!channel.ok) {
    return { success: false, error: channel.error };
  }

  const history = await ctx.gateway.fetchMessages(channel.value.id, limit);
  if (!history.ok) {
    return { success: false, error: history.error };
  }

  const messages = await formatHistory(ctx, history.value);
  return {
    success: true,
    data: {
      channel: describeChannel(channel.value),
      count: messages.length,
      messages,
    },
  };
}

async function handleSearchMessages(
  input: z.infer<typeof SearchMessagesInputSchema>,
  ctx: ToolContext
): Promise<ToolResult> {
  const limit = Math.min(input.limit ?? DEFAULT_SEARCH_LIMIT, MAX_SEARCH_LIMIT);
  const query = input.query.toLowerCase();

  const channel = ctx.resolver.resolveTarget(input.channel);
  if (!channel.ok) {
    return { success: false, error: channel.error };
  }

  const history = await ctx.gateway.fetchMessages(channel.value.id, limit);
  if (!history.ok) {
    return { success: false, error: history.error };
  }

  const matching = history.value.filter(message => message.content.toLowerCase().includes(query));
  const messages = await formatHistory(ctx, matching);
  return {
    success: true,
    data: {
      message: messages.length === 0
        ? `No messages found containing '${input.query}' in #${channel.value.name}`
        : `Found ${messages.length} messages containing '${input.query}' in #${channel.value.name}`,
      channel: describeChannel(channel.value),
      searched: history.value.length,
      count: messages.length,
      messages,
    },
  };
}

async function handleAddReaction(
  input: z.infer<typeof AddReactionInputSchema>,
  ctx: ToolContext
): Promise<ToolResult> {
  const messageId = input.message_id;
  if (!isIdentifier(messageId)) {
    return invalidMessageId(messageId);
  }

  const result = await withMessage(ctx.gateway, messageId, async message => {
    const reacted = await ctx.gateway.addReaction(message.channelId, message.id, input.emoji);
    if (!reacted.ok) {
      return err(createError(
        ErrorCode.API_ERROR,
        `Could not add reaction '${input.emoji}'. The emoji may be invalid or the bot may not have permission to react. Discord error: ${reacted.error.message}`,
        {
          retryable: false,
          suggestions: ['Use a Unicode emoji, or a custom emoji as name:id', 'Check the bot can add reactions in this channel'],
        }
      ));
    }
    return map(reacted, () => ({
      message: `Added reaction ${input.emoji} to message ${messageId} in #${message.channelName}`,
      messageId,
      channelId: message.channelId,
      emoji: input.emoji,
    }));
  });

  return handleApiResult(result, data => data);
}

// ─────────────────────────────────────────────────────────────────────────────
// Exports
// ─────────────────────────────────────────────────────────────────────────────

export const sendMessageTool: RegisteredTool<typeof SendMessageInputSchema> = {
  definition: sendMessageToolDefinition,
  schema: SendMessageInputSchema,
  handler: handleSendMessage,
};

export const editMessageTool: RegisteredTool<typeof EditMessageInputSchema> = {
  definition: editMessageToolDefinition,
  schema: EditMessageInputSchema,
  handler: handleEditMessage,
};

export const readMessagesTool: RegisteredTool<typeof ReadMessagesInputSchema> = {
  definition: readMessagesToolDefinition,
  schema: ReadMessagesInputSchema,
  handler: handleReadMessages,
};

export const searchMessagesTool: RegisteredTool<typeof SearchMessagesInputSchema> = {
  definition: searchMessagesToolDefinition,
  schema: SearchMessagesInputSchema,
  handler: handleSearchMessages,
};

export const addReactionTool: RegisteredTool<typeof AddReactionInputSchema> = {
  definition: addReactionToolDefinition,
  schema: AddReactionInputSchema,
  handler: handleAddReaction,
};

/** All message-related tools. */
export const messageTools = [
  sendMessageTool,
  editMessageTool,
  readMessagesTool,
  searchMessagesTool,
  addReactionTool,
];
