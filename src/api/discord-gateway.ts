/**
 * Discord implementation of the platform gateway.
 *
 * Reads come from the discord.js session cache; history, user lookups and
 * every write go through the REST API. REST failures are returned as
 * McpErrors rather than thrown.
 */

import {
  ChannelType,
  Client,
  DiscordAPIError,
  Events,
  GatewayIntentBits,
  RESTJSONErrorCodes,
  type Channel,
  type Guild,
  type Message,
  type SendableChannels,
  type User,
} from 'discord.js';
import type {
  ChannelInfo,
  ChannelKind,
  GuildInfo,
  MessageInfo,
  PlatformGateway,
  UserInfo,
} from '../types/gateway.js';
import { ErrorCode, classifyHttpError, createError, type McpError } from '../types/errors.js';
import { type Result, ok, err } from '../types/result.js';
import { HISTORY_PAGE_SIZE } from '../constants.js';

/** Name shown for channels that belong to no server. */
const DIRECT_MESSAGE_CHANNEL_NAME = 'direct-message';

/** Discord JSON error codes meaning the entity does not exist. */
const UNKNOWN_ENTITY_CODES = new Set<number | string>([
  RESTJSONErrorCodes.UnknownChannel,
  RESTJSONErrorCodes.UnknownGuild,
  RESTJSONErrorCodes.UnknownMember,
  RESTJSONErrorCodes.UnknownMessage,
  RESTJSONErrorCodes.UnknownUser,
]);

// ─────────────────────────────────────────────────────────────────────────────
// Mapping
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Maps a Discord channel type to the kinds the tools distinguish.
 * Announcement channels count as text channels.
 */
export function channelKind(type: ChannelType): ChannelKind {
  switch (type) {
    case ChannelType.GuildText:
    case ChannelType.GuildAnnouncement:
      return 'text';
    case ChannelType.GuildVoice:
      return 'voice';
    case ChannelType.GuildStageVoice:
      return 'stage';
    case ChannelType.GuildForum:
    case ChannelType.GuildMedia:
      return 'forum';
    case ChannelType.GuildCategory:
      return 'category';
    case ChannelType.PublicThread:
    case ChannelType.PrivateThread:
    case ChannelType.AnnouncementThread:
      return 'thread';
    case ChannelType.DM:
    case ChannelType.GroupDM:
      return 'dm';
    default:
      return 'other';
  }
}

function toGuildInfo(guild: Guild): GuildInfo {
  return { id: guild.id, name: guild.name, memberCount: guild.memberCount };
}

function toChannelInfo(channel: Channel): ChannelInfo {
  if (channel.isDMBased()) {
    return {
      id: channel.id,
      name: DIRECT_MESSAGE_CHANNEL_NAME,
      kind: channelKind(channel.type),
      guildId: null,
      guildName: null,
      topic: null,
    };
  }
  return {
    id: channel.id,
    name: channel.name,
    kind: channelKind(channel.type),
    guildId: channel.guild.id,
    guildName: channel.guild.name,
    topic: 'topic' in channel ? channel.topic ?? null : null,
  };
}

function toUserInfo(user: User): UserInfo {
  return { id: user.id, username: user.username, displayName: user.globalName };
}

function toMessageInfo(message: Message): MessageInfo {
  const channel = message.channel;
  return {
    id: message.id,
    channelId: message.channelId,
    channelName: channel.isDMBased() ? DIRECT_MESSAGE_CHANNEL_NAME : channel.name,
    guildId: message.guildId,
    guildName: message.guild?.name ?? null,
    authorId: message.author.id,
    authorName: message.author.username,
    content: message.content,
    createdAt: message.createdAt,
  };
}

/**
 * Converts a thrown discord.js/REST error into an McpError.
 */
export function toRemoteError(error: unknown, action: string): McpError {
  if (error instanceof DiscordAPIError) {
    const code = UNKNOWN_ENTITY_CODES.has(error.code)
      ? ErrorCode.NOT_FOUND
      : classifyHttpError(error.status, error.message);
    return createError(
      code === ErrorCode.UNKNOWN ? ErrorCode.API_ERROR : code,
      `${action}: ${error.message}`
    );
  }
  const message = error instanceof Error ? error.message : String(error);
  return createError(classifyHttpError(0, message), `${action}: ${message}`);
}

// ─────────────────────────────────────────────────────────────────────────────
// Gateway
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates a client with the intents the tools need: guild and member lists,
 * message history with content, and DMs.
 */
export function createDiscordClient(): Client {
  return new Client({
    intents: [
      GatewayIntentBits.Guilds,
      GatewayIntentBits.GuildMembers,
      GatewayIntentBits.GuildMessages,
      GatewayIntentBits.GuildMessageReactions,
      GatewayIntentBits.MessageContent,
      GatewayIntentBits.DirectMessages,
    ],
  });
}

export interface ConnectOptions {
  /** Fetch every server's full member list once the session is ready. */
  prefetchMembers: boolean;
}

export class DiscordGateway implements PlatformGateway {
  constructor(private readonly client: Client) {}

  /**
   * Logs in and waits until the session cache is populated.
   */
  async connect(token: string, options: ConnectOptions): Promise<void> {
    const ready = new Promise<void>(resolve => {
      this.client.once(Events.ClientReady, () => resolve());
    });
    await this.client.login(token);
    await ready;
    console.error(`[discord] Logged in as ${this.getBotUserTag() ?? 'unknown'}`);
    console.error(`[discord] Connected to ${this.client.guilds.cache.size} servers`);

    if (options.prefetchMembers) {
      for (const guild of this.client.guilds.cache.values()) {
        try {
          await guild.members.fetch();
        } catch (error) {
          console.error(`[discord] Could not fetch members of ${guild.name}: ${error instanceof Error ? error.message : String(error)}`);
        }
      }
    }
  }

  async disconnect(): Promise<void> {
    await this.client.destroy();
  }

  isReady(): boolean {
    return this.client.isReady();
  }

  getBotUserTag(): string | null {
    return this.client.user?.tag ?? null;
  }

  listGuilds(): GuildInfo[] {
    return this.client.guilds.cache.map(toGuildInfo);
  }

  getGuild(id: string): GuildInfo | undefined {
    const guild = this.client.guilds.cache.get(id);
    return guild ? toGuildInfo(guild) : undefined;
  }

  listChannels(guildId?: string): ChannelInfo[] {
    if (guildId !== undefined) {
      const guild = this.client.guilds.cache.get(guildId);
      return guild ? guild.channels.cache.map(toChannelInfo) : [];
    }
    return [...this.client.guilds.cache.values()].flatMap(
      guild => guild.channels.cache.map(toChannelInfo)
    );
  }

  getChannel(id: string): ChannelInfo | undefined {
    const channel = this.client.channels.cache.get(id);
    return channel ? toChannelInfo(channel) : undefined;
  }

  listMembers(guildId: string): UserInfo[] {
    const guild = this.client.guilds.cache.get(guildId);
    return guild ? guild.members.cache.map(member => toUserInfo(member.user)) : [];
  }

  async fetchUser(id: string): Promise<Result<UserInfo>> {
    try {
      return ok(toUserInfo(await this.client.users.fetch(id)));
    } catch (error) {
      return err(toRemoteError(error, `Could not fetch user ${id}`));
    }
  }

  async fetchMessages(channelId: string, limit: number): Promise<Result<MessageInfo[]>> {
    const channel = this.messageChannel(channelId);
    if (!channel.ok) {
      return channel;
    }

    const messages: MessageInfo[] = [];
    let before: string | undefined;
    try {
      while (messages.length < limit) {
        const pageSize = Math.min(HISTORY_PAGE_SIZE, limit - messages.length);
        const page = await channel.value.messages.fetch({ limit: pageSize, before });
        for (const message of page.values()) {
          messages.push(toMessageInfo(message));
        }
        before = page.lastKey();
        if (page.size < pageSize || before === undefined) {
          break;
        }
      }
    } catch (error) {
      return err(toRemoteError(error, `Could not read history of channel ${channelId}`));
    }
    return ok(messages);
  }

  async fetchMessage(channelId: string, messageId: string): Promise<Result<MessageInfo>> {
    const channel = this.messageChannel(channelId);
    if (!channel.ok) {
      return channel;
    }
    try {
      return ok(toMessageInfo(await channel.value.messages.fetch(messageId)));
    } catch (error) {
      return err(toRemoteError(error, `Could not fetch message ${messageId}`));
    }
  }

  async sendMessage(channelId: string, content: string): Promise<Result<MessageInfo>> {
    const channel = this.messageChannel(channelId);
    if (!channel.ok) {
      return channel;
    }
    try {
      return ok(toMessageInfo(await channel.value.send(content)));
    } catch (error) {
      return err(toRemoteError(error, `Could not send message to channel ${channelId}`));
    }
  }

  async sendDirectMessage(userId: string, content: string): Promise<Result<MessageInfo>> {
    try {
      const user = await this.client.users.fetch(userId);
      return ok(toMessageInfo(await user.send(content)));
    } catch (error) {
      return err(toRemoteError(error, `Could not send direct message to user ${userId}`));
    }
  }

  async editMessage(channelId: string, messageId: string, content: string): Promise<Result<MessageInfo>> {
    const channel = this.messageChannel(channelId);
    if (!channel.ok) {
      return channel;
    }
    try {
      return ok(toMessageInfo(await channel.value.messages.edit(messageId, content)));
    } catch (error) {
      return err(toRemoteError(error, `Could not edit message ${messageId}`));
    }
  }

  async deleteMessage(channelId: string, messageId: string): Promise<Result<void>> {
    const channel = this.messageChannel(channelId);
    if (!channel.ok) {
      return channel;
    }
    try {
      await channel.value.messages.delete(messageId);
      return ok(undefined);
    } catch (error) {
      return err(toRemoteError(error, `Could not delete message ${messageId}`));
    }
  }

  async addReaction(channelId: string, messageId: string, emoji: string): Promise<Result<void>> {
    const channel = this.messageChannel(channelId);
    if (!channel.ok) {
      return channel;
    }
    try {
      await channel.value.messages.react(messageId, emoji);
      return ok(undefined);
    } catch (error) {
      return err(toRemoteError(error, `Could not react to message ${messageId}`));
    }
  }

  /** A cached channel that carries messages. */
  private messageChannel(channelId: string): Result<SendableChannels> {
    const channel = this.client.channels.cache.get(channelId);
    if (!channel || !channel.isSendable()) {
      return err(createError(
        ErrorCode.NOT_FOUND,
        `Channel ${channelId} does not exist or does not carry messages.`
      ));
    }
    return ok(channel);
  }
}
