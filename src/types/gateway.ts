/**
 * Platform gateway contract.
 *
 * The resolver, the mention transcoder and the tool handlers only see Discord
 * through this interface. Synchronous members read the gateway's live session
 * cache; asynchronous members may hit the REST API.
 */

import type { Result } from './result.js';

/** Channel categories, as far as the tools care. */
export type ChannelKind =
  | 'text'
  | 'voice'
  | 'stage'
  | 'forum'
  | 'category'
  | 'thread'
  | 'dm'
  | 'other';

/** A server (guild) visible to the bot. */
export interface GuildInfo {
  id: string;
  name: string;
  memberCount: number;
}

/** A channel from the session cache. */
export interface ChannelInfo {
  id: string;
  name: string;
  kind: ChannelKind;
  /** Owning server; null for DM channels. */
  guildId: string | null;
  guildName: string | null;
  topic: string | null;
}

/** A user, either fetched from Discord or read from a server's member list. */
export interface UserInfo {
  id: string;
  /** Unique account handle. */
  username: string;
  /** Global display name, if the user set one. */
  displayName: string | null;
}

export interface MessageInfo {
  id: string;
  channelId: string;
  channelName: string;
  guildId: string | null;
  guildName: string | null;
  authorId: string;
  authorName: string;
  /** Raw content, mentions still in `<@id>` form. */
  content: string;
  createdAt: Date;
}

export interface PlatformGateway {
  /** Whether the gateway session is connected and its caches populated. */
  isReady(): boolean;

  /** The bot's own tag, when logged in. */
  getBotUserTag(): string | null;

  listGuilds(): GuildInfo[];
  getGuild(id: string): GuildInfo | undefined;

  /** Channels of one server, or of every visible server when no id is given. */
  listChannels(guildId?: string): ChannelInfo[];
  getChannel(id: string): ChannelInfo | undefined;

  listMembers(guildId: string): UserInfo[];

  /** Fetches a user; NOT_FOUND when Discord has no such user. */
  fetchUser(id: string): Promise<Result<UserInfo>>;

  /** Most recent messages of a channel, newest first, at most `limit`. */
  fetchMessages(channelId: string, limit: number): Promise<Result<MessageInfo[]>>;
  fetchMessage(channelId: string, messageId: string): Promise<Result<MessageInfo>>;

  sendMessage(channelId: string, content: string): Promise<Result<MessageInfo>>;
  sendDirectMessage(userId: string, content: string): Promise<Result<MessageInfo>>;
  editMessage(channelId: string, messageId: string, content: string): Promise<Result<MessageInfo>>;
  deleteMessage(channelId: string, messageId: string): Promise<Result<void>>;
  addReaction(channelId: string, messageId: string, emoji: string): Promise<Result<void>>;
}
