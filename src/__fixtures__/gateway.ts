/**
 * In-process stand-in for the Discord gateway.
 *
 * Holds a small fixed world of two servers that share a channel name and a
 * member, and records every read and write so tests can assert on them.
 */

import type {
  ChannelInfo,
  GuildInfo,
  MessageInfo,
  PlatformGateway,
  UserInfo,
} from '../types/gateway.js';
import { ErrorCode, createError } from '../types/errors.js';
import { type Result, ok, err } from '../types/result.js';
import { Resolver } from '../resolver/resolver.js';
import { MentionTranscoder } from '../mentions/transcoder.js';
import type { ToolContext } from '../tools/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// World
// ─────────────────────────────────────────────────────────────────────────────

export const SERVER_A: GuildInfo = { id: '100000000000000001', name: 'ServerA', memberCount: 2 };
export const SERVER_B: GuildInfo = { id: '100000000000000002', name: 'ServerB', memberCount: 2 };

export const ALICE: UserInfo = { id: '111111111111111111', username: 'alice', displayName: 'Alice Liddell' };
export const BOB: UserInfo = { id: '222222222222222222', username: 'bob', displayName: null };
export const CAROL: UserInfo = { id: '333333333333333333', username: 'carol', displayName: 'Caz' };

function channel(id: string, name: string, kind: ChannelInfo['kind'], guild: GuildInfo, topic: string | null = null): ChannelInfo {
  return { id, name, kind, guildId: guild.id, guildName: guild.name, topic };
}

export const GENERAL_A = channel('200000000000000001', 'general', 'text', SERVER_A, 'Chat about anything');
export const GENERAL_B = channel('200000000000000002', 'general', 'text', SERVER_B);
export const ANNOUNCEMENTS_A = channel('200000000000000003', 'announcements', 'text', SERVER_A);
export const LOUNGE_A = channel('200000000000000004', 'Lounge', 'voice', SERVER_A);
export const IDEAS_B = channel('200000000000000005', 'ideas', 'forum', SERVER_B);
export const INFO_A = channel('200000000000000006', 'Info', 'category', SERVER_A);

function message(id: string, author: UserInfo, content: string, at: string): MessageInfo {
  return {
    id,
    channelId: GENERAL_A.id,
    channelName: GENERAL_A.name,
    guildId: SERVER_A.id,
    guildName: SERVER_A.name,
    authorId: author.id,
    authorName: author.username,
    content,
    createdAt: new Date(at),
  };
}

/** History of ServerA/general, newest first as Discord returns it. */
export const GENERAL_A_HISTORY: MessageInfo[] = [
  message('300000000000000003', BOB, 'Deploy finished, thanks <@111111111111111111>', '2026-01-20T10:02:00.000Z'),
  message('300000000000000002', ALICE, 'Starting the deploy now', '2026-01-20T10:01:00.000Z'),
  message('300000000000000001', CAROL, 'Morning! Who is deploying today?', '2026-01-20T10:00:00.000Z'),
];

// ─────────────────────────────────────────────────────────────────────────────
// Stub
// ─────────────────────────────────────────────────────────────────────────────

export interface StubCalls {
  listChannels: number;
  listMembers: number;
  fetchUser: string[];
  fetchMessage: string[];
}

export interface SentMessage {
  targetId: string;
  content: string;
}

export class StubGateway implements PlatformGateway {
  ready = true;
  guilds: GuildInfo[] = [SERVER_A, SERVER_B];
  channels: ChannelInfo[] = [GENERAL_A, GENERAL_B, ANNOUNCEMENTS_A, LOUNGE_A, IDEAS_B, INFO_A];
  members = new Map<string, UserInfo[]>([
    [SERVER_A.id, [ALICE, BOB]],
    [SERVER_B.id, [BOB, CAROL]],
  ]);
  /** Users fetchable by ID that are in no server. */
  extraUsers: UserInfo[] = [];
  history = new Map<string, MessageInfo[]>([[GENERAL_A.id, [...GENERAL_A_HISTORY]]]);
  /** User IDs whose fetch fails with a transport error instead of NOT_FOUND. */
  brokenUserIds = new Set<string>();
  /** Emoji Discord refuses. */
  rejectedEmoji = new Set<string>();

  calls: StubCalls = { listChannels: 0, listMembers: 0, fetchUser: [], fetchMessage: [] };
  sent: SentMessage[] = [];
  directMessages: SentMessage[] = [];
  edits: SentMessage[] = [];
  deletions: string[] = [];
  reactions: Array<{ messageId: string; emoji: string }> = [];

  private nextMessageId = 900000000000000001n;

  isReady(): boolean {
    return this.ready;
  }

  getBotUserTag(): string | null {
    return 'helper-bot#0001';
  }

  listGuilds(): GuildInfo[] {
    return [...this.guilds];
  }

  getGuild(id: string): GuildInfo | undefined {
    return this.guilds.find(guild => guild.id === id);
  }

  listChannels(guildId?: string): ChannelInfo[] {
    this.calls.listChannels++;
    return this.channels.filter(channel => guildId === undefined || channel.guildId === guildId);
  }

  getChannel(id: string): ChannelInfo | undefined {
    return this.channels.find(channel => channel.id === id);
  }

  listMembers(guildId: string): UserInfo[] {
    this.calls.listMembers++;
    return [...(this.members.get(guildId) ?? [])];
  }

  async fetchUser(id: string): Promise<Result<UserInfo>> {
    this.calls.fetchUser.push(id);
    if (this.brokenUserIds.has(id)) {
      return err(createError(ErrorCode.NETWORK_ERROR, `Could not fetch user ${id}: socket hang up`));
    }
    const known = [...this.members.values()].flat().concat(this.extraUsers);
    const user = known.find(candidate => candidate.id === id);
    return user ? ok(user) : err(createError(ErrorCode.NOT_FOUND, `Could not fetch user ${id}: Unknown User`));
  }

  async fetchMessages(channelId: string, limit: number): Promise<Result<MessageInfo[]>> {
    return ok((this.history.get(channelId) ?? []).slice(0, limit));
  }

  async fetchMessage(channelId: string, messageId: string): Promise<Result<MessageInfo>> {
    this.calls.fetchMessage.push(channelId);
    const found = this.history.get(channelId)?.find(candidate => candidate.id === messageId);
    return found ? ok(found) : err(createError(ErrorCode.NOT_FOUND, `Could not fetch message ${messageId}: Unknown Message`));
  }

  async sendMessage(channelId: string, content: string): Promise<Result<MessageInfo>> {
    this.sent.push({ targetId: channelId, content });
    return ok(this.created(channelId, content));
  }

  async sendDirectMessage(userId: string, content: string): Promise<Result<MessageInfo>> {
    this.directMessages.push({ targetId: userId, content });
    return ok(this.created(userId, content));
  }

  async editMessage(channelId: string, messageId: string, content: string): Promise<Result<MessageInfo>> {
    this.edits.push({ targetId: messageId, content });
    return ok({ ...this.created(channelId, content), id: messageId });
  }

  async deleteMessage(_channelId: string, messageId: string): Promise<Result<void>> {
    this.deletions.push(messageId);
    return ok(undefined);
  }

  async addReaction(_channelId: string, messageId: string, emoji: string): Promise<Result<void>> {
    if (this.rejectedEmoji.has(emoji)) {
      return err(createError(ErrorCode.API_ERROR, `Could not react to message ${messageId}: Unknown Emoji`));
    }
    this.reactions.push({ messageId, emoji });
    return ok(undefined);
  }

  private created(channelId: string, content: string): MessageInfo {
    const id = String(this.nextMessageId++);
    return {
      id,
      channelId,
      channelName: this.getChannel(channelId)?.name ?? 'direct-message',
      guildId: this.getChannel(channelId)?.guildId ?? null,
      guildName: this.getChannel(channelId)?.guildName ?? null,
      authorId: '999999999999999999',
      authorName: 'helper-bot',
      content,
      createdAt: new Date('2026-01-20T11:00:00.000Z'),
    };
  }
}

/**
 * A tool context over the stub, wired the way the server wires it.
 */
export function createToolContext(gateway: StubGateway = new StubGateway()): ToolContext {
  const resolver = new Resolver(gateway);
  return { gateway, resolver, mentions: new MentionTranscoder(gateway, resolver) };
}
