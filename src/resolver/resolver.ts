/**
 * Resolution of human-friendly server, channel and user references.
 *
 * Every operation yields exactly one outcome: the entity, or an McpError that
 * says what was tried and what the caller can do instead. Resolution prefers
 * IDs over names and never guesses between equally good matches.
 */

import type { ChannelInfo, GuildInfo, PlatformGateway, UserInfo } from '../types/gateway.js';
import { ErrorCode, createError } from '../types/errors.js';
import { type Result, ok, err } from '../types/result.js';
import { GLOBAL_SCOPE, ResolutionCache } from './cache.js';
import { isIdentifier, parseTarget } from './target.js';

const MENTION_SIGIL = /^@+/;

/** Whether a user's username or display name equals a lowercased name. */
function matchesName(user: UserInfo, name: string): boolean {
  return user.username.toLowerCase() === name ||
    (user.displayName !== null && user.displayName.toLowerCase() === name);
}

export class Resolver {
  constructor(
    private readonly gateway: PlatformGateway,
    private readonly cache: ResolutionCache = new ResolutionCache()
  ) {}

  // ───────────────────────────────────────────────────────────────────────────
  // Servers
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Converts a server name or ID to a server.
   */
  resolveServer(input: string): Result<GuildInfo> {
    if (isIdentifier(input)) {
      const guild = this.gateway.getGuild(input);
      if (guild) {
        return ok(guild);
      }
      return err(createError(
        ErrorCode.NOT_FOUND,
        `'${input}' is not a valid server ID. No server with this ID exists.`,
        { suggestions: ['Use list_servers to see all servers with their IDs'] }
      ));
    }

    const name = input.toLowerCase();
    const cachedId = this.cache.get('server', GLOBAL_SCOPE, name);
    if (cachedId !== undefined) {
      const guild = this.gateway.getGuild(cachedId);
      if (guild && guild.name.toLowerCase() === name) {
        return ok(guild);
      }
      this.cache.delete('server', GLOBAL_SCOPE, name);
    }

    const guilds = this.gateway.listGuilds();
    const match = guilds.find(guild => guild.name.toLowerCase() === name);
    if (match) {
      this.cache.set('server', GLOBAL_SCOPE, name, match.id);
      return ok(match);
    }

    const serverList = guilds.map(guild => `  • ${guild.name}`).join('\n');
    return err(createError(
      ErrorCode.NOT_FOUND,
      `'${input}' is not a valid server name. Available servers:\n${serverList}`,
      {
        suggestions: [
          'Use the exact server name',
          'Use list_servers to see all servers with their IDs',
        ],
        candidates: guilds.map(guild => guild.name),
      }
    ));
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Channels
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Converts a channel name or ID to a text channel.
   * With a scope, only that server's channels are searched.
   */
  resolveChannel(input: string, scope?: GuildInfo): Result<ChannelInfo> {
    if (isIdentifier(input)) {
      const channel = this.gateway.getChannel(input);
      if (!channel) {
        return err(createError(
          ErrorCode.NOT_FOUND,
          `'${input}' is not a valid channel ID. No channel with this ID exists.`,
          { suggestions: ['Use list_channels to see channel IDs'] }
        ));
      }
      if (channel.kind !== 'text') {
        return err(createError(
          ErrorCode.NOT_FOUND,
          `'${input}' is a valid ID but it's not a text channel (it's a ${channel.kind} channel).`,
          { suggestions: ['Use list_channels to find a text channel'] }
        ));
      }
      return ok(channel);
    }

    const name = input.toLowerCase();
    const scopeKey = scope?.id ?? GLOBAL_SCOPE;
    const cachedId = this.cache.get('channel', scopeKey, name);
    if (cachedId !== undefined) {
      const channel = this.gateway.getChannel(cachedId);
      if (channel && channel.kind === 'text' && channel.name.toLowerCase() === name) {
        return ok(channel);
      }
      this.cache.delete('channel', scopeKey, name);
    }

    const pool = this.gateway.listChannels(scope?.id);
    const matches = pool.filter(
      channel => channel.kind === 'text' && channel.name.toLowerCase() === name
    );

    if (matches.length === 0) {
      if (scope) {
        return err(createError(
          ErrorCode.NOT_FOUND,
          `There is no channel called '${input}' in server '${scope.name}'.`,
          { suggestions: [`Use list_channels with server '${scope.name}' to see available channels`] }
        ));
      }
      return err(createError(
        ErrorCode.NOT_FOUND,
        `There is no channel called '${input}' in any server.`,
        {
          suggestions: [
            `Try specifying the server like 'ServerName/${input}'`,
            'Use list_channels to see available channels',
          ],
        }
      ));
    }

    if (matches.length === 1) {
      this.cache.set('channel', scopeKey, name, matches[0].id);
      return ok(matches[0]);
    }

    if (scope) {
      return err(createError(
        ErrorCode.INTERNAL,
        `Unexpected situation - multiple channels named '${input}' in server '${scope.name}'.`,
        { candidates: matches.map(channel => `#${channel.name} (ID: ${channel.id})`) }
      ));
    }

    const candidates = matches.map(channel => `${channel.guildName ?? 'Unknown server'} → #${channel.name}`);
    return err(createError(
      ErrorCode.AMBIGUOUS,
      `Multiple channels named '${input}' found in different servers:\n` +
        candidates.map(candidate => `  • ${candidate}`).join('\n') +
        `\n\nYou MUST specify which server using format 'ServerName/${input}' or use the channel ID.`,
      {
        suggestions: [
          `Resupply the request with target 'ServerName/${input}'`,
          'Or use the channel ID from list_channels',
        ],
        candidates,
      }
    ));
  }

  /**
   * Parses a `Server/channel` target and resolves it to a text channel.
   */
  resolveTarget(raw: string): Result<ChannelInfo> {
    const target = parseTarget(raw);
    if (target.scope === undefined) {
      return this.resolveChannel(target.reference);
    }
    const server = this.resolveServer(target.scope);
    if (!server.ok) {
      return server;
    }
    return this.resolveChannel(target.reference, server.value);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Users
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Converts a username, display name or ID (optionally `@`-prefixed) to a user.
   * With a scope, that server's members are searched before the others.
   */
  async resolveUser(input: string, scope?: GuildInfo): Promise<Result<UserInfo>> {
    const reference = input.replace(MENTION_SIGIL, '');

    if (isIdentifier(reference)) {
      const result = await this.gateway.fetchUser(reference);
      if (result.ok) {
        return result;
      }
      if (result.error.code === ErrorCode.NOT_FOUND) {
        return err(createError(
          ErrorCode.NOT_FOUND,
          `'${reference}' is not a valid user ID. No user with this ID exists.`
        ));
      }
      return err(createError(
        result.error.code,
        `Could not fetch user with ID '${reference}': ${result.error.message}`
      ));
    }

    const name = reference.toLowerCase();
    const scopeKey = scope?.id ?? GLOBAL_SCOPE;
    const cachedId = this.cache.get('user', scopeKey, name);
    if (cachedId !== undefined) {
      const cached = await this.gateway.fetchUser(cachedId);
      if (cached.ok && matchesName(cached.value, name)) {
        return cached;
      }
      this.cache.delete('user', scopeKey, name);
    }

    for (const guild of this.searchOrder(scope)) {
      const member = this.gateway.listMembers(guild.id).find(candidate => matchesName(candidate, name));
      if (member) {
        this.cache.set('user', scopeKey, name, member.id);
        return ok(member);
      }
    }

    return err(createError(
      ErrorCode.NOT_FOUND,
      `No user found with username '${input}'.`,
      {
        suggestions: [
          'Make sure the username is spelled correctly',
          "Use the user's ID instead",
        ],
      }
    ));
  }

  /** Visible servers, with the scoped server (if any) first. */
  private searchOrder(scope?: GuildInfo): GuildInfo[] {
    const guilds = this.gateway.listGuilds();
    if (!scope) {
      return guilds;
    }
    return [scope, ...guilds.filter(guild => guild.id !== scope.id)];
  }
}
