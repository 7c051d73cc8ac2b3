/**
 * Unit tests for the Discord mapping helpers.
 */

import { describe, it, expect } from 'vitest';
import { ChannelType, DiscordAPIError } from 'discord.js';
import { channelKind, toRemoteError } from './discord-gateway.js';
import { ErrorCode } from '../types/errors.js';

function apiError(code: number, message: string, status: number): DiscordAPIError {
  return new DiscordAPIError({ code, message }, code, status, 'GET', '/channels/1/messages/2', {});
}

describe('channelKind', () => {
  it('treats announcement channels as text', () => {
    expect(channelKind(ChannelType.GuildText)).toBe('text');
    expect(channelKind(ChannelType.GuildAnnouncement)).toBe('text');
  });

  it('maps voice-like and forum-like channels', () => {
    expect(channelKind(ChannelType.GuildVoice)).toBe('voice');
    expect(channelKind(ChannelType.GuildStageVoice)).toBe('stage');
    expect(channelKind(ChannelType.GuildForum)).toBe('forum');
    expect(channelKind(ChannelType.GuildMedia)).toBe('forum');
  });

  it('maps containers, threads and private channels', () => {
    expect(channelKind(ChannelType.GuildCategory)).toBe('category');
    expect(channelKind(ChannelType.PublicThread)).toBe('thread');
    expect(channelKind(ChannelType.PrivateThread)).toBe('thread');
    expect(channelKind(ChannelType.DM)).toBe('dm');
    expect(channelKind(ChannelType.GroupDM)).toBe('dm');
  });

  it('maps anything else to other', () => {
    expect(channelKind(ChannelType.GuildDirectory)).toBe('other');
  });
});

describe('toRemoteError', () => {
  it('maps unknown-entity codes to NOT_FOUND', () => {
    const error = toRemoteError(apiError(10008, 'Unknown Message', 404), 'Could not fetch message 2');
    expect(error.code).toBe(ErrorCode.NOT_FOUND);
    expect(error.message).toBe('Could not fetch message 2: Unknown Message');
    expect(error.retryable).toBe(false);
  });

  it('classifies other API errors by status', () => {
    expect(toRemoteError(apiError(50013, 'Missing Permissions', 403), 'Could not send').code)
      .toBe(ErrorCode.PERMISSION_DENIED);
    expect(toRemoteError(apiError(0, 'Internal Server Error', 500), 'Could not send').code)
      .toBe(ErrorCode.API_ERROR);
  });

  it('reports unclassified API errors as API_ERROR', () => {
    const error = toRemoteError(apiError(10014, 'Unknown Emoji', 418), 'Could not react to message 2');
    expect(error.code).toBe(ErrorCode.API_ERROR);
    expect(error.message).toBe('Could not react to message 2: Unknown Emoji');
  });

  it('classifies thrown transport errors by message', () => {
    const error = toRemoteError(new Error('network down'), 'Could not x');
    expect(error.code).toBe(ErrorCode.NETWORK_ERROR);
    expect(error.message).toBe('Could not x: network down');
    expect(error.retryable).toBe(true);
  });

  it('accepts non-Error values', () => {
    expect(toRemoteError('weird', 'Could not x').message).toBe('Could not x: weird');
  });
});
