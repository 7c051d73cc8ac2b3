/**
 * Unit tests for environment configuration.
 */

import { describe, it, expect } from 'vitest';
import { loadConfig } from './config.js';
import { ErrorCode } from '../types/errors.js';

describe('loadConfig', () => {
  it('reads the bot token and prefetches members by default', () => {
    expect(loadConfig({ DISCORD_BOT_TOKEN: 'test-token' })).toEqual({
      ok: true,
      value: { discordToken: 'test-token', prefetchMembers: true },
    });
  });

  it('prefers DISCORD_BOT_TOKEN over DISCORD_TOKEN', () => {
    const config = loadConfig({ DISCORD_BOT_TOKEN: 'test-bot-token', DISCORD_TOKEN: 'test-token' });
    expect(config.ok && config.value.discordToken).toBe('test-bot-token');
  });

  it('falls back to DISCORD_TOKEN when the bot token is empty', () => {
    const config = loadConfig({ DISCORD_BOT_TOKEN: '', DISCORD_TOKEN: 'test-token' });
    expect(config.ok && config.value.discordToken).toBe('test-token');
  });

  it('fails without any token', () => {
    const config = loadConfig({});
    expect(config.ok).toBe(false);
    if (!config.ok) {
      expect(config.error.code).toBe(ErrorCode.INVALID_INPUT);
      expect(config.error.message).toBe('DISCORD_BOT_TOKEN or DISCORD_TOKEN environment variable not set');
    }
  });

  it('turns member prefetching off', () => {
    const config = loadConfig({ DISCORD_TOKEN: 'test-token', DISCORD_PREFETCH_MEMBERS: 'false' });
    expect(config.ok && config.value.prefetchMembers).toBe(false);
  });

  it('rejects an unrecognised prefetch flag', () => {
    const config = loadConfig({ DISCORD_TOKEN: 'test-token', DISCORD_PREFETCH_MEMBERS: 'yes' });
    expect(config.ok).toBe(false);
    if (!config.ok) {
      expect(config.error.code).toBe(ErrorCode.INVALID_INPUT);
      expect(config.error.message.startsWith('Invalid environment: DISCORD_PREFETCH_MEMBERS')).toBe(true);
    }
  });
});
