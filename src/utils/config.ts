/**
 * Environment configuration.
 *
 * Validated once at startup; the server refuses to start without a bot token.
 */

import { z } from 'zod';
import { ErrorCode, createError } from '../types/errors.js';
import { type Result, ok, err } from '../types/result.js';

/** Optional non-empty string; an empty variable counts as unset. */
const optionalNonEmptyString = (): z.ZodType<string | undefined> =>
  z
    .string()
    .min(1)
    .optional()
    .or(z.literal('').transform(() => undefined));

export const envSchema = z.object({
  DISCORD_BOT_TOKEN: optionalNonEmptyString(),
  DISCORD_TOKEN: optionalNonEmptyString(),
  DISCORD_PREFETCH_MEMBERS: z
    .enum(['true', 'false'])
    .optional()
    .or(z.literal('').transform(() => undefined)),
});

export interface AppConfig {
  /** Bot token passed to the Discord gateway. */
  discordToken: string;
  /** Fetch every server's member list at startup. */
  prefetchMembers: boolean;
}

/**
 * Builds the configuration from environment variables.
 * DISCORD_BOT_TOKEN wins over DISCORD_TOKEN when both are set.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Result<AppConfig> {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    return err(createError(
      ErrorCode.INVALID_INPUT,
      `Invalid environment: ${parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ')}`
    ));
  }

  const token = parsed.data.DISCORD_BOT_TOKEN ?? parsed.data.DISCORD_TOKEN;
  if (token === undefined) {
    return err(createError(
      ErrorCode.INVALID_INPUT,
      'DISCORD_BOT_TOKEN or DISCORD_TOKEN environment variable not set',
      { suggestions: ['Set DISCORD_BOT_TOKEN to the bot token from the Discord developer portal'] }
    ));
  }

  return ok({
    discordToken: token,
    prefetchMembers: parsed.data.DISCORD_PREFETCH_MEMBERS !== 'false',
  });
}
