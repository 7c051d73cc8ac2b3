/**
 * Finding a message by ID alone.
 *
 * Discord has no global message lookup, so every text channel the bot can see
 * is asked in turn until one of them has the message.
 */

import type { MessageInfo, PlatformGateway } from '../types/gateway.js';
import { ErrorCode, createError } from '../types/errors.js';
import { type Result, andThenAsync, err } from '../types/result.js';

/**
 * Scans every text channel of every visible server for a message.
 * Stops at the first channel that returns it.
 */
export async function findMessage(
  gateway: PlatformGateway,
  messageId: string
): Promise<Result<MessageInfo>> {
  for (const guild of gateway.listGuilds()) {
    for (const channel of gateway.listChannels(guild.id)) {
      if (channel.kind !== 'text') {
        continue;
      }
      // Missing access and unknown-message errors both just mean "not here"
      const result = await gateway.fetchMessage(channel.id, messageId);
      if (result.ok) {
        return result;
      }
    }
  }

  return err(createError(
    ErrorCode.NOT_FOUND,
    `Could not find message with ID ${messageId}. The message may have been deleted, or the bot doesn't have access to the channel containing this message.`,
    { suggestions: ['Check the message ID', 'Use read_messages to find the current message IDs'] }
  ));
}

/**
 * Locates a message and runs an action on it.
 */
export async function withMessage<T>(
  gateway: PlatformGateway,
  messageId: string,
  action: (message: MessageInfo) => Promise<Result<T>>
): Promise<Result<T>> {
  return andThenAsync(await findMessage(gateway, messageId), action);
}
