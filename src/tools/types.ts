/**
 * Shared types for tool handlers.
 *
 * Tools are defined with their schema, handler, and metadata; this module
 * imports no tool so every tool module can depend on it.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { z } from 'zod';
import type { McpError } from '../types/errors.js';
import type { Result } from '../types/result.js';
import type { PlatformGateway } from '../types/gateway.js';
import type { Resolver } from '../resolver/resolver.js';
import type { MentionTranscoder } from '../mentions/transcoder.js';

/** The context passed to tool handlers. */
export interface ToolContext {
  /** Live Discord session. */
  gateway: PlatformGateway;
  /** Name → entity resolution, shared so its cache lives as long as the server. */
  resolver: Resolver;
  /** Mention rewriting for outgoing and incoming text. */
  mentions: MentionTranscoder;
}

/** Result returned by tool handlers. */
export type ToolResult =
  | { success: true; data: Record<string, unknown> }
  | { success: false; error: McpError };

/**
 * Helper to convert an API Result to a ToolResult.
 *
 * Reduces boilerplate in tool handlers by standardising the pattern:
 * ```typescript
 * if (!result.ok) {
 *   return { success: false, error: result.error };
 * }
 * return { success: true, data: transform(result.value) };
 * ```
 */
export function handleApiResult<T>(
  result: Result<T>,
  transform: (value: T) => Record<string, unknown>
): ToolResult {
  if (!result.ok) {
    return { success: false, error: result.error };
  }
  return { success: true, data: transform(result.value) };
}

/** A registered tool with its handler. */
export interface RegisteredTool<TInput extends z.ZodTypeAny = z.ZodTypeAny> {
  /** Tool definition for MCP. */
  definition: Tool;
  /** Zod schema for input validation. */
  schema: TInput;
  /** Handler function. */
  handler(input: z.infer<TInput>, ctx: ToolContext): Promise<ToolResult>;
}
