/**
 * Tool registry - centralised tool management.
 *
 * All tools are registered here and can be looked up by name.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { RegisteredTool, ToolContext, ToolResult } from './types.js';
import { ErrorCode, createError } from '../types/errors.js';

import { messageTools } from './message-tools.js';
import { serverTools } from './server-tools.js';

// ─────────────────────────────────────────────────────────────────────────────
// Registry
// ─────────────────────────────────────────────────────────────────────────────

/** All registered tools. */
const allTools: RegisteredTool[] = [
  ...messageTools,
  ...serverTools,
];

/** Lookup map for tools by name. */
const toolsByName = new Map<string, RegisteredTool>(
  allTools.map(tool => [tool.definition.name, tool])
);

// ─────────────────────────────────────────────────────────────────────────────
// Public API
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Gets all tool definitions for MCP ListTools.
 */
export function getToolDefinitions(): Tool[] {
  return allTools.map(tool => tool.definition);
}

/**
 * Invokes a tool by name with the given arguments and context.
 * Unknown tools and invalid arguments are reported before the handler runs.
 */
export async function invokeTool(
  name: string,
  args: unknown,
  ctx: ToolContext
): Promise<ToolResult> {
  const tool = toolsByName.get(name);

  if (!tool) {
    return {
      success: false,
      error: createError(ErrorCode.INVALID_INPUT, `Unknown tool: ${name}`, {
        suggestions: [`Available tools: ${[...toolsByName.keys()].join(', ')}`],
      }),
    };
  }

  const parseResult = tool.schema.safeParse(args ?? {});
  if (!parseResult.success) {
    const issues = parseResult.error.issues
      .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    return {
      success: false,
      error: createError(ErrorCode.INVALID_INPUT, `Invalid input: ${issues}`),
    };
  }

  return tool.handler(parseResult.data, ctx);
}

/**
 * Checks if a tool exists.
 */
export function hasTool(name: string): boolean {
  return toolsByName.has(name);
}
