/**
 * Unit tests for the tool registry.
 */

import { describe, it, expect } from 'vitest';
import { getToolDefinitions, hasTool, invokeTool } from './registry.js';
import { ErrorCode } from '../types/errors.js';
import { createToolContext } from '../__fixtures__/gateway.js';

const TOOL_NAMES = [
  'send_message',
  'edit_message',
  'read_messages',
  'search_messages',
  'add_reaction',
  'list_servers',
  'list_channels',
];

describe('getToolDefinitions', () => {
  it('lists every tool once', () => {
    expect(getToolDefinitions().map(tool => tool.name)).toEqual(TOOL_NAMES);
  });

  it('declares an object input schema for each tool', () => {
    for (const tool of getToolDefinitions()) {
      expect(tool.inputSchema.type).toBe('object');
      expect(tool.description).toBeTruthy();
    }
  });
});

describe('hasTool', () => {
  it('knows registered names only', () => {
    expect(hasTool('read_messages')).toBe(true);
    expect(hasTool('ban_member')).toBe(false);
  });
});

describe('invokeTool', () => {
  it('reports an unknown tool with the available names', async () => {
    const result = await invokeTool('delete_server', {}, createToolContext());

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe(ErrorCode.INVALID_INPUT);
      expect(result.error.message).toBe('Unknown tool: delete_server');
      expect(result.error.suggestions).toEqual([`Available tools: ${TOOL_NAMES.join(', ')}`]);
    }
  });

  it('treats missing arguments as an empty object', async () => {
    const result = await invokeTool('list_servers', undefined, createToolContext());
    expect(result.success).toBe(true);
  });

  it('reports every invalid field', async () => {
    const result = await invokeTool('edit_message', { message_id: 123 }, createToolContext());

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe(ErrorCode.INVALID_INPUT);
      expect(result.error.message).toBe('Invalid input: message_id: Expected string, received number');
    }
  });

  it('reports missing required fields', async () => {
    const result = await invokeTool('search_messages', { channel: 'general' }, createToolContext());

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe('Invalid input: query: Required');
    }
  });
});
