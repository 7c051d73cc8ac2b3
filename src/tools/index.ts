/**
 * Tool handler registry.
 *
 * Provides a modular way to define MCP tool handlers without a monolithic
 * switch statement. Each tool is defined with its schema, handler, and metadata.
 */

export * from './types.js';
export * from './message-tools.js';
export * from './server-tools.js';
export * from './registry.js';
