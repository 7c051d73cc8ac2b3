#!/usr/bin/env node
/**
 * Discord MCP Server entry point.
 *
 * This MCP server enables AI assistants to interact with Discord through a
 * bot account, addressing servers, channels and people by name.
 */

import { runServer } from './server.js';

runServer().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
