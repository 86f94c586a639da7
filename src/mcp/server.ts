#!/usr/bin/env node

/**
 * crelist MCP server entry point (stdio).
 */

import { createLogger } from '../core/log.js';
import { runStdioServer } from './stdio.js';

const log = createLogger('mcp');

runStdioServer().catch((error: unknown) => {
  log.error('Fatal error', error);
  process.exit(1);
});
