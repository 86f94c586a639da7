/**
 * Stdio transport wiring. Stdout carries the protocol; all logging goes to stderr.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig, type FetchConfig } from '../config.js';
import { SiteFetcher } from '../core/site-fetcher.js';
import { createLogger } from '../core/log.js';
import { createServer } from './tools.js';

const log = createLogger('mcp');

export async function runStdioServer(config: Readonly<FetchConfig> = loadConfig()): Promise<void> {
  const fetcher = new SiteFetcher(config);
  const server = createServer({ fetcher, baseUrl: config.baseUrl });

  let shuttingDown = false;
  const shutdown = async (reason: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info(`Shutting down (${reason})`);
    try {
      await server.close();
      await fetcher.close();
    } catch (error) {
      log.error('Shutdown failed', error);
    }
    process.exit(0);
  };

  process.once('SIGINT', () => void shutdown('SIGINT'));
  process.once('SIGTERM', () => void shutdown('SIGTERM'));
  process.stdin.once('close', () => void shutdown('stdin closed'));

  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info('crelist MCP server running on stdio');
}
