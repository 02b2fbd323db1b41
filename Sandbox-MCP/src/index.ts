/**
 * Sandbox MCP Server: entry point
 *
 * Stdio transport. Refuses to start without a reachable Docker daemon.
 */

import { mkdir } from 'node:fs/promises';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadEnvSafely } from '@datagrep/shared/Utils/env.js';
import { Logger } from '@datagrep/shared/Utils/logger.js';
import { getConfig } from './config.js';
import { DockerRuntime, ORPHAN_GRACE_SECONDS } from './runtime/docker.js';
import { createServer } from './server.js';

const logger = new Logger('sandbox');

async function main(): Promise<void> {
  loadEnvSafely(import.meta.url);
  const config = getConfig();

  await mkdir(config.scratchDir, { recursive: true });

  const runtime = await DockerRuntime.connect({
    socketPath: config.dockerSocketPath,
    stopGraceSeconds: config.stopGraceSeconds,
  });

  const orphans = await runtime.removeOrphans(config.maxTimeoutSeconds + ORPHAN_GRACE_SECONDS);
  if (orphans > 0) {
    logger.warn(`Removed ${orphans} sandbox container(s) left by a previous run`);
  }

  logger.info('Starting Sandbox MCP', { transport: 'stdio' });
  logger.info(`Image: ${config.sandboxImage}`);
  logger.info(`Scratch: ${config.scratchDir}`);

  const { server } = createServer({ runtime, config });
  const transport = new StdioServerTransport();
  await server.connect(transport);

  const shutdown = async (signal: string): Promise<void> => {
    logger.info(`Received ${signal}, shutting down`);
    try {
      await server.close();
    } catch (err) {
      logger.warn('Error while closing server', err);
    }
    process.exit(0);
  };
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  logger.info('Sandbox MCP running on stdio');
}

main().catch((error: unknown) => {
  logger.error('Fatal error', error);
  process.exit(1);
});
