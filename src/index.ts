#!/usr/bin/env node
/**
 * @fileoverview MCP server entry point (stdio transport).
 * @module src/index
 */
import 'reflect-metadata';

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { loadConfig } from '@/config/index.js';
import { composeContainer, container } from '@/container/index.js';
import { LoopTrimService } from '@/container/tokens.js';
import { createMcpServer } from '@/mcp-server/server.js';
import type { LoopTrimService as LoopTrimServiceClass } from '@/services/loop-trim/index.js';
import { logger, requestContextService } from '@/utils/index.js';

async function main(): Promise<void> {
  const config = loadConfig();
  composeContainer(config);
  const context = requestContextService.createRequestContext({
    operation: 'ServerStartup',
  });

  const server = createMcpServer(config);
  const transport = new StdioServerTransport();

  const shutdown = (signal: string): void => {
    logger.notice(`Received ${signal}, shutting down`, { ...context });
    server.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Error while closing the server', { ...context, error });
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  await server.connect(transport);
  logger.notice('MCP server listening on stdio', {
    ...context,
    name: config.pkg.name,
    version: config.pkg.version,
  });

  const health = await container
    .resolve<LoopTrimServiceClass>(LoopTrimService)
    .healthCheck();
  if (health.healthy) {
    logger.info('Modeling engine reachable', { ...context, ...health });
  } else {
    logger.warning('Modeling engine unreachable, modeling runs will fail', {
      ...context,
      ...health,
      url: config.modelingEngine.baseUrl,
    });
  }
}

main().catch((error: unknown) => {
  logger.crit('MCP server failed to start', { error });
  process.exit(1);
});
