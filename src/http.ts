/**
 * Search gateway HTTP entry point
 */

import { loadConfig } from './config/index.js';
import { SearchGatewayHttpServer } from './server.js';
import { logger } from './utils/logger.js';

export async function runHttpServer(): Promise<void> {
  const config = loadConfig();
  const server = new SearchGatewayHttpServer(config);

  logger.info('Starting search gateway', {
    host: config.server.host,
    port: config.server.port,
    cache: config.cache.provider,
    upstream: config.scraper.upstreamUrl ?? 'none',
    maxTasksPerClient: config.tasks.maxPerClient,
    maxTasksGlobal: config.tasks.maxGlobal,
    adminToken: config.security.adminToken ? 'configured' : 'not configured'
  });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info(`Received ${signal}, shutting down`);
    try {
      await server.stop();
      process.exit(0);
    } catch (error) {
      logger.error('Error during shutdown', {}, error instanceof Error ? error : new Error(String(error)));
      process.exit(1);
    }
  };

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });
  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });

  await server.start();
  logger.info(`Batch search available at http://${config.server.host}:${config.server.port}/v1/adventurer/search/batch`);
}
