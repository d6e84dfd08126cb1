/**
 * Lot viability service entry point.
 *
 * Loads the zoning and street layers into memory, opens the rules database
 * read-only and starts the HTTP API.
 */

import fs from 'fs';
import path from 'path';
import type { Server } from 'http';
import { config } from './config';
import { logger } from './utils/logger';
import { createApp } from './app';
import { SpatialIndexCache } from './lib/dataset-cache';
import { SqliteRulesRepository } from './lib/rules-repository';

export async function startServer(): Promise<Server> {
  const rulesDbPath = path.resolve(config.datasets.rulesDbPath);
  if (!fs.existsSync(rulesDbPath)) {
    throw new Error(`Rules database not found at ${rulesDbPath}. Run: npm run setup-db`);
  }

  const indexes = new SpatialIndexCache(config.cache.indexCacheSize);
  const loaded = await indexes.load(config.datasets);
  if (loaded.status === 'error') {
    throw new Error(`Failed to load spatial datasets: ${loaded.error}`);
  }
  logger.info(loaded.message, { zonesFile: config.datasets.zonesFile, streetsFile: config.datasets.streetsFile });

  const rules = SqliteRulesRepository.open(rulesDbPath);
  logger.info('Rules database opened', { path: rulesDbPath, useTypes: rules.listUseTypes().length });

  const app = createApp({ indexes, rules });

  const server = app.listen(config.port, () => {
    const memUsage = process.memoryUsage();
    logger.info('Lot viability service started', {
      port: config.port,
      environment: config.nodeEnv,
      memory: {
        heapUsed: Math.round(memUsage.heapUsed / 1024 / 1024),
        rss: Math.round(memUsage.rss / 1024 / 1024),
      },
    });
  });

  // Graceful shutdown
  const shutdown = async (): Promise<void> => {
    logger.info('Shutting down gracefully...');
    await new Promise<void>(resolve => {
      server.close(() => resolve());
    });
    indexes.close();
    rules.close();
    logger.info('Shutdown complete');
    process.exit(0);
  };

  const onSignal = (): void => {
    shutdown().catch(error => {
      logger.error('Shutdown failed', { error: error instanceof Error ? error.message : String(error) });
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  return server;
}

// Run if called directly
if (require.main === module) {
  startServer().catch(error => {
    logger.error('Fatal error during startup', { error: error instanceof Error ? error.message : String(error) });
    process.exit(1);
  });
}
