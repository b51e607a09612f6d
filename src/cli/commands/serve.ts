/**
 * CLI Command: Serve
 * Run the read-only history API until SIGINT / SIGTERM
 */

import { createServer, serverConfigFrom } from '../../server/index.js';
import { logger } from '../../utils/logger.js';
import { errorMessage } from '../../errors.js';
import { loadConfig, requireHistoryStore } from '../runtime.js';

export async function executeServeCommand(_args: readonly string[]): Promise<number> {
  const config = loadConfig();
  const { store, settings } = requireHistoryStore(config);

  logger.info('Starting history API server...', {
    port: config.server.port,
    host: config.server.host,
    dbPath: settings.dbPath,
  });

  const server = createServer(serverConfigFrom(config.server), {
    history: store,
    flakyThreshold: settings.flakyThreshold,
    maxEntries: settings.maxEntries,
  });

  return new Promise<number>((resolve, reject) => {
    const shutdown = (signal: string): void => {
      logger.info(`Received ${signal}, shutting down gracefully...`);
      server
        .stop()
        .then(() => store.close())
        .then(() => resolve(0))
        .catch((error: unknown) => {
          logger.error({ error: errorMessage(error) }, 'Shutdown failed');
          resolve(1);
        });
    };

    process.once('SIGTERM', () => shutdown('SIGTERM'));
    process.once('SIGINT', () => shutdown('SIGINT'));

    server.start().catch(reject);
  });
}
