/**
 * Server factory function
 */

import type { ServerSettings } from '../config/pipeline-config.js';
import type { ServerConfig, ServerDependencies } from './types.js';
import { ExpressServer } from './express-server.js';

/**
 * Create and configure a new Express server instance
 */
export function createServer(
  config: ServerConfig,
  dependencies: ServerDependencies
): ExpressServer {
  return new ExpressServer(config, dependencies);
}

/**
 * Server options from the pipeline configuration
 */
export function serverConfigFrom(settings: ServerSettings): ServerConfig {
  return {
    port: settings.port,
    host: settings.host,
    enableCors: settings.enableCors,
    enableHelmet: settings.enableHelmet,
    enableRequestLogging: settings.enableRequestLogging,
    corsOrigins: settings.corsOrigins,
    requestTimeout: 30000,
  };
}
