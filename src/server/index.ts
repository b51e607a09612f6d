/**
 * API Server Module
 *
 * Exports the main ExpressServer class and related types.
 */

export { ExpressServer } from './express-server.js';
export { createServer, serverConfigFrom } from './factory.js';
export type { ServerConfig, ServerDependencies } from './types.js';
export type { HistoryStatus } from './routes/health.js';
export * from './middleware/index.js';
