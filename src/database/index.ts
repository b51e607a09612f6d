/**
 * Database module exports
 */

export {
  openDatabase,
  healthCheck,
  executeTransaction,
  type DatabaseClientOptions,
  type SqliteDatabase,
} from './client.js';

export * from './repositories/index.js';
