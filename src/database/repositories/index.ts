/**
 * Repository layer exports
 */

export { SqliteHistoryStore } from './history.repository.js';
