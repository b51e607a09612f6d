export { HistoryService } from './history-service.js';
export type { FlakinessReport } from './history-service.js';
export type {
  BranchStats,
  HistoryFilter,
  HistoryRun,
  HistoryStore,
  ListEntriesOptions,
  TestHistoryPoint,
} from './types.js';
