/**
 * History store contract
 */

import type {
  AutomationKey,
  HistoryEntry,
  HistoryWindow,
  ResultStatus,
  RiskLevel,
} from '../../types/index.js';

export interface HistoryFilter {
  branch?: string;

  /**
   * Restrict each entry's results to these keys; entries without any are dropped
   */
  automationKeys?: readonly AutomationKey[];
}

/**
 * A stored entry without its per-test results
 */
export type HistoryRun = Omit<HistoryEntry, 'results'>;

export interface ListEntriesOptions {
  branch?: string;
  limit?: number;
  offset?: number;
}

export interface TestHistoryPoint {
  executionId: string;
  branch: string;
  timestamp: Date;
  status: ResultStatus;
  durationMs: number;
  errorMessage?: string;
}

export interface BranchStats {
  branch: string;
  days: number;
  runs: number;
  averagePassRate: number;
  totalTests: number;
  totalFailures: number;
  latestRiskLevel?: RiskLevel;
  latestTimestamp?: Date;
}

/**
 * Append-only store of pipeline runs
 */
export interface HistoryStore {
  append(entry: HistoryEntry): Promise<HistoryEntry>;
  query(filter: HistoryFilter, window: HistoryWindow): Promise<HistoryEntry[]>;
  listEntries(options: ListEntriesOptions): Promise<{ entries: HistoryRun[]; total: number }>;
  testHistory(key: AutomationKey, window: HistoryWindow): Promise<TestHistoryPoint[]>;
  branchStats(branch: string, days: number, now?: Date): Promise<BranchStats>;
  healthCheck(): Promise<boolean>;
  close(): Promise<void>;
}
