/**
 * History repository: SQLite-backed HistoryStore
 */

import { z } from 'zod';
import type {
  AutomationKey,
  HistoryEntry,
  HistoryResult,
  HistoryWindow,
} from '../../types/index.js';
import type {
  BranchStats,
  HistoryFilter,
  HistoryRun,
  HistoryStore,
  ListEntriesOptions,
  TestHistoryPoint,
} from '../../services/history/types.js';
import { toAutomationKey } from '../../services/automation-key/index.js';
import type { Logger } from '../../utils/logger.js';
import { executeTransaction, healthCheck, openDatabase } from '../client.js';
import type { DatabaseClientOptions, SqliteDatabase } from '../client.js';

const DAY_MS = 24 * 60 * 60 * 1000;

interface RunRow {
  id: number;
  execution_id: string;
  branch: string;
  timestamp: string;
  run_id: number | null;
  commit_sha: string | null;
  risk_level: string;
  summary_json: string;
}

interface ResultRow {
  automation_key: string;
  feature_name: string;
  scenario_name: string;
  example_index: number | null;
  status: string;
  duration_ms: number;
  tags_json: string;
  error_message: string | null;
}

interface TestPointRow {
  execution_id: string;
  branch: string;
  timestamp: string;
  status: string;
  duration_ms: number;
  error_message: string | null;
}

interface BranchStatsRow {
  runs: number;
  average_pass_rate: number | null;
  total_tests: number | null;
  total_failures: number | null;
}

interface WindowParams {
  branch: string | null;
  since: string | null;
  limit: number;
}

const riskLevelSchema = z.enum(['LOW', 'MEDIUM', 'CRITICAL']);
const statusSchema = z.enum(['passed', 'failed']);
const tagsSchema = z.array(z.string());
const summarySchema = z.object({
  total: z.number(),
  passed: z.number(),
  failed: z.number(),
  passRate: z.number(),
  totalDurationMs: z.number(),
  perTag: z.record(z.object({ total: z.number(), passed: z.number() })),
  failedFeatures: z.array(z.string()).default([]),
});

function since(window: HistoryWindow): string | null {
  if (window.days === undefined) {
    return null;
  }
  const now = (window.now ?? new Date()).getTime();
  return new Date(now - window.days * DAY_MS).toISOString();
}

export class SqliteHistoryStore implements HistoryStore {
  constructor(
    private readonly db: SqliteDatabase,
    private readonly logger?: Logger
  ) {}

  static open(path: string, options: DatabaseClientOptions = {}): SqliteHistoryStore {
    return new SqliteHistoryStore(openDatabase(path, options), options.logger);
  }

  async append(entry: HistoryEntry): Promise<HistoryEntry> {
    const insertRun = this.db.prepare<
      {
        execution_id: string;
        branch: string;
        timestamp: string;
        run_id: number | null;
        commit_sha: string | null;
        risk_level: string;
        total: number;
        passed: number;
        failed: number;
        pass_rate: number;
        duration_ms: number;
        summary_json: string;
      },
      { id: number }
    >(
      `INSERT INTO history_runs
        (execution_id, branch, timestamp, run_id, commit_sha, risk_level, total, passed, failed, pass_rate, duration_ms, summary_json)
       VALUES
        (@execution_id, @branch, @timestamp, @run_id, @commit_sha, @risk_level, @total, @passed, @failed, @pass_rate, @duration_ms, @summary_json)
       RETURNING id`
    );

    const insertResult = this.db.prepare<
      {
        history_run_id: number;
        automation_key: string;
        feature_name: string;
        scenario_name: string;
        example_index: number | null;
        status: string;
        duration_ms: number;
        tags_json: string;
        error_message: string | null;
      }
    >(
      `INSERT INTO history_results
        (history_run_id, automation_key, feature_name, scenario_name, example_index, status, duration_ms, tags_json, error_message)
       VALUES
        (@history_run_id, @automation_key, @feature_name, @scenario_name, @example_index, @status, @duration_ms, @tags_json, @error_message)`
    );

    const id = executeTransaction(this.db, () => {
      const inserted = insertRun.get({
        execution_id: entry.executionId,
        branch: entry.branch,
        timestamp: entry.timestamp.toISOString(),
        run_id: entry.runId ?? null,
        commit_sha: entry.commitSha ?? null,
        risk_level: entry.riskLevel,
        total: entry.summary.total,
        passed: entry.summary.passed,
        failed: entry.summary.failed,
        pass_rate: entry.summary.passRate,
        duration_ms: entry.summary.totalDurationMs,
        summary_json: JSON.stringify(entry.summary),
      });
      if (!inserted) {
        throw new Error(`Insert of history entry ${entry.executionId} returned no id`);
      }

      for (const result of entry.results) {
        insertResult.run({
          history_run_id: inserted.id,
          automation_key: result.automationKey,
          feature_name: result.featureName,
          scenario_name: result.scenarioName,
          example_index: result.exampleIndex ?? null,
          status: result.status,
          duration_ms: result.durationMs,
          tags_json: JSON.stringify(result.tags),
          error_message: result.errorMessage ?? null,
        });
      }
      return inserted.id;
    });

    this.logger?.debug('Appended history entry', { id, executionId: entry.executionId, results: entry.results.length });
    return { ...entry, id };
  }

  async query(filter: HistoryFilter, window: HistoryWindow): Promise<HistoryEntry[]> {
    const rows = this.selectRuns({
      branch: filter.branch ?? null,
      since: since(window),
      limit: window.maxEntries ?? -1,
    });

    const keys = filter.automationKeys ? new Set<string>(filter.automationKeys) : undefined;
    const entries: HistoryEntry[] = [];

    for (const row of rows) {
      const results = this.resultsFor(row.id).filter((r) => !keys || keys.has(r.automationKey));
      if (keys && results.length === 0) {
        continue;
      }
      entries.push({ ...this.mapRun(row), results });
    }

    return entries;
  }

  async listEntries(options: ListEntriesOptions): Promise<{ entries: HistoryRun[]; total: number }> {
    const branch = options.branch ?? null;
    const count = this.db
      .prepare<{ branch: string | null }, { total: number }>(
        'SELECT COUNT(*) AS total FROM history_runs WHERE (@branch IS NULL OR branch = @branch)'
      )
      .get({ branch });

    const rows = this.db
      .prepare<{ branch: string | null; limit: number; offset: number }, RunRow>(
        `SELECT * FROM history_runs
         WHERE (@branch IS NULL OR branch = @branch)
         ORDER BY timestamp DESC, id DESC
         LIMIT @limit OFFSET @offset`
      )
      .all({ branch, limit: options.limit ?? 20, offset: options.offset ?? 0 });

    return { entries: rows.map((row) => this.mapRun(row)), total: count?.total ?? 0 };
  }

  async testHistory(key: AutomationKey, window: HistoryWindow): Promise<TestHistoryPoint[]> {
    const rows = this.db
      .prepare<{ key: string; since: string | null; limit: number }, TestPointRow>(
        `SELECT r.execution_id, r.branch, r.timestamp, x.status, x.duration_ms, x.error_message
         FROM history_results x
         JOIN history_runs r ON r.id = x.history_run_id
         WHERE x.automation_key = @key AND (@since IS NULL OR r.timestamp >= @since)
         ORDER BY r.timestamp DESC, r.id DESC
         LIMIT @limit`
      )
      .all({ key, since: since(window), limit: window.maxEntries ?? -1 });

    return rows.map((row) => ({
      executionId: row.execution_id,
      branch: row.branch,
      timestamp: new Date(row.timestamp),
      status: statusSchema.parse(row.status),
      durationMs: row.duration_ms,
      errorMessage: row.error_message ?? undefined,
    }));
  }

  async branchStats(branch: string, days: number, now: Date = new Date()): Promise<BranchStats> {
    const params = { branch, since: since({ days, now }) };

    const stats = this.db
      .prepare<{ branch: string; since: string | null }, BranchStatsRow>(
        `SELECT COUNT(*) AS runs, AVG(pass_rate) AS average_pass_rate,
                SUM(total) AS total_tests, SUM(failed) AS total_failures
         FROM history_runs
         WHERE branch = @branch AND (@since IS NULL OR timestamp >= @since)`
      )
      .get(params);

    const [latest] = this.selectRuns({ branch, since: params.since, limit: 1 });

    return {
      branch,
      days,
      runs: stats?.runs ?? 0,
      averagePassRate: Math.round((stats?.average_pass_rate ?? 0) * 100) / 100,
      totalTests: stats?.total_tests ?? 0,
      totalFailures: stats?.total_failures ?? 0,
      latestRiskLevel: latest ? riskLevelSchema.parse(latest.risk_level) : undefined,
      latestTimestamp: latest ? new Date(latest.timestamp) : undefined,
    };
  }

  async healthCheck(): Promise<boolean> {
    return healthCheck(this.db);
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
    }
  }

  private selectRuns(params: WindowParams): RunRow[] {
    return this.db
      .prepare<WindowParams, RunRow>(
        `SELECT * FROM history_runs
         WHERE (@branch IS NULL OR branch = @branch) AND (@since IS NULL OR timestamp >= @since)
         ORDER BY timestamp DESC, id DESC
         LIMIT @limit`
      )
      .all(params);
  }

  private resultsFor(historyRunId: number): HistoryResult[] {
    const rows = this.db
      .prepare<[number], ResultRow>('SELECT * FROM history_results WHERE history_run_id = ? ORDER BY id')
      .all(historyRunId);

    return rows.map((row) => ({
      automationKey: toAutomationKey(row.automation_key),
      featureName: row.feature_name,
      scenarioName: row.scenario_name,
      exampleIndex: row.example_index ?? undefined,
      status: statusSchema.parse(row.status),
      durationMs: row.duration_ms,
      tags: tagsSchema.parse(JSON.parse(row.tags_json)),
      errorMessage: row.error_message ?? undefined,
    }));
  }

  private mapRun(row: RunRow): HistoryRun {
    return {
      id: row.id,
      branch: row.branch,
      timestamp: new Date(row.timestamp),
      executionId: row.execution_id,
      runId: row.run_id ?? undefined,
      commitSha: row.commit_sha ?? undefined,
      summary: summarySchema.parse(JSON.parse(row.summary_json)),
      riskLevel: riskLevelSchema.parse(row.risk_level),
    };
  }
}
