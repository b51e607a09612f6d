/**
 * SQLite history store tests (in-memory database)
 */

import { afterEach, beforeEach, describe, it } from 'node:test';
import assert from 'node:assert';
import pino from 'pino';
import { z } from 'zod';
import { SqliteHistoryStore } from '../../src/database/index.js';
import { Logger } from '../../src/utils/logger.js';
import type { HistoryEntry } from '../../src/types/index.js';
import { NOW, historyEntry, keyOf } from '../fixtures/history.js';

describe('SqliteHistoryStore', () => {
  let store: SqliteHistoryStore;
  let today: HistoryEntry;
  let yesterday: HistoryEntry;
  let twoDaysAgo: HistoryEntry;
  let lastWeek: HistoryEntry;
  let featureBranch: HistoryEntry;

  beforeEach(async () => {
    store = SqliteHistoryStore.open(':memory:');

    today = historyEntry(0, { 'get user': 'passed', 'create user': 'failed' });
    yesterday = historyEntry(1, { 'get user': 'failed' });
    twoDaysAgo = historyEntry(2, { 'get user': 'passed' });
    lastWeek = historyEntry(10, { 'get user': 'passed' });
    featureBranch = historyEntry(0, { 'get user': 'failed' }, 'feature/refunds');

    // insertion order differs from time order
    for (const entry of [twoDaysAgo, today, lastWeek, yesterday, featureBranch]) {
      await store.append(entry);
    }
  });

  afterEach(async () => {
    await store.close();
  });

  it('should assign ids on append', async () => {
    const stored = await store.append(historyEntry(3, { 'get user': 'passed' }));
    assert.strictEqual(stored.id, 6);
  });

  it('should return a branch history newest first', async () => {
    const entries = await store.query({ branch: 'main' }, {});

    assert.deepStrictEqual(
      entries.map((e) => e.executionId),
      [today.executionId, yesterday.executionId, twoDaysAgo.executionId, lastWeek.executionId]
    );
  });

  it('should read back summary, risk and results', async () => {
    const [stored] = await store.query({ branch: 'main' }, { maxEntries: 1 });
    assert.ok(stored);

    assert.strictEqual(stored.id, 2);
    assert.strictEqual(stored.timestamp.getTime(), NOW.getTime());
    assert.strictEqual(stored.riskLevel, 'CRITICAL');
    assert.deepStrictEqual(stored.summary, today.summary);
    assert.deepStrictEqual(
      stored.results.map((r) => [r.automationKey, r.status, r.errorMessage, r.durationMs]),
      [
        ['users api::get user', 'passed', undefined, 25],
        ['users api::create user', 'failed', 'assertion failed in create user', 25],
      ]
    );
  });

  it('should restrict results to the requested keys', async () => {
    const entries = await store.query({ branch: 'main', automationKeys: [keyOf('create user')] }, {});

    assert.strictEqual(entries.length, 1);
    assert.strictEqual(entries[0]?.executionId, today.executionId);
    assert.deepStrictEqual(entries[0]?.results.map((r) => r.scenarioName), ['create user']);
  });

  it('should apply the rolling window', async () => {
    const byCount = await store.query({ branch: 'main' }, { maxEntries: 2 });
    assert.deepStrictEqual(byCount.map((e) => e.executionId), [today.executionId, yesterday.executionId]);

    const byAge = await store.query({ branch: 'main' }, { days: 7, now: NOW });
    assert.deepStrictEqual(
      byAge.map((e) => e.executionId),
      [today.executionId, yesterday.executionId, twoDaysAgo.executionId]
    );

    const everything = await store.query({}, {});
    assert.strictEqual(everything.length, 5);
  });

  it('should page run listings', async () => {
    const page = await store.listEntries({ branch: 'main', limit: 2, offset: 1 });

    assert.strictEqual(page.total, 4);
    assert.deepStrictEqual(page.entries.map((e) => e.executionId), [yesterday.executionId, twoDaysAgo.executionId]);
  });

  it('should list one test across branches', async () => {
    const points = await store.testHistory(keyOf('get user'), {});

    assert.deepStrictEqual(
      points.map((p) => [p.branch, p.status]),
      [
        ['feature/refunds', 'failed'],
        ['main', 'passed'],
        ['main', 'failed'],
        ['main', 'passed'],
        ['main', 'passed'],
      ]
    );
    assert.strictEqual(points[0]?.errorMessage, 'assertion failed in get user');

    const latest = await store.testHistory(keyOf('get user'), { maxEntries: 2 });
    assert.strictEqual(latest.length, 2);
  });

  it('should aggregate branch statistics over the day span', async () => {
    assert.deepStrictEqual(await store.branchStats('main', 7, NOW), {
      branch: 'main',
      days: 7,
      runs: 3,
      averagePassRate: 50,
      totalTests: 4,
      totalFailures: 2,
      latestRiskLevel: 'CRITICAL',
      latestTimestamp: NOW,
    });

    assert.deepStrictEqual(await store.branchStats('release', 7, NOW), {
      branch: 'release',
      days: 7,
      runs: 0,
      averagePassRate: 0,
      totalTests: 0,
      totalFailures: 0,
      latestRiskLevel: undefined,
      latestTimestamp: undefined,
    });
  });

  it('should report health until closed', async () => {
    assert.strictEqual(await store.healthCheck(), true);
    await store.close();
    assert.strictEqual(await store.healthCheck(), false);
  });
});

describe('SqliteHistoryStore statement logging', () => {
  const logLine = z.object({ msg: z.string(), sql: z.string().optional() });

  function recordingLogger(lines: string[]): Logger {
    return new Logger({}, pino({ level: 'debug' }, { write: (line: string) => lines.push(line) }));
  }

  function loggedStatements(lines: readonly string[]): string[] {
    return lines
      .map((line) => logLine.parse(JSON.parse(line)))
      .filter((entry) => entry.msg === 'Query')
      .map((entry) => entry.sql ?? '');
  }

  it('should log statements at debug level when enabled', async () => {
    const lines: string[] = [];
    const store = SqliteHistoryStore.open(':memory:', { logger: recordingLogger(lines), logQueries: true });

    await store.healthCheck();
    await store.close();

    assert.ok(loggedStatements(lines).includes('SELECT 1'));
  });

  it('should log no statements by default', async () => {
    const lines: string[] = [];
    const store = SqliteHistoryStore.open(':memory:', { logger: recordingLogger(lines) });

    await store.healthCheck();
    await store.close();

    assert.deepStrictEqual(loggedStatements(lines), []);
    assert.strictEqual(lines.length, 1);
  });
});
