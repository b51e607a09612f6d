/**
 * History API Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { z } from 'zod';
import { withTestServer } from './test-server.js';
import { createTestClient, readBody, seeders } from './test-helpers.js';
import { NOW, historyEntry } from '../fixtures/history.js';

const today = historyEntry(0, { 'get user': 'passed', 'create user': 'failed' });
const yesterday = historyEntry(1, { 'get user': 'failed', 'create user': 'failed' });
const twoDaysAgo = historyEntry(2, { 'get user': 'passed', 'create user': 'failed' });
const featureBranch = historyEntry(0, { 'get user': 'failed' }, 'feature/refunds');

const errorBody = z.object({ error: z.string(), message: z.string(), code: z.string().optional() });

const runsBody = z.object({
  data: z.array(z.object({ executionId: z.string(), branch: z.string(), riskLevel: z.string() })),
  pagination: z.object({ page: z.number(), limit: z.number(), total: z.number(), totalPages: z.number() }),
});

describe('History API', () => {
  const server = withTestServer({ now: () => NOW, flakyThreshold: 0.3 }, (history) =>
    seeders.history(history, [today, yesterday, twoDaysAgo, featureBranch])
  );
  const client = createTestClient(server);

  describe('GET /api/history/runs', () => {
    it('should page one branch newest first', async () => {
      const response = await client.get('/api/history/runs?branch=main&limit=2');

      assert.strictEqual(response.status, 200);
      const body = await readBody(response, runsBody);
      assert.deepStrictEqual(body.pagination, { page: 1, limit: 2, total: 3, totalPages: 2 });
      assert.deepStrictEqual(body.data.map((run) => run.executionId), [today.executionId, yesterday.executionId]);
    });

    it('should serve later pages', async () => {
      const body = await readBody(await client.get('/api/history/runs?branch=main&limit=2&page=2'), runsBody);

      assert.deepStrictEqual(body.data.map((run) => run.executionId), [twoDaysAgo.executionId]);
    });

    it('should reject invalid paging', async () => {
      const response = await client.get('/api/history/runs?limit=0');

      assert.strictEqual(response.status, 400);
      const body = await readBody(response, errorBody);
      assert.strictEqual(body.error, 'Bad Request');
      assert.strictEqual(body.code, 'INVALID_QUERY');
      assert.match(body.message, /^Invalid query limit: /);
    });
  });

  describe('GET /api/history/tests/:key', () => {
    it('should return one test timeline across branches', async () => {
      const response = await client.get(`/api/history/tests/${encodeURIComponent('users api::get user')}`);

      assert.strictEqual(response.status, 200);
      const body = await readBody(
        response,
        z.object({
          automationKey: z.string(),
          flakiness: z.number(),
          runs: z.number(),
          failures: z.number(),
          history: z.array(z.object({ branch: z.string(), status: z.string(), timestamp: z.string() })),
        })
      );
      assert.strictEqual(body.automationKey, 'users api::get user');
      assert.strictEqual(body.flakiness, 0.5);
      assert.strictEqual(body.runs, 4);
      assert.strictEqual(body.failures, 2);
      assert.deepStrictEqual(
        body.history.map((point) => [point.branch, point.status]),
        [
          ['feature/refunds', 'failed'],
          ['main', 'passed'],
          ['main', 'failed'],
          ['main', 'passed'],
        ]
      );
    });

    it('should reject malformed keys', async () => {
      const response = await client.get('/api/history/tests/not-a-key');

      assert.strictEqual(response.status, 400);
      assert.strictEqual((await readBody(response, errorBody)).code, 'INVALID_KEY');
    });

    it('should answer 404 for keys without history', async () => {
      const response = await client.get(`/api/history/tests/${encodeURIComponent('users api::delete user')}`);

      assert.strictEqual(response.status, 404);
      assert.deepStrictEqual(await readBody(response, errorBody), {
        error: 'Not Found',
        message: 'No history for "users api::delete user"',
        code: 'UNKNOWN_KEY',
      });
    });
  });

  describe('GET /api/history/flaky', () => {
    const flakyBody = z.object({
      threshold: z.number(),
      runsAnalyzed: z.number(),
      data: z.array(
        z.object({
          automationKey: z.string(),
          featureName: z.string(),
          scenarioName: z.string(),
          flakiness: z.number(),
          runs: z.number(),
          failures: z.number(),
          lastStatus: z.string(),
        })
      ),
    });

    it('should list tests above the configured threshold', async () => {
      const body = await readBody(await client.get('/api/history/flaky?branch=main'), flakyBody);

      assert.deepStrictEqual(body, {
        threshold: 0.3,
        runsAnalyzed: 3,
        data: [
          {
            automationKey: 'users api::get user',
            featureName: 'Users API',
            scenarioName: 'get user',
            flakiness: 0.33,
            runs: 3,
            failures: 1,
            lastStatus: 'passed',
          },
        ],
      });
    });

    it('should honour an explicit threshold', async () => {
      const body = await readBody(await client.get('/api/history/flaky?branch=main&threshold=0.5'), flakyBody);

      assert.strictEqual(body.threshold, 0.5);
      assert.deepStrictEqual(body.data, []);
    });

    it('should reject thresholds above one', async () => {
      const response = await client.get('/api/history/flaky?threshold=2');

      assert.strictEqual(response.status, 400);
      assert.strictEqual((await readBody(response, errorBody)).code, 'INVALID_QUERY');
    });
  });

  describe('GET /api/history/branches/:branch/stats', () => {
    it('should aggregate the branch over the requested days', async () => {
      const response = await client.get('/api/history/branches/main/stats?days=7');

      assert.strictEqual(response.status, 200);
      assert.deepStrictEqual(
        await readBody(
          response,
          z.object({
            branch: z.string(),
            days: z.number(),
            runs: z.number(),
            averagePassRate: z.number(),
            totalTests: z.number(),
            totalFailures: z.number(),
            latestRiskLevel: z.string().optional(),
            latestTimestamp: z.string().optional(),
          })
        ),
        {
          branch: 'main',
          days: 7,
          runs: 3,
          averagePassRate: 33.33,
          totalTests: 6,
          totalFailures: 4,
          latestRiskLevel: 'CRITICAL',
          latestTimestamp: NOW.toISOString(),
        }
      );
    });

    it('should accept encoded branch names', async () => {
      const response = await client.get(`/api/history/branches/${encodeURIComponent('feature/refunds')}/stats`);

      assert.strictEqual(response.status, 200);
      assert.strictEqual((await readBody(response, z.object({ runs: z.number() }))).runs, 1);
    });
  });
});
