/**
 * History routes
 *
 * Read-only views over the run history: past runs, one test's timeline,
 * flaky tests and per-branch statistics.
 */

import type { Router, Request, Response } from 'express';
import { Router as expressRouter } from 'express';
import { z } from 'zod';
import { asyncHandler, getParam, parseQuery, sendPaginatedResponse } from './router-utils.js';
import { HttpError } from '../middleware/http-errors.js';
import { CollaboratorUnavailableError, errorMessage } from '../../errors.js';
import { isAutomationKey } from '../../services/automation-key/index.js';
import { findFlakyTests, flakinessOf } from '../../services/run-aggregator/index.js';
import type { ServerDependencies } from '../types.js';

const DEFAULT_FLAKY_THRESHOLD = 0.3;
const DEFAULT_MAX_ENTRIES = 10;

const runsQuery = z.object({
  branch: z.string().min(1).optional(),
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

const windowQuery = z.object({
  days: z.coerce.number().int().positive().optional(),
  limit: z.coerce.number().int().positive().max(500).optional(),
});

const flakyQuery = windowQuery.extend({
  branch: z.string().min(1).optional(),
  threshold: z.coerce.number().min(0).max(1).optional(),
});

const statsQuery = z.object({
  days: z.coerce.number().int().positive().default(7),
});

/**
 * Store failures answer 503 with COLLABORATOR_UNAVAILABLE
 */
async function fromStore<T>(operation: string, read: () => Promise<T>): Promise<T> {
  try {
    return await read();
  } catch (error) {
    throw new CollaboratorUnavailableError('history', `${operation} failed: ${errorMessage(error)}`, error);
  }
}

export function createHistoryRouter(deps: ServerDependencies): Router {
  const historyRouter: Router = expressRouter();
  const { history } = deps;
  const now = deps.now ?? (() => new Date());
  const defaultMaxEntries = deps.maxEntries ?? DEFAULT_MAX_ENTRIES;

  /**
   * GET /api/history/runs
   * Stored runs, newest first
   */
  historyRouter.get(
    '/runs',
    asyncHandler(async (req: Request, res: Response) => {
      const { branch, page, limit } = parseQuery(req, runsQuery);
      const { entries, total } = await fromStore('listing runs', () =>
        history.listEntries({ branch, limit, offset: (page - 1) * limit })
      );

      sendPaginatedResponse(res, entries, total, page, limit);
    })
  );

  /**
   * GET /api/history/tests/:key
   * One test's status timeline and flakiness
   */
  historyRouter.get(
    '/tests/:key',
    asyncHandler(async (req: Request, res: Response) => {
      const key = getParam(req, 'key');
      if (!isAutomationKey(key)) {
        throw new HttpError(400, `"${key}" is not an automation key`, 'INVALID_KEY');
      }

      const { days, limit } = parseQuery(req, windowQuery);
      const points = await fromStore('test history', () =>
        history.testHistory(key, { days, maxEntries: limit ?? defaultMaxEntries, now: now() })
      );
      if (points.length === 0) {
        throw new HttpError(404, `No history for "${key}"`, 'UNKNOWN_KEY');
      }

      res.json({
        automationKey: key,
        flakiness: flakinessOf(points.map((point) => point.status)),
        runs: points.length,
        failures: points.filter((point) => point.status === 'failed').length,
        history: points,
      });
    })
  );

  /**
   * GET /api/history/flaky
   * Tests whose recent outcomes disagree with their majority
   */
  historyRouter.get(
    '/flaky',
    asyncHandler(async (req: Request, res: Response) => {
      const { branch, days, limit, threshold } = parseQuery(req, flakyQuery);
      const window = { days, maxEntries: limit ?? defaultMaxEntries, now: now() };
      const entries = await fromStore('flaky query', () => history.query({ branch }, window));
      const minFlakiness = threshold ?? deps.flakyThreshold ?? DEFAULT_FLAKY_THRESHOLD;

      res.json({
        threshold: minFlakiness,
        runsAnalyzed: entries.length,
        data: findFlakyTests(entries, minFlakiness, window),
      });
    })
  );

  /**
   * GET /api/history/branches/:branch/stats
   */
  historyRouter.get(
    '/branches/:branch/stats',
    asyncHandler(async (req: Request, res: Response) => {
      const { days } = parseQuery(req, statsQuery);
      const branch = getParam(req, 'branch');
      res.json(await fromStore('branch stats', () => history.branchStats(branch, days, now())));
    })
  );

  return historyRouter;
}
