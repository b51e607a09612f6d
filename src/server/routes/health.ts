/**
 * Health routes: liveness, readiness and what the history store holds
 */

import type { Router, Request, Response } from 'express';
import { Router as expressRouter } from 'express';
import { asyncHandler } from './router-utils.js';
import { errorMessage } from '../../errors.js';
import { createModuleLogger } from '../../utils/logger.js';
import type { ServerDependencies } from '../types.js';

const logger = createModuleLogger('server:health');

export type HistoryStatus =
  | { status: 'connected'; runs: number; latestRunAt?: string }
  | { status: 'disconnected' };

export function createHealthRouter({ history, now = () => new Date() }: ServerDependencies): Router {
  const healthRouter: Router = expressRouter();

  async function isConnected(): Promise<boolean> {
    try {
      return await history.healthCheck();
    } catch (error) {
      logger.warn('History health check failed', { error: errorMessage(error) });
      return false;
    }
  }

  async function historyStatus(): Promise<HistoryStatus> {
    if (!(await isConnected())) {
      return { status: 'disconnected' };
    }
    const { entries, total } = await history.listEntries({ limit: 1 });
    return { status: 'connected', runs: total, latestRunAt: entries[0]?.timestamp.toISOString() };
  }

  /**
   * GET /health
   */
  healthRouter.get(
    '/',
    asyncHandler(async (_req: Request, res: Response) => {
      res.json({ status: 'ok', timestamp: now().toISOString(), history: await historyStatus() });
    })
  );

  /**
   * GET /health/ready
   * Ready once the history store answers
   */
  healthRouter.get(
    '/ready',
    asyncHandler(async (_req: Request, res: Response) => {
      const connected = await isConnected();
      res.status(connected ? 200 : 503).json({
        status: connected ? 'ready' : 'not ready',
        timestamp: now().toISOString(),
      });
    })
  );

  /**
   * GET /health/live
   */
  healthRouter.get('/live', (_req: Request, res: Response) => {
    res.json({ status: 'alive', timestamp: now().toISOString() });
  });

  return healthRouter;
}
