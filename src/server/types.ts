/**
 * History API types
 */

import type { Request, Response, NextFunction } from 'express';
import type { HistoryStore } from '../services/history/index.js';

export interface ServerConfig {
  /**
   * 0 picks a free port
   */
  port: number;

  host?: string;

  enableCors?: boolean;
  corsOrigins?: string | string[];

  enableHelmet?: boolean;
  enableRequestLogging?: boolean;

  /**
   * Milliseconds before a pending request is answered with 503
   */
  requestTimeout?: number;
}

export type AsyncRequestHandler = (req: Request, res: Response, next: NextFunction) => Promise<void> | void;

export interface ServerDependencies {
  history: HistoryStore;

  /**
   * Default minimum score for `/api/history/flaky`
   */
  flakyThreshold?: number;

  /**
   * Default number of runs per test in the history window
   */
  maxEntries?: number;

  now?: () => Date;
}
