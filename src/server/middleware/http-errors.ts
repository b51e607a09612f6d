/**
 * Error and 404 responses of the history API
 */

import type { ErrorRequestHandler, RequestHandler } from 'express';
import { CollaboratorUnavailableError, PipelineError, errorMessage } from '../../errors.js';
import { createModuleLogger } from '../../utils/logger.js';
import { requestIdOf } from './request-logger.js';

const logger = createModuleLogger('server:errors');

export type HistoryApiErrorCode = 'INVALID_QUERY' | 'INVALID_KEY' | 'UNKNOWN_KEY';

/**
 * A request the history API refuses
 */
export class HttpError extends Error {
  constructor(
    public readonly statusCode: 400 | 404,
    message: string,
    public readonly code: HistoryApiErrorCode
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

export const API_ROUTES = [
  'GET /health',
  'GET /health/ready',
  'GET /health/live',
  'GET /api/history/runs',
  'GET /api/history/tests/:key',
  'GET /api/history/flaky',
  'GET /api/history/branches/:branch/stats',
] as const;

const STATUS_TEXT: Record<number, string> = {
  400: 'Bad Request',
  404: 'Not Found',
  500: 'Internal Server Error',
  503: 'Service Unavailable',
};

export interface ErrorBody {
  error: string;
  message: string;
  code?: string;
  requestId?: string;
}

function statusOf(err: unknown): number {
  if (err instanceof HttpError) {
    return err.statusCode;
  }
  // The store may come back; everything else is a bug
  return err instanceof CollaboratorUnavailableError ? 503 : 500;
}

function codeOf(err: unknown): string | undefined {
  return err instanceof HttpError || err instanceof PipelineError ? err.code : undefined;
}

export const errorHandler: ErrorRequestHandler = (err: unknown, req, res, _next) => {
  const statusCode = statusOf(err);
  const message = errorMessage(err);

  if (statusCode === 500) {
    logger.error(err instanceof Error ? err : new Error(message), `${req.method} ${req.originalUrl} failed`);
  } else {
    logger.warn('Request rejected', { path: req.originalUrl, statusCode, code: codeOf(err), error: message });
  }

  const body: ErrorBody = {
    error: STATUS_TEXT[statusCode] ?? 'Error',
    message,
    code: codeOf(err),
    requestId: requestIdOf(res),
  };
  res.status(statusCode).json(body);
};

/**
 * 404 for anything outside the routes above, listing them
 */
export const notFoundHandler: RequestHandler = (req, res) => {
  res.status(404).json({
    error: 'Not Found',
    message: `No route for ${req.method} ${req.path}`,
    path: req.path,
    routes: API_ROUTES,
  });
};
