/**
 * Router utilities
 *
 * Async handler wrapping and query validation for the history routes.
 */

import type { Request, Response, NextFunction } from 'express';
import type { z } from 'zod';
import { logger } from '../../utils/logger.js';
import { HttpError } from '../middleware/http-errors.js';
import type { AsyncRequestHandler } from '../types.js';

/**
 * Wrap async handler with error handling
 */
export function asyncHandler(handler: AsyncRequestHandler): AsyncRequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(handler(req, res, next)).catch((err: unknown) => {
      logger.debug(`Error in ${req.method} ${req.path}`);
      next(err);
    });
  };
}

/**
 * Get a route parameter as a string
 */
export function getParam(req: Request, name: string): string {
  const value = req.params[name];
  if (Array.isArray(value)) {
    return value[0] ?? '';
  }
  return value ?? '';
}

/**
 * Validate the query string, 400 on the first bad parameter
 */
export function parseQuery<T extends z.ZodTypeAny>(req: Request, schema: T): z.output<T> {
  const parsed = schema.safeParse(req.query);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new HttpError(400, `Invalid query ${where}${issue?.message ?? 'invalid value'}`, 'INVALID_QUERY');
  }
  return parsed.data;
}

/**
 * Send paginated response
 */
export interface PaginatedResponse<T> {
  data: T[];
  pagination: {
    page: number;
    limit: number;
    total: number;
    totalPages: number;
  };
}

export function sendPaginatedResponse<T>(
  res: Response,
  data: T[],
  total: number,
  page: number,
  limit: number
): void {
  const body: PaginatedResponse<T> = {
    data,
    pagination: {
      page,
      limit,
      total,
      totalPages: Math.ceil(total / limit),
    },
  };
  res.json(body);
}
