/**
 * Request ids and the access log
 */

import type { RequestHandler, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { createModuleLogger } from '../../utils/logger.js';

const logger = createModuleLogger('server:http');

export const REQUEST_ID_HEADER = 'X-Request-Id';

type AccessLogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Id assigned by `requestLogger`, if it ran for this response
 */
export function requestIdOf(res: Response): string | undefined {
  const id = res.getHeader(REQUEST_ID_HEADER);
  return typeof id === 'string' ? id : undefined;
}

function levelFor(path: string, statusCode: number): AccessLogLevel {
  if (statusCode >= 500) {
    return 'error';
  }
  if (statusCode >= 400) {
    return 'warn';
  }
  // Orchestrators poll /health every few seconds
  return path.startsWith('/health') ? 'debug' : 'info';
}

/**
 * Reuses an upstream X-Request-Id, otherwise assigns a uuid; logs once per response
 */
export const requestLogger: RequestHandler = (req, res, next) => {
  const requestId = req.get(REQUEST_ID_HEADER) || uuidv4();
  res.setHeader(REQUEST_ID_HEADER, requestId);

  const { method, path } = req;
  const started = process.hrtime.bigint();

  res.on('finish', () => {
    const durationMs = Number(process.hrtime.bigint() - started) / 1e6;
    const { statusCode } = res;
    const entry = { requestId, method, path, statusCode, durationMs: Math.round(durationMs * 100) / 100 };
    const line = `${method} ${path} ${statusCode}`;

    switch (levelFor(path, statusCode)) {
      case 'error':
        logger.error(entry, line);
        break;
      case 'warn':
        logger.warn(entry, line);
        break;
      case 'info':
        logger.info(entry, line);
        break;
      case 'debug':
        logger.debug(entry, line);
        break;
    }
  });

  next();
};
