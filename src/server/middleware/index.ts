/**
 * Middleware exports
 */

export { API_ROUTES, errorHandler, HttpError, notFoundHandler } from './http-errors.js';
export type { ErrorBody, HistoryApiErrorCode } from './http-errors.js';
export { REQUEST_ID_HEADER, requestIdOf, requestLogger } from './request-logger.js';
