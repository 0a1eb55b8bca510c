/**
 * HTTP request logging middleware
 * Logs incoming requests and completed responses with their duration
 */

import type { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { createLogger } from '../utils/logger.js';

const logger = createLogger({ module: 'http' });

/**
 * Request logger middleware
 * The request id is kept in `res.locals.requestId` for later handlers
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const startTime = Date.now();
  const requestId = uuidv4().slice(0, 12);
  res.locals.requestId = requestId;

  logger.debug({
    event: 'request_received',
    requestId,
    method: req.method,
    path: req.path,
    ip: req.ip,
    userAgent: req.get('user-agent'),
  }, `${req.method} ${req.path}`);

  res.on('finish', () => {
    const duration = Date.now() - startTime;
    const level = getLogLevel(res.statusCode);

    logger[level]({
      event: 'request_completed',
      requestId,
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      duration_ms: duration,
    }, `${req.method} ${req.path} ${res.statusCode} (${duration}ms)`);
  });

  next();
}

/**
 * Determine log level based on HTTP status code
 */
function getLogLevel(statusCode: number): 'info' | 'warn' | 'error' {
  if (statusCode >= 500) {
    return 'error';
  }
  if (statusCode >= 400) {
    return 'warn';
  }
  return 'info';
}
