/**
 * HTTP Logging Middleware
 * One log line per request and one per response, level chosen by status code.
 * Query strings are logged as parsed objects; the gateway never receives the provider key.
 */

import type { Request, Response, NextFunction } from 'express';

export function httpLoggingMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const startTime = Date.now();

  req.log.info({
    method: req.method,
    path: req.path,
    query: req.query,
  }, 'HTTP request');

  res.on('finish', () => {
    const level = res.statusCode >= 500 ? 'error'
                : res.statusCode >= 400 ? 'warn'
                : 'info';

    req.log[level]({
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      durationMs: Date.now() - startTime,
    }, 'HTTP response');
  });

  next();
}
