/**
 * Request Context Middleware
 * TraceId propagation for log correlation
 *
 * - Reuses x-trace-id from the client (sanitized) or generates a UUID
 * - Attaches req.traceId and req.log (child logger with traceId)
 * - Returns x-trace-id in the response header
 */

import type { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { logger, type Logger } from '../lib/logger/structured-logger.js';

declare global {
  namespace Express {
    interface Request {
      traceId: string;
      log: Logger;
    }
  }
}

export function resolveTraceId(req: Request): string {
  const raw = req.headers['x-trace-id'];
  const rawTraceId = typeof raw === 'string' ? raw : undefined;

  // Allow only safe chars, bounded length; blocks CR/LF
  if (rawTraceId && rawTraceId.length <= 128 && /^[a-zA-Z0-9_-]+$/.test(rawTraceId)) {
    return rawTraceId;
  }

  return uuidv4();
}

export function requestContextMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const traceId = resolveTraceId(req);

  req.traceId = traceId;
  req.log = logger.child({ traceId });

  res.setHeader('x-trace-id', traceId);

  next();
}
