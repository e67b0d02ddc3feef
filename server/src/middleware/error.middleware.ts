/**
 * Centralized Error Middleware
 * The single place where failures become HTTP responses.
 *
 * - Every error is logged with traceId, method and path before responding
 * - Response bodies never carry stack traces or raw provider messages
 */

import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import type { ErrorCode, ErrorResponse, ValidationIssue } from '../../../shared/api/index.js';
import { logger } from '../lib/logger/structured-logger.js';
import { MapsError } from '../services/maps/maps.errors.js';

/**
 * Application Error - structured error for cases outside the maps taxonomy
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500,
    public readonly code: ErrorCode = 'INTERNAL_ERROR',
    public readonly details?: ValidationIssue[],
    public readonly exposeMessage: boolean = false
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export function toValidationIssues(error: ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.join('.') || 'request',
    message: issue.message,
  }));
}

/**
 * Helper: Create validation error
 * Message lists every issue as "<field>: <message>"
 */
export function createValidationError(error: ZodError): AppError {
  const details = toValidationIssues(error);
  return new AppError(
    details.map((d) => `${d.field}: ${d.message}`).join('; '),
    400,
    'VALIDATION_ERROR',
    details,
    true
  );
}

/**
 * Normalizes anything thrown by a handler into an AppError
 */
export function toAppError(err: unknown): AppError {
  if (err instanceof AppError) {
    return err;
  }
  if (err instanceof MapsError) {
    // Messages are composed by the service and never include provider text
    return new AppError(err.message, err.statusCode, err.kind, undefined, true);
  }
  if (err instanceof ZodError) {
    return createValidationError(err);
  }
  if (isBodyParserError(err)) {
    return new AppError('Malformed JSON body', 400, 'VALIDATION_ERROR', undefined, true);
  }
  return new AppError(err instanceof Error ? err.message : String(err));
}

function isBodyParserError(err: unknown): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

/**
 * Must be registered LAST (after all routes)
 */
export function errorMiddleware(
  err: unknown,
  req: Request,
  res: Response,
  next: NextFunction
): void {
  if (res.headersSent) {
    return next(err);
  }

  const appError = toAppError(err);
  const traceId = req.traceId || 'unknown';
  const statusCode = appError.statusCode;
  const cause = err instanceof Error ? err.cause : undefined;

  const logContext = {
    error: {
      name: err instanceof Error ? err.name : typeof err,
      message: err instanceof Error ? err.message : String(err),
      stack: err instanceof Error ? err.stack : undefined,
      code: appError.code,
      statusCode,
    },
    cause: cause instanceof Error
      ? { name: cause.name, message: cause.message, ...extractProviderFields(cause) }
      : cause,
    traceId,
    method: req.method,
    path: req.path,
  };

  const log = req.log ?? logger;
  if (statusCode >= 500) {
    log.error(logContext, 'Request error');
  } else {
    log.warn(logContext, 'Request error');
  }

  const response: ErrorResponse = {
    error: appError.exposeMessage ? appError.message : getGenericMessage(statusCode),
    code: appError.code,
    traceId,
  };
  if (appError.details) {
    response.details = appError.details;
  }

  res.status(statusCode).json(response);
}

/** Provider status / transport kind, when the cause carries them */
function extractProviderFields(cause: Error): Record<string, string> {
  const fields: Record<string, string> = {};
  if ('status' in cause && typeof cause.status === 'string') fields.providerStatus = cause.status;
  if ('providerMessage' in cause && typeof cause.providerMessage === 'string') {
    fields.providerMessage = cause.providerMessage;
  }
  if ('errorKind' in cause && typeof cause.errorKind === 'string') fields.errorKind = cause.errorKind;
  return fields;
}

/**
 * Get generic error message based on status code
 */
function getGenericMessage(statusCode: number): string {
  switch (statusCode) {
    case 400:
      return 'Invalid request';
    case 404:
      return 'Not found';
    case 500:
      return 'Internal server error';
    case 502:
      return 'Upstream service error';
    case 503:
      return 'Service unavailable';
    default:
      return statusCode >= 500 ? 'Internal server error' : 'Bad request';
  }
}

/**
 * 404 for unknown routes, in the same error shape
 */
export function notFoundMiddleware(req: Request, _res: Response, next: NextFunction): void {
  next(new AppError(`Route not found: ${req.method} ${req.path}`, 404, 'NOT_FOUND', undefined, true));
}
