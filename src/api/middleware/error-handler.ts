import type { Request, Response, NextFunction } from 'express';
import type { ZodError } from 'zod';
import type { AppError, ErrorCode } from '../../domain/errors.js';
import { logger } from '../../infrastructure/logger.js';

export interface ApiResponse<T> {
  success: boolean;
  data: T | null;
  error: { code: string; message: string; details?: string; retryable?: boolean } | null;
}

export function successResponse<T>(data: T): ApiResponse<T> {
  return { success: true, data, error: null };
}

export function errorResponse(code: string, message: string, details?: string, retryable?: boolean): ApiResponse<null> {
  return { success: false, data: null, error: { code, message, details, retryable } };
}

export function zodDetails(error: ZodError): string {
  return error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
}

function isAppError(value: unknown): value is AppError {
  return (
    typeof value === 'object' &&
    value !== null &&
    'code' in value &&
    'message' in value &&
    'retryable' in value
  );
}

export function mapErrorCodeToStatus(code: ErrorCode | string): number {
  switch (code) {
    case 'AUTH_INVALID':
      return 401;

    case 'PROFILE_NOT_FOUND':
      return 404;

    case 'VALIDATION_ERROR':
      return 422;

    case 'DB_CONNECTION_ERROR':
    case 'OFFERS_UNAVAILABLE':
    case 'DISPATCH_FAILED':
    case 'DISPATCH_TIMEOUT':
    case 'DISPATCH_RATE_LIMITED':
      return 503;

    default:
      return 500;
  }
}

export function sendAppError(res: Response, appError: AppError): void {
  const status = mapErrorCodeToStatus(appError.code);
  res.status(status).json(errorResponse(appError.code, appError.message, appError.details, appError.retryable));
}

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction): void {
  if (isAppError(err)) {
    const status = mapErrorCodeToStatus(err.code);
    res.status(status).json(errorResponse(err.code, err.message, err.details, err.retryable));
    return;
  }

  logger.error({ err: err.message }, 'Unhandled error');
  res.status(500).json(errorResponse('INTERNAL_ERROR', 'An unexpected error occurred', undefined, false));
}
