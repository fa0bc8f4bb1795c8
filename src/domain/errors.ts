export const ErrorCode = {
  // Persistence
  DB_CONNECTION_ERROR: 'DB_CONNECTION_ERROR',
  PROFILE_NOT_FOUND: 'PROFILE_NOT_FOUND',

  // Offers
  OFFERS_UNAVAILABLE: 'OFFERS_UNAVAILABLE',

  // Messaging
  DISPATCH_FAILED: 'DISPATCH_FAILED',
  DISPATCH_TIMEOUT: 'DISPATCH_TIMEOUT',
  DISPATCH_RATE_LIMITED: 'DISPATCH_RATE_LIMITED',
  RECIPIENT_BLOCKED: 'RECIPIENT_BLOCKED',

  // Input
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  AUTH_INVALID: 'AUTH_INVALID',

  // Infrastructure
  CONFIG_INVALID: 'CONFIG_INVALID',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface AppError {
  code: ErrorCode;
  message: string;
  details?: string;
  retryable: boolean;
}

export function createAppError(
  code: ErrorCode,
  message: string,
  retryable: boolean,
  details?: string,
): AppError {
  return { code, message, retryable, details };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
