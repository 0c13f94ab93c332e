// types/attendance/error.ts

// Error code enum
export enum ErrorCode {
  INVALID_COORDINATE = 'INVALID_COORDINATE',
  INVALID_SCHEDULE = 'INVALID_SCHEDULE',
  INVALID_EVENT_TIME = 'INVALID_EVENT_TIME',
  INVALID_REASON = 'INVALID_REASON',
  OUTSIDE_GEOFENCE = 'OUTSIDE_GEOFENCE',
  ALREADY_OPEN_SESSION = 'ALREADY_OPEN_SESSION',
  NO_OPEN_SESSION = 'NO_OPEN_SESSION',
  NOT_REGISTERED = 'NOT_REGISTERED',
  UNAUTHORIZED = 'UNAUTHORIZED',
  NO_PENDING_ACTION = 'NO_PENDING_ACTION',
  DISPATCH_FAILURE = 'DISPATCH_FAILURE',
  STORE_UNAVAILABLE = 'STORE_UNAVAILABLE',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
}

export interface AppErrorParams {
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
  originalError?: unknown;
}

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: Record<string, unknown>;
  public readonly originalError?: unknown;

  constructor(params: AppErrorParams) {
    super(params.message);
    this.code = params.code;
    this.details = params.details;
    this.originalError = params.originalError;
    this.name = 'AppError';

    // Maintains proper stack trace for where our error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AppError);
    }
  }
}

export type Result<T> =
  | { success: true; data: T }
  | { success: false; error: AppError };

export function ok<T>(data: T): Result<T> {
  return { success: true, data };
}

export function fail<T>(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
): Result<T> {
  return { success: false, error: new AppError({ code, message, details }) };
}

/**
 * Anything that is not already an AppError is treated as a store failure:
 * the only I/O the engine components perform is against the store.
 */
export function toAppError(
  error: unknown,
  fallback: ErrorCode = ErrorCode.STORE_UNAVAILABLE,
): AppError {
  if (error instanceof AppError) return error;
  return new AppError({
    code: fallback,
    message: error instanceof Error ? error.message : String(error),
    originalError: error,
  });
}
