/**
 * Error Logging Utilities
 *
 * - Consistent error response format
 * - Request ID in every error response
 * - No stack traces in production
 * - Every error is logged before it is returned
 */

import { NextResponse } from 'next/server';
import { ZodError } from 'zod';
import { logger, type LogContext } from '@/lib/logger';

const isProduction = process.env.NODE_ENV === 'production';

export enum ErrorCode {
  // Validation errors
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  INVALID_FILTER = 'INVALID_FILTER',

  // Authentication errors
  UNAUTHORIZED = 'UNAUTHORIZED',
  FORBIDDEN = 'FORBIDDEN',

  // Server errors
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  STORE_UNAVAILABLE = 'STORE_UNAVAILABLE',
  TIMEOUT = 'TIMEOUT',
}

export class ApiError extends Error {
  code: ErrorCode;
  statusCode: number;
  context?: LogContext;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.INTERNAL_ERROR,
    statusCode: number = 500,
    context?: LogContext,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ApiError';
    this.code = code;
    this.statusCode = statusCode;
    this.context = context;
  }

  static unauthorized(message: string = 'Unauthorized', context?: LogContext): ApiError {
    return new ApiError(message, ErrorCode.UNAUTHORIZED, 401, context);
  }

  static forbidden(message: string = 'Forbidden', context?: LogContext): ApiError {
    return new ApiError(message, ErrorCode.FORBIDDEN, 403, context);
  }

  /**
   * 422: a caller-supplied argument failed validation
   */
  static validation(message: string, context?: LogContext): ApiError {
    return new ApiError(message, ErrorCode.VALIDATION_ERROR, 422, context);
  }

  /**
   * 422: a store query was built with a malformed time window
   */
  static invalidFilter(message: string, context?: LogContext): ApiError {
    return new ApiError(message, ErrorCode.INVALID_FILTER, 422, context);
  }

  /**
   * 503: the persistence layer could not be reached
   */
  static storeUnavailable(message: string, cause?: unknown, context?: LogContext): ApiError {
    return new ApiError(message, ErrorCode.STORE_UNAVAILABLE, 503, context, { cause });
  }

  static timeout(message: string = 'Request timed out', context?: LogContext): ApiError {
    return new ApiError(message, ErrorCode.TIMEOUT, 504, context);
  }

  static internal(message: string = 'Internal server error', context?: LogContext): ApiError {
    return new ApiError(message, ErrorCode.INTERNAL_ERROR, 500, context);
  }
}

export interface ApiErrorResponse {
  error: {
    code: ErrorCode;
    message: string;
    requestId?: string;
    details?: unknown;
    stack?: string;
  };
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export function logError(
  error: Error,
  context?: LogContext,
  requestId?: string
): void {
  const errorContext: LogContext = {
    ...context,
    ...(error instanceof ApiError ? { code: error.code, statusCode: error.statusCode } : {}),
    ...(requestId ? { requestId } : {}),
  };

  if (error instanceof ApiError) {
    // 4xx at warn
    if (error.statusCode < 500) {
      logger.warn(`API Error: ${error.message}`, errorContext);
    } else {
      logger.error(`API Error: ${error.message}`, error, errorContext);
    }
  } else {
    logger.error(`Error: ${error.message}`, error, errorContext);
  }
}

/**
 * HTTP status an error will be rendered with
 */
export function statusCodeFor(error: unknown): number {
  if (error instanceof ZodError) return 422;
  if (error instanceof ApiError) return error.statusCode;
  return 500;
}

export function errorResponse(
  error: unknown,
  requestId?: string
): NextResponse<ApiErrorResponse> {
  if (error instanceof ZodError) {
    logError(error, undefined, requestId);
    return NextResponse.json<ApiErrorResponse>(
      {
        error: {
          code: ErrorCode.VALIDATION_ERROR,
          message: 'Validation failed',
          requestId,
          details: error.issues,
        },
      },
      { status: 422 }
    );
  }

  if (error instanceof ApiError) {
    logError(error, undefined, requestId);
    return NextResponse.json<ApiErrorResponse>(
      {
        error: {
          code: error.code,
          message: error.message,
          requestId,
          details: error.context,
          ...(isProduction ? {} : { stack: error.stack }),
        },
      },
      { status: error.statusCode }
    );
  }

  const generic = toError(error);
  logError(generic, undefined, requestId);
  return NextResponse.json<ApiErrorResponse>(
    {
      error: {
        code: ErrorCode.INTERNAL_ERROR,
        message: isProduction ? 'Internal server error' : generic.message,
        requestId,
        ...(isProduction ? {} : { stack: generic.stack }),
      },
    },
    { status: 500 }
  );
}

/**
 * Reject with a 504 ApiError when the operation does not settle in time.
 * The timer is always cleared so it never keeps the process alive.
 */
export function withTimeout<T>(operation: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(ApiError.timeout(`${label} timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  return Promise.race([operation, timeout]).finally(() => {
    clearTimeout(timer);
  });
}
