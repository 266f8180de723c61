/**
 * Standardized Error Handling for the inventory-segments service
 *
 * Provides consistent error codes, response formats, and logging patterns.
 *
 * @module lib/errors
 */

// ============================================================================
// Error Codes
// ============================================================================

/**
 * Standard error codes for API responses
 */
export enum ErrorCode {
  // Client Errors (4xx)
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  METHOD_NOT_ALLOWED = 'METHOD_NOT_ALLOWED',

  // Server Errors (5xx)
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  SOURCE_UNAVAILABLE = 'SOURCE_UNAVAILABLE',
  CONFIG_ERROR = 'CONFIG_ERROR',
}

/**
 * Maps error codes to HTTP status codes
 */
export const ErrorCodeToStatus: Record<ErrorCode, number> = {
  [ErrorCode.VALIDATION_ERROR]: 400,
  [ErrorCode.METHOD_NOT_ALLOWED]: 405,
  [ErrorCode.INTERNAL_ERROR]: 500,
  [ErrorCode.SOURCE_UNAVAILABLE]: 503,
  [ErrorCode.CONFIG_ERROR]: 500,
};

// ============================================================================
// Error Types
// ============================================================================

/**
 * Standardized error response format
 */
export interface ErrorResponse {
  error: ErrorCode;
  message: string;
  details?: unknown;
  requestId?: string;
  timestamp: string;
}

/**
 * API Lambda response format
 */
export interface ApiResponse {
  statusCode: number;
  headers?: Record<string, string>;
  body: string;
}

/**
 * Application error with code and details
 */
export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: unknown;
  public readonly httpStatus: number;

  constructor(code: ErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.details = details;
    this.httpStatus = ErrorCodeToStatus[code];
  }
}

/**
 * The products table could not be read. Halts the load; the engine does
 * not retry.
 */
export class SourceUnavailableError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCode.SOURCE_UNAVAILABLE, message, {
      cause: cause instanceof Error ? cause.message : cause === undefined ? undefined : String(cause),
    });
    this.name = 'SourceUnavailableError';
  }
}

// ============================================================================
// Error Helpers
// ============================================================================

export const DEFAULT_HEADERS: Record<string, string> = {
  'Content-Type': 'application/json',
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'GET, OPTIONS',
  'Access-Control-Allow-Headers': 'Content-Type, Authorization',
};

/**
 * Create a standardized error response
 */
export function createErrorResponse(
  code: ErrorCode,
  message: string,
  details?: unknown,
  requestId?: string
): ApiResponse {
  const body: ErrorResponse = {
    error: code,
    message,
    details,
    requestId,
    timestamp: new Date().toISOString(),
  };

  return {
    statusCode: ErrorCodeToStatus[code],
    headers: DEFAULT_HEADERS,
    body: JSON.stringify(body),
  };
}

/**
 * Create a success response
 */
export function createSuccessResponse<T>(data: T, statusCode: number = 200): ApiResponse {
  return {
    statusCode,
    headers: DEFAULT_HEADERS,
    body: JSON.stringify(data),
  };
}

function isZodError(error: unknown): error is Error & { issues: unknown[] } {
  return error instanceof Error && error.name === 'ZodError' && 'issues' in error && Array.isArray(error.issues);
}

/**
 * Handle errors consistently and return appropriate response
 */
export function handleError(error: unknown, context: string, requestId?: string): ApiResponse {
  const errorMessage = error instanceof Error ? error.message : String(error);
  const errorStack = error instanceof Error ? error.stack : undefined;

  console.error(JSON.stringify({
    level: 'error',
    msg: 'error.handler',
    context,
    requestId,
    error: errorMessage,
    stack: errorStack,
    timestamp: new Date().toISOString(),
  }));

  if (error instanceof AppError) {
    return createErrorResponse(error.code, error.message, error.details, requestId);
  }

  if (isZodError(error)) {
    return createErrorResponse(
      ErrorCode.VALIDATION_ERROR,
      'Request validation failed',
      error.issues,
      requestId
    );
  }

  return createErrorResponse(
    ErrorCode.INTERNAL_ERROR,
    'An unexpected error occurred',
    process.env.STAGE === 'dev' ? errorMessage : undefined,
    requestId
  );
}
