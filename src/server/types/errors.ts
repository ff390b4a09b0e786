/**
 * Centralized error type definitions
 * Provides a consistent error hierarchy and error codes
 */

/**
 * Base error class for all application errors
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    isOperational: boolean = true,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Error code enumeration for consistent error handling
 */
export enum ErrorCode {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  BAD_REQUEST = 'BAD_REQUEST',
  NOT_FOUND = 'NOT_FOUND',
  CONFLICT = 'CONFLICT',
  ILLEGAL_STATE_TRANSITION = 'ILLEGAL_STATE_TRANSITION',

  INTERNAL_SERVER_ERROR = 'INTERNAL_SERVER_ERROR',
  FETCH_ERROR = 'FETCH_ERROR',
  ANALYSIS_ERROR = 'ANALYSIS_ERROR',
  STORAGE_ERROR = 'STORAGE_ERROR',
}

export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string, additionalContext?: Record<string, unknown>) {
    const message = identifier ? `${resource} with identifier '${identifier}' not found` : `${resource} not found`;
    super(message, ErrorCode.NOT_FOUND, 404, true, { resource, identifier, ...additionalContext });
  }
}

export class BadRequestError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.BAD_REQUEST, 400, true, context);
  }
}

export class ConflictError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.CONFLICT, 409, true, context);
  }
}

export interface ValidationIssue {
  field: string;
  message: string;
}

/**
 * Rejected input: an exploration config or request body that does not validate.
 */
export class ValidationError extends AppError {
  public readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = []) {
    super(message, ErrorCode.VALIDATION_ERROR, 400, true, { issues });
    this.issues = issues;
  }
}

export class IllegalStateTransitionError extends AppError {
  public readonly from: string;
  public readonly to: string;

  constructor(from: string, to: string, context?: Record<string, unknown>) {
    super(`Illegal job status transition: ${from} -> ${to}`, ErrorCode.ILLEGAL_STATE_TRANSITION, 409, true, {
      from,
      to,
      ...context,
    });
    this.from = from;
    this.to = to;
  }
}

export interface FetchErrorOptions {
  statusCode?: number;
  retryable?: boolean;
  cause?: unknown;
}

/**
 * A page could not be fetched. Retryable failures (network, 429, 5xx) are retried
 * with backoff before the URL is given up on.
 */
export class FetchError extends AppError {
  public readonly url: string;
  public readonly httpStatus?: number;
  public readonly retryable: boolean;

  constructor(url: string, message: string, options: FetchErrorOptions = {}) {
    super(message, ErrorCode.FETCH_ERROR, 502, true, { url, httpStatus: options.statusCode });
    this.url = url;
    this.httpStatus = options.statusCode;
    this.retryable = options.retryable ?? isRetryableStatus(options.statusCode);
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class AnalysisError extends AppError {
  public readonly url: string;
  public readonly step: string;

  constructor(url: string, step: string, message: string) {
    super(message, ErrorCode.ANALYSIS_ERROR, 500, true, { url, step });
    this.url = url;
    this.step = step;
  }
}

export class StorageError extends AppError {
  public readonly operation: string;

  constructor(operation: string, message: string, context?: Record<string, unknown>) {
    super(`Storage operation '${operation}' failed: ${message}`, ErrorCode.STORAGE_ERROR, 500, false, {
      operation,
      ...context,
    });
    this.operation = operation;
  }
}

function isRetryableStatus(statusCode: number | undefined): boolean {
  if (statusCode === undefined) {
    return true;
  }
  return statusCode === 429 || (statusCode >= 500 && statusCode < 600);
}

/**
 * Standardized error response format
 */
export interface ErrorResponse {
  error: string;
  code: string;
  message: string;
  statusCode: number;
  timestamp: string;
  path?: string;
  context?: Record<string, unknown>;
  stack?: string;
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Convert any error to AppError
 */
export function toAppError(error: unknown, defaultMessage: string = 'An unexpected error occurred'): AppError {
  if (isAppError(error)) {
    return error;
  }
  if (error instanceof Error) {
    return new AppError(error.message, ErrorCode.INTERNAL_SERVER_ERROR, 500, false);
  }
  return new AppError(defaultMessage, ErrorCode.INTERNAL_SERVER_ERROR, 500, false);
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export type ErrorCategory = 'network' | 'timeout' | 'http_4xx' | 'http_5xx' | 'parsing' | 'other';

/**
 * Bucket a crawl failure for job error reports.
 */
export function categorizeError(error: unknown): ErrorCategory {
  if (error instanceof FetchError && error.httpStatus !== undefined) {
    if (error.httpStatus >= 500) return 'http_5xx';
    if (error.httpStatus >= 400) return 'http_4xx';
  }

  const message = getErrorMessage(error).toLowerCase();
  const mentions = (keywords: string[]) => keywords.some((keyword) => message.includes(keyword));

  if (mentions(['connection', 'network', 'dns', 'resolve', 'refused', 'enotfound', 'econnreset'])) {
    return 'network';
  }
  if (mentions(['timeout', 'timed out', 'exceeded'])) {
    return 'timeout';
  }
  if (mentions(['404', '403', '401', '400', 'not found', 'forbidden', 'unauthorized'])) {
    return 'http_4xx';
  }
  if (mentions(['500', '502', '503', '504', 'server error', 'bad gateway', 'service unavailable'])) {
    return 'http_5xx';
  }
  if (mentions(['parse', 'parsing', 'invalid', 'malformed', 'syntax'])) {
    return 'parsing';
  }
  return 'other';
}
