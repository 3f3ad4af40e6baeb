/**
 * Custom Error Classes and Types for the Similarity Service
 *
 * Every failure the pipeline surfaces extends SimilarityError so callers get
 * a stable code, an HTTP status and structured context for logging.
 */

import type { Logger } from 'pino';

// Base error class for the similarity service
export class SimilarityError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, statusCode: number, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.context = context;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown at construction time when pipeline parameters are invalid
 * (non-positive shingle size or hash count, threshold outside [0, 1], ...)
 */
export class ConfigurationError extends SimilarityError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', 400, context);
  }
}

/**
 * Thrown when a corpus document or directory cannot be read
 */
export class DocumentReadError extends SimilarityError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'DOCUMENT_READ_ERROR', 500, context);
  }
}

/**
 * Thrown when a run is started with zero documents
 */
export class EmptyCorpusError extends SimilarityError {
  constructor(message: string = 'Corpus contains no documents', context?: Record<string, unknown>) {
    super(message, 'EMPTY_CORPUS', 422, context);
  }
}

/**
 * Thrown when request input validation fails
 */
export class ValidationError extends SimilarityError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', 400, context);
  }
}

/**
 * Thrown when an AbortSignal fires during a long-running stage
 */
export class OperationCancelledError extends SimilarityError {
  constructor(operation: string, context?: Record<string, unknown>) {
    super(`Operation cancelled: ${operation}`, 'OPERATION_CANCELLED', 499, { operation, ...context });
  }
}

// Error Response Types

/**
 * Standard error response format for API endpoints
 */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    timestamp: string;
    requestId?: string;
    details?: Record<string, unknown>;
  };
}

/**
 * Error context for logging and debugging
 */
export interface ErrorContext {
  operation?: string;
  requestId?: string;
  directory?: string;
  file?: string;
  documentCount?: number;
  [key: string]: unknown;
}

/**
 * Utility function to check if an error is a SimilarityError
 */
export function isSimilarityError(error: unknown): error is SimilarityError {
  return error instanceof SimilarityError;
}

/**
 * Utility function to extract safe error information for logging
 */
export function extractErrorInfo(error: Error): {
  message: string;
  code?: string;
  statusCode?: number;
  context?: Record<string, unknown>;
} {
  if (isSimilarityError(error)) {
    return {
      message: error.message,
      code: error.code,
      statusCode: error.statusCode,
      context: error.context,
    };
  }

  return {
    message: error.message,
  };
}

/**
 * Error code constants for consistent usage across the application
 */
export const ERROR_CODES = {
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  DOCUMENT_READ_ERROR: 'DOCUMENT_READ_ERROR',
  EMPTY_CORPUS: 'EMPTY_CORPUS',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  OPERATION_CANCELLED: 'OPERATION_CANCELLED',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

/**
 * Utility function to create a standardized error response
 */
export function createErrorResponse(
  error: SimilarityError | Error,
  requestId?: string
): ErrorResponse {
  if (error instanceof SimilarityError) {
    return {
      error: {
        code: error.code,
        message: error.message,
        timestamp: new Date().toISOString(),
        requestId,
        details: error.context,
      },
    };
  }

  return {
    error: {
      code: ERROR_CODES.INTERNAL_ERROR,
      message: 'An unexpected error occurred',
      timestamp: new Date().toISOString(),
      requestId,
    },
  };
}

/**
 * Utility function to log errors with proper context
 */
export function logError(
  logger: Logger,
  error: Error,
  context?: ErrorContext
): void {
  const errorInfo = extractErrorInfo(error);

  logger.error({
    error: errorInfo,
    context,
    timestamp: new Date().toISOString(),
  }, `Error occurred: ${error.message}`);
}

/**
 * Normalizes an unknown thrown value into an Error instance
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
