// Standardized error handling utilities
import { ZodError } from 'zod';

export enum ErrorCode {
  NOT_FOUND = 'not_found',
  UNAUTHORIZED = 'unauthorized',
  FORBIDDEN = 'forbidden',
  BAD_REQUEST = 'bad_request',
  CONFLICT = 'conflict',
  INTERNAL_ERROR = 'internal_error',
  VALIDATION_ERROR = 'validation_error',
  SCORING_FAILED = 'scoring_failed',
}

export class AppError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public statusCode: number = 500,
    public details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
  }

  static notFound(message: string = 'Resource not found', details?: unknown): AppError {
    return new AppError(ErrorCode.NOT_FOUND, message, 404, details);
  }

  static unauthorized(message: string = 'Unauthorized', details?: unknown): AppError {
    return new AppError(ErrorCode.UNAUTHORIZED, message, 401, details);
  }

  static forbidden(message: string = 'Access denied', details?: unknown): AppError {
    return new AppError(ErrorCode.FORBIDDEN, message, 403, details);
  }

  static conflict(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.CONFLICT, message, 409, details);
  }

  static validationError(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.VALIDATION_ERROR, message, 400, details);
  }

  static scoringFailed(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.SCORING_FAILED, message, 502, details);
  }

  static internal(message: string = 'Internal server error', details?: unknown): AppError {
    return new AppError(ErrorCode.INTERNAL_ERROR, message, 500, details);
  }
}

export interface ErrorResponse {
  error: ErrorCode;
  message: string;
  statusCode: number;
  details?: unknown;
}

export function formatErrorResponse(error: AppError, includeDetails: boolean = false): ErrorResponse {
  const response: ErrorResponse = {
    error: error.code,
    message: error.message,
    statusCode: error.statusCode,
  };

  if (includeDetails && error.details) {
    response.details = error.details;
  }

  return response;
}

/**
 * Convert any thrown value into an AppError.
 * Zod failures become validation errors carrying their issues.
 */
export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }
  if (error instanceof ZodError) {
    return AppError.validationError('Invalid request', error.issues);
  }
  return AppError.internal(error instanceof Error ? error.message : 'Internal server error');
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
