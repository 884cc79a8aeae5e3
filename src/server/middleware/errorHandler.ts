/**
 * Querywise - Error Handler Middleware
 * Centralized error handling for the HTTP API
 */

import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';

import logger from '../../utils/logger.js';
import { QuerywiseError, ValidationError } from '../../utils/types.js';

// =============================================================================
// Types
// =============================================================================

interface ErrorResponse {
  error: string;
  code: string;
  statusCode: number;
  requestId?: string;
  details?: string[];
}

// =============================================================================
// Error Handler Middleware
// =============================================================================

/**
 * Central error handling middleware
 * Catches all errors and returns appropriate JSON responses
 */
export const errorHandler: ErrorRequestHandler = (
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const errorResponse = buildErrorResponse(err, req.requestId);

  logError(err, req, errorResponse);

  if (res.headersSent) {
    return;
  }
  res.status(errorResponse.statusCode).json(errorResponse);
};

/**
 * Build a standardized error response object
 */
function buildErrorResponse(err: Error, requestId?: string): ErrorResponse {
  if (err instanceof QuerywiseError) {
    const response: ErrorResponse = {
      error: err.isOperational ? err.message : 'Internal server error',
      code: err.code,
      statusCode: err.statusCode,
    };

    if (requestId) {
      response.requestId = requestId;
    }

    if (err instanceof ValidationError && err.validationErrors.length > 0) {
      response.details = err.validationErrors;
    }

    return response;
  }

  // body-parser and other HTTP errors carry their own status
  if ('statusCode' in err && typeof err.statusCode === 'number') {
    return {
      error: err.message || 'An error occurred',
      code: 'HTTP_ERROR',
      statusCode: err.statusCode,
      requestId,
    };
  }

  const isProduction = process.env['NODE_ENV'] === 'production';

  return {
    error: isProduction ? 'Internal server error' : err.message,
    code: 'INTERNAL_ERROR',
    statusCode: 500,
    requestId,
  };
}

function logError(err: Error, req: Request, errorResponse: ErrorResponse): void {
  const logContext = {
    requestId: errorResponse.requestId,
    method: req.method,
    path: req.path,
    statusCode: errorResponse.statusCode,
    errorCode: errorResponse.code,
    ip: req.ip,
  };

  if (errorResponse.statusCode >= 500) {
    logger.error(err.message, {
      ...logContext,
      stack: err.stack,
    });
  } else {
    logger.warn(err.message, logContext);
  }
}

// =============================================================================
// Not Found Handler
// =============================================================================

export const notFoundHandler = (req: Request, res: Response, _next: NextFunction): void => {
  const errorResponse: ErrorResponse = {
    error: `Route not found: ${req.method} ${req.path}`,
    code: 'NOT_FOUND',
    statusCode: 404,
    requestId: req.requestId,
  };

  logger.warn('Route not found', {
    requestId: req.requestId,
    method: req.method,
    path: req.path,
  });

  res.status(404).json(errorResponse);
};

// =============================================================================
// Async Handler Wrapper
// =============================================================================

/**
 * Wrap async route handlers to properly catch and forward errors
 */
export function asyncHandler<T>(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<T>
): (req: Request, res: Response, next: NextFunction) => void {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

export default errorHandler;
