import { Request, Response, NextFunction } from 'express';
import { logger } from '../../utils/logger';

export interface APIError extends Error {
  statusCode?: number;
  code?: string;
  isOperational?: boolean; // expected failures (bad input, missing resource) vs bugs
}

/**
 * Build an operational error for a route to throw
 */
export function createAPIError(message: string, statusCode: number, code: string): APIError {
  const error: APIError = new Error(message);
  error.statusCode = statusCode;
  error.code = code;
  error.isOperational = true;
  return error;
}

/**
 * Known low-level failures and the message shown to clients instead.
 * SECURITY: broker and filesystem errors never reach the client verbatim
 */
const SAFE_ERROR_MESSAGES: Record<string, string> = {
  ECONNREFUSED: 'Service temporarily unavailable',
  ETIMEDOUT: 'Request timed out',
  ENOTFOUND: 'Service unavailable',
  EACCES: 'Storage unavailable',
  ENOSPC: 'Storage unavailable',
};

/**
 * Client-facing message for an error
 */
function sanitizeErrorMessage(message: string, isOperational: boolean): string {
  // Operational errors were written for the client
  if (isOperational) {
    return message;
  }

  for (const [pattern, safeMessage] of Object.entries(SAFE_ERROR_MESSAGES)) {
    if (message.toLowerCase().includes(pattern.toLowerCase())) {
      return safeMessage;
    }
  }

  // File paths and URLs stay server-side
  if (message.includes('/') || message.includes('\\')) {
    return 'An internal error occurred';
  }

  // Unknown errors stay generic in production
  if (process.env.NODE_ENV === 'production') {
    return 'An unexpected error occurred';
  }

  return message;
}

/**
 * Global Error Handler Middleware
 *
 * Every error leaving a route ends up here and is answered as
 * `{ success: false, error, code, errorId }`.
 */
export const errorHandler = (
  err: APIError,
  req: Request,
  res: Response,
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  next: NextFunction
) => {
  // Correlates the response with the log line
  const errorId = `err_${Date.now().toString(36)}_${Math.random().toString(36).slice(2, 11)}`;
  const statusCode = err.statusCode || 500;

  // Full details stay server-side
  logger.error('API Error', {
    errorId,
    error: err.message,
    stack: err.stack,
    path: req.path,
    method: req.method,
    statusCode,
    ip: req.ip,
  });

  const isOperational = err.isOperational === true || statusCode < 500;
  const safeMessage = sanitizeErrorMessage(err.message || 'Internal Server Error', isOperational);

  const errorResponse: {
    success: boolean;
    error: string;
    code: string;
    errorId: string;
    stack?: string;
  } = {
    success: false,
    error: safeMessage,
    code: err.code || (statusCode < 500 ? 'BAD_REQUEST' : 'INTERNAL_ERROR'),
    errorId,
  };

  // SECURITY: stack traces only in development
  if (process.env.NODE_ENV === 'development') {
    errorResponse.stack = err.stack;
  }

  res.status(statusCode).json(errorResponse);
};

/**
 * 404 for anything no router matched
 */
export const notFoundHandler = (
  req: Request,
  res: Response,
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  next: NextFunction
) => {
  res.status(404).json({
    success: false,
    error: `Route not found: ${req.method} ${req.path}`,
    code: 'ROUTE_NOT_FOUND',
  });
};

/**
 * Wraps async route handlers so rejections reach the error handler
 */
export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) => {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};
