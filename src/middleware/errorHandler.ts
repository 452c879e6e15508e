import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { Sentry } from '../sentry';
import logger from '../utils/logger';

// Custom error class for application errors
export class AppError extends Error {
  statusCode: number;
  isOperational: boolean;
  details?: unknown;

  constructor(message: string, statusCode: number, details?: unknown) {
    super(message);
    this.statusCode = statusCode;
    this.isOperational = true;
    this.details = details;

    Error.captureStackTrace(this, this.constructor);
  }
}

/** Turn a zod failure into a 400 with the offending paths. */
export function validationError(error: ZodError): AppError {
  const issues = error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
  return new AppError('Invalid request body', 400, issues);
}

// Global error handler middleware
export function errorHandler(
  err: Error | AppError,
  req: Request,
  res: Response,
  _next: NextFunction,
) {
  // Default to 500 server error
  let statusCode = 500;
  let message = 'Internal Server Error';
  let details: unknown;

  if (err instanceof AppError && err.isOperational) {
    statusCode = err.statusCode;
    message = err.message;
    details = err.details;
  } else if (err instanceof SyntaxError && 'body' in err) {
    // express.json() rejects malformed bodies with a SyntaxError
    statusCode = 400;
    message = 'Malformed JSON body';
  }

  logger.error('Error occurred:', {
    message: err.message,
    stack: err.stack,
    statusCode,
    path: req.path,
    method: req.method,
    ip: req.ip,
  });

  // Send error to Sentry for non-operational errors
  if (statusCode >= 500) {
    Sentry.captureException(err, {
      contexts: {
        request: {
          method: req.method,
          url: req.url,
          headers: {
            'user-agent': req.get('user-agent'),
          },
        },
      },
    });
  }

  res.status(statusCode).json({
    status: 'error',
    statusCode,
    message,
    ...(details !== undefined && { details }),
    ...(process.env.NODE_ENV === 'development' && {
      stack: err.stack,
    }),
  });
}

export function notFoundHandler(req: Request, _res: Response, next: NextFunction) {
  next(new AppError(`Route not found: ${req.method} ${req.path}`, 404));
}

function asError(reason: unknown): Error {
  return reason instanceof Error ? reason : new Error(String(reason));
}

// Handle unhandled promise rejections
export function handleUnhandledRejection() {
  process.on('unhandledRejection', (reason: unknown) => {
    const error = asError(reason);
    logger.error('Unhandled Rejection:', {
      message: error.message,
      stack: error.stack,
    });
    Sentry.captureException(error);
  });
}

// Handle uncaught exceptions
export function handleUncaughtException() {
  process.on('uncaughtException', (error: Error) => {
    logger.error('Uncaught Exception:', {
      message: error.message,
      stack: error.stack,
    });

    Sentry.captureException(error);
    // Exit process after logging
    process.exit(1);
  });
}
