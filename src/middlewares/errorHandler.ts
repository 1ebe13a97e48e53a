import { Request, Response, NextFunction } from 'express';
import { AppError, ConfigRangeError, ValidationError } from '@/errors';
import { logger } from '@/adapters/logging/LoggerFactory';
import { env } from '@/config/env';

interface ErrorBody {
  success: false;
  error: {
    code: string;
    message: string;
    details?: unknown;
    issues?: string[];
  };
}

/**
 * Sanitize error messages for production
 *
 * Database failures surface through the run endpoint; their messages can carry
 * schema details (table/column names, SQL) that clients must not see.
 */
function sanitizeErrorMessage(message: string): string {
  if (env.NODE_ENV !== 'production') {
    return message;
  }

  const sensitivePatterns = [
    /database|postgres|sql|query/i,
    /file|path|directory/i,
    /column|table|constraint/i,
  ];

  if (sensitivePatterns.some((pattern) => pattern.test(message))) {
    return 'An error occurred while processing your request';
  }

  return message;
}

/**
 * Top-level keys only: override bodies can be large and are not needed verbatim
 */
function describeBody(body: unknown): string[] | undefined {
  if (!body || typeof body !== 'object' || Array.isArray(body)) {
    return undefined;
  }
  return Object.keys(body);
}

/**
 * Global error handler middleware
 * Handles all errors thrown in the application
 */
export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction): void {
  const isClientError = err instanceof AppError && err.statusCode < 500;

  const logContext = {
    error: {
      name: err.name,
      message: err.message,
      stack: isClientError ? undefined : err.stack,
    },
    request: {
      method: req.method,
      url: req.url,
      bodyKeys: describeBody(req.body),
    },
  };

  if (isClientError) {
    logger.warn(logContext, 'Request rejected');
  } else {
    logger.error(logContext, 'Error occurred');
  }

  if (err instanceof AppError) {
    const errorResponse: ErrorBody = {
      success: false,
      error: {
        code: err.code,
        message: sanitizeErrorMessage(err.message),
      },
    };

    if (err instanceof ValidationError && err.errors) {
      errorResponse.error.details = err.errors;
    }
    if (err instanceof ConfigRangeError) {
      errorResponse.error.issues = err.issues;
    }

    res.status(err.statusCode).json(errorResponse);
    return;
  }

  // express.json() reports malformed bodies as SyntaxError with status 400
  if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
    const errorResponse: ErrorBody = {
      success: false,
      error: { code: 'VALIDATION', message: 'Malformed JSON body' },
    };
    res.status(400).json(errorResponse);
    return;
  }

  const errorResponse: ErrorBody = {
    success: false,
    error: {
      code: 'INTERNAL',
      message: 'Internal server error',
    },
  };
  res.status(500).json(errorResponse);
}
