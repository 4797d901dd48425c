import { Request, Response, NextFunction } from 'express';
import { AppError, ValidationError, ValidationDetails } from '@/errors';
import { logger } from '@/adapters/logging/LoggerFactory';
import { env } from '@/config/env';

interface ErrorResponse {
  success: false;
  error: {
    message: string;
    details?: ValidationDetails;
  };
}

// Holding sizes and prices reveal a user's positions
const SENSITIVE_FIELDS = new Set(['shareCount', 'previousClose', 'currentPrice']);

/**
 * Copy of the request body with holding sizes and prices redacted
 * Tickers stay visible; they are needed to trace lookup problems
 */
export function sanitizeRequestBody(body: unknown): unknown {
  if (Array.isArray(body)) {
    return body.map(sanitizeRequestBody);
  }

  if (!body || typeof body !== 'object') {
    return body;
  }

  const sanitized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(body)) {
    sanitized[key] = SENSITIVE_FIELDS.has(key) ? '[REDACTED]' : sanitizeRequestBody(value);
  }

  return sanitized;
}

/**
 * In production, replace messages that mention storage internals with a
 * generic one. User-facing messages ("Ticker XYZ not found") pass through,
 * and validation messages are never replaced since they describe the input.
 */
function sanitizeErrorMessage(message: string): string {
  if (env.NODE_ENV !== 'production') {
    return message;
  }

  const sensitivePatterns = [
    /database|postgres|sql/i,
    /file|path|directory seed/i,
    /internal|implementation/i,
    /column|table|constraint/i,
  ];

  return sensitivePatterns.some((pattern) => pattern.test(message))
    ? 'An error occurred while processing your request'
    : message;
}

/**
 * Global error handler middleware
 * Handles all errors thrown in the application
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response<ErrorResponse>,
  _next: NextFunction
): void {
  const isAppError = err instanceof AppError;

  const logMetadata = {
    error: {
      name: err.name,
      message: err.message,
      stack: isAppError ? undefined : err.stack,
    },
    request: {
      method: req.method,
      url: req.url,
      body: sanitizeRequestBody(req.body),
    },
  };

  // Client errors are expected traffic; only unknown errors are logged as errors
  if (isAppError && err.statusCode < 500) {
    logger.warn(logMetadata, 'Request rejected');
  } else {
    logger.error(logMetadata, 'Error occurred');
  }

  if (isAppError) {
    const errorResponse: ErrorResponse = {
      success: false,
      error: {
        message: err instanceof ValidationError ? err.message : sanitizeErrorMessage(err.message),
      },
    };

    if (err instanceof ValidationError && err.errors) {
      errorResponse.error.details = err.errors;
    }

    res.status(err.statusCode).json(errorResponse);
    return;
  }

  // Malformed JSON bodies from express.json()
  if (err instanceof SyntaxError && 'body' in err) {
    res.status(400).json({
      success: false,
      error: { message: 'Malformed JSON body' },
    });
    return;
  }

  res.status(500).json({
    success: false,
    error: {
      message: 'Internal server error',
    },
  });
}
