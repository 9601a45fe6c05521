import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { createLogger, getRequestId } from '../utils/relay.logger.utils';

export class RelayError extends Error {
  constructor(
    message: string,
    public statusCode: number = 500,
    public code?: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'RelayError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigurationError extends RelayError {
  constructor(message: string, public missing: string[] = []) {
    super(message, 500, 'CONFIGURATION_ERROR', { missing });
    this.name = 'ConfigurationError';
  }
}

/**
 * Raised by outbound clients when the remote side fails: network error,
 * non-2xx status, or a body that does not have the expected shape.
 */
export class RemoteServiceError extends RelayError {
  constructor(
    message: string,
    public service: string,
    public remoteStatus?: number
  ) {
    super(message, 502, 'REMOTE_SERVICE_ERROR', { service, remoteStatus });
    this.name = 'RemoteServiceError';
  }
}

export class NotFoundError extends RelayError {
  constructor(message: string = 'Resource not found') {
    super(message, 404, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

interface ErrorResponse {
  success: false;
  error: {
    code: string;
    message: string;
    timestamp: string;
    requestId: string;
    details?: unknown;
    stack?: string;
  };
}

export const notFoundMiddleware = (req: Request, _res: Response, next: NextFunction) => {
  next(new NotFoundError(`Route ${req.method} ${req.path} not found`));
};

export const errorHandlerMiddleware = (
  error: Error,
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  const requestId = getRequestId(req);
  const logger = createLogger('error-handler');

  let statusCode = 500;
  let errorCode = 'INTERNAL_ERROR';
  let errorMessage = 'Internal server error';
  let errorDetails: unknown = undefined;

  if (error instanceof RelayError) {
    statusCode = error.statusCode;
    errorCode = error.code || 'RELAY_ERROR';
    errorMessage = error.message;
    errorDetails = error.details;

    if (statusCode >= 500) {
      logger.error('Server error occurred', {
        error: errorMessage,
        code: errorCode,
        stack: error.stack,
        path: req.path,
        method: req.method,
        requestId
      });
    } else {
      logger.warn('Client error occurred', {
        error: errorMessage,
        code: errorCode,
        path: req.path,
        method: req.method,
        requestId
      });
    }
  }
  // body-parser rejects unparsable JSON with a SyntaxError carrying a status
  else if (error instanceof SyntaxError && 'status' in error && error.status === 400) {
    statusCode = 400;
    errorCode = 'INVALID_JSON';
    errorMessage = 'Request body is not valid JSON';

    logger.warn('Invalid JSON body', {
      path: req.path,
      requestId
    });
  }
  else {
    logger.error('Unhandled error occurred', {
      error: error.message,
      name: error.name,
      stack: error.stack,
      path: req.path,
      method: req.method,
      requestId
    });
  }

  const errorResponse: ErrorResponse = {
    success: false,
    error: {
      code: errorCode,
      message: errorMessage,
      timestamp: new Date().toISOString(),
      requestId
    }
  };

  if (errorDetails !== undefined && (process.env.NODE_ENV === 'development' || statusCode < 500)) {
    errorResponse.error.details = errorDetails;
  }

  if (process.env.NODE_ENV === 'development' && statusCode >= 500) {
    errorResponse.error.stack = error.stack;
  }

  return res.status(statusCode).json(errorResponse);
};

// Async error wrapper to avoid try-catch in every route
export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler => {
  return (req, res, next) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};
