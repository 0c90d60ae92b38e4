import { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logger';
import { GENERIC_MESSAGE, isStrategyError } from '../utils/strategy-error';

interface StandardErrorResponse {
  success: false;
  message: string;
  code: string;
  error?: string;
  suggestion?: string;
  requestId?: string;
}

const SUGGESTIONS: Record<string, string> = {
  validation: 'Please review the configuration values and try again.',
  precondition: 'Please check the lock state of the account and try again.',
  authorization: 'Please contact the vault administrators if you need this permission.',
  collaborator: 'Please try again in a few moments.',
};

/**
 * Classify error type
 */
function classifyError(err: unknown): {
  statusCode: number;
  isClientError: boolean;
  code: string;
  message: string;
  suggestion?: string;
} {
  if (isStrategyError(err)) {
    return {
      statusCode: err.status,
      isClientError: err.status < 500,
      code: err.kind,
      message: err.message,
      suggestion: SUGGESTIONS[err.category],
    };
  }

  // express.json() parse failures carry a 400 status
  if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
    return {
      statusCode: 400,
      isClientError: true,
      code: 'BAD_REQUEST',
      message: 'Invalid JSON body.',
      suggestion: 'Please review your request and try again.',
    };
  }

  return {
    statusCode: 500,
    isClientError: false,
    code: 'INTERNAL_SERVER_ERROR',
    message: GENERIC_MESSAGE,
    suggestion: 'If the problem persists, please contact support.',
  };
}

/**
 * Centralized error handling middleware
 * Must be added last in the middleware chain
 */
export const errorHandler = (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
  const classification = classifyError(err);

  const errorResponse: StandardErrorResponse = {
    success: false,
    message: classification.message,
    code: classification.code,
    requestId: req.requestId,
  };

  if (classification.suggestion) {
    errorResponse.suggestion = classification.suggestion;
  }

  if (process.env.NODE_ENV === 'development' && !classification.isClientError) {
    errorResponse.error = err instanceof Error ? err.message : String(err);
  }

  if (classification.isClientError) {
    logger.warn(`Client error ${classification.code} on ${req.method} ${req.originalUrl}: ${classification.message}`);
  } else {
    logger.error(`Server error on ${req.method} ${req.originalUrl}`, err);
  }

  res.status(classification.statusCode).json(errorResponse);
};

/**
 * 404 handler for unmatched routes
 */
export const notFoundHandler = (req: Request, res: Response): void => {
  const errorResponse: StandardErrorResponse = {
    success: false,
    message: 'Route not found.',
    code: 'NOT_FOUND',
    requestId: req.requestId,
    suggestion: 'Please check the URL and try again.',
  };

  logger.warn(`404 Not Found: ${req.method} ${req.originalUrl}`);

  res.status(404).json(errorResponse);
};
