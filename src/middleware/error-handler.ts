import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { logger } from '../core/logger';
import { DomainError, ErrorFactory, describeError } from '../core/errors';
import type { ErrorResponse } from '../core/types';

function errorBody(name: string, message: string, code: string, statusCode: number, details?: Record<string, unknown>): ErrorResponse {
  return {
    success: false,
    error: {
      name,
      message,
      code,
      statusCode,
      timestamp: new Date().toISOString(),
      ...(details && { details }),
    },
  };
}

const handleZodValidationError = (error: z.ZodError, res: Response) => {
  const fieldErrors = error.errors.map(err => ({
    field: err.path.join('.'),
    message: err.message,
  }));

  return res.status(400).json(errorBody(
    'ValidationError',
    `Validation failed: ${fieldErrors.map(e => `${e.field}: ${e.message}`).join(', ')}`,
    'VALIDATION_ERROR',
    400,
    { fieldErrors }
  ));
};

// express.json() rejects malformed bodies with a SyntaxError carrying `body`
function isBodyParseError(error: unknown): error is SyntaxError {
  return error instanceof SyntaxError && 'body' in error;
}

export const errorHandler = (error: unknown, req: Request, res: Response, _next: NextFunction) => {
  if (error instanceof DomainError) {
    const log = error.statusCode >= 500 ? logger.error.bind(logger) : logger.warn.bind(logger);
    log({ req: { id: req.id, method: req.method, url: req.url }, code: error.code, error: error.message }, 'Request failed');
    return res.status(error.statusCode).json(ErrorFactory.createErrorResponse(error));
  }

  if (error instanceof z.ZodError) {
    logger.warn({ req: { id: req.id, method: req.method, url: req.url } }, 'Request validation failed');
    return handleZodValidationError(error, res);
  }

  if (isBodyParseError(error)) {
    logger.warn({ req: { id: req.id, method: req.method, url: req.url } }, 'Malformed JSON body');
    return res.status(400).json(errorBody('ValidationError', 'Malformed JSON body', 'VALIDATION_ERROR', 400));
  }

  logger.error({ req: { id: req.id, method: req.method, url: req.url }, error: describeError(error) }, 'Unhandled request error');
  return res.status(500).json(errorBody('InternalServerError', 'Internal server error', 'INTERNAL_SERVER_ERROR', 500));
};

export const notFoundHandler = (req: Request, res: Response) => {
  res.status(404).json(errorBody('NotFoundError', `Route not found: ${req.method} ${req.path}`, 'NOT_FOUND', 404));
};
