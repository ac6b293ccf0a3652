import { Request, Response, NextFunction } from 'express';
import { HttpError } from '../errors';
import { ErrorResponse } from '../types';

/**
 * Error type set by express.json() on body-parser failures
 */
function bodyParserErrorType(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'type' in error && typeof error.type === 'string') {
    return error.type;
  }
  return undefined;
}

export function notFoundHandler(_req: Request, res: Response): void {
  const errorResponse: ErrorResponse = { detail: 'Not Found' };
  res.status(404).json(errorResponse);
}

/**
 * Final error handler: every failure leaves as `{ detail }` JSON
 */
export function errorHandler(error: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    return next(error);
  }

  if (error instanceof HttpError) {
    const errorResponse: ErrorResponse = { detail: error.detail };
    res.status(error.statusCode).json(errorResponse);
    return;
  }

  switch (bodyParserErrorType(error)) {
    case 'entity.parse.failed': {
      const errorResponse: ErrorResponse = {
        detail: [{ loc: ['body'], msg: 'JSON decode error', type: 'json_invalid' }]
      };
      res.status(422).json(errorResponse);
      return;
    }
    case 'entity.too.large': {
      const errorResponse: ErrorResponse = { detail: 'Request body too large' };
      res.status(413).json(errorResponse);
      return;
    }
  }

  console.error(`[SERVER] Unhandled error on ${req.method} ${req.path}:`, error);
  const errorResponse: ErrorResponse = { detail: 'Internal Server Error' };
  res.status(500).json(errorResponse);
}
