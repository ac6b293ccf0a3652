import { Request, Response, NextFunction, RequestHandler } from 'express';
import { ZodTypeAny } from 'zod';
import { ValidationError } from '../errors';

/**
 * Parse req.body against a schema before any handler logic runs.
 * On success req.body is replaced with the parsed value.
 */
export function validateBody(schema: ZodTypeAny): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.body);
    if (!result.success) {
      return next(ValidationError.fromZod(result.error));
    }
    req.body = result.data;
    next();
  };
}
