import { createHmac, timingSafeEqual } from 'crypto';
import { Request, Response, NextFunction, RequestHandler } from 'express';
import { AuthError } from '../errors';

const COMPARE_KEY = 'api-key-compare';

function digest(value: string): Buffer {
  return createHmac('sha256', COMPARE_KEY).update(value, 'utf8').digest();
}

/**
 * Fixed-time string comparison. Both sides are digested first so inputs of
 * different lengths are compared as equal-length buffers.
 */
export function safeCompare(provided: string, expected: string): boolean {
  return timingSafeEqual(digest(provided), digest(expected));
}

/**
 * Check an `Authorization: Bearer <key>` header value against the API key.
 * The scheme keyword is case-insensitive.
 */
export function verifyApiKey(authorization: string | undefined, apiKey: string): boolean {
  if (!authorization) {
    return false;
  }

  try {
    const parts = authorization.trim().split(/\s+/);
    if (parts.length !== 2 || parts[0].toLowerCase() !== 'bearer') {
      return false;
    }
    return safeCompare(parts[1], apiKey);
  } catch (error) {
    console.error('[AUTH] Error verifying API key:', error instanceof Error ? error.message : error);
    return false;
  }
}

/**
 * API key middleware.
 *
 * Requests without an Authorization header pass through unauthenticated;
 * only a header that is present and fails verification is rejected.
 */
export function apiKeyAuth(apiKey: string): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const authorization = req.headers.authorization;

    if (!authorization) {
      return next();
    }

    if (!verifyApiKey(authorization, apiKey)) {
      // Never log the header itself
      console.warn('[AUTH] Invalid API key provided', { ip: req.headers['x-forwarded-for'] || req.ip });
      return next(new AuthError());
    }

    next();
  };
}
