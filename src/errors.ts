import { ZodError } from 'zod';
import { ValidationIssue } from './types';

/**
 * Base class for errors that map directly onto an HTTP response.
 * `detail` becomes the `{ detail }` field of the JSON error body.
 */
export abstract class HttpError extends Error {
  abstract readonly statusCode: number;

  get detail(): string | ValidationIssue[] {
    return this.message;
  }
}

/**
 * Bearer token present but malformed or not matching the configured key
 */
export class AuthError extends HttpError {
  readonly statusCode = 401;

  constructor(message = 'Invalid API key') {
    super(message);
    this.name = 'AuthError';
  }
}

/**
 * Request body that does not deserialize into the expected shape
 */
export class ValidationError extends HttpError {
  readonly statusCode = 422;

  constructor(readonly issues: ValidationIssue[]) {
    super(issues.map((issue) => `${issue.loc.join('.')}: ${issue.msg}`).join('; '));
    this.name = 'ValidationError';
  }

  override get detail(): ValidationIssue[] {
    return this.issues;
  }

  static fromZod(error: ZodError): ValidationError {
    return new ValidationError(
      error.issues.map((issue) => ({
        loc: ['body', ...issue.path],
        msg: issue.message,
        type: issue.code
      }))
    );
  }
}

/**
 * Failure raised by the rendering engine. The message is the engine's own text.
 */
export class RenderError extends HttpError {
  readonly statusCode = 500;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RenderError';
  }

  override get detail(): string {
    return `PDF generation failed: ${this.message}`;
  }

  static from(error: unknown): RenderError {
    if (error instanceof RenderError) {
      return error;
    }
    return new RenderError(errorMessage(error), { cause: error });
  }
}

/**
 * Invalid environment configuration, raised at start-up
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
