import type { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';
import {
  ConflictError,
  ForbiddenError,
  NotFoundError,
  UnauthorizedError,
} from '../../../application/errors.js';

/**
 * Standard error response shape for all API errors.
 */
export interface ErrorResponse {
  code: string;
  message: string;
  details?: object;
}

/**
 * body-parser marks unparseable JSON with this type.
 */
function isMalformedBody(err: Error): boolean {
  return 'type' in err && err.type === 'entity.parse.failed';
}

export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  console.error('Error:', err);

  if (err instanceof ZodError) {
    const response: ErrorResponse = {
      code: 'VALIDATION_ERROR',
      message: 'Validation failed',
      details: {
        issues: err.errors.map((e) => ({
          path: e.path.join('.'),
          message: e.message,
        })),
      },
    };
    res.status(422).json(response);
    return;
  }

  if (isMalformedBody(err)) {
    const response: ErrorResponse = {
      code: 'MALFORMED_BODY',
      message: 'Request body is not valid JSON',
    };
    res.status(400).json(response);
    return;
  }

  // Duplicate email/username is a 400, not a 409
  if (err instanceof ConflictError) {
    const response: ErrorResponse = {
      code: 'CONFLICT',
      message: err.message,
    };
    res.status(400).json(response);
    return;
  }

  if (err instanceof UnauthorizedError) {
    const response: ErrorResponse = {
      code: 'UNAUTHORIZED',
      message: err.message,
    };
    res.setHeader('WWW-Authenticate', 'Bearer');
    res.status(401).json(response);
    return;
  }

  if (err instanceof ForbiddenError) {
    const response: ErrorResponse = {
      code: 'FORBIDDEN',
      message: err.message,
    };
    res.status(403).json(response);
    return;
  }

  if (err instanceof NotFoundError) {
    const response: ErrorResponse = {
      code: 'NOT_FOUND',
      message: err.message,
    };
    res.status(404).json(response);
    return;
  }

  // Generic error fallback
  const response: ErrorResponse = {
    code: 'INTERNAL_ERROR',
    message: 'Internal server error',
  };
  res.status(500).json(response);
}
