import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { ConflictError, NotFoundError, UnauthorizedError } from '../../../application/errors.js';
import { InvalidArgumentError, ValidationError } from '../../../domain/errors.js';

/**
 * Standard error response shape for all API errors.
 */
export interface ErrorResponse {
  code: string;
  message: string;
  details?: object;
}

function isBodyParseError(err: Error): boolean {
  return 'type' in err && err.type === 'entity.parse.failed';
}

export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
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
    res.status(400).json(response);
    return;
  }

  if (isBodyParseError(err)) {
    const response: ErrorResponse = {
      code: 'VALIDATION_ERROR',
      message: 'Malformed JSON body',
    };
    res.status(400).json(response);
    return;
  }

  if (err instanceof ValidationError) {
    const response: ErrorResponse = {
      code: 'VALIDATION_ERROR',
      message: err.message,
      details: { field: err.field },
    };
    res.status(400).json(response);
    return;
  }

  if (err instanceof InvalidArgumentError) {
    const response: ErrorResponse = {
      code: 'INVALID_ARGUMENT',
      message: err.message,
      details: { field: err.field },
    };
    res.status(400).json(response);
    return;
  }

  // Same body for every cause, plus the bearer challenge
  if (err instanceof UnauthorizedError) {
    const response: ErrorResponse = {
      code: 'UNAUTHORIZED',
      message: err.message,
    };
    res.setHeader('WWW-Authenticate', 'Bearer');
    res.status(401).json(response);
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

  if (err instanceof ConflictError) {
    const response: ErrorResponse = {
      code: 'CONFLICT',
      message: err.message,
    };
    res.status(409).json(response);
    return;
  }

  console.error('Unhandled error:', err);

  const response: ErrorResponse = {
    code: 'INTERNAL_ERROR',
    message: 'Internal server error',
  };
  res.status(500).json(response);
}
