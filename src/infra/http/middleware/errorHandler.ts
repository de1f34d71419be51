import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { AuthDomainError } from '../../../domain/auth/errors.js';
import { InvalidTaskError } from '../../../domain/tasks/errors.js';
import {
  NotFoundError,
  UnauthorizedError,
  UNAUTHENTICATED_MESSAGE,
  ValidationError,
  ValidationIssue,
} from '../../../application/errors.js';

/**
 * Standard error response shape for all API errors.
 */
export interface ErrorResponse {
  code: string;
  message: string;
  details?: object;
}

function validationResponse(issues: ValidationIssue[]): ErrorResponse {
  return {
    code: 'VALIDATION_ERROR',
    message: 'Validation failed',
    details: { issues },
  };
}

// body-parser marks unparseable JSON with this type
function isMalformedBody(err: Error): boolean {
  return 'type' in err && err.type === 'entity.parse.failed';
}

export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  // Handle Zod validation errors
  if (err instanceof ZodError) {
    res.status(400).json(
      validationResponse(
        err.errors.map((e) => ({
          path: e.path.join('.'),
          message: e.message,
        }))
      )
    );
    return;
  }

  if (err instanceof ValidationError) {
    res.status(400).json(validationResponse(err.issues));
    return;
  }

  if (err instanceof InvalidTaskError) {
    res.status(400).json(validationResponse([{ path: err.field, message: err.message }]));
    return;
  }

  if (isMalformedBody(err)) {
    const response: ErrorResponse = {
      code: 'INVALID_JSON',
      message: 'Request body is not valid JSON',
    };
    res.status(400).json(response);
    return;
  }

  if (err instanceof UnauthorizedError) {
    const response: ErrorResponse = {
      code: 'UNAUTHORIZED',
      message: err.message,
    };
    res.status(401).json(response);
    return;
  }

  // Token errors are normally collapsed earlier; never leak which check failed
  if (err instanceof AuthDomainError) {
    console.warn(`Unhandled token error: ${err.name}: ${err.message}`);
    const response: ErrorResponse = {
      code: 'UNAUTHORIZED',
      message: UNAUTHENTICATED_MESSAGE,
    };
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

  // Generic error fallback
  console.error('Error:', err);
  const response: ErrorResponse = {
    code: 'INTERNAL_ERROR',
    message: 'Internal server error',
  };
  res.status(500).json(response);
}
