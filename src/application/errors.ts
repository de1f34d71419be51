/**
 * Application-level errors for HTTP layer mapping.
 * These extend Error and are used for consistent error handling.
 */
export class NotFoundError extends Error {
  constructor(message = 'Resource not found') {
    super(message);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnauthorizedError extends Error {
  constructor(message = 'Unauthorized') {
    super(message);
    this.name = 'UnauthorizedError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * Input rejected with field-level detail (password mismatch, duplicate email...).
 */
export class ValidationError extends Error {
  constructor(
    public readonly issues: ValidationIssue[],
    message = 'Validation failed'
  ) {
    super(message);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const UNAUTHENTICATED_MESSAGE = 'Authentication credentials were not provided or are invalid';
export const TASK_NOT_FOUND_MESSAGE = 'Task not found';
