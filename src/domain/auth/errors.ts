import { TokenType } from './tokens.js';

export class AuthDomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidSignatureError extends AuthDomainError {
  constructor(message = 'Token signature is invalid') {
    super(message);
  }
}

export class WrongTokenTypeError extends AuthDomainError {
  constructor(
    public readonly expected: TokenType,
    public readonly actual: TokenType
  ) {
    super(`Expected ${expected} token but received ${actual} token`);
  }
}

export class ExpiredTokenError extends AuthDomainError {
  constructor(public readonly expiredAt: Date) {
    super(`Token expired at ${expiredAt.toISOString()}`);
  }
}

export class UserNotFoundError extends AuthDomainError {
  constructor(public readonly userId: string) {
    super(`User ${userId} no longer exists`);
  }
}
