import jwt from 'jsonwebtoken';
import { randomUUID } from 'crypto';
import { z } from 'zod';
import { TokenClaims, TokenPair, TokenType } from '../../domain/auth/tokens.js';
import {
  ExpiredTokenError,
  InvalidSignatureError,
  UserNotFoundError,
  WrongTokenTypeError,
} from '../../domain/auth/errors.js';
import { UserRepository } from '../repositories.js';

export interface CredentialIssuerOptions {
  secret: string;
  accessTtlSeconds: number;
  refreshTtlSeconds: number;
  now?: () => Date;
}

const claimsSchema = z.object({
  sub: z.string().min(1),
  type: z.enum(['access', 'refresh']),
  iat: z.number().int(),
  exp: z.number().int(),
  jti: z.string().min(1),
});

/**
 * Mints and verifies stateless HS256 tokens. Verification needs no store;
 * only `refresh` touches the user repository.
 */
export class CredentialIssuer {
  private readonly now: () => Date;

  constructor(
    private users: Pick<UserRepository, 'findById'>,
    private options: CredentialIssuerOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  issue(userId: string): TokenPair {
    return {
      accessToken: this.sign(userId, 'access', this.options.accessTtlSeconds),
      refreshToken: this.sign(userId, 'refresh', this.options.refreshTtlSeconds),
    };
  }

  /**
   * Checks signature, then token type, then expiry. Each failure has its own
   * error class so callers can tell an expired token from a forged one.
   */
  verify(token: string, expectedType: TokenType): TokenClaims {
    let decoded: unknown;
    try {
      // Expiry is checked below against the injected clock
      decoded = jwt.verify(token, this.options.secret, {
        algorithms: ['HS256'],
        ignoreExpiration: true,
      });
    } catch {
      throw new InvalidSignatureError();
    }

    const parsed = claimsSchema.safeParse(decoded);
    if (!parsed.success) {
      throw new InvalidSignatureError('Token claims are malformed');
    }

    const claims = parsed.data;
    if (claims.type !== expectedType) {
      throw new WrongTokenTypeError(expectedType, claims.type);
    }

    const expiresAt = new Date(claims.exp * 1000);
    if (expiresAt.getTime() <= this.now().getTime()) {
      throw new ExpiredTokenError(expiresAt);
    }

    return {
      userId: claims.sub,
      tokenType: claims.type,
      issuedAt: new Date(claims.iat * 1000),
      expiresAt,
    };
  }

  async refresh(refreshToken: string): Promise<TokenPair> {
    const claims = this.verify(refreshToken, 'refresh');

    const user = await this.users.findById(claims.userId);
    if (!user) {
      throw new UserNotFoundError(claims.userId);
    }

    return this.issue(user.id);
  }

  private sign(userId: string, type: TokenType, ttlSeconds: number): string {
    const iat = Math.floor(this.now().getTime() / 1000);
    return jwt.sign(
      {
        sub: userId,
        type,
        iat,
        exp: iat + ttlSeconds,
        jti: randomUUID(),
      },
      this.options.secret,
      { algorithm: 'HS256' }
    );
  }
}
