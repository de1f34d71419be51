import { Request, RequestHandler } from 'express';
import { CallerContext } from '../../../domain/auth/caller.js';
import { IdentityResolver } from '../../../application/auth/identityResolver.js';
import { UNAUTHENTICATED_MESSAGE, UnauthorizedError } from '../../../application/errors.js';
import { asyncHandler } from './asyncHandler.js';

export interface AuthRequest extends Request {
  caller?: CallerContext;
}

const BEARER_PREFIX = 'Bearer ';

/**
 * Resolves the bearer token into `req.caller`. Any failure is a uniform 401.
 */
export function authMiddleware(resolver: IdentityResolver): RequestHandler {
  return asyncHandler(async (req, _res, next) => {
    const authHeader = req.headers.authorization;

    if (!authHeader || !authHeader.startsWith(BEARER_PREFIX)) {
      throw new UnauthorizedError(UNAUTHENTICATED_MESSAGE);
    }

    req.caller = await resolver.resolve(authHeader.substring(BEARER_PREFIX.length).trim());
    next();
  });
}

/**
 * The caller set by `authMiddleware`; handlers pass it on explicitly.
 */
export function requireCaller(req: AuthRequest): CallerContext {
  if (!req.caller) {
    throw new UnauthorizedError(UNAUTHENTICATED_MESSAGE);
  }
  return req.caller;
}
