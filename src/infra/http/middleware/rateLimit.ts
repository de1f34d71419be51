import rateLimit from 'express-rate-limit';

/**
 * General API rate limiter (per minute, per client IP).
 * Uses in-memory store (resets on server restart).
 */
export function createApiRateLimiter(max: number) {
  return rateLimit({
    windowMs: 60 * 1000, // 1 minute
    max,
    message: { code: 'RATE_LIMITED', message: 'Too many requests, please try again later.' },
    standardHeaders: true,
    legacyHeaders: false,
  });
}

/**
 * Stricter rate limiter for the login endpoint.
 */
export function createLoginRateLimiter(max: number) {
  return rateLimit({
    windowMs: 60 * 1000, // 1 minute
    max,
    message: { code: 'RATE_LIMITED', message: 'Too many login attempts, please try again later.' },
    standardHeaders: true,
    legacyHeaders: false,
    // Use IP address for login (no user ID available yet)
    keyGenerator: (req) => {
      return req.ip || req.socket.remoteAddress || 'unknown';
    },
  });
}
