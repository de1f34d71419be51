import { Router } from 'express';
import { z } from 'zod';
import { ROLES } from '../../../domain/auth/user.js';
import { CredentialIssuer } from '../../../application/auth/credentialIssuer.js';
import { IdentityResolver } from '../../../application/auth/identityResolver.js';
import { RegisterUseCase } from '../../../application/auth/register.js';
import { LoginUseCase } from '../../../application/auth/login.js';
import { RefreshTokenUseCase } from '../../../application/auth/refresh.js';
import { GetProfileUseCase } from '../../../application/auth/profile.js';
import { UserRepository } from '../../../application/repositories.js';
import { authMiddleware, requireCaller } from '../middleware/auth.js';
import { createLoginRateLimiter } from '../middleware/rateLimit.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';

/**
 * @openapi
 * /api/auth/register:
 *   post:
 *     tags: [Auth]
 *     summary: Register a new user and receive a token pair
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [username, email, password, passwordConfirm]
 *             properties:
 *               username: { type: string }
 *               email: { type: string, format: email }
 *               password: { type: string, minLength: 8 }
 *               passwordConfirm: { type: string }
 *               role: { type: string, enum: [admin, user] }
 *     responses:
 *       201:
 *         description: User created
 *       400:
 *         description: Validation error (including duplicate email or username)
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *
 * /api/auth/login:
 *   post:
 *     tags: [Auth]
 *     summary: Login and receive a token pair
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email, password]
 *             properties:
 *               email: { type: string, format: email }
 *               password: { type: string }
 *     responses:
 *       200:
 *         description: Authenticated
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *       401:
 *         description: Invalid credentials
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *
 * /api/auth/refresh:
 *   post:
 *     tags: [Auth]
 *     summary: Exchange a refresh token for a new token pair
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [refreshToken]
 *             properties:
 *               refreshToken: { type: string }
 *     responses:
 *       200:
 *         description: New token pair
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/TokenPair'
 *       401:
 *         description: Invalid, expired or wrong-type token
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *
 * /api/auth/profile:
 *   get:
 *     tags: [Auth]
 *     summary: Current user
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200:
 *         description: The authenticated user
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/User'
 *       401:
 *         description: Unauthorized
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 */

const registerBodySchema = z.object({
  username: z.string().trim().min(1).max(150),
  email: z.string().email(),
  password: z.string().min(1),
  passwordConfirm: z.string().min(1),
  role: z.enum(ROLES).optional(),
});

const loginBodySchema = z.object({
  email: z.string().email(),
  password: z.string().min(1),
});

const refreshBodySchema = z.object({
  refreshToken: z.string().min(1),
});

export interface AuthRouteDependencies {
  users: UserRepository;
  issuer: CredentialIssuer;
  resolver: IdentityResolver;
  loginRateLimit: number;
}

export function createAuthRoutes(deps: AuthRouteDependencies) {
  const router = Router();
  const registerUseCase = new RegisterUseCase(deps.users, deps.issuer);
  const loginUseCase = new LoginUseCase(deps.users, deps.issuer);
  const refreshUseCase = new RefreshTokenUseCase(deps.issuer);
  const profileUseCase = new GetProfileUseCase(deps.users);

  router.post(
    '/register',
    validate({ body: registerBodySchema }),
    asyncHandler(async (req, res) => {
      const body = registerBodySchema.parse(req.body);
      const result = await registerUseCase.execute(body);
      res.status(201).json(result);
    })
  );

  router.post(
    '/login',
    createLoginRateLimiter(deps.loginRateLimit),
    validate({ body: loginBodySchema }),
    asyncHandler(async (req, res) => {
      const body = loginBodySchema.parse(req.body);
      const result = await loginUseCase.execute(body);
      res.status(200).json(result);
    })
  );

  router.post(
    '/refresh',
    validate({ body: refreshBodySchema }),
    asyncHandler(async (req, res) => {
      const body = refreshBodySchema.parse(req.body);
      const result = await refreshUseCase.execute(body);
      res.status(200).json(result);
    })
  );

  router.get(
    '/profile',
    authMiddleware(deps.resolver),
    asyncHandler(async (req, res) => {
      const profile = await profileUseCase.execute(requireCaller(req));
      res.json(profile);
    })
  );

  return router;
}
