import { Router, type RequestHandler } from 'express';
import { z } from 'zod';
import type { RegisterUseCase } from '../../../application/auth/register.js';
import type { LoginUseCase } from '../../../application/auth/login.js';
import type { CurrentUserQuery } from '../../../application/auth/currentUser.js';
import type { TokenService } from '../../../application/auth/tokens.js';
import { toPublicUser } from '../../../domain/auth/user.js';
import { authMiddleware } from '../middleware/auth.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { requireAuth } from '../middleware/requestContext.js';

/**
 * @openapi
 * /auth/register:
 *   post:
 *     tags: [Auth]
 *     summary: Register a new user and receive a JWT
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             $ref: '#/components/schemas/Credentials'
 *     responses:
 *       201:
 *         description: User created
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/AuthResponse'
 *       400:
 *         description: Invalid body or empty email/password
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *       409:
 *         description: Email already exists
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *
 * /auth/login:
 *   post:
 *     tags: [Auth]
 *     summary: Login and receive a JWT
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             $ref: '#/components/schemas/Credentials'
 *     responses:
 *       200:
 *         description: Authenticated
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/AuthResponse'
 *       400:
 *         description: Invalid body
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
 *       429:
 *         description: Too many login attempts
 *
 * /auth/me:
 *   get:
 *     tags: [Auth]
 *     summary: The authenticated user
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: Current user
 *       401:
 *         description: Missing or invalid token
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 */

// Emptiness is checked by the use cases (InvalidInputError), not here.
const credentialsBodySchema = z.object({
  email: z.string(),
  password: z.string(),
});

export interface AuthRoutesDeps {
  register: RegisterUseCase;
  login: LoginUseCase;
  currentUser: CurrentUserQuery;
  tokens: TokenService;
  loginRateLimiter: RequestHandler;
}

export function createAuthRoutes(deps: AuthRoutesDeps) {
  const router = Router();

  router.post(
    '/register',
    validate({ body: credentialsBodySchema }),
    asyncHandler(async (req, res) => {
      const body = credentialsBodySchema.parse(req.body);
      const { user, token } = await deps.register.execute(body);
      res.status(201).json({ data: { user: toPublicUser(user), token } });
    })
  );

  router.post(
    '/login',
    deps.loginRateLimiter,
    validate({ body: credentialsBodySchema }),
    asyncHandler(async (req, res) => {
      const body = credentialsBodySchema.parse(req.body);
      const { user, token } = await deps.login.execute(body);
      res.status(200).json({ data: { user: toPublicUser(user), token } });
    })
  );

  router.get(
    '/me',
    authMiddleware(deps.tokens),
    asyncHandler(async (req, res) => {
      const user = await deps.currentUser.execute(requireAuth(req).userId);
      res.json({ data: { user: toPublicUser(user) } });
    })
  );

  return router;
}
