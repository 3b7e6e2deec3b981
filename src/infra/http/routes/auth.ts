import { Router } from 'express';
import { z } from 'zod';
import { LoginUseCase, type TokenOptions } from '../../../application/auth/login.js';
import { LogoutUseCase } from '../../../application/auth/logout.js';
import type { UserRepository } from '../../../application/ports.js';
import type { Logger } from '../../logger.js';
import { createLoginRateLimiter } from '../middleware/rateLimit.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { currentUser, requireLogin } from '../middleware/auth.js';

/**
 * @openapi
 * /login:
 *   post:
 *     tags: [Auth]
 *     summary: Log in and receive a bearer token
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [username, password]
 *             properties:
 *               username: { type: string }
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
 *         description: Invalid username or password
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *
 * /logout:
 *   get:
 *     tags: [Auth]
 *     summary: Invalidate every token issued to the caller
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200: { description: Logged out }
 *       401:
 *         description: Not logged in
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 */

const loginBodySchema = z.object({
  username: z.string().trim().min(1),
  password: z.string().min(1),
});

export function createAuthRoutes(userRepo: UserRepository, tokens: TokenOptions, logger: Logger) {
  const router = Router();
  const loginUseCase = new LoginUseCase(userRepo, tokens);
  const logoutUseCase = new LogoutUseCase(userRepo);

  router.post(
    '/login',
    createLoginRateLimiter(),
    validate({ body: loginBodySchema }),
    asyncHandler(async (req, res) => {
      const body = loginBodySchema.parse(req.body);
      const result = await loginUseCase.execute(body);
      logger.info('User logged in', { userId: result.userId, username: result.username });
      res.status(200).json({ message: 'Login successful!', ...result });
    })
  );

  router.get(
    '/logout',
    requireLogin(userRepo, tokens.secret),
    asyncHandler(async (req, res) => {
      const user = currentUser(req);
      await logoutUseCase.execute(user.id);
      res.json({ message: 'Logged out successfully!' });
    })
  );

  return router;
}
