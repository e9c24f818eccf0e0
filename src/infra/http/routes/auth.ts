import { Router } from 'express';
import type { LoginUseCase } from '../../../application/auth/login.js';
import type { RegisterUseCase } from '../../../application/auth/register.js';
import { asyncHandler } from '../middleware/asyncHandler.js';

/**
 * @openapi
 * /register:
 *   post:
 *     tags: [Auth]
 *     summary: Register a new user
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [name, email, password]
 *             properties:
 *               name: { type: string, minLength: 1, maxLength: 255 }
 *               email: { type: string, format: email, maxLength: 255 }
 *               password: { type: string, minLength: 8 }
 *     responses:
 *       201:
 *         description: User created
 *       400:
 *         description: Validation error, one issue per violated rule
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *       409:
 *         description: Email already registered
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *
 * /login:
 *   post:
 *     tags: [Auth]
 *     summary: Check an email and password
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email, password]
 *             properties:
 *               email: { type: string }
 *               password: { type: string }
 *     responses:
 *       200:
 *         description: Credentials match
 *       400:
 *         description: Missing or non-string fields
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *       401:
 *         description: Unknown email or wrong password (indistinguishable)
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 */

export interface AuthRouteDeps {
  registerUseCase: RegisterUseCase;
  loginUseCase: LoginUseCase;
}

export function createAuthRoutes({ registerUseCase, loginUseCase }: AuthRouteDeps) {
  const router = Router();

  router.post(
    '/register',
    asyncHandler(async (req, res) => {
      const result = await registerUseCase.execute(req.body);
      res.status(201).json({ message: 'User registered successfully', ...result });
    })
  );

  router.post(
    '/login',
    asyncHandler(async (req, res) => {
      const result = await loginUseCase.execute(req.body);
      res.status(200).json({ message: 'Login successful', ...result });
    })
  );

  return router;
}
