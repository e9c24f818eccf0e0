import { Router } from 'express';
import { NotFoundError } from '../../../application/errors.js';
import type { UserQueries } from '../../../application/users/queries.js';
import { asyncHandler } from '../middleware/asyncHandler.js';

/**
 * @openapi
 * /users:
 *   get:
 *     tags: [Users]
 *     summary: List users in registration order
 *     responses:
 *       200:
 *         description: Users without credentials
 *         content:
 *           application/json:
 *             schema:
 *               type: array
 *               items:
 *                 $ref: '#/components/schemas/User'
 *
 * /users/{id}:
 *   get:
 *     tags: [Users]
 *     summary: Get one user
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: string, format: uuid }
 *     responses:
 *       200:
 *         description: User without credentials
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/User'
 *       404:
 *         description: No user with this id
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 */

export function createUserRoutes(userQueries: UserQueries) {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (_req, res) => {
      res.status(200).json(await userQueries.list());
    })
  );

  router.get(
    '/:id',
    asyncHandler<{ id: string }>(async (req, res) => {
      const user = await userQueries.getById(req.params.id);
      if (!user) {
        throw new NotFoundError('User not found');
      }
      res.status(200).json(user);
    })
  );

  return router;
}
