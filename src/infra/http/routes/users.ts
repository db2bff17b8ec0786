import { Router } from 'express';
import { z } from 'zod';
import { CreateUserUseCase } from '../../../application/users/createUser.js';
import { GetUserUseCase } from '../../../application/users/getUser.js';
import { ListUsersUseCase } from '../../../application/users/listUsers.js';
import { FindUserByEmailUseCase } from '../../../application/users/findUserByEmail.js';
import { ErrorKind } from '../../../domain/errors.js';
import { UpdateUserUseCase } from '../../../application/users/updateUser.js';
import { DeleteUserUseCase } from '../../../application/users/deleteUser.js';
import type { AdapterRegistry } from '../../factory/adapterRegistry.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { requestSignal } from '../middleware/requestSignal.js';

/**
 * @openapi
 * /api/v1/users:
 *   post:
 *     tags: [Users]
 *     summary: Create a user
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email, name]
 *             properties:
 *               email: { type: string, example: ada@example.com }
 *               name: { type: string, example: Ada Lovelace }
 *               active: { type: boolean, default: true }
 *     responses:
 *       201:
 *         description: Created
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/User' }
 *       409:
 *         description: Email already registered
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       422:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       503:
 *         description: Backend unavailable
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   get:
 *     tags: [Users]
 *     summary: List users
 *     parameters:
 *       - in: query
 *         name: active
 *         required: false
 *         schema: { type: string, enum: ['true', 'false'] }
 *       - in: query
 *         name: email
 *         required: false
 *         description: Exact match on the normalized email; at most one result
 *         schema: { type: string }
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 users:
 *                   type: array
 *                   items: { $ref: '#/components/schemas/User' }
 *                 total: { type: integer }
 *
 * /api/v1/users/{id}:
 *   get:
 *     tags: [Users]
 *     summary: Get a user
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: string, format: uuid }
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/User' }
 *       404:
 *         description: User not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   patch:
 *     tags: [Users]
 *     summary: Rename, activate or deactivate a user
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: string, format: uuid }
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             properties:
 *               name: { type: string }
 *               active: { type: boolean }
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/User' }
 *       404:
 *         description: User not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       422:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   delete:
 *     tags: [Users]
 *     summary: Delete a user
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: string, format: uuid }
 *     responses:
 *       204: { description: Deleted }
 *       404:
 *         description: User not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */

// Field rules (email format, name length) belong to the entity
const createUserBodySchema = z.object({
  email: z.string(),
  name: z.string(),
  active: z.boolean().optional(),
});

const updateUserBodySchema = z.object({
  name: z.string().optional(),
  active: z.boolean().optional(),
});

const userParamsSchema = z.object({
  id: z.string().uuid(),
});

const listUsersQuerySchema = z.object({
  email: z.string().min(1).optional(),
  active: z
    .enum(['true', 'false'])
    .optional()
    .transform((val) => (val === undefined ? undefined : val === 'true')),
});

export function createUserRoutes(registry: AdapterRegistry) {
  const router = Router();
  const repository = () => registry.resolveRepository('user');

  // Create user
  router.post(
    '/users',
    asyncHandler(async (req, res) => {
      const body = createUserBodySchema.parse(req.body);
      const useCase = new CreateUserUseCase(await repository());
      const result = await useCase.execute(body, { signal: requestSignal(res) });
      if (!result.ok) {
        throw result.error;
      }
      res.status(201).json(result.value);
    })
  );

  // List users
  router.get(
    '/users',
    asyncHandler(async (req, res) => {
      const query = listUsersQuerySchema.parse(req.query);

      if (query.email !== undefined) {
        const found = await new FindUserByEmailUseCase(await repository()).execute(query.email, {
          signal: requestSignal(res),
        });
        if (!found.ok && found.error.kind !== ErrorKind.NotFound) {
          throw found.error;
        }
        const users =
          found.ok && (query.active === undefined || found.value.active === query.active)
            ? [found.value]
            : [];
        res.json({ users, total: users.length });
        return;
      }

      const useCase = new ListUsersUseCase(await repository());
      const result = await useCase.execute(
        query.active === undefined ? {} : { active: query.active },
        { signal: requestSignal(res) }
      );
      if (!result.ok) {
        throw result.error;
      }
      res.json({ users: result.value, total: result.value.length });
    })
  );

  // Get user
  router.get(
    '/users/:id',
    asyncHandler(async (req, res) => {
      const { id } = userParamsSchema.parse(req.params);
      const useCase = new GetUserUseCase(await repository());
      const result = await useCase.execute(id, { signal: requestSignal(res) });
      if (!result.ok) {
        throw result.error;
      }
      res.json(result.value);
    })
  );

  // Update user
  router.patch(
    '/users/:id',
    asyncHandler(async (req, res) => {
      const { id } = userParamsSchema.parse(req.params);
      const body = updateUserBodySchema.parse(req.body);
      const useCase = new UpdateUserUseCase(await repository());
      const result = await useCase.execute({ id, ...body }, { signal: requestSignal(res) });
      if (!result.ok) {
        throw result.error;
      }
      res.json(result.value);
    })
  );

  // Delete user
  router.delete(
    '/users/:id',
    asyncHandler(async (req, res) => {
      const { id } = userParamsSchema.parse(req.params);
      const useCase = new DeleteUserUseCase(await repository());
      const result = await useCase.execute(id, { signal: requestSignal(res) });
      if (!result.ok) {
        throw result.error;
      }
      res.status(204).end();
    })
  );

  return router;
}
