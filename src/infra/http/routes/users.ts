import { Router } from 'express';
import { CreateUserUseCase } from '../../../application/users/createUser.js';
import { UpdateUserUseCase } from '../../../application/users/updateUser.js';
import { DeleteUserUseCase, PurgeUserUseCase } from '../../../application/users/deleteUser.js';
import { RestoreUserUseCase } from '../../../application/users/restoreUser.js';
import { UserQueries } from '../../../application/users/queries.js';
import { UserRepository } from '../../../application/users/userRepository.js';
import { TokenService } from '../../../application/auth/tokens.js';
import { toUserResponse } from '../../../domain/users/user.js';
import {
  createUserBodySchema,
  searchQuerySchema,
  updateUserBodySchema,
  userIdParamsSchema,
} from '../schemas.js';
import { authMiddleware, requireUserId } from '../middleware/auth.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';

/**
 * @openapi
 * /api/users:
 *   get:
 *     tags: [Users]
 *     summary: List users that are not deleted
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/UserList' }
 *       401:
 *         description: Unauthorized
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   post:
 *     tags: [Users]
 *     summary: Create a user on behalf of the caller
 *     security: [{ bearerAuth: [] }]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema: { $ref: '#/components/schemas/CreateUserRequest' }
 *     responses:
 *       201:
 *         description: Created
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/User' }
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       409:
 *         description: Email already exists
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/users/search:
 *   get:
 *     tags: [Users]
 *     summary: Case-insensitive search on name or email
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - in: query
 *         name: q
 *         required: true
 *         schema: { type: string, maxLength: 100 }
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/UserList' }
 *       400:
 *         description: Missing or empty query
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/users/{id}:
 *   get:
 *     tags: [Users]
 *     summary: Get a user
 *     security: [{ bearerAuth: [] }]
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
 *   put:
 *     tags: [Users]
 *     summary: Update some or all fields of a user
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: string, format: uuid }
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema: { $ref: '#/components/schemas/UpdateUserRequest' }
 *     responses:
 *       200:
 *         description: Updated
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/User' }
 *       404:
 *         description: User not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       409:
 *         description: Email already exists
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   delete:
 *     tags: [Users]
 *     summary: Soft-delete a user
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: string, format: uuid }
 *     responses:
 *       200: { description: Deleted }
 *       404:
 *         description: User not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/users/{id}/restore:
 *   post:
 *     tags: [Users]
 *     summary: Restore a soft-deleted user
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: string, format: uuid }
 *     responses:
 *       200:
 *         description: Restored
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/User' }
 *       404:
 *         description: User not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       409:
 *         description: User is not deleted, or its email was taken meanwhile
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/users/{id}/permanent:
 *   delete:
 *     tags: [Users]
 *     summary: Permanently delete a user
 *     security: [{ bearerAuth: [] }]
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

export function createUserRoutes(userRepo: UserRepository, tokens: TokenService) {
  const router = Router();

  const createUserUseCase = new CreateUserUseCase(userRepo);
  const updateUserUseCase = new UpdateUserUseCase(userRepo);
  const deleteUserUseCase = new DeleteUserUseCase(userRepo);
  const purgeUserUseCase = new PurgeUserUseCase(userRepo);
  const restoreUserUseCase = new RestoreUserUseCase(userRepo);
  const queries = new UserQueries(userRepo);

  // All routes require authentication
  router.use(authMiddleware(tokens));

  // List users
  router.get(
    '/',
    asyncHandler(async (_req, res) => {
      const users = await queries.listUsers();
      res.json({ data: users.map(toUserResponse), count: users.length });
    })
  );

  // Search (registered before /:id so "search" is not taken for an id)
  router.get(
    '/search',
    validate({ query: searchQuerySchema }),
    asyncHandler(async (req, res) => {
      const { q } = searchQuerySchema.parse(req.query);
      const users = await queries.searchUsers(q);
      res.json({ data: users.map(toUserResponse), count: users.length, query: q });
    })
  );

  // Get user
  router.get(
    '/:id',
    validate({ params: userIdParamsSchema }),
    asyncHandler(async (req, res) => {
      const { id } = userIdParamsSchema.parse(req.params);
      const user = await queries.getUser(id);
      res.json(toUserResponse(user));
    })
  );

  // Create user
  router.post(
    '/',
    validate({ body: createUserBodySchema }),
    asyncHandler(async (req, res) => {
      const body = createUserBodySchema.parse(req.body);
      const user = await createUserUseCase.execute(body, {
        kind: 'user',
        userId: requireUserId(req),
      });
      res.status(201).json(toUserResponse(user));
    })
  );

  // Update user
  router.put(
    '/:id',
    validate({ params: userIdParamsSchema, body: updateUserBodySchema }),
    asyncHandler(async (req, res) => {
      const { id } = userIdParamsSchema.parse(req.params);
      const body = updateUserBodySchema.parse(req.body);
      const user = await updateUserUseCase.execute({
        ...body,
        userId: id,
        actorId: requireUserId(req),
      });
      res.json(toUserResponse(user));
    })
  );

  // Soft delete
  router.delete(
    '/:id',
    validate({ params: userIdParamsSchema }),
    asyncHandler(async (req, res) => {
      const { id } = userIdParamsSchema.parse(req.params);
      await deleteUserUseCase.execute({ userId: id, actorId: requireUserId(req) });
      res.json({ id, deleted: true });
    })
  );

  // Restore
  router.post(
    '/:id/restore',
    validate({ params: userIdParamsSchema }),
    asyncHandler(async (req, res) => {
      const { id } = userIdParamsSchema.parse(req.params);
      const user = await restoreUserUseCase.execute({ userId: id, actorId: requireUserId(req) });
      res.json(toUserResponse(user));
    })
  );

  // Hard delete
  router.delete(
    '/:id/permanent',
    validate({ params: userIdParamsSchema }),
    asyncHandler(async (req, res) => {
      const { id } = userIdParamsSchema.parse(req.params);
      await purgeUserUseCase.execute({ userId: id, actorId: requireUserId(req) });
      res.status(204).end();
    })
  );

  return router;
}
