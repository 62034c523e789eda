import { Router } from 'express';
import { CreateUserUseCase } from '../../../application/users/createUser.js';
import { LoginUseCase } from '../../../application/auth/login.js';
import { TokenService } from '../../../application/auth/tokens.js';
import { UserRepository } from '../../../application/users/userRepository.js';
import { toUserResponse } from '../../../domain/users/user.js';
import { loginBodySchema, registerBodySchema } from '../schemas.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';

/**
 * @openapi
 * /api/register:
 *   post:
 *     tags: [Auth]
 *     summary: Register a new user
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             $ref: '#/components/schemas/CreateUserRequest'
 *     responses:
 *       201:
 *         description: User created
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/User'
 *       400:
 *         description: Validation error
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
 * /api/login:
 *   post:
 *     tags: [Auth]
 *     summary: Login and receive JWT
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
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 token: { type: string }
 *                 tokenType: { type: string, example: Bearer }
 *                 expiresIn: { type: integer, example: 3600 }
 *                 userId: { type: string, format: uuid }
 *                 email: { type: string, format: email }
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
 */

export function createAuthRoutes(userRepo: UserRepository, tokens: TokenService) {
  const router = Router();
  const createUserUseCase = new CreateUserUseCase(userRepo);
  const loginUseCase = new LoginUseCase(userRepo, tokens);

  router.post(
    '/register',
    validate({ body: registerBodySchema }),
    asyncHandler(async (req, res) => {
      const body = registerBodySchema.parse(req.body);
      const user = await createUserUseCase.execute(body, { kind: 'self' });
      res.status(201).json(toUserResponse(user));
    })
  );

  router.post(
    '/login',
    validate({ body: loginBodySchema }),
    asyncHandler(async (req, res) => {
      const body = loginBodySchema.parse(req.body);
      const result = await loginUseCase.execute(body);
      res.status(200).json(result);
    })
  );

  return router;
}
