import { Router } from 'express';

export const API_INFO = {
  name: 'User Directory API',
  version: '1.0.0',
  description: 'User management with JWT authentication',
} as const;

/**
 * @openapi
 * /:
 *   get:
 *     tags: [Meta]
 *     summary: API metadata and endpoint index
 *     responses:
 *       200: { description: OK }
 */
export function createHomeRoutes() {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({
      ...API_INFO,
      status: 'running',
      documentation: '/docs',
      endpoints: {
        health: 'GET /api/health',
        register: 'POST /api/register',
        login: 'POST /api/login',
        listUsers: 'GET /api/users',
        searchUsers: 'GET /api/users/search?q={query}',
        getUser: 'GET /api/users/{id}',
        createUser: 'POST /api/users',
        updateUser: 'PUT /api/users/{id}',
        deleteUser: 'DELETE /api/users/{id}',
        restoreUser: 'POST /api/users/{id}/restore',
        purgeUser: 'DELETE /api/users/{id}/permanent',
      },
    });
  });

  return router;
}
