import { Router } from 'express';
import { dbLogger } from '../../../lib/logger.js';

export type DatabaseProbe = () => Promise<void>;

const PROBE_TIMEOUT_MS = 2000;

/**
 * Helper to add timeout to a promise.
 */
function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<T>((_, reject) => {
    timer = setTimeout(() => reject(new Error('timeout')), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/**
 * @openapi
 * /api/health:
 *   get:
 *     tags: [Meta]
 *     summary: Liveness and database reachability
 *     responses:
 *       200: { description: Healthy }
 *       503:
 *         description: Database unavailable
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */
export function createHealthRoutes(probeDatabase: DatabaseProbe) {
  const router = Router();

  router.get('/health', (_req, res) => {
    withTimeout(probeDatabase(), PROBE_TIMEOUT_MS)
      .then(() => {
        res.status(200).json({ status: 'ok', database: 'up' });
      })
      .catch((err: unknown) => {
        dbLogger.error({ err }, 'Health check failed');
        res.status(503).json({
          code: 'DB_UNAVAILABLE',
          message: 'Database unavailable',
        });
      });
  });

  return router;
}
