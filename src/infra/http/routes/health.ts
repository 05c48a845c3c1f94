import { Router } from 'express';
import { UserRepo } from '../../../domain/auth/userRepo.js';
import { logger } from '../../logger.js';

const HEALTH_CHECK_TIMEOUT_MS = 2000;

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

export interface HealthRoutesOptions {
  appName: string;
  appVersion: string;
  userRepo: UserRepo;
  clock?: () => Date;
}

/**
 * @openapi
 * /:
 *   get:
 *     tags: [Health]
 *     summary: Welcome message
 *     responses:
 *       200: { description: OK }
 *
 * /health:
 *   get:
 *     tags: [Health]
 *     summary: Service and user store status
 *     responses:
 *       200: { description: Operational }
 *       503:
 *         description: User store unreachable
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */
export function createHealthRoutes(options: HealthRoutesOptions) {
  const router = Router();
  const clock = options.clock ?? (() => new Date());

  router.get('/', (_req, res) => {
    res.json({
      message: `Welcome to ${options.appName}!`,
      status: 'online',
      documentation: '/docs',
    });
  });

  router.get('/health', (_req, res, next) => {
    withTimeout(options.userRepo.ping(), HEALTH_CHECK_TIMEOUT_MS)
      .then(() => {
        res.status(200).json({
          status: 'operational',
          timestamp: clock().toISOString(),
          version: options.appVersion,
        });
      })
      .catch((error: unknown) => {
        logger.error('Health check failed', {
          error: error instanceof Error ? error.message : String(error),
        });
        res.status(503).json({
          code: 'DB_UNAVAILABLE',
          message: 'Database unavailable',
        });
      })
      .catch(next);
  });

  return router;
}
