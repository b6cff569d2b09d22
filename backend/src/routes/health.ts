/**
 * Health endpoints
 *
 * - GET /health/liveness - process is up
 * - GET /health - dependency checks, 503 when one fails
 */

import { Router, type Request, type Response } from 'express';

export type HealthCheck = () => Promise<boolean>;

export function createHealthRouter(checks: Record<string, HealthCheck>): Router {
  const router = Router();

  router.get('/liveness', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'alive', timestamp: new Date().toISOString() });
  });

  router.get('/', async (_req: Request, res: Response) => {
    const entries = await Promise.all(
      Object.entries(checks).map(async ([name, check]) => {
        const healthy = await check().catch(() => false);
        return [name, healthy ? 'up' : 'down'] as const;
      })
    );
    const services = Object.fromEntries(entries);
    const healthy = entries.every(([, state]) => state === 'up');

    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      services,
    });
  });

  return router;
}
