import { Router } from 'express';
import type { HealthAggregator } from '../../../application/health/healthAggregator.js';
import type { AdapterRegistry } from '../../factory/adapterRegistry.js';
import { asyncHandler } from '../middleware/asyncHandler.js';

/**
 * @openapi
 * /api/v1/health:
 *   get:
 *     tags: [Health]
 *     summary: Composite health of every backend
 *     responses:
 *       200: { description: Healthy or degraded }
 *       503: { description: Unhealthy }
 *
 * /api/v1/health/live:
 *   get:
 *     tags: [Health]
 *     summary: Liveness (process is up)
 *     responses:
 *       200: { description: Alive }
 *
 * /api/v1/health/ready:
 *   get:
 *     tags: [Health]
 *     summary: Readiness (every required backend reachable)
 *     responses:
 *       200: { description: Ready }
 *       503: { description: Not ready }
 */
export function createHealthRoutes(health: HealthAggregator, registry: AdapterRegistry) {
  const router = Router();

  router.get(
    '/health',
    asyncHandler(async (_req, res) => {
      const report = await health.check();
      res.status(report.status === 'unhealthy' ? 503 : 200).json({
        ...report,
        backends: registry.describe(),
      });
    })
  );

  router.get('/health/live', (_req, res) => {
    res.json({ status: 'alive' });
  });

  router.get(
    '/health/ready',
    asyncHandler(async (_req, res) => {
      const report = await health.check();
      if (report.status === 'healthy') {
        res.json({ status: 'ready' });
        return;
      }
      res.status(503).json({ status: 'not_ready' });
    })
  );

  return router;
}
