import { Router } from 'express';
import { UploadProbeFileUseCase } from '../../../application/storage/uploadProbeFile.js';
import type { AdapterRegistry } from '../../factory/adapterRegistry.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { requestSignal } from '../middleware/requestSignal.js';

/**
 * @openapi
 * /api/v1/storage/probe:
 *   post:
 *     tags: [Storage]
 *     summary: Upload a small probe file and confirm it exists
 *     responses:
 *       201:
 *         description: Uploaded
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 key: { type: string, example: probes/probe-0a1b2c3d.txt }
 *                 location: { type: string }
 *                 sizeBytes: { type: integer }
 *                 verified: { type: boolean }
 *       503:
 *         description: Storage unavailable or access denied
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */
export function createStorageRoutes(registry: AdapterRegistry) {
  const router = Router();

  router.post(
    '/storage/probe',
    asyncHandler(async (_req, res) => {
      const useCase = new UploadProbeFileUseCase(await registry.resolveService('fileStorage'));
      const result = await useCase.execute({ signal: requestSignal(res) });
      if (!result.ok) {
        throw result.error;
      }
      res.status(201).json(result.value);
    })
  );

  return router;
}
