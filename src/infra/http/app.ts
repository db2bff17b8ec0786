import express from 'express';
import type { Logger } from 'pino';
import type { HealthAggregator } from '../../application/health/healthAggregator.js';
import type { AdapterRegistry } from '../factory/adapterRegistry.js';
import { createUserRoutes } from './routes/users.js';
import { createStorageRoutes } from './routes/storage.js';
import { createHealthRoutes } from './routes/health.js';
import { createSwaggerRoutes } from './routes/swagger.js';
import { createErrorHandler } from './middleware/errorHandler.js';
import { createApiRateLimiter } from './middleware/rateLimit.js';

export interface AppDependencies {
  registry: AdapterRegistry;
  health: HealthAggregator;
  logger: Logger;
}

export function createApp({ registry, health, logger }: AppDependencies) {
  const app = express();

  // Middleware
  app.use(express.json());
  app.use(createApiRateLimiter());

  // Swagger/OpenAPI docs
  app.use(createSwaggerRoutes());

  app.use('/api/v1', createUserRoutes(registry));
  app.use('/api/v1', createStorageRoutes(registry));
  app.use('/api/v1', createHealthRoutes(health, registry));

  // Error handler (must be last)
  app.use(createErrorHandler(logger));

  return app;
}
