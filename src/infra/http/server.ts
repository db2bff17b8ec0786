import dotenv from 'dotenv';
import { loadConfig } from '../config.js';
import { createLogger } from '../logger.js';
import { AdapterRegistry } from '../factory/adapterRegistry.js';
import { HealthAggregator } from '../../application/health/healthAggregator.js';
import { createAdapterProbes } from '../health/adapterProbes.js';
import { createApp } from './app.js';

dotenv.config();

const config = loadConfig();
const logger = createLogger(config.logLevel);
const registry = new AdapterRegistry(config, { logger });

// Fail fast on a bad backend type or missing setting
try {
  await registry.resolveRepository('user');
  await registry.resolveService('fileStorage');
} catch (error) {
  logger.fatal({ err: error }, 'Adapter resolution failed');
  process.exit(1);
}

const health = new HealthAggregator(createAdapterProbes(registry), {
  timeoutMs: config.health.probeTimeoutMs,
});

const app = createApp({ registry, health, logger });

const server = app.listen(config.port, () => {
  logger.info({ port: config.port, backends: registry.describe() }, 'Server listening');
});

function shutdown(signal: NodeJS.Signals): void {
  logger.info({ signal }, 'Shutting down');
  server.close(() => {
    registry
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error({ err: error }, 'Failed to release adapters');
        process.exit(1);
      });
  });
}

process.once('SIGINT', shutdown);
process.once('SIGTERM', shutdown);
