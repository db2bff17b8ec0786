import type { HealthProbe } from '../../application/ports/healthProbe.js';
import { ConfigurationError } from '../../application/errors.js';
import { UnavailableError, type AppError } from '../../domain/errors.js';
import { type Result, err } from '../../domain/result.js';
import type { AdapterRegistry } from '../factory/adapterRegistry.js';

interface Pingable {
  ping(options?: { signal?: AbortSignal }): Promise<Result<void, AppError>>;
}

/**
 * One required probe per port. Each resolves its adapter through the
 * registry, then pings it.
 */
export function createAdapterProbes(registry: AdapterRegistry): HealthProbe[] {
  return [
    {
      name: 'userRepository',
      required: true,
      check: (signal) => resolveAndPing(() => registry.resolveRepository('user'), signal),
    },
    {
      name: 'fileStorage',
      required: true,
      check: (signal) => resolveAndPing(() => registry.resolveService('fileStorage'), signal),
    },
  ];
}

async function resolveAndPing(
  resolve: () => Promise<Pingable>,
  signal: AbortSignal
): Promise<Result<void, AppError>> {
  let adapter: Pingable;
  try {
    adapter = await resolve();
  } catch (error) {
    // Misconfiguration shows up as an unreachable probe, not a crashed check
    if (error instanceof ConfigurationError) {
      return err(new UnavailableError(error.message, { key: error.key }));
    }
    throw error;
  }
  return adapter.ping({ signal });
}
