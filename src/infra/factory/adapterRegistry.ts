import type { Logger } from 'pino';
import type { UserRepository } from '../../application/ports/userRepository.js';
import type { FileStorage } from '../../application/ports/fileStorage.js';
import type { AppConfig } from '../config.js';
import { type AdapterBuilders, defaultBuilders } from './builders.js';
import {
  ENTITY_TYPES,
  SERVICE_TYPES,
  normalizeBackend,
  parseRepositoryBackend,
  parseStorageBackend,
  type EntityType,
  type PortKind,
  type RepositoryBackend,
  type ServiceType,
  type StorageBackend,
} from './backends.js';

export interface AdapterRegistryOptions {
  logger: Logger;
  builders?: AdapterBuilders;
}

export interface BindingDescription {
  port: PortKind;
  name: string;
  backend: string;
  instantiated: boolean;
}

type Closable = { close?(): void };

/**
 * Resolves the adapter behind each port from configuration and keeps one
 * instance per (port, backend) for the registry's lifetime.
 *
 * The caches hold the pending construction promise. Lookup and insertion
 * happen in the same synchronous step, so concurrent first calls share a
 * single construction. A failed construction is evicted.
 */
export class AdapterRegistry {
  private readonly repositories = new Map<string, Promise<UserRepository>>();
  private readonly services = new Map<string, Promise<FileStorage>>();
  private readonly builders: AdapterBuilders;
  private readonly logger: Logger;

  constructor(
    private readonly config: AppConfig,
    options: AdapterRegistryOptions
  ) {
    this.builders = options.builders ?? defaultBuilders;
    this.logger = options.logger.child({ component: 'adapter-registry' });
  }

  async resolveRepository(entityType: EntityType): Promise<UserRepository> {
    const backend = parseRepositoryBackend(this.config.backends.repositories[entityType]);
    return this.memoize(this.repositories, bindingKey(entityType, backend), () =>
      this.buildRepository(entityType, backend)
    );
  }

  async resolveService(serviceType: ServiceType): Promise<FileStorage> {
    const backend = parseStorageBackend(this.config.backends.services[serviceType]);
    return this.memoize(this.services, bindingKey(serviceType, backend), () =>
      this.buildService(serviceType, backend)
    );
  }

  /**
   * Build a fresh adapter for an explicit backend type. Bypasses and never
   * touches the cache; the caller owns the instance.
   */
  createByType(port: 'repository', type: string): Promise<UserRepository>;
  createByType(port: 'service', type: string): Promise<FileStorage>;
  async createByType(port: PortKind, type: string): Promise<UserRepository | FileStorage> {
    if (port === 'repository') {
      return this.buildRepository('user', parseRepositoryBackend(type));
    }
    return this.buildService('fileStorage', parseStorageBackend(type));
  }

  describe(): BindingDescription[] {
    const repositories = ENTITY_TYPES.map((name) => {
      const backend = this.config.backends.repositories[name];
      return {
        port: 'repository' as const,
        name,
        backend,
        instantiated: this.repositories.has(bindingKey(name, normalizeBackend(backend))),
      };
    });
    const services = SERVICE_TYPES.map((name) => {
      const backend = this.config.backends.services[name];
      return {
        port: 'service' as const,
        name,
        backend,
        instantiated: this.services.has(bindingKey(name, normalizeBackend(backend))),
      };
    });
    return [...repositories, ...services];
  }

  /**
   * Release every cached adapter's client and empty the caches.
   */
  async close(): Promise<void> {
    const pending: Promise<Closable>[] = [...this.repositories.values(), ...this.services.values()];
    this.repositories.clear();
    this.services.clear();

    const settled = await Promise.allSettled(pending);
    for (const outcome of settled) {
      if (outcome.status === 'fulfilled') {
        outcome.value.close?.();
      }
    }
  }

  private memoize<T>(cache: Map<string, Promise<T>>, key: string, build: () => Promise<T>): Promise<T> {
    const cached = cache.get(key);
    if (cached) {
      return cached;
    }

    const pending = build().catch((error: unknown) => {
      // close() may have cleared the slot and a newer build taken it
      if (cache.get(key) === pending) {
        cache.delete(key);
      }
      throw error;
    });
    cache.set(key, pending);
    return pending;
  }

  private async buildRepository(entityType: EntityType, backend: RepositoryBackend): Promise<UserRepository> {
    this.logger.info({ entityType, backend }, 'Creating repository adapter');
    const adapter = await this.builders.repository[backend](this.config, this.logger);
    this.logger.info({ entityType, backend }, 'Repository adapter ready');
    return adapter;
  }

  private async buildService(serviceType: ServiceType, backend: StorageBackend): Promise<FileStorage> {
    this.logger.info({ serviceType, backend }, 'Creating service adapter');
    const adapter = await this.builders.service[backend](this.config, this.logger);
    this.logger.info({ serviceType, backend }, 'Service adapter ready');
    return adapter;
  }
}

function bindingKey(name: string, backend: string): string {
  return `${name}:${backend}`;
}
