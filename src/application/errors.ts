/**
 * Raised while resolving adapters: unknown backend type or missing
 * required configuration. Fatal for the resolution call; there is no
 * fallback backend.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly key?: string
  ) {
    super(message);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
