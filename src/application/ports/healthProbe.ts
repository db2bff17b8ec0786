import type { AppError } from '../../domain/errors.js';
import type { Result } from '../../domain/result.js';

/**
 * A named liveness check. `required` probes decide the composite status;
 * optional ones are only reported.
 */
export interface HealthProbe {
  readonly name: string;
  readonly required: boolean;
  check(signal: AbortSignal): Promise<Result<void, AppError>>;
}
