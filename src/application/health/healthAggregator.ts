import type { HealthProbe } from '../ports/healthProbe.js';

export type ProbeStatus = 'reachable' | 'unreachable';
export type OverallStatus = 'healthy' | 'degraded' | 'unhealthy';

export interface ProbeReport {
  name: string;
  required: boolean;
  status: ProbeStatus;
  latencyMs: number;
  detail?: string;
}

export interface HealthReport {
  status: OverallStatus;
  checkedAt: string;
  probes: ProbeReport[];
}

export interface HealthAggregatorOptions {
  timeoutMs: number;
  clock?: () => Date;
}

class ProbeTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Probe timed out after ${timeoutMs}ms`);
    this.name = 'ProbeTimeoutError';
  }
}

/**
 * Runs every registered probe concurrently and folds the outcomes into a
 * single verdict. Holds no state between calls and never retries.
 */
export class HealthAggregator {
  private readonly clock: () => Date;

  constructor(
    private readonly probes: readonly HealthProbe[],
    private readonly options: HealthAggregatorOptions
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  async check(): Promise<HealthReport> {
    const checkedAt = this.clock().toISOString();
    const probes = await Promise.all(this.probes.map((probe) => this.runProbe(probe)));

    return {
      status: summarize(probes),
      checkedAt,
      probes,
    };
  }

  private async runProbe(probe: HealthProbe): Promise<ProbeReport> {
    const controller = new AbortController();
    const startedAt = performance.now();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new ProbeTimeoutError(this.options.timeoutMs));
      }, this.options.timeoutMs);
    });

    const report = (status: ProbeStatus, detail?: string): ProbeReport => ({
      name: probe.name,
      required: probe.required,
      status,
      latencyMs: Math.round(performance.now() - startedAt),
      ...(detail === undefined ? {} : { detail }),
    });

    try {
      const outcome = await Promise.race([probe.check(controller.signal), timeout]);
      if (outcome.ok) {
        return report('reachable');
      }
      return report('unreachable', `${outcome.error.kind}: ${outcome.error.message}`);
    } catch (error) {
      return report('unreachable', error instanceof Error ? error.message : String(error));
    } finally {
      clearTimeout(timer);
    }
  }
}

/**
 * healthy: every required probe reachable (vacuously true with none).
 * degraded: some but not all. unhealthy: none.
 */
export function summarize(probes: readonly ProbeReport[]): OverallStatus {
  const required = probes.filter((probe) => probe.required);
  const reachable = required.filter((probe) => probe.status === 'reachable').length;

  if (reachable === required.length) {
    return 'healthy';
  }
  return reachable > 0 ? 'degraded' : 'unhealthy';
}
