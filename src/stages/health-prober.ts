import { RunLogger } from '../logging/run-logger';
import { TrafficProbe } from '../provisioning/types';
import { Endpoint, HealthStatus, StageResult } from '../types';
import { Sleep, sleep as defaultSleep } from '../utils/time';
import { fatal, ok, warning } from './result';

export const HEALTH_STAGE = 'Health checks';

const MAX_ATTEMPT_TIMEOUT_MS = 5000;

export interface HealthProberOptions {
  sleep?: Sleep;
  now?: () => number;
}

/**
 * Advisory endpoints first, so a dead backing service is reported before
 * the edge proxy that fronts it. Relative order within each class is kept.
 */
export function probeOrder(endpoints: Endpoint[]): Endpoint[] {
  return [
    ...endpoints.filter(endpoint => endpoint.criticality === 'advisory'),
    ...endpoints.filter(endpoint => endpoint.criticality === 'critical')
  ];
}

export function attemptBudget(timeoutSeconds: number, intervalSeconds: number): number {
  return Math.max(1, Math.floor(timeoutSeconds / intervalSeconds));
}

/**
 * Polls each endpoint until its first successful response or until its
 * attempt budget runs out.
 */
export class HealthProber {
  private readonly sleep: Sleep;
  private readonly now: () => number;

  constructor(
    private readonly logger: RunLogger,
    private readonly probe: TrafficProbe,
    options: HealthProberOptions = {}
  ) {
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  async probeAll(endpoints: Endpoint[], timeoutSeconds: number, intervalSeconds: number): Promise<StageResult> {
    this.logger.section('Performing Health Checks');
    this.logger.info(`Checking service health (timeout: ${timeoutSeconds}s, interval: ${intervalSeconds}s)...`);

    const statuses: HealthStatus[] = [];
    for (const endpoint of probeOrder(endpoints)) {
      statuses.push(await this.probeEndpoint(endpoint, timeoutSeconds, intervalSeconds));
    }

    const exhausted = statuses.filter(status => !status.reachable);
    const critical = exhausted.filter(status => status.endpoint.criticality === 'critical');
    const names = (list: HealthStatus[]) => list.map(status => status.endpoint.name);

    if (critical.length > 0) {
      const message = `Critical endpoint(s) unreachable: ${names(critical).join(', ')}`;
      this.logger.error(message);
      return { ...fatal(HEALTH_STAGE, message, 'transient', names(exhausted)), health: statuses };
    }

    if (exhausted.length > 0) {
      const message = `Advisory endpoint(s) unreachable: ${names(exhausted).join(', ')}`;
      this.logger.warning(message);
      return { ...warning(HEALTH_STAGE, message, 'transient', names(exhausted)), health: statuses };
    }

    this.logger.success('All health checks passed');
    return { ...ok(HEALTH_STAGE, 'All health checks passed'), health: statuses };
  }

  private async probeEndpoint(endpoint: Endpoint, timeoutSeconds: number, intervalSeconds: number): Promise<HealthStatus> {
    const budget = attemptBudget(timeoutSeconds, intervalSeconds);
    const intervalMs = intervalSeconds * 1000;
    const attemptTimeoutMs = Math.min(intervalMs, MAX_ATTEMPT_TIMEOUT_MS);
    const started = this.now();
    let lastError = 'no response';

    this.logger.info(`Checking ${endpoint.name} service at ${endpoint.url}...`);

    for (let attempt = 1; attempt <= budget; attempt++) {
      const outcome = await this.probe.get(endpoint.url, attemptTimeoutMs);
      if (outcome.ok) {
        this.logger.success(`${endpoint.name} service is healthy (attempt ${attempt}/${budget})`);
        return { endpoint, reachable: true, attempts: attempt, elapsedMs: this.now() - started };
      }

      lastError = outcome.error ?? 'request failed';
      if (attempt < budget) {
        await this.sleep(intervalMs);
      }
    }

    const message = `${endpoint.name} service health check failed after ${budget} attempt(s): ${lastError}`;
    if (endpoint.criticality === 'critical') {
      this.logger.error(message);
    } else {
      this.logger.warning(message);
    }
    return { endpoint, reachable: false, attempts: budget, elapsedMs: this.now() - started };
  }
}
