import { RunLogger } from '../logging/run-logger';
import { describeFailure } from '../provisioning/command-runner';
import { ControlPlane } from '../provisioning/types';
import { StageResult } from '../types';
import { ok } from './result';

export const READINESS_STAGE = 'Readiness wait';

/**
 * Best-effort wait for every pod to report ready. Traffic is verified
 * afterwards by the health probes, so a timeout here only warns.
 */
export class ReadinessWaiter {
  constructor(
    private readonly logger: RunLogger,
    private readonly controlPlane: ControlPlane
  ) {}

  async waitReady(timeoutSeconds: number): Promise<StageResult> {
    this.logger.section('Waiting for Pods to be Ready');
    this.logger.info(`Waiting up to ${timeoutSeconds}s for all pods to reach Ready state...`);

    const result = await this.controlPlane.waitReady(timeoutSeconds);
    const ready = result.ok;
    if (ready) {
      this.logger.success('All pods are ready');
    } else {
      this.logger.warning(`Some pods may not be ready yet (${describeFailure(result)}). Check with: kubectl get pods`);
    }

    const pods = await this.controlPlane.listPods();
    if (pods.ok) {
      this.logger.info('Current pod status:');
      this.logger.raw(pods.stdout);
    } else {
      this.logger.warning(`Could not list pods: ${describeFailure(pods)}`);
    }

    return ok(READINESS_STAGE, ready ? 'All pods are ready' : `Pods not ready after ${timeoutSeconds}s; continuing`);
  }
}
