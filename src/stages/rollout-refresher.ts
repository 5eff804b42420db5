import { RunLogger } from '../logging/run-logger';
import { describeFailure } from '../provisioning/command-runner';
import { ControlPlane } from '../provisioning/types';
import { StageResult } from '../types';
import { ok, warning } from './result';

export const ROLLOUT_STAGE = 'Rollout refresh';

/**
 * Restarts deployments so they pick up freshly built local images. On a
 * first run nothing exists yet, so every failure is only a warning.
 */
export class RolloutRefresher {
  constructor(
    private readonly logger: RunLogger,
    private readonly controlPlane: ControlPlane
  ) {}

  async restartAll(serviceNames: string[]): Promise<StageResult> {
    this.logger.section('Restarting Deployments to Pick Up Local Images');
    const failed: string[] = [];

    for (const name of serviceNames) {
      this.logger.info(`Restarting deployment: ${name}`);
      const result = await this.controlPlane.restart(name);
      if (!result.ok) {
        this.logger.warning(`Failed to restart ${name} (may not exist yet): ${describeFailure(result)}`);
        failed.push(name);
      }
    }

    if (failed.length > 0) {
      const message = `Deployment restarts initiated; ${failed.length} workload(s) could not be restarted`;
      this.logger.warning(message);
      return warning(ROLLOUT_STAGE, message, 'advisory', failed);
    }

    this.logger.success('Deployment restarts initiated');
    return ok(ROLLOUT_STAGE, 'Deployment restarts initiated');
  }
}
