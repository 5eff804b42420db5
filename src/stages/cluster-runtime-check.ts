import { RunLogger } from '../logging/run-logger';
import { describeFailure } from '../provisioning/command-runner';
import { parseDockerEnv } from '../provisioning/minikube-cli';
import { ClusterRuntime } from '../provisioning/types';
import { StageResult } from '../types';
import { fatal, ok } from './result';

export const CLUSTER_RUNTIME_STAGE = 'Cluster runtime';

export interface ClusterRuntimeReport {
  result: StageResult;
  /** Variables that point the docker CLI at the cluster's daemon */
  dockerEnv?: Record<string, string>;
}

export class ClusterRuntimeCheck {
  constructor(
    private readonly logger: RunLogger,
    private readonly cluster: ClusterRuntime
  ) {}

  async prepare(): Promise<ClusterRuntimeReport> {
    this.logger.section('Checking Cluster Runtime');

    const status = await this.cluster.status();
    if (!status.ok) {
      const message = 'Minikube is not running. Please start it with: minikube start';
      this.logger.error(message);
      return { result: fatal(CLUSTER_RUNTIME_STAGE, message, 'structural') };
    }
    this.logger.success('Minikube is running');

    this.logger.info("Configuring Docker to use Minikube's Docker daemon...");
    const envOutput = await this.cluster.dockerEnv();
    const dockerEnv = envOutput.ok ? parseDockerEnv(envOutput.stdout) : {};

    if (!envOutput.ok || !dockerEnv.DOCKER_HOST) {
      const reason = envOutput.ok ? 'DOCKER_HOST was not provided' : describeFailure(envOutput);
      const message = `Failed to configure Docker environment for Minikube: ${reason}`;
      this.logger.error(message);
      return { result: fatal(CLUSTER_RUNTIME_STAGE, message, 'structural') };
    }

    this.logger.success(`Docker environment configured for Minikube (${dockerEnv.DOCKER_HOST})`);
    return {
      result: ok(CLUSTER_RUNTIME_STAGE, 'Docker environment configured for Minikube'),
      dockerEnv
    };
  }
}
