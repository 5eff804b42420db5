import { existsSync } from 'fs';
import { RunLogger } from '../logging/run-logger';
import { describeFailure } from '../provisioning/command-runner';
import { ComposeProject } from '../provisioning/types';
import { StageResult } from '../types';
import { Sleep, sleep as defaultSleep } from '../utils/time';
import { fatal, ok } from './result';

export const DEPLOYMENT_DIRECTORY_STAGE = 'Deployment directory';
export const COMPOSE_LAUNCH_STAGE = 'Build and start';

/**
 * Tears down the previous compose stack, rebuilds it and starts it again.
 */
export class ComposeLauncher {
  constructor(
    private readonly logger: RunLogger,
    private readonly project: ComposeProject,
    private readonly composeFile: string,
    private readonly sleep: Sleep = defaultSleep
  ) {}

  checkComposeFile(workDir: string): StageResult {
    this.logger.section('Validating Deployment Directory');
    this.logger.info(`Current directory: ${workDir}`);

    if (!existsSync(this.composeFile)) {
      const message = `Docker Compose file not found: ${this.composeFile}`;
      this.logger.error(message);
      return fatal(DEPLOYMENT_DIRECTORY_STAGE, message, 'structural', [this.composeFile]);
    }

    this.logger.success(`Docker Compose file found: ${this.composeFile}`);
    return ok(DEPLOYMENT_DIRECTORY_STAGE, `Docker Compose file found: ${this.composeFile}`);
  }

  async launch(settleDelaySeconds: number): Promise<StageResult> {
    this.logger.section('Building and Deploying Services');

    this.logger.info('Cleaning up existing containers (if any)...');
    const down = await this.project.down();
    if (!down.ok) {
      this.logger.warning(`Nothing to clean up or cleanup failed: ${describeFailure(down)}`);
    }

    this.logger.info('Building Docker images...');
    const build = await this.project.build();
    if (!build.ok) {
      const message = `Failed to build Docker images: ${describeFailure(build)}`;
      this.logger.error(message);
      return fatal(COMPOSE_LAUNCH_STAGE, message, 'structural');
    }
    this.logger.success('Docker images built successfully');

    this.logger.info('Starting services with Docker Compose...');
    const up = await this.project.up();
    if (!up.ok) {
      const message = `Failed to start services: ${describeFailure(up)}`;
      this.logger.error(message);
      return fatal(COMPOSE_LAUNCH_STAGE, message, 'structural');
    }
    this.logger.success('Services started successfully');

    if (settleDelaySeconds > 0) {
      this.logger.info(`Waiting ${settleDelaySeconds}s for services to initialize...`);
      await this.sleep(settleDelaySeconds * 1000);
    }

    return ok(COMPOSE_LAUNCH_STAGE, 'Services built and started');
  }
}
