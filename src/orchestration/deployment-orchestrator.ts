import { v4 as uuidv4 } from 'uuid';
import { RunLogger } from '../logging/run-logger';
import { DeploymentError, DeploymentMetadata, DeploymentResult, HealthStatus, StageResult } from '../types';
import { DeploymentPipeline, DeploymentStage } from './types';

export interface OrchestratorOptions {
  runId?: () => string;
  now?: () => number;
}

/**
 * Runs pipeline stages strictly in order. The first fatal stage ends the
 * run; warnings are collected and execution continues.
 */
export class DeploymentOrchestrator {
  private readonly createRunId: () => string;
  private readonly now: () => number;

  constructor(private readonly logger: RunLogger, options: OrchestratorOptions = {}) {
    this.createRunId = options.runId ?? uuidv4;
    this.now = options.now ?? Date.now;
  }

  async deploy(pipeline: DeploymentPipeline): Promise<DeploymentResult> {
    const startTime = this.now();
    const metadata: DeploymentMetadata = {
      runId: this.createRunId(),
      mode: pipeline.mode,
      timestamp: new Date(startTime),
      logFile: this.logger.logFile
    };

    this.logger.reset();
    this.logger.rule();
    this.logger.info(`Starting ${pipeline.title}`);
    this.logger.info(`Run ID: ${metadata.runId}`);
    this.logger.rule();

    const results: StageResult[] = [];

    for (const stage of pipeline.stages) {
      const result = await this.runStage(stage);
      results.push(result);

      if (result.status === 'fatal') {
        metadata.duration = this.now() - startTime;
        const error: DeploymentError = {
          code: `${(result.kind ?? 'structural').toUpperCase()}_FAILURE`,
          stage: stage.name,
          message: result.message,
          remediation: stage.remediation
        };

        if (stage.remediation) {
          this.logger.info(`Hint: ${stage.remediation}`);
        }
        this.logger.error(`Deployment FAILED at stage "${stage.name}": ${result.message}`);

        return {
          success: false,
          stages: results,
          health: collectHealth(results),
          errors: [error],
          metadata
        };
      }
    }

    metadata.duration = this.now() - startTime;
    const health = collectHealth(results);
    const warnings = results.filter(result => result.status === 'warning');

    this.logger.rule();
    for (const line of pipeline.summary()) {
      this.logger.info(line);
    }
    const reachable = health.filter(status => status.reachable).map(status => status.endpoint.name);
    if (health.length > 0) {
      this.logger.info(`Reachable endpoints: ${reachable.length > 0 ? reachable.join(', ') : 'none'}`);
    }
    if (warnings.length > 0) {
      this.logger.info(`Warnings: ${warnings.map(result => result.stage).join(', ')} (see log for details)`);
    }
    this.logger.info(`Log file: ${this.logger.logFile}`);
    this.logger.rule();
    this.logger.success(pipeline.completion ?? 'Deployment completed successfully!');

    return {
      success: true,
      stages: results,
      health,
      metadata
    };
  }

  private async runStage(stage: DeploymentStage): Promise<StageResult> {
    try {
      return await stage.run();
    } catch (error) {
      const message = `Unexpected error: ${error instanceof Error ? error.message : String(error)}`;
      this.logger.error(`${stage.name}: ${message}`);
      return { stage: stage.name, status: 'fatal', message, kind: 'structural' };
    }
  }
}

function collectHealth(results: StageResult[]): HealthStatus[] {
  return results.flatMap(result => result.health ?? []);
}
