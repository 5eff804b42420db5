import { DeploymentMode, StageResult } from '../types';

// Orchestration-specific types
export interface DeploymentStage {
  name: string;
  run(): Promise<StageResult>;
  /** Hint printed when this stage aborts the run */
  remediation?: string;
}

export interface DeploymentPipeline {
  mode: DeploymentMode;
  title: string;
  stages: DeploymentStage[];
  /** Final log line of a successful run */
  completion?: string;
  /** Access hints printed in the success banner */
  summary(): string[];
}
