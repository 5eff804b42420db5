import { DeploymentMode, RunConfig } from '../types';

// Configuration-specific types
export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
}

/**
 * Tunables as written in a config file or derived from the environment,
 * before paths are resolved and the service tables are attached.
 */
export interface RawRunConfig {
  compose_file: string;
  manifest_dir: string;
  log_file: string;
  audit: {
    file: string;
    image: string;
  };
  base_url: string;
  health_check: {
    timeout: number;
    interval: number;
  };
  readiness_timeout: number;
  settle_delay: number;
  required_ports: number[];
}

export interface LoadOptions {
  mode: DeploymentMode;
  cwd: string;
  env: Record<string, string | undefined>;
  /** Explicit config file; when absent the working directory is searched */
  configPath?: string;
}

export interface ConfigLoader {
  load(options: LoadOptions): Promise<RunConfig>;
  validate(config: unknown): ConfigValidationResult;
}
