// Run configuration resolution
import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { isAbsolute, resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import { DeploymentMode, RunConfig } from '../types';
import { ConfigLoader, ConfigValidationResult, LoadOptions, RawRunConfig } from './types';
import { validateAndNormalizeConfig, validateConfig } from './validator';
import { createResourceCatalog, EDGE_IMAGE } from './catalog';

type PlainObject = Record<string, unknown>;

export const DEFAULT_CONFIG_FILES = ['deploy.yml', 'deploy.yaml', 'deploy.json'];

export const REQUIRED_TOOLS: Record<DeploymentMode, string[]> = {
  compose: ['docker', 'docker-compose'],
  cluster: ['minikube', 'kubectl', 'docker']
};

/**
 * Environment variables that override a single tunable, keyed by the
 * dotted path of the tunable they replace.
 */
export const ENVIRONMENT_OVERRIDES: Record<string, string> = {
  COMPOSE_FILE: 'compose_file',
  K8S_DIR: 'manifest_dir',
  LOG_FILE: 'log_file',
  NGINX_LOGS_FILE: 'audit.file',
  BASE_URL: 'base_url',
  HEALTH_CHECK_TIMEOUT: 'health_check.timeout',
  HEALTH_CHECK_INTERVAL: 'health_check.interval',
  READINESS_TIMEOUT: 'readiness_timeout'
};

export function defaultTunables(): RawRunConfig {
  return {
    compose_file: 'docker-compose.yml',
    manifest_dir: 'k8s',
    log_file: 'deployment.log',
    audit: {
      file: 'nginx-logs.txt',
      image: EDGE_IMAGE
    },
    base_url: 'http://localhost',
    health_check: {
      timeout: 30,
      interval: 2
    },
    readiness_timeout: 300,
    settle_delay: 5,
    required_ports: [80, 3000, 5000]
  };
}

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Resolves the RunConfig for one invocation: built-in defaults, then an
 * optional YAML or JSON config file, then environment overrides.
 */
export class RunConfigLoader implements ConfigLoader {

  async load(options: LoadOptions): Promise<RunConfig> {
    const configPath = this.findConfigFile(options);
    let fileConfig: PlainObject = {};

    if (configPath) {
      fileConfig = await this.readConfigFile(configPath, options.env);
    }

    const merged = this.deepMerge(
      this.deepMerge(defaultTunables(), fileConfig),
      this.environmentOverrides(options.env)
    );

    try {
      const tunables = validateAndNormalizeConfig(merged);
      return this.buildRunConfig(options.mode, options.cwd, tunables);
    } catch (error) {
      const source = configPath ? ` (config file: ${configPath})` : '';
      throw new Error(`Invalid run configuration${source}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  validate(config: unknown): ConfigValidationResult {
    return validateConfig(config);
  }

  /**
   * Parse a config file, substituting `${VAR}` and `${VAR:-default}`
   * references from the given environment.
   */
  async readConfigFile(path: string, env: LoadOptions['env']): Promise<PlainObject> {
    try {
      const content = await readFile(path, 'utf-8');

      let parsed: unknown;
      if (path.endsWith('.json')) {
        parsed = JSON.parse(content);
      } else if (path.endsWith('.yml') || path.endsWith('.yaml')) {
        parsed = parseYaml(content);
      } else {
        throw new Error('Unsupported file format. Only .json, .yml, and .yaml files are supported.');
      }

      if (parsed === null || parsed === undefined) {
        return {};
      }
      if (!isPlainObject(parsed)) {
        throw new Error('Configuration file must contain a mapping at the top level');
      }

      const resolved = this.resolveEnvironmentVariables(parsed, env);
      return isPlainObject(resolved) ? resolved : {};
    } catch (error) {
      throw new Error(`Failed to load configuration from ${path}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  private findConfigFile(options: LoadOptions): string | undefined {
    if (options.configPath) {
      const explicit = resolve(options.cwd, options.configPath);
      if (!existsSync(explicit)) {
        throw new Error(`Configuration file not found: ${explicit}`);
      }
      return explicit;
    }

    return DEFAULT_CONFIG_FILES
      .map(name => resolve(options.cwd, name))
      .find(candidate => existsSync(candidate));
  }

  private environmentOverrides(env: LoadOptions['env']): PlainObject {
    const overrides: PlainObject = {};

    for (const [variable, path] of Object.entries(ENVIRONMENT_OVERRIDES)) {
      const value = env[variable];
      if (value === undefined || value === '') {
        continue;
      }

      const keys = path.split('.');
      let cursor = overrides;
      for (const key of keys.slice(0, -1)) {
        const next = cursor[key];
        if (isPlainObject(next)) {
          cursor = next;
        } else {
          const created: PlainObject = {};
          cursor[key] = created;
          cursor = created;
        }
      }
      cursor[keys[keys.length - 1]] = value;
    }

    return overrides;
  }

  private buildRunConfig(mode: DeploymentMode, cwd: string, tunables: RawRunConfig): RunConfig {
    const workDir = resolve(cwd);
    const inWorkDir = (path: string) => (isAbsolute(path) ? path : resolve(workDir, path));
    const baseUrl = tunables.base_url.replace(/\/+$/, '');
    const catalog = createResourceCatalog();

    const config: RunConfig = {
      mode,
      workDir,
      composeFile: inWorkDir(tunables.compose_file),
      manifestDir: inWorkDir(tunables.manifest_dir),
      logFile: inWorkDir(tunables.log_file),
      auditFile: inWorkDir(tunables.audit.file),
      auditImage: tunables.audit.image,
      edgeImage: EDGE_IMAGE,
      baseUrl,
      healthCheck: {
        timeoutSeconds: tunables.health_check.timeout,
        intervalSeconds: tunables.health_check.interval
      },
      readinessTimeoutSeconds: tunables.readiness_timeout,
      settleDelaySeconds: tunables.settle_delay,
      requiredTools: [...REQUIRED_TOOLS[mode]],
      requiredPorts: [...tunables.required_ports],
      services: catalog.listServices(),
      expectedImages: catalog.generateExpectedImages(mode === 'compose'),
      workloads: catalog.generateWorkloadNames(),
      resources: catalog.generateResourceOrder(),
      endpoints: catalog.generateEndpoints(baseUrl)
    };

    return deepFreeze(config);
  }

  private resolveEnvironmentVariables(value: unknown, env: LoadOptions['env']): unknown {
    if (typeof value === 'string') {
      return this.substituteEnvironmentVariables(value, env);
    }

    if (Array.isArray(value)) {
      return value.map(item => this.resolveEnvironmentVariables(item, env));
    }

    if (isPlainObject(value)) {
      const result: PlainObject = {};
      for (const [key, entry] of Object.entries(value)) {
        result[key] = this.resolveEnvironmentVariables(entry, env);
      }
      return result;
    }

    return value;
  }

  /**
   * Supports ${VAR_NAME} and ${VAR_NAME:-default_value}; an unset variable
   * without a default keeps its placeholder.
   */
  private substituteEnvironmentVariables(str: string, env: LoadOptions['env']): string {
    return str.replace(/\$\{([^}]+)\}/g, (match: string, expression: string) => {
      const [name, defaultValue] = expression.split(':-');
      const envValue = env[name];

      if (envValue !== undefined) {
        return envValue;
      }

      if (defaultValue !== undefined) {
        return defaultValue;
      }

      return match;
    });
  }

  /**
   * Deep merge two objects, with the second object taking precedence
   */
  private deepMerge(target: object, source: object): PlainObject {
    const result: PlainObject = { ...target };

    for (const [key, value] of Object.entries(source)) {
      const existing = result[key];
      if (isPlainObject(value) && isPlainObject(existing)) {
        result[key] = this.deepMerge(existing, value);
      } else if (isPlainObject(value)) {
        result[key] = this.deepMerge({}, value);
      } else {
        result[key] = value;
      }
    }

    return result;
  }
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const entry of Object.values(value)) {
      deepFreeze(entry);
    }
    Object.freeze(value);
  }
  return value;
}

export function createConfigLoader(): RunConfigLoader {
  return new RunConfigLoader();
}
