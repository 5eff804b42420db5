import { RunLogger } from '../logging/run-logger';
import { CommandRunner, PortInspector, ToolLocator } from '../provisioning/types';
import { StageResult } from '../types';
import { fatal, ok } from './result';

export const PREREQUISITES_STAGE = 'Prerequisites';

/** Tools that do not take `--version` */
export const VERSION_ARGS: Record<string, string[]> = {
  kubectl: ['version', '--client'],
  minikube: ['version']
};

export const VERSION_TIMEOUT_MS = 10000;

/**
 * Checks that required tools resolve and required ports are free before
 * anything is mutated.
 */
export class PrerequisiteChecker {
  constructor(
    private readonly logger: RunLogger,
    private readonly locator: ToolLocator,
    private readonly ports: PortInspector,
    private readonly runner: CommandRunner
  ) {}

  async validate(requiredTools: string[], requiredPorts: number[]): Promise<StageResult> {
    this.logger.section('Validating Prerequisites');
    const problems: string[] = [];

    for (const tool of requiredTools) {
      const path = this.locator.locate(tool);
      if (!path) {
        this.logger.error(`${tool} is not installed or not in PATH`);
        problems.push(`tool ${tool}`);
        continue;
      }
      this.logger.info(`${tool} is installed: ${path}`);
      await this.logVersion(tool, path);
    }

    if (requiredPorts.length > 0) {
      this.logger.info('Checking required ports availability...');
      const scan = await this.ports.scan(requiredPorts);

      if (!scan.provider) {
        this.logger.warning('Cannot check port availability (netstat/ss not available)');
      } else {
        for (const port of requiredPorts) {
          if (scan.bound.includes(port)) {
            this.logger.warning(`Port ${port} is already in use`);
            problems.push(`port ${port}`);
          } else {
            this.logger.info(`Port ${port} is available`);
          }
        }
      }
    }

    if (problems.length > 0) {
      const message = `Prerequisites validation failed with ${problems.length} error(s)`;
      this.logger.error(message);
      return fatal(PREREQUISITES_STAGE, message, 'structural', problems);
    }

    this.logger.success('All prerequisites validated successfully');
    return ok(PREREQUISITES_STAGE, 'All prerequisites validated successfully');
  }

  private async logVersion(tool: string, path: string): Promise<void> {
    const args = VERSION_ARGS[tool] ?? ['--version'];
    const result = await this.runner.run(path, args, { timeoutMs: VERSION_TIMEOUT_MS });
    const version = result.stdout.split('\n')[0]?.trim();
    if (result.ok && version) {
      this.logger.info(`${tool} version: ${version}`);
    } else {
      this.logger.warning(`Could not read ${tool} version`);
    }
  }
}
