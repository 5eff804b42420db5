import { ClusterRuntime, CommandResult, CommandRunner } from './types';

export class MinikubeRuntime implements ClusterRuntime {
  constructor(private readonly runner: CommandRunner) {}

  status(): Promise<CommandResult> {
    return this.runner.run('minikube', ['status']);
  }

  dockerEnv(): Promise<CommandResult> {
    return this.runner.run('minikube', ['docker-env', '--shell', 'bash']);
  }
}

/**
 * Parses `export KEY="value"` lines as printed by `minikube docker-env`.
 * Comments and `unset` lines are ignored.
 */
export function parseDockerEnv(output: string): Record<string, string> {
  const env: Record<string, string> = {};

  for (const line of output.split('\n')) {
    const match = /^\s*export\s+([A-Za-z_][A-Za-z0-9_]*)=(.*)$/.exec(line);
    if (!match) {
      continue;
    }
    const [, name, rawValue] = match;
    env[name] = rawValue.trim().replace(/^"(.*)"$/, '$1').replace(/^'(.*)'$/, '$1');
  }

  return env;
}
