import { CommandResult, CommandRunner, ControlPlane } from './types';

export class KubectlControlPlane implements ControlPlane {
  constructor(private readonly runner: CommandRunner) {}

  apply(definition: string): Promise<CommandResult> {
    return this.runner.run('kubectl', ['apply', '-f', '-'], { input: definition });
  }

  restart(workload: string): Promise<CommandResult> {
    return this.runner.run('kubectl', ['rollout', 'restart', 'deployment', workload]);
  }

  waitReady(timeoutSeconds: number, selector?: string): Promise<CommandResult> {
    const target = selector ? ['-l', selector] : ['--all'];
    return this.runner.run('kubectl', [
      'wait',
      '--for=condition=ready',
      'pod',
      ...target,
      `--timeout=${timeoutSeconds}s`
    ]);
  }

  listPods(): Promise<CommandResult> {
    return this.runner.run('kubectl', ['get', 'pods']);
  }
}
