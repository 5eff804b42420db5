import { CommandResult, CommandRunner, ComposeProject } from './types';

export class ComposeCli implements ComposeProject {
  constructor(
    private readonly runner: CommandRunner,
    private readonly composeFile: string,
    private readonly workDir: string
  ) {}

  /** Removes containers and volumes from a previous run */
  down(): Promise<CommandResult> {
    return this.compose(['down', '-v']);
  }

  build(): Promise<CommandResult> {
    return this.compose(['build']);
  }

  up(): Promise<CommandResult> {
    return this.compose(['up', '-d']);
  }

  private compose(args: string[]): Promise<CommandResult> {
    return this.runner.run('docker-compose', ['-f', this.composeFile, ...args], { cwd: this.workDir });
  }
}
