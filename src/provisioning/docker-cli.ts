import { CommandResult, CommandRunner, ContainerBuilder, ContainerInventory, ImageInventory } from './types';

/**
 * Docker CLI wrapper. The environment lets builds target another daemon,
 * such as the one inside the local cluster VM.
 */
export class DockerCli implements ContainerBuilder, ImageInventory, ContainerInventory {
  constructor(
    private readonly runner: CommandRunner,
    private readonly env: Record<string, string> = {}
  ) {}

  withEnvironment(env: Record<string, string>): DockerCli {
    return new DockerCli(this.runner, { ...this.env, ...env });
  }

  build(contextDir: string, tag: string): Promise<CommandResult> {
    return this.docker(['build', '-t', tag, contextDir]);
  }

  async listImages(): Promise<string[]> {
    const result = await this.docker(['images', '--format', '{{.Repository}}:{{.Tag}}']);
    if (!result.ok) {
      throw new Error(`docker images failed: ${result.stderr.trim() || result.error}`);
    }
    return result.stdout
      .split('\n')
      .map(line => line.trim())
      .filter(Boolean);
  }

  imagesTable(): Promise<CommandResult> {
    return this.docker(['images']);
  }

  inspectImage(image: string): Promise<CommandResult> {
    return this.docker(['inspect', image]);
  }

  containersTable(): Promise<CommandResult> {
    return this.docker(['ps']);
  }

  async findContainerByAncestor(image: string): Promise<string | undefined> {
    const result = await this.docker(['ps', '--filter', `ancestor=${image}`, '--format', '{{.ID}}']);
    if (!result.ok) {
      throw new Error(`docker ps failed: ${result.stderr.trim() || result.error}`);
    }
    return result.stdout
      .split('\n')
      .map(line => line.trim())
      .find(Boolean);
  }

  private docker(args: string[]): Promise<CommandResult> {
    return this.runner.run('docker', args, { env: this.env });
  }
}
