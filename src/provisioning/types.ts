// Narrow interfaces over the external tools the pipeline drives

export interface CommandOptions {
  cwd?: string;
  /** Merged over the runner's base environment */
  env?: Record<string, string | undefined>;
  /** Written to the child's stdin */
  input?: string;
  timeoutMs?: number;
}

export interface CommandResult {
  ok: boolean;
  exitCode: number | null;
  stdout: string;
  stderr: string;
  error?: string;
}

/**
 * Runs an external command to completion. A non-zero exit is reported in
 * the result, never thrown.
 */
export interface CommandRunner {
  run(command: string, args: string[], options?: CommandOptions): Promise<CommandResult>;
}

export interface ToolLocator {
  /** Absolute path of the executable, or undefined when it is not on the search path */
  locate(tool: string): string | undefined;
}

export interface PortScan {
  /** Provider that produced the socket table; undefined when none was usable */
  provider?: string;
  bound: number[];
}

export interface PortInspector {
  scan(ports: number[]): Promise<PortScan>;
}

export interface ContainerBuilder {
  build(contextDir: string, tag: string): Promise<CommandResult>;
}

export interface ImageInventory {
  /** `repository:tag` for every local image */
  listImages(): Promise<string[]>;
  imagesTable(): Promise<CommandResult>;
  inspectImage(image: string): Promise<CommandResult>;
}

export interface ContainerInventory {
  containersTable(): Promise<CommandResult>;
  findContainerByAncestor(image: string): Promise<string | undefined>;
}

export interface ComposeProject {
  down(): Promise<CommandResult>;
  build(): Promise<CommandResult>;
  up(): Promise<CommandResult>;
}

export interface ControlPlane {
  /** Upsert by resource name; re-applying identical content is a no-op */
  apply(definition: string): Promise<CommandResult>;
  restart(workload: string): Promise<CommandResult>;
  waitReady(timeoutSeconds: number, selector?: string): Promise<CommandResult>;
  listPods(): Promise<CommandResult>;
}

export interface ClusterRuntime {
  status(): Promise<CommandResult>;
  dockerEnv(): Promise<CommandResult>;
}

export interface ProbeOutcome {
  ok: boolean;
  status?: number;
  error?: string;
}

export interface TrafficProbe {
  get(url: string, timeoutMs: number): Promise<ProbeOutcome>;
}
