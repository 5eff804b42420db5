import { RunConfig } from '../types';
import { SpawnCommandRunner } from './command-runner';
import { ComposeCli } from './compose-cli';
import { DockerCli } from './docker-cli';
import { HttpTrafficProbe } from './http-probe';
import { KubectlControlPlane } from './kubectl-cli';
import { MinikubeRuntime } from './minikube-cli';
import { SocketTablePortInspector } from './port-inspector';
import { PathToolLocator } from './tool-locator';
import {
  ClusterRuntime,
  CommandRunner,
  ComposeProject,
  ContainerBuilder,
  ContainerInventory,
  ControlPlane,
  ImageInventory,
  PortInspector,
  ToolLocator,
  TrafficProbe
} from './types';

export * from './types';
export { SpawnCommandRunner, describeFailure } from './command-runner';
export { ComposeCli } from './compose-cli';
export { DockerCli } from './docker-cli';
export { HttpTrafficProbe } from './http-probe';
export { KubectlControlPlane } from './kubectl-cli';
export { MinikubeRuntime, parseDockerEnv } from './minikube-cli';
export { SocketTablePortInspector, SOCKET_TABLE_SOURCES, isPortListed } from './port-inspector';
export { PathToolLocator } from './tool-locator';

/**
 * Docker client whose daemon can be redirected once the target daemon's
 * environment is known.
 */
export interface RetargetableDocker extends ContainerBuilder, ImageInventory, ContainerInventory {
  withEnvironment(env: Record<string, string>): RetargetableDocker;
}

/** Every external collaborator a pipeline talks to */
export interface Toolchain {
  runner: CommandRunner;
  locator: ToolLocator;
  ports: PortInspector;
  docker: RetargetableDocker;
  compose: ComposeProject;
  controlPlane: ControlPlane;
  cluster: ClusterRuntime;
  probe: TrafficProbe;
}

export function createToolchain(config: RunConfig, env: Record<string, string | undefined>): Toolchain {
  const runner = new SpawnCommandRunner(env);
  const locator = new PathToolLocator(env.PATH);

  return {
    runner,
    locator,
    ports: new SocketTablePortInspector(runner, locator),
    docker: new DockerCli(runner),
    compose: new ComposeCli(runner, config.composeFile, config.workDir),
    controlPlane: new KubectlControlPlane(runner),
    cluster: new MinikubeRuntime(runner),
    probe: new HttpTrafficProbe()
  };
}
