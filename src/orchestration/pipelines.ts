import { RunLogger } from '../logging/run-logger';
import { Toolchain } from '../provisioning';
import { ClusterRuntimeCheck, CLUSTER_RUNTIME_STAGE } from '../stages/cluster-runtime-check';
import { ComposeLauncher, COMPOSE_LAUNCH_STAGE, DEPLOYMENT_DIRECTORY_STAGE } from '../stages/compose-launcher';
import { ContainerLocator, EDGE_CONTAINER_STAGE } from '../stages/container-locator';
import { HealthProber, HEALTH_STAGE } from '../stages/health-prober';
import { ImageAuditor, IMAGE_AUDIT_STAGE } from '../stages/image-auditor';
import { ImageBuilder, IMAGE_BUILD_STAGE } from '../stages/image-builder';
import { ImageVerifier, IMAGE_VERIFY_STAGE } from '../stages/image-verifier';
import { PrerequisiteChecker, PREREQUISITES_STAGE } from '../stages/prerequisite-checker';
import { READINESS_STAGE, ReadinessWaiter } from '../stages/readiness-waiter';
import { ResourceApplier, RESOURCE_APPLY_STAGE } from '../stages/resource-applier';
import { RolloutRefresher, ROLLOUT_STAGE } from '../stages/rollout-refresher';
import { RunConfig } from '../types';
import { Sleep } from '../utils/time';
import { DeploymentPipeline, DeploymentStage } from './types';

export interface PipelineOptions {
  sleep?: Sleep;
  now?: () => number;
}

function prerequisitesStage(config: RunConfig, tools: Toolchain, logger: RunLogger): DeploymentStage {
  const checker = new PrerequisiteChecker(logger, tools.locator, tools.ports, tools.runner);
  return {
    name: PREREQUISITES_STAGE,
    run: () => checker.validate(config.requiredTools, config.requiredPorts),
    remediation: 'Install the missing tools and free the listed ports, then run again'
  };
}

function healthStage(config: RunConfig, tools: Toolchain, logger: RunLogger, options: PipelineOptions): DeploymentStage {
  const prober = new HealthProber(logger, tools.probe, options);
  return {
    name: HEALTH_STAGE,
    run: () => prober.probeAll(config.endpoints, config.healthCheck.timeoutSeconds, config.healthCheck.intervalSeconds)
  };
}

/**
 * Local deployment: build and start everything with Docker Compose, then
 * verify the stack answers on its public ports.
 */
export function createComposePipeline(
  config: RunConfig,
  tools: Toolchain,
  logger: RunLogger,
  options: PipelineOptions = {}
): DeploymentPipeline {
  const launcher = new ComposeLauncher(logger, tools.compose, config.composeFile, options.sleep);
  const verifier = new ImageVerifier(logger, tools.docker, { showInventory: true });
  const locator = new ContainerLocator(logger, tools.docker);
  const auditor = new ImageAuditor(logger, tools.docker, config.auditFile);

  return {
    mode: 'compose',
    title: 'Automated Compose Deployment',
    stages: [
      prerequisitesStage(config, tools, logger),
      {
        name: DEPLOYMENT_DIRECTORY_STAGE,
        run: async () => launcher.checkComposeFile(config.workDir),
        remediation: 'Set COMPOSE_FILE to the compose file of the application'
      },
      {
        name: COMPOSE_LAUNCH_STAGE,
        run: () => launcher.launch(config.settleDelaySeconds)
      },
      {
        name: IMAGE_VERIFY_STAGE,
        run: () => verifier.verifyPresence(config.expectedImages)
      },
      {
        name: EDGE_CONTAINER_STAGE,
        run: () => locator.locateEdge(config.edgeImage),
        remediation: 'Check the edge proxy container with: docker-compose logs'
      },
      healthStage(config, tools, logger, options),
      {
        name: IMAGE_AUDIT_STAGE,
        run: () => auditor.inspect(config.auditImage)
      }
    ],
    summary: () => [
      `Application URL: ${config.baseUrl}`,
      ...config.endpoints
        .filter(endpoint => endpoint.criticality === 'advisory')
        .map(endpoint => `${endpoint.name} API: ${endpoint.url}`),
      `Image audit: ${config.auditFile}`
    ]
  };
}

/**
 * Cluster deployment: build images into the cluster's daemon, apply the
 * manifests in dependency order, restart workloads and verify traffic.
 */
export function createClusterPipeline(
  config: RunConfig,
  tools: Toolchain,
  logger: RunLogger,
  options: PipelineOptions = {}
): DeploymentPipeline {
  const runtimeCheck = new ClusterRuntimeCheck(logger, tools.cluster);
  const applier = new ResourceApplier(logger, tools.controlPlane, config.manifestDir);
  const refresher = new RolloutRefresher(logger, tools.controlPlane);
  const waiter = new ReadinessWaiter(logger, tools.controlPlane);

  // Retargeted at the cluster daemon once its environment is known
  let docker = tools.docker;

  return {
    mode: 'cluster',
    title: 'Kubernetes Deployment',
    stages: [
      prerequisitesStage(config, tools, logger),
      {
        name: CLUSTER_RUNTIME_STAGE,
        run: async () => {
          const report = await runtimeCheck.prepare();
          if (report.dockerEnv) {
            docker = docker.withEnvironment(report.dockerEnv);
          }
          return report.result;
        },
        remediation: 'Start the cluster with: minikube start'
      },
      {
        name: IMAGE_BUILD_STAGE,
        run: () => new ImageBuilder(logger, docker, config.workDir).buildAll(config.services)
      },
      {
        name: IMAGE_VERIFY_STAGE,
        run: () => new ImageVerifier(logger, docker).verifyPresence(config.expectedImages)
      },
      {
        name: RESOURCE_APPLY_STAGE,
        run: () => applier.applyAll(config.resources),
        remediation: `Check the manifests in ${config.manifestDir} with: kubectl apply --dry-run=client -f <file>`
      },
      {
        name: ROLLOUT_STAGE,
        run: () => refresher.restartAll(config.workloads)
      },
      {
        name: READINESS_STAGE,
        run: () => waiter.waitReady(config.readinessTimeoutSeconds)
      },
      healthStage(config, tools, logger, options)
    ],
    summary: () => [
      `Application URL: ${config.baseUrl}`,
      'To access the application, run: minikube service nginx',
      'To check pod status, run: kubectl get pods'
    ]
  };
}

/** Prerequisite check on its own; mutates nothing */
export function createCheckPipeline(config: RunConfig, tools: Toolchain, logger: RunLogger): DeploymentPipeline {
  return {
    mode: config.mode,
    title: 'Prerequisite Check',
    completion: 'Prerequisite check completed successfully',
    stages: [prerequisitesStage(config, tools, logger)],
    summary: () => [`Mode: ${config.mode}`]
  };
}

export function createPipeline(
  config: RunConfig,
  tools: Toolchain,
  logger: RunLogger,
  options: PipelineOptions = {}
): DeploymentPipeline {
  return config.mode === 'cluster'
    ? createClusterPipeline(config, tools, logger, options)
    : createComposePipeline(config, tools, logger, options);
}
