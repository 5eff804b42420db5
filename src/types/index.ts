// Core type definitions for the deployment orchestrator

export type DeploymentMode = 'compose' | 'cluster';

export interface ServiceSpec {
  name: string;
  /** Build context directory, relative to the working directory */
  context: string;
  /** Image tag produced by the build, e.g. `backend:latest` */
  image: string;
  port?: number;
  /** Has a horizontal pod autoscaler manifest */
  autoscaled?: boolean;
}

export type ResourceCategory = 'secret' | 'config' | 'storage' | 'workload' | 'edge';

export interface ResourceDef {
  file: string;
  category: ResourceCategory;
  service?: string;
}

export type EndpointCriticality = 'critical' | 'advisory';

export interface Endpoint {
  name: string;
  url: string;
  criticality: EndpointCriticality;
}

export interface HealthCheckSettings {
  timeoutSeconds: number;
  intervalSeconds: number;
}

export interface RunConfig {
  mode: DeploymentMode;
  workDir: string;
  composeFile: string;
  manifestDir: string;
  logFile: string;
  auditFile: string;
  auditImage: string;
  edgeImage: string;
  baseUrl: string;
  healthCheck: HealthCheckSettings;
  readinessTimeoutSeconds: number;
  settleDelaySeconds: number;
  requiredTools: string[];
  requiredPorts: number[];
  services: ServiceSpec[];
  expectedImages: string[];
  workloads: string[];
  resources: ResourceDef[];
  endpoints: Endpoint[];
}

export type StageStatus = 'ok' | 'warning' | 'fatal';

/**
 * structural: missing or malformed inputs, never retried.
 * transient: not-yet-ready state, retried by the poll loops.
 * advisory: optional gaps that are only logged.
 */
export type ErrorKind = 'structural' | 'transient' | 'advisory';

export interface StageResult {
  stage: string;
  status: StageStatus;
  message: string;
  kind?: ErrorKind;
  missing?: string[];
  /** Per-endpoint outcomes, set by the health check stage */
  health?: HealthStatus[];
}

export interface HealthStatus {
  endpoint: Endpoint;
  reachable: boolean;
  attempts: number;
  elapsedMs: number;
}

export interface DeploymentError {
  code: string;
  stage: string;
  message: string;
  remediation?: string;
}

export interface DeploymentMetadata {
  runId: string;
  mode: DeploymentMode;
  timestamp: Date;
  duration?: number;
  logFile: string;
}

export interface DeploymentResult {
  success: boolean;
  stages: StageResult[];
  health: HealthStatus[];
  errors?: DeploymentError[];
  metadata: DeploymentMetadata;
}
