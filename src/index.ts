// Main entry point for the deployment orchestrator
export * from './types';
export * from './config';
export * from './logging/run-logger';
export * from './provisioning';
export * from './stages';
export * from './orchestration';
export * from './utils/capabilities';
export * from './utils/time';
