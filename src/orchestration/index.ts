export * from './types';
export * from './deployment-orchestrator';
export * from './pipelines';
