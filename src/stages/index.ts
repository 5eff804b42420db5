export * from './result';
export * from './prerequisite-checker';
export * from './image-builder';
export * from './image-verifier';
export * from './resource-applier';
export * from './rollout-refresher';
export * from './readiness-waiter';
export * from './health-prober';
export * from './compose-launcher';
export * from './container-locator';
export * from './cluster-runtime-check';
export * from './image-auditor';
