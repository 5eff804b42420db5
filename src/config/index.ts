export * from './types';
export * from './catalog';
export * from './loader';
export * from './validator';
export * from './starter';
