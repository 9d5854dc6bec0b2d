export * from './types/metric';
export * from './types/collector';
