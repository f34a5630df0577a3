export * from './interfaces';
export * from './memory-registry';
export * from './memory-infra';
export * from './memory-metrics';
export * from './memory-verification';
export * from './memory-notifications';
