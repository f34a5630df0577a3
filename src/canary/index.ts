export * from './canary-analysis';
export * from './scoring';
