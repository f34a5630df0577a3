/**
 * Domain model exports.
 */

export * from './artifact';
export * from './audit';
export * from './canary';
export * from './errors';
export * from './execution';
export * from './judgment';
export * from './pipeline';
export * from './server-group';
