export * from './schema';
export * from './validator';
export * from './loader';
export * from './version';
