export * from './cutover-controller';
export * from './keyed-mutex';
