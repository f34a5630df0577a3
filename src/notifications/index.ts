export * from './notifier';
export * from './webhook';
