export * from './executor';
export * from './judgment-service';
export * from './stage-handlers';
export * from './stage-runner';
export * from './state-machine';
