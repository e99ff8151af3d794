export * from './findings';
export * from './errors';
export * from './logger';
export * from './constants';
export * from './state';
export * from './file-state';
export * from './plan';
export * from './plan-loader';
export * from './workflow-runner';
export * from './checks-runner';
export * from './promotion-gate';
