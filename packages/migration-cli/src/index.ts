export * from './contracts';
export * from './file-inspectors';
export * from './config';
export * from './output';
export * from './commands';
