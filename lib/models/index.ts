export * from './config';
export * from './deployment';
export * from './process';
