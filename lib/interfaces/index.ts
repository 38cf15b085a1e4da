export * from './fs-interface';
export * from './process-interface';
export * from './shell-interface';
