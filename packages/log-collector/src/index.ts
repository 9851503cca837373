export * from './config';
export * from './commands';
export * from './ports';
export * from './routing';
export * from './collector';
export * from './workflows';
