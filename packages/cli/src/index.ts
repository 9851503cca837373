export * from './config';
export * from './factory';
