export * from './schemas';
export * from './client';
export * from './config-store';
