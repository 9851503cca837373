export * from './config';
export * from './orchestrator';
