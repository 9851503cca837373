export * from './fixtures';
export * from './helpers';
export * from './fakes';
export * from './console-server';
