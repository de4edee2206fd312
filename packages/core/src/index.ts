// packages/core/src/index.ts
export * from './types';
export * from './trace';
export * from './errors';
export * from './schemas';
export * from './config';
export * from './logger';
