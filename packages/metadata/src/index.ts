// packages/metadata/src/index.ts
export * from './engine';
export * from './store';
export * from './service';
