// packages/catalog/src/index.ts
export * from './registry';
export * from './rules';
export * from './templates';
export * from './formats';
export * from './catalog';
