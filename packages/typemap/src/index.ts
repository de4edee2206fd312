// packages/typemap/src/index.ts
export * from './mapper';
export * from './display';
