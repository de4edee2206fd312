// packages/rewriter/src/index.ts
export * from './translator';
export * from './normalize';
export * from './resolve';
export * from './rewrite';
export * from './effects';
export * from './hints';
export * from './variables';
export * from './cache';
