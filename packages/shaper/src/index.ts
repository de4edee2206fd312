// packages/shaper/src/index.ts
export * from './shape';
export * from './describe';
