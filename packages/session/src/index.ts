// packages/session/src/index.ts
export * from './context';
