// packages/sql/src/index.ts
export * from './ast';
export * from './lexer';
export * from './parser';
export * from './emitter';
export * from './walk';
export * from './keywords';
export * from './date-parts';
export * from './dialect';
