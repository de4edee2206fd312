// apps/http/src/index.ts
export { buildApp, classifyError, type AppDeps } from './app';
export { SessionNotFoundError, SessionRegistry } from './sessions';
