// packages/core/src/logger.ts
import pino, { type Logger } from 'pino';

let root: Logger | undefined;

export function rootLogger(): Logger {
  root ??= pino({ name: 'frostbridge', level: process.env.LOG_LEVEL ?? 'info' });
  return root;
}

export function setLogLevel(level: string): void {
  rootLogger().level = level;
}

export function createLogger(component: string): Logger {
  return rootLogger().child({ component });
}

export type { Logger };
