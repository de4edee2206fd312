// packages/core/src/config.ts
import { ConfigSchema, type FrostConfig } from './schemas';

export function loadConfig(env: Record<string, string | undefined> = process.env): FrostConfig {
  // blank values count as unset
  const cleaned: Record<string, string> = {};
  for (const [k, v] of Object.entries(env)) {
    if (v !== undefined && v.trim() !== '') cleaned[k] = v.trim();
  }
  return Object.freeze(ConfigSchema.parse(cleaned));
}

export const DEFAULT_TARGET = Object.freeze({
  nativeMerge: true,
  nativeQualify: false,
  attachPath: ':memory:',
  stageDir: '/tmp/frost_stage'
});

export const DEFAULT_EXTENSIONS = Object.freeze({ catalog: '_frost_account', schema: '_information_schema' });
