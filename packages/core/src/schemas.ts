// packages/core/src/schemas.ts
import { z } from 'zod';

const Flag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((v) => v === 'true' || v === '1' || v === 'yes');

export const CasePolicySchema = z.enum(['UPPERCASE_UNQUOTED', 'AS_WRITTEN']);

// environment -> config
export const ConfigSchema = z
  .object({
    FROST_CASE_POLICY: CasePolicySchema.default('UPPERCASE_UNQUOTED'),
    FROST_NATIVE_MERGE: Flag.default('true'),
    FROST_NATIVE_QUALIFY: Flag.default('false'),
    FROST_CACHE_SIZE: z.coerce.number().int().min(0).default(1024),
    FROST_ATTACH_PATH: z.string().min(1).default(':memory:'),
    FROST_STAGE_DIR: z.string().min(1).default('/tmp/frost_stage'),
    FROST_EXT_CATALOG: z.string().min(1).default('_frost_account'),
    FROST_EXT_SCHEMA: z.string().min(1).default('_information_schema'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    PORT: z.coerce.number().int().min(0).max(65535).default(4000),
    HOST: z.string().default('0.0.0.0'),
    CORS_ORIGIN: z.string().default(''),
    RATE_LIMIT_MAX: z.coerce.number().int().positive().default(600)
  })
  .transform((e) => ({
    casePolicy: e.FROST_CASE_POLICY,
    target: {
      nativeMerge: e.FROST_NATIVE_MERGE,
      nativeQualify: e.FROST_NATIVE_QUALIFY,
      attachPath: e.FROST_ATTACH_PATH,
      stageDir: e.FROST_STAGE_DIR
    },
    cacheSize: e.FROST_CACHE_SIZE,
    extensions: { catalog: e.FROST_EXT_CATALOG, schema: e.FROST_EXT_SCHEMA },
    logLevel: e.LOG_LEVEL,
    http: {
      port: e.PORT,
      host: e.HOST,
      corsOrigins: e.CORS_ORIGIN.split(',').map((s) => s.trim()).filter(Boolean),
      rateLimitMax: e.RATE_LIMIT_MAX
    }
  }));

export type FrostConfig = z.output<typeof ConfigSchema>;
export type TargetCapabilities = FrostConfig['target'];
export type ExtensionNames = FrostConfig['extensions'];
