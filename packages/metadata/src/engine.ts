// packages/metadata/src/engine.ts
import {
  DummyDriver,
  Kysely,
  PostgresAdapter,
  PostgresIntrospector,
  PostgresQueryCompiler
} from 'kysely';
import type { NativeColumn } from '@frostbridge/core';

export interface EngineResult {
  columns: NativeColumn[];
  rows: Record<string, unknown>[];
}

/**
 * The execution engine behind the translator. `sql` may hold several statements
 * separated by `;`; the result is the last one's. Failures are the engine's own
 * errors and reach the caller unchanged.
 */
export interface TargetEngine {
  execute(sql: string, parameters?: readonly unknown[]): Promise<EngineResult>;
}

/**
 * Kysely instance that only compiles. DuckDB takes Postgres-style `$n`
 * placeholders and double-quoted identifiers, so the Postgres compiler fits.
 */
export function createCompiler(): Kysely<Record<string, never>> {
  return new Kysely<Record<string, never>>({
    dialect: {
      createAdapter: () => new PostgresAdapter(),
      createDriver: () => new DummyDriver(),
      createIntrospector: (db) => new PostgresIntrospector(db),
      createQueryCompiler: () => new PostgresQueryCompiler()
    }
  });
}
