// packages/metadata/src/store.ts
// Declared VARCHAR/BINARY lengths. DuckDB drops them, so they are kept beside
// the catalog, keyed by database, schema, table and column.
import { sql, type Kysely, type RawBuilder } from 'kysely';
import { z } from 'zod';
import type { MetadataEffect, QualifiedName } from '@frostbridge/core';
import { createCompiler, type TargetEngine } from './engine';

export interface ColumnExtensionStore {
  record(effects: readonly MetadataEffect[]): Promise<void>;
  lengths(table: QualifiedName): Promise<Map<string, number>>;
  drop(table: QualifiedName): Promise<void>;
}

const keyOf = (t: QualifiedName): string => JSON.stringify([t.database, t.schema, t.name]);

export class InMemoryExtensionStore implements ColumnExtensionStore {
  private readonly tables = new Map<string, Map<string, number>>();

  async record(effects: readonly MetadataEffect[]): Promise<void> {
    for (const e of effects) {
      if (e.kind === 'drop') {
        await this.drop(e.table);
        continue;
      }
      const key = keyOf(e.table);
      const columns = this.tables.get(key) ?? new Map<string, number>();
      for (const c of e.columns) columns.set(c.column, c.characterLength);
      this.tables.set(key, columns);
    }
  }

  async lengths(table: QualifiedName): Promise<Map<string, number>> {
    return new Map(this.tables.get(keyOf(table)));
  }

  async drop(table: QualifiedName): Promise<void> {
    this.tables.delete(keyOf(table));
  }
}

export interface EngineStoreOptions {
  catalog: string;
  schema: string;
  /** storage for the extension catalog; `:memory:` keeps it for the engine's lifetime */
  attachPath?: string;
}

export const EXTENSION_TABLE = '_columns_ext';

const LengthRowSchema = z.object({
  column_name: z.string(),
  character_maximum_length: z.coerce.number().int()
});

/** Keeps lengths in a table inside the engine, written with parameterized statements. */
export class EngineExtensionStore implements ColumnExtensionStore {
  private readonly db: Kysely<Record<string, never>> = createCompiler();
  private ready?: Promise<void>;

  constructor(private readonly engine: TargetEngine, private readonly opts: EngineStoreOptions) {}

  private get table(): RawBuilder<unknown> {
    return sql.id(this.opts.catalog, this.opts.schema, EXTENSION_TABLE);
  }

  private async run(query: RawBuilder<unknown>): Promise<Record<string, unknown>[]> {
    const compiled = query.compile(this.db);
    const result = await this.engine.execute(compiled.sql, compiled.parameters);
    return result.rows;
  }

  /** Creates the extension catalog and table once per store. */
  ensure(): Promise<void> {
    this.ready ??= this.create().catch((err: unknown) => {
      // a failed setup is retried by the next caller
      this.ready = undefined;
      throw err;
    });
    return this.ready;
  }

  private async create(): Promise<void> {
    const { catalog, schema, attachPath = ':memory:' } = this.opts;
    await this.run(sql`ATTACH IF NOT EXISTS ${sql.lit(attachPath)} AS ${sql.id(catalog)}`);
    await this.run(sql`CREATE SCHEMA IF NOT EXISTS ${sql.id(catalog, schema)}`);
    await this.run(sql`CREATE TABLE IF NOT EXISTS ${this.table} (
      table_catalog VARCHAR NOT NULL,
      table_schema VARCHAR NOT NULL,
      table_name VARCHAR NOT NULL,
      column_name VARCHAR NOT NULL,
      character_maximum_length BIGINT NOT NULL,
      PRIMARY KEY (table_catalog, table_schema, table_name, column_name)
    )`);
  }

  async record(effects: readonly MetadataEffect[]): Promise<void> {
    if (!effects.length) return;
    await this.ensure();
    for (const e of effects) {
      if (e.kind === 'drop') {
        await this.drop(e.table);
        continue;
      }
      const { database, schema, name } = e.table;
      for (const c of e.columns) {
        await this.run(sql`INSERT OR REPLACE INTO ${this.table} VALUES (${database}, ${schema}, ${name}, ${c.column}, ${c.characterLength})`);
      }
    }
  }

  async lengths(table: QualifiedName): Promise<Map<string, number>> {
    await this.ensure();
    const rows = await this.run(
      sql`SELECT column_name, character_maximum_length FROM ${this.table} WHERE table_catalog = ${table.database} AND table_schema = ${table.schema} AND table_name = ${table.name}`
    );
    const out = new Map<string, number>();
    for (const r of rows) {
      const row = LengthRowSchema.parse(r);
      out.set(row.column_name, row.character_maximum_length);
    }
    return out;
  }

  async drop(table: QualifiedName): Promise<void> {
    await this.ensure();
    await this.run(
      sql`DELETE FROM ${this.table} WHERE table_catalog = ${table.database} AND table_schema = ${table.schema} AND table_name = ${table.name}`
    );
  }
}
