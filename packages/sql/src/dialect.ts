// packages/sql/src/dialect.ts
// A full Snowflake grammar, used to tell unsupported input from malformed input.
// The translator's own parser covers only what the rewrite stages can translate.
import { Dialect, transpile } from '@polyglot-sql/sdk';

export type SourceCheck = { valid: true; statements: number } | { valid: false; error: string };

/** Whether Snowflake's grammar accepts `sql`, and how many statements it holds. */
export function checkSource(sql: string): SourceCheck {
  try {
    const r = transpile(sql, Dialect.Snowflake, Dialect.Snowflake);
    if (r.success && r.sql) return { valid: true, statements: r.sql.length };
    return { valid: false, error: r.error ?? 'not accepted as Snowflake SQL' };
  } catch (err: unknown) {
    // the grammar reports some failures by throwing; either way the text is not Snowflake SQL
    return { valid: false, error: err instanceof Error ? err.message : String(err) };
  }
}
