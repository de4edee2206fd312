// packages/sql/src/date-parts.ts
import table from './date-parts.json';

const ALIASES = new Map<string, string>();
for (const [canonical, aliases] of Object.entries(table)) {
  for (const a of aliases) ALIASES.set(a, canonical);
}

// parts that may size an interval or a date_add/date_diff step
const STEPPABLE = new Set([
  'year', 'quarter', 'month', 'week', 'day', 'hour', 'minute', 'second', 'millisecond', 'microsecond'
]);

/** Canonical DuckDB date part for a Snowflake part name or abbreviation. */
export function normalizeDatePart(raw: string): string | undefined {
  return ALIASES.get(raw.trim().toUpperCase());
}

export const isSteppablePart = (canonical: string): boolean => STEPPABLE.has(canonical);

/** Parts that only make sense on values carrying a time of day. */
export const isTimePart = (canonical: string): boolean =>
  ['hour', 'minute', 'second', 'millisecond', 'microsecond', 'nanosecond', 'epoch', 'epoch_ms'].includes(canonical);
