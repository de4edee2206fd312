// packages/catalog/src/registry.ts
import { z } from 'zod';
import raw from './functions.json';

/* -------------------------------------------------------------------------- */
/*                                   Arity                                    */
/* -------------------------------------------------------------------------- */

export interface ArityRange {
  min: number;
  max: number;   // Infinity for open-ended
}

export interface Arity {
  text: string;  // "2", "1-3", "0+", "1|6"
  ranges: ArityRange[];
}

const RANGE = /^(\d+)(?:-(\d+)|(\+))?$/;

export function parseArity(text: string): Arity | undefined {
  const ranges: ArityRange[] = [];
  for (const part of text.split('|')) {
    const m = RANGE.exec(part.trim());
    if (!m) return undefined;
    const min = Number(m[1]);
    const max = m[3] ? Infinity : m[2] !== undefined ? Number(m[2]) : min;
    if (max < min) return undefined;
    ranges.push({ min, max });
  }
  return { text, ranges };
}

export const acceptsArity = (a: Arity, n: number): boolean => a.ranges.some((r) => n >= r.min && n <= r.max);

export const ArityText = z.string().transform((s, ctx) => {
  const a = parseArity(s);
  if (!a) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `bad arity '${s}'` });
    return z.NEVER;
  }
  return a;
});

/* -------------------------------------------------------------------------- */
/*                               Data entries                                 */
/* -------------------------------------------------------------------------- */

const FunctionName = z.string().regex(/^[A-Z][A-Z0-9_]*$/, 'function names are upper case');

export const CatalogFileSchema = z.object({
  passthrough: z.record(FunctionName, ArityText),
  bare: z.array(FunctionName),
  rename: z.record(FunctionName, z.object({ to: z.string().min(1), arity: ArityText })),
  macro: z.record(FunctionName, z.array(z.object({ arity: ArityText, template: z.string().min(1) })).min(1))
});

export type CatalogFile = z.output<typeof CatalogFileSchema>;

let loaded: CatalogFile | undefined;

/** Parsed and validated `functions.json`. */
export function catalogData(): CatalogFile {
  loaded ??= CatalogFileSchema.parse(raw);
  return loaded;
}
