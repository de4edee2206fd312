// packages/rewriter/src/hints.ts
import { z } from 'zod';
import type { Expr, Literal, TypeHint, TypeName } from '@frostbridge/sql';
import { describeSource, nativeFamily } from '@frostbridge/typemap';
import returnTypes from './return-types.json';

const HintSchema = z.enum(['numeric', 'string', 'date', 'timestamp', 'time', 'boolean', 'semi', 'null', 'unknown']);

const ReturnTypesSchema = z.object({
  classes: z.record(HintSchema, z.array(z.string())),
  sameAsArgument: z.record(z.string(), z.number().int().min(0))
});

const table = ReturnTypesSchema.parse(returnTypes);

const RETURNS = new Map<string, TypeHint>();
for (const [hint, names] of Object.entries(table.classes)) {
  const parsed = HintSchema.safeParse(hint);
  if (parsed.success) for (const n of names) RETURNS.set(n, parsed.data);
}

const FOLLOWS = new Map(Object.entries(table.sameAsArgument));

function hintOfType(t: TypeName): TypeHint {
  const source = describeSource(t);
  switch (source?.sourceName) {
    case 'NUMBER':
    case 'FLOAT':
      return 'numeric';
    case 'VARCHAR':
      return 'string';
    case 'BOOLEAN':
      return 'boolean';
    case 'DATE':
      return 'date';
    case 'TIME':
      return 'time';
    case 'TIMESTAMP_NTZ':
    case 'TIMESTAMP_TZ':
    case 'TIMESTAMP_LTZ':
      return 'timestamp';
    case 'VARIANT':
    case 'OBJECT':
      return 'semi';
    case undefined:
      break;
    default:
      return 'unknown';
  }
  switch (nativeFamily(t)) {
    case 'integer':
    case 'decimal':
    case 'float':
      return 'numeric';
    case 'text':
      return 'string';
    case 'boolean':
      return 'boolean';
    case 'date':
      return 'date';
    case 'time':
      return 'time';
    case 'timestamp':
    case 'timestamptz':
      return 'timestamp';
    case 'json':
    case 'object':
      return 'semi';
    default:
      return 'unknown';
  }
}

const LITERAL: Record<Literal['type'], TypeHint> = { string: 'string', number: 'numeric', boolean: 'boolean', null: 'null' };

const TEMPORAL: ReadonlySet<TypeHint> = new Set(['date', 'timestamp', 'time']);

/**
 * Static type class of an expression, from literals, casts and known return types.
 * Column references carry no declared type here and come out `unknown`.
 */
export function inferHint(e: Expr): TypeHint {
  switch (e.kind) {
    case 'literal':
      return LITERAL[e.type];
    case 'typed':
      if (e.type === 'DATE') return 'date';
      return e.type === 'TIME' ? 'time' : 'timestamp';
    case 'cast':
      return hintOfType(e.type);
    case 'paren':
      return inferHint(e.expr);
    case 'binary':
      switch (e.op) {
        case '+':
        case '-': {
          const l = inferHint(e.left);
          const r = inferHint(e.right);
          if (TEMPORAL.has(l)) return l;
          if (TEMPORAL.has(r) && e.op === '+') return r;
          return 'numeric';
        }
        case '*':
        case '/':
        case '%':
        case '&':
        case '|':
        case '<<':
        case '>>':
          return 'numeric';
        case '||':
          return 'string';
        default:
          return 'boolean';
      }
    case 'unary':
      return e.op === 'NOT' ? 'boolean' : 'numeric';
    case 'is':
    case 'distinct':
    case 'between':
    case 'in':
    case 'exists':
      return 'boolean';
    case 'extract':
      return 'numeric';
    case 'case': {
      const branches = [...e.whens.map((w) => w.then), ...(e.else ? [e.else] : [])];
      for (const b of branches) {
        const h = inferHint(b);
        if (h !== 'null') return h;
      }
      return 'null';
    }
    case 'struct':
      return 'semi';
    case 'path':
      // extracted as text
      return 'string';
    case 'call': {
      const name = e.name.toUpperCase();
      const follow = FOLLOWS.get(name);
      if (follow !== undefined) {
        const a = e.args[follow];
        return a ? inferHint(a) : 'unknown';
      }
      return RETURNS.get(name) ?? 'unknown';
    }
    default:
      break;
  }
  return 'unknown';
}

/** Attaches argument hints to every call; the catalog reads them for type-dependent rules. */
export const argumentHints = (args: Expr[]): TypeHint[] => args.map(inferHint);
