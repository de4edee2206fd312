// packages/catalog/src/templates.ts
// Macro templates are SQL expressions with `@N` argument slots and one optional `@*` slot
// that expands, inside an argument or array list, to every argument after the highest `@N`.
import { Errors } from '@frostbridge/core';
import { TreeMapper, forEachExpr, parseExpression, type Expr } from '@frostbridge/sql';

export interface CompiledTemplate {
  source: string;
  tree: Expr;
  restFrom: number;
}

const compiled = new Map<string, CompiledTemplate>();

export function compileTemplate(source: string): CompiledTemplate {
  const hit = compiled.get(source);
  if (hit) return hit;
  const tree = parseExpression(source, { placeholders: true });
  let highest = -1;
  forEachExpr(tree, (e) => {
    if (e.kind === 'placeholder' && e.index !== 'rest') highest = Math.max(highest, e.index);
  });
  const t = { source, tree, restFrom: highest + 1 };
  compiled.set(source, t);
  return t;
}

const isRest = (e: Expr): boolean => e.kind === 'placeholder' && e.index === 'rest';

/** Instantiates a template with call arguments; `name` is only used in errors. */
export function instantiate(t: CompiledTemplate, args: Expr[], name: string): Expr {
  const rest = args.slice(t.restFrom);
  const spread = (items: Expr[]): Expr[] => items.flatMap((x) => (isRest(x) ? rest : [x]));
  const mapper = new TreeMapper({
    expr: (e) => {
      switch (e.kind) {
        case 'placeholder': {
          if (e.index === 'rest') return e;
          const a = args[e.index];
          if (!a) throw Errors.UNSUPPORTED_FUNCTION(name, args.length, `argument ${e.index + 1} is required`);
          return a;
        }
        case 'call':
          return e.args.some(isRest) ? { ...e, args: spread(e.args) } : e;
        case 'array':
        case 'tuple':
          return e.items.some(isRest) ? { ...e, items: spread(e.items) } : e;
        default:
          return e;
      }
    }
  });
  return mapper.expr(t.tree);
}
