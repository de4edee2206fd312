// packages/catalog/src/catalog.ts
import { Errors, type CatalogHit, type StrategyKind } from '@frostbridge/core';
import type { Call, Expr } from '@frostbridge/sql';
import { acceptsArity, catalogData, parseArity, type Arity } from './registry';
import { RULES, type CallRule, type RuleContext } from './rules';
import { compileTemplate, instantiate } from './templates';

export interface FunctionSpec {
  name: string;
  arity: Arity;
  strategy: StrategyKind;
  /** emitted name for passthrough and rename */
  target?: string;
  template?: string;
  rule?: CallRule;
  /** emitted without parentheses */
  bare?: boolean;
}

export interface FunctionListing {
  name: string;
  arity: string;
  strategy: StrategyKind;
  target?: string;
  template?: string;
}

export interface ResolvedCall {
  expr: Expr;
  hit: CatalogHit;
}

/**
 * Function and operator catalog. Every rewrite of a call goes through `lookup`,
 * which fails closed: an unregistered name/arity pair is an error, never a passthrough.
 */
export class FunctionCatalog {
  private readonly specs = new Map<string, FunctionSpec[]>();

  constructor() {
    const data = catalogData();
    for (const [name, arity] of Object.entries(data.passthrough)) {
      this.add({ name, arity, strategy: 'passthrough', target: name.toLowerCase() });
    }
    for (const name of data.bare) {
      this.add({ name, arity: arityOf('0'), strategy: 'passthrough', target: name, bare: true });
    }
    for (const [name, r] of Object.entries(data.rename)) {
      this.add({ name, arity: r.arity, strategy: 'rename', target: r.to });
    }
    for (const [name, variants] of Object.entries(data.macro)) {
      for (const v of variants) this.add({ name, arity: v.arity, strategy: 'macro', template: v.template });
    }
    for (const [name, entries] of Object.entries(RULES)) {
      for (const e of entries) this.add({ name, arity: arityOf(e.arity), strategy: e.strategy, rule: e.rule });
    }
  }

  private add(spec: FunctionSpec): void {
    const list = this.specs.get(spec.name) ?? [];
    const overlaps = list.some((other) =>
      other.arity.ranges.some((o) => spec.arity.ranges.some((r) => r.min <= o.max && o.min <= r.max))
    );
    if (overlaps) throw new Error(`Catalog entries for ${spec.name} overlap`);
    list.push(spec);
    this.specs.set(spec.name, list);
  }

  has(name: string, arity: number): boolean {
    return (this.specs.get(name.toUpperCase()) ?? []).some((s) => acceptsArity(s.arity, arity));
  }

  lookup(name: string, arity: number): FunctionSpec {
    const key = name.toUpperCase();
    const list = this.specs.get(key);
    if (!list) throw Errors.UNSUPPORTED_FUNCTION(key, arity);
    const spec = list.find((s) => acceptsArity(s.arity, arity));
    if (!spec) {
      const accepted = list.map((s) => s.arity.text).join(' or ');
      throw Errors.UNSUPPORTED_FUNCTION(key, arity, `${key} takes ${accepted} argument(s)`);
    }
    return spec;
  }

  /** Rewrites one call whose arguments are already rewritten. */
  rewrite(c: Call, ctx: RuleContext): ResolvedCall {
    const arity = c.star ? 0 : c.args.length + (c.namedArgs?.length ?? 0);
    const spec = this.lookup(c.name, arity);
    const hit: CatalogHit = { name: spec.name, arity, strategy: spec.strategy };
    return { expr: this.apply(spec, c, ctx), hit };
  }

  private apply(spec: FunctionSpec, c: Call, ctx: RuleContext): Expr {
    const { hints: _hints, ...plain } = c;
    switch (spec.strategy) {
      case 'passthrough':
      case 'rename': {
        const out: Call = { ...plain, name: spec.target ?? spec.name.toLowerCase() };
        if (spec.bare) out.bare = true;
        else delete out.bare;
        return out;
      }
      case 'macro': {
        if (c.namedArgs?.length || c.star) throw Errors.UNSUPPORTED_FUNCTION(spec.name, c.args.length, 'named or star arguments');
        return instantiate(compileTemplate(spec.template ?? ''), c.args, spec.name);
      }
      case 'arg_remap':
      case 'case_expand':
      case 'session': {
        if (!spec.rule) throw Errors.UNSUPPORTED_FUNCTION(spec.name, c.args.length);
        return spec.rule(c, ctx);
      }
    }
  }

  list(): FunctionListing[] {
    const out: FunctionListing[] = [];
    for (const name of [...this.specs.keys()].sort()) {
      for (const s of this.specs.get(name) ?? []) {
        out.push({
          name,
          arity: s.arity.text,
          strategy: s.strategy,
          ...(s.target !== undefined ? { target: s.target } : {}),
          ...(s.template !== undefined ? { template: s.template } : {})
        });
      }
    }
    return out;
  }
}

function arityOf(text: string): Arity {
  const a = parseArity(text);
  if (!a) throw new Error(`bad arity '${text}'`);
  return a;
}

let shared: FunctionCatalog | undefined;

export function defaultCatalog(): FunctionCatalog {
  shared ??= new FunctionCatalog();
  return shared;
}

export const lookup = (name: string, arity: number): FunctionSpec => defaultCatalog().lookup(name, arity);

export const listFunctions = (): FunctionListing[] => defaultCatalog().list();
