// packages/core/src/trace.ts
// Per-statement rewrite trace (diagnostics only; never part of the cache key)

export type StrategyKind = 'passthrough' | 'rename' | 'macro' | 'case_expand' | 'arg_remap' | 'session';

export interface CatalogHit {
  name: string;
  arity: number;
  strategy: StrategyKind;
}

export interface TraceFlags {
  hoistedQualify?: boolean;
  decomposedMerge?: boolean;
  substitutedVariables?: number;
}

export interface RewriteTrace {
  normalizeMs: number;
  resolveMs: number;
  rewriteMs: number;
  emitMs: number;
  functions: CatalogHit[];
  cacheHit: boolean;
  flags?: TraceFlags;
}
