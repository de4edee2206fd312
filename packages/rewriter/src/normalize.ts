// packages/rewriter/src/normalize.ts
// Stage 1: surface forms that are not function calls. Paths, object literals,
// QUALIFY, TOP, time travel, table functions and statements DuckDB spells differently.
import { Errors, type ExtensionNames, type Identifier, type TargetCapabilities, type TraceFlags } from '@frostbridge/core';
import { jsonKey } from '@frostbridge/catalog';
import {
  Emitter, TreeMapper, bin, call, ident, lit, parseExpression, parseStatement, quoteString,
  type Call, type Expr, type FromItem, type OrderItem, type PathStep, type Query,
  type Select, type SelectItem, type Statement, type TableRef
} from '@frostbridge/sql';
import type { SessionContext } from '@frostbridge/session';
import { argumentHints, inferHint } from './hints';
import { databasesView, showQuery } from './show';

type MergeStatement = Extract<Statement, { kind: 'merge' }>;
type Side = 'matched' | 'unmatched';

export interface NormalizeOptions {
  session: SessionContext;
  target: TargetCapabilities;
  extensions: ExtensionNames;
}

export interface Normalized {
  statements: Statement[];
  flags: TraceFlags;
}

export const MERGE_DELTA = '_MERGE_DELTA';
export const STATUS_MESSAGE = 'Statement executed successfully.';
export const BOOTSTRAP_CALL = 'SYSTEM$BOOTSTRAP_DATA_REQUEST';

const TIMESTAMP_LITERALS: Record<string, string> = {
  TIMESTAMP_NTZ: 'TIMESTAMP',
  DATETIME: 'TIMESTAMP',
  TIMESTAMP_LTZ: 'TIMESTAMPTZ',
  TIMESTAMP_TZ: 'TIMESTAMPTZ'
};

// ---------- expressions ----------

/** `'$.a' || k || '.b'`, adjacent text folded into one literal */
function concatPath(parts: Array<string | Expr>): Expr {
  const merged: Array<string | Expr> = [];
  for (const p of parts) {
    const last = merged[merged.length - 1];
    if (typeof p === 'string' && typeof last === 'string') merged[merged.length - 1] = last + p;
    else merged.push(p);
  }
  const exprs = merged.map((p) => (typeof p === 'string' ? lit.str(p) : p));
  return exprs.slice(1).reduce<Expr>((acc, e) => bin('||', acc, e), exprs[0]);
}

function pathAccess(base: Expr, steps: PathStep[], fn = 'json_extract_string'): Call {
  const parts: Array<string | Expr> = ['$'];
  for (const s of steps) {
    if (s.kind === 'key') parts.push(jsonKey(s.name));
    else if (s.kind === 'index') parts.push(`[${s.value}]`);
    else if (inferHint(s.expr) === 'string') parts.push('."', s.expr, '"');
    else parts.push('[', s.expr, ']');
  }
  return call(fn, [base, concatPath(parts)]);
}

function identifierName(c: Call): Expr {
  const a = c.args[0];
  if (c.args.length !== 1 || a.kind !== 'literal' || a.type !== 'string') {
    throw Errors.SYNTAX('IDENTIFIER takes one string literal or session variable');
  }
  const e = parseExpression(a.value);
  if (e.kind !== 'column') throw Errors.SYNTAX(`IDENTIFIER('${a.value}') is not an object name`);
  return e;
}

const nullsFirstOnDesc = (items: OrderItem[]): OrderItem[] =>
  items.map((o): OrderItem => (o.direction === 'DESC' && !o.nulls ? { ...o, nulls: 'FIRST' } : o));

function normalizeCall(c: Call): Expr {
  if (c.name.toUpperCase() === 'IDENTIFIER') return identifierName(c);
  const out: Call = { ...c };
  if (c.orderBy) out.orderBy = nullsFirstOnDesc(c.orderBy);
  if (c.withinGroup) out.withinGroup = nullsFirstOnDesc(c.withinGroup);
  if (c.over) out.over = { ...c.over, orderBy: nullsFirstOnDesc(c.over.orderBy) };
  if (c.args.length) out.hints = argumentHints(c.args);
  return out;
}

function normalizeExpr(e: Expr): Expr {
  switch (e.kind) {
    case 'path':
      return pathAccess(e.base, e.steps);
    case 'struct':
      return call('json_object', e.entries.flatMap((en) => [lit.str(en.key), en.value]));
    case 'typed': {
      const type = TIMESTAMP_LITERALS[e.type];
      return type ? { ...e, type } : e;
    }
    case 'call':
      return normalizeCall(e);
    default:
      return e;
  }
}

// ---------- table functions ----------

function flatten(f: Extract<FromItem, { kind: 'function' }>): FromItem {
  const c = f.call;
  let input = c.args[0];
  let path: string | undefined;
  for (const n of c.namedArgs ?? []) {
    if (n.name === 'INPUT') input = n.value;
    else if (n.name === 'PATH' && n.value.kind === 'literal' && n.value.type === 'string') path = n.value.value;
    else if (n.name === 'OUTER' && n.value.kind === 'literal' && n.value.value === 'FALSE') continue;
    else throw Errors.UNSUPPORTED_FUNCTION('FLATTEN', c.args.length + (c.namedArgs?.length ?? 0), `argument ${n.name} is not supported`);
  }
  if (!input) throw Errors.UNSUPPORTED_FUNCTION('FLATTEN', 0, 'INPUT is required');
  const source = path === undefined ? input : pathAccess(input, pathSteps(path), 'json_extract');
  const list: Expr = { kind: 'cast', expr: source, type: { name: 'JSON', params: [], arrayDepth: 1 }, mode: 'CAST' };
  const query: Select = {
    kind: 'select',
    distinct: false,
    columns: [
      { expr: call('unnest', [list]), alias: ident('VALUE') },
      { expr: bin('-', call('generate_subscripts', [list, lit.num(1)]), lit.num(1)), alias: ident('INDEX') }
    ],
    from: []
  };
  return { kind: 'derived', query, lateral: true, alias: f.alias ?? ident('FLATTEN') };
}

function pathSteps(path: string): PathStep[] {
  const e = parseExpression(`x:${path}`);
  return e.kind === 'path' ? e.steps : [];
}

function generator(f: Extract<FromItem, { kind: 'function' }>): FromItem {
  const c = f.call;
  const rows = c.namedArgs?.find((n) => n.name === 'ROWCOUNT')?.value;
  if (!rows || c.args.length || (c.namedArgs?.length ?? 0) !== 1) {
    throw Errors.UNSUPPORTED_FUNCTION('GENERATOR', c.args.length + (c.namedArgs?.length ?? 0), 'only ROWCOUNT => n is supported');
  }
  const out: FromItem = { kind: 'function', call: call('generate_series', [lit.num(1), rows]), lateral: false, wrapped: false };
  if (f.alias) out.alias = f.alias;
  return out;
}

function isDatabasesView(parts: Identifier[], session: SessionContext): boolean {
  const names = parts.map((p) => session.fold(p).toUpperCase());
  const [view, schema] = [names[names.length - 1], names[names.length - 2]];
  if (view !== 'DATABASES') return false;
  if (names.length === 1) return session.schema?.toUpperCase() === 'INFORMATION_SCHEMA';
  return schema === 'INFORMATION_SCHEMA';
}

function normalizeFrom(f: FromItem, o: NormalizeOptions): FromItem {
  if (f.kind === 'table' && isDatabasesView(f.name, o.session)) {
    const view: FromItem = { kind: 'derived', query: databasesView(o.extensions), lateral: false, alias: f.alias ?? ident('DATABASES') };
    if (f.columnAliases) view.columnAliases = f.columnAliases;
    return view;
  }
  if (f.kind === 'table' && f.timeTravel) {
    const { timeTravel: _dropped, ...ref } = f;
    return ref;
  }
  if (f.kind !== 'function') return f;
  switch (f.call.name.toUpperCase()) {
    case 'IDENTIFIER': {
      const name = identifierName(f.call);
      if (name.kind !== 'column') return f;
      const ref: TableRef = { kind: 'table', name: name.parts };
      if (f.alias) ref.alias = f.alias;
      if (f.columnAliases) ref.columnAliases = f.columnAliases;
      return ref;
    }
    case 'FLATTEN':
      return flatten(f);
    case 'GENERATOR':
      return generator(f);
    default:
      return f;
  }
}

/** The account bootstrap call is labelled by its full call text, as the client driver expects. */
function labelBootstrap(s: Select, emitter: Emitter): Select {
  const columns = s.columns.map((c): SelectItem => {
    const e = c.expr;
    if (c.alias || e.kind !== 'call' || e.name.toUpperCase() !== BOOTSTRAP_CALL) return c;
    return { ...c, alias: { name: `${BOOTSTRAP_CALL}(${e.args.map((a) => emitter.expr(a)).join(',')})`, quoted: true } };
  });
  return { ...s, columns };
}

// ---------- QUALIFY ----------

/**
 * `SELECT .. QUALIFY p` becomes `SELECT * FROM (SELECT ..) AS _Q WHERE p'`. Window calls and
 * columns in `p` are read from the inner select by alias; anything not already
 * projected is projected under a hidden `_QUALIFY_n` name and excluded again outside.
 */
function hoistQualify(s: Select, emitter: Emitter): Select {
  const { qualify, orderBy, limit, offset, with: w, distinct, ...rest } = s;
  if (!qualify) return s;
  const columns: SelectItem[] = [...s.columns];
  const hidden: Identifier[] = [];
  const text = (e: Expr): string => emitter.expr(e);
  const plainStar = s.columns.some((c) => c.expr.kind === 'star' && !c.expr.qualifier && !c.expr.exclude);
  const ref = (id: Identifier): Expr => ({ kind: 'column', parts: [id] });

  const outputName = (item: SelectItem): Identifier | undefined => {
    if (item.alias) return item.alias;
    return item.expr.kind === 'column' ? item.expr.parts[item.expr.parts.length - 1] : undefined;
  };

  const lift = (e: Expr): Expr => {
    const t = text(e);
    if (e.kind === 'column' && e.parts.length === 1) {
      const aliased = columns.find((c) => c.alias && emitter.ident(c.alias) === t);
      if (aliased?.alias) return ref(aliased.alias);
    }
    for (const c of columns) {
      const name = outputName(c);
      if (name && c.expr.kind !== 'star' && text(c.expr) === t) return ref(name);
    }
    if (e.kind === 'column' && plainStar) return ref(e.parts[e.parts.length - 1]);
    const alias = ident(`_QUALIFY_${hidden.length + 1}`);
    hidden.push(alias);
    columns.push({ expr: e, alias });
    return ref(alias);
  };

  const walker: TreeMapper = new TreeMapper({
    enter: (e) => {
      if (e.kind === 'call' && e.over) return lift(e);
      if (e.kind === 'column') return lift(e);
      if (e.kind === 'subquery' || e.kind === 'exists') return e;
      if (e.kind === 'in' && e.query) return { ...e, expr: walker.expr(e.expr) };
      return undefined;
    }
  });
  const where = walker.expr(qualify);
  const order = orderBy?.map((o) =>
    o.expr.kind === 'literal' && o.expr.type === 'number' ? o : { ...o, expr: lift(o.expr) }
  );

  const inner: Select = { ...rest, distinct: false, columns };
  const outer: Select = {
    kind: 'select',
    distinct,
    columns: [{ expr: hidden.length ? { kind: 'star', exclude: hidden } : { kind: 'star' } }],
    from: [{ kind: 'derived', query: inner, lateral: false, alias: ident('_Q') }],
    where
  };
  if (w) outer.with = w;
  if (order) outer.orderBy = order;
  if (limit) outer.limit = limit;
  if (offset) outer.offset = offset;
  return outer;
}

// ---------- statements ----------

const statusQuery = (): Statement => parseStatement(`SELECT ${quoteString(STATUS_MESSAGE)} AS "status"`);

function describeQuery(session: SessionContext, name: Identifier[]): Statement {
  const t = session.qualifiedName(name);
  return parseStatement(
    'SELECT column_name AS "name", data_type AS "type", is_nullable AS "nullable", column_default AS "default", ' +
      'numeric_precision AS "precision", numeric_scale AS "scale" FROM information_schema.columns ' +
      `WHERE table_catalog = ${quoteString(t.database)} AND table_schema = ${quoteString(t.schema)} ` +
      `AND table_name = ${quoteString(t.name)} ORDER BY ordinal_position`
  );
}

export function stagePath(stageDir: string, location: string): string {
  return `${stageDir.replace(/\/+$/, '')}/${location.replace(/^\/+/, '')}`;
}

export function attachPath(base: string, database: string): string {
  if (base === ':memory:') return base;
  return `${base.replace(/\/+$/, '')}/${database}.duckdb`;
}

function createDatabase(s: Extract<Statement, { kind: 'create_namespace' }>, o: NormalizeOptions): Statement[] {
  const db = o.session.foldIdentifier(s.name[s.name.length - 1]);
  const out: Statement[] = [];
  if (s.orReplace) out.push({ kind: 'detach', name: db, ifExists: true });
  out.push({ kind: 'attach', path: attachPath(o.target.attachPath, db.name), alias: db, ifNotExists: s.ifNotExists });
  const schema: Identifier[] = [db, { name: 'PUBLIC', quoted: true }];
  out.push({ kind: 'create_namespace', object: 'SCHEMA', name: schema, orReplace: false, ifNotExists: true });
  out.push({ kind: 'use', object: 'SCHEMA', name: schema });
  return out;
}

function useNamespace(s: Extract<Statement, { kind: 'use' }>, session: SessionContext): Statement[] {
  if (s.object === 'ROLE' || s.object === 'WAREHOUSE') return [statusQuery()];
  const delta = session.deltaFor(s);
  if (delta.kind !== 'use' || delta.database === undefined) return [s];
  const name: Identifier[] = [{ name: delta.database, quoted: true }];
  if (delta.schema !== undefined) name.push({ name: delta.schema, quoted: true });
  return [{ kind: 'use', object: 'SCHEMA', name }];
}

const and = (conds: Expr[]): Expr => conds.slice(1).reduce((acc, c) => bin('AND', acc, c), conds[0]);

const notTrue = (e: Expr): Expr => ({ kind: 'is', expr: { kind: 'paren', expr: e }, not: true, value: 'TRUE' });

function mergeSourceAlias(source: Exclude<FromItem, { kind: 'join' }>): Identifier {
  if (source.alias) return source.alias;
  if (source.kind === 'table') return source.name[source.name.length - 1];
  throw Errors.SYNTAX('MERGE source needs an alias when MERGE is decomposed');
}

/**
 * MERGE without engine support: the source rows and whether each matched are
 * captured first, then every WHEN clause runs as its own statement against that
 * snapshot. A clause only sees rows that no earlier clause of its kind claimed.
 */
function decomposeMerge(s: MergeStatement): Statement[] {
  if (s.source.kind === 'join') throw Errors.SYNTAX('MERGE source must be a table or subquery');
  const alias = mergeSourceAlias(s.source);
  const delta: Identifier = { name: MERGE_DELTA, quoted: false };
  const deltaRef: TableRef = { kind: 'table', name: [delta], alias };
  const matched: Expr = { kind: 'column', parts: [alias, { name: '_MATCHED', quoted: false }] };

  const matchTest: Select = { kind: 'select', distinct: false, columns: [{ expr: lit.num(1) }], from: [s.target], where: s.on };
  const snapshot: Select = {
    kind: 'select',
    distinct: false,
    columns: [
      { expr: { kind: 'star', qualifier: [alias] } },
      { expr: { kind: 'exists', query: matchTest }, alias: { name: '_MATCHED', quoted: false } }
    ],
    from: [s.source]
  };
  const out: Statement[] = [
    { kind: 'create_table', name: [delta], orReplace: true, temporary: true, ifNotExists: false, as: snapshot }
  ];

  const claimed: Record<Side, Expr[]> = { matched: [], unmatched: [] };
  const open: Record<Side, boolean> = { matched: true, unmatched: true };
  for (const c of s.clauses) {
    const side: Side = c.matched ? 'matched' : 'unmatched';
    if (!open[side]) continue;
    const own = c.condition ? [c.condition] : [];
    const earlier = claimed[side].map(notTrue);
    if (c.condition) claimed[side].push(c.condition);
    else open[side] = false;

    const action = c.action;
    switch (action.kind) {
      case 'update':
        out.push({ kind: 'update', table: s.target, set: action.set, from: [deltaRef], where: and([s.on, ...own, ...earlier]) });
        break;
      case 'delete':
        out.push({ kind: 'delete', table: s.target, using: [deltaRef], where: and([s.on, ...own, ...earlier]) });
        break;
      case 'insert': {
        const source: Select = {
          kind: 'select',
          distinct: false,
          columns: action.values.map((v) => ({ expr: v })),
          from: [deltaRef],
          where: and([{ kind: 'unary', op: 'NOT', expr: matched }, ...own, ...earlier])
        };
        out.push({ kind: 'insert', table: s.target.name, ...(action.columns ? { columns: action.columns } : {}), source, overwrite: false });
        break;
      }
    }
  }
  out.push({ kind: 'drop', object: 'TABLE', name: [delta], ifExists: true, cascade: false });
  return out;
}

function expandStatement(s: Statement, o: NormalizeOptions, flags: TraceFlags): Statement[] {
  switch (s.kind) {
    case 'insert':
      if (!s.overwrite) return [s];
      return [
        { kind: 'delete', table: { kind: 'table', name: s.table }, using: [] },
        { ...s, overwrite: false }
      ];
    case 'merge':
      if (o.target.nativeMerge) return [s];
      flags.decomposedMerge = true;
      return decomposeMerge(s);
    case 'create_namespace':
      return s.object === 'DATABASE' ? createDatabase(s, o) : [s];
    case 'drop':
      if (s.object !== 'DATABASE') return [s];
      return [{ kind: 'detach', name: o.session.foldIdentifier(s.name[s.name.length - 1]), ifExists: s.ifExists }];
    case 'use':
      return useNamespace(s, o.session);
    case 'set':
    case 'unset':
    case 'alter_session':
      return [statusQuery()];
    case 'describe':
      return [describeQuery(o.session, s.name)];
    case 'show':
      return [showQuery(s, o.session, o.extensions)];
    case 'copy':
      if (s.source.kind === 'file') return [s];
      return [{ ...s, source: { kind: 'file', path: stagePath(o.target.stageDir, s.source.location) } }];
    default:
      return [s];
  }
}

export function normalize(statement: Statement, o: NormalizeOptions): Normalized {
  const flags: TraceFlags = {};
  const emitter = new Emitter({ casePolicy: o.session.casePolicy });
  const mapper = new TreeMapper({
    expr: normalizeExpr,
    from: (f) => normalizeFrom(f, o),
    query: (q: Query): Query => {
      if (q.kind !== 'select') return q;
      let s: Select = q;
      if (s.top) {
        const { top, ...rest } = s;
        s = rest.limit ? rest : { ...rest, limit: top };
      }
      if (s.orderBy) s = { ...s, orderBy: nullsFirstOnDesc(s.orderBy) };
      s = labelBootstrap(s, emitter);
      if (s.qualify && !o.target.nativeQualify) {
        flags.hoistedQualify = true;
        s = hoistQualify(s, emitter);
      }
      return s;
    }
  });
  return { statements: expandStatement(mapper.statement(statement), o, flags), flags };
}
