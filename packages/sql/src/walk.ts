// packages/sql/src/walk.ts
// Post-order tree mapping. Children are rebuilt first, then the hook sees the node.
import type {
  Call, Expr, FromItem, MergeClause, OrderItem, PathStep, Query, Select, Statement, WindowSpec, With
} from './ast';

export interface TreeHooks {
  /** pre-order: a returned node replaces the subtree, which is then not visited */
  enter?: (e: Expr) => Expr | undefined;
  expr?: (e: Expr) => Expr;
  query?: (q: Query) => Query;
  from?: (f: FromItem) => FromItem;
}

export class TreeMapper {
  constructor(private readonly hooks: TreeHooks) {}

  expr = (e: Expr): Expr => {
    const replaced = this.hooks.enter?.(e);
    if (replaced) return replaced;
    const mapped = this.children(e);
    return this.hooks.expr ? this.hooks.expr(mapped) : mapped;
  };

  private exprs(list: Expr[]): Expr[] {
    return list.map(this.expr);
  }

  private order(items: OrderItem[]): OrderItem[] {
    return items.map((o) => ({ ...o, expr: this.expr(o.expr) }));
  }

  private window(w: WindowSpec): WindowSpec {
    return { ...w, partitionBy: this.exprs(w.partitionBy), orderBy: this.order(w.orderBy) };
  }

  call(c: Call): Call {
    const out: Call = { ...c, args: this.exprs(c.args) };
    if (c.namedArgs) out.namedArgs = c.namedArgs.map((n) => ({ ...n, value: this.expr(n.value) }));
    if (c.orderBy) out.orderBy = this.order(c.orderBy);
    if (c.withinGroup) out.withinGroup = this.order(c.withinGroup);
    if (c.filter) out.filter = this.expr(c.filter);
    if (c.over) out.over = this.window(c.over);
    return out;
  }

  private children(e: Expr): Expr {
    switch (e.kind) {
      case 'call':
        return this.call(e);
      case 'binary':
        return { ...e, left: this.expr(e.left), right: this.expr(e.right) };
      case 'unary':
      case 'is':
      case 'paren':
      case 'extract':
        return { ...e, expr: this.expr(e.expr) };
      case 'distinct':
        return { ...e, left: this.expr(e.left), right: this.expr(e.right) };
      case 'between':
        return { ...e, expr: this.expr(e.expr), low: this.expr(e.low), high: this.expr(e.high) };
      case 'in':
        return {
          ...e,
          expr: this.expr(e.expr),
          ...(e.list ? { list: this.exprs(e.list) } : {}),
          ...(e.query ? { query: this.query(e.query) } : {})
        };
      case 'case':
        return {
          ...e,
          ...(e.operand ? { operand: this.expr(e.operand) } : {}),
          whens: e.whens.map((w) => ({ when: this.expr(w.when), then: this.expr(w.then) })),
          ...(e.else ? { else: this.expr(e.else) } : {})
        };
      case 'cast':
        return { ...e, expr: this.expr(e.expr) };
      case 'subquery':
      case 'exists':
        return { ...e, query: this.query(e.query) };
      case 'tuple':
      case 'array':
        return { ...e, items: this.exprs(e.items) };
      case 'struct':
        return { ...e, entries: e.entries.map((en) => ({ key: en.key, value: this.expr(en.value) })) };
      case 'path':
        return {
          ...e,
          base: this.expr(e.base),
          steps: e.steps.map((s): PathStep => (s.kind === 'dynamic' ? { kind: 'dynamic', expr: this.expr(s.expr) } : s))
        };
      case 'lambda':
        return { ...e, body: this.expr(e.body) };
      case 'interval':
        return { ...e, value: this.expr(e.value) };
      default:
        return e;
    }
  }

  // ---------- queries ----------
  query = (q: Query): Query => {
    const mapped = this.queryChildren(q);
    return this.hooks.query ? this.hooks.query(mapped) : mapped;
  };

  with(w: With | undefined): With | undefined {
    if (!w) return undefined;
    return { ...w, ctes: w.ctes.map((c) => ({ ...c, query: this.query(c.query) })) };
  }

  private queryChildren(q: Query): Query {
    switch (q.kind) {
      case 'select':
        return this.select(q);
      case 'setop': {
        const w = this.with(q.with);
        return { ...q, ...(w ? { with: w } : {}), left: this.query(q.left), right: this.query(q.right) };
      }
      case 'values':
        return { ...q, rows: q.rows.map((r) => this.exprs(r)) };
      case 'nested':
        return { ...q, query: this.query(q.query) };
    }
  }

  private select(s: Select): Select {
    const out: Select = {
      ...s,
      columns: s.columns.map((c) => ({ ...c, expr: this.expr(c.expr) })),
      from: s.from.map(this.from)
    };
    const w = this.with(s.with);
    if (w) out.with = w;
    if (s.top) out.top = this.expr(s.top);
    if (s.where) out.where = this.expr(s.where);
    if (Array.isArray(s.groupBy)) out.groupBy = this.exprs(s.groupBy);
    if (s.having) out.having = this.expr(s.having);
    if (s.qualify) out.qualify = this.expr(s.qualify);
    if (s.orderBy) out.orderBy = this.order(s.orderBy);
    if (s.limit) out.limit = this.expr(s.limit);
    if (s.offset) out.offset = this.expr(s.offset);
    return out;
  }

  from = (f: FromItem): FromItem => {
    let mapped: FromItem;
    switch (f.kind) {
      case 'table':
        mapped = f.timeTravel
          ? { ...f, timeTravel: { ...f.timeTravel, args: f.timeTravel.args.map((a) => ({ ...a, value: this.expr(a.value) })) } }
          : f;
        break;
      case 'derived':
        mapped = { ...f, query: this.query(f.query) };
        break;
      case 'function':
        mapped = { ...f, call: this.call(f.call) };
        break;
      case 'join':
        mapped = {
          ...f,
          left: this.from(f.left),
          right: this.from(f.right),
          ...(f.on ? { on: this.expr(f.on) } : {})
        };
        break;
    }
    return this.hooks.from ? this.hooks.from(mapped) : mapped;
  };

  // ---------- statements ----------
  private mergeClause(c: MergeClause): MergeClause {
    const condition = c.condition ? this.expr(c.condition) : undefined;
    switch (c.action.kind) {
      case 'update':
        return { ...c, condition, action: { kind: 'update', set: c.action.set.map((a) => ({ ...a, value: this.expr(a.value) })) } };
      case 'insert':
        return { ...c, condition, action: { ...c.action, values: this.exprs(c.action.values) } };
      case 'delete':
        return { ...c, condition };
    }
  }

  statement(s: Statement): Statement {
    switch (s.kind) {
      case 'query':
        return { ...s, query: this.query(s.query) };
      case 'insert':
        return { ...s, source: this.query(s.source) };
      case 'update':
        return {
          ...s,
          set: s.set.map((a) => ({ ...a, value: this.expr(a.value) })),
          from: s.from.map(this.from),
          where: s.where ? this.expr(s.where) : undefined
        };
      case 'delete':
        return { ...s, using: s.using.map(this.from), where: s.where ? this.expr(s.where) : undefined };
      case 'merge':
        return {
          ...s,
          source: this.from(s.source),
          on: this.expr(s.on),
          clauses: s.clauses.map((c) => this.mergeClause(c))
        };
      case 'create_table':
        return {
          ...s,
          columns: s.columns?.map((c) => (c.default ? { ...c, default: this.expr(c.default) } : c)),
          as: s.as ? this.query(s.as) : undefined
        };
      case 'create_view':
        return { ...s, query: this.query(s.query) };
      case 'alter_table':
        if (s.action.kind === 'add_column' && s.action.column.default) {
          return { ...s, action: { ...s.action, column: { ...s.action.column, default: this.expr(s.action.column.default) } } };
        }
        return s;
      case 'set':
        return { ...s, assignments: s.assignments.map((a) => ({ ...a, value: this.expr(a.value) })) };
      default:
        return s;
    }
  }
}

/** Calls `visit` on every expression in the subtree, including nested queries. */
export function forEachExpr(e: Expr, visit: (e: Expr) => void): void {
  new TreeMapper({ expr: (x) => { visit(x); return x; } }).expr(e);
}
