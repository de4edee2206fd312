// packages/sql/src/emitter.ts
// Prints a tree as DuckDB SQL. Output is deterministic and parses back to the same tree.
import { Errors, type CasePolicy, type Identifier } from '@frostbridge/core';
import { isReserved } from './keywords';
import type {
  AlterAction, Call, ColumnDef, Cte, Expr, FromItem, MergeClause, OrderItem, Query,
  Select, Statement, TypeName, WindowSpec, With
} from './ast';

export interface EmitOptions {
  casePolicy: CasePolicy;
}

const UPPER_SAFE = /^[A-Z_][A-Z0-9_]*$/;
const ANY_SAFE = /^[A-Za-z_][A-Za-z0-9_]*$/;

// ---------- precedence ----------
const LAMBDA = 0;
const PRIMARY = 12;

const BINARY_PREC: Record<string, number> = {
  OR: 1, AND: 2,
  '=': 4, '<>': 4, '<': 4, '<=': 4, '>': 4, '>=': 4,
  LIKE: 4, 'NOT LIKE': 4, ILIKE: 4, 'NOT ILIKE': 4,
  '|': 5, '&': 6, '<<': 7, '>>': 7, '||': 8,
  '+': 9, '-': 9, '*': 10, '/': 10, '%': 10
};

export function precedence(e: Expr): number {
  switch (e.kind) {
    case 'lambda': return LAMBDA;
    case 'binary': return BINARY_PREC[e.op];
    case 'unary': return e.op === 'NOT' ? 3 : 11;
    case 'is':
    case 'distinct':
    case 'between':
    case 'in':
      return 4;
    case 'literal': return e.value.startsWith('-') ? 11 : PRIMARY;
    default: return PRIMARY;
  }
}

export const quoteString = (v: string): string =>
  v.includes('\\')
    ? `E'${v.replace(/\\/g, '\\\\').replace(/'/g, "''")}'`
    : `'${v.replace(/'/g, "''")}'`;

export const typeText = (t: TypeName): string =>
  `${t.name}${t.params.length ? `(${t.params.join(',')})` : ''}${'[]'.repeat(t.arrayDepth)}`;

export class Emitter {
  constructor(private readonly opts: EmitOptions) {}

  // ---------- identifiers ----------
  ident(id: Identifier): string {
    const upper = this.opts.casePolicy === 'UPPERCASE_UNQUOTED';
    const name = upper && !id.quoted ? id.name.toUpperCase() : id.name;
    const safe = upper ? UPPER_SAFE : ANY_SAFE;
    if (safe.test(name) && !isReserved(name)) return name;
    return `"${name.replace(/"/g, '""')}"`;
  }

  name(parts: Identifier[]): string {
    return parts.map((p) => this.ident(p)).join('.');
  }

  private list(ids: Identifier[]): string {
    return `(${ids.map((i) => this.ident(i)).join(', ')})`;
  }

  // ---------- expressions ----------
  expr(e: Expr): string {
    switch (e.kind) {
      case 'literal':
        return e.type === 'string' ? quoteString(e.value) : e.value;
      case 'column':
        return this.name(e.parts);
      case 'star': {
        const head = e.qualifier ? `${this.name(e.qualifier)}.*` : '*';
        return e.exclude?.length ? `${head} EXCLUDE ${this.list(e.exclude)}` : head;
      }
      case 'param':
        return e.text;
      case 'call':
        return this.call(e);
      case 'binary': {
        const p = precedence(e);
        return `${this.operand(e.left, p, false)} ${e.op} ${this.operand(e.right, p, true)}`;
      }
      case 'unary': {
        if (e.op === 'NOT') return `NOT ${this.operand(e.expr, 3, false)}`;
        const inner = this.operand(e.expr, 11, false);
        return inner.startsWith('-') || inner.startsWith('+') ? `${e.op} ${inner}` : `${e.op}${inner}`;
      }
      case 'is':
        return `${this.operand(e.expr, 4, false)} IS ${e.not ? 'NOT ' : ''}${e.value}`;
      case 'distinct':
        return `${this.operand(e.left, 4, false)} IS ${e.not ? 'NOT ' : ''}DISTINCT FROM ${this.operand(e.right, 4, true)}`;
      case 'between':
        return `${this.operand(e.expr, 4, false)} ${e.not ? 'NOT ' : ''}BETWEEN ${this.operand(e.low, 5, false)} AND ${this.operand(e.high, 5, false)}`;
      case 'in': {
        const rhs = e.query ? this.query(e.query) : (e.list ?? []).map((x) => this.expr(x)).join(', ');
        return `${this.operand(e.expr, 4, false)} ${e.not ? 'NOT ' : ''}IN (${rhs})`;
      }
      case 'case': {
        const parts = ['CASE'];
        if (e.operand) parts.push(this.expr(e.operand));
        for (const w of e.whens) parts.push(`WHEN ${this.expr(w.when)} THEN ${this.expr(w.then)}`);
        if (e.else) parts.push(`ELSE ${this.expr(e.else)}`);
        parts.push('END');
        return parts.join(' ');
      }
      case 'cast':
        return `${e.mode}(${this.expr(e.expr)} AS ${typeText(e.type)})`;
      case 'subquery':
        return `(${this.query(e.query)})`;
      case 'exists':
        return `EXISTS (${this.query(e.query)})`;
      case 'paren':
        return `(${this.expr(e.expr)})`;
      case 'tuple':
        return `(${e.items.map((x) => this.expr(x)).join(', ')})`;
      case 'array':
        return `[${e.items.map((x) => this.expr(x)).join(', ')}]`;
      case 'struct':
        return `{${e.entries.map((en) => `${quoteString(en.key)}: ${this.expr(en.value)}`).join(', ')}}`;
      case 'lambda': {
        const params = e.params.length === 1 ? this.ident(e.params[0]) : this.list(e.params);
        return `${params} -> ${this.expr(e.body)}`;
      }
      case 'interval':
        return this.interval(e.value, e.unit);
      case 'typed':
        return `${e.type} ${quoteString(e.value)}`;
      case 'extract':
        return `EXTRACT(${e.part} FROM ${this.expr(e.expr)})`;
      case 'variable':
        return unnormalized(`session variable $${e.name}`);
      case 'path':
        return unnormalized('semi-structured path access');
      case 'placeholder':
        return unnormalized('template placeholder');
    }
  }

  private operand(e: Expr, parent: number, right: boolean): string {
    const p = precedence(e);
    const text = this.expr(e);
    return p < parent || (right && p === parent) ? `(${text})` : text;
  }

  private interval(value: Expr, unit?: string): string {
    if (!unit) return `INTERVAL ${this.expr(value)}`;
    if (value.kind === 'literal' && value.type !== 'null') return `INTERVAL ${this.expr(value)} ${unit}`;
    return `INTERVAL (${this.expr(value)}) ${unit}`;
  }

  private call(c: Call): string {
    if (c.bare) return c.name;
    let args: string;
    if (c.star) {
      args = '*';
    } else {
      const parts = c.args.map((a) => this.expr(a));
      for (const n of c.namedArgs ?? []) parts.push(`${n.name.toLowerCase()} := ${this.expr(n.value)}`);
      args = `${c.distinct ? 'DISTINCT ' : ''}${parts.join(', ')}`;
      if (c.orderBy?.length) args += ` ORDER BY ${this.orderList(c.orderBy)}`;
    }
    let out = `${c.name}(${args})`;
    if (c.withinGroup?.length) out += ` WITHIN GROUP (ORDER BY ${this.orderList(c.withinGroup)})`;
    if (c.filter) out += ` FILTER (WHERE ${this.expr(c.filter)})`;
    if (c.over) out += ` OVER (${this.window(c.over)})`;
    return out;
  }

  private window(w: WindowSpec): string {
    const parts: string[] = [];
    if (w.partitionBy.length) parts.push(`PARTITION BY ${w.partitionBy.map((x) => this.expr(x)).join(', ')}`);
    if (w.orderBy.length) parts.push(`ORDER BY ${this.orderList(w.orderBy)}`);
    if (w.frame) parts.push(w.frame);
    return parts.join(' ');
  }

  orderList(items: OrderItem[]): string {
    return items
      .map((o) => [this.expr(o.expr), o.direction, o.nulls && `NULLS ${o.nulls}`].filter(Boolean).join(' '))
      .join(', ');
  }

  // ---------- queries ----------
  query(q: Query): string {
    switch (q.kind) {
      case 'select':
        return this.withPrefix(q.with) + this.select(q);
      case 'setop': {
        const right = q.right.kind === 'setop' ? `(${this.query(q.right)})` : this.query(q.right);
        return `${this.withPrefix(q.with)}${this.query(q.left)} ${q.op}${q.all ? ' ALL' : ''} ${right}`;
      }
      case 'values':
        return `VALUES ${q.rows.map((r) => `(${r.map((x) => this.expr(x)).join(', ')})`).join(', ')}`;
      case 'nested':
        return `(${this.query(q.query)})`;
    }
  }

  private withPrefix(w?: With): string {
    if (!w) return '';
    return `WITH ${w.recursive ? 'RECURSIVE ' : ''}${w.ctes.map((c) => this.cte(c)).join(', ')} `;
  }

  private cte(c: Cte): string {
    return `${this.ident(c.name)}${c.columns ? ` ${this.list(c.columns)}` : ''} AS (${this.query(c.query)})`;
  }

  private select(s: Select): string {
    if (s.top) return unnormalized('TOP');
    const out = [`SELECT ${s.distinct ? 'DISTINCT ' : ''}${s.columns
      .map((c) => (c.alias ? `${this.expr(c.expr)} AS ${this.ident(c.alias)}` : this.expr(c.expr)))
      .join(', ')}`];
    if (s.from.length) out.push(`FROM ${s.from.map((f) => this.from(f)).join(', ')}`);
    if (s.where) out.push(`WHERE ${this.expr(s.where)}`);
    if (s.groupBy) out.push(`GROUP BY ${s.groupBy === 'ALL' ? 'ALL' : s.groupBy.map((g) => this.expr(g)).join(', ')}`);
    if (s.having) out.push(`HAVING ${this.expr(s.having)}`);
    if (s.qualify) out.push(`QUALIFY ${this.expr(s.qualify)}`);
    if (s.orderBy?.length) out.push(`ORDER BY ${this.orderList(s.orderBy)}`);
    if (s.limit) out.push(`LIMIT ${this.expr(s.limit)}`);
    if (s.offset) out.push(`OFFSET ${this.expr(s.offset)}`);
    return out.join(' ');
  }

  private aliasText(f: { alias?: Identifier; columnAliases?: Identifier[] }): string {
    if (!f.alias) return '';
    return ` AS ${this.ident(f.alias)}${f.columnAliases ? this.list(f.columnAliases) : ''}`;
  }

  from(f: FromItem): string {
    switch (f.kind) {
      case 'table':
        if (f.timeTravel) return unnormalized(`${f.timeTravel.kind} clause`);
        return this.name(f.name) + this.aliasText(f);
      case 'derived':
        return `${f.lateral ? 'LATERAL ' : ''}(${this.query(f.query)})${this.aliasText(f)}`;
      case 'function':
        return `${f.lateral ? 'LATERAL ' : ''}${this.call(f.call)}${this.aliasText(f)}`;
      case 'join': {
        const kw = f.type === 'INNER' ? 'JOIN' : `${f.type} JOIN`;
        const head = `${this.from(f.left)} ${kw} ${this.from(f.right)}`;
        if (f.on) return `${head} ON ${this.expr(f.on)}`;
        if (f.using) return `${head} USING ${this.list(f.using)}`;
        return head;
      }
    }
  }

  // ---------- statements ----------
  statement(s: Statement): string {
    switch (s.kind) {
      case 'query':
        return this.query(s.query);
      case 'insert':
        if (s.overwrite) return unnormalized('INSERT OVERWRITE');
        return `INSERT INTO ${this.name(s.table)}${s.columns ? ` ${this.list(s.columns)}` : ''} ${this.query(s.source)}`;
      case 'update': {
        const out = [`UPDATE ${this.from(s.table)} SET ${this.assignments(s.set)}`];
        if (s.from.length) out.push(`FROM ${s.from.map((f) => this.from(f)).join(', ')}`);
        if (s.where) out.push(`WHERE ${this.expr(s.where)}`);
        return out.join(' ');
      }
      case 'delete': {
        const out = [`DELETE FROM ${this.from(s.table)}`];
        if (s.using.length) out.push(`USING ${s.using.map((f) => this.from(f)).join(', ')}`);
        if (s.where) out.push(`WHERE ${this.expr(s.where)}`);
        return out.join(' ');
      }
      case 'merge':
        return [
          `MERGE INTO ${this.from(s.target)} USING ${this.from(s.source)} ON ${this.expr(s.on)}`,
          ...s.clauses.map((c) => this.mergeClause(c))
        ].join(' ');
      case 'create_table': {
        const head = `CREATE ${s.orReplace ? 'OR REPLACE ' : ''}${s.temporary ? 'TEMPORARY ' : ''}TABLE ${s.ifNotExists ? 'IF NOT EXISTS ' : ''}${this.name(s.name)}`;
        if (s.as && !s.columns) return `${head} AS ${this.query(s.as)}`;
        const elems = (s.columns ?? []).map((c) => this.columnDef(c));
        for (const k of s.constraints ?? []) elems.push(`${k.kind} ${this.list(k.columns)}`);
        return `${head} (${elems.join(', ')})${s.as ? ` AS ${this.query(s.as)}` : ''}`;
      }
      case 'create_view':
        return `CREATE ${s.orReplace ? 'OR REPLACE ' : ''}VIEW ${s.ifNotExists ? 'IF NOT EXISTS ' : ''}${this.name(s.name)}${s.columns ? ` ${this.list(s.columns)}` : ''} AS ${this.query(s.query)}`;
      case 'create_namespace':
        if (s.object === 'DATABASE') return unnormalized('CREATE DATABASE');
        return `CREATE ${s.orReplace ? 'OR REPLACE ' : ''}SCHEMA ${s.ifNotExists ? 'IF NOT EXISTS ' : ''}${this.name(s.name)}`;
      case 'drop':
        if (s.object === 'DATABASE') return unnormalized('DROP DATABASE');
        return `DROP ${s.object} ${s.ifExists ? 'IF EXISTS ' : ''}${this.name(s.name)}${s.cascade ? ' CASCADE' : ''}`;
      case 'alter_table':
        return `ALTER TABLE ${s.ifExists ? 'IF EXISTS ' : ''}${this.name(s.name)} ${this.alterAction(s.action)}`;
      case 'use':
        if (s.object === 'ROLE' || s.object === 'WAREHOUSE') return unnormalized(`USE ${s.object}`);
        return `USE ${this.name(s.name)}`;
      case 'show':
        return unnormalized(`SHOW ${s.object}`);
      case 'copy': {
        if (s.source.kind === 'stage') return unnormalized('COPY from a stage');
        const opts: string[] = [];
        if (s.options.format) opts.push(`FORMAT ${s.options.format}`);
        if (s.options.header !== undefined) opts.push(s.options.header ? 'HEADER' : 'HEADER FALSE');
        if (s.options.delimiter !== undefined) opts.push(`DELIMITER ${quoteString(s.options.delimiter)}`);
        return `COPY ${this.name(s.table)} FROM ${quoteString(s.source.path)}${opts.length ? ` (${opts.join(', ')})` : ''}`;
      }
      case 'attach':
        return `ATTACH ${s.ifNotExists ? 'IF NOT EXISTS ' : ''}${quoteString(s.path)} AS ${this.ident(s.alias)}`;
      case 'detach':
        return `DETACH ${s.ifExists ? 'IF EXISTS ' : ''}${this.ident(s.name)}`;
      case 'set':
      case 'unset':
      case 'alter_session':
      case 'describe':
        return unnormalized(s.kind.toUpperCase().replace('_', ' '));
    }
  }

  private assignments(set: Array<{ column: Identifier[]; value: Expr }>): string {
    // target columns are always unqualified in DuckDB
    return set.map((a) => `${this.ident(a.column[a.column.length - 1])} = ${this.expr(a.value)}`).join(', ');
  }

  private mergeClause(c: MergeClause): string {
    const head = `WHEN ${c.matched ? '' : 'NOT '}MATCHED${c.condition ? ` AND ${this.expr(c.condition)}` : ''} THEN`;
    switch (c.action.kind) {
      case 'update':
        return `${head} UPDATE SET ${this.assignments(c.action.set)}`;
      case 'delete':
        return `${head} DELETE`;
      case 'insert':
        return `${head} INSERT${c.action.columns ? ` ${this.list(c.action.columns)}` : ''} VALUES (${c.action.values.map((v) => this.expr(v)).join(', ')})`;
    }
  }

  columnDef(c: ColumnDef): string {
    const out = [this.ident(c.name), typeText(c.type)];
    if (c.notNull) out.push('NOT NULL');
    if (c.default) out.push(`DEFAULT ${this.operand(c.default, PRIMARY, false)}`);
    if (c.primaryKey) out.push('PRIMARY KEY');
    if (c.unique) out.push('UNIQUE');
    return out.join(' ');
  }

  private alterAction(a: AlterAction): string {
    switch (a.kind) {
      case 'add_column':
        return `ADD COLUMN ${a.ifNotExists ? 'IF NOT EXISTS ' : ''}${this.columnDef(a.column)}`;
      case 'drop_column':
        return `DROP COLUMN ${a.ifExists ? 'IF EXISTS ' : ''}${this.ident(a.column)}`;
      case 'rename_column':
        return `RENAME COLUMN ${this.ident(a.from)} TO ${this.ident(a.to)}`;
      case 'rename':
        return `RENAME TO ${this.ident(a.to[a.to.length - 1])}`;
    }
  }
}

function unnormalized(what: string): never {
  throw Errors.SYNTAX(`${what} has no DuckDB form and must be rewritten before emission`);
}
