// packages/session/src/context.ts
import {
  Errors,
  numericText,
  type CasePolicy,
  type Identifier,
  type QualifiedName,
  type ScalarValue,
  type SessionContextDelta,
  type VariableAssignment
} from '@frostbridge/core';
import { parseStatement, type Expr, type Statement } from '@frostbridge/sql';

export const DEFAULT_SCHEMA = 'PUBLIC';

export interface SessionInit {
  casePolicy?: CasePolicy;
  database?: string;
  schema?: string;
  role?: string;
  warehouse?: string;
  /** plain numbers are stored as their decimal text */
  variables?: Record<string, ScalarValue | number>;
}

const initialValue = (name: string, v: ScalarValue | number): ScalarValue => {
  if (typeof v !== 'number') return v;
  if (!Number.isFinite(v)) throw Errors.SYNTAX(`Variable ${name} must be a finite number`);
  return numericText(String(v));
};

export interface SessionSnapshot {
  readonly casePolicy: CasePolicy;
  readonly database?: string;
  readonly schema?: string;
  readonly role?: string;
  readonly warehouse?: string;
  readonly variables: Readonly<Record<string, ScalarValue>>;
  readonly tempTables: readonly string[];
}

/**
 * Per-connection state that parameterizes every rewrite.
 *
 * Names are stored folded. The only way to change state is `applyDelta`
 * (or `applySessionStatement`, which computes a delta and applies it).
 */
export class SessionContext {
  readonly casePolicy: CasePolicy;
  private db?: string;
  private sch?: string;
  private roleName?: string;
  private warehouseName?: string;
  private readonly vars = new Map<string, ScalarValue>();
  private readonly temps = new Set<string>();

  constructor(init: SessionInit = {}) {
    this.casePolicy = init.casePolicy ?? 'UPPERCASE_UNQUOTED';
    // init values are unquoted names
    if (init.database) this.db = this.fold({ name: init.database, quoted: false });
    if (init.schema) this.sch = this.fold({ name: init.schema, quoted: false });
    if (init.role) this.roleName = this.fold({ name: init.role, quoted: false });
    if (init.warehouse) this.warehouseName = this.fold({ name: init.warehouse, quoted: false });
    for (const [k, v] of Object.entries(init.variables ?? {})) {
      const key = this.fold({ name: k, quoted: false });
      this.vars.set(key, initialValue(key, v));
    }
  }

  get database(): string | undefined { return this.db; }
  get schema(): string | undefined { return this.sch; }
  get role(): string | undefined { return this.roleName; }
  get warehouse(): string | undefined { return this.warehouseName; }

  // ---------- identifiers ----------
  fold(id: Identifier): string {
    return this.casePolicy === 'UPPERCASE_UNQUOTED' && !id.quoted ? id.name.toUpperCase() : id.name;
  }

  /** Folded identifier; the result is marked quoted since its spelling is now exact. */
  foldIdentifier(id: Identifier): Identifier {
    return { name: this.fold(id), quoted: true };
  }

  /** Accepts raw identifier text: `foo`, `FOO` or `"foo"`. */
  resolveIdentifier(raw: string): Identifier {
    const t = raw.trim();
    if (t.length >= 2 && t.startsWith('"') && t.endsWith('"')) {
      return this.foldIdentifier({ name: t.slice(1, -1).replace(/""/g, '"'), quoted: true });
    }
    return this.foldIdentifier({ name: t, quoted: false });
  }

  isTempTable(id: Identifier): boolean {
    return this.temps.has(this.fold(id));
  }

  /**
   * Qualifies a table reference as database.schema.name. Single-part references
   * to session temporary tables stay unqualified.
   */
  resolveTable(parts: Identifier[]): Identifier[] {
    const folded = parts.map((p) => this.foldIdentifier(p));
    const ref = parts.map((p) => p.name).join('.');
    if (folded.length >= 3) return folded;
    if (folded.length === 1 && this.temps.has(folded[0].name)) return folded;
    if (!this.db) throw Errors.NO_CONTEXT(ref, 'database');
    const db: Identifier = { name: this.db, quoted: true };
    if (folded.length === 2) return [db, ...folded];
    if (!this.sch) throw Errors.NO_CONTEXT(ref, 'schema');
    return [db, { name: this.sch, quoted: true }, folded[0]];
  }

  qualifiedName(parts: Identifier[]): QualifiedName {
    const r = this.resolveTable(parts);
    if (r.length === 1) return { database: 'temp', schema: 'main', name: r[0].name };
    return { database: r[r.length - 3].name, schema: r[r.length - 2].name, name: r[r.length - 1].name };
  }

  // ---------- variables ----------
  substituteVariable(name: string): ScalarValue {
    const key = this.fold({ name, quoted: false });
    const v = this.vars.get(key);
    if (v === undefined) throw Errors.UNDEFINED_VARIABLE(key);
    return v;
  }

  // ---------- deltas ----------
  /** The delta a statement would produce; does not mutate. */
  deltaFor(s: Statement): SessionContextDelta {
    switch (s.kind) {
      case 'use':
        return this.useDelta(s.object, s.name);
      case 'create_namespace':
        return this.useDelta(s.object, s.name);
      case 'set':
        return {
          kind: 'set',
          assignments: s.assignments.map((a): VariableAssignment => ({ name: this.fold(a.name), value: this.scalar(a.value) }))
        };
      case 'unset':
        return { kind: 'unset', names: s.names.map((n) => this.fold(n)) };
      case 'drop': {
        if (s.object === 'DATABASE') return { kind: 'drop_namespace', database: this.fold(s.name[0]) };
        if (s.object === 'SCHEMA') {
          const database = s.name.length > 1 ? this.fold(s.name[0]) : this.db;
          if (!database) return { kind: 'none' };
          return { kind: 'drop_namespace', database, schema: this.fold(s.name[s.name.length - 1]) };
        }
        if (s.object === 'TABLE' && s.name.length === 1 && this.isTempTable(s.name[0])) {
          return { kind: 'temp_table', name: this.fold(s.name[0]), action: 'drop' };
        }
        return { kind: 'none' };
      }
      case 'create_table':
        if (!s.temporary) return { kind: 'none' };
        return { kind: 'temp_table', name: this.fold(s.name[s.name.length - 1]), action: 'create' };
      default:
        return { kind: 'none' };
    }
  }

  private useDelta(object: string | undefined, name: Identifier[]): SessionContextDelta {
    const parts = name.map((n) => this.fold(n));
    const ref = name.map((n) => n.name).join('.');
    switch (object) {
      case 'ROLE':
        return { kind: 'use', role: parts.join('.') };
      case 'WAREHOUSE':
        return { kind: 'use', warehouse: parts.join('.') };
      case 'SCHEMA': {
        if (parts.length >= 2) return { kind: 'use', database: parts[0], schema: parts[1] };
        if (!this.db) throw Errors.NO_CONTEXT(ref, 'database');
        return { kind: 'use', database: this.db, schema: parts[0] };
      }
      default:
        // USE DATABASE d, USE d, USE d.s
        if (parts.length >= 2) return { kind: 'use', database: parts[0], schema: parts[1] };
        return { kind: 'use', database: parts[0], schema: DEFAULT_SCHEMA };
    }
  }

  private scalar(e: Expr): ScalarValue {
    if (e.kind === 'paren') return this.scalar(e.expr);
    if (e.kind === 'variable') return this.substituteVariable(e.name);
    if (e.kind === 'literal') {
      switch (e.type) {
        case 'string': return e.value;
        case 'number': return numericText(e.value);
        case 'boolean': return e.value === 'TRUE';
        case 'null': return null;
      }
    }
    if (e.kind === 'unary' && (e.op === '-' || e.op === '+')) {
      const inner = this.scalar(e.expr);
      if (inner !== null && typeof inner === 'object') {
        if (e.op === '+') return inner;
        return numericText(inner.text.startsWith('-') ? inner.text.slice(1) : `-${inner.text}`);
      }
    }
    throw Errors.SYNTAX('SET only accepts literal values');
  }

  applyDelta(delta: SessionContextDelta): void {
    switch (delta.kind) {
      case 'none':
        return;
      case 'use':
        if (delta.database !== undefined) this.db = delta.database;
        if (delta.schema !== undefined) this.sch = delta.schema;
        if (delta.role !== undefined) this.roleName = delta.role;
        if (delta.warehouse !== undefined) this.warehouseName = delta.warehouse;
        return;
      case 'set':
        for (const a of delta.assignments) this.vars.set(a.name, a.value);
        return;
      case 'unset':
        for (const n of delta.names) this.vars.delete(n);
        return;
      case 'drop_namespace':
        if (delta.database !== this.db) return;
        if (delta.schema === undefined) {
          this.db = undefined;
          this.sch = undefined;
        } else if (delta.schema === this.sch) {
          this.sch = undefined;
        }
        return;
      case 'temp_table':
        if (delta.action === 'create') this.temps.add(delta.name);
        else this.temps.delete(delta.name);
        return;
      case 'sequence':
        for (const d of delta.deltas) this.applyDelta(d);
        return;
    }
  }

  applySessionStatement(sql: string): SessionContextDelta {
    const delta = this.deltaFor(parseStatement(sql));
    this.applyDelta(delta);
    return delta;
  }

  // ---------- snapshots ----------
  snapshot(): SessionSnapshot {
    const variables: Record<string, ScalarValue> = {};
    for (const k of [...this.vars.keys()].sort()) variables[k] = this.vars.get(k) ?? null;
    return Object.freeze({
      casePolicy: this.casePolicy,
      ...(this.db !== undefined ? { database: this.db } : {}),
      ...(this.sch !== undefined ? { schema: this.sch } : {}),
      ...(this.roleName !== undefined ? { role: this.roleName } : {}),
      ...(this.warehouseName !== undefined ? { warehouse: this.warehouseName } : {}),
      variables: Object.freeze(variables),
      tempTables: Object.freeze([...this.temps].sort())
    });
  }

  /** Everything that can change emitted text except variables (variable-consuming statements skip the cache). */
  cacheKey(): string {
    return JSON.stringify([
      this.casePolicy, this.db ?? null, this.sch ?? null, this.roleName ?? null, this.warehouseName ?? null,
      [...this.temps].sort()
    ]);
  }
}
