// packages/rewriter/src/resolve.ts
// Stage 2: table references become database.schema.name. CTE names, temporary
// tables and information_schema views are left as written.
import { Errors, type Identifier } from '@frostbridge/core';
import { TreeMapper, type FromItem, type Statement, type TableRef } from '@frostbridge/sql';
import type { SessionContext } from '@frostbridge/session';

export interface ResolveScope {
  session: SessionContext;
  /** temporary tables created earlier in the same expansion (folded) */
  locals: ReadonlySet<string>;
}

function cteNames(s: Statement, session: SessionContext): Set<string> {
  const names = new Set<string>();
  new TreeMapper({
    query: (q) => {
      if ((q.kind === 'select' || q.kind === 'setop') && q.with) {
        for (const c of q.with.ctes) names.add(session.fold(c.name));
      }
      return q;
    }
  }).statement(s);
  return names;
}

export class TableResolver {
  private readonly ctes: Set<string>;

  constructor(private readonly scope: ResolveScope, statement: Statement) {
    this.ctes = cteNames(statement, scope.session);
  }

  table(parts: Identifier[]): Identifier[] {
    const { session, locals } = this.scope;
    if (parts.length === 1) {
      const name = session.fold(parts[0]);
      if (this.ctes.has(name) || locals.has(name)) return parts;
    }
    if (parts.length === 2 && session.fold(parts[0]).toUpperCase() === 'INFORMATION_SCHEMA') return parts;
    return session.resolveTable(parts);
  }

  /** SCHEMA names take the current database when unqualified. */
  schema(parts: Identifier[]): Identifier[] {
    const { session } = this.scope;
    if (parts.length >= 2) return parts.map((p) => session.foldIdentifier(p));
    const db = session.database;
    if (db === undefined) throw Errors.NO_CONTEXT(parts.map((p) => p.name).join('.'), 'database');
    return [{ name: db, quoted: true }, session.foldIdentifier(parts[0])];
  }

  private ref = (t: TableRef): TableRef => ({ ...t, name: this.table(t.name) });

  private from = (f: FromItem): FromItem => (f.kind === 'table' ? this.ref(f) : f);

  statement(s: Statement): Statement {
    const mapped = new TreeMapper({ from: this.from }).statement(s);
    switch (mapped.kind) {
      case 'insert':
        return { ...mapped, table: this.table(mapped.table) };
      case 'update':
        return { ...mapped, table: this.ref(mapped.table) };
      case 'delete':
        return { ...mapped, table: this.ref(mapped.table) };
      case 'merge':
        return { ...mapped, target: this.ref(mapped.target) };
      case 'create_table':
        // DuckDB keeps temporary tables in its own catalog
        if (mapped.temporary) return mapped;
        return { ...mapped, name: this.table(mapped.name) };
      case 'create_view':
        return { ...mapped, name: this.table(mapped.name) };
      case 'alter_table':
        return { ...mapped, name: this.table(mapped.name) };
      case 'copy':
        return { ...mapped, table: this.table(mapped.table) };
      case 'drop':
        if (mapped.object === 'SCHEMA') return { ...mapped, name: this.schema(mapped.name) };
        if (mapped.object === 'DATABASE') return mapped;
        return { ...mapped, name: this.table(mapped.name) };
      case 'create_namespace':
        return mapped.object === 'SCHEMA' ? { ...mapped, name: this.schema(mapped.name) } : mapped;
      default:
        return mapped;
    }
  }
}

export function resolveStatement(s: Statement, scope: ResolveScope): Statement {
  return new TableResolver(scope, s).statement(s);
}
