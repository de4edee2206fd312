// packages/rewriter/src/effects.ts
// Column facts DuckDB does not keep (declared VARCHAR/BINARY lengths), read off the
// statement as written so the result shaper can report them later.
import type { ColumnLength, MetadataEffect, QualifiedName } from '@frostbridge/core';
import type { ColumnDef, Statement } from '@frostbridge/sql';
import type { SessionContext } from '@frostbridge/session';
import { describeSource } from '@frostbridge/typemap';

function lengths(columns: ColumnDef[], session: SessionContext): ColumnLength[] {
  const out: ColumnLength[] = [];
  for (const c of columns) {
    const characterLength = describeSource(c.type)?.characterLength;
    if (characterLength !== undefined) out.push({ column: session.fold(c.name), characterLength });
  }
  return out;
}

export function metadataEffects(s: Statement, session: SessionContext): MetadataEffect[] {
  switch (s.kind) {
    case 'create_table': {
      const table: QualifiedName = s.temporary
        ? { database: 'temp', schema: 'main', name: session.fold(s.name[s.name.length - 1]) }
        : session.qualifiedName(s.name);
      const out: MetadataEffect[] = [];
      if (s.orReplace) out.push({ kind: 'drop', table });
      const columns = lengths(s.columns ?? [], session);
      if (columns.length) out.push({ kind: 'columns', table, columns });
      return out;
    }
    case 'drop':
      if (s.object !== 'TABLE') return [];
      return [{ kind: 'drop', table: session.qualifiedName(s.name) }];
    case 'alter_table': {
      if (s.action.kind !== 'add_column') return [];
      const columns = lengths([s.action.column], session);
      return columns.length ? [{ kind: 'columns', table: session.qualifiedName(s.name), columns }] : [];
    }
    default:
      return [];
  }
}
