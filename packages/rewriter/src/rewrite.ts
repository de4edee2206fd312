// packages/rewriter/src/rewrite.ts
// Stage 3: every call goes through the catalog and every declared type through the
// type mapper. Nothing reaches the emitter under a source-dialect name.
import { Errors, type CatalogHit } from '@frostbridge/core';
import type { FunctionCatalog, RuleContext } from '@frostbridge/catalog';
import { TreeMapper, type ColumnDef, type Expr, type FromItem, type Statement, type TypeName } from '@frostbridge/sql';
import { mapDeclaredType } from '@frostbridge/typemap';

/** Table functions DuckDB accepts in FROM as written. */
const TABLE_FUNCTIONS: ReadonlySet<string> = new Set(['GENERATE_SERIES', 'UNNEST', 'RANGE']);

const mapType = (t: TypeName): TypeName => mapDeclaredType(t).type;

const castTypes = new TreeMapper({
  expr: (e: Expr): Expr => (e.kind === 'cast' ? { ...e, type: mapType(e.type) } : e)
});

const mapColumn = (c: ColumnDef): ColumnDef => ({ ...c, type: mapType(c.type) });

export class CallRewriter {
  readonly hits: CatalogHit[] = [];
  private readonly mapper: TreeMapper;

  constructor(private readonly catalog: FunctionCatalog, private readonly ctx: RuleContext) {
    this.mapper = new TreeMapper({ expr: this.expr, from: this.from });
  }

  private expr = (e: Expr): Expr => {
    switch (e.kind) {
      case 'call': {
        const { expr, hit } = this.catalog.rewrite(e, this.ctx);
        this.hits.push(hit);
        // templates may cast to source type names
        return castTypes.expr(expr);
      }
      case 'cast':
        return { ...e, type: mapType(e.type) };
      default:
        return e;
    }
  };

  private from = (f: FromItem): FromItem => {
    if (f.kind !== 'function') return f;
    const name = f.call.name.toUpperCase();
    if (!TABLE_FUNCTIONS.has(name)) {
      throw Errors.UNSUPPORTED_FUNCTION(name, f.call.args.length + (f.call.namedArgs?.length ?? 0), 'not supported as a table function');
    }
    return { ...f, call: { ...f.call, name: name.toLowerCase() } };
  };

  statement(s: Statement): Statement {
    const mapped = this.mapper.statement(s);
    switch (mapped.kind) {
      case 'create_table':
        return mapped.columns ? { ...mapped, columns: mapped.columns.map(mapColumn) } : mapped;
      case 'alter_table':
        if (mapped.action.kind !== 'add_column') return mapped;
        return { ...mapped, action: { ...mapped.action, column: mapColumn(mapped.action.column) } };
      default:
        return mapped;
    }
  }
}
