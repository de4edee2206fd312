// packages/sql/src/ast.ts
import type { Identifier } from '@frostbridge/core';

// Light static type classes threaded onto calls during normalization.
export type TypeHint =
  | 'numeric'
  | 'string'
  | 'date'
  | 'timestamp'
  | 'time'
  | 'boolean'
  | 'semi'
  | 'null'
  | 'unknown';

export interface TypeName {
  name: string;          // upper-cased, multi-word names joined by one space
  params: number[];
  arrayDepth: number;    // DuckDB list suffix count: JSON[] -> 1
}

// --------------------
// Expressions
// --------------------
export interface Literal { kind: 'literal'; type: 'string' | 'number' | 'boolean' | 'null'; value: string }
export interface ColumnRef { kind: 'column'; parts: Identifier[] }
export interface Star { kind: 'star'; qualifier?: Identifier[]; exclude?: Identifier[] }
export interface VariableRef { kind: 'variable'; name: string }
export interface Param { kind: 'param'; text: string }
export interface Placeholder { kind: 'placeholder'; index: number | 'rest' }

export interface OrderItem {
  expr: Expr;
  direction?: 'ASC' | 'DESC';
  nulls?: 'FIRST' | 'LAST';
}

export interface WindowSpec {
  partitionBy: Expr[];
  orderBy: OrderItem[];
  frame?: string;
}

export interface NamedArg { name: string; value: Expr }

export interface Call {
  kind: 'call';
  name: string;
  args: Expr[];
  namedArgs?: NamedArg[];
  distinct?: boolean;
  star?: boolean;
  bare?: boolean;
  orderBy?: OrderItem[];
  withinGroup?: OrderItem[];
  filter?: Expr;
  over?: WindowSpec;
  hints?: TypeHint[];
}

export type BinaryOp =
  | 'OR' | 'AND'
  | '=' | '<>' | '<' | '<=' | '>' | '>='
  | 'LIKE' | 'NOT LIKE' | 'ILIKE' | 'NOT ILIKE'
  | '|' | '&' | '<<' | '>>'
  | '||'
  | '+' | '-' | '*' | '/' | '%';

export interface Binary { kind: 'binary'; op: BinaryOp; left: Expr; right: Expr }
export interface Unary { kind: 'unary'; op: 'NOT' | '-' | '+' | '~'; expr: Expr }
export interface IsExpr { kind: 'is'; expr: Expr; not: boolean; value: 'NULL' | 'TRUE' | 'FALSE' }
export interface DistinctFrom { kind: 'distinct'; left: Expr; right: Expr; not: boolean }
export interface Between { kind: 'between'; expr: Expr; low: Expr; high: Expr; not: boolean }
export interface InExpr { kind: 'in'; expr: Expr; not: boolean; list?: Expr[]; query?: Query }
export interface CaseExpr { kind: 'case'; operand?: Expr; whens: Array<{ when: Expr; then: Expr }>; else?: Expr }
export interface Cast { kind: 'cast'; expr: Expr; type: TypeName; mode: 'CAST' | 'TRY_CAST' }
export interface SubqueryExpr { kind: 'subquery'; query: Query }
export interface Exists { kind: 'exists'; query: Query }
export interface Paren { kind: 'paren'; expr: Expr }
export interface Tuple { kind: 'tuple'; items: Expr[] }

export type PathStep =
  | { kind: 'key'; name: string }
  | { kind: 'index'; value: number }
  | { kind: 'dynamic'; expr: Expr };

export interface PathAccess { kind: 'path'; base: Expr; steps: PathStep[] }
export interface ArrayLit { kind: 'array'; items: Expr[] }
export interface StructLit { kind: 'struct'; entries: Array<{ key: string; value: Expr }> }
export interface Lambda { kind: 'lambda'; params: Identifier[]; body: Expr }
export interface Interval { kind: 'interval'; value: Expr; unit?: string }
export interface TypedLiteral { kind: 'typed'; type: string; value: string }
export interface Extract { kind: 'extract'; part: string; expr: Expr }

export type Expr =
  | Literal | ColumnRef | Star | VariableRef | Param | Placeholder
  | Call | Binary | Unary | IsExpr | DistinctFrom | Between | InExpr
  | CaseExpr | Cast | SubqueryExpr | Exists | Paren | Tuple
  | PathAccess | ArrayLit | StructLit | Lambda | Interval | TypedLiteral | Extract;

// --------------------
// Queries
// --------------------
export interface Cte { name: Identifier; columns?: Identifier[]; query: Query }
export interface With { recursive: boolean; ctes: Cte[] }

export interface SelectItem { expr: Expr; alias?: Identifier }

export interface TimeTravel { kind: 'AT' | 'BEFORE'; args: NamedArg[] }

export interface TableRef {
  kind: 'table';
  name: Identifier[];
  alias?: Identifier;
  columnAliases?: Identifier[];
  timeTravel?: TimeTravel;
}

export interface DerivedTable {
  kind: 'derived';
  query: Query;
  lateral: boolean;
  alias?: Identifier;
  columnAliases?: Identifier[];
}

export interface TableFunction {
  kind: 'function';
  call: Call;
  lateral: boolean;
  wrapped: boolean;      // TABLE(...)
  alias?: Identifier;
  columnAliases?: Identifier[];
}

export type JoinType = 'INNER' | 'LEFT' | 'RIGHT' | 'FULL' | 'CROSS';

export interface Join {
  kind: 'join';
  type: JoinType;
  left: FromItem;
  right: FromItem;
  on?: Expr;
  using?: Identifier[];
}

export type FromItem = TableRef | DerivedTable | TableFunction | Join;

export interface Select {
  kind: 'select';
  with?: With;
  distinct: boolean;
  top?: Expr;
  columns: SelectItem[];
  from: FromItem[];
  where?: Expr;
  groupBy?: Expr[] | 'ALL';
  having?: Expr;
  qualify?: Expr;
  orderBy?: OrderItem[];
  limit?: Expr;
  offset?: Expr;
}

export interface SetOp {
  kind: 'setop';
  with?: With;
  op: 'UNION' | 'INTERSECT' | 'EXCEPT';
  all: boolean;
  left: Query;
  right: Query;
}

export interface Values { kind: 'values'; rows: Expr[][] }
export interface NestedQuery { kind: 'nested'; query: Query }

export type Query = Select | SetOp | Values | NestedQuery;

// --------------------
// Statements
// --------------------
export interface Assignment { column: Identifier[]; value: Expr }

export interface ColumnDef {
  name: Identifier;
  type: TypeName;
  notNull?: boolean;
  default?: Expr;
  primaryKey?: boolean;
  unique?: boolean;
}

export interface TableConstraint { kind: 'PRIMARY KEY' | 'UNIQUE'; columns: Identifier[] }

export type MergeAction =
  | { kind: 'update'; set: Assignment[] }
  | { kind: 'delete' }
  | { kind: 'insert'; columns?: Identifier[]; values: Expr[] };

export interface MergeClause { matched: boolean; condition?: Expr; action: MergeAction }

export type AlterAction =
  | { kind: 'add_column'; column: ColumnDef; ifNotExists: boolean }
  | { kind: 'drop_column'; column: Identifier; ifExists: boolean }
  | { kind: 'rename_column'; from: Identifier; to: Identifier }
  | { kind: 'rename'; to: Identifier[] };

export type NamespaceKind = 'DATABASE' | 'SCHEMA';

export type ShowObject = 'DATABASES' | 'SCHEMAS' | 'OBJECTS';

/** `@stage/path` as written (without the `@`), or a file the engine reads directly */
export type CopySource = { kind: 'stage'; location: string } | { kind: 'file'; path: string };

export interface CopyOptions {
  format?: 'CSV' | 'JSON' | 'PARQUET';
  header?: boolean;
  delimiter?: string;
}

export type Statement =
  | { kind: 'query'; query: Query }
  | { kind: 'insert'; table: Identifier[]; columns?: Identifier[]; source: Query; overwrite: boolean }
  | { kind: 'update'; table: TableRef; set: Assignment[]; from: FromItem[]; where?: Expr }
  | { kind: 'delete'; table: TableRef; using: FromItem[]; where?: Expr }
  | { kind: 'merge'; target: TableRef; source: FromItem; on: Expr; clauses: MergeClause[] }
  | {
      kind: 'create_table';
      name: Identifier[];
      orReplace: boolean;
      temporary: boolean;
      ifNotExists: boolean;
      columns?: ColumnDef[];
      constraints?: TableConstraint[];
      as?: Query;
    }
  | { kind: 'create_view'; name: Identifier[]; orReplace: boolean; ifNotExists: boolean; columns?: Identifier[]; query: Query }
  | { kind: 'create_namespace'; object: NamespaceKind; name: Identifier[]; orReplace: boolean; ifNotExists: boolean }
  | { kind: 'drop'; object: 'TABLE' | 'VIEW' | NamespaceKind; name: Identifier[]; ifExists: boolean; cascade: boolean }
  | { kind: 'alter_table'; name: Identifier[]; ifExists: boolean; action: AlterAction }
  | { kind: 'use'; object?: NamespaceKind | 'ROLE' | 'WAREHOUSE'; name: Identifier[] }
  | { kind: 'set'; assignments: Array<{ name: Identifier; value: Expr }> }
  | { kind: 'unset'; names: Identifier[] }
  | { kind: 'alter_session' }
  | { kind: 'describe'; object: 'TABLE' | 'VIEW'; name: Identifier[] }
  | { kind: 'show'; object: ShowObject; scope?: Identifier[] }
  | { kind: 'copy'; table: Identifier[]; source: CopySource; options: CopyOptions }
  | { kind: 'attach'; path: string; alias: Identifier; ifNotExists: boolean }
  | { kind: 'detach'; name: Identifier; ifExists: boolean };

export interface ParsedStatement {
  statement: Statement;
  text: string;
}

// ---------- small constructors ----------
export const ident = (name: string, quoted = false): Identifier => ({ name, quoted });
export const lit = {
  str: (value: string): Literal => ({ kind: 'literal', type: 'string', value }),
  num: (value: number | string): Literal => ({ kind: 'literal', type: 'number', value: String(value) }),
  bool: (value: boolean): Literal => ({ kind: 'literal', type: 'boolean', value: value ? 'TRUE' : 'FALSE' }),
  null: (): Literal => ({ kind: 'literal', type: 'null', value: 'NULL' })
};
export const call = (name: string, args: Expr[], extra: Partial<Call> = {}): Call => ({ kind: 'call', name, args, ...extra });
export const col = (...names: string[]): ColumnRef => ({ kind: 'column', parts: names.map((n) => ident(n)) });
export const bin = (op: BinaryOp, left: Expr, right: Expr): Binary => ({ kind: 'binary', op, left, right });
export const typeName = (name: string, params: number[] = [], arrayDepth = 0): TypeName => ({ name, params, arrayDepth });
