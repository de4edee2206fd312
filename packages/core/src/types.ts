// packages/core/src/types.ts

// --------------------
// Identifiers & values
// --------------------
export type CasePolicy = 'UPPERCASE_UNQUOTED' | 'AS_WRITTEN';

export interface Identifier {
  name: string;
  quoted: boolean;
}

/** A numeric literal kept exactly as written; `-` leads when negative. */
export interface NumericText {
  readonly kind: 'number';
  readonly text: string;
}

export type ScalarValue = string | boolean | null | NumericText;

export const numericText = (text: string): NumericText => Object.freeze({ kind: 'number', text });

export interface QualifiedName {
  database: string;
  schema: string;
  name: string;
}

// --------------------
// Types
// --------------------
export interface TypeDescriptor {
  sourceName: string;          // canonical source name: NUMBER, FLOAT, VARCHAR, TIMESTAMP_NTZ, ...
  numericPrecision?: number;
  numericScale?: number;       // fractional-second digits for time types
  characterLength?: number;    // VARCHAR / BINARY bound
}

/** DuckDB type text, e.g. `BIGINT`, `DECIMAL(10,2)`, `JSON[]`. */
export type TargetType = string;

/** Column metadata as the target engine reports it. */
export interface NativeColumn {
  name: string;
  type: TargetType;
  nullable: boolean;
  precision?: number | null;
  scale?: number | null;
  database?: string;
  schema?: string;
  table?: string;
}

// --------------------
// Session deltas
// --------------------
export interface VariableAssignment {
  name: string;
  value: ScalarValue;
}

export type SessionContextDelta =
  | { kind: 'none' }
  | { kind: 'use'; database?: string; schema?: string; role?: string; warehouse?: string }
  | { kind: 'set'; assignments: VariableAssignment[] }
  | { kind: 'unset'; names: string[] }
  | { kind: 'drop_namespace'; database: string; schema?: string }
  | { kind: 'temp_table'; name: string; action: 'create' | 'drop' }
  | { kind: 'sequence'; deltas: SessionContextDelta[] };

// --------------------
// Rewrite results
// --------------------
export type StatementKind =
  | 'query'
  | 'dml'
  | 'merge'
  | 'ddl'
  | 'session'
  | 'describe'
  | 'passthrough';

export interface ColumnLength {
  column: string;
  characterLength: number;
}

export type MetadataEffect =
  | { kind: 'columns'; table: QualifiedName; columns: ColumnLength[] }
  | { kind: 'drop'; table: QualifiedName };

export interface RewriteResult {
  readonly emittedSql: string;
  readonly consumedVariables: ReadonlySet<string>;
  readonly mutatedSession?: SessionContextDelta;
  readonly statementKind: StatementKind;
  readonly metadataEffects: readonly MetadataEffect[];
  readonly describe?: QualifiedName;
}
