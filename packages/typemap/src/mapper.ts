// packages/typemap/src/mapper.ts
import { Errors, type TargetType, type TypeDescriptor } from '@frostbridge/core';
import families from './families.json';

/** Same shape as the parser's TypeName. */
export interface TypeSpec {
  name: string;
  params: number[];
  arrayDepth: number;
}

export interface TypeHint {
  precision?: number | null;
  scale?: number | null;
  characterLength?: number | null;
}

export type SourceTypeName = keyof typeof families.source;
export type NativeFamily = keyof typeof families.native;

// synthesized when the engine cannot tell us
export const NUMBER_PRECISION = 38;
export const NUMBER_SCALE = 0;
export const FRACTIONAL_SECONDS = 9;
export const MAX_VARCHAR_LENGTH = 16_777_216;
export const MAX_BINARY_LENGTH = 8_388_608;
// DuckDB's DECIMAL without arguments
const DUCKDB_DECIMAL = { precision: 18, scale: 3 };

const SOURCE = new Map<string, SourceTypeName>();
for (const [canonical, aliases] of Object.entries(families.source)) {
  for (const a of aliases) if (isSourceName(canonical)) SOURCE.set(a, canonical);
}

const NATIVE = new Map<string, NativeFamily>();
for (const [family, names] of Object.entries(families.native)) {
  for (const n of names) if (isNativeFamily(family)) NATIVE.set(n, family);
}

function isSourceName(s: string): s is SourceTypeName {
  return s in families.source;
}

function isNativeFamily(s: string): s is NativeFamily {
  return s in families.native;
}

// ---------- forward ----------

/** Source descriptor for a declared type, or undefined when the name is not a source type name. */
export function describeSource(t: TypeSpec): TypeDescriptor | undefined {
  if (t.arrayDepth > 0) return undefined;
  const canonical = SOURCE.get(t.name.toUpperCase());
  if (!canonical) return undefined;
  const [p0, p1] = t.params;
  switch (canonical) {
    case 'NUMBER':
      return { sourceName: 'NUMBER', numericPrecision: p0 ?? NUMBER_PRECISION, numericScale: p1 ?? NUMBER_SCALE };
    case 'INTEGER':
      return { sourceName: 'NUMBER', numericPrecision: NUMBER_PRECISION, numericScale: NUMBER_SCALE };
    case 'VARCHAR': {
      // CHAR without a length is CHAR(1)
      const length = p0 ?? (/^N?CHAR(ACTER)?$/.test(t.name.toUpperCase()) ? 1 : undefined);
      return length === undefined ? { sourceName: 'VARCHAR' } : { sourceName: 'VARCHAR', characterLength: length };
    }
    case 'BINARY':
      return p0 === undefined ? { sourceName: 'BINARY' } : { sourceName: 'BINARY', characterLength: p0 };
    case 'TIME':
    case 'TIMESTAMP_NTZ':
    case 'TIMESTAMP_TZ':
    case 'TIMESTAMP_LTZ':
      return { sourceName: canonical, numericScale: p0 ?? FRACTIONAL_SECONDS };
    default:
      return { sourceName: canonical };
  }
}

export function toTargetSpec(d: TypeDescriptor): TypeSpec {
  const spec = (name: string, params: number[] = [], arrayDepth = 0): TypeSpec => ({ name, params, arrayDepth });
  switch (d.sourceName) {
    case 'NUMBER': {
      const p = d.numericPrecision ?? NUMBER_PRECISION;
      const s = d.numericScale ?? NUMBER_SCALE;
      return p === NUMBER_PRECISION && s === NUMBER_SCALE ? spec('BIGINT') : spec('DECIMAL', [p, s]);
    }
    case 'FLOAT': return spec('DOUBLE');
    case 'VARCHAR': return spec('VARCHAR');
    case 'BINARY': return spec('BLOB');
    case 'BOOLEAN': return spec('BOOLEAN');
    case 'DATE': return spec('DATE');
    case 'TIME': return spec('TIME');
    case 'TIMESTAMP_NTZ': return spec('TIMESTAMP');
    case 'TIMESTAMP_TZ':
    case 'TIMESTAMP_LTZ':
      return spec('TIMESTAMPTZ');
    case 'VARIANT':
    case 'OBJECT':
      return spec('JSON');
    case 'ARRAY': return spec('JSON', [], 1);
    default:
      throw Errors.TYPE_FORWARD(d.sourceName);
  }
}

export const specText = (t: TypeSpec): string =>
  `${t.name}${t.params.length ? `(${t.params.join(',')})` : ''}${'[]'.repeat(t.arrayDepth)}`;

export function toTarget(d: TypeDescriptor): TargetType {
  return specText(toTargetSpec(d));
}

export interface DeclaredTypeMapping {
  type: TypeSpec;
  /** present when the declaration used a source type name */
  descriptor?: TypeDescriptor;
}

/** DDL column types: source names map forward, DuckDB names pass through. */
export function mapDeclaredType(t: TypeSpec): DeclaredTypeMapping {
  const descriptor = describeSource(t);
  if (descriptor) return { type: toTargetSpec(descriptor), descriptor };
  const base = t.name.toUpperCase();
  if (t.arrayDepth > 0 || NATIVE.has(base)) return { type: t };
  throw Errors.TYPE_FORWARD(specText(t));
}

/** DuckDB family of a type name; `list` for any list type. */
export function nativeFamily(t: TypeSpec): NativeFamily | 'list' | undefined {
  if (t.arrayDepth > 0) return 'list';
  return NATIVE.get(t.name.toUpperCase());
}

// ---------- backward ----------

interface ParsedNative {
  base: string;
  params: number[];
  list: boolean;
}

export function parseNativeType(text: TargetType): ParsedNative {
  const t = text.trim().toUpperCase();
  if (/\[\d*\]$/.test(t)) return { base: t.replace(/(\[\d*\])+$/, ''), params: [], list: true };
  const m = /^([A-Z_0-9 ]+?)\s*(?:\((.*)\))?$/.exec(t);
  if (!m) return { base: t, params: [], list: false };
  const params = (m[2] ?? '')
    .split(',')
    .map((p) => p.trim())
    .filter((p) => /^\d+$/.test(p))
    .map(Number);
  return { base: m[1].trim(), params, list: m[1].trim() === 'LIST' };
}

/** Backward mapping; total over the types the engine reports. */
export function fromTarget(type: TargetType, hint: TypeHint = {}): TypeDescriptor {
  const n = parseNativeType(type);
  if (n.list) return { sourceName: 'ARRAY' };
  const family = NATIVE.get(n.base);
  switch (family) {
    case 'integer':
      return { sourceName: 'NUMBER', numericPrecision: NUMBER_PRECISION, numericScale: NUMBER_SCALE };
    case 'decimal':
      return {
        sourceName: 'NUMBER',
        numericPrecision: n.params[0] ?? hint.precision ?? DUCKDB_DECIMAL.precision,
        numericScale: n.params[1] ?? hint.scale ?? DUCKDB_DECIMAL.scale
      };
    case 'float':
      return { sourceName: 'FLOAT' };
    case 'text':
      return { sourceName: 'VARCHAR', characterLength: hint.characterLength ?? MAX_VARCHAR_LENGTH };
    case 'binary':
      return { sourceName: 'BINARY', characterLength: hint.characterLength ?? MAX_BINARY_LENGTH };
    case 'boolean':
      return { sourceName: 'BOOLEAN' };
    case 'date':
      return { sourceName: 'DATE' };
    case 'time':
      return { sourceName: 'TIME', numericScale: FRACTIONAL_SECONDS };
    case 'timestamp':
      return { sourceName: 'TIMESTAMP_NTZ', numericScale: FRACTIONAL_SECONDS };
    case 'timestamptz':
      return { sourceName: 'TIMESTAMP_TZ', numericScale: FRACTIONAL_SECONDS };
    case 'json':
      return { sourceName: 'VARIANT' };
    case 'object':
      return { sourceName: 'OBJECT' };
    default:
      throw Errors.TYPE_BACKWARD(type);
  }
}
