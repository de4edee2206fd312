// packages/catalog/src/rules.ts
// Call rewrites that need more than a template: they read literal arguments,
// type hints or the session.
import { Errors, type StrategyKind } from '@frostbridge/core';
import {
  bin, call, isSteppablePart, isTimePart, lit, normalizeDatePart, typeName,
  type Call, type CaseExpr, type Cast, type Expr, type TypeHint, type TypeName
} from '@frostbridge/sql';
import { toStrftime } from './formats';
import bootstrap from './bootstrap.json';

export interface SessionValues {
  database?: string;
  schema?: string;
  role?: string;
  warehouse?: string;
}

export interface RuleContext {
  session: SessionValues;
}

export type CallRule = (c: Call, ctx: RuleContext) => Expr;

export interface RuleEntry {
  arity: string;
  strategy: Extract<StrategyKind, 'arg_remap' | 'case_expand' | 'session'>;
  rule: CallRule;
}

// ---------- helpers ----------
function fail(c: Call, reason: string): never {
  throw Errors.UNSUPPORTED_FUNCTION(c.name.toUpperCase(), c.args.length, reason);
}

function arg(c: Call, i: number): Expr {
  const a = c.args[i];
  return a ?? fail(c, `argument ${i + 1} is required`);
}

const hint = (c: Call, i: number): TypeHint => c.hints?.[i] ?? 'unknown';

const cast = (expr: Expr, type: TypeName, mode: Cast['mode'] = 'CAST'): Cast => ({ kind: 'cast', expr, type, mode });

const stringValue = (e: Expr): string | undefined =>
  e.kind === 'literal' && e.type === 'string' ? e.value : undefined;

const numberValue = (e: Expr): number | undefined => {
  if (e.kind === 'literal' && e.type === 'number') return Number(e.value);
  if (e.kind === 'unary' && e.op === '-') {
    const inner = numberValue(e.expr);
    return inner === undefined ? undefined : -inner;
  }
  return undefined;
};

const isNullLiteral = (e: Expr): boolean => e.kind === 'literal' && e.type === 'null';

/** Date part from `day`, `'day'` or `"DAY"`, canonicalized. */
function datePart(c: Call, i: number): string {
  const a = arg(c, i);
  const raw = stringValue(a) ?? (a.kind === 'column' && a.parts.length === 1 ? a.parts[0].name : undefined);
  const part = raw === undefined ? undefined : normalizeDatePart(raw);
  return part ?? fail(c, 'the date part must be a literal part name');
}

const MONTHS = ['JAN', 'FEB', 'MAR', 'APR', 'MAY', 'JUN', 'JUL', 'AUG', 'SEP', 'OCT', 'NOV', 'DEC'];

/**
 * String literals that look like dates become typed casts, since the engine will not
 * coerce them inside date arithmetic. Other expressions are returned unchanged.
 */
export function dateArg(e: Expr, wantTime = false): Expr {
  const s = stringValue(e)?.trim();
  if (s === undefined) return e;
  let iso: string | undefined;
  let time = false;
  if (/^\d{4}-\d{2}-\d{2}$/.test(s)) iso = s;
  else if (/^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}/.test(s)) { iso = s; time = true; }
  else if (/^\d{4}\/\d{2}\/\d{2}$/.test(s)) iso = s.replace(/\//g, '-');
  else {
    const m = /^(\d{2})-([A-Za-z]{3})-(\d{4})$/.exec(s);
    const month = m ? MONTHS.indexOf(m[2].toUpperCase()) : -1;
    if (m && month >= 0) iso = `${m[3]}-${String(month + 1).padStart(2, '0')}-${m[1]}`;
  }
  if (iso === undefined) return e;
  return cast(lit.str(iso), typeName(time || wantTime ? 'TIMESTAMP' : 'DATE'));
}

const isDateValued = (e: Expr, h: TypeHint): boolean =>
  h === 'date' || (e.kind === 'cast' && e.type.name === 'DATE');

function epochSeconds(value: Expr, scale = 0): Expr {
  // make_timestamp takes microseconds
  const factor = 10 ** (6 - scale);
  const micros = factor === 1 ? value : bin('*', value, lit.num(factor));
  return call('make_timestamp', [cast(micros, typeName('BIGINT'))]);
}

// ---------- date arithmetic ----------
function dateAdd(c: Call, part: string, amount: Expr, targetIndex: number): Expr {
  if (!isSteppablePart(part)) fail(c, `'${part}' cannot size an interval`);
  const base = dateArg(arg(c, targetIndex), isTimePart(part));
  const quarter = part === 'quarter';
  const value = quarter ? bin('*', amount, lit.num(3)) : amount;
  const sum = bin('+', base, { kind: 'interval', value, unit: (quarter ? 'month' : part).toUpperCase() });
  // whole-day steps on a DATE stay a DATE
  return isDateValued(base, hint(c, targetIndex)) && !isTimePart(part) ? cast(sum, typeName('DATE')) : sum;
}

const DATEADD: CallRule = (c) => dateAdd(c, datePart(c, 0), arg(c, 1), 2);

const DATEDIFF: CallRule = (c) => {
  const part = datePart(c, 0);
  const time = isTimePart(part);
  return call('date_diff', [lit.str(part), dateArg(arg(c, 1), time), dateArg(arg(c, 2), time)]);
};

const DATE_TRUNC: CallRule = (c) => {
  const part = datePart(c, 0);
  return call('date_trunc', [lit.str(part), dateArg(arg(c, 1), isTimePart(part))]);
};

const DATE_PART: CallRule = (c) => {
  const part = datePart(c, 0);
  return call('date_part', [lit.str(part), dateArg(arg(c, 1), isTimePart(part))]);
};

const partOf = (part: string): CallRule => (c) =>
  call('date_part', [lit.str(part), dateArg(arg(c, 0), isTimePart(part))]);

const TRUNC: CallRule = (c) => {
  const second = arg(c, 1);
  const s = stringValue(second);
  const part = s === undefined ? undefined : normalizeDatePart(s);
  if (part) return call('date_trunc', [lit.str(part), dateArg(arg(c, 0), isTimePart(part))]);
  if (s !== undefined) fail(c, `'${s}' is not a date part`);
  const scale = call('pow', [lit.num(10), second]);
  return bin('/', call('trunc', [bin('*', arg(c, 0), scale)]), scale);
};

// ---------- conditional ----------
const DIV0: CallRule = (c) => {
  const [a, b] = [arg(c, 0), arg(c, 1)];
  const fallback = c.args[2] ?? lit.num(0);
  const guarded = bin('/', a, call('nullif', [b, lit.num(0)]));
  if (isNullLiteral(fallback)) return guarded;
  const out: CaseExpr = { kind: 'case', whens: [{ when: bin('=', b, lit.num(0)), then: fallback }], else: guarded };
  return out;
};

const DECODE: CallRule = (c) => {
  const subject = arg(c, 0);
  const rest = c.args.slice(1);
  const whens: CaseExpr['whens'] = [];
  for (let i = 0; i + 1 < rest.length; i += 2) {
    whens.push({ when: { kind: 'distinct', left: subject, right: rest[i], not: true }, then: rest[i + 1] });
  }
  const out: CaseExpr = { kind: 'case', whens };
  if (rest.length % 2 === 1) out.else = rest[rest.length - 1];
  return out;
};

// ---------- aggregates ----------
const LISTAGG: CallRule = (c) => {
  const sep = c.args[1] ?? lit.str('');
  const out = call('string_agg', [arg(c, 0), sep]);
  if (c.distinct) out.distinct = true;
  const order = c.withinGroup ?? c.orderBy;
  if (order?.length) out.orderBy = order;
  if (c.filter) out.filter = c.filter;
  if (c.over) out.over = c.over;
  return out;
};

const ARRAY_AGG: CallRule = (c) => {
  const value = arg(c, 0);
  const out = call('array_agg', [value]);
  if (c.distinct) out.distinct = true;
  const order = c.withinGroup ?? c.orderBy;
  if (order?.length) out.orderBy = order;
  if (c.over) out.over = c.over;
  // nulls are dropped from the collected array
  out.filter = c.filter ?? { kind: 'is', expr: value, not: true, value: 'NULL' };
  return out;
};

// ---------- semi-structured ----------
const SIMPLE_KEY = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const jsonKey = (k: string): string => (SIMPLE_KEY.test(k) ? `.${k}` : `."${k.replace(/"/g, '\\"')}"`);

/** `a.b[0]."c d"` -> `$.a.b[0]."c d"` */
export function jsonPathFromText(path: string): string {
  let out = '$';
  const re = /\[(\d+)\]|\[(['"])(.*?)\2\]|"((?:[^"]|"")*)"|([^.[\]"]+)/g;
  for (let m = re.exec(path); m; m = re.exec(path)) {
    if (m[1] !== undefined) out += `[${m[1]}]`;
    else if (m[3] !== undefined) out += jsonKey(m[3]);
    else if (m[4] !== undefined) out += jsonKey(m[4].replace(/""/g, '"'));
    else if (m[5] !== undefined) out += jsonKey(m[5].trim());
  }
  return out;
}

const GET_PATH: CallRule = (c) => {
  const path = arg(c, 1);
  const text = stringValue(path);
  if (text !== undefined) return call('json_extract_string', [arg(c, 0), lit.str(jsonPathFromText(text))]);
  return call('json_extract_string', [arg(c, 0), bin('||', lit.str('$.'), path)]);
};

// extracted path values arrive as JSON text
const isJsonText = (h: TypeHint): boolean => h === 'semi' || h === 'string';

const GET: CallRule = (c) => {
  const base = arg(c, 0);
  const index = arg(c, 1);
  const key = stringValue(index);
  if (key !== undefined) return call('json_extract', [base, lit.str(`$${jsonKey(key)}`)]);
  if (isJsonText(hint(c, 0))) {
    const n = numberValue(index);
    if (n !== undefined) return call('json_extract', [base, lit.str(`$[${n}]`)]);
    return call('json_extract', [base, bin('||', bin('||', lit.str('$['), index), lit.str(']'))]);
  }
  const n = numberValue(index);
  return call('list_extract', [base, n !== undefined ? lit.num(n + 1) : bin('+', index, lit.num(1))]);
};

const ARRAY_SIZE: CallRule = (c) =>
  isJsonText(hint(c, 0)) ? call('json_array_length', [arg(c, 0)]) : call('length', [arg(c, 0)]);

// ---------- regex ----------
const REGEXP_REPLACE: CallRule = (c) => {
  const [s, pattern] = [arg(c, 0), arg(c, 1)];
  const replacement = c.args[2] ?? lit.str('');
  if (c.args.length === 4 && stringValue(arg(c, 3)) !== undefined) {
    // already in flag form
    return call('regexp_replace', [s, pattern, replacement, arg(c, 3)]);
  }
  if (c.args.length >= 4 && numberValue(arg(c, 3)) !== 1) fail(c, 'only position 1 is supported');
  let global = true;
  if (c.args.length >= 5) {
    const occurrence = numberValue(arg(c, 4));
    if (occurrence !== 0 && occurrence !== 1) fail(c, 'only occurrence 0 or 1 is supported');
    global = occurrence === 0;
  }
  let flags = global ? 'g' : '';
  if (c.args.length === 6) {
    const params = stringValue(arg(c, 5)) ?? fail(c, 'regex parameters must be a string literal');
    for (const p of params) {
      if (p === 'i' || p === 'c' || p === 's') flags += p;
      else if (p !== 'e' && p !== 'm') fail(c, `regex parameter '${p}' is not supported`);
    }
  }
  return flags
    ? call('regexp_replace', [s, pattern, replacement, lit.str(flags)])
    : call('regexp_replace', [s, pattern, replacement]);
};

const SHA2: CallRule = (c) => {
  const bits = c.args[1];
  if (bits && numberValue(bits) !== 256) fail(c, 'only 256-bit digests are available');
  return call('sha256', [arg(c, 0)]);
};

// ---------- conversions ----------
type CastMode = Cast['mode'];

function formatArg(c: Call, i: number): string {
  const f = stringValue(arg(c, i));
  return toStrftime(f ?? fail(c, 'the format must be a string literal'), c.name.toUpperCase());
}

const toDate = (mode: CastMode): CallRule => (c) => {
  const value = arg(c, 0);
  if (c.args.length === 2) {
    const parsed = call(mode === 'TRY_CAST' ? 'try_strptime' : 'strptime', [value, lit.str(formatArg(c, 1))]);
    return cast(parsed, typeName('DATE'));
  }
  const h = hint(c, 0);
  if (h === 'numeric') return cast(epochSeconds(value), typeName('DATE'));
  if (mode === 'CAST') {
    const literal = dateArg(value);
    if (literal.kind === 'cast') return literal.type.name === 'DATE' ? literal : cast(literal, typeName('DATE'));
  }
  return cast(value, typeName('DATE'), h === 'unknown' ? 'TRY_CAST' : mode);
};

const toTimestamp = (target: 'TIMESTAMP' | 'TIMESTAMPTZ', mode: CastMode): CallRule => (c) => {
  const value = arg(c, 0);
  const type = typeName(target);
  if (c.args.length === 2) {
    const scale = numberValue(arg(c, 1));
    if (scale !== undefined) return cast(epochSeconds(value, scale), type);
    const parsed = call(mode === 'TRY_CAST' ? 'try_strptime' : 'strptime', [value, lit.str(formatArg(c, 1))]);
    return cast(parsed, type);
  }
  const h = hint(c, 0);
  if (h === 'numeric') return cast(epochSeconds(value), type);
  return cast(value, type, h === 'unknown' ? 'TRY_CAST' : mode);
};

const toTime = (mode: CastMode): CallRule => (c) => {
  const value = arg(c, 0);
  if (c.args.length === 2) {
    return cast(call(mode === 'TRY_CAST' ? 'try_strptime' : 'strptime', [value, lit.str(formatArg(c, 1))]), typeName('TIME'));
  }
  return cast(value, typeName('TIME'), hint(c, 0) === 'unknown' ? 'TRY_CAST' : mode);
};

const TO_VARCHAR: CallRule = (c) => {
  const value = arg(c, 0);
  const h = hint(c, 0);
  if (c.args.length === 2) {
    if (h === 'numeric') fail(c, 'numeric format models are not supported');
    return call('strftime', [dateArg(value), lit.str(formatArg(c, 1))]);
  }
  if (h === 'semi') return call('json_extract_string', [value, lit.str('$')]);
  return cast(value, typeName('VARCHAR'));
};

/** Semi-structured inputs are unwrapped to text before a scalar cast. */
const scalarInput = (c: Call): Expr =>
  hint(c, 0) === 'semi' ? call('json_extract_string', [arg(c, 0), lit.str('$')]) : arg(c, 0);

const toNumber = (mode: CastMode): CallRule => (c) => {
  const rest = c.args.slice(1);
  if (rest.some((a) => stringValue(a) !== undefined)) fail(c, 'numeric format models are not supported');
  const p = rest[0] === undefined ? 38 : numberValue(rest[0]);
  const s = rest[1] === undefined ? 0 : numberValue(rest[1]);
  if (p === undefined || s === undefined) fail(c, 'precision and scale must be numeric literals');
  const h = hint(c, 0);
  return cast(scalarInput(c), typeName('DECIMAL', [p ?? 38, s ?? 0]), h === 'unknown' ? 'TRY_CAST' : mode);
};

const toScalar = (type: string, mode: CastMode): CallRule => (c) =>
  cast(scalarInput(c), typeName(type), hint(c, 0) === 'unknown' ? 'TRY_CAST' : mode);

// ---------- session ----------
const sessionValue = (key: keyof SessionValues): CallRule => (_c, ctx) => {
  const v = ctx.session[key];
  return v === undefined ? lit.null() : lit.str(v);
};

const SECONDARY_ROLES = JSON.stringify({ roles: '', value: 'ALL' });

const BOOTSTRAP_DEFAULTS: Required<SessionValues> = {
  database: 'SNOWFLAKE',
  schema: 'INFORMATION_SCHEMA',
  role: 'SYSADMIN',
  warehouse: 'DEFAULT_WAREHOUSE'
};

/** epoch milliseconds of `days` days before now */
const daysAgo = (days: number): Expr =>
  call('epoch_ms', [bin('-', cast(call('now', []), typeName('TIMESTAMP')), { kind: 'interval', value: lit.num(days), unit: 'DAY' })]);

const jsonObject = (entries: Array<[string, Expr]>): Call => call('json_object', entries.flatMap(([k, v]) => [lit.str(k), v]));

/**
 * Connection bootstrap document for client drivers: the static account part
 * patched with the session's current names and login times relative to now.
 */
const BOOTSTRAP_DATA_REQUEST: CallRule = (_c, ctx) => {
  const v = { ...BOOTSTRAP_DEFAULTS, ...definedValues(ctx.session) };
  const patch = jsonObject([
    ['currentSession', jsonObject([
      ['currentWarehouse', lit.str(v.warehouse)],
      ['currentDatabase', lit.str(v.database)],
      ['currentSchema', lit.str(v.schema)]
    ])],
    ['userInfo', jsonObject([
      ['createdOn', daysAgo(10)],
      ['defaultRole', lit.str(v.role)],
      ['defaultWarehouse', lit.str(v.warehouse)],
      ['lastSucLogin', daysAgo(3)]
    ])]
  ]);
  return cast(call('json_merge_patch', [call('json', [lit.str(JSON.stringify(bootstrap))]), patch]), typeName('VARCHAR'));
};

function definedValues(s: SessionValues): SessionValues {
  const out: SessionValues = {};
  if (s.database !== undefined) out.database = s.database;
  if (s.schema !== undefined) out.schema = s.schema;
  if (s.role !== undefined) out.role = s.role;
  if (s.warehouse !== undefined) out.warehouse = s.warehouse;
  return out;
}

// ---------- registry ----------
const remap = (arity: string, rule: CallRule): RuleEntry => ({ arity, strategy: 'arg_remap', rule });
const expand = (arity: string, rule: CallRule): RuleEntry => ({ arity, strategy: 'case_expand', rule });
const session = (key: keyof SessionValues): RuleEntry => ({ arity: '0', strategy: 'session', rule: sessionValue(key) });

export const RULES: Record<string, RuleEntry[]> = {
  DIV0: [remap('2-3', DIV0)],
  DECODE: [remap('3+', DECODE)],

  DATEADD: [remap('3', DATEADD)],
  TIMEADD: [remap('3', DATEADD)],
  TIMESTAMPADD: [remap('3', DATEADD)],
  ADD_MONTHS: [remap('2', (c) => dateAdd(c, 'month', arg(c, 1), 0))],
  DATEDIFF: [remap('3', DATEDIFF)],
  TIMEDIFF: [remap('3', DATEDIFF)],
  TIMESTAMPDIFF: [remap('3', DATEDIFF)],
  DATE_TRUNC: [remap('2', DATE_TRUNC)],
  DATE_PART: [remap('2', DATE_PART)],
  TRUNC: [remap('2', TRUNC)],
  TRUNCATE: [remap('1', (c) => call('trunc', [arg(c, 0)])), remap('2', TRUNC)],
  LAST_DAY: [remap('1', (c) => call('last_day', [dateArg(arg(c, 0))]))],
  YEAR: [remap('1', partOf('year'))],
  QUARTER: [remap('1', partOf('quarter'))],
  MONTH: [remap('1', partOf('month'))],
  WEEK: [remap('1', partOf('week'))],
  WEEKOFYEAR: [remap('1', partOf('week'))],
  DAY: [remap('1', partOf('day'))],
  DAYOFMONTH: [remap('1', partOf('day'))],
  DAYOFWEEK: [remap('1', partOf('dayofweek'))],
  DAYOFYEAR: [remap('1', partOf('dayofyear'))],
  HOUR: [remap('1', partOf('hour'))],
  MINUTE: [remap('1', partOf('minute'))],
  SECOND: [remap('1', partOf('second'))],

  LISTAGG: [remap('1-2', LISTAGG)],
  ARRAY_AGG: [remap('1', ARRAY_AGG)],

  GET: [expand('2', GET)],
  GET_PATH: [remap('2', GET_PATH)],
  JSON_EXTRACT_PATH_TEXT: [remap('2', GET_PATH)],
  ARRAY_SIZE: [expand('1', ARRAY_SIZE)],

  REGEXP_REPLACE: [remap('2-6', REGEXP_REPLACE)],
  SHA2: [remap('1-2', SHA2)],

  TO_DATE: [expand('1-2', toDate('CAST'))],
  DATE: [expand('1-2', toDate('CAST'))],
  TRY_TO_DATE: [expand('1-2', toDate('TRY_CAST'))],
  TO_TIMESTAMP: [expand('1-2', toTimestamp('TIMESTAMP', 'CAST'))],
  TO_TIMESTAMP_NTZ: [expand('1-2', toTimestamp('TIMESTAMP', 'CAST'))],
  TO_TIMESTAMP_LTZ: [expand('1-2', toTimestamp('TIMESTAMPTZ', 'CAST'))],
  TO_TIMESTAMP_TZ: [expand('1-2', toTimestamp('TIMESTAMPTZ', 'CAST'))],
  TRY_TO_TIMESTAMP: [expand('1-2', toTimestamp('TIMESTAMP', 'TRY_CAST'))],
  TRY_TO_TIMESTAMP_NTZ: [expand('1-2', toTimestamp('TIMESTAMP', 'TRY_CAST'))],
  TRY_TO_TIMESTAMP_LTZ: [expand('1-2', toTimestamp('TIMESTAMPTZ', 'TRY_CAST'))],
  TRY_TO_TIMESTAMP_TZ: [expand('1-2', toTimestamp('TIMESTAMPTZ', 'TRY_CAST'))],
  TO_TIME: [expand('1-2', toTime('CAST'))],
  TIME: [expand('1-2', toTime('CAST'))],
  TRY_TO_TIME: [expand('1-2', toTime('TRY_CAST'))],
  TO_VARCHAR: [expand('1-2', TO_VARCHAR)],
  TO_CHAR: [expand('1-2', TO_VARCHAR)],
  TO_NUMBER: [expand('1-3', toNumber('CAST'))],
  TO_DECIMAL: [expand('1-3', toNumber('CAST'))],
  TO_NUMERIC: [expand('1-3', toNumber('CAST'))],
  TRY_TO_NUMBER: [expand('1-3', toNumber('TRY_CAST'))],
  TRY_TO_DECIMAL: [expand('1-3', toNumber('TRY_CAST'))],
  TRY_TO_NUMERIC: [expand('1-3', toNumber('TRY_CAST'))],
  TO_DOUBLE: [expand('1', toScalar('DOUBLE', 'CAST'))],
  TRY_TO_DOUBLE: [expand('1', toScalar('DOUBLE', 'TRY_CAST'))],
  TO_BOOLEAN: [expand('1', toScalar('BOOLEAN', 'CAST'))],
  TRY_TO_BOOLEAN: [expand('1', toScalar('BOOLEAN', 'TRY_CAST'))],

  CURRENT_DATABASE: [session('database')],
  CURRENT_SCHEMA: [session('schema')],
  CURRENT_ROLE: [session('role')],
  CURRENT_WAREHOUSE: [session('warehouse')],
  CURRENT_SECONDARY_ROLES: [{ arity: '0', strategy: 'session', rule: () => lit.str(SECONDARY_ROLES) }],
  SYSTEM$BOOTSTRAP_DATA_REQUEST: [{ arity: '0+', strategy: 'session', rule: BOOTSTRAP_DATA_REQUEST }]
};
