// tests/properties.spec.ts
// Properties that span the session, catalog, rewriter and type mapper together.
import { describe, it, expect } from 'vitest';
import pino from 'pino';
import { DEFAULT_TARGET, UnsupportedFunctionError, type TargetCapabilities, type TypeDescriptor } from '@frostbridge/core';
import { FunctionCatalog, parseArity } from '@frostbridge/catalog';
import { Translator } from '@frostbridge/rewriter';
import { SessionContext } from '@frostbridge/session';
import { call, col } from '@frostbridge/sql';
import { fromTarget, toTarget } from '@frostbridge/typemap';

const quiet = pino({ level: 'silent' });
const session = () => new SessionContext({ database: 'd', schema: 's' });

describe('idempotence', () => {
  const statements = [
    'SELECT * FROM t',
    'SELECT NVL(a, 1) FROM t',
    'SELECT col:a.b FROM t',
    'SELECT DIV0(a, 0) FROM t',
    'SELECT a, ROW_NUMBER() OVER (PARTITION BY b ORDER BY c DESC) AS rn FROM t QUALIFY rn = 1',
    'SELECT TOP 5 a FROM t ORDER BY a DESC',
    'WITH x AS (SELECT 1) SELECT * FROM x',
    'CREATE TABLE t (id NUMBER(38,0), amount NUMBER(10,2), name VARCHAR(10))',
    'UPDATE t SET a = 1 WHERE b = 2',
    'DELETE FROM t WHERE a IS NULL',
    'SHOW OBJECTS',
    'COPY INTO t FROM @landing/a.csv FILE_FORMAT = (TYPE = CSV, SKIP_HEADER = 1)'
  ];

  it.each(statements)('re-translating the output of %s changes nothing', (sql) => {
    const translator = new Translator({ logger: quiet, cacheSize: 0 });
    const s = session();
    const once = translator.translate(sql, s).emittedSql;
    expect(translator.translate(once, s).emittedSql).toBe(once);
  });
});

describe('script idempotence', () => {
  const decomposed: TargetCapabilities = { ...DEFAULT_TARGET, nativeMerge: false };
  const scripts: Array<[string, TargetCapabilities]> = [
    ['INSERT OVERWRITE INTO t SELECT * FROM u', DEFAULT_TARGET],
    [
      'MERGE INTO t USING src s ON t.id = s.id WHEN MATCHED THEN UPDATE SET v = s.v ' +
        'WHEN NOT MATCHED THEN INSERT (id, v) VALUES (s.id, s.v)',
      decomposed
    ],
    ['CREATE DATABASE db1', DEFAULT_TARGET],
    ['DESCRIBE TABLE t', DEFAULT_TARGET]
  ];

  it.each(scripts)('re-translating the expansion of %s changes nothing', (sql, target) => {
    const translator = new Translator({ logger: quiet, cacheSize: 0, target });
    const s = session();
    const run = (text: string) => translator.translateScript(text, s).map((t) => t.emittedSql).join(';\n');
    const once = run(sql);
    expect(run(once)).toBe(once);
  });
});

describe('numeric variables', () => {
  it('carries a 20-digit integer through SET, inlining and re-translation', () => {
    const translator = new Translator({ logger: quiet });
    const s = session();
    const [, select] = translator.translateScript('SET big = 12345678901234567890; SELECT $big AS v', s);
    expect(s.snapshot().variables.BIG).toEqual({ kind: 'number', text: '12345678901234567890' });
    expect(select.emittedSql).toBe('SELECT 12345678901234567890 AS V');
    expect(translator.translate(select.emittedSql, s).emittedSql).toBe(select.emittedSql);
  });
});

describe('case folding', () => {
  const emit = (sql: string) => new Translator({ logger: quiet }).translate(sql, session()).emittedSql;

  it('resolves foo, FOO and "FOO" to the same table', () => {
    expect(emit('SELECT * FROM foo')).toBe('SELECT * FROM D.S.FOO');
    expect(emit('SELECT * FROM FOO')).toBe('SELECT * FROM D.S.FOO');
    expect(emit('SELECT * FROM "FOO"')).toBe('SELECT * FROM D.S.FOO');
  });

  it('keeps quoted lower case distinct', () => {
    expect(emit('SELECT * FROM "foo"')).toBe('SELECT * FROM D.S."foo"');
  });

  it('keeps names as written under AS_WRITTEN', () => {
    const s = new SessionContext({ database: 'd', schema: 's', casePolicy: 'AS_WRITTEN' });
    expect(s.fold({ name: 'foo', quoted: false })).toBe('foo');
    expect(s.fold({ name: 'FOO', quoted: false })).toBe('FOO');
  });
});

describe('catalog totality', () => {
  const catalog = new FunctionCatalog();
  const listings = catalog.list();

  const sampleArities = (text: string): number[] => {
    const arity = parseArity(text);
    if (!arity) throw new Error(`bad arity ${text}`);
    return arity.ranges.flatMap((r) => (r.max > r.min ? [r.min, r.min + 1] : [r.min]));
  };

  it('resolves every listed name at its documented arities', () => {
    for (const f of listings) {
      for (const n of sampleArities(f.arity)) expect(catalog.has(f.name, n)).toBe(true);
    }
  });

  it('rewrites every data-driven entry without failing', () => {
    const ctx = { session: { database: 'D', schema: 'S' } };
    for (const f of listings.filter((l) => l.strategy === 'rename' || l.strategy === 'macro' || l.strategy === 'passthrough')) {
      for (const n of sampleArities(f.arity)) {
        if (n === 0) continue;
        const args = Array.from({ length: n }, (_, i) => col(`c${i}`));
        expect(() => catalog.rewrite(call(f.name, args), ctx)).not.toThrow(UnsupportedFunctionError);
      }
    }
  });
});

describe('type round trip', () => {
  const cases: Array<[TypeDescriptor, { precision?: number; scale?: number; characterLength?: number }]> = [
    [{ sourceName: 'NUMBER', numericPrecision: 38, numericScale: 0 }, {}],
    [{ sourceName: 'NUMBER', numericPrecision: 10, numericScale: 2 }, {}],
    [{ sourceName: 'FLOAT' }, {}],
    [{ sourceName: 'VARCHAR', characterLength: 10 }, { characterLength: 10 }],
    [{ sourceName: 'VARCHAR', characterLength: 16_777_216 }, {}],
    [{ sourceName: 'BINARY', characterLength: 8_388_608 }, {}],
    [{ sourceName: 'BOOLEAN' }, {}],
    [{ sourceName: 'DATE' }, {}],
    [{ sourceName: 'TIME', numericScale: 9 }, {}],
    [{ sourceName: 'TIMESTAMP_NTZ', numericScale: 9 }, {}],
    [{ sourceName: 'TIMESTAMP_TZ', numericScale: 9 }, {}],
    [{ sourceName: 'VARIANT' }, {}],
    [{ sourceName: 'ARRAY' }, {}]
  ];

  it.each(cases)('%o survives toTarget then fromTarget', (d, hint) => {
    expect(fromTarget(toTarget(d), hint)).toEqual(d);
  });

  it('keeps 38-digit integers at precision 38 and scale 0', () => {
    expect(toTarget({ sourceName: 'NUMBER', numericPrecision: 38, numericScale: 0 })).toBe('BIGINT');
    expect(fromTarget('BIGINT')).toEqual({ sourceName: 'NUMBER', numericPrecision: 38, numericScale: 0 });
  });
});
