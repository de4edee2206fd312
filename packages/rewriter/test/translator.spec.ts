// packages/rewriter/test/translator.spec.ts
import { describe, it, expect } from 'vitest';
import pino from 'pino';
import {
  DEFAULT_TARGET, UnresolvedContextError, UnsupportedFunctionError, UnsupportedSyntaxError, UndefinedVariableError
} from '@frostbridge/core';
import { SessionContext } from '@frostbridge/session';
import { Translator, type TranslatorOptions } from '../src';

const quiet = pino({ level: 'silent' });
const make = (opts: TranslatorOptions = {}) => new Translator({ logger: quiet, ...opts });
const session = () => new SessionContext({ database: 'd', schema: 's' });

const emit = (sql: string, t = make(), s = session()): string => t.translate(sql, s).emittedSql;

describe('Translator queries', () => {
  it('qualifies unqualified tables from the session', () => {
    expect(emit('SELECT * FROM t')).toBe('SELECT * FROM D.S.T');
  });

  it('rewrites path access to an accessor call', () => {
    expect(emit('SELECT col:a.b FROM t')).toBe("SELECT json_extract_string(COL, '$.a.b') FROM D.S.T");
  });

  it('guards DIV0 against a zero divisor', () => {
    expect(emit('SELECT DIV0(a, 0) FROM t')).toBe('SELECT CASE WHEN 0 = 0 THEN 0 ELSE A / nullif(0, 0) END FROM D.S.T');
  });

  it('hoists QUALIFY into a filtered subquery', () => {
    expect(emit('SELECT a, ROW_NUMBER() OVER (PARTITION BY b ORDER BY c DESC) AS rn FROM t QUALIFY rn = 1')).toBe(
      'SELECT * FROM (SELECT A, row_number() OVER (PARTITION BY B ORDER BY C DESC NULLS FIRST) AS RN FROM D.S.T) AS _Q WHERE RN = 1'
    );
  });

  it('keeps QUALIFY when the target has it', () => {
    const t = make({ target: { ...DEFAULT_TARGET, nativeQualify: true } });
    expect(emit('SELECT a FROM t QUALIFY a > 1', t)).toBe('SELECT A FROM D.S.T QUALIFY A > 1');
  });

  it('turns TOP into LIMIT and orders NULLS FIRST on DESC', () => {
    expect(emit('SELECT TOP 5 a FROM t')).toBe('SELECT A FROM D.S.T LIMIT 5');
    expect(emit('SELECT a FROM t ORDER BY a DESC')).toBe('SELECT A FROM D.S.T ORDER BY A DESC NULLS FIRST');
  });

  it('leaves CTE names unqualified', () => {
    expect(emit('WITH x AS (SELECT 1) SELECT * FROM x')).toBe('WITH X AS (SELECT 1) SELECT * FROM X');
  });

  it('drops time travel clauses', () => {
    expect(emit('SELECT * FROM t AT(OFFSET => -60)')).toBe('SELECT * FROM D.S.T');
  });

  it('expands GENERATOR and FLATTEN', () => {
    expect(emit('SELECT 1 FROM TABLE(GENERATOR(ROWCOUNT => 3))')).toBe('SELECT 1 FROM generate_series(1, 3)');
    expect(emit('SELECT f.value FROM t, LATERAL FLATTEN(INPUT => t.arr) f')).toBe(
      'SELECT F.VALUE FROM D.S.T, LATERAL (SELECT unnest(CAST(T.ARR AS JSON[])) AS VALUE, ' +
        'generate_subscripts(CAST(T.ARR AS JSON[]), 1) - 1 AS INDEX) AS F'
    );
  });

  it('records catalog strategies in the trace', () => {
    const r = make().translate('SELECT NVL(a, 1) FROM t', session());
    expect(r.emittedSql).toBe('SELECT coalesce(A, 1) FROM D.S.T');
    expect(r.trace.functions).toEqual([{ name: 'NVL', arity: 2, strategy: 'rename' }]);
    expect(r.statementKind).toBe('query');
  });
});

describe('Translator statements', () => {
  it('splits INSERT OVERWRITE into DELETE and INSERT', () => {
    expect(emit('INSERT OVERWRITE INTO t SELECT * FROM src')).toBe(
      'DELETE FROM D.S.T;\nINSERT INTO D.S.T SELECT * FROM D.S.SRC'
    );
  });

  it('keeps MERGE when the target supports it', () => {
    expect(emit('MERGE INTO t USING src ON t.id = src.id WHEN MATCHED THEN DELETE')).toBe(
      'MERGE INTO D.S.T USING D.S.SRC ON T.ID = SRC.ID WHEN MATCHED THEN DELETE'
    );
  });

  it('decomposes MERGE without engine support', () => {
    const t = make({ target: { ...DEFAULT_TARGET, nativeMerge: false } });
    const r = t.translate(
      'MERGE INTO t USING src ON t.id = src.id WHEN MATCHED THEN UPDATE SET v = src.v ' +
        'WHEN NOT MATCHED THEN INSERT (id, v) VALUES (src.id, src.v)',
      session()
    );
    expect(r.emittedSql.split(';\n')).toEqual([
      'CREATE OR REPLACE TEMPORARY TABLE _MERGE_DELTA AS SELECT SRC.*, EXISTS (SELECT 1 FROM D.S.T WHERE T.ID = SRC.ID) AS _MATCHED FROM D.S.SRC',
      'UPDATE D.S.T SET V = SRC.V FROM _MERGE_DELTA AS SRC WHERE T.ID = SRC.ID',
      'INSERT INTO D.S.T (ID, V) SELECT SRC.ID, SRC.V FROM _MERGE_DELTA AS SRC WHERE NOT SRC._MATCHED',
      'DROP TABLE IF EXISTS _MERGE_DELTA'
    ]);
    expect(r.statementKind).toBe('merge');
    expect(r.trace.flags).toEqual({ decomposedMerge: true });
  });

  it('attaches a catalog for CREATE DATABASE and makes it current', () => {
    const r = make().translate('CREATE DATABASE analytics', new SessionContext());
    expect(r.emittedSql.split(';\n')).toEqual([
      "ATTACH ':memory:' AS ANALYTICS",
      'CREATE SCHEMA IF NOT EXISTS ANALYTICS.PUBLIC',
      'USE ANALYTICS.PUBLIC'
    ]);
    expect(r.mutatedSession).toEqual({ kind: 'use', database: 'ANALYTICS', schema: 'PUBLIC' });
    expect(r.statementKind).toBe('ddl');
  });

  it('attaches under the configured path', () => {
    const t = make({ target: { ...DEFAULT_TARGET, attachPath: '/var/frost/' } });
    expect(emit('CREATE OR REPLACE DATABASE db1', t).split(';\n').slice(0, 2)).toEqual([
      'DETACH IF EXISTS DB1',
      "ATTACH '/var/frost/DB1.duckdb' AS DB1"
    ]);
  });

  it('maps declared types and records VARCHAR lengths', () => {
    const r = make().translate('CREATE TABLE t (id NUMBER(38,0), amount NUMBER(10,2), name VARCHAR(10))', session());
    expect(r.emittedSql).toBe('CREATE TABLE D.S.T (ID BIGINT, AMOUNT DECIMAL(10,2), NAME VARCHAR)');
    expect(r.metadataEffects).toEqual([
      { kind: 'columns', table: { database: 'D', schema: 'S', name: 'T' }, columns: [{ column: 'NAME', characterLength: 10 }] }
    ]);
  });

  it('keeps temporary tables in the temp catalog', () => {
    const r = make().translate('CREATE TEMPORARY TABLE tmp (name VARCHAR(10))', session());
    expect(r.emittedSql).toBe('CREATE TEMPORARY TABLE TMP (NAME VARCHAR)');
    expect(r.mutatedSession).toEqual({ kind: 'temp_table', name: 'TMP', action: 'create' });
    expect(r.metadataEffects).toEqual([
      { kind: 'columns', table: { database: 'temp', schema: 'main', name: 'TMP' }, columns: [{ column: 'NAME', characterLength: 10 }] }
    ]);
  });

  it('reports DROP TABLE as a metadata drop', () => {
    expect(make().translate('DROP TABLE t', session()).metadataEffects).toEqual([
      { kind: 'drop', table: { database: 'D', schema: 'S', name: 'T' } }
    ]);
  });

  it('rewrites DESCRIBE into an information_schema query', () => {
    const r = make().translate('DESCRIBE TABLE t', session());
    expect(r.statementKind).toBe('describe');
    expect(r.describe).toEqual({ database: 'D', schema: 'S', name: 'T' });
    expect(r.emittedSql).toContain("WHERE TABLE_CATALOG = 'D' AND TABLE_SCHEMA = 'S' AND TABLE_NAME = 'T'");
  });

  it('answers session statements with a status row', () => {
    const r = make().translate("SET x = 'hello'", session());
    expect(r.emittedSql).toBe(`SELECT 'Statement executed successfully.' AS "status"`);
    expect(r.mutatedSession).toEqual({ kind: 'set', assignments: [{ name: 'X', value: 'hello' }] });
    expect(r.statementKind).toBe('session');
  });
});

const EPOCH = "CAST('1970-01-01 00:00:00+00:00' AS TIMESTAMPTZ)";

describe('Translator account views', () => {
  it('lists attached databases for SHOW DATABASES', () => {
    const r = make().translate('SHOW DATABASES', session());
    expect(r.statementKind).toBe('query');
    expect(r.emittedSql).toBe(
      `SELECT ${EPOCH} AS "created_on", CATALOG_NAME AS "name", 'N' AS "is_default", ` +
        `CASE WHEN CATALOG_NAME = 'D' THEN 'Y' ELSE 'N' END AS "is_current", '' AS "origin", 'SYSADMIN' AS "owner", ` +
        `NULL AS "comment", '' AS "options", 1 AS "retention_time", 'STANDARD' AS "kind" ` +
        "FROM SYSTEM.INFORMATION_SCHEMA.SCHEMATA WHERE CATALOG_NAME NOT IN ('memory', 'system', 'temp', '_frost_account') " +
        "AND SCHEMA_NAME = 'main' ORDER BY CATALOG_NAME"
    );
  });

  it('hides the configured account catalog', () => {
    const t = make({ extensions: { catalog: '_acct', schema: '_info' } });
    expect(emit('SHOW DATABASES', t, new SessionContext())).toContain(
      `'N' AS "is_current"`
    );
    expect(emit('SHOW DATABASES', t)).toContain("NOT IN ('memory', 'system', 'temp', '_acct')");
  });

  it('lists schemas of the current or a named database', () => {
    const schemas = (current: string, db: string) =>
      `SELECT ${EPOCH} AS "created_on", SCHEMA_NAME AS "name", 'N' AS "is_default", ${current} AS "is_current", ` +
      `CATALOG_NAME AS "database_name", 'SYSADMIN' AS "owner", NULL AS "comment", '' AS "options", 1 AS "retention_time", ` +
      `'ROLE' AS "owner_role_type" FROM SYSTEM.INFORMATION_SCHEMA.SCHEMATA WHERE CATALOG_NAME = '${db}' ` +
      "AND SCHEMA_NAME NOT IN ('pg_catalog', '_information_schema') ORDER BY SCHEMA_NAME";
    expect(emit('SHOW SCHEMAS')).toBe(schemas("CASE WHEN SCHEMA_NAME = 'S' THEN 'Y' ELSE 'N' END", 'D'));
    expect(emit('SHOW SCHEMAS IN DATABASE other')).toBe(schemas("'N'", 'OTHER'));
    expect(emit('SHOW SCHEMAS IN "Mixed"')).toBe(schemas("'N'", 'Mixed'));
  });

  it('lists tables and views for SHOW OBJECTS', () => {
    const objects = (db: string, schema: string) =>
      `SELECT ${EPOCH} AS "created_on", TABLE_NAME AS "name", TABLE_SCHEMA AS "schema_name", ` +
      `TABLE_CATALOG AS "database_name", CASE WHEN TABLE_TYPE = 'VIEW' THEN 'VIEW' ELSE 'TABLE' END AS "kind", ` +
      `NULL AS "comment", 'SYSADMIN' AS "owner", 'ROLE' AS "owner_role_type" FROM SYSTEM.INFORMATION_SCHEMA.TABLES ` +
      `WHERE TABLE_CATALOG = '${db}' AND TABLE_SCHEMA = '${schema}' ORDER BY TABLE_NAME`;
    expect(emit('SHOW OBJECTS')).toBe(objects('D', 'S'));
    expect(emit('SHOW OBJECTS IN SCHEMA raw')).toBe(objects('D', 'RAW'));
    expect(emit('SHOW OBJECTS IN db2.raw')).toBe(objects('DB2', 'RAW'));
  });

  it('needs a current namespace for unscoped SHOW', () => {
    expect(() => emit('SHOW OBJECTS', make(), new SessionContext({ database: 'd' }))).toThrow(UnresolvedContextError);
    expect(() => emit('SHOW SCHEMAS', make(), new SessionContext())).toThrow(UnresolvedContextError);
  });

  it('answers INFORMATION_SCHEMA.DATABASES from the attached catalogs', () => {
    expect(emit('SELECT database_name FROM information_schema.databases')).toBe(
      `SELECT DATABASE_NAME FROM (SELECT CATALOG_NAME AS DATABASE_NAME, 'SYSADMIN' AS DATABASE_OWNER, 'NO' AS IS_TRANSIENT, ` +
        `CAST(NULL AS VARCHAR) AS COMMENT, ${EPOCH} AS CREATED, ${EPOCH} AS LAST_ALTERED, 1 AS RETENTION_TIME, ` +
        "'STANDARD' AS TYPE FROM SYSTEM.INFORMATION_SCHEMA.SCHEMATA WHERE CATALOG_NAME NOT IN " +
        "('memory', 'system', 'temp', '_frost_account') AND SCHEMA_NAME = 'main') AS DATABASES"
    );
  });

  it('reads a bare DATABASES inside the information schema', () => {
    const s = new SessionContext({ database: 'd', schema: 'information_schema' });
    expect(emit('SELECT * FROM databases d', make(), s)).toMatch(/^SELECT \* FROM \(SELECT CATALOG_NAME AS DATABASE_NAME, .*\) AS D$/);
    expect(emit('SELECT * FROM databases')).toBe('SELECT * FROM D.S.DATABASES');
  });

  it('labels the bootstrap call with its call text', () => {
    const sql = emit("SELECT SYSTEM$BOOTSTRAP_DATA_REQUEST('ACCOUNT','CURRENT_SESSION','USER')");
    expect(sql.startsWith(`SELECT CAST(json_merge_patch(json('{"serverVersion":"8.40.0",`)).toBe(true);
    expect(sql).toContain("json_object('currentWarehouse', 'DEFAULT_WAREHOUSE', 'currentDatabase', 'D', 'currentSchema', 'S')");
    expect(sql.endsWith(`AS VARCHAR) AS "SYSTEM$BOOTSTRAP_DATA_REQUEST('ACCOUNT','CURRENT_SESSION','USER')"`)).toBe(true);
  });

  it('keeps an explicit alias on the bootstrap call', () => {
    expect(emit('SELECT SYSTEM$BOOTSTRAP_DATA_REQUEST() AS doc').endsWith(' AS VARCHAR) AS DOC')).toBe(true);
  });
});

describe('Translator COPY', () => {
  it('reads stage files from the stage directory', () => {
    const r = make().translate('COPY INTO t FROM @my_stage/data.csv FILE_FORMAT = (TYPE = CSV, SKIP_HEADER = 1)', session());
    expect(r.emittedSql).toBe("COPY D.S.T FROM '/tmp/frost_stage/my_stage/data.csv' (FORMAT CSV, HEADER)");
    expect(r.statementKind).toBe('dml');
  });

  it('takes the stage directory from the target and quoted stage paths', () => {
    const t = make({ target: { ...DEFAULT_TARGET, stageDir: '/data/stages/' } });
    expect(emit("COPY INTO raw.events FROM '@landing/e.json' FILE_FORMAT = (TYPE = JSON)", t)).toBe(
      "COPY D.RAW.EVENTS FROM '/data/stages/landing/e.json' (FORMAT JSON)"
    );
  });

  it('passes DuckDB file copies through with their options', () => {
    expect(emit("COPY t FROM 'in.csv' (FORMAT CSV, HEADER FALSE, DELIMITER '|')")).toBe(
      "COPY D.S.T FROM 'in.csv' (FORMAT CSV, HEADER FALSE, DELIMITER '|')"
    );
  });
});

describe('Translator scripts and variables', () => {
  it('applies SET before the next statement reads the variable', () => {
    const s = session();
    const [set, select] = make().translateScript("SET x = 'hello'; SELECT $x", s);
    expect(set.text).toBe("SET x = 'hello'");
    expect(select.emittedSql).toBe("SELECT 'hello'");
    expect([...select.consumedVariables]).toEqual(['X']);
    expect(select.trace.flags).toEqual({ substitutedVariables: 1 });
  });

  it('inlines negative numbers in parentheses', () => {
    const s = new SessionContext({ database: 'd', schema: 's', variables: { n: -3 } });
    expect(emit('SELECT a + $n FROM t', make(), s)).toBe('SELECT A + (-3) FROM D.S.T');
  });

  it('inlines numeric variables exactly as they were written', () => {
    const s = session();
    const [, big] = make().translateScript('SET big = 12345678901234567890; SELECT $big', s);
    expect(big.emittedSql).toBe('SELECT 12345678901234567890');
    const [, huge] = make().translateScript('SET huge = 1e400; SELECT $huge', s);
    expect(huge.emittedSql).toBe('SELECT 1e400');
  });

  it('fails on undefined variables', () => {
    expect(() => emit('SELECT $missing')).toThrow(UndefinedVariableError);
  });
});

describe('Translator failures', () => {
  it('raises UnsupportedFunctionError for unknown functions', () => {
    expect(() => emit('SELECT FOO_BAR(1)')).toThrow(UnsupportedFunctionError);
    expect(() => emit('SELECT * FROM TABLE(foo(1))')).toThrow(
      'Unsupported function FOO with 1 argument: not supported as a table function'
    );
  });

  it('needs a current database for unqualified names', () => {
    expect(() => emit('SELECT * FROM t', make(), new SessionContext())).toThrow(UnresolvedContextError);
  });

  it('takes exactly one statement', () => {
    expect(() => emit('SELECT 1; SELECT 2')).toThrow('Expected a single statement but got 2');
    expect(() => emit('  ')).toThrow('Empty SQL statement');
  });

  const failure = (run: () => unknown): unknown => {
    try {
      run();
    } catch (e) {
      return e;
    }
    return undefined;
  };

  it('tells statements outside the translated subset from malformed text', () => {
    const unsupported = failure(() => emit('TRUNCATE TABLE t'));
    expect(unsupported).toBeInstanceOf(UnsupportedSyntaxError);
    expect(unsupported).toMatchObject({
      message: "Unsupported statement 'TRUNCATE' at offset 0",
      details: { offset: 0, source: { valid: true, statements: 1 } }
    });
    expect(failure(() => emit('SELECT (1'))).toMatchObject({ code: 'UNSUPPORTED_SYNTAX', details: { source: { valid: false } } });
  });

  it('explains script-level syntax errors the same way', () => {
    expect(failure(() => make().translateScript("SELECT 'open", session()))).toMatchObject({
      message: 'Unterminated string literal at offset 7',
      details: { offset: 7, source: { valid: false } }
    });
  });
});

describe('Translator cache', () => {
  it('serves repeated statements from the cache', () => {
    const t = make({ cacheSize: 4 });
    const s = session();
    expect(t.translate('SELECT * FROM t', s).trace.cacheHit).toBe(false);
    const again = t.translate('SELECT * FROM t', s);
    expect(again.trace.cacheHit).toBe(true);
    expect(again.emittedSql).toBe('SELECT * FROM D.S.T');
    expect(t.cacheStats()).toEqual({ size: 1, hits: 1, misses: 1 });
  });

  it('hands out cached results that callers cannot change for each other', () => {
    const t = make({ cacheSize: 4 });
    const sql = 'CREATE TABLE t (name VARCHAR(10))';
    t.translate(sql, session());
    const first = t.translate(sql, session());
    const second = t.translate(sql, session());
    expect(Object.isFrozen(first.metadataEffects)).toBe(true);
    expect(Object.isFrozen(first.metadataEffects[0])).toBe(true);
    expect(first.consumedVariables).not.toBe(second.consumedVariables);
    expect(second.metadataEffects).toEqual([
      { kind: 'columns', table: { database: 'D', schema: 'S', name: 'T' }, columns: [{ column: 'NAME', characterLength: 10 }] }
    ]);
  });

  it('keys on the session namespace', () => {
    const t = make();
    expect(t.translate('SELECT * FROM t', session()).emittedSql).toBe('SELECT * FROM D.S.T');
    const other = new SessionContext({ database: 'e', schema: 's' });
    expect(t.translate('SELECT * FROM t', other).emittedSql).toBe('SELECT * FROM E.S.T');
  });

  it('never caches variable-consuming statements', () => {
    const t = make();
    const s = new SessionContext({ variables: { x: 1 } });
    t.translate('SELECT $x', s);
    expect(t.cacheStats().size).toBe(0);
  });

  it('stores nothing at size 0', () => {
    const t = make({ cacheSize: 0 });
    t.translate('SELECT * FROM t', session());
    expect(t.translate('SELECT * FROM t', session()).trace.cacheHit).toBe(false);
  });
});
