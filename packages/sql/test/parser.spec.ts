// packages/sql/test/parser.spec.ts
import { describe, it, expect } from 'vitest';
import { UnsupportedSyntaxError } from '@frostbridge/core';
import { parseScript, parseStatement, parseExpression, tokenize } from '../src';

describe('tokenizer', () => {
  it('separates session variables from positional params', () => {
    expect(tokenize('$x + $1').map((t) => [t.type, t.value])).toEqual([
      ['variable', 'x'],
      ['op', '+'],
      ['param', '$1'],
      ['eof', '']
    ]);
  });

  it('reads doubled quotes and backslash escapes', () => {
    const [s, q] = tokenize(`'it''s\\n' "a""b"`);
    expect(s).toMatchObject({ type: 'string', value: "it's\n" });
    expect(q).toMatchObject({ type: 'quoted', value: 'a"b' });
  });

  it('only reads @N placeholders in template mode', () => {
    expect(() => tokenize('@0')).toThrow(UnsupportedSyntaxError);
    expect(tokenize('@0 + @*', { placeholders: true }).map((t) => t.type)).toEqual([
      'placeholder', 'op', 'placeholder', 'eof'
    ]);
  });
});

describe('stage locations', () => {
  it('reads @name/path as one token up to whitespace or punctuation', () => {
    expect(tokenize('@my_stage/2024/a.csv;').map((t) => [t.type, t.value])).toEqual([
      ['stage', 'my_stage/2024/a.csv'],
      ['op', ';'],
      ['eof', '']
    ]);
    expect(tokenize('@~/x @%t').map((t) => t.value)).toEqual(['~/x', '%t', '']);
  });

  it('needs a name after @', () => {
    expect(() => tokenize('@ x')).toThrow("Expected a stage name after '@' at offset 0");
    expect(() => tokenize('@0')).toThrow(UnsupportedSyntaxError);
  });
});

describe('parseScript', () => {
  it('splits on semicolons and keeps each statement text', () => {
    const parsed = parseScript('USE DATABASE d;\n SELECT 1 ;;');
    expect(parsed.map((p) => p.text)).toEqual(['USE DATABASE d', 'SELECT 1']);
    expect(parsed[0].statement).toEqual({ kind: 'use', object: 'DATABASE', name: [{ name: 'd', quoted: false }] });
  });

  it('rejects a stray token with its offset', () => {
    expect(() => parseStatement('SELECT FROM')).toThrow("Expected expression but got 'FROM' at offset 7");
  });

  it('rejects statements outside the supported surface', () => {
    expect(() => parseStatement('GRANT ROLE r TO USER u')).toThrow("Unsupported statement 'GRANT' at offset 0");
  });
});

describe('semi-structured paths', () => {
  it('collects colon, dot and bracket steps on one path', () => {
    expect(parseExpression('v:a.b[0]')).toEqual({
      kind: 'path',
      base: { kind: 'column', parts: [{ name: 'v', quoted: false }] },
      steps: [
        { kind: 'key', name: 'a' },
        { kind: 'key', name: 'b' },
        { kind: 'index', value: 0 }
      ]
    });
  });

  it('keeps qualified columns as column references', () => {
    expect(parseExpression('t.c')).toEqual({
      kind: 'column',
      parts: [{ name: 't', quoted: false }, { name: 'c', quoted: false }]
    });
  });
});

describe('statements', () => {
  it('parses MERGE clauses in order', () => {
    const s = parseStatement(
      'MERGE INTO t USING s ON t.id = s.id WHEN MATCHED AND s.del THEN DELETE WHEN NOT MATCHED THEN INSERT (id) VALUES (s.id)'
    );
    if (s.kind !== 'merge') throw new Error('expected merge');
    expect(s.clauses.map((c) => [c.matched, c.action.kind, c.condition !== undefined])).toEqual([
      [true, 'delete', true],
      [false, 'insert', false]
    ]);
  });

  it('reads time travel on a table reference', () => {
    const s = parseStatement("SELECT * FROM t AT(TIMESTAMP => '2024-01-01') AS x");
    if (s.kind !== 'query' || s.query.kind !== 'select') throw new Error('expected select');
    expect(s.query.from[0]).toMatchObject({
      kind: 'table',
      alias: { name: 'x', quoted: false },
      timeTravel: { kind: 'AT', args: [{ name: 'TIMESTAMP' }] }
    });
  });

  it('pairs multi-variable SET', () => {
    const s = parseStatement('SET (a, b) = (1, 2)');
    expect(s).toEqual({
      kind: 'set',
      assignments: [
        { name: { name: 'a', quoted: false }, value: { kind: 'literal', type: 'number', value: '1' } },
        { name: { name: 'b', quoted: false }, value: { kind: 'literal', type: 'number', value: '2' } }
      ]
    });
    expect(() => parseStatement('SET (a, b) = (1)')).toThrow('SET assigns 2 variables but 1 values were given');
  });

  it('reads SHOW with an optional scope', () => {
    expect(parseStatement('SHOW DATABASES')).toEqual({ kind: 'show', object: 'DATABASES' });
    expect(parseStatement('show schemas')).toEqual({ kind: 'show', object: 'SCHEMAS' });
    expect(parseStatement('SHOW SCHEMAS IN DATABASE d')).toEqual({
      kind: 'show', object: 'SCHEMAS', scope: [{ name: 'd', quoted: false }]
    });
    expect(parseStatement('SHOW OBJECTS IN d."S"')).toEqual({
      kind: 'show', object: 'OBJECTS', scope: [{ name: 'd', quoted: false }, { name: 'S', quoted: true }]
    });
    expect(() => parseStatement('SHOW TABLES')).toThrow(UnsupportedSyntaxError);
  });

  it('reads COPY INTO from a stage with a file format', () => {
    expect(parseStatement("COPY INTO t FROM @s/a.csv FILE_FORMAT = (TYPE = csv, SKIP_HEADER = 1, FIELD_DELIMITER = ';')")).toEqual({
      kind: 'copy',
      table: [{ name: 't', quoted: false }],
      source: { kind: 'stage', location: 's/a.csv' },
      options: { format: 'CSV', header: true, delimiter: ';' }
    });
    expect(parseStatement("COPY INTO t FROM '@s/b.json'")).toMatchObject({ source: { kind: 'stage', location: 's/b.json' }, options: {} });
    expect(() => parseStatement("COPY INTO t FROM 'b.json'")).toThrow("COPY INTO reads from a stage (@name) but got 'b.json' at offset 17");
    expect(() => parseStatement('COPY INTO t FROM @s PURGE = TRUE')).toThrow('COPY option PURGE is not supported');
  });

  it('reads DuckDB file copies', () => {
    expect(parseStatement("COPY t FROM 'in.csv' (FORMAT PARQUET, HEADER)")).toEqual({
      kind: 'copy',
      table: [{ name: 't', quoted: false }],
      source: { kind: 'file', path: 'in.csv' },
      options: { format: 'PARQUET', header: true }
    });
  });

  it('accepts CREATE TEMPORARY TABLE AS', () => {
    const s = parseStatement('CREATE TEMP TABLE tmp AS SELECT 1 AS x');
    expect(s).toMatchObject({ kind: 'create_table', temporary: true, name: [{ name: 'tmp' }] });
  });
});
